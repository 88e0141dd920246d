/**
 * Abstract interface for a persistent, asynchronous key-value store.
 * Attestation key ids and replay counters live behind this so the client can be
 * backed by the filesystem, an OS keychain binding, or memory in tests.
 */
export interface KeyStore {
  /**
   * Saves a string value under a given key, replacing any previous value.
   */
  save(key: string, data: string): Promise<void>;

  /**
   * Loads the value for a key, or null if the key is not found.
   */
  load(key: string): Promise<string | null>;

  /**
   * Removes a key. Removing a missing key is not an error.
   */
  remove(key: string): Promise<void>;
}
