import type { KeyStore } from "./store/interface.js";

export const PLATFORM_KEY_ID = "attest-key-id";
export const SIMULATOR_KEY_ID = "attest-key-id.simulator";

/**
 * Persists the opaque attestation key id. The key material itself never
 * leaves the attestation service.
 */
export class AttestationKeyStore {
  constructor(
    private readonly store: KeyStore,
    private readonly entry: string = PLATFORM_KEY_ID,
  ) {}

  async getKeyId(): Promise<string | null> {
    const value = await this.store.load(this.entry);
    const trimmed = value?.trim();
    return trimmed ? trimmed : null;
  }

  async setKeyId(keyId: string): Promise<void> {
    await this.store.save(this.entry, keyId);
  }

  async clear(): Promise<void> {
    await this.store.remove(this.entry);
  }
}
