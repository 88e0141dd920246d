import type { KeyStore } from "./interface.js";

/**
 * In-process store. Nothing survives the process; used for tests and for
 * clients that opt out of persistence.
 */
export class MemoryKeyStore implements KeyStore {
  private readonly entries = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.entries.set(key, value);
    }
  }

  async save(key: string, data: string): Promise<void> {
    this.entries.set(key, data);
  }

  async load(key: string): Promise<string | null> {
    return this.entries.get(key) ?? null;
  }

  async remove(key: string): Promise<void> {
    this.entries.delete(key);
  }
}
