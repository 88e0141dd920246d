/**
 * Replay Counter
 * Monotonic assertion counter persisted in the key store
 *
 * Every read-modify-write goes through one SerialQueue, so concurrent
 * increments never observe the same value.
 */

import { SerialQueue, createLogger } from "@attested-chat/shared";

import type { KeyStore } from "./store/interface.js";

const logger = createLogger("client:store");

export const COUNTER_KEY = "attest-counter";

export class ReplayCounter {
  private readonly queue = new SerialQueue();

  constructor(
    private readonly store: KeyStore,
    private readonly key: string = COUNTER_KEY,
  ) {}

  /**
   * Current value, 0 when unset.
   */
  async getCounter(): Promise<number> {
    return this.queue.run(() => this.read());
  }

  /**
   * Increment and return the new value.
   */
  async incrementCounter(): Promise<number> {
    return this.queue.run(async () => {
      const next = (await this.read()) + 1;
      await this.store.save(this.key, String(next));
      return next;
    });
  }

  async clear(): Promise<void> {
    await this.queue.run(() => this.store.remove(this.key));
  }

  private async read(): Promise<number> {
    const raw = await this.store.load(this.key);
    if (raw === null) {
      return 0;
    }
    const value = Number(raw.trim());
    if (!Number.isSafeInteger(value) || value < 0) {
      logger.warn("Stored counter is not a non-negative integer; treating as 0", {
        key: this.key,
      });
      return 0;
    }
    return value;
  }
}
