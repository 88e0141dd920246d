import { promises as fs, existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";

import type { KeyStore } from "./interface.js";

export const DEFAULT_STORE_DIR = join(homedir(), ".attested-chat");

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

/**
 * Filesystem-backed store, one file per key.
 * The directory is created 0700 and every entry is written 0600 through a
 * temp file and rename, so a crash never leaves a half-written counter.
 */
export class NodeKeyStore implements KeyStore {
  private readonly storeDir: string;

  constructor(storeDir: string = DEFAULT_STORE_DIR) {
    this.storeDir = storeDir;
    this.ensureStoreDir();
  }

  private ensureStoreDir(): void {
    if (!existsSync(this.storeDir)) {
      mkdirSync(this.storeDir, { recursive: true, mode: 0o700 });
    }
  }

  private getPathForKey(key: string): string {
    if (!/^[A-Za-z0-9._-]+$/.test(key) || key.includes("..")) {
      throw new Error(`Invalid key format: ${key}`);
    }
    return join(this.storeDir, key);
  }

  async save(key: string, data: string): Promise<void> {
    const filePath = this.getPathForKey(key);
    const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
    await fs.writeFile(tempPath, data, { encoding: "utf8", mode: 0o600 });
    await fs.rename(tempPath, filePath);
  }

  async load(key: string): Promise<string | null> {
    const filePath = this.getPathForKey(key);
    try {
      return await fs.readFile(filePath, "utf8");
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") {
        return null;
      }
      throw error;
    }
  }

  async remove(key: string): Promise<void> {
    const filePath = this.getPathForKey(key);
    await fs.rm(filePath, { force: true });
  }
}
