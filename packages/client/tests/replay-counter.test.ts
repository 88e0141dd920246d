import { mkdtempSync, rmSync, statSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";

import { AttestationKeyStore, SIMULATOR_KEY_ID } from "../src/lib/attestation-key-store.js";
import { COUNTER_KEY, ReplayCounter } from "../src/lib/replay-counter.js";
import { MemoryKeyStore } from "../src/lib/store/memory.js";
import { NodeKeyStore } from "../src/lib/store/node.js";

describe("ReplayCounter", () => {
  it("starts at 0 and increments by one", async () => {
    const counter = new ReplayCounter(new MemoryKeyStore());
    expect(await counter.getCounter()).toBe(0);
    expect(await counter.incrementCounter()).toBe(1);
    expect(await counter.incrementCounter()).toBe(2);
    expect(await counter.getCounter()).toBe(2);
  });

  it("hands out C+1..C+N to N concurrent increments", async () => {
    const store = new MemoryKeyStore({ [COUNTER_KEY]: "10" });
    const counter = new ReplayCounter(store);

    const values = await Promise.all(Array.from({ length: 25 }, () => counter.incrementCounter()));

    expect([...values].sort((a, b) => a - b)).toEqual(
      Array.from({ length: 25 }, (_, i) => 11 + i),
    );
    expect(await store.load(COUNTER_KEY)).toBe("35");
  });

  it("treats a corrupt stored value as 0", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const counter = new ReplayCounter(new MemoryKeyStore({ [COUNTER_KEY]: "seven" }));
    expect(await counter.getCounter()).toBe(0);
    expect(await counter.incrementCounter()).toBe(1);
    vi.restoreAllMocks();
  });

  it("clear() resets to 0", async () => {
    const counter = new ReplayCounter(new MemoryKeyStore({ [COUNTER_KEY]: "4" }));
    await counter.clear();
    expect(await counter.getCounter()).toBe(0);
  });
});

describe("AttestationKeyStore", () => {
  it("returns null for a missing or blank key id", async () => {
    const store = new MemoryKeyStore({ [SIMULATOR_KEY_ID]: "   " });
    expect(await new AttestationKeyStore(store).getKeyId()).toBeNull();
    expect(await new AttestationKeyStore(store, SIMULATOR_KEY_ID).getKeyId()).toBeNull();
  });

  it("persists and clears", async () => {
    const keys = new AttestationKeyStore(new MemoryKeyStore());
    await keys.setKeyId("key-123");
    expect(await keys.getKeyId()).toBe("key-123");
    await keys.clear();
    expect(await keys.getKeyId()).toBeNull();
  });
});

describe("NodeKeyStore", () => {
  let dir: string;

  beforeEach(() => {
    dir = join(mkdtempSync(join(tmpdir(), "attested-chat-")), "store");
  });

  afterEach(() => {
    rmSync(join(dir, ".."), { recursive: true, force: true });
  });

  it("creates the directory and writes owner-only files", async () => {
    const store = new NodeKeyStore(dir);
    await store.save(COUNTER_KEY, "3");

    expect(statSync(dir).mode & 0o777).toBe(0o700);
    expect(statSync(join(dir, COUNTER_KEY)).mode & 0o777).toBe(0o600);
    expect(await store.load(COUNTER_KEY)).toBe("3");
  });

  it("returns null for missing entries", async () => {
    const store = new NodeKeyStore(dir);
    expect(await store.load("absent")).toBeNull();
    await expect(store.remove("absent")).resolves.toBeUndefined();
  });

  it("survives a new instance over the same directory", async () => {
    const counter = new ReplayCounter(new NodeKeyStore(dir));
    await counter.incrementCounter();
    await counter.incrementCounter();
    expect(await new ReplayCounter(new NodeKeyStore(dir)).getCounter()).toBe(2);
  });

  it("rejects key names that could escape the directory", async () => {
    const store = new NodeKeyStore(dir);
    await expect(store.save("../outside", "x")).rejects.toThrow("Invalid key format");
    await expect(store.load("a/b")).rejects.toThrow("Invalid key format");
    await expect(store.load("a..b")).rejects.toThrow("Invalid key format");
  });
});
