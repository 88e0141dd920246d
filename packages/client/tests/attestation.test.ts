import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  counterBoundHash,
  fromBase64,
  fromUtf8,
  sha256,
  toBase64,
  toHex,
  toUtf8,
} from "@attested-chat/shared";

import {
  AttestationKeyStore,
  PLATFORM_KEY_ID,
  SIMULATOR_KEY_ID,
} from "../src/lib/attestation-key-store.js";
import {
  PlatformAttestationProvider,
  SimulatorAttestationProvider,
  createAttestationProvider,
} from "../src/lib/attestation/index.js";
import { MemoryKeyStore } from "../src/lib/store/memory.js";
import { FakeAttestationService } from "./helpers.js";

const CHALLENGE = toBase64(toUtf8("challenge"));

function decodePayload(base64: string): unknown {
  return JSON.parse(fromUtf8(fromBase64(base64)));
}

beforeEach(() => {
  vi.spyOn(console, "info").mockImplementation(() => undefined);
});

describe("PlatformAttestationProvider", () => {
  let service: FakeAttestationService;
  let store: MemoryKeyStore;
  let provider: PlatformAttestationProvider;

  beforeEach(() => {
    service = new FakeAttestationService();
    store = new MemoryKeyStore();
    provider = new PlatformAttestationProvider(
      service,
      new AttestationKeyStore(store, PLATFORM_KEY_ID),
    );
  });

  it("generates one key for concurrent callers and persists it", async () => {
    const ids = await Promise.all([
      provider.ensureKeyExists(),
      provider.ensureKeyExists(),
      provider.ensureKeyExists(),
    ]);
    expect(ids).toEqual(["hw-key-1", "hw-key-1", "hw-key-1"]);
    expect(service.generated).toBe(1);
    expect(await store.load(PLATFORM_KEY_ID)).toBe("hw-key-1");
  });

  it("attests over SHA-256 of the decoded challenge", async () => {
    const attestation = await provider.attestKey(CHALLENGE);
    expect(fromUtf8(fromBase64(attestation))).toBe("attestation:hw-key-1");
    expect(service.attested).toEqual([
      { keyId: "hw-key-1", hash: toHex(sha256(toUtf8("challenge"))) },
    ]);
  });

  it("rejects a challenge that is not base64", async () => {
    await expect(provider.attestKey("not base64!")).rejects.toMatchObject({
      kind: "ATTESTATION_FAILED",
      message: "Invalid base64 challenge",
    });
    expect(service.generated).toBe(0);
  });

  it("asserts over SHA-256(body ++ be64(counter))", async () => {
    await provider.ensureKeyExists();
    const body = toUtf8('{"model":"m"}');
    const assertion = await provider.generateAssertion(body, 3);
    expect(fromUtf8(fromBase64(assertion))).toBe("assertion:hw-key-1");
    expect(service.asserted).toEqual([
      { keyId: "hw-key-1", hash: toHex(counterBoundHash(body, 3)) },
    ]);
  });

  it("fails assertions before a key exists", async () => {
    await expect(provider.generateAssertion(new Uint8Array(0), 1)).rejects.toMatchObject({
      kind: "ATTESTATION_KEY_MISSING",
    });
  });

  it("reports unsupported hardware", async () => {
    service.supported = false;
    expect(provider.isSupported()).toBe(false);
    await expect(provider.ensureKeyExists()).rejects.toMatchObject({
      kind: "ATTESTATION_NOT_SUPPORTED",
    });
  });

  it("wraps service failures with the cause", async () => {
    await provider.ensureKeyExists();
    const cause = new Error("enclave busy");
    service.failNextAssertion = cause;
    await expect(provider.generateAssertion(new Uint8Array(0), 1)).rejects.toMatchObject({
      kind: "ATTESTATION_FAILED",
      message: "Assertion generation failed: enclave busy",
      cause,
    });
  });

  it("clearAttestation forgets only the key id", async () => {
    await store.save("attest-counter", "9");
    await provider.ensureKeyExists();
    await provider.clearAttestation();
    expect(await provider.getKeyId()).toBeNull();
    expect(await store.load("attest-counter")).toBe("9");
  });
});

describe("SimulatorAttestationProvider", () => {
  const now = () => new Date("2026-01-02T03:04:05.000Z");
  let store: MemoryKeyStore;
  let provider: SimulatorAttestationProvider;

  beforeEach(() => {
    store = new MemoryKeyStore();
    provider = new SimulatorAttestationProvider(
      new AttestationKeyStore(store, SIMULATOR_KEY_ID),
      "com.example.notes",
      now,
    );
  });

  it("creates SIM- key ids once", async () => {
    const [first, second] = await Promise.all([
      provider.ensureKeyExists(),
      provider.ensureKeyExists(),
    ]);
    expect(first).toMatch(/^SIM-[0-9A-F]{8}-[0-9A-F]{4}-4[0-9A-F]{3}-[89AB][0-9A-F]{3}-[0-9A-F]{12}$/);
    expect(second).toBe(first);
    expect(await store.load(SIMULATOR_KEY_ID)).toBe(first);
  });

  it("produces a mock attestation payload", async () => {
    const attestation = await provider.attestKey(CHALLENGE);
    const keyId = await provider.getKeyId();
    expect(decodePayload(attestation)).toEqual({
      keyId,
      challenge: CHALLENGE,
      environment: "simulator",
      timestamp: "2026-01-02T03:04:05.000Z",
      bundleId: "com.example.notes",
      mockAttestation: true,
    });
  });

  it("produces a counter-bound mock assertion", async () => {
    const keyId = await provider.ensureKeyExists();
    const body = toUtf8("{}");
    expect(decodePayload(await provider.generateAssertion(body, 7))).toEqual({
      keyId,
      counter: 7,
      signature: toBase64(counterBoundHash(body, 7)),
      environment: "simulator",
      timestamp: "2026-01-02T03:04:05.000Z",
      mockAssertion: true,
    });
  });

  it("labels an empty bundle id as unknown", async () => {
    const anonymous = new SimulatorAttestationProvider(
      new AttestationKeyStore(new MemoryKeyStore(), SIMULATOR_KEY_ID),
      "",
      now,
    );
    expect(decodePayload(await anonymous.attestKey(CHALLENGE))).toMatchObject({
      bundleId: "unknown",
    });
  });

  it("fails assertions before a key exists", async () => {
    await expect(provider.generateAssertion(new Uint8Array(0), 1)).rejects.toMatchObject({
      kind: "ATTESTATION_KEY_MISSING",
      message: "No simulator key found",
    });
  });
});

describe("createAttestationProvider", () => {
  const store = new MemoryKeyStore();

  it("returns null for mode none", () => {
    expect(createAttestationProvider({ mode: "none" }, store, "b")).toBeNull();
  });

  it("requires a service for mode platform", () => {
    expect(() => createAttestationProvider({ mode: "platform" }, store, "b")).toThrow(
      "Platform attestation requested but no attestation service was provided",
    );
  });

  it("prefers a supported platform service", () => {
    const provider = createAttestationProvider(
      { service: new FakeAttestationService() },
      store,
      "b",
    );
    expect(provider?.kind).toBe("platform");
  });

  it("falls back to the simulator when the service is unsupported", () => {
    const service = new FakeAttestationService();
    service.supported = false;
    expect(createAttestationProvider({ service }, store, "b")?.kind).toBe("simulator");
  });

  it("returns null when nothing is supported and the simulator is disallowed", () => {
    expect(createAttestationProvider({ allowSimulator: false }, store, "b")).toBeNull();
  });

  it("honours an explicit simulator mode", () => {
    expect(
      createAttestationProvider(
        { mode: "simulator", service: new FakeAttestationService() },
        store,
        "b",
      )?.kind,
    ).toBe("simulator");
  });
});
