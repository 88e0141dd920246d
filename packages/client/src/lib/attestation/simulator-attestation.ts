/**
 * Simulator Attestation Provider
 * Structurally equivalent, unverifiable attestation for machines without
 * attestation hardware. Payloads are base64 JSON tagged as mock so the
 * server can refuse them on production (SIMULATOR_NOT_ALLOWED).
 */

import { randomUUID } from "node:crypto";
import {
  ApiError,
  SerialQueue,
  counterBoundHash,
  createLogger,
  toBase64,
  toUtf8,
} from "@attested-chat/shared";

import type { AttestationKeyStore } from "../attestation-key-store.js";
import type { AttestationProvider } from "./provider.js";

const logger = createLogger("client:attest");

export interface SimulatorAttestationPayload {
  keyId: string;
  challenge: string;
  environment: "simulator";
  timestamp: string;
  bundleId: string;
  mockAttestation: true;
}

export interface SimulatorAssertionPayload {
  keyId: string;
  counter: number;
  signature: string;
  environment: "simulator";
  timestamp: string;
  mockAssertion: true;
}

function encodeJson(value: SimulatorAttestationPayload | SimulatorAssertionPayload): string {
  return toBase64(toUtf8(JSON.stringify(value)));
}

export class SimulatorAttestationProvider implements AttestationProvider {
  readonly kind = "simulator" as const;
  private readonly keyQueue = new SerialQueue();

  constructor(
    private readonly keys: AttestationKeyStore,
    private readonly bundleId: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  isSupported(): boolean {
    return true;
  }

  async getKeyId(): Promise<string | null> {
    return this.keys.getKeyId();
  }

  async ensureKeyExists(): Promise<string> {
    return this.keyQueue.run(async () => {
      const existing = await this.keys.getKeyId();
      if (existing) {
        return existing;
      }
      const keyId = `SIM-${randomUUID().toUpperCase()}`;
      await this.keys.setKeyId(keyId);
      logger.info("Generated simulator key", { keyId });
      return keyId;
    });
  }

  async attestKey(challenge: string): Promise<string> {
    const keyId = await this.ensureKeyExists();
    return encodeJson({
      keyId,
      challenge,
      environment: "simulator",
      timestamp: this.now().toISOString(),
      bundleId: this.bundleId || "unknown",
      mockAttestation: true,
    });
  }

  async generateAssertion(body: Uint8Array, counter: number): Promise<string> {
    const keyId = await this.keys.getKeyId();
    if (!keyId) {
      throw new ApiError("ATTESTATION_KEY_MISSING", "No simulator key found");
    }
    return encodeJson({
      keyId,
      counter,
      signature: toBase64(counterBoundHash(body, counter)),
      environment: "simulator",
      timestamp: this.now().toISOString(),
      mockAssertion: true,
    });
  }

  async clearAttestation(): Promise<void> {
    await this.keyQueue.run(() => this.keys.clear());
  }
}
