/**
 * Platform Attestation Provider
 * Hardware-backed attestation through a PlatformAttestationService binding
 * (secure enclave, TPM). Challenge and request data are hashed here; the
 * service only ever signs 32-byte client data hashes.
 */

import {
  ApiError,
  SerialQueue,
  counterBoundHash,
  createLogger,
  fromBase64,
  isApiError,
  isBase64,
  sha256,
  toBase64,
} from "@attested-chat/shared";

import type { AttestationKeyStore } from "../attestation-key-store.js";
import type { AttestationProvider } from "./provider.js";

const logger = createLogger("client:attest");

/**
 * Native binding to the device's attestation service.
 */
export interface PlatformAttestationService {
  isSupported(): boolean;
  generateKey(): Promise<string>;
  attestKey(keyId: string, clientDataHash: Uint8Array): Promise<Uint8Array>;
  generateAssertion(keyId: string, clientDataHash: Uint8Array): Promise<Uint8Array>;
}

function wrapServiceError(operation: string, error: unknown): ApiError {
  if (isApiError(error)) {
    return error;
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new ApiError("ATTESTATION_FAILED", `${operation} failed: ${reason}`, {
    cause: error,
  });
}

export class PlatformAttestationProvider implements AttestationProvider {
  readonly kind = "platform" as const;
  private readonly keyQueue = new SerialQueue();

  constructor(
    private readonly service: PlatformAttestationService,
    private readonly keys: AttestationKeyStore,
  ) {}

  isSupported(): boolean {
    return this.service.isSupported();
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
      if (!this.service.isSupported()) {
        throw new ApiError("ATTESTATION_NOT_SUPPORTED");
      }

      let keyId: string;
      try {
        keyId = await this.service.generateKey();
      } catch (error) {
        throw wrapServiceError("Key generation", error);
      }
      await this.keys.setKeyId(keyId);
      logger.info("Generated attestation key", { keyId });
      return keyId;
    });
  }

  async attestKey(challenge: string): Promise<string> {
    if (!isBase64(challenge)) {
      throw new ApiError("ATTESTATION_FAILED", "Invalid base64 challenge");
    }
    const keyId = await this.ensureKeyExists();
    const clientDataHash = sha256(fromBase64(challenge));

    try {
      const attestation = await this.service.attestKey(keyId, clientDataHash);
      return toBase64(attestation);
    } catch (error) {
      throw wrapServiceError("Key attestation", error);
    }
  }

  async generateAssertion(body: Uint8Array, counter: number): Promise<string> {
    const keyId = await this.keys.getKeyId();
    if (!keyId) {
      throw new ApiError("ATTESTATION_KEY_MISSING");
    }
    const clientDataHash = counterBoundHash(body, counter);

    try {
      const assertion = await this.service.generateAssertion(keyId, clientDataHash);
      return toBase64(assertion);
    } catch (error) {
      throw wrapServiceError("Assertion generation", error);
    }
  }

  async clearAttestation(): Promise<void> {
    await this.keyQueue.run(() => this.keys.clear());
    logger.info("Cleared attestation key reference");
  }
}
