/**
 * Request Signer
 * HMAC-SHA256 request signatures bound to the API key and the app's bundle id
 *
 * 1. signingKey = SHA256(apiKey + lowercase(bundleId))
 * 2. bodyHash   = hex(SHA256(body)), empty body when absent
 * 3. message    = `${timestamp}\n${nonce}\n${bodyHash}`
 * 4. signature  = base64(HMAC-SHA256(signingKey, message))
 *
 * The server recomputes the same value, so an intercepted key cannot be used
 * from another app and a captured request cannot be replayed.
 */

import { randomUUID } from "node:crypto";
import {
  hmacSha256,
  sha256,
  toBase64,
  toHex,
  toUtf8,
} from "@attested-chat/shared";
import type { SignedEnvelope } from "@attested-chat/shared";

const EMPTY_BODY = new Uint8Array(0);

export function deriveSigningKey(apiKey: string, bundleId: string): Uint8Array {
  return sha256(toUtf8(apiKey + bundleId.toLowerCase()));
}

export class RequestSigner {
  constructor(
    private readonly apiKey: string,
    private readonly bundleId: string,
    private readonly now: () => number = Date.now,
  ) {}

  /**
   * Sign a request body with the current time and a fresh nonce.
   */
  sign(body?: Uint8Array): SignedEnvelope {
    const timestamp = Math.floor(this.now() / 1000);
    const nonce = randomUUID();
    return {
      timestamp,
      nonce,
      signature: this.computeSignature(timestamp, nonce, body),
    };
  }

  /**
   * Deterministic signature over (timestamp, nonce, body).
   */
  computeSignature(timestamp: number, nonce: string, body?: Uint8Array): string {
    const signingKey = deriveSigningKey(this.apiKey, this.bundleId);
    const bodyHash = toHex(sha256(body ?? EMPTY_BODY));
    const message = `${timestamp}\n${nonce}\n${bodyHash}`;
    return toBase64(hmacSha256(signingKey, toUtf8(message)));
  }
}
