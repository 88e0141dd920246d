/**
 * Encoding and hashing helpers (shared)
 *
 * Purpose:
 * - Centralize base64/UTF-8/hex conversions
 * - Provide the SHA-256 and HMAC primitives used by request signing and attestation
 * - Encode replay counters the same way on every code path
 */

import { createHash, createHmac } from "node:crypto";

export function toBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("base64");
}

export function fromBase64(base64: string): Uint8Array {
  return new Uint8Array(Buffer.from(base64, "base64"));
}

/**
 * Strict base64 check: standard alphabet, correct padding, non-empty.
 * Buffer.from() silently drops invalid characters, so callers that must reject
 * garbage check here first.
 */
export function isBase64(value: string): boolean {
  return (
    value.length > 0 &&
    value.length % 4 === 0 &&
    /^[A-Za-z0-9+/]+={0,2}$/.test(value)
  );
}

export function toUtf8(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function fromUtf8(bytes: Uint8Array): string {
  return new TextDecoder().decode(bytes);
}

export function toHex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

export function sha256(data: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha256").update(data).digest());
}

export function hmacSha256(key: Uint8Array, message: Uint8Array): Uint8Array {
  return new Uint8Array(createHmac("sha256", key).update(message).digest());
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * 8-byte big-endian encoding of a non-negative integer counter.
 */
export function bigEndianUint64(value: number): Uint8Array {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RangeError(`Counter must be a non-negative safe integer, got ${value}`);
  }
  const out = new Uint8Array(8);
  new DataView(out.buffer).setBigUint64(0, BigInt(value), false);
  return out;
}

/**
 * SHA256(data ++ bigEndian64(counter)): the client data hash bound into an assertion.
 */
export function counterBoundHash(data: Uint8Array, counter: number): Uint8Array {
  return sha256(concatBytes(data, bigEndianUint64(counter)));
}
