import { ReadableStream } from "node:stream/web";
import { toHex, toUtf8 } from "@attested-chat/shared";

import type { PlatformAttestationService } from "../src/lib/attestation/platform-attestation.js";

/**
 * In-process attestation service. Attestations and assertions are readable
 * strings so tests can check what was hashed.
 */
export class FakeAttestationService implements PlatformAttestationService {
  supported = true;
  generated = 0;
  failNextAssertion: Error | null = null;
  readonly attested: Array<{ keyId: string; hash: string }> = [];
  readonly asserted: Array<{ keyId: string; hash: string }> = [];

  isSupported(): boolean {
    return this.supported;
  }

  async generateKey(): Promise<string> {
    this.generated += 1;
    await new Promise((resolve) => setTimeout(resolve, 1));
    return `hw-key-${this.generated}`;
  }

  async attestKey(keyId: string, clientDataHash: Uint8Array): Promise<Uint8Array> {
    this.attested.push({ keyId, hash: toHex(clientDataHash) });
    return toUtf8(`attestation:${keyId}`);
  }

  async generateAssertion(keyId: string, clientDataHash: Uint8Array): Promise<Uint8Array> {
    if (this.failNextAssertion) {
      const error = this.failNextAssertion;
      this.failNextAssertion = null;
      throw error;
    }
    this.asserted.push({ keyId, hash: toHex(clientDataHash) });
    return toUtf8(`assertion:${keyId}`);
  }
}

/**
 * Readable body that yields the given pieces, then closes or errors.
 */
export function bodyFrom(
  pieces: Array<string | Uint8Array>,
  end: { error?: Error } = {},
): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();
  let index = 0;
  return new ReadableStream<Uint8Array>({
    pull(controller) {
      const piece = pieces[index];
      index += 1;
      if (piece !== undefined) {
        controller.enqueue(typeof piece === "string" ? encoder.encode(piece) : piece);
        return;
      }
      if (end.error) {
        controller.error(end.error);
      } else {
        controller.close();
      }
    },
  });
}

export function jsonResponse(
  status: number,
  body: unknown,
  headers: Record<string, string> = {},
): Response {
  return new Response(typeof body === "string" ? body : JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json", ...headers },
  });
}

export function errorResponse(
  status: number,
  code: string,
  message = "rejected",
  headers: Record<string, string> = {},
): Response {
  return jsonResponse(status, { error: { message, type: "api_error", code } }, headers);
}

export function sseResponse(body: ReadableStream<Uint8Array>): Response {
  return new Response(body, {
    status: 200,
    headers: { "Content-Type": "text/event-stream" },
  });
}
