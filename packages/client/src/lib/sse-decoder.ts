/**
 * Server-sent event line handling for streamed completions.
 *
 * Lines are split on "\n" after UTF-8 decoding in streaming mode, so a
 * multibyte character split across two reads is reassembled.
 */

import type { ChatCompletionChunk } from "@attested-chat/shared";

export const DONE_SENTINEL = "data: [DONE]";
const DATA_PREFIX = "data: ";

/**
 * Returns the decoded chunk, or undefined to discard the record.
 */
export type ChunkDecoder<T> = (value: unknown) => T | undefined;

export type SseLine =
  | { type: "skip" }
  | { type: "done" }
  | { type: "data"; payload: string };

/**
 * Accumulates bytes and hands back complete lines.
 */
export class SseLineBuffer {
  private readonly decoder = new TextDecoder();
  private pending = "";

  push(bytes: Uint8Array): string[] {
    this.pending += this.decoder.decode(bytes, { stream: true });
    const lines: string[] = [];
    let index = this.pending.indexOf("\n");
    while (index >= 0) {
      lines.push(this.pending.slice(0, index));
      this.pending = this.pending.slice(index + 1);
      index = this.pending.indexOf("\n");
    }
    return lines;
  }

  /**
   * Whatever is left once the body ends without a final newline.
   */
  flush(): string[] {
    this.pending += this.decoder.decode();
    const rest = this.pending;
    this.pending = "";
    return rest.length > 0 ? [rest] : [];
  }
}

export function classifySseLine(raw: string): SseLine {
  const line = raw.trim();
  if (line.length === 0 || line.startsWith(":")) {
    return { type: "skip" };
  }
  if (line === DONE_SENTINEL) {
    return { type: "done" };
  }
  if (line.startsWith(DATA_PREFIX)) {
    return { type: "data", payload: line.slice(DATA_PREFIX.length) };
  }
  return { type: "skip" };
}

/**
 * JSON-parse a data payload and run the chunk decoder. Malformed payloads
 * yield undefined.
 */
export function decodeDataPayload<T>(
  payload: string,
  decode: ChunkDecoder<T>,
): T | undefined {
  let value: unknown;
  try {
    value = JSON.parse(payload);
  } catch {
    return undefined;
  }
  return decode(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Default chunk decoder for chat completion streams. Checks the fields the
 * client relies on; unknown extra fields pass through.
 */
export const parseChatCompletionChunk: ChunkDecoder<ChatCompletionChunk> = (value) => {
  if (!isRecord(value)) return undefined;
  const { id, object, created, model, choices, usage } = value;
  if (
    typeof id !== "string" ||
    typeof object !== "string" ||
    typeof created !== "number" ||
    typeof model !== "string" ||
    !Array.isArray(choices)
  ) {
    return undefined;
  }

  const parsedChoices: ChatCompletionChunk["choices"] = [];
  for (const choice of choices) {
    if (!isRecord(choice) || typeof choice.index !== "number" || !isRecord(choice.delta)) {
      return undefined;
    }
    const delta = choice.delta;
    const finish = choice.finish_reason;
    parsedChoices.push({
      index: choice.index,
      delta: {
        role:
          delta.role === "system" ||
          delta.role === "user" ||
          delta.role === "assistant" ||
          delta.role === "tool"
            ? delta.role
            : undefined,
        content: typeof delta.content === "string" ? delta.content : undefined,
        tool_calls: Array.isArray(delta.tool_calls) ? delta.tool_calls : undefined,
      },
      finish_reason:
        finish === "stop" ||
        finish === "length" ||
        finish === "tool_calls" ||
        finish === "content_filter"
          ? finish
          : null,
    });
  }

  const chunk: ChatCompletionChunk = { id, object, created, model, choices: parsedChoices };
  if (isRecord(usage)) {
    chunk.usage = {
      prompt_tokens: typeof usage.prompt_tokens === "number" ? usage.prompt_tokens : undefined,
      completion_tokens:
        typeof usage.completion_tokens === "number" ? usage.completion_tokens : undefined,
      total_tokens: typeof usage.total_tokens === "number" ? usage.total_tokens : undefined,
    };
  }
  return chunk;
};

/**
 * Content of the first choice's delta, if any.
 */
export function chunkContent(chunk: ChatCompletionChunk): string | undefined {
  return chunk.choices[0]?.delta.content;
}
