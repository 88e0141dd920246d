import { describe, it, expect } from "vitest";

import {
  SseLineBuffer,
  chunkContent,
  classifySseLine,
  decodeDataPayload,
  parseChatCompletionChunk,
} from "../src/lib/sse-decoder.js";

const encoder = new TextEncoder();

describe("SseLineBuffer", () => {
  it("returns complete lines and keeps the remainder", () => {
    const buffer = new SseLineBuffer();
    expect(buffer.push(encoder.encode("data: a\nda"))).toEqual(["data: a"]);
    expect(buffer.push(encoder.encode("ta: b\n\n"))).toEqual(["data: b", ""]);
    expect(buffer.flush()).toEqual([]);
  });

  it("reassembles a multibyte character split across reads", () => {
    const buffer = new SseLineBuffer();
    const bytes = encoder.encode("data: é\n");
    const split = bytes.indexOf(0xc3) + 1;
    expect(buffer.push(bytes.slice(0, split))).toEqual([]);
    expect(buffer.push(bytes.slice(split))).toEqual(["data: é"]);
  });

  it("flushes an unterminated last line", () => {
    const buffer = new SseLineBuffer();
    buffer.push(encoder.encode("data: tail"));
    expect(buffer.flush()).toEqual(["data: tail"]);
  });
});

describe("classifySseLine", () => {
  it.each([
    ["", { type: "skip" }],
    ["   ", { type: "skip" }],
    [": keep-alive", { type: "skip" }],
    ["event: message", { type: "skip" }],
    ["data: [DONE]", { type: "done" }],
    ["data: [DONE]\r", { type: "done" }],
    ['  data: {"a":1}\r', { type: "data", payload: '{"a":1}' }],
  ])("classifies %j", (line, expected) => {
    expect(classifySseLine(line)).toEqual(expected);
  });
});

describe("decodeDataPayload", () => {
  it("discards payloads that are not JSON", () => {
    expect(decodeDataPayload("{not json", (value) => value)).toBeUndefined();
  });

  it("passes parsed JSON to the decoder", () => {
    expect(decodeDataPayload('{"n":2}', (value) => value)).toEqual({ n: 2 });
  });
});

describe("parseChatCompletionChunk", () => {
  const chunk = {
    id: "chatcmpl-1",
    object: "chat.completion.chunk",
    created: 1700000000,
    model: "google/gemini-2.5-flash",
    choices: [{ index: 0, delta: { role: "assistant", content: "Hel" }, finish_reason: null }],
  };

  it("accepts a well-formed chunk", () => {
    const parsed = parseChatCompletionChunk(chunk);
    expect(parsed).toEqual({
      id: "chatcmpl-1",
      object: "chat.completion.chunk",
      created: 1700000000,
      model: "google/gemini-2.5-flash",
      choices: [{ index: 0, delta: { role: "assistant", content: "Hel" }, finish_reason: null }],
    });
    expect(parsed && chunkContent(parsed)).toBe("Hel");
  });

  it("normalizes unknown roles and finish reasons", () => {
    const parsed = parseChatCompletionChunk({
      ...chunk,
      choices: [{ index: 0, delta: { role: "robot" }, finish_reason: "exploded" }],
    });
    expect(parsed?.choices[0]?.delta.role).toBeUndefined();
    expect(parsed?.choices[0]?.finish_reason).toBeNull();
  });

  it("keeps usage when present", () => {
    const parsed = parseChatCompletionChunk({
      ...chunk,
      choices: [],
      usage: { prompt_tokens: 3, completion_tokens: 5, total_tokens: 8 },
    });
    expect(parsed?.usage).toEqual({ prompt_tokens: 3, completion_tokens: 5, total_tokens: 8 });
  });

  it("rejects records missing required fields", () => {
    expect(parseChatCompletionChunk({ ...chunk, id: 7 })).toBeUndefined();
    expect(parseChatCompletionChunk({ ...chunk, choices: [{ index: 0 }] })).toBeUndefined();
    expect(parseChatCompletionChunk("chunk")).toBeUndefined();
    expect(parseChatCompletionChunk(null)).toBeUndefined();
  });
});
