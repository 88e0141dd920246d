import { describe, it, expect, beforeEach, vi } from "vitest";

interface FetchInit {
  method: string;
  headers: Record<string, string>;
  body?: Uint8Array;
}

const { mockFetch } = vi.hoisted(() => ({
  mockFetch: vi.fn<[string, FetchInit], Promise<Response>>(),
}));

vi.mock("undici", () => ({
  fetch: mockFetch,
}));

import { ChatClient, DEFAULT_MODEL } from "../src/lib/chat-client.js";
import { MemoryKeyStore } from "../src/lib/store/memory.js";
import { bodyFrom, jsonResponse, sseResponse } from "./helpers.js";

function sentJson(index: number): unknown {
  const call = mockFetch.mock.calls[index];
  return JSON.parse(new TextDecoder().decode(call?.[1].body));
}

function makeClient(): ChatClient {
  return new ChatClient({
    apiKey: "test-secret",
    appIdentity: { bundleId: "com.example.notes" },
    environment: { baseUrl: "http://localhost:8787" },
    attestation: { mode: "none" },
    keyStore: new MemoryKeyStore(),
  });
}

describe("ChatClient", () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it("applies the default model and decodes the completion", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(200, {
        id: "chatcmpl-1",
        model: DEFAULT_MODEL,
        choices: [{ index: 0, message: { role: "assistant", content: "Hi!" }, finish_reason: "stop" }],
      }),
    );

    const response = await makeClient().chatCompletion({
      messages: [{ role: "user", content: "Hello" }],
      temperature: 0.2,
    });

    expect(mockFetch.mock.calls[0]?.[0]).toBe("http://localhost:8787/v1/chat/completions");
    expect(sentJson(0)).toEqual({
      messages: [{ role: "user", content: "Hello" }],
      temperature: 0.2,
      model: "google/gemini-2.5-flash",
      stream: false,
    });
    expect(response.data.choices[0]?.message).toEqual({ role: "assistant", content: "Hi!" });
    expect(response.data.choices[0]?.finish_reason).toBe("stop");
  });

  it("forces stream: true for streaming completions", async () => {
    mockFetch.mockResolvedValueOnce(sseResponse(bodyFrom(["data: [DONE]\n"])));

    const stream = await makeClient().chatCompletionStream({
      model: "custom/model",
      messages: [{ role: "user", content: "Hello" }],
      stream: false,
    });
    const chunks: unknown[] = [];
    for await (const chunk of stream) {
      chunks.push(chunk);
    }
    expect(chunks).toEqual([]);

    expect(sentJson(0)).toEqual({
      model: "custom/model",
      messages: [{ role: "user", content: "Hello" }],
      stream: true,
    });
  });

  it("lists models", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse(200, {
        object: "list",
        data: [{ id: "google/gemini-2.5-flash", object: "model", created: 1, owned_by: "google" }],
      }),
    );
    expect(await makeClient().listModels()).toEqual([
      { id: "google/gemini-2.5-flash", object: "model", created: 1, owned_by: "google" },
    ]);
    expect(mockFetch.mock.calls[0]?.[1].method).toBe("GET");
  });

  it("reports attestation status without a provider", async () => {
    expect(await makeClient().attestationStatus()).toEqual({
      kind: null,
      keyId: null,
      counter: 0,
      registration: "unregistered",
      deviceId: null,
    });
  });
});
