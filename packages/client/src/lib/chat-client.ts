/**
 * Chat Client - Core Library
 * Wires configuration, key storage and attestation into an HttpClient
 *
 * Usage:
 * ```typescript
 * const client = new ChatClient({
 *   apiKey: process.env.ATTESTED_CHAT_API_KEY ?? "",
 *   appIdentity: { bundleId: "com.example.notes" },
 * });
 *
 * const stream = await client.chatCompletionStream({
 *   messages: [{ role: "user", content: "Hello" }],
 * });
 * for await (const chunk of stream) {
 *   process.stdout.write(chunkContent(chunk) ?? "");
 * }
 * ```
 */

import { setGlobalLogLevel } from "@attested-chat/shared";
import type { ApiResponse, ChatCompletionChunk, ChatRole, ModelInfo } from "@attested-chat/shared";

import { createAttestationProvider } from "./attestation/index.js";
import type { AttestationProvider } from "./attestation/index.js";
import type { ChunkStream } from "./chunk-stream.js";
import { resolveEndpoint } from "./config.js";
import type { ClientOptions } from "./config.js";
import { decodeChatCompletion, decodeModelList } from "./decoders.js";
import type { ChatCompletionResponse } from "./decoders.js";
import { HttpClient } from "./http-client.js";
import type { AttestationStatus } from "./http-client.js";
import { NodeKeyStore } from "./store/node.js";

export const DEFAULT_MODEL = "google/gemini-2.5-flash";
export const CHAT_COMPLETIONS_PATH = "/v1/chat/completions";
export const MODELS_PATH = "/v1/models";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/**
 * Only `messages` is interpreted here; other fields go to the server as-is.
 */
export interface ChatCompletionRequest {
  model?: string;
  messages: ChatMessage[];
  stream?: boolean;
  [field: string]: unknown;
}

export class ChatClient {
  readonly http: HttpClient;
  readonly attestation: AttestationProvider | null;

  constructor(options: ClientOptions) {
    if (options.logLevel) {
      setGlobalLogLevel(options.logLevel);
    }
    const store = options.keyStore ?? new NodeKeyStore();
    const endpoint = resolveEndpoint(options.environment);
    this.attestation = createAttestationProvider(
      options.attestation ?? {},
      store,
      options.appIdentity.bundleId,
    );
    this.http = new HttpClient({
      apiKey: options.apiKey,
      appIdentity: options.appIdentity,
      baseUrl: endpoint.baseUrl,
      environment: endpoint.tag,
      timeoutMs: options.timeoutMs,
      attestation: this.attestation,
      keyStore: store,
      userAgent: options.userAgent,
    });
  }

  async chatCompletion(
    request: ChatCompletionRequest,
  ): Promise<ApiResponse<ChatCompletionResponse>> {
    return this.http.send(
      "POST",
      CHAT_COMPLETIONS_PATH,
      { ...request, model: request.model ?? DEFAULT_MODEL, stream: false },
      decodeChatCompletion,
    );
  }

  async chatCompletionStream(
    request: ChatCompletionRequest,
  ): Promise<ChunkStream<ChatCompletionChunk>> {
    return this.http.sendStreaming("POST", CHAT_COMPLETIONS_PATH, {
      ...request,
      model: request.model ?? DEFAULT_MODEL,
      stream: true,
    });
  }

  async listModels(): Promise<ModelInfo[]> {
    const response = await this.http.send("GET", MODELS_PATH, undefined, decodeModelList);
    return response.data;
  }

  async registerDevice(): Promise<void> {
    await this.http.registerDevice();
  }

  async resetAttestation(): Promise<void> {
    await this.http.resetAttestation();
  }

  async attestationStatus(): Promise<AttestationStatus> {
    return this.http.getAttestationStatus();
  }
}
