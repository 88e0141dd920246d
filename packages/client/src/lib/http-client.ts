/**
 * HTTP Client
 * Signed, optionally attested requests against the chat API
 *
 * Every request carries the bearer credential, the app identity and a fresh
 * HMAC envelope. When an attestation key exists, a counter-bound assertion
 * over the body is attached as well. A DEVICE_NOT_REGISTERED response runs
 * device registration once and re-issues the request exactly once.
 */

import { fetch } from "undici";
import type { Response } from "undici";
import { ReadableStream } from "node:stream/web";
import {
  ApiError,
  SerialQueue,
  classifyErrorResponse,
  createLogger,
  isApiError,
  toUtf8,
} from "@attested-chat/shared";
import type {
  ApiResponse,
  AppIdentity,
  BillingInfo,
  ChallengeResponse,
  ChatCompletionChunk,
  EnvironmentTag,
  HttpMethod,
  RegistrationRequest,
  RegistrationResponse,
} from "@attested-chat/shared";

import type { AttestationKind, AttestationProvider } from "./attestation/provider.js";
import { ChunkStream } from "./chunk-stream.js";
import { decodeChallenge, decodeRegistration } from "./decoders.js";
import type { ResponseDecoder } from "./decoders.js";
import { DeviceRegistration } from "./device-registration.js";
import type {
  DeviceInfo,
  RegistrationState,
  RegistrationTransport,
} from "./device-registration.js";
import { ReplayCounter } from "./replay-counter.js";
import { RequestSigner } from "./request-signer.js";
import { parseChatCompletionChunk } from "./sse-decoder.js";
import type { ChunkDecoder } from "./sse-decoder.js";
import type { KeyStore } from "./store/interface.js";
import { defaultUserAgent } from "./version.js";

const logger = createLogger("client:http");

export const DEFAULT_TIMEOUT_MS = 60_000;
export const CHALLENGE_PATH = "/v1/attestation/challenge";
export const REGISTER_PATH = "/v1/attestation/register";

const EMPTY_BODY = new Uint8Array(0);

export interface HttpClientOptions {
  apiKey: string;
  appIdentity: AppIdentity;
  baseUrl: string;
  environment: EnvironmentTag;
  timeoutMs?: number;
  /** Omit or pass null to send unattested requests. */
  attestation?: AttestationProvider | null;
  /**
   * Holds the replay counter and the registration record. Must be the store
   * the attestation provider keeps its key id in, so a persisted key never
   * restarts its counter.
   */
  keyStore: KeyStore;
  userAgent?: string;
  deviceInfo?: DeviceInfo;
  now?: () => number;
}

export interface AttestationStatus {
  kind: AttestationKind | null;
  keyId: string | null;
  counter: number;
  registration: RegistrationState;
  deviceId: string | null;
}

/**
 * Abort timer for one request. `timedOut` tells a deadline abort apart from
 * any other transport failure.
 */
class Deadline {
  readonly controller = new AbortController();
  private expired = false;
  private readonly timer: ReturnType<typeof setTimeout>;

  constructor(ms: number) {
    this.timer = setTimeout(() => {
      this.expired = true;
      this.controller.abort();
    }, ms);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get timedOut(): boolean {
    return this.expired;
  }

  clear(): void {
    clearTimeout(this.timer);
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * JSON-encode a request body; undefined means no body.
 */
export function serializeBody(body: unknown): Uint8Array | undefined {
  if (body === undefined) {
    return undefined;
  }
  let json: string | undefined;
  try {
    json = JSON.stringify(body);
  } catch (error) {
    throw new ApiError("ENCODING_ERROR", `Failed to encode request: ${errorMessage(error)}`, {
      cause: error,
    });
  }
  if (json === undefined) {
    throw new ApiError("ENCODING_ERROR", "Failed to encode request: body is not JSON");
  }
  return toUtf8(json);
}

function parseCents(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) return undefined;
  const cents = Number(trimmed);
  return Number.isSafeInteger(cents) ? cents : undefined;
}

/**
 * Billing from X-Credits-* headers; null unless all three are present and
 * the amounts are integers.
 */
export function parseBillingHeaders(headers: {
  get(name: string): string | null;
}): BillingInfo | null {
  const used = headers.get("x-credits-used");
  const remaining = headers.get("x-credits-remaining");
  const overage = headers.get("x-credits-overage");
  if (used === null || remaining === null || overage === null) {
    return null;
  }
  const creditsUsedCents = parseCents(used);
  const creditsRemainingCents = parseCents(remaining);
  if (creditsUsedCents === undefined || creditsRemainingCents === undefined) {
    return null;
  }
  const flag = overage.trim().toLowerCase();
  return {
    creditsUsedCents,
    creditsRemainingCents,
    isOverage: flag === "1" || flag === "true",
  };
}

export class HttpClient implements RegistrationTransport {
  private readonly signer: RequestSigner;
  private readonly provider: AttestationProvider | null;
  private readonly counter: ReplayCounter;
  private readonly registration: DeviceRegistration;
  private readonly attestQueue = new SerialQueue();
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(private readonly options: HttpClientOptions) {
    this.signer = new RequestSigner(
      options.apiKey,
      options.appIdentity.bundleId,
      options.now,
    );
    this.provider = options.attestation ?? null;
    this.counter = new ReplayCounter(options.keyStore);
    this.registration = new DeviceRegistration(
      this.provider,
      this,
      options.appIdentity,
      options.deviceInfo,
      options.keyStore,
    );
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.userAgent = options.userAgent ?? defaultUserAgent();
  }

  /**
   * Send a JSON request and decode the 2xx body.
   */
  async send<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    decode: ResponseDecoder<T>,
  ): Promise<ApiResponse<T>> {
    const payload = serializeBody(body);
    return this.withDeviceRegistration(() => this.execute(method, path, payload, decode));
  }

  /**
   * Open a streaming request. Chunks are decoded with the chat completion
   * chunk parser unless a decoder is given.
   */
  sendStreaming(
    method: HttpMethod,
    path: string,
    body: unknown,
  ): Promise<ChunkStream<ChatCompletionChunk>>;
  sendStreaming<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    decodeChunk: ChunkDecoder<T>,
  ): Promise<ChunkStream<T>>;
  async sendStreaming<T>(
    method: HttpMethod,
    path: string,
    body: unknown,
    decodeChunk?: ChunkDecoder<T>,
  ): Promise<ChunkStream<T> | ChunkStream<ChatCompletionChunk>> {
    const payload = serializeBody(body);
    if (decodeChunk === undefined) {
      return this.withDeviceRegistration(() =>
        this.openStream(method, path, payload, parseChatCompletionChunk),
      );
    }
    return this.withDeviceRegistration(() =>
      this.openStream(method, path, payload, decodeChunk),
    );
  }

  /**
   * Register this device now instead of waiting for the server to ask.
   */
  async registerDevice(): Promise<void> {
    await this.guardAttestation(() => this.registration.register());
  }

  /**
   * Drop the local key reference, its counter and any registration record.
   */
  async resetAttestation(): Promise<void> {
    await this.attestQueue.run(async () => {
      if (this.provider) {
        await this.provider.clearAttestation();
      }
      await this.counter.clear();
      await this.registration.reset();
    });
    logger.info("Attestation state cleared");
  }

  getRegistrationState(): RegistrationState {
    return this.registration.getState();
  }

  async getAttestationStatus(): Promise<AttestationStatus> {
    await this.registration.restore();
    return {
      kind: this.provider?.kind ?? null,
      keyId: this.provider ? await this.provider.getKeyId() : null,
      counter: await this.counter.getCounter(),
      registration: this.registration.getState(),
      deviceId: this.registration.getDeviceId(),
    };
  }

  async requestChallenge(bundleId: string): Promise<ChallengeResponse> {
    const response = await this.execute(
      "POST",
      CHALLENGE_PATH,
      serializeBody({ bundleId }),
      decodeChallenge,
    );
    return response.data;
  }

  async submitRegistration(request: RegistrationRequest): Promise<RegistrationResponse> {
    const response = await this.execute(
      "POST",
      REGISTER_PATH,
      serializeBody(request),
      decodeRegistration,
    );
    return response.data;
  }

  private async withDeviceRegistration<R>(operation: () => Promise<R>): Promise<R> {
    try {
      return await this.guardAttestation(operation);
    } catch (error) {
      if (!isApiError(error, "DEVICE_NOT_REGISTERED")) {
        throw error;
      }
      logger.info("Device not registered, registering before retry");
      await this.guardAttestation(() => this.registration.register());
      return this.guardAttestation(operation);
    }
  }

  /**
   * INVALID_ATTESTATION clears local key and counter before propagating.
   */
  private async guardAttestation<R>(operation: () => Promise<R>): Promise<R> {
    try {
      return await operation();
    } catch (error) {
      if (isApiError(error, "INVALID_ATTESTATION")) {
        logger.warn("Server rejected attestation, clearing local state");
        try {
          await this.resetAttestation();
        } catch (clearError) {
          logger.error(
            "Failed to clear attestation state",
            clearError instanceof Error ? clearError : new Error(String(clearError)),
          );
        }
      }
      throw error;
    }
  }

  private async execute<T>(
    method: HttpMethod,
    path: string,
    payload: Uint8Array | undefined,
    decode: ResponseDecoder<T>,
  ): Promise<ApiResponse<T>> {
    const headers = await this.buildHeaders(payload, "application/json");
    const url = this.url(path);
    logger.debug("Sending request", { operation: "send", method, path });

    const deadline = new Deadline(this.timeoutMs);
    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: deadline.signal,
      });
      text = await response.text();
    } catch (error) {
      throw this.transportError(error, deadline);
    } finally {
      deadline.clear();
    }

    if (!response.ok) {
      throw this.errorFromResponse(response, text);
    }

    logger.debug("Request succeeded", { method, path, status: response.status });
    return {
      data: this.decodeBody(text, decode),
      status: response.status,
      billing: parseBillingHeaders(response.headers),
    };
  }

  private async openStream<T>(
    method: HttpMethod,
    path: string,
    payload: Uint8Array | undefined,
    decode: ChunkDecoder<T>,
  ): Promise<ChunkStream<T>> {
    const headers = await this.buildHeaders(payload, "text/event-stream");
    const url = this.url(path);
    logger.debug("Opening stream", { operation: "stream", method, path });

    // Headers may take a while on long generations.
    const deadline = new Deadline(this.timeoutMs * 2);
    let response: Response;
    try {
      response = await fetch(url, {
        method,
        headers,
        body: payload,
        signal: deadline.signal,
      });
      if (!response.ok) {
        const text = await response.text();
        throw this.errorFromResponse(response, text);
      }
    } catch (error) {
      throw this.transportError(error, deadline);
    } finally {
      deadline.clear();
    }

    const body =
      response.body ??
      new ReadableStream<Uint8Array>({
        start(controller) {
          controller.close();
        },
      });
    return new ChunkStream({
      body,
      decode,
      abort: () => deadline.controller.abort(),
    });
  }

  private async buildHeaders(
    payload: Uint8Array | undefined,
    accept: string,
  ): Promise<Record<string, string>> {
    const { apiKey, appIdentity, environment } = this.options;
    const headers: Record<string, string> = {
      Accept: accept,
      Authorization: `Bearer ${apiKey}`,
      "X-Bundle-Id": appIdentity.bundleId,
      "User-Agent": this.userAgent,
      "X-Environment": environment,
    };
    if (payload !== undefined) {
      headers["Content-Type"] = "application/json";
    }
    if (appIdentity.teamId) {
      headers["X-Team-Id"] = appIdentity.teamId;
    }

    const envelope = this.signer.sign(payload);
    headers["X-Timestamp"] = String(envelope.timestamp);
    headers["X-Nonce"] = envelope.nonce;
    headers["X-Signature"] = envelope.signature;

    return { ...headers, ...(await this.attestationHeaders(payload ?? EMPTY_BODY)) };
  }

  /**
   * Best effort: a request without attestation headers still goes out, and
   * the server decides whether it needs them.
   */
  private async attestationHeaders(body: Uint8Array): Promise<Record<string, string>> {
    const provider = this.provider;
    if (!provider) {
      return {};
    }
    try {
      return await this.attestQueue.run(async (): Promise<Record<string, string>> => {
        const keyId = await provider.getKeyId();
        if (!keyId) {
          logger.debug("No attestation key yet, sending without assertion");
          return {};
        }
        const counter = await this.counter.incrementCounter();
        const assertion = await provider.generateAssertion(body, counter);
        return {
          "X-Attest-Key-Id": keyId,
          "X-Attest-Assertion": assertion,
          "X-Attest-Counter": String(counter),
        };
      });
    } catch (error) {
      logger.warn("Attestation failed, sending without assertion", {
        kind: provider.kind,
        error: errorMessage(error),
      });
      return {};
    }
  }

  private decodeBody<T>(text: string, decode: ResponseDecoder<T>): T {
    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (error) {
      throw new ApiError("DECODING_ERROR", `Failed to decode response: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    try {
      return decode(value);
    } catch (error) {
      if (isApiError(error)) {
        throw error;
      }
      throw new ApiError("DECODING_ERROR", `Failed to decode response: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private errorFromResponse(response: Response, text: string): ApiError {
    const error = classifyErrorResponse({
      status: response.status,
      body: text,
      retryAfter: response.headers.get("retry-after"),
    });
    logger.debug("Request failed", {
      status: response.status,
      kind: error.kind,
      serverCode: error.serverCode,
    });
    return error;
  }

  private transportError(error: unknown, deadline: Deadline): ApiError {
    if (isApiError(error)) {
      return error;
    }
    if (deadline.timedOut) {
      return new ApiError("TIMEOUT", undefined, { cause: error });
    }
    return new ApiError("NETWORK_ERROR", `Network error: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  private url(path: string): string {
    return `${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`;
  }
}
