/**
 * Client Library - Public API
 *
 * Library layer used by the CLI and by embedding applications.
 */

export { ChatClient, DEFAULT_MODEL, CHAT_COMPLETIONS_PATH, MODELS_PATH } from "./chat-client.js";
export type { ChatCompletionRequest, ChatMessage } from "./chat-client.js";

export {
  HttpClient,
  DEFAULT_TIMEOUT_MS,
  CHALLENGE_PATH,
  REGISTER_PATH,
  parseBillingHeaders,
  serializeBody,
} from "./http-client.js";
export type { HttpClientOptions, AttestationStatus } from "./http-client.js";

export { RequestSigner, deriveSigningKey } from "./request-signer.js";
export { ReplayCounter, COUNTER_KEY } from "./replay-counter.js";
export {
  AttestationKeyStore,
  PLATFORM_KEY_ID,
  SIMULATOR_KEY_ID,
} from "./attestation-key-store.js";

export {
  createAttestationProvider,
  PlatformAttestationProvider,
  SimulatorAttestationProvider,
} from "./attestation/index.js";
export type {
  AttestationKind,
  AttestationMode,
  AttestationOptions,
  AttestationProvider,
  PlatformAttestationService,
  SimulatorAssertionPayload,
  SimulatorAttestationPayload,
} from "./attestation/index.js";

export { DeviceRegistration, localDeviceInfo } from "./device-registration.js";
export type {
  DeviceInfo,
  RegistrationState,
  RegistrationTransport,
} from "./device-registration.js";

export { ChunkStream } from "./chunk-stream.js";
export type { ChunkStreamOptions } from "./chunk-stream.js";
export { AsyncChannel } from "./channel.js";
export {
  DONE_SENTINEL,
  SseLineBuffer,
  chunkContent,
  classifySseLine,
  decodeDataPayload,
  parseChatCompletionChunk,
} from "./sse-decoder.js";
export type { ChunkDecoder, SseLine } from "./sse-decoder.js";

export {
  decodeChallenge,
  decodeChatCompletion,
  decodeJson,
  decodeModelList,
  decodeRegistration,
} from "./decoders.js";
export type {
  ChatCompletionChoice,
  ChatCompletionMessage,
  ChatCompletionResponse,
  ResponseDecoder,
} from "./decoders.js";

export {
  PRODUCTION_BASE_URL,
  TEST_BASE_URL,
  normalizeTeamId,
  resolveClientOptions,
  resolveEndpoint,
} from "./config.js";
export type { ClientOptions, Env, PartialClientOptions, ResolvedEndpoint } from "./config.js";

export type { KeyStore } from "./store/interface.js";
export { NodeKeyStore, DEFAULT_STORE_DIR } from "./store/node.js";
export { MemoryKeyStore } from "./store/memory.js";
export { CLIENT_VERSION, defaultUserAgent } from "./version.js";

// Re-export shared error and wire types
export { ApiError, isApiError } from "@attested-chat/shared";
export type {
  ApiResponse,
  AppIdentity,
  BillingInfo,
  ChatCompletionChunk,
  Environment,
  ErrorKind,
  ModelInfo,
} from "@attested-chat/shared";
