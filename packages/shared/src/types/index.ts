/**
 * Shared type definitions for attested-chat
 */

/**
 * Calling application's identity, bound into every request signature.
 * bundleId is compared case-insensitively by the server.
 */
export interface AppIdentity {
  bundleId: string;
  teamId?: string;
}

/**
 * Output of one request signature.
 */
export interface SignedEnvelope {
  timestamp: number;
  nonce: string;
  signature: string;
}

export type EnvironmentTag = "production" | "test";

export type Environment =
  | EnvironmentTag
  | { baseUrl: string; tag?: EnvironmentTag };

/**
 * Billing information from X-Credits-* response headers
 */
export interface BillingInfo {
  creditsUsedCents: number;
  creditsRemainingCents: number;
  isOverage: boolean;
}

export interface ApiResponse<T> {
  data: T;
  status: number;
  billing: BillingInfo | null;
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * Streaming types
 */
export type ChatRole = "system" | "user" | "assistant" | "tool";

export type FinishReason = "stop" | "length" | "tool_calls" | "content_filter";

export interface ChatCompletionDelta {
  role?: ChatRole;
  content?: string;
  tool_calls?: unknown[];
}

export interface ChatCompletionChunkChoice {
  index: number;
  delta: ChatCompletionDelta;
  finish_reason?: FinishReason | null;
}

export interface ChatCompletionUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

export interface ChatCompletionChunk {
  id: string;
  object: string;
  created: number;
  model: string;
  choices: ChatCompletionChunkChoice[];
  usage?: ChatCompletionUsage | null;
}

export interface ModelInfo {
  id: string;
  object: string;
  created: number;
  owned_by: string;
}

/**
 * Device registration wire types
 */
export interface ChallengeResponse {
  challenge: string;
}

export interface RegistrationRequest {
  keyId: string;
  attestationObject: string;
  bundleId: string;
  teamId: string | null;
  deviceModel: string;
  osVersion: string;
}

export interface RegistrationResponse {
  success: boolean;
  deviceId: string;
}
