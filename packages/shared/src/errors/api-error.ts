/**
 * Error taxonomy shared by the signer, attestation providers and HTTP client.
 *
 * Every failure the client surfaces is an ApiError carrying a closed `kind`
 * plus whatever metadata the server or transport gave us (HTTP status,
 * Retry-After seconds, server error code, underlying cause).
 */

export const ERROR_GROUPS = {
  transport: ["TIMEOUT", "NETWORK_ERROR", "STREAM_INTERRUPTED"],
  serialization: ["ENCODING_ERROR", "DECODING_ERROR"],
  identity: ["INVALID_CREDENTIAL", "INVALID_APP_IDENTITY", "INVALID_TEAM_IDENTITY"],
  replay: ["TIMESTAMP_EXPIRED", "NONCE_REUSED", "INVALID_SIGNATURE"],
  attestation: [
    "ATTESTATION_REQUIRED",
    "DEVICE_NOT_REGISTERED",
    "INVALID_ATTESTATION",
    "ATTESTATION_REVOKED",
    "ATTESTATION_NOT_SUPPORTED",
    "SIMULATOR_NOT_ALLOWED",
    "ATTESTATION_FAILED",
    "ATTESTATION_KEY_MISSING",
  ],
  quota: ["RATE_LIMITED", "QUOTA_EXCEEDED", "INSUFFICIENT_BALANCE"],
  generic: ["MALFORMED_REQUEST", "SERVER_ERROR", "HTTP_ERROR", "UNKNOWN"],
} as const;

export type ErrorGroup = keyof typeof ERROR_GROUPS;
export type ErrorKind = (typeof ERROR_GROUPS)[ErrorGroup][number];

const DEFAULT_MESSAGES: Record<ErrorKind, string> = {
  TIMEOUT: "Request timed out",
  NETWORK_ERROR: "Network request failed",
  STREAM_INTERRUPTED: "Stream was interrupted",
  ENCODING_ERROR: "Failed to encode request body",
  DECODING_ERROR: "Failed to decode response body",
  INVALID_CREDENTIAL: "Invalid or missing API key",
  INVALID_APP_IDENTITY: "Invalid bundle id for this project",
  INVALID_TEAM_IDENTITY: "Invalid team id for this project",
  TIMESTAMP_EXPIRED: "Request timestamp is outside the accepted window",
  NONCE_REUSED: "Request nonce has already been used",
  INVALID_SIGNATURE: "Invalid request signature",
  ATTESTATION_REQUIRED: "Device attestation is required for API access",
  DEVICE_NOT_REGISTERED: "Device is not registered",
  INVALID_ATTESTATION: "Device attestation is invalid or failed verification",
  ATTESTATION_REVOKED: "Device attestation has been revoked",
  ATTESTATION_NOT_SUPPORTED: "Attestation is not supported on this device",
  SIMULATOR_NOT_ALLOWED: "Simulator attestation is not allowed on the production API",
  ATTESTATION_FAILED: "Attestation operation failed",
  ATTESTATION_KEY_MISSING: "No attestation key found; attest a key first",
  RATE_LIMITED: "Rate limit exceeded",
  QUOTA_EXCEEDED: "Monthly quota exceeded",
  INSUFFICIENT_BALANCE: "Insufficient credits",
  MALFORMED_REQUEST: "Invalid request",
  SERVER_ERROR: "Server error",
  HTTP_ERROR: "HTTP error",
  UNKNOWN: "Unknown error",
};

const SERVER_CODES: Record<string, ErrorKind> = {
  rate_limit_exceeded: "RATE_LIMITED",
  quota_exceeded: "QUOTA_EXCEEDED",
  insufficient_credits: "INSUFFICIENT_BALANCE",
  invalid_api_key: "INVALID_CREDENTIAL",
  missing_api_key: "INVALID_CREDENTIAL",
  invalid_signature: "INVALID_SIGNATURE",
  missing_signature_headers: "INVALID_SIGNATURE",
  timestamp_expired: "TIMESTAMP_EXPIRED",
  invalid_timestamp: "TIMESTAMP_EXPIRED",
  nonce_reused: "NONCE_REUSED",
  invalid_bundle_id: "INVALID_APP_IDENTITY",
  invalid_team_id: "INVALID_TEAM_IDENTITY",
  attestation_required: "ATTESTATION_REQUIRED",
  device_not_registered: "DEVICE_NOT_REGISTERED",
  invalid_attestation: "INVALID_ATTESTATION",
  attestation_revoked: "ATTESTATION_REVOKED",
  simulator_not_allowed: "SIMULATOR_NOT_ALLOWED",
};

export interface ApiErrorDetails {
  status?: number;
  retryAfter?: number;
  serverCode?: string;
  cause?: unknown;
}

export class ApiError extends Error {
  readonly kind: ErrorKind;
  readonly group: ErrorGroup;
  readonly status?: number;
  readonly retryAfter?: number;
  readonly serverCode?: string;

  constructor(kind: ErrorKind, message?: string, details: ApiErrorDetails = {}) {
    super(message ?? DEFAULT_MESSAGES[kind], { cause: details.cause });
    this.name = "ApiError";
    this.kind = kind;
    this.group = groupOf(kind);
    this.status = details.status;
    this.retryAfter = details.retryAfter;
    this.serverCode = details.serverCode;
  }
}

const GROUP_NAMES: readonly ErrorGroup[] = [
  "transport",
  "serialization",
  "identity",
  "replay",
  "attestation",
  "quota",
  "generic",
];

const KIND_GROUPS = new Map<ErrorKind, ErrorGroup>();
for (const group of GROUP_NAMES) {
  for (const kind of ERROR_GROUPS[group]) {
    KIND_GROUPS.set(kind, group);
  }
}

export function groupOf(kind: ErrorKind): ErrorGroup {
  return KIND_GROUPS.get(kind) ?? "generic";
}

export function isApiError(value: unknown, kind?: ErrorKind): value is ApiError {
  return value instanceof ApiError && (kind === undefined || value.kind === kind);
}

export function defaultMessage(kind: ErrorKind): string {
  return DEFAULT_MESSAGES[kind];
}

/**
 * Map a server `error.code` string to a kind; undefined when unrecognized.
 */
export function kindForServerCode(code: string | undefined): ErrorKind | undefined {
  if (code === undefined || !Object.prototype.hasOwnProperty.call(SERVER_CODES, code)) {
    return undefined;
  }
  return SERVER_CODES[code];
}

/**
 * Parse a Retry-After header as whole seconds. HTTP-date and anything else
 * that is not a non-negative integer yields undefined.
 */
export function parseRetryAfter(value: string | null | undefined): number | undefined {
  if (value === null || value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return undefined;
  const seconds = Number(trimmed);
  return Number.isSafeInteger(seconds) ? seconds : undefined;
}

export interface ServerErrorBody {
  message?: string;
  type?: string;
  code?: string;
}

/**
 * Extract `{ error: { message?, type?, code? } }` from a raw body. Returns null
 * when the body is not JSON or has no error object.
 */
export function parseServerErrorBody(text: string): ServerErrorBody | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed !== "object" || parsed === null || !("error" in parsed)) {
    return null;
  }
  const detail: unknown = parsed.error;
  if (typeof detail !== "object" || detail === null) {
    return null;
  }
  const body: ServerErrorBody = {};
  if ("message" in detail && typeof detail.message === "string") body.message = detail.message;
  if ("type" in detail && typeof detail.type === "string") body.type = detail.type;
  if ("code" in detail && typeof detail.code === "string") body.code = detail.code;
  return body;
}

function rateLimitMessage(retryAfter: number | undefined): string {
  return retryAfter === undefined
    ? DEFAULT_MESSAGES.RATE_LIMITED
    : `${DEFAULT_MESSAGES.RATE_LIMITED}. Retry after ${retryAfter} seconds`;
}

export interface ErrorResponseInput {
  status: number;
  body: string;
  retryAfter?: string | null;
}

/**
 * Classify a non-2xx response. A recognized server code wins; otherwise the
 * status code decides.
 */
export function classifyErrorResponse(input: ErrorResponseInput): ApiError {
  const { status, body } = input;
  const retryAfter = parseRetryAfter(input.retryAfter);
  const structured = parseServerErrorBody(body);
  const message =
    structured?.message ?? (body.trim().length > 0 ? body : "Unknown error");
  const serverCode = structured?.code;

  const kind = kindForServerCode(serverCode);
  if (kind !== undefined) {
    return new ApiError(kind, kind === "RATE_LIMITED" ? rateLimitMessage(retryAfter) : message, {
      status,
      serverCode,
      retryAfter: kind === "RATE_LIMITED" ? retryAfter : undefined,
    });
  }

  if (status === 401) {
    return new ApiError("INVALID_CREDENTIAL", undefined, { status, serverCode });
  }
  if (status === 429) {
    return new ApiError("RATE_LIMITED", rateLimitMessage(retryAfter), {
      status,
      serverCode,
      retryAfter,
    });
  }
  if (status === 400) {
    return new ApiError("MALFORMED_REQUEST", `Invalid request: ${message}`, {
      status,
      serverCode,
    });
  }
  if (status >= 500 && status <= 599) {
    return new ApiError("SERVER_ERROR", `Server error: ${message}`, { status, serverCode });
  }
  return new ApiError("HTTP_ERROR", `HTTP error ${status}: ${message}`, {
    status,
    serverCode,
  });
}
