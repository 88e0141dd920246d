/**
 * Client configuration
 * Explicit options win; anything left out is read from ATTESTED_CHAT_* variables.
 */

import { isLogLevel } from "@attested-chat/shared";
import type {
  AppIdentity,
  Environment,
  EnvironmentTag,
  LogLevel,
} from "@attested-chat/shared";

import type { AttestationOptions } from "./attestation/index.js";
import type { KeyStore } from "./store/interface.js";

export const PRODUCTION_BASE_URL = "https://api.attested-chat.dev";
export const TEST_BASE_URL = "https://api-test.attested-chat.dev";

export interface ClientOptions {
  apiKey: string;
  appIdentity: AppIdentity;
  environment?: Environment;
  timeoutMs?: number;
  attestation?: AttestationOptions;
  keyStore?: KeyStore;
  logLevel?: LogLevel;
  userAgent?: string;
}

export type PartialClientOptions = Partial<Omit<ClientOptions, "appIdentity">> & {
  appIdentity?: Partial<AppIdentity>;
};

export type Env = Record<string, string | undefined>;

export interface ResolvedEndpoint {
  baseUrl: string;
  tag: EnvironmentTag;
}

export function resolveEndpoint(environment: Environment = "production"): ResolvedEndpoint {
  if (environment === "production") {
    return { baseUrl: PRODUCTION_BASE_URL, tag: "production" };
  }
  if (environment === "test") {
    return { baseUrl: TEST_BASE_URL, tag: "test" };
  }
  let parsed: URL;
  try {
    parsed = new URL(environment.baseUrl);
  } catch {
    throw new Error(`Invalid base URL: ${environment.baseUrl}`);
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`Base URL must use http or https: ${environment.baseUrl}`);
  }
  return {
    baseUrl: environment.baseUrl.replace(/\/+$/, ""),
    tag: environment.tag ?? "test",
  };
}

/**
 * Team ids are sometimes copied with the trailing "." of an app id prefix.
 */
export function normalizeTeamId(teamId: string | undefined): string | undefined {
  const trimmed = teamId?.trim().replace(/\.+$/, "");
  return trimmed ? trimmed : undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function environmentFromEnv(env: Env): Environment | undefined {
  const baseUrl = nonEmpty(env.ATTESTED_CHAT_BASE_URL);
  const name = nonEmpty(env.ATTESTED_CHAT_ENV)?.toLowerCase();
  if (name !== undefined && name !== "production" && name !== "test") {
    throw new Error(`ATTESTED_CHAT_ENV must be "production" or "test", got "${name}"`);
  }
  if (baseUrl) {
    return { baseUrl, tag: name };
  }
  return name;
}

function timeoutFromEnv(env: Env): number | undefined {
  const raw = nonEmpty(env.ATTESTED_CHAT_TIMEOUT_MS);
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`ATTESTED_CHAT_TIMEOUT_MS must be a positive integer, got "${raw}"`);
  }
  return value;
}

function attestationFromEnv(env: Env): AttestationOptions | undefined {
  const mode = nonEmpty(env.ATTESTED_CHAT_ATTESTATION)?.toLowerCase();
  if (mode === undefined) {
    return undefined;
  }
  if (mode !== "simulator" && mode !== "none") {
    throw new Error(`ATTESTED_CHAT_ATTESTATION must be "simulator" or "none", got "${mode}"`);
  }
  return { mode };
}

/**
 * Merge explicit options with the environment and validate the result.
 */
export function resolveClientOptions(
  partial: PartialClientOptions = {},
  env: Env = process.env,
): ClientOptions {
  const apiKey = nonEmpty(partial.apiKey) ?? nonEmpty(env.ATTESTED_CHAT_API_KEY);
  if (!apiKey) {
    throw new Error("API key is required. Pass apiKey or set ATTESTED_CHAT_API_KEY.");
  }

  const bundleId =
    nonEmpty(partial.appIdentity?.bundleId) ?? nonEmpty(env.ATTESTED_CHAT_BUNDLE_ID);
  if (!bundleId) {
    throw new Error(
      "Bundle id is required. Pass appIdentity.bundleId or set ATTESTED_CHAT_BUNDLE_ID.",
    );
  }
  const teamId = normalizeTeamId(partial.appIdentity?.teamId ?? env.ATTESTED_CHAT_TEAM_ID);

  const timeoutMs = partial.timeoutMs ?? timeoutFromEnv(env);
  if (timeoutMs !== undefined && (!Number.isFinite(timeoutMs) || timeoutMs <= 0)) {
    throw new Error(`timeoutMs must be positive, got ${timeoutMs}`);
  }

  const environment = partial.environment ?? environmentFromEnv(env) ?? "production";
  // Fail early on a bad URL rather than on the first request.
  resolveEndpoint(environment);

  const logLevel = partial.logLevel ?? env.LOG_LEVEL?.trim().toLowerCase();

  return {
    apiKey,
    appIdentity: teamId ? { bundleId, teamId } : { bundleId },
    environment,
    timeoutMs,
    attestation: partial.attestation ?? attestationFromEnv(env),
    keyStore: partial.keyStore,
    logLevel: isLogLevel(logLevel) ? logLevel : undefined,
    userAgent: partial.userAgent,
  };
}
