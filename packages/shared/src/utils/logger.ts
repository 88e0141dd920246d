/**
 * Structured Logging Utility
 * Provides consistent logging across the signer, attestation, transport and CLI
 *
 * Context values under credential-bearing keys are redacted before formatting,
 * so request headers can be logged as-is.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  component: string;
  operation?: string;
  [key: string]: unknown;
}

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const REDACTED_KEYS = new Set([
  "apikey",
  "authorization",
  "signature",
  "assertion",
  "x-signature",
  "x-attest-assertion",
]);

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LEVELS.some((level) => level === value);
}

/**
 * Resolve the default level from LOG_LEVEL, falling back to "info".
 */
export function defaultLogLevel(
  env: Record<string, string | undefined> = process.env,
): LogLevel {
  const fromEnv = env.LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

function redactValue(value: unknown, depth: number): unknown {
  if (depth > 3 || value === null || typeof value !== "object") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, depth + 1));
  }
  return redactRecord(value, depth);
}

function redactRecord(value: object, depth = 0): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, inner] of Object.entries(value)) {
    out[key] = REDACTED_KEYS.has(key.toLowerCase())
      ? "[redacted]"
      : redactValue(inner, depth + 1);
  }
  return out;
}

let globalLevel: LogLevel | null = null;

/**
 * Override the level of every logger in the process; null restores each
 * logger's own level.
 */
export function setGlobalLogLevel(level: LogLevel | null): void {
  globalLevel = level;
}

/**
 * Structured logger with context support
 */
export class Logger {
  constructor(
    private component: string,
    private minLevel: LogLevel = defaultLogLevel(),
    private baseContext: Partial<LogContext> = {},
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(globalLevel ?? this.minLevel);
  }

  /**
   * Format log message with context
   */
  format(level: LogLevel, message: string, context?: Partial<LogContext>): string {
    const timestamp = new Date().toISOString();
    const ctx = redactRecord({
      component: this.component,
      ...this.baseContext,
      ...context,
    });
    const contextStr = Object.entries(ctx)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(" ");
    return `[${timestamp}] ${level.toUpperCase()} ${contextStr} - ${message}`;
  }

  debug(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("debug")) {
      console.debug(this.format("debug", message, context));
    }
  }

  info(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("info")) {
      console.info(this.format("info", message, context));
    }
  }

  warn(message: string, context?: Partial<LogContext>): void {
    if (this.shouldLog("warn")) {
      console.warn(this.format("warn", message, context));
    }
  }

  error(message: string, error?: Error, context?: Partial<LogContext>): void {
    if (this.shouldLog("error")) {
      const errorContext = error
        ? { ...context, error: error.message, stack: error.stack }
        : context;
      console.error(this.format("error", message, errorContext));
    }
  }

  /**
   * Create child logger with additional context
   */
  child(additionalContext: Partial<LogContext>): Logger {
    return new Logger(this.component, this.minLevel, {
      ...this.baseContext,
      ...additionalContext,
    });
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

/**
 * Create logger instance
 */
export function createLogger(component: string, level?: LogLevel): Logger {
  return new Logger(component, level ?? defaultLogLevel());
}
