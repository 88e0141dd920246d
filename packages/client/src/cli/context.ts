import chalk from "chalk";
import { isApiError, setGlobalLogLevel } from "@attested-chat/shared";
import type { Environment } from "@attested-chat/shared";

import { ChatClient } from "../lib/chat-client.js";
import { resolveClientOptions } from "../lib/config.js";
import type { Env } from "../lib/config.js";

export type GlobalArgs = {
  baseUrl?: string;
  env?: string;
  verbose?: boolean;
};

function environmentFromArgs(argv: GlobalArgs): Environment | undefined {
  const tag = argv.env;
  if (tag !== undefined && tag !== "production" && tag !== "test") {
    throw new Error(`--env must be "production" or "test", got "${tag}"`);
  }
  if (argv.baseUrl) {
    return { baseUrl: argv.baseUrl, tag };
  }
  return tag;
}

/**
 * Build a client from flags and ATTESTED_CHAT_* variables. On a
 * configuration error, prints it and sets exit code 2.
 */
export function createClient(argv: GlobalArgs, env: Env = process.env): ChatClient | null {
  if (argv.verbose) {
    setGlobalLogLevel("debug");
  }
  try {
    const options = resolveClientOptions({ environment: environmentFromArgs(argv) }, env);
    return new ChatClient(options);
  } catch (err) {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exitCode = 2;
    return null;
  }
}

export function reportFailure(err: unknown): void {
  if (isApiError(err)) {
    console.error(chalk.red(`${err.kind}: ${err.message}`));
    if (err.retryAfter !== undefined) {
      console.error(chalk.gray(`Retry after ${err.retryAfter}s`));
    }
  } else {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  }
  process.exitCode = 1;
}
