#!/usr/bin/env node
/**
 * attested-chat CLI
 * Thin runtime wrapper around ChatClient
 *
 * Credentials come from ATTESTED_CHAT_API_KEY and ATTESTED_CHAT_BUNDLE_ID.
 */

import chalk from "chalk";
import yargs from "yargs";
import type { ArgumentsCamelCase, Argv } from "yargs";
import { hideBin } from "yargs/helpers";

import { CLIENT_VERSION } from "../lib/version.js";
import type { GlobalArgs } from "./context.js";
import { run as runChat } from "./commands/chat.js";
import { run as runModels } from "./commands/models.js";
import { run as runRegister } from "./commands/register.js";
import { run as runReset } from "./commands/reset.js";
import { run as runStatus } from "./commands/status.js";

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("attested-chat")
    .usage("Usage: $0 <command> [options]")
    .strict()
    .option("base-url", {
      type: "string",
      desc: "API base URL (overrides --env)",
    })
    .option("env", {
      type: "string",
      choices: ["production", "test"],
      desc: "Target environment",
    })
    .option("verbose", {
      type: "boolean",
      desc: "Enable debug logging",
      default: false,
    })
    .command(
      "chat",
      "Stream a chat completion for one prompt",
      (y: Argv) =>
        y
          .option("prompt", {
            type: "string",
            demandOption: true,
            desc: "User message",
          })
          .option("model", {
            type: "string",
            desc: "Model id (defaults to the client default)",
          }),
      (argv) => runChat(argv),
    )
    .command("models", "List available models", {}, (argv: ArgumentsCamelCase<GlobalArgs>) => runModels(argv))
    .command("register", "Register this device for attestation", {}, (argv: ArgumentsCamelCase<GlobalArgs>) =>
      runRegister(argv),
    )
    .command("status", "Show local attestation state", {}, (argv: ArgumentsCamelCase<GlobalArgs>) => runStatus(argv))
    .command("reset", "Clear the local attestation key and counter", {}, (argv: ArgumentsCamelCase<GlobalArgs>) =>
      runReset(argv),
    )
    .help()
    .alias("h", "help")
    .version(CLIENT_VERSION)
    .demandCommand(1, "Please specify a command")
    .parseAsync();
}

main().catch((err) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
