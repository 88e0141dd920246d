import chalk from "chalk";

import { createClient, reportFailure } from "../context.js";
import type { GlobalArgs } from "../context.js";

/**
 * Forget the local attestation key and counter. The next attested request
 * registers a fresh key.
 */
export async function run(argv: GlobalArgs): Promise<void> {
  const client = createClient(argv);
  if (!client) {
    return;
  }
  try {
    await client.resetAttestation();
    console.info(chalk.green("Attestation state cleared"));
  } catch (err) {
    reportFailure(err);
  }
}
