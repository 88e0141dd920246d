import chalk from "chalk";

import { createClient, reportFailure } from "../context.js";
import type { GlobalArgs } from "../context.js";

export async function run(argv: GlobalArgs): Promise<void> {
  const client = createClient(argv);
  if (!client) {
    return;
  }
  try {
    const status = await client.attestationStatus();
    console.info(`provider:     ${status.kind ?? chalk.yellow("none")}`);
    console.info(`key id:       ${status.keyId ?? chalk.gray("(not generated)")}`);
    console.info(`counter:      ${status.counter}`);
    console.info(`registration: ${status.registration}`);
    if (status.deviceId) {
      console.info(`device id:    ${status.deviceId}`);
    }
  } catch (err) {
    reportFailure(err);
  }
}
