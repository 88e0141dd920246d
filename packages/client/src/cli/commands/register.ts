import chalk from "chalk";

import { createClient, reportFailure } from "../context.js";
import type { GlobalArgs } from "../context.js";

/**
 * Register this device without waiting for the server to ask.
 */
export async function run(argv: GlobalArgs): Promise<void> {
  const client = createClient(argv);
  if (!client) {
    return;
  }
  try {
    await client.registerDevice();
    const status = await client.attestationStatus();
    console.info(chalk.green("Device registered"));
    console.info(`  key id:    ${status.keyId ?? "-"}`);
    console.info(`  device id: ${status.deviceId ?? "-"}`);
  } catch (err) {
    reportFailure(err);
  }
}
