import chalk from "chalk";

import { createClient, reportFailure } from "../context.js";
import type { GlobalArgs } from "../context.js";

export async function run(argv: GlobalArgs): Promise<void> {
  const client = createClient(argv);
  if (!client) {
    return;
  }
  try {
    const models = await client.listModels();
    if (models.length === 0) {
      console.info(chalk.gray("No models available"));
      return;
    }
    for (const model of models) {
      console.info(`${chalk.cyan(model.id)}${model.owned_by ? chalk.gray(` (${model.owned_by})`) : ""}`);
    }
  } catch (err) {
    reportFailure(err);
  }
}
