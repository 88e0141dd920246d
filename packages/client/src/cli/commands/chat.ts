import chalk from "chalk";

import { chunkContent } from "../../lib/sse-decoder.js";
import { createClient, reportFailure } from "../context.js";
import type { GlobalArgs } from "../context.js";

export type ChatCommandArgs = GlobalArgs & {
  prompt?: string;
  model?: string;
};

/**
 * Stream one completion to stdout. Ctrl-C cancels the stream.
 */
export async function run(argv: ChatCommandArgs): Promise<void> {
  const { prompt, model, verbose } = argv;

  if (!prompt) {
    console.error(chalk.red('Missing required option: --prompt "<text>"'));
    process.exitCode = 2;
    return;
  }

  const client = createClient(argv);
  if (!client) {
    return;
  }

  try {
    const stream = await client.chatCompletionStream({
      model,
      messages: [{ role: "user", content: prompt }],
    });
    const onInterrupt = () => stream.cancel();
    process.once("SIGINT", onInterrupt);
    try {
      for await (const chunk of stream) {
        const text = chunkContent(chunk);
        if (text) {
          process.stdout.write(text);
        }
      }
    } finally {
      process.off("SIGINT", onInterrupt);
    }
    process.stdout.write("\n");
    if (stream.isCancelled && verbose) {
      console.info(chalk.gray("[verbose] Stream cancelled"));
    }
  } catch (err) {
    reportFailure(err);
  }
}
