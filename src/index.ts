/**
 * voice-guard
 *
 * Scores a batch of audio files for synthetic speech and serves health and
 * metrics while it runs.
 *
 * Usage: tsx src/index.ts <file-or-directory>...
 */

import { runCli } from "./cli";
import { buildConfig } from "./lib/config";
import { getEnv } from "./lib/env";
import { createLogger, toError } from "./lib/logger";

const main = async (): Promise<void> => {
  // 1. Validate environment configuration
  const config = buildConfig(getEnv());
  const logger = createLogger(config.logging);

  // 2. Run the batch; the server keeps serving until a signal arrives
  try {
    await runCli({
      argv: process.argv.slice(2),
      config,
      logger,
      exit: (code) => process.exit(code),
      onSignal: (handler) => {
        process.on("SIGTERM", () => handler("SIGTERM"));
        process.on("SIGINT", () => handler("SIGINT"));
      },
    });
  } catch (error) {
    logger.error("Fatal error", toError(error));
    process.exit(1);
  }
};

main().catch((error: unknown) => {
  console.error("Unhandled error:", error);
  process.exit(1);
});
