/**
 * Command-line run of a batch: resolves the input arguments, scores every
 * audio file and serves health and metrics until a shutdown signal arrives.
 */

import type { Transport } from "@/adapters/http";
import type { DeepfakeResult } from "@/adapters/voice-api";
import type { AppConfig } from "@/lib/config";
import { type Logger, toError } from "@/lib/logger";
import { createMetricsSink } from "@/lib/metrics";
import { describeOutcome } from "@/lib/resilience";
import { type HttpServer, type ServerDeps, startHttpServer } from "@/server";
import { type BatchResult, batchExitCode, collectAudioFiles, startWorker } from "@/worker";

const USAGE = "Usage: voice-guard <file-or-directory>...";

export interface CliOptions {
  /** File and directory arguments */
  argv: readonly string[];
  config: AppConfig;
  logger: Logger;
  exit: (code: number) => void;
  /** Registers the handler for SIGTERM and SIGINT */
  onSignal: (handler: (signal: string) => void) => void;
  transport?: Transport;
  startServer?: (deps: ServerDeps) => Promise<HttpServer>;
}

const reportBatch = (
  { results, summary }: BatchResult<string, DeepfakeResult>,
  logger: Logger,
): void => {
  for (const { item, outcome } of results) {
    if (outcome.succeeded) {
      logger.info("File scored", {
        file: item,
        score: outcome.value.score,
        label: outcome.value.label,
        latencyMs: outcome.totalLatencyMs,
      });
    } else {
      logger.warn(`File ${describeOutcome(outcome)}`, { file: item, reason: outcome.reason });
    }
  }
  logger.info("Batch complete", { ...summary });
};

/**
 * Resolves once the batch has been reported. The monitoring server keeps
 * serving afterwards; the signal handler closes it and exits 1 when any file
 * failed.
 */
export const runCli = async (options: CliOptions): Promise<void> => {
  const { argv, config, logger, exit, onSignal, transport, startServer = startHttpServer } = options;

  if (argv.length === 0) {
    logger.error("No input files", new Error(USAGE));
    exit(1);
    return;
  }

  const files = await collectAudioFiles(argv, logger);
  if (files.length === 0) {
    logger.error("No valid audio files found", new Error(USAGE), { inputs: argv.length });
    exit(1);
    return;
  }
  logger.info(`Found ${files.length} audio file(s)`);

  const metrics = createMetricsSink();
  const worker = startWorker({ config, files, logger, metrics, transport });
  const batch = worker.done.then(
    (result) => reportBatch(result, logger),
    (error: unknown) => {
      logger.error("Batch failed", toError(error));
      exit(1);
    },
  );

  const server = await startServer({
    port: config.server.port,
    logger,
    getSnapshot: metrics.snapshot,
    getCircuitState: () => worker.client.getCircuitState(),
    getBatchSummary: worker.getSummary,
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info(`Received ${signal}, shutting down`);
    await worker.shutdown();
    await server.close();
    logger.info("Graceful shutdown complete");
    exit(batchExitCode(worker.getSummary()));
  };

  onSignal((signal) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error("Shutdown failed", toError(error));
      exit(1);
    });
  });

  await batch;
};
