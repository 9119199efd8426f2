/**
 * Batch worker: wires the voice API client to the batch coordinator and scores
 * every audio file once.
 */

import { createHttpTransport, type Transport } from "@/adapters/http";
import {
  createVoiceApiClient,
  type DeepfakeResult,
  loadAudioFile,
  type VoiceApiClient,
} from "@/adapters/voice-api";
import type { AppConfig } from "@/lib/config";
import type { Logger } from "@/lib/logger";
import type { MetricsSink } from "@/lib/metrics";

import { type BatchResult, type BatchSummary, runBatch } from "./batch-coordinator";

export interface StartWorkerConfig {
  config: AppConfig;
  /** Audio files to score */
  files: readonly string[];
  logger: Logger;
  metrics: MetricsSink;
  /** Defaults to an HTTP transport built from `config.api` */
  transport?: Transport;
}

/**
 * Handle returned by startWorker for lifecycle management.
 */
export interface WorkerHandle {
  client: VoiceApiClient;
  /** Settles once every file has an outcome */
  done: Promise<BatchResult<string, DeepfakeResult>>;
  /** Summary of the finished batch, undefined while it runs */
  getSummary: () => BatchSummary | undefined;
  /** Cancels files not yet finished and waits for the batch to settle */
  shutdown: () => Promise<void>;
}

export const startWorker = (options: StartWorkerConfig): WorkerHandle => {
  const { config, files, logger, metrics } = options;

  const transport =
    options.transport ??
    createHttpTransport({ baseUrl: config.api.baseUrl, apiKey: config.api.apiKey });

  const client = createVoiceApiClient({
    transport,
    rateLimit: config.rateLimit,
    rateLimitWaitMs: config.rateLimitWaitMs,
    circuitBreaker: config.circuitBreaker,
    retry: config.retry,
    timeoutMs: config.timeoutMs,
    paths: config.api.paths,
    logger,
    metrics,
  });

  const controller = new AbortController();
  let summary: BatchSummary | undefined;

  const done = runBatch(files, {
    concurrency: config.batch.concurrency,
    signal: controller.signal,
    metrics,
    logger,
    process: async (path, signal) =>
      client.detectDeepfake(await loadAudioFile(path), { source: path }, { signal, label: path }),
    score: (result) => result.score,
    riskThresholds: config.risk,
  }).then((result) => {
    summary = result.summary;
    return result;
  });

  const shutdown = async (): Promise<void> => {
    controller.abort();
    await done;
    client.close();
  };

  return { client, done, getSummary: () => summary, shutdown };
};
