export {
  batchExitCode,
  runBatch,
  type BatchItemResult,
  type BatchOptions,
  type BatchResult,
  type BatchSummary,
} from "./batch-coordinator";
export { collectAudioFiles } from "./collect-files";
export { startWorker, type StartWorkerConfig, type WorkerHandle } from "./start-worker";
