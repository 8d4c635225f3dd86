/* src/transfer/index.ts */

/**
 * Transfer module exports.
 */

export {
  createTransferExecutor,
  describeProgress,
  type ExecutorOptions,
  type ProgressListener,
  ResumableTransferExecutor,
  type StopReason,
  type TransferExecutor,
  TransferHandle,
  type TransferOutcome,
} from "./resumable-executor";
export { SpeedTracker } from "./speed-tracker";
