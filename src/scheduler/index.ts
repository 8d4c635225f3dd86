/* src/scheduler/index.ts */

/**
 * Scheduling module exports.
 */

export {
  type CancelPolicy,
  createDownloadScheduler,
  DownloadScheduler,
  type SchedulerEvents,
  type SchedulerOptions,
} from "./download-scheduler";
export { isUsable, type NetworkMonitor, StaticNetworkMonitor, satisfiesRequirement } from "./network-monitor";
export { type QueueEntry, TaskQueue } from "./task-queue";
