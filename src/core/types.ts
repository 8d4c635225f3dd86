/* src/core/types.ts */

/**
 * Core types shared across all modules.
 * This module provides type definitions for transfer tasks, progress,
 * HTTP range operations and retry policy.
 */

import type { z } from "zod";
import type {
  EnqueueRequestSchema,
  NetworkClassSchema,
  NetworkRequirementSchema,
  PausedBySchema,
  TransferErrorCategorySchema,
  TransferFailureSchema,
  TransferPrioritySchema,
  TransferStatusSchema,
  TransferTaskSchema,
} from "../../schemas";

// ============================================================================
// TASK TYPES
// ============================================================================

export type TransferStatus = z.infer<typeof TransferStatusSchema>;
export type TransferPriority = z.infer<typeof TransferPrioritySchema>;
export type NetworkRequirement = z.infer<typeof NetworkRequirementSchema>;
export type NetworkClass = z.infer<typeof NetworkClassSchema>;
export type PausedBy = z.infer<typeof PausedBySchema>;
export type TransferErrorCategory = z.infer<typeof TransferErrorCategorySchema>;
export type TransferFailure = z.infer<typeof TransferFailureSchema>;

/**
 * One queued or in-progress file download, as persisted
 */
export type TransferTask = z.infer<typeof TransferTaskSchema>;

/**
 * Caller-facing enqueue request; defaults are applied by the schema
 */
export type EnqueueRequest = z.input<typeof EnqueueRequestSchema>;
export type EnqueueInput = z.output<typeof EnqueueRequestSchema>;

/**
 * Partial update of a task record
 */
export type TaskPatch = Partial<Omit<TransferTask, "id" | "createdAt">>;

// ============================================================================
// PROGRESS TYPES
// ============================================================================

/**
 * Progress tuple published to observers
 */
export interface ProgressEvent {
  taskId: string;
  status: TransferStatus;
  bytesTransferred: number;
  totalSize: number | null;
  /** bytes per second, smoothed */
  speed: number;
  /** seconds remaining; null when speed or size is unknown */
  eta: number | null;
}

// ============================================================================
// HTTP TYPES
// ============================================================================

/**
 * Options for a single ranged GET
 */
export interface RangeRequestOptions {
  offset: number;
  ifRange?: string | null;
  timeout?: number;
  signal?: AbortSignal;
  headers?: Record<string, string>;
}

// ============================================================================
// SCHEDULER TYPES
// ============================================================================

/**
 * Snapshot of the scheduler for status displays
 */
export interface SchedulerState {
  queued: number;
  active: number;
  paused: number;
  failed: number;
  maxConcurrent: number;
  network: NetworkClass;
  isNetworkUsable: boolean;
  running: boolean;
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

/**
 * Whether a record may be purged from history
 */
export function isFinishedStatus(status: TransferStatus): boolean {
  return status === "completed" || status === "cancelled" || status === "failed";
}

const ALLOWED_TRANSITIONS: Record<TransferStatus, readonly TransferStatus[]> = {
  queued: ["active", "paused", "cancelled"],
  active: ["paused", "completed", "failed", "queued", "cancelled"],
  paused: ["queued", "cancelled"],
  failed: ["queued", "cancelled"],
  completed: [],
  cancelled: [],
};

export function canTransition(from: TransferStatus, to: TransferStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}
