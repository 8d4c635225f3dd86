/* src/core/retry-handler.ts */

/**
 * Retry policy for failed transfers.
 * Decides whether a failure is retried and how long the task backs off.
 */

import type { SchedulerConfig } from "../../config";
import { RETRY_CONFIG } from "../constants";
import type { TransferError } from "./errors";
import type { TransferTask } from "./types";

export interface RetryPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export type RetryDecision =
  | { action: "restart" }
  | { action: "retry"; retryCount: number; delayMs: number; fromZero: boolean }
  | { action: "fail"; exhausted: boolean };

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Number of failures so far
 * @param baseDelayMs - Base delay in milliseconds
 * @param maxDelayMs - Maximum delay cap in milliseconds
 * @returns Delay in milliseconds
 */
export function calculateBackoff(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number = RETRY_CONFIG.BACKOFF_MAX_MS
): number {
  const delay = baseDelayMs * 2 ** attempt;
  return Math.min(delay, maxDelayMs);
}

/**
 * Decide what happens to a task after its executor reported a failure
 */
export function decideRetry(
  task: Pick<TransferTask, "retryCount" | "maxRetries" | "rangeRestarted">,
  error: TransferError,
  policy: RetryPolicy
): RetryDecision {
  if (error.category === "rangeNotSatisfiable" && !task.rangeRestarted) {
    return { action: "restart" };
  }

  if (!error.isRetryable) {
    return { action: "fail", exhausted: false };
  }

  const retryCount = task.retryCount + 1;
  if (retryCount >= task.maxRetries) {
    return { action: "fail", exhausted: true };
  }

  const backoff = calculateBackoff(retryCount, policy.baseDelayMs, policy.maxDelayMs);
  return {
    action: "retry",
    retryCount,
    delayMs: Math.max(backoff, error.retryAfterMs ?? 0),
    // a rejected offset is never asked for again
    fromZero: error.category === "rangeNotSatisfiable",
  };
}

/**
 * Earliest time a previously failed task may run again
 */
export function nextAttemptAt(
  task: Pick<TransferTask, "retryCount" | "lastRetryAt">,
  policy: RetryPolicy
): number {
  if (task.retryCount === 0 || task.lastRetryAt === null) return 0;
  return task.lastRetryAt + calculateBackoff(task.retryCount, policy.baseDelayMs, policy.maxDelayMs);
}

/**
 * Create the retry policy from scheduler configuration
 */
export function createRetryPolicy(config?: Partial<SchedulerConfig>): RetryPolicy {
  return {
    baseDelayMs: config?.backoffBaseMs ?? RETRY_CONFIG.BACKOFF_BASE_MS,
    maxDelayMs: config?.backoffMaxMs ?? RETRY_CONFIG.BACKOFF_MAX_MS,
  };
}
