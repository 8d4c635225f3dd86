/* src/core/errors.ts */

/**
 * Error taxonomy for transfers and control operations.
 */

import { NETWORK_ERROR_CODES } from "../constants";
import { errorMessage } from "../utils";
import type { TransferErrorCategory, TransferFailure, TransferStatus } from "./types";

// ============================================================================
// TRANSFER ERROR
// ============================================================================

export interface TransferErrorOptions {
  statusCode?: number;
  retryAfterMs?: number;
  cause?: unknown;
}

export class TransferError extends Error {
  readonly category: TransferErrorCategory;
  readonly statusCode?: number;
  readonly retryAfterMs?: number;

  constructor(category: TransferErrorCategory, message: string, options: TransferErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "TransferError";
    this.category = category;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
  }

  /**
   * Whether the scheduler may retry the transfer after backing off
   */
  get isRetryable(): boolean {
    switch (this.category) {
      case "network":
      case "rangeNotSatisfiable":
        return true;
      case "httpError":
        return this.statusCode === 429 || (this.statusCode !== undefined && this.statusCode >= 500);
      default:
        return false;
    }
  }

  toFailure(): TransferFailure {
    return {
      category: this.category,
      message: this.message,
      ...(this.statusCode !== undefined ? { statusCode: this.statusCode } : {}),
    };
  }
}

export class RateLimiterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RateLimiterError";
  }
}

export class TaskNotFoundError extends Error {
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
    this.taskId = taskId;
  }
}

export class InvalidTransitionError extends Error {
  constructor(taskId: string, from: TransferStatus, to: TransferStatus | "purged") {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

// ============================================================================
// CLASSIFICATION
// ============================================================================

function errnoCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

export function isNetworkErrorCode(code: string | undefined): boolean {
  return code !== undefined && NETWORK_ERROR_CODES.some((known) => known === code);
}

/**
 * Map an arbitrary failure from the network path onto the taxonomy.
 * Only socket and resolver errno codes count as `network`; anything else is
 * `unknown` and is not retried.
 */
export function classifyError(error: unknown): TransferError {
  if (error instanceof TransferError) return error;

  const code = errnoCode(error);
  const message = errorMessage(error);
  const category = isNetworkErrorCode(code) ? "network" : "unknown";
  return new TransferError(category, code ? `${code}: ${message}` : message, { cause: error });
}

/**
 * Wrap a file-system failure as `localIO`
 */
export function localIOError(operation: string, error: unknown): TransferError {
  if (error instanceof TransferError) return error;
  const code = errnoCode(error);
  return new TransferError("localIO", `${operation} failed${code ? ` (${code})` : ""}: ${errorMessage(error)}`, {
    cause: error,
  });
}

/**
 * Run a file-system operation, surfacing its failure as `localIO`
 */
export async function withLocalIO<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw localIOError(operation, error);
  }
}

/**
 * Parse a Retry-After header (seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | undefined, now: number): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
  const date = Date.parse(value);
  if (Number.isNaN(date)) return undefined;
  return Math.max(0, date - now);
}
