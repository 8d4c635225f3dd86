/* src/core/index.ts */

/**
 * Core module exports.
 * Provides centralized access to types, errors, the clock, the HTTP client and retry policy.
 */

// Clock
export { abortReason, type Clock, flushMicrotasks, ManualClock, sleep, systemClock, type TimerHandle } from "./clock";
// Errors
export {
  classifyError,
  InvalidTransitionError,
  localIOError,
  parseRetryAfter,
  RateLimiterError,
  TaskNotFoundError,
  TransferError,
  withLocalIO,
} from "./errors";
// HTTP Client
export {
  getHttpClient,
  HttpClient,
  parseContentLength,
  parseContentRange,
  parseUnsatisfiedRange,
  type RangeResponse,
} from "./http-client";
// Retry Handler
export {
  calculateBackoff,
  createRetryPolicy,
  decideRetry,
  nextAttemptAt,
  type RetryDecision,
  type RetryPolicy,
} from "./retry-handler";
// Types
export * from "./types";
