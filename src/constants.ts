/* src/constants.ts */

/**
 * Centralized constants for the transfer engine.
 */

export const REQUEST_HEADERS = {
  "User-Agent": "transfer-engine/1.0 (+resumable downloads)",
  Accept: "*/*",
  "Accept-Encoding": "identity",
  Connection: "keep-alive",
} as const;

export const TIMEOUTS = {
  REQUEST: 30000, // 30 seconds
  SCHEDULER_TICK: 5000, // 5 seconds
} as const;

export const RETRY_CONFIG = {
  MAX_RETRIES: 5,
  BACKOFF_BASE_MS: 2000,
  BACKOFF_MAX_MS: 64000,
} as const;

export const TRANSFER_DEFAULTS = {
  CHUNK_SIZE: 1024 * 1024, // 1 MiB
  MAX_REDIRECTS: 5,
  PARTIAL_SUFFIX: ".part",
  SPEED_SMOOTHING: 0.3,
} as const;

export const RATE_LIMIT_DEFAULTS = {
  MAX_CONCURRENT: 3,
  MIN_DELAY_MS: 150,
} as const;

export const PRIORITY_RANK = {
  high: 0,
  normal: 1,
  low: 2,
} as const;

/**
 * Bandwidth presets in bytes per second (0 = unlimited)
 */
export const BANDWIDTH_PRESETS = {
  UNLIMITED: 0,
  VERY_SLOW: 256 * 1024,
  SLOW: 512 * 1024,
  MODERATE: 1024 * 1024,
  FAST: 5 * 1024 * 1024,
  VERY_FAST: 10 * 1024 * 1024,
} as const;

// Errno codes raised by sockets and name resolution
export const NETWORK_ERROR_CODES = [
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "ENETUNREACH",
  "ENETDOWN",
  "EHOSTUNREACH",
  "EHOSTDOWN",
  "ERR_STREAM_PREMATURE_CLOSE",
] as const;
