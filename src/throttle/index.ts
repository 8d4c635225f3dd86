/* src/throttle/index.ts */

/**
 * Throttling module exports.
 * Provides the request rate limiter and the bandwidth token bucket.
 */

export {
  type BandwidthPreset,
  type BandwidthStats,
  BandwidthThrottle,
  type BandwidthThrottleOptions,
  bandwidthLabel,
  createBandwidthThrottle,
  presetFor,
} from "./bandwidth-throttle";
export {
  createRateLimiter,
  RateLimiter,
  type RateLimiterMetrics,
  type RateLimiterOptions,
  type RateLimiterStats,
} from "./rate-limiter";
