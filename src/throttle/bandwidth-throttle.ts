/* src/throttle/bandwidth-throttle.ts */

/**
 * Token-bucket bandwidth throttle shared by all active transfers.
 *
 * Tokens refill continuously at `bytesPerSecond` up to `burstSize`. A consumer
 * reserves its bytes up front; when that drives the bucket negative it sleeps
 * for `deficit / rate`, so concurrent consumers queue behind each other and the
 * aggregate rate stays bounded.
 */

import type { BandwidthConfig } from "../../config";
import { abortReason, type Clock, sleep, systemClock } from "../core/clock";
import { BANDWIDTH_PRESETS } from "../constants";
import { formatFileSize, formatSpeed } from "../utils";

export interface BandwidthThrottleOptions {
  /** 0 = unlimited */
  bytesPerSecond?: number;
  /** defaults to twice the rate */
  burstSize?: number;
  clock?: Clock;
  silent?: boolean;
}

export interface BandwidthStats {
  bytesPerSecond: number;
  burstSize: number;
  availableTokens: number;
  isPaused: boolean;
  isUnlimited: boolean;
  utilizationPercent: number;
  totalBytes: number;
  totalDelayMs: number;
}

export type BandwidthPreset = keyof typeof BANDWIDTH_PRESETS;

// ============================================================================
// BANDWIDTH THROTTLE CLASS
// ============================================================================

export class BandwidthThrottle {
  private rate: number;
  private burst: number;
  private explicitBurst: boolean;
  private tokens: number;
  private lastUpdate: number;
  private paused = false;
  private resumeWaiters: Array<() => void> = [];
  private clock: Clock;
  private silent: boolean;
  private totalBytes = 0;
  private totalDelayMs = 0;

  constructor(options: BandwidthThrottleOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.silent = options.silent ?? false;
    this.rate = validateRate(options.bytesPerSecond ?? 0);
    this.explicitBurst = options.burstSize !== undefined && options.burstSize > 0;
    this.burst = this.resolveBurst(options.burstSize);
    this.tokens = this.burst;
    this.lastUpdate = this.clock.now();
  }

  get bytesPerSecond(): number {
    return this.rate;
  }

  get burstSize(): number {
    return this.burst;
  }

  get isPaused(): boolean {
    return this.paused;
  }

  get isUnlimited(): boolean {
    return this.rate === 0;
  }

  /**
   * Bytes that may be consumed without waiting
   */
  get availableTokens(): number {
    this.refill();
    return Math.max(0, this.tokens);
  }

  /**
   * Wait until `bytes` may pass. Resolves with the time spent throttled.
   * Aborting while throttled refunds the reservation.
   */
  async consume(bytes: number, signal?: AbortSignal): Promise<number> {
    if (signal?.aborted) throw abortReason(signal);
    if (bytes <= 0) return 0;

    const startedAt = this.clock.now();
    while (this.paused) {
      await this.waitForResume(signal);
    }

    this.totalBytes += bytes;
    if (this.isUnlimited) return this.clock.now() - startedAt;

    this.refill();
    this.tokens -= bytes;

    if (this.tokens < 0) {
      const delayMs = Math.ceil((-this.tokens / this.rate) * 1000);
      if (!this.silent) {
        console.log(
          `[THROTTLE] Throttling ${formatFileSize(bytes)} at ${bandwidthLabel(this.rate)}, delay ${delayMs}ms`
        );
      }

      try {
        await sleep(this.clock, delayMs, signal);
      } catch (error) {
        this.refill();
        this.tokens = Math.min(this.tokens + bytes, this.burst);
        this.totalBytes -= bytes;
        throw error;
      }
    }

    // paused while sleeping: hold the bytes until resumed
    while (this.paused) {
      await this.waitForResume(signal);
    }

    const waited = this.clock.now() - startedAt;
    this.totalDelayMs += waited;
    return waited;
  }

  /**
   * Hold all consumers until resume(); no tokens accrue meanwhile
   */
  pause(): void {
    if (this.paused) return;
    this.refill();
    this.paused = true;
    if (!this.silent) console.log("[THROTTLE] Paused");
  }

  resume(): void {
    if (!this.paused) return;
    this.paused = false;
    this.lastUpdate = this.clock.now();
    if (!this.silent) console.log("[THROTTLE] Resumed");

    const waiters = this.resumeWaiters;
    this.resumeWaiters = [];
    for (const wake of waiters) wake();
  }

  /**
   * Change the rate at runtime; 0 removes the limit
   */
  setRate(bytesPerSecond: number): void {
    const rate = validateRate(bytesPerSecond);
    this.refill();
    const wasUnlimited = this.isUnlimited;
    this.rate = rate;
    this.burst = this.resolveBurst(this.explicitBurst ? this.burst : undefined);
    this.tokens = wasUnlimited ? this.burst : Math.min(this.tokens, this.burst);
    this.lastUpdate = this.clock.now();

    if (!this.silent) {
      console.log(`[THROTTLE] Rate set to ${bandwidthLabel(rate)}`);
    }
  }

  setBurstSize(burstSize: number): void {
    if (!Number.isFinite(burstSize) || burstSize < 0) {
      throw new RangeError(`burstSize must be a non-negative number, got ${burstSize}`);
    }
    this.refill();
    this.explicitBurst = burstSize > 0;
    this.burst = this.resolveBurst(burstSize);
    this.tokens = Math.min(this.tokens, this.burst);
  }

  /**
   * Refill the bucket and clear the pause flag
   */
  reset(): void {
    this.tokens = this.burst;
    this.lastUpdate = this.clock.now();
    this.totalBytes = 0;
    this.totalDelayMs = 0;
    this.resume();
  }

  getStats(): BandwidthStats {
    this.refill();
    const available = Math.max(0, this.tokens);
    return {
      bytesPerSecond: this.rate,
      burstSize: this.burst,
      availableTokens: Math.floor(available),
      isPaused: this.paused,
      isUnlimited: this.isUnlimited,
      utilizationPercent: this.burst > 0 ? Math.floor(((this.burst - available) / this.burst) * 100) : 0,
      totalBytes: this.totalBytes,
      totalDelayMs: this.totalDelayMs,
    };
  }

  // ============================================================================
  // BUCKET MAINTENANCE
  // ============================================================================

  private refill(): void {
    const now = this.clock.now();
    if (this.paused || this.isUnlimited) {
      this.lastUpdate = now;
      return;
    }
    const elapsedSeconds = (now - this.lastUpdate) / 1000;
    this.tokens = Math.min(this.tokens + elapsedSeconds * this.rate, this.burst);
    this.lastUpdate = now;
  }

  private resolveBurst(burstSize: number | undefined): number {
    if (burstSize !== undefined && burstSize > 0) return burstSize;
    return this.rate * 2;
  }

  private waitForResume(signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (signal?.aborted) {
        reject(abortReason(signal));
        return;
      }

      const onAbort = () => {
        this.resumeWaiters = this.resumeWaiters.filter((waiter) => waiter !== wake);
        if (signal) reject(abortReason(signal));
      };

      const wake = () => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.resumeWaiters.push(wake);
    });
  }
}

// ============================================================================
// HELPERS
// ============================================================================

function validateRate(bytesPerSecond: number): number {
  if (!Number.isFinite(bytesPerSecond) || bytesPerSecond < 0) {
    throw new RangeError(`bytesPerSecond must be a non-negative number, got ${bytesPerSecond}`);
  }
  return bytesPerSecond;
}

/**
 * Human-readable label for a rate, e.g. "512 KB/s" or "Unlimited"
 */
export function bandwidthLabel(bytesPerSecond: number): string {
  if (bytesPerSecond === 0) return "Unlimited";
  const mib = 1024 * 1024;
  if (bytesPerSecond >= mib && bytesPerSecond % mib === 0) return `${bytesPerSecond / mib} MB/s`;
  return formatSpeed(bytesPerSecond);
}

/**
 * Closest preset at or above the given rate
 */
export function presetFor(bytesPerSecond: number): BandwidthPreset {
  if (bytesPerSecond === 0) return "UNLIMITED";
  const limited: BandwidthPreset[] = ["VERY_SLOW", "SLOW", "MODERATE", "FAST", "VERY_FAST"];
  return limited.find((preset) => bytesPerSecond <= BANDWIDTH_PRESETS[preset]) ?? "UNLIMITED";
}

/**
 * Create a throttle from configuration
 */
export function createBandwidthThrottle(
  config: BandwidthConfig,
  options: Omit<BandwidthThrottleOptions, "bytesPerSecond" | "burstSize"> = {}
): BandwidthThrottle {
  return new BandwidthThrottle({
    bytesPerSecond: config.bytesPerSecond,
    burstSize: config.burstSize > 0 ? config.burstSize : undefined,
    ...options,
  });
}
