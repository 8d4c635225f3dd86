/* src/throttle/rate-limiter.ts */

/**
 * Counting semaphore bounding in-flight requests.
 * Waiters are served strictly in arrival order, and an optional minimum gap
 * separates successive acquisitions even when permits are free.
 */

import { EventEmitter } from "node:events";
import type { RateLimiterConfig } from "../../config";
import { abortReason, type Clock, systemClock, type TimerHandle } from "../core/clock";
import { RateLimiterError } from "../core/errors";
import { RATE_LIMIT_DEFAULTS } from "../constants";

export interface RateLimiterOptions {
  maxConcurrent?: number;
  minDelayMs?: number;
  clock?: Clock;
  silent?: boolean;
}

export interface RateLimiterMetrics {
  acquires: number;
  releases: number;
  /** grants held back by the minimum delay */
  delays: number;
  /** acquisitions that had to queue */
  queueWaits: number;
}

export interface RateLimiterStats {
  active: number;
  queued: number;
  maxConcurrent: number;
  isAtCapacity: boolean;
  minDelayMs: number;
  lastAcquireAt: number | null;
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
  detach: () => void;
}

// ============================================================================
// RATE LIMITER CLASS
// ============================================================================

export class RateLimiter extends EventEmitter {
  readonly maxConcurrent: number;
  readonly minDelayMs: number;

  private clock: Clock;
  private silent: boolean;
  private active = 0;
  // permits handed out before the last reset(), still owed a release()
  private stalePermits = 0;
  private waiters: Waiter[] = [];
  private lastAcquireAt: number | null = null;
  private delayTimer: TimerHandle | null = null;
  private metrics: RateLimiterMetrics = { acquires: 0, releases: 0, delays: 0, queueWaits: 0 };

  constructor(options: RateLimiterOptions = {}) {
    super();
    this.maxConcurrent = options.maxConcurrent ?? RATE_LIMIT_DEFAULTS.MAX_CONCURRENT;
    this.minDelayMs = options.minDelayMs ?? RATE_LIMIT_DEFAULTS.MIN_DELAY_MS;
    this.clock = options.clock ?? systemClock;
    this.silent = options.silent ?? false;

    if (!Number.isInteger(this.maxConcurrent) || this.maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${this.maxConcurrent}`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get queueLength(): number {
    return this.waiters.length;
  }

  get isAtCapacity(): boolean {
    return this.active >= this.maxConcurrent;
  }

  /**
   * Wait for a permit. Always pair with release() in a finally block.
   * Rejects with the signal's reason if aborted while queued.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal));
    }

    if (this.waiters.length > 0 || this.isAtCapacity) {
      this.metrics.queueWaits++;
      this.log(`At capacity (${this.maxConcurrent}), queueing request (queue: ${this.waiters.length + 1})`);
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index === -1) return;
        this.waiters.splice(index, 1);
        this.emitQueue();
        if (signal) reject(abortReason(signal));
        // the aborted waiter may have been blocking the head
        this.pump();
      };

      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      };

      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
      this.emitQueue();
      this.pump();
    });
  }

  /**
   * Return a permit and hand it to the longest waiter
   */
  release(): void {
    if (this.stalePermits > 0) {
      this.stalePermits--;
      this.metrics.releases++;
      this.log(`Released a permit from before the last reset (${this.stalePermits} outstanding)`);
      return;
    }

    if (this.active <= 0) {
      const error = new RateLimiterError("release() called without a matching acquire()");
      console.error(`[RATE-LIMIT] ${error.message}`);
      throw error;
    }

    this.active--;
    this.metrics.releases++;
    this.log(`Released permit (active: ${this.active}/${this.maxConcurrent}, queued: ${this.waiters.length})`);
    this.pump();
  }

  /**
   * Run an operation while holding a permit
   */
  async execute<T>(operation: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await operation();
    } finally {
      this.release();
    }
  }

  /**
   * Drop all permits and reject every waiter. Intended for shutdown and tests.
   *
   * Holders of a permit taken before the reset may still call release(); those
   * calls are absorbed and never free a permit handed out afterwards.
   */
  reset(): void {
    if (this.delayTimer) {
      this.clock.clearTimer(this.delayTimer);
      this.delayTimer = null;
    }

    const waiters = this.waiters;
    this.waiters = [];
    this.stalePermits += this.active;
    this.active = 0;
    this.lastAcquireAt = null;

    for (const waiter of waiters) {
      waiter.detach();
      waiter.reject(new RateLimiterError("Rate limiter was reset while waiting"));
    }
    this.emitQueue();
  }

  getStats(): RateLimiterStats {
    return {
      active: this.active,
      queued: this.waiters.length,
      maxConcurrent: this.maxConcurrent,
      isAtCapacity: this.isAtCapacity,
      minDelayMs: this.minDelayMs,
      lastAcquireAt: this.lastAcquireAt,
    };
  }

  getMetrics(): RateLimiterMetrics {
    return { ...this.metrics };
  }

  resetMetrics(): void {
    this.metrics = { acquires: 0, releases: 0, delays: 0, queueWaits: 0 };
    this.log("Metrics reset");
  }

  getFormattedStatistics(): Record<string, string | number | boolean> {
    const total = this.metrics.acquires;
    const rate = (count: number) => (total > 0 ? ((count / total) * 100).toFixed(1) : "0.0");

    return {
      totalAcquires: this.metrics.acquires,
      totalReleases: this.metrics.releases,
      delaysApplied: this.metrics.delays,
      delayRate: `${rate(this.metrics.delays)}%`,
      queueWaits: this.metrics.queueWaits,
      queueRate: `${rate(this.metrics.queueWaits)}%`,
      currentActive: this.active,
      currentQueued: this.waiters.length,
      maxConcurrent: this.maxConcurrent,
      isAtCapacity: this.isAtCapacity,
      minDelayMs: this.minDelayMs,
    };
  }

  // ============================================================================
  // GRANTING
  // ============================================================================

  private pump(): void {
    while (this.waiters.length > 0 && !this.isAtCapacity) {
      if (this.delayTimer) return;

      const wait = this.remainingDelay();
      if (wait > 0) {
        this.metrics.delays++;
        this.log(`Delaying ${wait}ms for min delay`);
        this.delayTimer = this.clock.setTimer(() => {
          this.delayTimer = null;
          this.pump();
        }, wait);
        return;
      }

      const waiter = this.waiters.shift();
      if (!waiter) return;

      waiter.detach();
      this.active++;
      this.metrics.acquires++;
      this.lastAcquireAt = this.clock.now();
      this.log(`Acquired permit (active: ${this.active}/${this.maxConcurrent}, queued: ${this.waiters.length})`);
      this.emitQueue();
      waiter.resolve();
    }
  }

  private remainingDelay(): number {
    if (this.minDelayMs <= 0 || this.lastAcquireAt === null) return 0;
    return Math.max(0, this.lastAcquireAt + this.minDelayMs - this.clock.now());
  }

  private emitQueue(): void {
    this.emit("queue", this.waiters.length);
  }

  private log(message: string): void {
    if (!this.silent) {
      console.log(`[RATE-LIMIT] ${message}`);
    }
  }
}

// ============================================================================
// FACTORY
// ============================================================================

/**
 * Create a limiter from configuration
 */
export function createRateLimiter(
  config: RateLimiterConfig,
  options: Omit<RateLimiterOptions, "maxConcurrent" | "minDelayMs"> = {}
): RateLimiter {
  return new RateLimiter({
    maxConcurrent: config.maxConcurrent,
    minDelayMs: config.minDelayMs,
    ...options,
  });
}
