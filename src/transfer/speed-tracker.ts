/* src/transfer/speed-tracker.ts */

import { type Clock, systemClock } from "../core/clock";
import { TRANSFER_DEFAULTS } from "../constants";

/**
 * Smoothed transfer speed over chunks (exponential moving average).
 * Bytes arriving within the same millisecond are folded into the next sample.
 */
export class SpeedTracker {
  private speed = 0;
  private hasSample = false;
  private pendingBytes = 0;
  private lastSampleAt: number;

  constructor(
    private clock: Clock = systemClock,
    private smoothing: number = TRANSFER_DEFAULTS.SPEED_SMOOTHING
  ) {
    this.lastSampleAt = clock.now();
  }

  /** bytes per second */
  get current(): number {
    return this.speed;
  }

  record(bytes: number): number {
    this.pendingBytes += bytes;
    const now = this.clock.now();
    const elapsedMs = now - this.lastSampleAt;
    if (elapsedMs <= 0) return this.speed;

    const sample = (this.pendingBytes * 1000) / elapsedMs;
    this.speed = this.hasSample ? this.smoothing * sample + (1 - this.smoothing) * this.speed : sample;
    this.hasSample = true;
    this.pendingBytes = 0;
    this.lastSampleAt = now;
    return this.speed;
  }

  /**
   * Seconds remaining, or null when the size or speed is unknown
   */
  eta(bytesTransferred: number, totalSize: number | null): number | null {
    if (totalSize === null || this.speed <= 0) return null;
    return Math.max(0, totalSize - bytesTransferred) / this.speed;
  }

  reset(): void {
    this.speed = 0;
    this.hasSample = false;
    this.pendingBytes = 0;
    this.lastSampleAt = this.clock.now();
  }
}
