/* src/core/clock.ts */

/**
 * Time source shared by the scheduler, limiter and throttle.
 * Production code uses the system clock; tests drive a ManualClock.
 */

export type TimerHandle = { readonly id: number };

export interface Clock {
  now(): number;
  setTimer(callback: () => void, delayMs: number): TimerHandle;
  clearTimer(handle: TimerHandle): void;
}

// ============================================================================
// SYSTEM CLOCK
// ============================================================================

class SystemClock implements Clock {
  private timers = new Map<number, NodeJS.Timeout>();
  private nextId = 1;

  now(): number {
    return Date.now();
  }

  setTimer(callback: () => void, delayMs: number): TimerHandle {
    const handle = { id: this.nextId++ };
    const timeout = setTimeout(() => {
      this.timers.delete(handle.id);
      callback();
    }, Math.max(0, delayMs));
    this.timers.set(handle.id, timeout);
    return handle;
  }

  clearTimer(handle: TimerHandle): void {
    const timeout = this.timers.get(handle.id);
    if (timeout) {
      clearTimeout(timeout);
      this.timers.delete(handle.id);
    }
  }
}

export const systemClock: Clock = new SystemClock();

// ============================================================================
// MANUAL CLOCK
// ============================================================================

interface PendingTimer {
  id: number;
  due: number;
  callback: () => void;
}

/**
 * Deterministic clock: time only moves when advance() is called
 */
export class ManualClock implements Clock {
  private current: number;
  private pending: PendingTimer[] = [];
  private nextId = 1;

  constructor(start: number = 1_700_000_000_000) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimer(callback: () => void, delayMs: number): TimerHandle {
    const timer = { id: this.nextId++, due: this.current + Math.max(0, delayMs), callback };
    this.pending.push(timer);
    return { id: timer.id };
  }

  clearTimer(handle: TimerHandle): void {
    this.pending = this.pending.filter((timer) => timer.id !== handle.id);
  }

  get pendingTimers(): number {
    return this.pending.length;
  }

  /**
   * Move time forward, firing due timers in order. Microtasks queued by each
   * callback run before the next timer fires.
   */
  async advance(ms: number): Promise<void> {
    const target = this.current + ms;
    for (;;) {
      await flushMicrotasks();
      const next = this.nextDue(target);
      if (!next) break;
      this.pending = this.pending.filter((timer) => timer.id !== next.id);
      this.current = next.due;
      next.callback();
    }
    this.current = target;
    await flushMicrotasks();
  }

  private nextDue(limit: number): PendingTimer | undefined {
    let next: PendingTimer | undefined;
    for (const timer of this.pending) {
      if (timer.due > limit) continue;
      if (!next || timer.due < next.due || (timer.due === next.due && timer.id < next.id)) {
        next = timer;
      }
    }
    return next;
  }
}

/**
 * Let pending promise callbacks and I/O callbacks run
 */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

// ============================================================================
// HELPERS
// ============================================================================

export function abortReason(signal: AbortSignal): Error {
  const { reason } = signal;
  return reason instanceof Error ? reason : new Error("Operation aborted");
}

/**
 * Sleep on the given clock; rejects with the signal's reason when aborted
 */
export function sleep(clock: Clock, ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }

    const onAbort = () => {
      clock.clearTimer(handle);
      reject(signal ? abortReason(signal) : new Error("Operation aborted"));
    };

    const handle = clock.setTimer(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
