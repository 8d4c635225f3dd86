/* src/scheduler/download-scheduler.ts */

/**
 * Decides what downloads now.
 *
 * Keeps an in-memory mirror of every task record, a priority queue of the
 * queued ones and the set of running executors. A periodic tick starts
 * eligible tasks up to the concurrency ceiling; executor outcomes feed back
 * into the retry policy. The scheduler writes only status and scheduling
 * fields; byte counts and validators are persisted by the executor.
 */

import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import * as path from "node:path";
import type { Config } from "../../config";
import { EnqueueRequestSchema } from "../../schemas";
import { type Clock, systemClock, type TimerHandle } from "../core/clock";
import { classifyError, InvalidTransitionError, TaskNotFoundError, type TransferError } from "../core/errors";
import { createRetryPolicy, decideRetry, nextAttemptAt, type RetryPolicy } from "../core/retry-handler";
import {
  canTransition,
  type EnqueueInput,
  type EnqueueRequest,
  isFinishedStatus,
  type NetworkClass,
  type PausedBy,
  type ProgressEvent,
  type SchedulerState,
  type TaskPatch,
  type TransferFailure,
  type TransferPriority,
  type TransferStatus,
  type TransferTask,
} from "../core/types";
import { RETRY_CONFIG, TIMEOUTS } from "../constants";
import type { TaskStore } from "../storage/task-store";
import { type TransferExecutor, TransferHandle, type TransferOutcome } from "../transfer/resumable-executor";
import { errorMessage, formatFileSize } from "../utils";
import { isUsable, type NetworkMonitor, StaticNetworkMonitor, satisfiesRequirement } from "./network-monitor";
import { type QueueEntry, TaskQueue } from "./task-queue";

export type CancelPolicy = Config["transfer"]["cancelPolicy"];

export interface SchedulerOptions {
  store: TaskStore;
  executor: TransferExecutor;
  network?: NetworkMonitor;
  clock?: Clock;
  maxConcurrent?: number;
  tickIntervalMs?: number;
  /** default for tasks enqueued without their own */
  maxRetries?: number;
  retryPolicy?: RetryPolicy;
  cancelPolicy?: CancelPolicy;
  /** base for relative destination paths */
  downloadsDir?: string;
  silent?: boolean;
}

export type SchedulerEvents = {
  progress: [event: ProgressEvent];
  task: [task: TransferTask];
  failed: [task: TransferTask];
  state: [state: SchedulerState];
};

interface ActiveTransfer {
  handle: TransferHandle;
  done: Promise<void>;
}

// ============================================================================
// DOWNLOAD SCHEDULER CLASS
// ============================================================================

export class DownloadScheduler extends EventEmitter<SchedulerEvents> {
  readonly maxConcurrent: number;

  private store: TaskStore;
  private executor: TransferExecutor;
  private network: NetworkMonitor;
  private clock: Clock;
  private tickIntervalMs: number;
  private defaultMaxRetries: number;
  private retryPolicy: RetryPolicy;
  private cancelPolicy: CancelPolicy;
  private downloadsDir: string | null;
  private silent: boolean;

  private tasks = new Map<string, TransferTask>();
  private queue = new TaskQueue();
  private active = new Map<string, ActiveTransfer>();
  private loading: Promise<void> | null = null;
  private running = false;
  private timer: TimerHandle | null = null;
  private unsubscribeNetwork: (() => void) | null = null;

  constructor(options: SchedulerOptions) {
    super();
    this.store = options.store;
    this.executor = options.executor;
    this.network = options.network ?? new StaticNetworkMonitor();
    this.clock = options.clock ?? systemClock;
    this.maxConcurrent = options.maxConcurrent ?? 3;
    this.tickIntervalMs = options.tickIntervalMs ?? TIMEOUTS.SCHEDULER_TICK;
    this.defaultMaxRetries = options.maxRetries ?? RETRY_CONFIG.MAX_RETRIES;
    this.retryPolicy = options.retryPolicy ?? createRetryPolicy();
    this.cancelPolicy = options.cancelPolicy ?? "delete";
    this.downloadsDir = options.downloadsDir ? path.resolve(options.downloadsDir) : null;
    this.silent = options.silent ?? false;
  }

  get isRunning(): boolean {
    return this.running;
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  /**
   * Recover interrupted tasks and start the periodic tick
   */
  async start(): Promise<void> {
    if (this.running) return;
    await this.load();
    await this.recover();

    this.running = true;
    this.unsubscribeNetwork = this.network.onChange((network) => {
      this.handleNetworkChange(network).catch((error: unknown) => {
        console.error(`[SCHEDULER] Network change handling failed: ${errorMessage(error)}`);
      });
    });
    this.scheduleTick();
    this.log(`Started (ceiling ${this.maxConcurrent}, network ${this.network.current()})`);
    this.tick();
  }

  /**
   * Stop ticking and pause running transfers; they are queued again on the next start
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    if (this.timer) {
      this.clock.clearTimer(this.timer);
      this.timer = null;
    }
    this.unsubscribeNetwork?.();
    this.unsubscribeNetwork = null;

    const transfers = [...this.active.values()];
    for (const transfer of transfers) {
      transfer.handle.requestPause();
    }
    await Promise.all(transfers.map((transfer) => transfer.done));
    this.log("Stopped");
    this.emitState();
  }

  // ============================================================================
  // ENQUEUE
  // ============================================================================

  /**
   * Add a transfer, or update the queued fields of an existing id in place
   */
  async enqueue(request: EnqueueRequest): Promise<string> {
    const parsed = EnqueueRequestSchema.parse(request);
    const input = { ...parsed, destinationPath: this.resolveDestination(parsed.destinationPath) };
    await this.load();

    const existing = input.id ? this.tasks.get(input.id) : undefined;
    if (existing) {
      await this.updateExisting(existing, input);
      return existing.id;
    }

    const now = this.clock.now();
    const task: TransferTask = {
      id: input.id ?? randomUUID(),
      url: input.url,
      destinationPath: input.destinationPath,
      totalSize: input.totalSize ?? null,
      bytesTransferred: 0,
      status: "queued",
      priority: input.priority,
      notBefore: input.notBefore ?? null,
      networkRequirement: input.networkRequirement,
      retryCount: 0,
      lastRetryAt: null,
      maxRetries: input.maxRetries ?? this.defaultMaxRetries,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      completedAt: null,
      etag: null,
      lastError: null,
      pausedBy: null,
      rangeRestarted: false,
    };

    this.tasks.set(task.id, task);
    this.queue.push(this.queueEntry(task));
    try {
      await this.store.put(task);
    } catch (error) {
      this.tasks.delete(task.id);
      this.queue.remove(task.id);
      throw error;
    }
    this.log(`Enqueued ${task.id} (${task.priority}): ${task.url}`);
    this.emit("task", { ...task });
    this.tick();
    return task.id;
  }

  private async updateExisting(existing: TransferTask, input: EnqueueInput): Promise<void> {
    const patch: TaskPatch = {
      priority: input.priority,
      networkRequirement: input.networkRequirement,
    };
    if (input.notBefore !== undefined) patch.notBefore = input.notBefore;
    if (input.maxRetries !== undefined) patch.maxRetries = input.maxRetries;

    // the source and target of a started transfer stay fixed
    const started = existing.status === "active" || existing.bytesTransferred > 0;
    if (!started) {
      patch.url = input.url;
      patch.destinationPath = input.destinationPath;
      if (input.totalSize !== undefined) patch.totalSize = input.totalSize;
    } else if (input.url !== existing.url || input.destinationPath !== existing.destinationPath) {
      this.warn(`Ignoring new url/destination for ${existing.id}: transfer already started`);
    }

    const updated = await this.commit(existing.id, patch);
    if (updated.status === "queued") {
      this.queue.push(this.queueEntry(updated));
    }
    this.log(`Updated ${existing.id} in place`);
    this.tick();
  }

  // ============================================================================
  // CONTROL OPERATIONS
  // ============================================================================

  /**
   * Cancel a task: stop its transfer, drop it from the queue, mark it cancelled
   */
  async remove(id: string): Promise<void> {
    await this.load();
    const task = this.require(id);
    if (task.status === "cancelled") return;
    this.assertTransition(task, "cancelled");

    this.queue.remove(id);
    const transfer = this.active.get(id);
    const saved = this.commit(id, { status: "cancelled", pausedBy: null, notBefore: null });
    transfer?.handle.requestCancel();
    await saved;
    if (transfer) await transfer.done;

    if (this.cancelPolicy === "delete") {
      await this.executor.discardPartial(task);
    }
    this.log(`Cancelled ${id}`);
    this.emitProgress(id);
    this.emitState();
  }

  async pause(id: string): Promise<void> {
    await this.load();
    await this.pauseTask(id, "user");
  }

  async resume(id: string): Promise<void> {
    await this.load();
    const task = this.require(id);
    if (task.status === "queued" || task.status === "active") return;
    if (task.status !== "paused") {
      throw new InvalidTransitionError(id, task.status, "queued");
    }

    await this.requeue(id, { pausedBy: null });
    this.log(`Resumed ${id}`);
    this.tick();
  }

  async pauseAll(): Promise<void> {
    await this.load();
    const ids = [...this.tasks.values()]
      .filter((task) => task.status === "queued" || task.status === "active")
      .map((task) => task.id);
    await Promise.all(ids.map((id) => this.pauseTask(id, "user")));
  }

  async resumeAll(): Promise<void> {
    await this.load();
    const ids = [...this.tasks.values()].filter((task) => task.status === "paused").map((task) => task.id);
    await Promise.all(ids.map((id) => this.requeue(id, { pausedBy: null })));
    this.tick();
  }

  /**
   * Re-sort a task; a running transfer is not interrupted
   */
  async setPriority(id: string, priority: TransferPriority): Promise<void> {
    await this.load();
    this.require(id);
    const saved = this.commit(id, { priority });
    this.queue.update(id, { priority });
    await saved;
    this.tick();
  }

  /**
   * Give a terminally failed task a fresh retry budget, keeping its partial data
   */
  async retry(id: string): Promise<void> {
    await this.load();
    const task = this.require(id);
    if (task.status !== "failed") {
      throw new InvalidTransitionError(id, task.status, "queued");
    }

    await this.requeue(id, {
      retryCount: 0,
      lastRetryAt: null,
      lastError: null,
      notBefore: null,
      rangeRestarted: false,
    });
    this.log(`Retrying ${id} on request`);
    this.tick();
  }

  /**
   * Delete a finished record and anything left of its partial file
   */
  async purge(id: string): Promise<void> {
    await this.load();
    const task = this.require(id);
    if (!isFinishedStatus(task.status)) {
      throw new InvalidTransitionError(id, task.status, "purged");
    }

    if (task.status !== "completed") {
      await this.executor.discardPartial(task);
    }
    await this.store.delete(id);
    this.tasks.delete(id);
    this.log(`Purged ${id}`);
    this.emitState();
  }

  async purgeFinished(): Promise<number> {
    await this.load();
    const finished = [...this.tasks.values()].filter((task) => isFinishedStatus(task.status));
    for (const task of finished) {
      await this.purge(task.id);
    }
    return finished.length;
  }

  // ============================================================================
  // OBSERVATION
  // ============================================================================

  get(id: string): TransferTask | null {
    const task = this.tasks.get(id);
    return task ? { ...task } : null;
  }

  list(status?: TransferStatus): TransferTask[] {
    return [...this.tasks.values()]
      .filter((task) => status === undefined || task.status === status)
      .sort((a, b) => a.createdAt - b.createdAt || a.id.localeCompare(b.id))
      .map((task) => ({ ...task }));
  }

  /**
   * Ids of queued tasks in the order they would start
   */
  queueOrder(): string[] {
    return this.queue.toSortedArray().map((entry) => entry.id);
  }

  getState(): SchedulerState {
    const count = (status: TransferStatus) => [...this.tasks.values()].filter((task) => task.status === status).length;
    const network = this.network.current();
    return {
      queued: count("queued"),
      active: this.active.size,
      paused: count("paused"),
      failed: count("failed"),
      maxConcurrent: this.maxConcurrent,
      network,
      isNetworkUsable: isUsable(network),
      running: this.running,
    };
  }

  subscribe(listener: (event: ProgressEvent) => void): () => void {
    this.on("progress", listener);
    return () => {
      this.off("progress", listener);
    };
  }

  // ============================================================================
  // SCHEDULING
  // ============================================================================

  /**
   * One scheduling pass: start eligible queued tasks in priority order until
   * the ceiling is reached. Ineligible tasks are skipped, not waited on.
   */
  tick(): void {
    if (!this.running) return;

    const now = this.clock.now();
    const network = this.network.current();

    for (const entry of this.queue.toSortedArray()) {
      if (this.active.size >= this.maxConcurrent) break;

      const task = this.tasks.get(entry.id);
      if (!task || task.status !== "queued") {
        this.queue.remove(entry.id);
        continue;
      }
      // previous attempt still settling
      if (this.active.has(task.id)) continue;
      if (!this.isEligible(task, now, network)) continue;

      this.launch(task);
    }

    this.emitState();
  }

  private isEligible(task: TransferTask, now: number, network: NetworkClass): boolean {
    if (task.notBefore !== null && task.notBefore > now) return false;
    if (nextAttemptAt(task, this.retryPolicy) > now) return false;
    return satisfiesRequirement(task.networkRequirement, network);
  }

  private scheduleTick(): void {
    this.timer = this.clock.setTimer(() => {
      this.timer = null;
      if (!this.running) return;
      this.tick();
      this.scheduleTick();
    }, this.tickIntervalMs);
  }

  private launch(task: TransferTask): void {
    this.queue.remove(task.id);
    const now = this.clock.now();
    const patch: TaskPatch = { status: "active", pausedBy: null, startedAt: task.startedAt ?? now };
    const handle = new TransferHandle(task.id);
    const done = this.run(task.id, handle, patch);
    this.active.set(task.id, { handle, done });
    this.log(`Starting ${task.id} (${task.priority}, attempt ${task.retryCount + 1}/${Math.max(task.maxRetries, 1)})`);
  }

  private async run(id: string, handle: TransferHandle, patch: TaskPatch): Promise<void> {
    try {
      const task = await this.commit(id, patch);
      const outcome = await this.executor.execute(task, handle, (event) => this.onProgress(event));
      await this.settle(id, outcome);
    } catch (error) {
      const failure = classifyError(error);
      console.error(`[SCHEDULER] Transfer ${id} crashed: ${failure.message}`);
      await this.settle(id, {
        status: "failed",
        bytesTransferred: this.tasks.get(id)?.bytesTransferred ?? 0,
        error: failure,
      }).catch((settleError: unknown) => {
        console.error(`[SCHEDULER] Could not record failure of ${id}: ${errorMessage(settleError)}`);
      });
    } finally {
      this.active.delete(id);
      this.tick();
    }
  }

  private onProgress(event: ProgressEvent): void {
    const task = this.tasks.get(event.taskId);
    if (!task) return;
    this.tasks.set(task.id, { ...task, bytesTransferred: event.bytesTransferred, totalSize: event.totalSize });
    this.emit("progress", { ...event, status: task.status });
  }

  /**
   * Apply an executor outcome. A pause or cancel requested while the
   * transfer ran takes precedence over a failure.
   */
  private async settle(id: string, outcome: TransferOutcome): Promise<void> {
    const task = await this.syncExecutorFields(id);
    if (!task) return;

    if (task.status === "cancelled") {
      this.emitProgress(id);
      return;
    }

    // paused or resumed while the last chunk was in flight
    if (task.status === "paused" || task.status === "queued") {
      if (outcome.status === "completed") {
        await this.commit(id, { status: "completed", completedAt: this.clock.now(), pausedBy: null });
        this.queue.remove(id);
      }
      this.emitProgress(id);
      return;
    }

    switch (outcome.status) {
      case "completed":
        await this.commit(id, {
          status: "completed",
          completedAt: this.clock.now(),
          lastError: null,
          pausedBy: null,
          notBefore: null,
        });
        this.log(`Completed ${id} (${formatFileSize(outcome.totalSize)})`);
        break;
      case "paused":
        // paused without a status change: shutdown
        await this.requeue(id, {});
        break;
      case "cancelled":
        await this.commit(id, { status: "cancelled" });
        break;
      case "failed":
        await this.handleFailure(task, outcome.error);
        break;
    }
    this.emitProgress(id);
  }

  private async handleFailure(task: TransferTask, error: TransferError): Promise<void> {
    const decision = decideRetry(task, error, this.retryPolicy);
    const now = this.clock.now();

    switch (decision.action) {
      case "restart":
        this.warn(`Range not satisfiable for ${task.id}, restarting from byte 0`);
        await this.executor.discardPartial(task);
        await this.requeue(task.id, {
          bytesTransferred: 0,
          etag: null,
          rangeRestarted: true,
          lastError: error.toFailure(),
        });
        return;
      case "retry":
        this.warn(
          `${task.id} failed (${error.category}), retry ${decision.retryCount}/${task.maxRetries} in ${decision.delayMs}ms`
        );
        if (decision.fromZero) {
          await this.executor.discardPartial(task);
        }
        await this.requeue(task.id, {
          retryCount: decision.retryCount,
          lastRetryAt: now,
          notBefore: now + decision.delayMs,
          lastError: error.toFailure(),
          ...(decision.fromZero ? { bytesTransferred: 0, etag: null } : {}),
        });
        return;
      case "fail": {
        const lastError: TransferFailure = decision.exhausted
          ? {
              category: "exhaustedRetries",
              message: `Gave up after ${task.retryCount + 1} failed attempts`,
              cause: error.toFailure(),
            }
          : error.toFailure();
        const failed = await this.commit(task.id, {
          status: "failed",
          retryCount: decision.exhausted ? task.retryCount + 1 : task.retryCount,
          lastRetryAt: now,
          lastError,
        });
        console.error(`[SCHEDULER] ${task.id} failed permanently: ${lastError.message}`);
        this.emit("failed", { ...failed });
        return;
      }
    }
  }

  // ============================================================================
  // NETWORK
  // ============================================================================

  private async handleNetworkChange(network: NetworkClass): Promise<void> {
    this.log(`Network changed to ${network}`);
    const pending: Promise<void>[] = [];

    for (const task of this.tasks.values()) {
      const allowed = satisfiesRequirement(task.networkRequirement, network);
      if (task.status === "active" && !allowed) {
        pending.push(this.pauseTask(task.id, "network"));
      } else if (task.status === "paused" && task.pausedBy === "network" && allowed) {
        pending.push(this.requeue(task.id, { pausedBy: null }));
      }
    }

    await Promise.all(pending);
    this.tick();
  }

  // ============================================================================
  // RECOVERY
  // ============================================================================

  private load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.loadFromStore();
    }
    return this.loading;
  }

  private async loadFromStore(): Promise<void> {
    const records = await this.store.list();
    for (const task of records) {
      this.tasks.set(task.id, task);
      if (task.status === "queued") this.queue.push(this.queueEntry(task));
    }
    this.log(`Loaded ${records.length} task record(s)`);
  }

  /**
   * Tasks left active by a previous run go back to the queue, keeping their
   * offset only when the partial file survived.
   */
  private async recover(): Promise<void> {
    const network = this.network.current();

    for (const task of [...this.tasks.values()]) {
      if (task.status === "active" && !this.active.has(task.id)) {
        const keep = task.bytesTransferred > 0 && (await this.executor.hasPartial(task));
        await this.requeue(task.id, keep ? {} : { bytesTransferred: 0, etag: null });
        this.log(
          keep
            ? `Recovered ${task.id}, resuming at ${formatFileSize(task.bytesTransferred)}`
            : `Recovered ${task.id}, restarting from byte 0`
        );
      } else if (
        task.status === "paused" &&
        task.pausedBy === "network" &&
        satisfiesRequirement(task.networkRequirement, network)
      ) {
        await this.requeue(task.id, { pausedBy: null });
      }
    }
  }

  // ============================================================================
  // STATE HELPERS
  // ============================================================================

  private async pauseTask(id: string, pausedBy: PausedBy): Promise<void> {
    const task = this.require(id);
    if (task.status === "paused") return;
    this.assertTransition(task, "paused");

    this.queue.remove(id);
    const saved = this.commit(id, { status: "paused", pausedBy });
    this.active.get(id)?.handle.requestPause();
    await saved;
    this.log(`Paused ${id} (${pausedBy})`);
    this.emitProgress(id);
  }

  private resolveDestination(destinationPath: string): string {
    if (this.downloadsDir === null || path.isAbsolute(destinationPath)) return destinationPath;
    return path.resolve(this.downloadsDir, destinationPath);
  }

  private async requeue(id: string, patch: TaskPatch): Promise<void> {
    const saved = this.commit(id, { ...patch, status: "queued" });
    const task = this.require(id);
    this.queue.push(this.queueEntry(task));
    await saved;
  }

  /**
   * Update the mirror synchronously, then persist only the given fields
   */
  private async commit(id: string, patch: TaskPatch): Promise<TransferTask> {
    const current = this.require(id);
    const updatedAt = this.clock.now();
    const next: TransferTask = { ...current, ...patch, updatedAt };
    this.tasks.set(id, next);
    await this.store.update(id, { ...patch, updatedAt });
    this.emit("task", { ...next });
    return next;
  }

  /**
   * Pull the executor-owned fields back from the store into the mirror
   */
  private async syncExecutorFields(id: string): Promise<TransferTask | null> {
    const stored = await this.store.get(id);
    const current = this.tasks.get(id);
    if (!stored || !current) return current ?? null;

    const next: TransferTask = {
      ...current,
      bytesTransferred: stored.bytesTransferred,
      totalSize: stored.totalSize,
      etag: stored.etag,
    };
    this.tasks.set(id, next);
    return next;
  }

  private queueEntry(task: TransferTask): QueueEntry {
    return { id: task.id, priority: task.priority, scheduledAt: task.notBefore, createdAt: task.createdAt };
  }

  private require(id: string): TransferTask {
    const task = this.tasks.get(id);
    if (!task) throw new TaskNotFoundError(id);
    return task;
  }

  private assertTransition(task: TransferTask, to: TransferStatus): void {
    if (!canTransition(task.status, to)) {
      throw new InvalidTransitionError(task.id, task.status, to);
    }
  }

  private emitProgress(id: string): void {
    const task = this.tasks.get(id);
    if (!task) return;
    this.emit("progress", {
      taskId: id,
      status: task.status,
      bytesTransferred: task.bytesTransferred,
      totalSize: task.totalSize,
      speed: 0,
      eta: null,
    });
  }

  private emitState(): void {
    this.emit("state", this.getState());
  }

  private log(message: string): void {
    if (!this.silent) {
      console.log(`[SCHEDULER] ${message}`);
    }
  }

  private warn(message: string): void {
    if (!this.silent) {
      console.warn(`[SCHEDULER] ${message}`);
    }
  }
}

// ============================================================================
// FACTORY
// ============================================================================

export function createDownloadScheduler(
  config: Config,
  options: Pick<SchedulerOptions, "store" | "executor" | "network" | "clock">
): DownloadScheduler {
  return new DownloadScheduler({
    ...options,
    maxConcurrent: config.scheduler.maxConcurrent,
    tickIntervalMs: config.scheduler.tickIntervalMs,
    maxRetries: config.scheduler.maxRetries,
    retryPolicy: createRetryPolicy(config.scheduler),
    cancelPolicy: config.transfer.cancelPolicy,
    downloadsDir: config.storage.downloadsDir,
    silent: config.logging.silent,
  });
}
