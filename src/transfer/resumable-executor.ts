/* src/transfer/resumable-executor.ts */

/**
 * Resumable single-file transfer.
 *
 * Bytes land in `<destination>.part` at their absolute offset and the file is
 * renamed into place only once the whole body has arrived. Every flushed chunk
 * is persisted as the new `bytesTransferred`, so a crash loses at most one
 * chunk and the next attempt resumes with `Range: bytes=<offset>-`.
 */

import { promises as fs } from "node:fs";
import type { FileHandle } from "node:fs/promises";
import * as path from "node:path";
import type { Readable } from "node:stream";
import type { TransferConfig } from "../../config";
import { type Clock, systemClock } from "../core/clock";
import { classifyError, localIOError, parseRetryAfter, TransferError, withLocalIO } from "../core/errors";
import {
  getHttpClient,
  type HttpClient,
  parseContentLength,
  parseContentRange,
  parseUnsatisfiedRange,
  type RangeResponse,
} from "../core/http-client";
import type { ProgressEvent, TransferTask } from "../core/types";
import { TIMEOUTS, TRANSFER_DEFAULTS } from "../constants";
import type { TaskStore } from "../storage/task-store";
import type { BandwidthThrottle } from "../throttle/bandwidth-throttle";
import type { RateLimiter } from "../throttle/rate-limiter";
import { formatEta, formatFileSize, formatSpeed } from "../utils";
import { SpeedTracker } from "./speed-tracker";

export type StopReason = "pause" | "cancel";

export type TransferOutcome =
  | { status: "completed"; bytesTransferred: number; totalSize: number }
  | { status: "paused"; bytesTransferred: number }
  | { status: "cancelled"; bytesTransferred: number }
  | { status: "failed"; bytesTransferred: number; error: TransferError };

export type ProgressListener = (event: ProgressEvent) => void;

/**
 * What the scheduler needs from an executor
 */
export interface TransferExecutor {
  execute(task: TransferTask, handle: TransferHandle, onProgress?: ProgressListener): Promise<TransferOutcome>;
  hasPartial(task: TransferTask): Promise<boolean>;
  discardPartial(task: TransferTask): Promise<void>;
}

export interface ExecutorOptions {
  store: TaskStore;
  httpClient?: HttpClient;
  rateLimiter?: RateLimiter;
  throttle?: BandwidthThrottle;
  clock?: Clock;
  chunkSize?: number;
  requestTimeoutMs?: number;
  partialSuffix?: string;
  silent?: boolean;
}

// ============================================================================
// TRANSFER HANDLE
// ============================================================================

/**
 * Control channel for one running transfer. Stop requests abort pending
 * network reads and throttle waits; a chunk already being written completes.
 */
export class TransferHandle {
  private controller = new AbortController();
  private reason: StopReason | null = null;

  constructor(readonly taskId: string) {}

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get stopReason(): StopReason | null {
    return this.reason;
  }

  requestPause(): void {
    this.stop("pause");
  }

  /** Cancel wins over an earlier pause */
  requestCancel(): void {
    this.stop("cancel");
  }

  private stop(reason: StopReason): void {
    if (this.reason === "cancel") return;
    this.reason = reason;
    if (!this.controller.signal.aborted) {
      this.controller.abort(
        new TransferError("cancelled", `Transfer ${reason === "pause" ? "paused" : "cancelled"}: ${this.taskId}`)
      );
    }
  }
}

// ============================================================================
// RESUMABLE TRANSFER EXECUTOR
// ============================================================================

export class ResumableTransferExecutor implements TransferExecutor {
  private store: TaskStore;
  private httpClient: HttpClient;
  private rateLimiter: RateLimiter | null;
  private throttle: BandwidthThrottle | null;
  private clock: Clock;
  private chunkSize: number;
  private requestTimeoutMs: number;
  private partialSuffix: string;
  private silent: boolean;

  constructor(options: ExecutorOptions) {
    this.store = options.store;
    this.httpClient = options.httpClient ?? getHttpClient();
    this.rateLimiter = options.rateLimiter ?? null;
    this.throttle = options.throttle ?? null;
    this.clock = options.clock ?? systemClock;
    this.chunkSize = options.chunkSize ?? TRANSFER_DEFAULTS.CHUNK_SIZE;
    this.requestTimeoutMs = options.requestTimeoutMs ?? TIMEOUTS.REQUEST;
    this.partialSuffix = options.partialSuffix ?? TRANSFER_DEFAULTS.PARTIAL_SUFFIX;
    this.silent = options.silent ?? false;
  }

  partialPath(task: Pick<TransferTask, "destinationPath">): string {
    return `${task.destinationPath}${this.partialSuffix}`;
  }

  /**
   * Run one attempt. Transfer failures resolve as a `failed` outcome.
   */
  async execute(task: TransferTask, handle: TransferHandle, onProgress?: ProgressListener): Promise<TransferOutcome> {
    const tempPath = this.partialPath(task);
    const { signal } = handle;
    const tracker = new SpeedTracker(this.clock);
    let position = 0;
    let totalSize = task.totalSize;
    let file: FileHandle | null = null;
    let body: Readable | null = null;
    let permitHeld = false;

    const report = () => {
      onProgress?.({
        taskId: task.id,
        status: "active",
        bytesTransferred: position,
        totalSize,
        speed: tracker.current,
        eta: tracker.eta(position, totalSize),
      });
    };

    try {
      await withLocalIO("Create destination directory", () =>
        fs.mkdir(path.dirname(task.destinationPath), { recursive: true })
      );
      position = await this.prepareOffset(task, tempPath);

      if (this.rateLimiter) {
        await this.rateLimiter.acquire(signal);
        permitHeld = true;
      }

      this.log(`Starting ${task.id} from byte ${position}: ${task.url}`);
      const response = await this.httpClient.openRange(task.url, {
        offset: position,
        ifRange: position > 0 ? task.etag : null,
        timeout: this.requestTimeoutMs,
        signal,
      });
      body = response.body;

      const accepted = this.acceptResponse(task, response, position);
      if (accepted.kind === "complete") {
        response.body.resume();
        return await this.finalize(task, tempPath, position);
      }

      if (accepted.offset !== position) {
        this.log(`Server ignored the range for ${task.id}, restarting from byte 0`);
        position = 0;
      }
      totalSize = accepted.totalSize;

      await this.store.update(task.id, { bytesTransferred: position, totalSize, etag: accepted.etag });
      report();

      const opened = await withLocalIO("Open partial file", () => fs.open(tempPath, position === 0 ? "w" : "r+"));
      file = opened;

      const chunks = this.httpClient.readChunks(response.body, this.chunkSize, {
        timeout: this.requestTimeoutMs,
        signal,
      });

      for await (const chunk of chunks) {
        if (totalSize !== null && position + chunk.length > totalSize) {
          throw new TransferError(
            "httpError",
            `Server sent more than the announced ${totalSize} bytes`,
            { statusCode: response.statusCode }
          );
        }

        if (this.throttle) {
          await this.throttle.consume(chunk.length, signal);
        }

        const offset = position;
        await withLocalIO("Write chunk", () => opened.write(chunk, 0, chunk.length, offset));
        position += chunk.length;

        await this.store.update(task.id, { bytesTransferred: position });
        tracker.record(chunk.length);
        report();

        if (handle.stopReason) break;
      }

      if (handle.stopReason) {
        return this.stopped(handle.stopReason, task, position);
      }

      if (totalSize !== null && position < totalSize) {
        throw new TransferError(
          "network",
          `Connection closed early: received ${position} of ${totalSize} bytes`
        );
      }

      file = null;
      await withLocalIO("Close partial file", () => opened.close());
      return await this.finalize(task, tempPath, position);
    } catch (error) {
      if (handle.stopReason) {
        return this.stopped(handle.stopReason, task, position);
      }

      const failure = classifyError(error);
      if (!this.silent) {
        console.error(`[TRANSFER] ${task.id} failed (${failure.category}): ${failure.message}`);
      }
      return { status: "failed", bytesTransferred: position, error: failure };
    } finally {
      // a body nobody read to the end still holds the socket
      if (body && !body.readableEnded && !body.destroyed) {
        body.destroy();
      }
      if (file) {
        await file.close().catch((error: unknown) => {
          console.warn(`[TRANSFER] Could not close partial file for ${task.id}: ${String(error)}`);
        });
      }
      if (permitHeld && this.rateLimiter) {
        this.rateLimiter.release();
      }
    }
  }

  async hasPartial(task: TransferTask): Promise<boolean> {
    return (await this.partialSize(this.partialPath(task))) !== null;
  }

  async discardPartial(task: TransferTask): Promise<void> {
    const tempPath = this.partialPath(task);
    await withLocalIO("Discard partial file", () => fs.rm(tempPath, { force: true }));
    this.log(`Discarded partial file ${tempPath}`);
  }

  // ============================================================================
  // RESPONSE HANDLING
  // ============================================================================

  private acceptResponse(
    task: TransferTask,
    response: RangeResponse,
    offset: number
  ):
    | { kind: "complete" }
    | { kind: "stream"; offset: number; totalSize: number | null; etag: string | null } {
    const { statusCode, headers } = response;
    const etag = strongEtag(headers.etag);
    const length = parseContentLength(headers["content-length"]);

    if (statusCode === 206) {
      const range = parseContentRange(headers["content-range"]);
      if (!range || range.start !== offset) {
        response.body.resume();
        throw new TransferError(
          "rangeNotSatisfiable",
          `Server answered range ${offset}- with ${headers["content-range"] ?? "no Content-Range"}`,
          { statusCode }
        );
      }
      const totalSize = range.total ?? (length !== null ? offset + length : task.totalSize);
      return { kind: "stream", offset, totalSize, etag: etag ?? task.etag };
    }

    if (statusCode === 200) {
      return { kind: "stream", offset: 0, totalSize: length, etag };
    }

    response.body.resume();

    if (statusCode === 416 && offset > 0) {
      const total = parseUnsatisfiedRange(headers["content-range"]) ?? task.totalSize;
      if (total !== null && total === offset) {
        return { kind: "complete" };
      }
      throw new TransferError("rangeNotSatisfiable", `Range ${offset}- not satisfiable for ${task.url}`, {
        statusCode,
      });
    }

    throw new TransferError("httpError", `HTTP ${statusCode} for ${task.url}`, {
      statusCode,
      retryAfterMs: parseRetryAfter(headers["retry-after"], this.clock.now()),
    });
  }

  private async finalize(task: TransferTask, tempPath: string, size: number): Promise<TransferOutcome> {
    const onDisk = await this.partialSize(tempPath);
    if (onDisk !== size) {
      throw new TransferError("localIO", `Partial file holds ${onDisk ?? 0} bytes, expected ${size}`);
    }

    await withLocalIO("Move completed file into place", () => fs.rename(tempPath, task.destinationPath));
    await this.store.update(task.id, { bytesTransferred: size, totalSize: size });
    this.log(`Completed ${task.id}: ${formatFileSize(size)} -> ${task.destinationPath}`);
    return { status: "completed", bytesTransferred: size, totalSize: size };
  }

  private stopped(reason: StopReason, task: TransferTask, position: number): TransferOutcome {
    this.log(`${reason === "pause" ? "Paused" : "Cancelled"} ${task.id} at byte ${position}`);
    return { status: reason === "pause" ? "paused" : "cancelled", bytesTransferred: position };
  }

  // ============================================================================
  // PARTIAL FILE
  // ============================================================================

  /**
   * Resume offset: the persisted count, clamped to what the partial file
   * actually holds. Anything past it is cut off.
   */
  private async prepareOffset(task: TransferTask, tempPath: string): Promise<number> {
    const size = await this.partialSize(tempPath);
    if (size === null) return 0;

    const offset = Math.min(task.bytesTransferred, size);
    if (size !== offset) {
      await withLocalIO("Truncate partial file", () => fs.truncate(tempPath, offset));
    }
    return offset;
  }

  private async partialSize(tempPath: string): Promise<number | null> {
    try {
      const stats = await fs.stat(tempPath);
      return stats.size;
    } catch (error) {
      if (typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT") {
        return null;
      }
      throw localIOError("Inspect partial file", error);
    }
  }

  private log(message: string): void {
    if (!this.silent) {
      console.log(`[TRANSFER] ${message}`);
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * If-Range only accepts strong validators
 */
function strongEtag(value: string | undefined): string | null {
  if (!value || value.startsWith("W/")) return null;
  return value;
}

/**
 * Describe a progress event for log output
 */
export function describeProgress(event: ProgressEvent): string {
  const total = event.totalSize !== null ? formatFileSize(event.totalSize) : "unknown size";
  return `${event.taskId}: ${formatFileSize(event.bytesTransferred)} of ${total} at ${formatSpeed(event.speed)}, ETA ${formatEta(event.eta)}`;
}

/**
 * Create an executor from configuration
 */
export function createTransferExecutor(
  config: TransferConfig,
  options: Omit<ExecutorOptions, "chunkSize" | "requestTimeoutMs" | "partialSuffix">
): ResumableTransferExecutor {
  return new ResumableTransferExecutor({
    ...options,
    chunkSize: config.chunkSize,
    requestTimeoutMs: config.requestTimeoutMs,
    partialSuffix: config.partialSuffix,
  });
}
