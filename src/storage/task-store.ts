/* src/storage/task-store.ts */

/**
 * Durable task persistence.
 * FileTaskStore keeps one JSON record per task and replaces it atomically;
 * MemoryTaskStore serves embedding and tests. Writes to the same task are
 * serialized, writes to different tasks are not.
 */

import { promises as fs } from "node:fs";
import * as path from "node:path";
import { TaskId, TransferTaskSchema } from "../../schemas";
import { type Clock, systemClock } from "../core/clock";
import { localIOError, TaskNotFoundError, withLocalIO } from "../core/errors";
import type { TaskPatch, TransferStatus, TransferTask } from "../core/types";
import { errorMessage } from "../utils";

export interface TaskFilter {
  status?: TransferStatus | readonly TransferStatus[];
}

export interface TaskStore {
  get(id: string): Promise<TransferTask | null>;
  /** Records ordered by creation time */
  list(filter?: TaskFilter): Promise<TransferTask[]>;
  put(task: TransferTask): Promise<void>;
  /** Read-modify-write of one record; rejects with TaskNotFoundError for unknown ids */
  update(id: string, patch: TaskPatch): Promise<TransferTask>;
  delete(id: string): Promise<boolean>;
}

export interface TaskStoreOptions {
  clock?: Clock;
  silent?: boolean;
}

// ============================================================================
// SHARED HELPERS
// ============================================================================

/**
 * Runs operations one at a time per key
 */
export class KeyedSerialQueue {
  private tails = new Map<string, Promise<void>>();

  run<T>(key: string, operation: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(operation);
    const tail: Promise<void> = result
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.tails.get(key) === tail) this.tails.delete(key);
      });
    this.tails.set(key, tail);
    return result;
  }

  get pendingKeys(): number {
    return this.tails.size;
  }
}

function applyPatch(current: TransferTask, patch: TaskPatch, now: number): TransferTask {
  return TransferTaskSchema.parse({ ...current, ...patch, id: current.id, updatedAt: patch.updatedAt ?? now });
}

function matchesFilter(task: TransferTask, filter?: TaskFilter): boolean {
  if (!filter?.status) return true;
  const wanted = filter.status;
  return typeof wanted === "string" ? task.status === wanted : wanted.includes(task.status);
}

function byCreation(a: TransferTask, b: TransferTask): number {
  return a.createdAt - b.createdAt || a.id.localeCompare(b.id);
}

function isMissingFile(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

// ============================================================================
// FILE TASK STORE
// ============================================================================

export class FileTaskStore implements TaskStore {
  private directory: string;
  private clock: Clock;
  private silent: boolean;
  private queue = new KeyedSerialQueue();
  private ready: Promise<void> | null = null;
  private tmpCounter = 0;

  constructor(directory: string, options: TaskStoreOptions = {}) {
    this.directory = directory;
    this.clock = options.clock ?? systemClock;
    this.silent = options.silent ?? false;
  }

  async get(id: string): Promise<TransferTask | null> {
    await this.ensureDirectory();
    return this.readRecord(this.recordPath(id));
  }

  async list(filter?: TaskFilter): Promise<TransferTask[]> {
    await this.ensureDirectory();
    const entries = await withLocalIO("List task records", () => fs.readdir(this.directory));
    const tasks: TransferTask[] = [];

    for (const entry of entries) {
      if (!entry.endsWith(".json")) continue;
      const task = await this.readRecord(path.join(this.directory, entry));
      if (task && matchesFilter(task, filter)) tasks.push(task);
    }

    return tasks.sort(byCreation);
  }

  async put(task: TransferTask): Promise<void> {
    const record = TransferTaskSchema.parse(task);
    await this.ensureDirectory();
    await this.queue.run(record.id, () => this.writeRecord(record));
  }

  async update(id: string, patch: TaskPatch): Promise<TransferTask> {
    await this.ensureDirectory();
    return this.queue.run(id, async () => {
      const current = await this.readRecord(this.recordPath(id));
      if (!current) throw new TaskNotFoundError(id);
      const next = applyPatch(current, patch, this.clock.now());
      await this.writeRecord(next);
      return next;
    });
  }

  async delete(id: string): Promise<boolean> {
    await this.ensureDirectory();
    const file = this.recordPath(id);
    return this.queue.run(id, async () => {
      try {
        await fs.unlink(file);
        return true;
      } catch (error) {
        if (isMissingFile(error)) return false;
        throw localIOError(`Delete task record ${id}`, error);
      }
    });
  }

  // ============================================================================
  // FILE OPERATIONS
  // ============================================================================

  private ensureDirectory(): Promise<void> {
    if (!this.ready) {
      this.ready = withLocalIO("Create state directory", async () => {
        await fs.mkdir(this.directory, { recursive: true });
      });
    }
    return this.ready;
  }

  private recordPath(id: string): string {
    return path.join(this.directory, `${TaskId.parse(id)}.json`);
  }

  private async readRecord(file: string): Promise<TransferTask | null> {
    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw localIOError(`Read task record ${path.basename(file)}`, error);
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      this.warn(`Skipping unreadable record ${path.basename(file)}: ${errorMessage(error)}`);
      return null;
    }

    const result = TransferTaskSchema.safeParse(data);
    if (!result.success) {
      this.warn(`Skipping invalid record ${path.basename(file)}: ${result.error.issues[0]?.message ?? "schema mismatch"}`);
      return null;
    }
    return result.data;
  }

  private async writeRecord(task: TransferTask): Promise<void> {
    const file = this.recordPath(task.id);
    const tmp = `${file}.${process.pid}.${++this.tmpCounter}.tmp`;

    await withLocalIO(`Write task record ${task.id}`, async () => {
      try {
        await fs.writeFile(tmp, `${JSON.stringify(task, null, 2)}\n`, "utf8");
        await fs.rename(tmp, file);
      } catch (error) {
        await fs.rm(tmp, { force: true });
        throw error;
      }
    });
  }

  private warn(message: string): void {
    if (!this.silent) {
      console.warn(`[STORE] ${message}`);
    }
  }
}

// ============================================================================
// MEMORY TASK STORE
// ============================================================================

export class MemoryTaskStore implements TaskStore {
  private records = new Map<string, TransferTask>();
  private clock: Clock;
  private queue = new KeyedSerialQueue();

  constructor(options: TaskStoreOptions = {}) {
    this.clock = options.clock ?? systemClock;
  }

  async get(id: string): Promise<TransferTask | null> {
    const task = this.records.get(id);
    return task ? structuredClone(task) : null;
  }

  async list(filter?: TaskFilter): Promise<TransferTask[]> {
    return [...this.records.values()]
      .filter((task) => matchesFilter(task, filter))
      .sort(byCreation)
      .map((task) => structuredClone(task));
  }

  async put(task: TransferTask): Promise<void> {
    const record = TransferTaskSchema.parse(task);
    await this.queue.run(record.id, async () => {
      this.records.set(record.id, structuredClone(record));
    });
  }

  async update(id: string, patch: TaskPatch): Promise<TransferTask> {
    return this.queue.run(id, async () => {
      const current = this.records.get(id);
      if (!current) throw new TaskNotFoundError(id);
      const next = applyPatch(current, patch, this.clock.now());
      this.records.set(id, next);
      return structuredClone(next);
    });
  }

  async delete(id: string): Promise<boolean> {
    return this.queue.run(id, async () => this.records.delete(id));
  }

  get size(): number {
    return this.records.size;
  }
}
