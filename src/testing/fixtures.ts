/* src/testing/fixtures.ts */

import { promises as fs } from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { TransferTask } from "../core/types";

export const TEST_EPOCH = 1_700_000_000_000;

export function makeTask(overrides: Partial<TransferTask> = {}): TransferTask {
  return {
    id: "task-1",
    url: "https://downloads.example.com/file.bin",
    destinationPath: "/tmp/transfer-engine-tests/file.bin",
    totalSize: null,
    bytesTransferred: 0,
    status: "queued",
    priority: "normal",
    notBefore: null,
    networkRequirement: "any",
    retryCount: 0,
    lastRetryAt: null,
    maxRetries: 5,
    createdAt: TEST_EPOCH,
    updatedAt: TEST_EPOCH,
    startedAt: null,
    completedAt: null,
    etag: null,
    lastError: null,
    pausedBy: null,
    rangeRestarted: false,
    ...overrides,
  };
}

export function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export function removeDir(dir: string): Promise<void> {
  return fs.rm(dir, { recursive: true, force: true });
}

export async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
