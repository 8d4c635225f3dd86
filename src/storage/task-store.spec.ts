/* src/storage/task-store.spec.ts */

import { promises as fs } from "node:fs";
import * as path from "node:path";
import { expect, test } from "@playwright/test";
import { ManualClock } from "../core/clock";
import { TaskNotFoundError } from "../core/errors";
import { makeTask, makeTempDir, removeDir, TEST_EPOCH } from "../testing/fixtures";
import { FileTaskStore, KeyedSerialQueue, MemoryTaskStore, type TaskStore } from "./task-store";

interface StoreCase {
  name: string;
  create(clock: ManualClock): Promise<{ store: TaskStore; cleanup(): Promise<void> }>;
}

const cases: StoreCase[] = [
  {
    name: "FileTaskStore",
    async create(clock) {
      const dir = await makeTempDir("task-store");
      return { store: new FileTaskStore(dir, { clock, silent: true }), cleanup: () => removeDir(dir) };
    },
  },
  {
    name: "MemoryTaskStore",
    async create(clock) {
      return { store: new MemoryTaskStore({ clock }), cleanup: async () => {} };
    },
  },
];

for (const storeCase of cases) {
  test.describe(storeCase.name, () => {
    let clock: ManualClock;
    let store: TaskStore;
    let cleanup: () => Promise<void>;

    test.beforeEach(async () => {
      clock = new ManualClock(TEST_EPOCH);
      ({ store, cleanup } = await storeCase.create(clock));
    });

    test.afterEach(async () => {
      await cleanup();
    });

    test("stores and lists records in creation order", async () => {
      await store.put(makeTask({ id: "b", createdAt: TEST_EPOCH + 2 }));
      await store.put(makeTask({ id: "a", createdAt: TEST_EPOCH + 1, status: "paused", pausedBy: "user" }));
      await store.put(makeTask({ id: "c", createdAt: TEST_EPOCH + 2 }));

      expect((await store.list()).map((task) => task.id)).toEqual(["a", "b", "c"]);
      expect((await store.list({ status: "paused" })).map((task) => task.id)).toEqual(["a"]);
      expect((await store.list({ status: ["queued"] })).map((task) => task.id)).toEqual(["b", "c"]);
      expect(await store.get("a")).toEqual(
        makeTask({ id: "a", createdAt: TEST_EPOCH + 1, status: "paused", pausedBy: "user" })
      );
      expect(await store.get("missing")).toBeNull();
    });

    test("update merges the patch and stamps updatedAt", async () => {
      await store.put(makeTask());
      await clock.advance(250);

      const updated = await store.update("task-1", { bytesTransferred: 1024, etag: '"v1"' });

      expect(updated.bytesTransferred).toBe(1024);
      expect(updated.etag).toBe('"v1"');
      expect(updated.updatedAt).toBe(TEST_EPOCH + 250);
      expect(await store.get("task-1")).toEqual(updated);
    });

    test("updates to one task apply in call order", async () => {
      await store.put(makeTask());
      await Promise.all(
        Array.from({ length: 20 }, (_, i) => store.update("task-1", { bytesTransferred: i * 10 }))
      );
      expect((await store.get("task-1"))?.bytesTransferred).toBe(190);
    });

    test("concurrent writers keep their own fields", async () => {
      await store.put(makeTask());
      await Promise.all([
        store.update("task-1", { bytesTransferred: 4096, totalSize: 8192 }),
        store.update("task-1", { priority: "high" }),
        store.update("task-1", { etag: '"abc"' }),
      ]);

      const task = await store.get("task-1");
      expect(task).toMatchObject({ bytesTransferred: 4096, totalSize: 8192, priority: "high", etag: '"abc"' });
    });

    test("rejects records that break the size invariant", async () => {
      await store.put(makeTask({ totalSize: 100, bytesTransferred: 50 }));

      await expect(store.update("task-1", { bytesTransferred: 150 })).rejects.toThrow(
        "bytesTransferred cannot exceed totalSize"
      );
      expect((await store.get("task-1"))?.bytesTransferred).toBe(50);
      await expect(store.put(makeTask({ id: "bad", totalSize: 10, bytesTransferred: 11 }))).rejects.toThrow();
    });

    test("update of an unknown task fails", async () => {
      await expect(store.update("ghost", { priority: "low" })).rejects.toBeInstanceOf(TaskNotFoundError);
    });

    test("delete reports whether a record existed", async () => {
      await store.put(makeTask());
      expect(await store.delete("task-1")).toBe(true);
      expect(await store.delete("task-1")).toBe(false);
      expect(await store.list()).toEqual([]);
    });
  });
}

test.describe("FileTaskStore on disk", () => {
  let dir: string;

  test.beforeEach(async () => {
    dir = await makeTempDir("task-store-disk");
  });

  test.afterEach(async () => {
    await removeDir(dir);
  });

  test("writes one JSON file per task and leaves no temp files", async () => {
    const store = new FileTaskStore(dir, { silent: true });
    await store.put(makeTask({ id: "one" }));
    await Promise.all(Array.from({ length: 10 }, (_, i) => store.update("one", { bytesTransferred: i })));

    expect((await fs.readdir(dir)).sort()).toEqual(["one.json"]);
    const raw = JSON.parse(await fs.readFile(path.join(dir, "one.json"), "utf8"));
    expect(raw.bytesTransferred).toBe(9);
  });

  test("records survive a new store instance", async () => {
    await new FileTaskStore(dir, { silent: true }).put(makeTask({ id: "durable", bytesTransferred: 42 }));
    const reopened = new FileTaskStore(dir, { silent: true });
    expect((await reopened.get("durable"))?.bytesTransferred).toBe(42);
  });

  test("skips unreadable and invalid records", async () => {
    const store = new FileTaskStore(dir, { silent: true });
    await store.put(makeTask({ id: "good" }));
    await fs.writeFile(path.join(dir, "broken.json"), "{not json", "utf8");
    await fs.writeFile(path.join(dir, "invalid.json"), JSON.stringify({ id: "invalid" }), "utf8");
    await fs.writeFile(path.join(dir, "notes.txt"), "ignored", "utf8");

    expect((await store.list()).map((task) => task.id)).toEqual(["good"]);
    expect(await store.get("broken")).toBeNull();
  });

  test("refuses ids that are not plain file names", async () => {
    const store = new FileTaskStore(dir, { silent: true });
    await expect(store.get("../escape")).rejects.toThrow();
    await expect(store.delete("a/b")).rejects.toThrow();
  });
});

test.describe("KeyedSerialQueue", () => {
  test("runs one key at a time and forgets finished keys", async () => {
    const queue = new KeyedSerialQueue();
    const order: string[] = [];
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });

    const first = queue.run("a", async () => {
      await gate;
      order.push("a1");
    });
    const second = queue.run("a", async () => {
      order.push("a2");
    });
    const other = queue.run("b", async () => {
      order.push("b1");
    });

    await other;
    expect(order).toEqual(["b1"]);
    release();
    await Promise.all([first, second]);
    expect(order).toEqual(["b1", "a1", "a2"]);

    await Promise.resolve();
    await new Promise((resolve) => setImmediate(resolve));
    expect(queue.pendingKeys).toBe(0);
  });

  test("a failed operation does not block the next one", async () => {
    const queue = new KeyedSerialQueue();
    const failed = queue.run("k", async () => {
      throw new Error("write failed");
    });
    await expect(failed).rejects.toThrow("write failed");
    await expect(queue.run("k", async () => "next")).resolves.toBe("next");
  });
});
