/* src/scheduler/download-scheduler.spec.ts */

import { expect, test } from "@playwright/test";
import { flushMicrotasks, ManualClock } from "../core/clock";
import { InvalidTransitionError, TaskNotFoundError, TransferError } from "../core/errors";
import type { EnqueueRequest, ProgressEvent, TransferTask } from "../core/types";
import { MemoryTaskStore } from "../storage/task-store";
import { FakeExecutor } from "../testing/fake-executor";
import { makeTask, TEST_EPOCH } from "../testing/fixtures";
import { DownloadScheduler, type SchedulerOptions } from "./download-scheduler";
import { StaticNetworkMonitor } from "./network-monitor";

const networkError = () => new TransferError("network", "ECONNRESET: socket hang up");

function request(id: string, overrides: Partial<EnqueueRequest> = {}): EnqueueRequest {
  return {
    id,
    url: `https://downloads.example.com/${id}.bin`,
    destinationPath: `/tmp/transfer-engine-tests/${id}.bin`,
    ...overrides,
  };
}

function setup(options: Partial<SchedulerOptions> = {}) {
  const clock = new ManualClock(TEST_EPOCH);
  const store = new MemoryTaskStore({ clock });
  const executor = new FakeExecutor();
  const network = new StaticNetworkMonitor("unmetered");
  const scheduler = new DownloadScheduler({
    store,
    executor,
    network,
    clock,
    maxConcurrent: 1,
    tickIntervalMs: 1000,
    silent: true,
    ...options,
  });
  const failed: TransferTask[] = [];
  scheduler.on("failed", (task) => failed.push(task));
  return { clock, store, executor, network, scheduler, failed };
}

function statusOf(scheduler: DownloadScheduler, id: string) {
  return scheduler.get(id)?.status;
}

test.describe("DownloadScheduler ordering", () => {
  test("runs high before normal before low", async () => {
    const { executor, scheduler } = setup();
    await scheduler.enqueue(request("low", { priority: "low" }));
    await scheduler.enqueue(request("normal"));
    await scheduler.enqueue(request("high", { priority: "high" }));

    await scheduler.start();
    await flushMicrotasks();
    expect(executor.calls).toEqual(["high"]);

    executor.complete("high");
    await flushMicrotasks();
    executor.complete("normal");
    await flushMicrotasks();
    executor.complete("low");
    await flushMicrotasks();

    expect(executor.calls).toEqual(["high", "normal", "low"]);
    expect(scheduler.list().map((task) => [task.id, task.status])).toEqual([
      ["high", "completed"],
      ["low", "completed"],
      ["normal", "completed"],
    ]);
  });

  test("removing the high task before start lets normal run first", async () => {
    const { executor, scheduler } = setup();
    await scheduler.enqueue(request("low", { priority: "low" }));
    await scheduler.enqueue(request("normal"));
    await scheduler.enqueue(request("high", { priority: "high" }));
    await scheduler.remove("high");

    await scheduler.start();
    await flushMicrotasks();
    expect(executor.calls).toEqual(["normal"]);

    executor.complete("normal");
    await flushMicrotasks();

    expect(executor.calls).toEqual(["normal", "low"]);
    expect(statusOf(scheduler, "high")).toBe("cancelled");
    expect(executor.discarded).toEqual(["high"]);
  });

  test("a scheduled task sorts ahead of an unscheduled one in its tier", async () => {
    const { clock, scheduler } = setup();
    await scheduler.enqueue(request("plain"));
    await clock.advance(1000);
    await scheduler.enqueue(request("scheduled", { notBefore: TEST_EPOCH + 500 }));

    expect(scheduler.queueOrder()).toEqual(["scheduled", "plain"]);
  });

  test("a higher-priority arrival does not preempt a running transfer", async () => {
    const { executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("first", { priority: "low" }));
    await flushMicrotasks();
    await scheduler.enqueue(request("urgent", { priority: "high" }));
    await flushMicrotasks();

    expect(executor.running).toEqual(["first"]);
    expect(statusOf(scheduler, "urgent")).toBe("queued");

    executor.complete("first");
    await flushMicrotasks();
    expect(executor.running).toEqual(["urgent"]);
  });

  test("setPriority re-sorts the queue", async () => {
    const { scheduler } = setup();
    await scheduler.enqueue(request("a"));
    await scheduler.enqueue(request("b"));
    await scheduler.enqueue(request("c", { priority: "low" }));
    expect(scheduler.queueOrder()).toEqual(["a", "b", "c"]);

    await scheduler.setPriority("c", "high");

    expect(scheduler.queueOrder()).toEqual(["c", "a", "b"]);
    expect(scheduler.get("c")?.priority).toBe("high");
    await expect(scheduler.setPriority("missing", "low")).rejects.toBeInstanceOf(TaskNotFoundError);
  });

  test("respects notBefore", async () => {
    const { clock, executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("later", { notBefore: TEST_EPOCH + 2500 }));
    await flushMicrotasks();
    expect(executor.calls).toEqual([]);

    await clock.advance(2000);
    expect(executor.calls).toEqual([]);
    await clock.advance(1000);
    expect(executor.calls).toEqual(["later"]);
  });
});

test.describe("DownloadScheduler retries", () => {
  test("backs off exponentially and fails after the retry budget", async () => {
    const { clock, executor, scheduler, failed } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("flaky"));
    await flushMicrotasks();

    executor.fail("flaky", networkError());
    await flushMicrotasks();
    expect(scheduler.get("flaky")).toMatchObject({
      status: "queued",
      retryCount: 1,
      lastRetryAt: TEST_EPOCH,
      notBefore: TEST_EPOCH + 4000,
      lastError: { category: "network", message: "ECONNRESET: socket hang up" },
    });

    await clock.advance(3999);
    expect(executor.calls).toHaveLength(1);
    await clock.advance(1);
    expect(executor.calls).toHaveLength(2);

    for (const delay of [8000, 16000, 32000]) {
      executor.fail("flaky", networkError());
      await flushMicrotasks();
      await clock.advance(delay);
    }
    expect(executor.calls).toHaveLength(5);

    executor.fail("flaky", networkError());
    await flushMicrotasks();

    expect(scheduler.get("flaky")).toMatchObject({
      status: "failed",
      retryCount: 5,
      lastError: {
        category: "exhaustedRetries",
        message: "Gave up after 5 failed attempts",
        cause: { category: "network", message: "ECONNRESET: socket hang up" },
      },
    });
    expect(failed.map((task) => task.id)).toEqual(["flaky"]);

    await clock.advance(120000);
    expect(executor.calls).toHaveLength(5);
  });

  test("Retry-After pushes the next attempt out", async () => {
    const { clock, executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("busy"));
    await flushMicrotasks();

    executor.fail("busy", new TransferError("httpError", "HTTP 503", { statusCode: 503, retryAfterMs: 30000 }));
    await flushMicrotasks();
    expect(scheduler.get("busy")?.notBefore).toBe(TEST_EPOCH + 30000);

    await clock.advance(29000);
    expect(executor.calls).toHaveLength(1);
    await clock.advance(1000);
    expect(executor.calls).toHaveLength(2);
  });

  test("client errors fail immediately", async () => {
    const { executor, scheduler, failed } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("missing"));
    await flushMicrotasks();

    executor.fail("missing", new TransferError("httpError", "HTTP 404", { statusCode: 404 }));
    await flushMicrotasks();

    expect(scheduler.get("missing")).toMatchObject({
      status: "failed",
      retryCount: 0,
      lastError: { category: "httpError", message: "HTTP 404", statusCode: 404 },
    });
    expect(failed).toHaveLength(1);
    expect(scheduler.getState().failed).toBe(1);
  });

  test("an unsatisfiable range restarts once from zero", async () => {
    const { store, executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("shrunk"));
    await flushMicrotasks();
    executor.partials.add("shrunk");

    executor.fail(
      "shrunk",
      new TransferError("rangeNotSatisfiable", "Range 5000- not satisfiable", { statusCode: 416 })
    );
    await flushMicrotasks();

    expect(executor.discarded).toEqual(["shrunk"]);
    expect(executor.calls).toEqual(["shrunk", "shrunk"]);
    expect(await store.get("shrunk")).toMatchObject({ rangeRestarted: true, bytesTransferred: 0, retryCount: 0 });

    executor.fail(
      "shrunk",
      new TransferError("rangeNotSatisfiable", "Range 0- not satisfiable", { statusCode: 416 })
    );
    await flushMicrotasks();

    expect(scheduler.get("shrunk")).toMatchObject({ status: "queued", retryCount: 1, notBefore: TEST_EPOCH + 4000 });
    expect(executor.discarded).toEqual(["shrunk", "shrunk"]);
  });

  test("a second unsatisfiable range spends a retry and starts again from zero", async () => {
    const { store, executor, scheduler } = setup();
    await store.put(makeTask({ id: "resumed", bytesTransferred: 5000, etag: '"v1"', rangeRestarted: true }));
    executor.partials.add("resumed");
    await scheduler.start();
    await flushMicrotasks();

    executor.fail(
      "resumed",
      new TransferError("rangeNotSatisfiable", "Range 5000- not satisfiable", { statusCode: 416 })
    );
    await flushMicrotasks();

    expect(executor.discarded).toEqual(["resumed"]);
    expect(executor.partials.has("resumed")).toBe(false);
    expect(await store.get("resumed")).toMatchObject({
      status: "queued",
      bytesTransferred: 0,
      etag: null,
      retryCount: 1,
      notBefore: TEST_EPOCH + 4000,
    });
  });

  test("retry gives a failed task a fresh budget", async () => {
    const { executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("again"));
    await flushMicrotasks();
    executor.fail("again", new TransferError("httpError", "HTTP 404", { statusCode: 404 }));
    await flushMicrotasks();

    await scheduler.retry("again");
    await flushMicrotasks();

    expect(scheduler.get("again")).toMatchObject({ status: "active", retryCount: 0, lastError: null });
    expect(executor.calls).toEqual(["again", "again"]);
    await expect(scheduler.retry("again")).rejects.toBeInstanceOf(InvalidTransitionError);
  });
});

test.describe("DownloadScheduler control", () => {
  test("pause stops a transfer and resume queues it again", async () => {
    const { executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("p"));
    await flushMicrotasks();

    await scheduler.pause("p");
    await flushMicrotasks();
    expect(scheduler.get("p")).toMatchObject({ status: "paused", pausedBy: "user" });
    expect(executor.running).toEqual([]);
    expect(scheduler.getState()).toMatchObject({ active: 0, paused: 1 });

    await scheduler.resume("p");
    await flushMicrotasks();
    expect(statusOf(scheduler, "p")).toBe("active");
    expect(executor.calls).toEqual(["p", "p"]);

    // resuming something already running is a no-op
    await scheduler.resume("p");
    expect(executor.calls).toEqual(["p", "p"]);
  });

  test("pauseAll and resumeAll cover queued and active tasks", async () => {
    const { executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("a"));
    await scheduler.enqueue(request("b"));
    await flushMicrotasks();

    await scheduler.pauseAll();
    await flushMicrotasks();
    expect(scheduler.list("paused").map((task) => task.id)).toEqual(["a", "b"]);
    expect(executor.running).toEqual([]);

    await scheduler.resumeAll();
    await flushMicrotasks();
    expect(executor.running).toEqual(["a"]);
    expect(statusOf(scheduler, "b")).toBe("queued");
  });

  test("remove cancels a running transfer and applies the cancel policy", async () => {
    const { executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("gone"));
    await flushMicrotasks();

    await scheduler.remove("gone");

    expect(statusOf(scheduler, "gone")).toBe("cancelled");
    expect(executor.running).toEqual([]);
    expect(executor.discarded).toEqual(["gone"]);

    // cancelling twice is a no-op
    await scheduler.remove("gone");
    expect(executor.discarded).toEqual(["gone"]);
  });

  test("the retain policy keeps partial data", async () => {
    const { executor, scheduler } = setup({ cancelPolicy: "retain" });
    await scheduler.start();
    await scheduler.enqueue(request("kept"));
    await flushMicrotasks();

    await scheduler.remove("kept");

    expect(statusOf(scheduler, "kept")).toBe("cancelled");
    expect(executor.discarded).toEqual([]);
  });

  test("finished tasks cannot be cancelled or resumed", async () => {
    const { executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("done"));
    await flushMicrotasks();
    executor.complete("done");
    await flushMicrotasks();

    await expect(scheduler.remove("done")).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(scheduler.resume("done")).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(scheduler.pause("done")).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(scheduler.pause("nope")).rejects.toBeInstanceOf(TaskNotFoundError);
  });

  test("purge deletes finished records", async () => {
    const { store, executor, scheduler } = setup({ maxConcurrent: 2 });
    await scheduler.start();
    await scheduler.enqueue(request("ok"));
    await scheduler.enqueue(request("broken"));
    await flushMicrotasks();

    await expect(scheduler.purge("ok")).rejects.toBeInstanceOf(InvalidTransitionError);

    executor.complete("ok");
    executor.fail("broken", new TransferError("httpError", "HTTP 410", { statusCode: 410 }));
    await flushMicrotasks();

    await scheduler.purge("ok");
    expect(scheduler.get("ok")).toBeNull();
    expect(await store.get("ok")).toBeNull();
    expect(executor.discarded).toEqual([]);

    await scheduler.enqueue(request("pending"));
    await flushMicrotasks();
    expect(await scheduler.purgeFinished()).toBe(1);
    expect(executor.discarded).toEqual(["broken"]);
    expect(scheduler.list().map((task) => task.id)).toEqual(["pending"]);
  });

  test("stop pauses transfers and start picks them up again", async () => {
    const { executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("s"));
    await flushMicrotasks();

    await scheduler.stop();
    expect(scheduler.isRunning).toBe(false);
    expect(statusOf(scheduler, "s")).toBe("queued");

    await scheduler.start();
    await flushMicrotasks();
    expect(executor.calls).toEqual(["s", "s"]);
  });
});

test.describe("DownloadScheduler enqueue", () => {
  test("enqueueing a known id updates it in place", async () => {
    const { executor, scheduler } = setup();
    await scheduler.enqueue(request("dup"));
    const id = await scheduler.enqueue(
      request("dup", { url: "https://downloads.example.com/dup-v2.bin", priority: "high" })
    );

    expect(id).toBe("dup");
    expect(scheduler.list()).toHaveLength(1);
    expect(scheduler.get("dup")).toMatchObject({ url: "https://downloads.example.com/dup-v2.bin", priority: "high" });

    await scheduler.start();
    await flushMicrotasks();
    await scheduler.enqueue(request("dup", { url: "https://downloads.example.com/dup-v3.bin", priority: "low" }));

    expect(scheduler.get("dup")).toMatchObject({
      url: "https://downloads.example.com/dup-v2.bin",
      priority: "low",
      status: "active",
    });
    expect(executor.calls).toEqual(["dup"]);
  });

  test("relative destinations land under the downloads directory", async () => {
    const { scheduler } = setup({ downloadsDir: "/srv/downloads" });
    await scheduler.enqueue(request("nested", { destinationPath: "videos/clip.mp4" }));
    await scheduler.enqueue(request("absolute", { destinationPath: "/data/absolute.bin" }));

    expect(scheduler.get("nested")?.destinationPath).toBe("/srv/downloads/videos/clip.mp4");
    expect(scheduler.get("absolute")?.destinationPath).toBe("/data/absolute.bin");
  });

  test("generated ids and defaults", async () => {
    const { scheduler } = setup({ maxRetries: 3 });
    const id = await scheduler.enqueue({
      url: "https://downloads.example.com/any.bin",
      destinationPath: "/tmp/transfer-engine-tests/any.bin",
    });

    expect(scheduler.get(id)).toMatchObject({
      status: "queued",
      priority: "normal",
      networkRequirement: "any",
      maxRetries: 3,
      bytesTransferred: 0,
      createdAt: TEST_EPOCH,
    });
  });

  test("rejects invalid requests", async () => {
    const { scheduler } = setup();
    await expect(
      scheduler.enqueue({ url: "ftp://downloads.example.com/file.bin", destinationPath: "/tmp/file.bin" })
    ).rejects.toThrow();
    await expect(scheduler.enqueue(request("bad id"))).rejects.toThrow();
    expect(scheduler.list()).toEqual([]);
  });

  test("subscribers receive progress until they unsubscribe", async () => {
    const { executor, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("watched"));
    await flushMicrotasks();

    const events: ProgressEvent[] = [];
    const unsubscribe = scheduler.subscribe((event) => events.push(event));
    executor.progress("watched", 500);
    unsubscribe();
    executor.progress("watched", 600);

    expect(events).toEqual([
      { taskId: "watched", status: "active", bytesTransferred: 500, totalSize: 1000, speed: 100, eta: null },
    ]);
    expect(scheduler.get("watched")?.bytesTransferred).toBe(600);
  });
});

test.describe("DownloadScheduler network", () => {
  test("pauses tasks the network no longer allows and resumes them later", async () => {
    const { executor, network, scheduler } = setup({ maxConcurrent: 2 });
    await scheduler.start();
    await scheduler.enqueue(request("wifi-only", { networkRequirement: "unmetered" }));
    await scheduler.enqueue(request("anywhere"));
    await flushMicrotasks();
    expect(executor.running).toEqual(["wifi-only", "anywhere"]);

    network.set("metered");
    await flushMicrotasks();
    expect(scheduler.get("wifi-only")).toMatchObject({ status: "paused", pausedBy: "network" });
    expect(executor.running).toEqual(["anywhere"]);

    network.set("unmetered");
    await flushMicrotasks();
    expect(statusOf(scheduler, "wifi-only")).toBe("active");
    expect(executor.calls).toEqual(["wifi-only", "anywhere", "wifi-only"]);
  });

  test("a user pause survives network changes", async () => {
    const { network, scheduler } = setup();
    await scheduler.start();
    await scheduler.enqueue(request("held"));
    await flushMicrotasks();
    await scheduler.pause("held");

    network.set("offline");
    await flushMicrotasks();
    network.set("unmetered");
    await flushMicrotasks();

    expect(scheduler.get("held")).toMatchObject({ status: "paused", pausedBy: "user" });
  });

  test("recovers interrupted tasks on start and waits for connectivity", async () => {
    const { store, executor, network, scheduler } = setup();
    network.set("offline");
    const records: Partial<TransferTask>[] = [
      { id: "interrupted", status: "active", bytesTransferred: 500, etag: '"v1"' },
      { id: "lost", status: "active", bytesTransferred: 300, etag: '"v1"' },
      { id: "net-paused", status: "paused", pausedBy: "network" },
      { id: "user-paused", status: "paused", pausedBy: "user" },
    ];
    for (const [index, record] of records.entries()) {
      await store.put(makeTask({ ...record, createdAt: TEST_EPOCH + index + 1 }));
    }
    executor.partials.add("interrupted");

    await scheduler.start();
    await flushMicrotasks();

    expect(executor.calls).toEqual([]);
    expect(scheduler.get("interrupted")).toMatchObject({ status: "queued", bytesTransferred: 500, etag: '"v1"' });
    expect(await store.get("lost")).toMatchObject({ status: "queued", bytesTransferred: 0, etag: null });
    expect(statusOf(scheduler, "net-paused")).toBe("paused");
    expect(scheduler.getState()).toMatchObject({ queued: 2, paused: 2, network: "offline", isNetworkUsable: false });

    network.set("unmetered");
    await flushMicrotasks();

    expect(executor.calls).toEqual(["interrupted"]);
    expect(scheduler.queueOrder()).toEqual(["lost", "net-paused"]);
    expect(statusOf(scheduler, "user-paused")).toBe("paused");
  });
});
