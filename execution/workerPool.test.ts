import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { TaskCancelledError } from "./shared/errors.js";
import { WorkerPool } from "./workerPool.js";

interface Deferred<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(error: Error): void;
}

function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

async function flush(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
}

describe("WorkerPool", () => {
  it("should reject a non-positive size", () => {
    assert.throws(() => new WorkerPool(0), RangeError);
  });

  it("should never run more than size jobs at once", async () => {
    const pool = new WorkerPool(2);
    const signal = new AbortController().signal;
    let running = 0;
    let peak = 0;

    const jobs = Array.from({ length: 6 }, (_, i) =>
      pool.run({
        priority: 3,
        signal,
        execute: async () => {
          running++;
          peak = Math.max(peak, running);
          await flush();
          running--;
          return i;
        },
      }),
    );

    assert.deepEqual(await Promise.all(jobs), [0, 1, 2, 3, 4, 5]);
    assert.equal(peak, 2);
    assert.equal(pool.active, 0);
    assert.equal(pool.queued, 0);
  });

  it("should start queued jobs by priority, then submission order", async () => {
    const pool = new WorkerPool(1);
    const signal = new AbortController().signal;
    const gate = deferred<void>();
    const order: string[] = [];

    const job = (label: string, priority: number, wait?: Promise<void>): Promise<void> =>
      pool.run({
        priority,
        signal,
        execute: async () => {
          order.push(label);
          await wait;
        },
      });

    const all = [job("first", 5, gate.promise), job("low", 5), job("urgent-a", 1), job("urgent-b", 1)];
    assert.equal(pool.queued, 3);

    gate.resolve();
    await Promise.all(all);

    assert.deepEqual(order, ["first", "urgent-a", "urgent-b", "low"]);
  });

  it("should reject at once when the signal is already aborted", async () => {
    const pool = new WorkerPool(1);
    const controller = new AbortController();
    controller.abort(new TaskCancelledError("timed_out"));
    let started = false;

    await assert.rejects(
      pool.run({
        priority: 1,
        signal: controller.signal,
        execute: () => {
          started = true;
          return Promise.resolve();
        },
      }),
      (err: unknown) => err instanceof TaskCancelledError && err.reason === "timed_out",
    );
    assert.equal(started, false);
  });

  it("should drop a queued job when its signal aborts", async () => {
    const pool = new WorkerPool(1);
    const gate = deferred<void>();
    const controller = new AbortController();
    let started = false;

    const blocker = pool.run({ priority: 1, signal: new AbortController().signal, execute: () => gate.promise });
    const queued = pool.run({
      priority: 1,
      signal: controller.signal,
      execute: () => {
        started = true;
        return Promise.resolve();
      },
    });

    controller.abort();
    await assert.rejects(queued, (err: unknown) => err instanceof TaskCancelledError && err.reason === "cancelled");
    assert.equal(pool.queued, 0);

    gate.resolve();
    await blocker;
    assert.equal(started, false);
  });

  it("should give the slot back when a running job is aborted", async () => {
    const pool = new WorkerPool(1);
    const controller = new AbortController();
    const stuck = deferred<string>();

    const running = pool.run({ priority: 1, signal: controller.signal, execute: () => stuck.promise });
    const next = pool.run({
      priority: 1,
      signal: new AbortController().signal,
      execute: () => Promise.resolve("next"),
    });

    controller.abort(new TaskCancelledError("timed_out"));

    await assert.rejects(running, TaskCancelledError);
    assert.equal(await next, "next");

    stuck.reject(new Error("late failure"));
    await flush();
    assert.equal(pool.active, 0);
  });

  it("should turn a synchronous throw into a rejection", async () => {
    const pool = new WorkerPool(1);

    await assert.rejects(
      pool.run({
        priority: 1,
        signal: new AbortController().signal,
        execute: () => {
          throw new Error("boom");
        },
      }),
      { message: "boom" },
    );
    assert.equal(pool.active, 0);
  });
});
