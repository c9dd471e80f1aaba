/**
 * Tests for WorkerPool
 *
 * Coverage:
 * - Unit execution and handle outcomes
 * - Bounded concurrency
 * - Synchronous rejection when saturated
 * - Completion notifications and statistics
 * - Drain and shutdown
 */

import { describe, expect, it, vi } from "vitest";
import { deferred, flushMicrotasks } from "../../tests/helpers/deferred.js";
import { RejectedExecutionError } from "./errors.js";
import type { UnitOutcome, UnitResult } from "./types.js";
import { WorkerPool } from "./worker-pool.js";

describe("WorkerPool", () => {
  describe("Basic processing", () => {
    it("should run a unit and resolve its handle with the result", async () => {
      const pool = new WorkerPool({ concurrency: 2, maxQueueSize: 4 });

      const handle = pool.submit(async (): Promise<UnitResult> => [3, 1]);

      await expect(handle.await()).resolves.toEqual([3, 1]);
      expect(handle.id).toBe(1);
    });

    it("should never run the unit body inside submit", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });
      const body = vi.fn(async () => 1);

      pool.submit(body);
      expect(body).not.toHaveBeenCalled();

      await flushMicrotasks();
      expect(body).toHaveBeenCalledTimes(1);
    });

    it("should reject the handle when the unit fails", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });

      const handle = pool.submit(async () => {
        throw new Error("boom");
      });

      await expect(handle.await()).rejects.toThrow("boom");
    });

    it("should record a synchronous throw as the unit's failure", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });

      const handle = pool.submit(() => {
        throw new Error("sync failure");
      });

      await expect(handle.await()).rejects.toThrow("sync failure");
    });

    it("should normalize non-Error failures to Error", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });

      const handle = pool.submit(() => Promise.reject("plain reason"));

      const error = await handle.await().catch((e: unknown) => e);
      expect(error).toBeInstanceOf(Error);
      expect(error).toHaveProperty("message", "plain reason");
    });

    it("should reject invalid configuration", () => {
      expect(() => new WorkerPool({ concurrency: 0, maxQueueSize: 1 })).toThrow(
        "concurrency must be an integer >= 1",
      );
      expect(() => new WorkerPool({ concurrency: 1, maxQueueSize: -1 })).toThrow(
        "maxQueueSize must be an integer >= 0",
      );
    });
  });

  describe("Bounded concurrency", () => {
    it("should not run more units than workers", async () => {
      const pool = new WorkerPool({ concurrency: 2, maxQueueSize: 10 });
      const gates = [deferred<void>(), deferred<void>(), deferred<void>(), deferred<void>()];
      const started: number[] = [];

      const handles = gates.map((gate, i) =>
        pool.submit(async () => {
          started.push(i);
          await gate.promise;
          return i;
        }),
      );
      await flushMicrotasks();

      expect(started).toEqual([0, 1]);
      expect(pool.getActiveWorkers()).toBe(2);
      expect(pool.getQueueDepth()).toBe(2);
      expect(pool.isAtCapacity()).toBe(true);

      gates[0].resolve();
      await flushMicrotasks();
      expect(started).toEqual([0, 1, 2]);

      gates.forEach((gate) => gate.resolve());
      await expect(Promise.all(handles.map((h) => h.await()))).resolves.toEqual([0, 1, 2, 3]);
    });

    it("should notify on queue changes", async () => {
      const queueSizes: number[] = [];
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 5 }, undefined, (size) =>
        queueSizes.push(size),
      );

      const first = pool.submit(async () => 1);
      const second = pool.submit(async () => 2);
      await Promise.all([first.await(), second.await()]);

      // enqueue 1, dequeue 0, enqueue 1, dequeue 0
      expect(queueSizes).toEqual([1, 0, 1, 0]);
    });
  });

  describe("Saturation", () => {
    it("should throw RejectedExecutionError when workers and queue are full", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });
      const gate = deferred<void>();

      const running = pool.submit(() => gate.promise);
      const queued = pool.submit(async () => undefined);
      const rejectedBody = vi.fn(async () => undefined);

      expect(() => pool.submit(rejectedBody)).toThrow(RejectedExecutionError);
      expect(pool.getQueueDepth()).toBe(1);

      gate.resolve();
      await Promise.all([running.await(), queued.await()]);
      await pool.drain();
      expect(rejectedBody).not.toHaveBeenCalled();
    });

    it("should accept work again once a worker frees up", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 0 });
      const gate = deferred<void>();

      const running = pool.submit(() => gate.promise);
      expect(() => pool.submit(async () => 2)).toThrow(RejectedExecutionError);

      gate.resolve();
      await running.await();
      await flushMicrotasks();

      await expect(pool.submit(async () => 2).await()).resolves.toBe(2);
    });

    it("should describe the saturation in the error", () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 0 });
      pool.submit(() => new Promise<void>(() => {}));

      expect(() => pool.submit(async () => undefined)).toThrow(
        "Executor saturated: 1 active workers, 0 queued units",
      );
    });
  });

  describe("Notifications", () => {
    it("should call the success callback of onComplete", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });
      const onSuccess = vi.fn();
      const onFailure = vi.fn();

      const handle = pool.submit(async (): Promise<UnitResult> => [4, 0]);
      await handle.onComplete(onSuccess, onFailure);

      expect(onSuccess).toHaveBeenCalledWith([4, 0]);
      expect(onFailure).not.toHaveBeenCalled();
    });

    it("should call the failure callback of onComplete", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });
      const onSuccess = vi.fn();
      const onFailure = vi.fn();

      const handle = pool.submit(async () => {
        throw new Error("write failed");
      });
      await handle.onComplete(onSuccess, onFailure);

      expect(onSuccess).not.toHaveBeenCalled();
      expect(onFailure).toHaveBeenCalledWith(new Error("write failed"));
    });

    it("should report every outcome to the completion callback", async () => {
      const outcomes: UnitOutcome[] = [];
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 5 }, (outcome) =>
        outcomes.push(outcome),
      );

      const ok = pool.submit(async () => 1);
      const failing = pool.submit(async () => {
        throw new Error("nope");
      });
      await ok.await();
      await failing.await().catch(() => undefined);

      expect(outcomes.map(({ unitId, success, error }) => ({ unitId, success, error }))).toEqual([
        { unitId: 1, success: true, error: undefined },
        { unitId: 2, success: false, error: "nope" },
      ]);
    });
  });

  describe("Statistics", () => {
    it("should count processed and failed units", async () => {
      const pool = new WorkerPool({ concurrency: 2, maxQueueSize: 5 });

      await pool.submit(async () => 1).await();
      await pool.submit(async () => 2).await();
      await pool
        .submit(async () => {
          throw new Error("x");
        })
        .await()
        .catch(() => undefined);

      const stats = pool.getStats();
      expect(stats.processed).toBe(2);
      expect(stats.errors).toBe(1);
      expect(stats.queueDepth).toBe(0);
    });
  });

  describe("Shutdown", () => {
    it("should resolve drain immediately when idle", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });
      await expect(pool.drain()).resolves.toBeUndefined();
    });

    it("should wait for in-flight units before shutdown completes", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });
      const gate = deferred<void>();
      let finished = false;

      pool.submit(async () => {
        await gate.promise;
        finished = true;
      });
      const shutdown = pool.shutdown();

      await flushMicrotasks();
      expect(finished).toBe(false);

      gate.resolve();
      await shutdown;
      expect(finished).toBe(true);
    });

    it("should refuse new units after shutdown started", async () => {
      const pool = new WorkerPool({ concurrency: 1, maxQueueSize: 1 });
      await pool.shutdown();

      expect(() => pool.submit(async () => 1)).toThrow("WorkerPool is shutting down");
    });
  });
});
