/**
 * WorkerPool - Bounded concurrency executor for work units
 *
 * Features:
 * - Fixed number of concurrent workers
 * - Bounded wait queue; submissions beyond it are rejected synchronously
 * - Handles that expose the unit outcome and completion notifications
 * - Graceful shutdown
 */

import { syncLog } from "./debug-logger.js";
import { RejectedExecutionError, toError } from "./errors.js";
import type {
  Executor,
  Handle,
  UnitCompletionCallback,
  UnitOutcome,
  WorkerPoolConfig,
  WorkUnit,
} from "./types.js";

interface QueuedUnit {
  id: number;
  run: () => Promise<void>;
}

/**
 * Handle backed by a settled-outcome promise that never rejects, so a unit
 * failure only becomes a rejection for callers that ask for it.
 */
class UnitHandle<T> implements Handle<T> {
  constructor(
    readonly id: number,
    private readonly outcome: Promise<PromiseSettledResult<T>>,
  ) {}

  async await(): Promise<T> {
    const settled = await this.outcome;
    if (settled.status === "rejected") {
      throw toError(settled.reason);
    }
    return settled.value;
  }

  async onComplete(
    onSuccess?: (value: T) => void,
    onFailure?: (error: Error) => void,
  ): Promise<void> {
    const settled = await this.outcome;
    if (settled.status === "fulfilled") {
      onSuccess?.(settled.value);
    } else {
      onFailure?.(toError(settled.reason));
    }
  }
}

export class WorkerPool implements Executor {
  private readonly config: WorkerPoolConfig;
  private readonly onCompletion?: UnitCompletionCallback;
  private readonly onQueueChange?: (queueSize: number) => void;

  private queue: QueuedUnit[] = [];
  private idleWaiters: Array<() => void> = [];
  private activeWorkers = 0;
  private nextUnitId = 0;
  private isShuttingDown = false;
  private totalProcessed = 0;
  private totalErrors = 0;
  private totalTimeMs = 0;
  private startTime: number;

  constructor(
    config: WorkerPoolConfig,
    onCompletion?: UnitCompletionCallback,
    onQueueChange?: (queueSize: number) => void,
  ) {
    if (!Number.isInteger(config.concurrency) || config.concurrency < 1) {
      throw new Error("concurrency must be an integer >= 1");
    }
    if (!Number.isInteger(config.maxQueueSize) || config.maxQueueSize < 0) {
      throw new Error("maxQueueSize must be an integer >= 0");
    }
    this.config = config;
    this.onCompletion = onCompletion;
    this.onQueueChange = onQueueChange;
    this.startTime = Date.now();
  }

  /**
   * Submit a unit for execution
   * @throws RejectedExecutionError when every worker is busy and the queue is full
   */
  submit<T>(unit: WorkUnit<T>): Handle<T> {
    if (this.isShuttingDown) {
      throw new Error("WorkerPool is shutting down");
    }

    if (this.isAtCapacity() && this.queue.length >= this.config.maxQueueSize) {
      throw new RejectedExecutionError(this.queue.length, this.activeWorkers);
    }

    const id = ++this.nextUnitId;
    const outcome = new Promise<PromiseSettledResult<T>>((settle) => {
      this.queue.push({
        id,
        run: async () => {
          const startTime = Date.now();
          let settled: PromiseSettledResult<T>;
          try {
            settled = { status: "fulfilled", value: await unit() };
          } catch (reason) {
            settled = { status: "rejected", reason: toError(reason) };
          }
          settle(settled);
          this.recordOutcome({
            unitId: id,
            success: settled.status === "fulfilled",
            durationMs: Date.now() - startTime,
            error: settled.status === "rejected" ? toError(settled.reason).message : undefined,
          });
        },
      });
    });

    this.notifyQueueChange();
    this.tryProcessNext();

    return new UnitHandle(id, outcome);
  }

  /**
   * Get current queue depth
   */
  getQueueDepth(): number {
    return this.queue.length;
  }

  /**
   * Get number of active workers
   */
  getActiveWorkers(): number {
    return this.activeWorkers;
  }

  /**
   * Check if every worker is busy
   */
  isAtCapacity(): boolean {
    return this.activeWorkers >= this.config.concurrency;
  }

  getStats(): {
    processed: number;
    errors: number;
    avgTimeMs: number;
    queueDepth: number;
    activeWorkers: number;
    throughput: number;
  } {
    const uptimeMs = Date.now() - this.startTime;
    const finished = this.totalProcessed + this.totalErrors;
    return {
      processed: this.totalProcessed,
      errors: this.totalErrors,
      avgTimeMs: finished > 0 ? this.totalTimeMs / finished : 0,
      queueDepth: this.queue.length,
      activeWorkers: this.activeWorkers,
      throughput: uptimeMs > 0 ? (this.totalProcessed / uptimeMs) * 1000 : 0,
    };
  }

  /**
   * Wait until the queue is empty and no unit is running
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Stop accepting units and wait for in-flight work to complete
   */
  async shutdown(): Promise<void> {
    this.isShuttingDown = true;
    await this.drain();

    const stats = this.getStats();
    syncLog.step({ component: "WorkerPool" }, "SHUTDOWN", {
      processed: stats.processed,
      errors: stats.errors,
      avgTimeMs: Number(stats.avgTimeMs.toFixed(1)),
    });
  }

  private isIdle(): boolean {
    return this.queue.length === 0 && this.activeWorkers === 0;
  }

  private tryProcessNext(): void {
    while (this.activeWorkers < this.config.concurrency) {
      const queued = this.queue.shift();
      if (!queued) {
        break;
      }

      this.notifyQueueChange();
      this.activeWorkers++;
      // Unit bodies never run inside submit()
      queueMicrotask(() => {
        void queued
          .run()
          .catch((error: unknown) => {
            console.error(`[WorkerPool] Completion observer failed for unit ${queued.id}:`, error);
          })
          .finally(() => {
            this.activeWorkers--;
            this.tryProcessNext();
            this.notifyIdle();
          });
      });
    }
  }

  private recordOutcome(outcome: UnitOutcome): void {
    this.totalTimeMs += outcome.durationMs;
    if (outcome.success) {
      this.totalProcessed++;
      syncLog.unitComplete({ component: "WorkerPool" }, outcome.unitId, outcome.durationMs);
    } else {
      this.totalErrors++;
      syncLog.unitFailed({ component: "WorkerPool" }, outcome.unitId, outcome.error ?? "unknown error");
    }
    this.onCompletion?.(outcome);
  }

  private notifyIdle(): void {
    if (!this.isIdle()) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }

  private notifyQueueChange(): void {
    this.onQueueChange?.(this.queue.length);
  }
}
