/**
 * Scheduler - Submits work units to an executor and aggregates their results
 *
 * Orchestrates:
 * - Submission with fixed-interval retry while the executor is saturated
 * - Per-unit progress/failure notifications
 * - All-or-nothing aggregation of [processed, failed] pairs
 *
 * Usage:
 *   const scheduler = new Scheduler(pool, { hooks });
 *   for (const batch of batches) {
 *     await scheduler.submitUnit(batch, writeBatch);
 *   }
 *   const [processed, failed] = await scheduler.waitAll();
 *
 * One scheduler serves one driver: only the caller that submits may drain.
 */

import { syncLog } from "./debug-logger.js";
import { RejectedExecutionError } from "./errors.js";
import {
  DEFAULT_BACKOFF,
  type Aggregate,
  type BackoffPolicy,
  type Executor,
  type Handle,
  type NotificationHooks,
  type UnitResult,
  type WorkUnit,
} from "./types.js";

export interface SchedulerOptions {
  hooks?: NotificationHooks;
  backoff?: Partial<BackoffPolicy>;
  /** Label used in debug logs */
  name?: string;
}

export class Scheduler {
  private readonly executor: Executor;
  private readonly hooks: Readonly<NotificationHooks>;
  private readonly backoff: BackoffPolicy;
  private readonly name: string;

  private pending: Handle<UnitResult>[] = [];
  private hookErrors: unknown[] = [];
  private isDraining = false;
  /** submit() calls that have not yet returned a handle */
  private inFlightSubmissions = 0;

  constructor(executor: Executor, options: SchedulerOptions = {}) {
    this.executor = executor;
    this.hooks = Object.freeze({ ...options.hooks });
    this.backoff = { ...DEFAULT_BACKOFF, ...options.backoff };
    this.name = options.name ?? "Scheduler";

    const { intervalMs, maxAttempts } = this.backoff;
    if (!Number.isFinite(intervalMs) || intervalMs < 0) {
      throw new Error("backoff.intervalMs must be a non-negative number");
    }
    if (maxAttempts !== undefined && (!Number.isInteger(maxAttempts) || maxAttempts < 1)) {
      throw new Error("backoff.maxAttempts must be an integer >= 1");
    }
  }

  /**
   * Number of units submitted since the last reset or drain
   */
  get pendingCount(): number {
    return this.pending.length;
  }

  /**
   * Forget all pending units (start of a new top-level operation)
   */
  reset(): void {
    this.assertNotDraining();
    this.assertNoSubmissionInFlight("reset()");
    this.pending = [];
    this.hookErrors = [];
  }

  /**
   * Submit `work` bound to `input`
   */
  submitUnit<I>(input: I, work: (input: I) => Promise<UnitResult>): Promise<Handle<UnitResult>> {
    return this.submit(() => work(input));
  }

  /**
   * Submit a unit, retrying while the executor rejects it.
   * Rejected attempts enqueue nothing, so the unit runs exactly once.
   */
  async submit(unit: WorkUnit<UnitResult>): Promise<Handle<UnitResult>> {
    this.assertNotDraining();

    this.inFlightSubmissions++;
    try {
      return await this.submitWithBackoff(unit);
    } finally {
      this.inFlightSubmissions--;
    }
  }

  private async submitWithBackoff(unit: WorkUnit<UnitResult>): Promise<Handle<UnitResult>> {
    let attempt = 0;
    while (true) {
      attempt++;
      let handle: Handle<UnitResult>;
      try {
        handle = this.executor.submit(unit);
      } catch (error) {
        if (!(error instanceof RejectedExecutionError)) {
          throw error;
        }
        if (this.backoff.maxAttempts !== undefined && attempt >= this.backoff.maxAttempts) {
          throw error;
        }
        syncLog.backpressure({ component: this.name }, attempt, this.backoff.intervalMs);
        await this.backoff.sleep(this.backoff.intervalMs);
        continue;
      }

      syncLog.unitSubmitted({ component: this.name }, handle.id, attempt);
      this.track(handle);
      return handle;
    }
  }

  /**
   * Wait for every pending unit to settle and sum their results.
   * @throws the first unit failure (submission order), then the first hook error
   * @throws Error while a submit() call is still retrying
   */
  async waitAll(): Promise<Aggregate> {
    this.assertNotDraining();
    this.assertNoSubmissionInFlight("waitAll()");
    this.isDraining = true;

    const handles = this.pending;
    try {
      const settled = await Promise.allSettled(handles.map((handle) => handle.await()));

      for (const outcome of settled) {
        if (outcome.status === "rejected") {
          throw outcome.reason;
        }
      }
      if (this.hookErrors.length > 0) {
        throw this.hookErrors[0];
      }

      let processed = 0;
      let failed = 0;
      for (const outcome of settled) {
        if (outcome.status === "fulfilled") {
          processed += outcome.value[0];
          failed += outcome.value[1];
        }
      }

      syncLog.step({ component: this.name }, "WAIT_ALL", {
        units: handles.length,
        processed,
        failed,
      });
      return [processed, failed];
    } finally {
      this.pending = [];
      this.hookErrors = [];
      this.isDraining = false;
    }
  }

  private track(handle: Handle<UnitResult>): void {
    const { onProgress, onFailure } = this.hooks;
    // Registered before waitAll() awaits the handle, so hooks fire first
    void handle.onComplete(
      (result) => this.notify(() => onProgress?.(result)),
      (error) => this.notify(() => onFailure?.(error)),
    );
    this.pending.push(handle);
  }

  private notify(callback: () => void): void {
    try {
      callback();
    } catch (error) {
      this.hookErrors.push(error);
    }
  }

  private assertNoSubmissionInFlight(operation: string): void {
    if (this.inFlightSubmissions > 0) {
      throw new Error(
        `${this.name} has ${this.inFlightSubmissions} submission(s) in flight; await submit() before ${operation}`,
      );
    }
  }

  private assertNotDraining(): void {
    if (this.isDraining) {
      throw new Error(`${this.name} is draining; submit from the driving caller only`);
    }
  }
}
