/**
 * Importer Types - Interfaces for the scheduling core and its collaborators
 */

/**
 * Outcome of one work unit: [processed, failed].
 * Clean-up units report deletions in the second slot: [0, deleted].
 */
export type UnitResult = readonly [processed: number, failed: number];

/**
 * Sum of all unit results of one top-level operation
 */
export type Aggregate = UnitResult;

/**
 * Asynchronous task bound to one batch of input
 */
export type WorkUnit<T = UnitResult> = () => Promise<T>;

/**
 * Future-like reference to a submitted unit
 */
export interface Handle<T> {
  /** Sequence number assigned by the executor */
  readonly id: number;
  /** Resolves with the unit's result or rejects with its error */
  await(): Promise<T>;
  /**
   * Side-channel notification, fired once the unit is terminal.
   * The returned promise rejects if the callback throws.
   */
  onComplete(
    onSuccess?: (value: T) => void,
    onFailure?: (error: Error) => void,
  ): Promise<void>;
}

/**
 * Bounded task runner. `submit` throws RejectedExecutionError when saturated.
 */
export interface Executor {
  submit<T>(unit: WorkUnit<T>): Handle<T>;
}

/**
 * Worker pool configuration
 */
export interface WorkerPoolConfig {
  /** Number of concurrent workers */
  concurrency: number;
  /** Units allowed to wait for a worker before submissions are rejected */
  maxQueueSize: number;
}

/**
 * Per-unit completion record reported to pool observers
 */
export interface UnitOutcome {
  unitId: number;
  success: boolean;
  durationMs: number;
  error?: string;
}

export type UnitCompletionCallback = (outcome: UnitOutcome) => void;

/**
 * Optional per-unit notifications, independent of the aggregate
 */
export interface NotificationHooks {
  onProgress?: (result: UnitResult) => void;
  onFailure?: (error: Error) => void;
}

/**
 * Submission retry policy under executor saturation
 */
export interface BackoffPolicy {
  /** Fixed delay between submission attempts (ms) */
  intervalMs: number;
  /** Rejected attempts tolerated before giving up; undefined = unbounded */
  maxAttempts?: number;
  sleep: (ms: number) => Promise<void>;
}

/**
 * Capability a driver needs for the import flow
 */
export interface ImportSource<TBatch> {
  /** Yields batches of at most `batchSize` records */
  streamBatches(batchSize: number): AsyncIterable<TBatch>;
  /** Builds the unit that writes one batch and reports [written, failed] */
  buildWriteUnit(batch: TBatch): WorkUnit<UnitResult>;
}

/**
 * Identifiers of one index batch that still exist in the store
 */
export type ExistenceMap = Set<string>;

export const DEFAULT_BACKOFF_INTERVAL_MS = 100;

export const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const DEFAULT_BACKOFF: BackoffPolicy = {
  intervalMs: DEFAULT_BACKOFF_INTERVAL_MS,
  sleep,
};
