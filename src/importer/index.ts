/**
 * Importer module exports
 *
 * Bounded-concurrency scheduling of batch work units, with backpressure,
 * notifications and result aggregation, plus the index sync driver.
 */

// Core components
export { StageProfiler, syncLog, SyncLogger } from "./debug-logger.js";
export { MissingImportSourceError, RejectedExecutionError } from "./errors.js";
export { createTableImporter } from "./factory.js";
export type { TableImporter } from "./factory.js";
export { IndexImporter } from "./index-importer.js";
export type { IndexDefinition, IndexImporterOptions } from "./index-importer.js";
export { Scheduler } from "./scheduler.js";
export type { SchedulerOptions } from "./scheduler.js";
export { TableImportSource } from "./table-source.js";
export type { RowMapper, TableImportSourceOptions } from "./table-source.js";
export { WorkerPool } from "./worker-pool.js";

// Types
export type {
  Aggregate,
  BackoffPolicy,
  ExistenceMap,
  Executor,
  Handle,
  ImportSource,
  NotificationHooks,
  UnitCompletionCallback,
  UnitOutcome,
  UnitResult,
  WorkerPoolConfig,
  WorkUnit,
} from "./types.js";

export { DEFAULT_BACKOFF, DEFAULT_BACKOFF_INTERVAL_MS } from "./types.js";
