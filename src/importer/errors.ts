/**
 * Raised synchronously by an executor that cannot take more work.
 * The scheduler treats it as transient and retries the submission.
 */
export class RejectedExecutionError extends Error {
  readonly queueDepth: number;
  readonly activeWorkers: number;

  constructor(queueDepth: number, activeWorkers: number) {
    super(
      `Executor saturated: ${activeWorkers} active workers, ${queueDepth} queued units`,
    );
    this.name = "RejectedExecutionError";
    this.queueDepth = queueDepth;
    this.activeWorkers = activeWorkers;
  }
}

/**
 * import() was called on an importer built without an import source
 */
export class MissingImportSourceError extends Error {
  constructor(collectionName: string) {
    super(`No import source configured for collection "${collectionName}"`);
    this.name = "MissingImportSourceError";
  }
}

export function toError(reason: unknown): Error {
  return reason instanceof Error ? reason : new Error(String(reason));
}
