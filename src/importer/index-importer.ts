/**
 * IndexImporter - Keeps a Qdrant collection in step with its store table
 *
 * Operations:
 * - import(): write every batch of the import source into the collection
 * - cleanUp(): delete points whose rows no longer exist
 * - estimate(): approximate number of rows an import would write
 * - optimizeForImport() / optimizeForSearch(): bracket bulk loads
 *
 * Each operation runs on its own Scheduler, created with the hooks registered
 * at the time the operation starts.
 */

import {
  DEFAULT_INDEXING_THRESHOLD,
  type Distance,
  type QdrantManager,
} from "../qdrant/client.js";
import type { RecordStore, TargetDefinition } from "../store/types.js";
import { StageProfiler, syncLog } from "./debug-logger.js";
import { MissingImportSourceError } from "./errors.js";
import { Scheduler } from "./scheduler.js";
import type {
  Aggregate,
  BackoffPolicy,
  ExistenceMap,
  Executor,
  ImportSource,
  NotificationHooks,
  UnitResult,
} from "./types.js";

/**
 * Declared shape of the collection and the table behind it
 */
export interface IndexDefinition {
  collectionName: string;
  vectorSize: number;
  distance?: Distance;
  /** Indexing threshold restored by optimizeForSearch() */
  indexingThreshold?: number;
  target: TargetDefinition;
}

export interface IndexImporterOptions<TBatch> {
  index: IndexDefinition;
  qdrant: QdrantManager;
  store: RecordStore;
  executor: Executor;
  batchSize: number;
  source?: ImportSource<TBatch>;
  hooks?: NotificationHooks;
  backoff?: Partial<BackoffPolicy>;
}

export class IndexImporter<TBatch = unknown> {
  private readonly index: IndexDefinition;
  private readonly qdrant: QdrantManager;
  private readonly store: RecordStore;
  private readonly executor: Executor;
  private readonly batchSize: number;
  private readonly source?: ImportSource<TBatch>;
  private readonly backoff?: Partial<BackoffPolicy>;
  private hooks: NotificationHooks;

  constructor(options: IndexImporterOptions<TBatch>) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new Error("batchSize must be an integer >= 1");
    }
    this.index = options.index;
    this.qdrant = options.qdrant;
    this.store = options.store;
    this.executor = options.executor;
    this.batchSize = options.batchSize;
    this.source = options.source;
    this.backoff = options.backoff;
    this.hooks = { ...options.hooks };
  }

  /**
   * Callback to run when a work unit completes.
   * Takes effect from the next operation started.
   */
  onProgress(callback: (result: UnitResult) => void): this {
    this.hooks = { ...this.hooks, onProgress: callback };
    return this;
  }

  /**
   * Callback to run when a work unit fails.
   * Takes effect from the next operation started.
   */
  onFailure(callback: (error: Error) => void): this {
    this.hooks = { ...this.hooks, onFailure: callback };
    return this;
  }

  /**
   * Create the collection from its declared settings if it does not exist
   * @returns true if the collection was created
   */
  async ensureIndex(): Promise<boolean> {
    const { collectionName, vectorSize, distance } = this.index;
    if (await this.qdrant.collectionExists(collectionName)) {
      return false;
    }
    await this.qdrant.createCollection(collectionName, vectorSize, distance);
    return true;
  }

  /**
   * Reduce resource usage during and improve speed of indexing
   */
  async optimizeForImport(): Promise<void> {
    await this.qdrant.disableIndexing(this.index.collectionName);
  }

  /**
   * Restore the declared indexing settings
   */
  async optimizeForSearch(): Promise<void> {
    await this.qdrant.enableIndexing(
      this.index.collectionName,
      this.index.indexingThreshold ?? DEFAULT_INDEXING_THRESHOLD,
    );
  }

  /**
   * Estimate the amount of records that would be indexed. Not exact!
   */
  async estimate(): Promise<number> {
    return this.store.estimateRows(this.index.target);
  }

  /**
   * Import data from the store into the collection
   * @returns [written, failed]
   */
  async import(): Promise<Aggregate> {
    if (!this.source) {
      throw new MissingImportSourceError(this.index.collectionName);
    }

    const scheduler = this.createScheduler("import");
    const ctx = { component: "IndexImporter", operation: "import" };
    const profiler = new StageProfiler();
    const startTime = Date.now();
    syncLog.phase(ctx, "START", { collection: this.index.collectionName, batchSize: this.batchSize });

    let batches = 0;
    for await (const batch of this.source.streamBatches(this.batchSize)) {
      batches++;
      const write = this.source.buildWriteUnit(batch);
      await scheduler.submit(async () => {
        const writeStart = Date.now();
        try {
          return await write();
        } finally {
          profiler.addTime("write", Date.now() - writeStart);
        }
      });
    }

    const [written, failed] = await scheduler.waitAll();
    syncLog.summary(ctx, { batches, written, failed, durationMs: Date.now() - startTime }, profiler);
    return [written, failed];
  }

  /**
   * Import with background indexing disabled for the duration.
   * Settings are restored even when the import fails.
   */
  async importOptimized(): Promise<Aggregate> {
    await this.ensureIndex();
    await this.optimizeForImport();

    let result: Aggregate;
    try {
      result = await this.import();
    } catch (importError) {
      try {
        await this.optimizeForSearch();
      } catch (restoreError) {
        throw new AggregateError(
          [importError, restoreError],
          `Import into "${this.index.collectionName}" failed and restoring index settings failed`,
        );
      }
      throw importError;
    }

    await this.optimizeForSearch();
    return result;
  }

  /**
   * Remove points from the collection whose rows no longer exist
   * @returns [0, deleted]
   */
  async cleanUp(): Promise<Aggregate> {
    const { collectionName, target } = this.index;
    const scheduler = this.createScheduler("cleanUp");
    const ctx = { component: "IndexImporter", operation: "cleanUp" };
    const profiler = new StageProfiler();
    const startTime = Date.now();
    syncLog.phase(ctx, "START", { collection: collectionName, batchSize: this.batchSize });

    let batches = 0;
    let scrollStart = Date.now();
    for await (const points of this.qdrant.scrollBatches(collectionName, this.batchSize)) {
      profiler.addTime("scroll", Date.now() - scrollStart);
      batches++;

      const lookupStart = Date.now();
      const existenceMap: ExistenceMap = await this.store.existingIds(
        target,
        points.map((point) => point.recordId),
      );
      profiler.addTime("lookup", Date.now() - lookupStart);

      // Delete by the scrolled point id, never one re-derived from the record id
      const missingPointIds = points
        .filter((point) => !existenceMap.has(point.recordId))
        .map((point) => point.pointId);
      if (missingPointIds.length > 0) {
        await scheduler.submitUnit(missingPointIds, async (pointIds) => {
          const deleteStart = Date.now();
          await this.qdrant.deletePoints(collectionName, pointIds);
          profiler.addTime("delete", Date.now() - deleteStart);
          return [0, pointIds.length];
        });
      }

      scrollStart = Date.now();
    }

    const [processed, deleted] = await scheduler.waitAll();
    syncLog.summary(ctx, { batches, deleted, durationMs: Date.now() - startTime }, profiler);
    return [processed, deleted];
  }

  private createScheduler(operation: string): Scheduler {
    return new Scheduler(this.executor, {
      hooks: this.hooks,
      backoff: this.backoff,
      name: `IndexImporter.${operation}`,
    });
  }
}
