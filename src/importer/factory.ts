import type { SyncConfig } from "../config.js";
import { QdrantManager } from "../qdrant/client.js";
import { SqliteRecordStore } from "../store/sqlite-store.js";
import type { RecordRow } from "../store/types.js";
import { IndexImporter, type IndexDefinition } from "./index-importer.js";
import { TableImportSource, type RowMapper } from "./table-source.js";
import type { NotificationHooks } from "./types.js";
import { WorkerPool } from "./worker-pool.js";

export interface TableImporter {
  importer: IndexImporter<RecordRow[]>;
  pool: WorkerPool;
  store: SqliteRecordStore;
  /** Wait for in-flight units, then release the store connection */
  close(): Promise<void>;
}

/**
 * Factory function to create an IndexImporter for one SQLite table
 */
export function createTableImporter(
  config: SyncConfig,
  index: IndexDefinition,
  toPoint: RowMapper,
  hooks?: NotificationHooks,
): TableImporter {
  const qdrant = new QdrantManager(config.qdrantUrl, config.qdrantApiKey);
  const store = new SqliteRecordStore(config.sqlitePath);
  const pool = new WorkerPool(config.workerPool);

  const source = new TableImportSource({
    store,
    qdrant,
    collectionName: index.collectionName,
    target: index.target,
    toPoint,
  });

  const importer = new IndexImporter<RecordRow[]>({
    index,
    qdrant,
    store,
    executor: pool,
    batchSize: config.batchSize,
    source,
    hooks,
    backoff: config.backoff,
  });

  return {
    importer,
    pool,
    store,
    close: async () => {
      await pool.shutdown();
      store.close();
    },
  };
}
