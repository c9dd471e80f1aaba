export * from "./importer/index.js";
export { DEFAULT_CONFIG, loadSyncConfig, SyncEnvSchema } from "./config.js";
export type { SyncConfig } from "./config.js";
export {
  DEFAULT_INDEXING_THRESHOLD,
  QdrantManager,
  RECORD_ID_KEY,
  toPointId,
} from "./qdrant/client.js";
export type {
  CollectionInfo,
  Distance,
  IndexPoint,
  PointId,
  ScrolledPoint,
} from "./qdrant/client.js";
export { SqliteRecordStore } from "./store/sqlite-store.js";
export type { RecordRow, RecordStore, TargetDefinition } from "./store/types.js";
