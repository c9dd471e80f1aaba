/**
 * Store Types - The authoritative side of the sync
 */

/**
 * Table backing one index
 */
export interface TargetDefinition {
  table: string;
  /** Primary identifier column (default "id") */
  idColumn?: string;
  /** SQL condition every live row satisfies, e.g. "deleted_at IS NULL" */
  scope?: string;
}

export type RecordRow = Record<string, unknown>;

export interface RecordStore {
  /** Identifiers among `ids` that still exist within the target's scope */
  existingIds(target: TargetDefinition, ids: string[]): Promise<Set<string>>;
  /** Rows of the target's scope, `batchSize` at a time */
  streamRows(target: TargetDefinition, batchSize: number): AsyncIterable<RecordRow[]>;
  /** Approximate row count from table statistics. Not exact! */
  estimateRows(target: TargetDefinition): Promise<number>;
}
