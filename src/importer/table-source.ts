/**
 * TableImportSource - Import source reading one store table into a collection
 */

import type { IndexPoint, QdrantManager } from "../qdrant/client.js";
import type { RecordRow, RecordStore, TargetDefinition } from "../store/types.js";
import type { ImportSource, UnitResult, WorkUnit } from "./types.js";

/**
 * Renders a row as a point; null marks a row that cannot be indexed
 */
export type RowMapper = (row: RecordRow) => IndexPoint | null;

export interface TableImportSourceOptions {
  store: RecordStore;
  qdrant: QdrantManager;
  collectionName: string;
  target: TargetDefinition;
  toPoint: RowMapper;
}

export class TableImportSource implements ImportSource<RecordRow[]> {
  private readonly options: TableImportSourceOptions;

  constructor(options: TableImportSourceOptions) {
    this.options = options;
  }

  streamBatches(batchSize: number): AsyncIterable<RecordRow[]> {
    return this.options.store.streamRows(this.options.target, batchSize);
  }

  buildWriteUnit(rows: RecordRow[]): WorkUnit<UnitResult> {
    const { qdrant, collectionName, toPoint } = this.options;

    return async () => {
      const points: IndexPoint[] = [];
      for (const row of rows) {
        const point = toPoint(row);
        if (point) {
          points.push(point);
        }
      }

      await qdrant.upsertRecords(collectionName, points);

      return [points.length, rows.length - points.length];
    };
  }
}
