/**
 * SQLite implementation of RecordStore.
 *
 * better-sqlite3 is synchronous; methods stay async for interface consistency.
 */

import Database from "better-sqlite3";
import type { RecordRow, RecordStore, TargetDefinition } from "./types.js";

/** Bound parameters per IN (...) lookup, well under SQLite's variable limit */
const LOOKUP_CHUNK_SIZE = 500;

const IDENTIFIER_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const INTEGER_PATTERN = /^-?\d+$/;

function quoteIdentifier(name: string): string {
  if (!IDENTIFIER_PATTERN.test(name)) {
    throw new Error(`Invalid SQL identifier: ${JSON.stringify(name)}`);
  }
  return `"${name}"`;
}

function scopeClause(target: TargetDefinition): string {
  return target.scope ? ` AND (${target.scope})` : "";
}

interface IdRow {
  id: string | number | bigint;
}

interface PagedRow extends RecordRow {
  __rowid: number;
}

interface StatRow {
  stat: string;
}

interface ColumnTypeRow {
  type: string;
}

type IdParameter = string | number | bigint;

/**
 * Integer-looking ids bound as integers so an INTEGER key is searched, not scanned
 */
function toIntegerParameter(id: string): IdParameter {
  if (!INTEGER_PATTERN.test(id)) {
    return id;
  }
  const value = Number(id);
  return Number.isSafeInteger(value) ? value : BigInt(id);
}

export class SqliteRecordStore implements RecordStore {
  private readonly db: Database.Database;
  private readonly ownsConnection: boolean;
  private readonly integerColumns = new Map<string, boolean>();

  constructor(database: string | Database.Database) {
    if (typeof database === "string") {
      this.db = new Database(database);
      this.db.pragma("journal_mode = WAL");
      this.ownsConnection = true;
    } else {
      this.db = database;
      this.ownsConnection = false;
    }
  }

  async existingIds(target: TargetDefinition, ids: string[]): Promise<Set<string>> {
    const existing = new Set<string>();
    if (ids.length === 0) {
      return existing;
    }

    const table = quoteIdentifier(target.table);
    const idColumn = quoteIdentifier(target.idColumn ?? "id");
    const toParameter = this.hasIntegerAffinity(target.table, target.idColumn ?? "id")
      ? toIntegerParameter
      : (id: string): IdParameter => id;

    for (let start = 0; start < ids.length; start += LOOKUP_CHUNK_SIZE) {
      const chunk = ids.slice(start, start + LOOKUP_CHUNK_SIZE);
      const placeholders = chunk.map(() => "?").join(", ");
      const rows = this.db
        .prepare<IdParameter[], IdRow>(
          `SELECT ${idColumn} AS id FROM ${table} WHERE ${idColumn} IN (${placeholders})${scopeClause(target)}`,
        )
        .safeIntegers()
        .all(...chunk.map(toParameter));

      for (const row of rows) {
        existing.add(String(row.id));
      }
    }

    return existing;
  }

  async *streamRows(target: TargetDefinition, batchSize: number): AsyncGenerator<RecordRow[]> {
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error("batchSize must be an integer >= 1");
    }

    const table = quoteIdentifier(target.table);
    const statement = this.db.prepare<[number, number], PagedRow>(
      `SELECT rowid AS __rowid, * FROM ${table} WHERE rowid > ?${scopeClause(target)} ORDER BY rowid LIMIT ?`,
    );

    // Keyset pagination: no open cursor is held across yields
    let lastRowId = 0;
    while (true) {
      const page = statement.all(lastRowId, batchSize);
      if (page.length === 0) {
        return;
      }

      lastRowId = page[page.length - 1].__rowid;
      yield page.map(({ __rowid: _rowid, ...row }) => row);

      if (page.length < batchSize) {
        return;
      }
    }
  }

  async estimateRows(target: TargetDefinition): Promise<number> {
    const hasStats = this.db
      .prepare<[], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = 'sqlite_stat1'",
      )
      .get();
    if (!hasStats) {
      return 0;
    }

    const row = this.db
      .prepare<[string], StatRow>("SELECT stat FROM sqlite_stat1 WHERE tbl = ? LIMIT 1")
      .get(target.table);
    if (!row) {
      return 0;
    }

    // First figure of stat is the approximate number of rows
    const estimate = Number.parseInt(row.stat.split(" ")[0] ?? "", 10);
    return Number.isFinite(estimate) ? estimate : 0;
  }

  /**
   * Declared types containing "INT" get INTEGER affinity
   */
  private hasIntegerAffinity(table: string, column: string): boolean {
    const key = `${table}.${column}`;
    const cached = this.integerColumns.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const row = this.db
      .prepare<[string, string], ColumnTypeRow>(
        "SELECT type FROM pragma_table_info(?) WHERE name = ?",
      )
      .get(table, column);
    const isInteger = row !== undefined && row.type.toUpperCase().includes("INT");
    this.integerColumns.set(key, isInteger);
    return isInteger;
  }

  close(): void {
    if (this.ownsConnection) {
      this.db.close();
    }
  }
}
