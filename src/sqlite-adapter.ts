/**
 * SqliteAdapter: ConnectionProvider over better-sqlite3.
 *
 * better-sqlite3 is synchronous and single-connection, so every acquire()
 * hands out a thin handle on the same database and release() is a no-op.
 * Useful for tests (":memory:") and embedded deployments.
 */

import Database from "better-sqlite3";
import type { Connection, ConnectionProvider, QueryResult } from "./connection";
import { sqliteDialect } from "./dialect";
import { ConnectionError, errorMessage } from "./errors";
import { toRows } from "./type-guards";
import type { StorageValue } from "./type-mapper";
import type { Row } from "./types";

export interface SqliteAdapterOptions {
  /** Path to the SQLite database file, a `file:` URL, or ":memory:" */
  filename: string;
  /** Switch the database to write-ahead logging */
  wal?: boolean;
}

export class SqliteAdapter implements ConnectionProvider {
  readonly dialect = sqliteDialect;
  private db: Database.Database | null;

  constructor(options: SqliteAdapterOptions) {
    const path = options.filename.startsWith("file:")
      ? options.filename.slice("file:".length)
      : options.filename;

    this.db = openDatabase(path);
    // BIGINT values past 2^53 must come back exact; see normalizeRow
    this.db.defaultSafeIntegers(true);
    if (options.wal) {
      this.db.pragma("journal_mode = WAL");
    }
  }

  async acquire(): Promise<Connection> {
    const db = this.db;
    if (!db) {
      throw new ConnectionError("SQLite database is closed.");
    }
    return {
      query: async (sql, params = []) => runStatement(db, sql, params),
      release: () => undefined,
    };
  }

  /**
   * Close the database connection.
   * After calling this, acquire() fails.
   */
  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

function openDatabase(path: string): Database.Database {
  try {
    return new Database(path);
  } catch (error) {
    throw new ConnectionError(
      `Failed to open SQLite database "${path}": ${errorMessage(error)}`,
      { cause: error }
    );
  }
}

function runStatement(
  db: Database.Database,
  sql: string,
  params: readonly StorageValue[]
): QueryResult {
  const statement = db.prepare(sql);
  const values = params.map(toSqliteValue);

  if (statement.reader) {
    const rows = toRows(statement.all(...values)).map(normalizeRow);
    return { rows, rowCount: rows.length };
  }
  const info = statement.run(...values);
  return { rows: [], rowCount: info.changes };
}

/** SQLite has no boolean type; store 1/0 like an INTEGER. */
function toSqliteValue(value: StorageValue): Exclude<StorageValue, boolean> {
  return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

/** Integers that fit a double come back as numbers, larger ones as bigint. */
function normalizeRow(row: Row): Row {
  const normalized: Row = {};
  for (const [column, value] of Object.entries(row)) {
    normalized[column] =
      typeof value === "bigint" &&
      value >= BigInt(Number.MIN_SAFE_INTEGER) &&
      value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(value)
        : value;
  }
  return normalized;
}
