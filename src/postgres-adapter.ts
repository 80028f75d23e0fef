/**
 * PostgresAdapter: ConnectionProvider over a node-postgres Pool.
 *
 * Each acquire() checks a client out of the pool; release() returns it.
 */

import { Pool, types } from "pg";
import type { Connection, ConnectionProvider } from "./connection";
import { postgresDialect } from "./dialect";
import { ConnectionError, errorMessage } from "./errors";
import { toRows } from "./type-guards";
import type { StorageValue } from "./type-mapper";

export interface PostgresAdapterOptions {
  /** Connection string, e.g. postgres://localhost:5432/app */
  url: string;
  user?: string;
  password?: string;
  /** Maximum pooled connections. Defaults to 10. */
  poolSize?: number;
  ssl?: boolean | { rejectUnauthorized: boolean };
}

interface PgQueryResult {
  rows: unknown[];
  rowCount: number | null;
}

/** Per-query replacement for node-postgres' global type parsers. */
export interface PgTypeParsers {
  getTypeParser(oid: number): (value: string) => unknown;
}

export interface PgQueryConfig {
  text: string;
  values?: unknown[];
  types?: PgTypeParsers;
}

/** The part of a pg PoolClient the adapter uses. */
export interface PgClient {
  query(config: PgQueryConfig): Promise<PgQueryResult>;
  release(error?: Error | boolean): void;
}

/** The part of a pg Pool the adapter uses. */
export interface PgPool {
  connect(): Promise<PgClient>;
  end(): Promise<void>;
}

// json, jsonb and timestamp: node-postgres would parse JSON (a JSON string
// becomes indistinguishable from text) and read TIMESTAMP as local time
const RAW_TEXT_OIDS: ReadonlySet<number> = new Set([114, 3802, 1114]);

const keepText = (value: string): string => value;

/**
 * Hands JSON and TIMESTAMP columns to the type mapper as the text they are
 * stored as; every other type goes through the driver's parser.
 */
export const rawTextParsers: PgTypeParsers = {
  getTypeParser: (oid) => (RAW_TEXT_OIDS.has(oid) ? keepText : types.getTypeParser(oid)),
};

export class PostgresAdapter implements ConnectionProvider {
  readonly dialect = postgresDialect;
  private readonly pool: PgPool;
  private closed = false;

  constructor(options: PostgresAdapterOptions | { pool: PgPool }) {
    this.pool =
      "pool" in options
        ? options.pool
        : new Pool({
            connectionString: options.url,
            user: options.user,
            password: options.password,
            max: options.poolSize ?? 10,
            ssl: options.ssl,
          });
  }

  async acquire(): Promise<Connection> {
    if (this.closed) {
      throw new ConnectionError("PostgreSQL pool is closed.");
    }

    let client: PgClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw new ConnectionError(
        `Failed to acquire PostgreSQL connection: ${errorMessage(error)}`,
        { cause: error }
      );
    }

    return {
      query: async (sql, params: readonly StorageValue[] = []) => {
        const result = await client.query({
          text: sql,
          values: [...params],
          types: rawTextParsers,
        });
        const rows = toRows(result.rows);
        return { rows, rowCount: result.rowCount ?? rows.length };
      },
      release: () => client.release(),
    };
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      await this.pool.end();
    }
  }
}
