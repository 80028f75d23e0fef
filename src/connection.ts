/**
 * Contract between the ORM and a database driver.
 *
 * The ORM never opens connections itself: a ConnectionProvider hands out a
 * Connection per repository call and the caller releases it when done.
 */

import type { Dialect } from "./dialect";
import type { StorageValue } from "./type-mapper";
import type { Row } from "./types";

export interface QueryResult {
  rows: Row[];
  /** Rows affected by a write, or returned by a read. */
  rowCount: number;
}

export interface Connection {
  query(sql: string, params?: readonly StorageValue[]): Promise<QueryResult>;
  release(): void;
}

export interface ConnectionProvider {
  readonly dialect: Dialect;
  acquire(): Promise<Connection>;
  /** Close every connection. The provider is unusable afterwards. */
  close(): Promise<void>;
}

/**
 * Run `fn` with a connection that is released on every exit path.
 */
export async function withConnection<T>(
  provider: ConnectionProvider,
  fn: (connection: Connection) => Promise<T>
): Promise<T> {
  const connection = await provider.acquire();
  try {
    return await fn(connection);
  } finally {
    connection.release();
  }
}
