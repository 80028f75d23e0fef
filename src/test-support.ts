import type { Connection, ConnectionProvider, QueryResult } from "./connection";
import type { Dialect } from "./dialect";
import type { Logger } from "./logger";
import type { StorageValue } from "./type-mapper";

export interface RecordedQuery {
  sql: string;
  params: readonly StorageValue[];
}

type Responder = (sql: string, params: readonly StorageValue[]) => QueryResult;

/**
 * In-process ConnectionProvider that records every statement and answers
 * with whatever `respond` returns (or throws).
 */
export class RecordingProvider implements ConnectionProvider {
  readonly queries: RecordedQuery[] = [];
  acquired = 0;
  released = 0;
  closed = 0;

  constructor(
    readonly dialect: Dialect,
    private readonly respond: Responder = () => ({ rows: [], rowCount: 0 })
  ) {}

  async acquire(): Promise<Connection> {
    this.acquired++;
    return {
      query: async (sql, params = []) => {
        this.queries.push({ sql, params });
        return this.respond(sql, params);
      },
      release: () => {
        this.released++;
      },
    };
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

export function mockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
