import type { ScalarKind, StructuredKind, TemporalKind } from "./field-types";

export type DialectName = "postgres" | "sqlite";

type FixedKind = ScalarKind | TemporalKind | StructuredKind | "enum" | "unknown";

/**
 * Everything that differs between the supported databases: column type
 * names, positional placeholders, identifier quoting and how to ask the
 * catalog which columns a table has.
 */
export interface Dialect {
  readonly name: DialectName;
  /** SQL type text for each field kind. */
  readonly columnTypes: Readonly<Record<FixedKind, string>>;
  /** Column types for integer fields generated with the "auto" strategy. */
  readonly autoIncrementTypes: Readonly<{ int32: string; int64: string }>;
  /** Column type whose default expression produces a random UUID. */
  readonly uuidDefaultType: string;
  /** Catalog query returning one row with a `name` column per existing column. */
  readonly listColumnsSql: string;
  /** Positional placeholder for the 1-based parameter index. */
  placeholder(index: number): string;
  quoteIdent(name: string): string;
}

const IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name);
}

function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

const SHARED_TYPES: Readonly<Record<FixedKind, string>> = {
  boolean: "BOOLEAN",
  int8: "SMALLINT",
  int16: "SMALLINT",
  int32: "INT",
  int64: "BIGINT",
  float32: "REAL",
  float64: "DOUBLE PRECISION",
  decimal: "NUMERIC(18,4)",
  char: "CHAR(1)",
  binary: "BYTEA",
  uuid: "UUID",
  text: "TEXT",
  date: "DATE",
  time: "TIME",
  timestamp: "TIMESTAMP",
  instant: "TIMESTAMP",
  list: "JSONB",
  set: "JSONB",
  map: "JSONB",
  json: "JSONB",
  enum: "TEXT",
  unknown: "TEXT",
};

export const postgresDialect: Dialect = {
  name: "postgres",
  columnTypes: SHARED_TYPES,
  autoIncrementTypes: { int32: "SERIAL", int64: "BIGSERIAL" },
  uuidDefaultType: "UUID DEFAULT gen_random_uuid()",
  listColumnsSql:
    "SELECT column_name AS name FROM information_schema.columns " +
    "WHERE table_schema = current_schema() AND table_name = $1 " +
    "ORDER BY ordinal_position",
  placeholder: (index) => `$${index}`,
  quoteIdent,
};

/**
 * SQLite accepts any type name, so the shared names are kept where their
 * affinity stores the value faithfully. NUMERIC affinity would turn decimal
 * text into a float, so decimals are TEXT. An INTEGER primary key is SQLite's
 * rowid alias, which is how it auto-increments.
 */
export const sqliteDialect: Dialect = {
  name: "sqlite",
  columnTypes: {
    ...SHARED_TYPES,
    decimal: "TEXT",
    binary: "BLOB",
    uuid: "TEXT",
    list: "JSON",
    set: "JSON",
    map: "JSON",
    json: "JSON",
  },
  autoIncrementTypes: { int32: "INTEGER", int64: "INTEGER" },
  uuidDefaultType: "TEXT DEFAULT (lower(hex(randomblob(16))))",
  listColumnsSql: "SELECT name FROM pragma_table_info(?)",
  placeholder: () => "?",
  quoteIdent,
};

export function getDialect(name: DialectName): Dialect {
  return name === "postgres" ? postgresDialect : sqliteDialect;
}
