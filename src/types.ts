/**
 * Core type definitions shared across the ORM.
 * This module defines metadata keys, entity/column descriptors and
 * DataSource options.
 */

import type { ConnectionProvider } from "./connection";
import type { FieldType } from "./field-types";
import type { LoggingOption } from "./logger";
import type { PostgresAdapterOptions } from "./postgres-adapter";
import type { RepositoryDefinition } from "./repository";

/**
 * Metadata keys for storing entity and column information.
 * Using Symbols prevents naming collisions in the metadata registry.
 */
export const TABLE_KEY = Symbol("table");
export const COLUMN_KEY = Symbol("column");
export const GENERATED_KEY = Symbol("generated");

/** An entity class. Entities are built with a no-argument constructor. */
export type EntityClass<T extends object = object> = new () => T;

/**
 * How a column's value is produced when the caller does not supply it:
 * "auto" uses a database sequence, "uuid" a random UUID default.
 */
export type GenerationStrategy = "none" | "auto" | "uuid";

/**
 * What @Column records for one property, before the dialect resolves it.
 */
export interface ColumnMetadata {
  /** TypeScript property name */
  property: string;
  /** Database column name */
  column: string;
  type: FieldType;
  isPrimary: boolean;
  isNullable: boolean;
  isUnique: boolean;
}

export interface ColumnDescriptor {
  readonly name: string;
  readonly property: string;
  readonly fieldType: FieldType;
  /** Resolved column type text, e.g. "BIGINT" or "UUID DEFAULT gen_random_uuid()" */
  readonly sqlType: string;
  readonly isPrimaryKey: boolean;
  readonly isNullable: boolean;
  readonly isUnique: boolean;
  readonly generationStrategy: GenerationStrategy;
}

/**
 * Resolved, immutable persistence shape of one entity class.
 */
export interface EntityDescriptor<T extends object = object> {
  readonly entity: EntityClass<T>;
  readonly tableName: string;
  readonly columns: readonly ColumnDescriptor[];
}

/** One result row keyed by column name. */
export type Row = Record<string, unknown>;

interface BaseDataSourceOptions {
  /** Repositories to register during initialize() */
  repositories?: RepositoryDefinition[];
  /** Create missing tables and columns on registration. Defaults to true. */
  synchronize?: boolean;
  /** Log SQL and schema changes (true for console, or a Logger) */
  logging?: LoggingOption;
}

export interface PostgresDataSourceOptions
  extends BaseDataSourceOptions,
    PostgresAdapterOptions {
  type: "postgres";
}

export interface SqliteDataSourceOptions extends BaseDataSourceOptions {
  type: "sqlite";
  /** Path to the SQLite database file, a `file:` URL, or ":memory:" */
  dbPath: string;
  wal?: boolean;
}

/** Bring your own ConnectionProvider, e.g. a test double. */
export interface CustomDataSourceOptions extends BaseDataSourceOptions {
  type: "custom";
  provider: ConnectionProvider;
}

export type DataSourceOptions =
  | PostgresDataSourceOptions
  | SqliteDataSourceOptions
  | CustomDataSourceOptions;
