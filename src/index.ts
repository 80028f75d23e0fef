/**
 * rowbinder: a small Data Mapper ORM for PostgreSQL and SQLite
 *
 * Entities are plain classes annotated with decorators. Repositories are
 * declared as tables of SQL templates with named parameters; at
 * registration the ORM creates missing tables and columns and builds the
 * live repository.
 *
 * Core concepts:
 * - Decorators: @Entity, @Column, @GeneratedValue for metadata definition
 * - Repositories: defineRepository() + Query.* declarations
 * - RepositoryRegistry: synchronizes schemas and dispenses repositories
 * - DataSource: Orchestrator for connection and registry
 *
 * @example
 * ```typescript
 * import 'reflect-metadata'
 * import { Entity, Column, GeneratedValue, DataSource, Query, defineRepository, Types } from 'rowbinder'
 *
 * // 1. Define entities
 * @Entity('users')
 * class User {
 *   @Column({ primary: true, nullable: false })
 *   @GeneratedValue()
 *   id: number = 0
 *
 *   @Column()
 *   name: string = ''
 *
 *   @Column({ type: Types.list })
 *   tags: string[] = []
 * }
 *
 * // 2. Declare a repository
 * const UserRepository = defineRepository(User, {
 *   findByName: Query.single<[name: string]>('SELECT * FROM users WHERE name = :name', ['name']),
 * })
 *
 * // 3. Initialize DataSource
 * const dataSource = await DataSource.init({
 *   type: 'sqlite',
 *   dbPath: 'app.db',
 *   repositories: [UserRepository],
 * })
 *
 * // 4. Use the repository
 * const alice = await dataSource.getRepository(UserRepository).findByName('alice')
 * ```
 */

// Decorators: Define entity metadata
export { Entity, Column, GeneratedValue } from "./decorators";
export { getTableName, getColumnMetadata, getGenerationStrategy } from "./decorators";
export type { ColumnOptions } from "./decorators";

// Field types and conversion
export { Types, inferFieldType } from "./field-types";
export type { FieldType, FieldKind, EnumLike } from "./field-types";
export { resolveColumnType, toStorageValue, fromStorageValue } from "./type-mapper";
export type { StorageValue } from "./type-mapper";
export { postgresDialect, sqliteDialect, getDialect } from "./dialect";
export type { Dialect, DialectName } from "./dialect";

// Schema and entity descriptors
export { describeEntity } from "./entity-descriptor";
export { SchemaSynchronizer } from "./schema-synchronizer";
export type { SyncResult } from "./schema-synchronizer";

// Repositories
export { Query, defineRepository } from "./repository";
export type {
  QueryDefinition,
  RepositoryDefinition,
  RepositoryMethods,
  RepositoryOf,
} from "./repository";
export { RepositoryRegistry } from "./repository-registry";
export type { RepositoryRegistryOptions } from "./repository-registry";
export { parseTemplate } from "./query-template";
export type { ParsedTemplate } from "./query-template";
export { materialize, materializeRow } from "./materializer";
export type { ReturnShape, ShapedResult } from "./materializer";

// DataSource: Primary orchestrator
export { DataSource } from "./data-source";

// Config: Type-safe configuration and environment helpers
export { defineConfig, env, configFromEnv } from "./config";

// Adapters: Optional, for advanced use (e.g., testing, custom drivers)
export { SqliteAdapter } from "./sqlite-adapter";
export type { SqliteAdapterOptions } from "./sqlite-adapter";
export { PostgresAdapter } from "./postgres-adapter";
export type { PostgresAdapterOptions } from "./postgres-adapter";
export { withConnection } from "./connection";
export type { Connection, ConnectionProvider, QueryResult } from "./connection";

// Errors and logging
export {
  OrmError,
  DeclarationError,
  SchemaSyncError,
  ExecutionError,
  SerializationError,
  NotRegisteredError,
  ConfigurationError,
  ConnectionError,
  isOrmError,
  hasErrorCode,
} from "./errors";
export type { OrmErrorCode } from "./errors";
export { createLogger } from "./logger";
export type { Logger, LoggingOption } from "./logger";

// Types: Re-export commonly used types
export type {
  DataSourceOptions,
  PostgresDataSourceOptions,
  SqliteDataSourceOptions,
  CustomDataSourceOptions,
  ColumnMetadata,
  ColumnDescriptor,
  EntityDescriptor,
  EntityClass,
  GenerationStrategy,
  Row,
} from "./types";

export { TABLE_KEY, COLUMN_KEY, GENERATED_KEY } from "./types";
