/**
 * DataSource is the application context of the ORM.
 *
 * Responsibilities:
 * 1. Owns the connection provider (pg Pool or better-sqlite3 database)
 * 2. Provides lazy initialization (connections only on .initialize())
 * 3. Owns the repository registry, which synchronizes schemas on registration
 * 4. Dispenses repositories
 *
 * There is no global instance: create one per database and pass it to the
 * code that needs repositories, so tests can build isolated ones.
 */

import type { ConnectionProvider } from "./connection";
import { defineConfig } from "./config";
import { ConnectionError, errorMessage, isOrmError } from "./errors";
import { createLogger, type Logger } from "./logger";
import { PostgresAdapter } from "./postgres-adapter";
import type { RepositoryDefinition, RepositoryMethods, RepositoryOf } from "./repository";
import { RepositoryRegistry } from "./repository-registry";
import { SqliteAdapter } from "./sqlite-adapter";
import type { DataSourceOptions } from "./types";

export class DataSource {
  readonly logger: Logger;
  private readonly options: DataSourceOptions;
  private provider: ConnectionProvider | null = null;
  private registry: RepositoryRegistry | null = null;
  private initializing: Promise<this> | null = null;

  constructor(options: DataSourceOptions) {
    this.options = defineConfig(options);
    this.logger = createLogger("DataSource", options.logging);
  }

  /**
   * Create and initialize a data source in one step.
   *
   * @example
   * ```typescript
   * const dataSource = await DataSource.init({
   *   type: "sqlite",
   *   dbPath: ":memory:",
   *   repositories: [UserRepository],
   * });
   * const users = dataSource.getRepository(UserRepository);
   * ```
   */
  static async init(options: DataSourceOptions): Promise<DataSource> {
    return new DataSource(options).initialize();
  }

  /**
   * Open the connection provider and register the configured repositories,
   * synchronizing their tables unless `synchronize: false`.
   *
   * Must be called before using any repositories.
   * Safe to call multiple times (idempotent); concurrent calls share one
   * initialization.
   */
  async initialize(): Promise<this> {
    if (this.registry) {
      return this;
    }
    if (!this.initializing) {
      this.initializing = this.open().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  private async open(): Promise<this> {
    const provider = this.openProvider();
    const registry = new RepositoryRegistry(provider, {
      synchronize: this.options.synchronize ?? true,
      logger: this.logger,
    });

    try {
      for (const definition of this.options.repositories ?? []) {
        await registry.register(definition);
      }
    } catch (error) {
      await provider.close();
      throw error;
    }

    this.provider = provider;
    this.registry = registry;
    this.logger.info(`Initialized ${provider.dialect.name} data source`);
    return this;
  }

  get isInitialized(): boolean {
    return this.registry !== null;
  }

  /** The live connection provider. */
  get connectionProvider(): ConnectionProvider {
    return this.requireProvider();
  }

  /**
   * Register a repository after initialization.
   */
  async register<T extends object, M extends RepositoryMethods>(
    definition: RepositoryDefinition<T, M>
  ): Promise<RepositoryOf<T, M>> {
    return this.requireRegistry().register(definition);
  }

  /**
   * Get the live implementation of a registered repository.
   *
   * @throws NotRegisteredError if the definition was never registered
   *
   * @example
   * ```typescript
   * const users = dataSource.getRepository(UserRepository);
   * const alice = await users.findById(1);
   * ```
   */
  getRepository<T extends object, M extends RepositoryMethods>(
    definition: RepositoryDefinition<T, M>
  ): RepositoryOf<T, M> {
    return this.requireRegistry().require(definition);
  }

  /**
   * Close every connection and reset state.
   *
   * @example
   * ```typescript
   * process.on('SIGTERM', async () => {
   *   await dataSource.destroy();
   *   process.exit(0);
   * });
   * ```
   */
  async destroy(): Promise<void> {
    const provider = this.provider;
    this.provider = null;
    this.registry = null;

    if (provider) {
      await provider.close();
      this.logger.info("Connection closed");
    }
  }

  private openProvider(): ConnectionProvider {
    const options = this.options;
    try {
      switch (options.type) {
        case "custom":
          return options.provider;
        case "sqlite":
          return new SqliteAdapter({ filename: options.dbPath, wal: options.wal });
        case "postgres":
          return new PostgresAdapter(options);
      }
    } catch (error) {
      if (isOrmError(error)) throw error;
      throw new ConnectionError(
        `Failed to initialize DataSource: ${errorMessage(error)}`,
        { cause: error }
      );
    }
  }

  private requireRegistry(): RepositoryRegistry {
    if (!this.registry) {
      throw new ConnectionError("DataSource not initialized. Call .initialize() first.");
    }
    return this.registry;
  }

  private requireProvider(): ConnectionProvider {
    if (!this.provider) {
      throw new ConnectionError("DataSource not initialized. Call .initialize() first.");
    }
    return this.provider;
  }
}
