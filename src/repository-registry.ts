/**
 * RepositoryRegistry maps repository definitions to their live
 * implementations.
 *
 * Registering a repository resolves its entity descriptor (cached per entity
 * class), synchronizes the entity's table the first time the entity is seen,
 * then builds and caches the runtime. A failed synchronization is logged and
 * registration continues, so the repository may run against a partially
 * synchronized table.
 *
 * Register each definition once, at startup. Registering different
 * definitions concurrently is fine; the same one is last-write-wins.
 */

import type { ConnectionProvider } from "./connection";
import { describeEntity } from "./entity-descriptor";
import { NotRegisteredError, isOrmError } from "./errors";
import { createLogger, type Logger } from "./logger";
import {
  createRepository,
  type RepositoryDefinition,
  type RepositoryMethods,
  type RepositoryOf,
} from "./repository";
import { SchemaSynchronizer } from "./schema-synchronizer";
import type { EntityClass, EntityDescriptor } from "./types";

export interface RepositoryRegistryOptions {
  /** Synchronize entity tables on first registration. Defaults to true. */
  synchronize?: boolean;
  logger?: Logger;
}

export class RepositoryRegistry {
  private readonly repositories = new Map<RepositoryDefinition, unknown>();
  private readonly descriptors = new Map<EntityClass, EntityDescriptor>();
  private readonly synchronizations = new Map<EntityClass, Promise<void>>();
  private readonly synchronizer: SchemaSynchronizer;
  private readonly synchronize: boolean;
  private readonly logger: Logger;

  constructor(
    private readonly provider: ConnectionProvider,
    options: RepositoryRegistryOptions = {}
  ) {
    this.synchronize = options.synchronize ?? true;
    this.logger = options.logger ?? createLogger("RepositoryRegistry");
    this.synchronizer = new SchemaSynchronizer(provider, this.logger);
  }

  async register<T extends object, M extends RepositoryMethods>(
    definition: RepositoryDefinition<T, M>
  ): Promise<RepositoryOf<T, M>> {
    const descriptor = this.describe(definition.entity);

    if (this.synchronize && descriptor.columns.length > 0) {
      await this.synchronizeOnce(descriptor);
    }

    const repository = createRepository(definition, descriptor, {
      provider: this.provider,
      logger: this.logger,
    });
    this.repositories.set(definition, repository);
    this.logger.debug(`Registered ${definition.name} for table ${descriptor.tableName}`);
    return repository;
  }

  get<T extends object, M extends RepositoryMethods>(
    definition: RepositoryDefinition<T, M>
  ): RepositoryOf<T, M> | undefined {
    // Only register() writes this entry, with the matching type
    return this.repositories.get(definition) as RepositoryOf<T, M> | undefined;
  }

  /**
   * @throws NotRegisteredError
   */
  require<T extends object, M extends RepositoryMethods>(
    definition: RepositoryDefinition<T, M>
  ): RepositoryOf<T, M> {
    const repository = this.get(definition);
    if (!repository) {
      throw new NotRegisteredError(definition.name);
    }
    return repository;
  }

  has(definition: RepositoryDefinition): boolean {
    return this.repositories.has(definition);
  }

  /**
   * Descriptor for an entity class. A class without @Entity gets an empty
   * descriptor: it is materialized from matching columns but never synced.
   */
  describe<T extends object>(entity: EntityClass<T>): EntityDescriptor<T> {
    const cached = this.cachedDescriptor(entity);
    if (cached) {
      return cached;
    }

    const descriptor: EntityDescriptor<T> =
      describeEntity(entity, this.provider.dialect) ??
      Object.freeze({ entity, tableName: entity.name, columns: Object.freeze([]) });
    this.descriptors.set(entity, descriptor);
    return descriptor;
  }

  private cachedDescriptor<T extends object>(
    entity: EntityClass<T>
  ): EntityDescriptor<T> | undefined {
    // Only describe() writes this entry, keyed by the class it describes
    return this.descriptors.get(entity) as EntityDescriptor<T> | undefined;
  }

  private synchronizeOnce(descriptor: EntityDescriptor): Promise<void> {
    let pending = this.synchronizations.get(descriptor.entity);
    if (!pending) {
      pending = this.synchronizer.sync(descriptor).then(
        () => undefined,
        (error: unknown) => {
          // Database-side failures only; anything else is a bug
          if (!isOrmError(error)) {
            throw error;
          }
          this.logger.error(
            `Schema synchronization failed for ${descriptor.tableName}; continuing registration`,
            error
          );
        }
      );
      this.synchronizations.set(descriptor.entity, pending);
    }
    return pending;
  }
}
