import { getColumnMetadata, getGenerationStrategy, getTableName } from "./decorators";
import type { Dialect } from "./dialect";
import { DeclarationError } from "./errors";
import { resolveColumnType } from "./type-mapper";
import type { ColumnDescriptor, EntityClass, EntityDescriptor } from "./types";

/**
 * Build the persistence shape of an entity class from its decorators.
 *
 * Returns undefined for a class without @Entity: such a class is simply not
 * persisted. Pure; never touches a connection.
 */
export function describeEntity<T extends object>(
  entity: EntityClass<T>,
  dialect: Dialect
): EntityDescriptor<T> | undefined {
  const tableName = getTableName(entity);
  if (tableName === undefined) {
    return undefined;
  }

  const columns: ColumnDescriptor[] = getColumnMetadata(entity).map((meta) => {
    const generationStrategy = getGenerationStrategy(entity, meta.property);
    return Object.freeze({
      name: meta.column,
      property: meta.property,
      fieldType: meta.type,
      sqlType: resolveColumnType(meta.type, dialect, generationStrategy),
      isPrimaryKey: meta.isPrimary,
      isNullable: meta.isNullable,
      isUnique: meta.isUnique,
      generationStrategy,
    });
  });

  const primaryKeys = columns.filter((c) => c.isPrimaryKey);
  if (primaryKeys.length > 1) {
    throw new DeclarationError(
      `Entity ${entity.name} declares ${primaryKeys.length} primary keys (${primaryKeys
        .map((c) => c.name)
        .join(", ")}); composite keys are not supported.`,
      entity.name
    );
  }

  const seen = new Set<string>();
  for (const column of columns) {
    if (seen.has(column.name)) {
      throw new DeclarationError(
        `Entity ${entity.name} maps column "${column.name}" more than once.`,
        entity.name
      );
    }
    seen.add(column.name);
  }

  return Object.freeze({ entity, tableName, columns: Object.freeze(columns) });
}

/** Column descriptor for a property or column name, if the entity maps it. */
export function findColumn(
  descriptor: EntityDescriptor,
  name: string
): ColumnDescriptor | undefined {
  return descriptor.columns.find((c) => c.property === name || c.name === name);
}
