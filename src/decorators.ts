/**
 * Decorators for defining entity metadata.
 * These decorators use reflect-metadata to store schema information on the
 * entity class.
 *
 * Key principle: Decorators are purely declarative. They don't touch the
 * database; the entity descriptor reads what they record at registration.
 */

import "reflect-metadata";
import { isIdentifier } from "./dialect";
import { DeclarationError } from "./errors";
import { inferFieldType, type FieldType } from "./field-types";
import {
  COLUMN_KEY,
  GENERATED_KEY,
  TABLE_KEY,
  type ColumnMetadata,
  type GenerationStrategy,
} from "./types";

export interface ColumnOptions {
  /** Database column name. Defaults to the property name. */
  name?: string;
  /** Declared value type. Inferred from `design:type` when omitted. */
  type?: FieldType;
  primary?: boolean;
  /** Defaults to true; false adds NOT NULL. */
  nullable?: boolean;
  unique?: boolean;
}

/**
 * Entity decorator maps a class to a database table.
 *
 * @example
 * ```typescript
 * @Entity("users")
 * class User {
 *   @Column({ primary: true })
 *   @GeneratedValue()
 *   id!: number;
 * }
 * ```
 */
export function Entity(tableName: string): ClassDecorator {
  return (target) => {
    if (!isIdentifier(tableName)) {
      throw new DeclarationError(
        `Invalid table name "${tableName}" on ${target.name}. Must start with letter or underscore and contain only alphanumeric characters and underscores.`,
        target.name
      );
    }

    Reflect.defineMetadata(TABLE_KEY, tableName, target);
  };
}

/**
 * Column decorator maps a property to a database column.
 *
 * Without an explicit `type`, the TypeScript type emitted under
 * emitDecoratorMetadata decides the column type (String, Number, Boolean,
 * Date, Array, ...). A string argument is shorthand for `{ name }`.
 *
 * @example
 * ```typescript
 * @Column("user_name")
 * username!: string;
 *
 * @Column({ type: Types.optional(Types.int64), unique: true })
 * externalId?: bigint;
 * ```
 */
export function Column(options: string | ColumnOptions = {}): PropertyDecorator {
  const opts = typeof options === "string" ? { name: options } : options;

  return (target, propertyKey) => {
    const entity = target.constructor;
    if (typeof propertyKey === "symbol") {
      throw new DeclarationError(
        `@Column on ${entity.name} cannot decorate symbol property ${String(propertyKey)}.`,
        entity.name
      );
    }

    const column = opts.name ?? propertyKey;
    if (!isIdentifier(column)) {
      throw new DeclarationError(
        `Invalid column name "${column}" on ${entity.name}.${propertyKey}.`,
        entity.name
      );
    }

    const type =
      opts.type ??
      inferFieldType(Reflect.getMetadata("design:type", target, propertyKey));

    // Copy, so a subclass never appends to its parent's list
    const columns: ColumnMetadata[] = [
      ...(Reflect.getMetadata(COLUMN_KEY, entity) ?? []),
    ];
    columns.push({
      property: propertyKey,
      column,
      type,
      isPrimary: opts.primary ?? false,
      isNullable: opts.nullable ?? true,
      isUnique: opts.unique ?? false,
    });
    Reflect.defineMetadata(COLUMN_KEY, columns, entity);
  };
}

/**
 * Marks a column as produced by the database: "auto" (a sequence, for
 * integer columns) or "uuid" (a random UUID default).
 */
export function GeneratedValue(
  strategy: Exclude<GenerationStrategy, "none"> = "auto"
): PropertyDecorator {
  return (target, propertyKey) => {
    const entity = target.constructor;
    const strategies: Record<string, GenerationStrategy> = {
      ...(Reflect.getMetadata(GENERATED_KEY, entity) ?? {}),
    };
    strategies[String(propertyKey)] = strategy;
    Reflect.defineMetadata(GENERATED_KEY, strategies, entity);
  };
}

/**
 * Table name declared with @Entity, or undefined for a class that is not
 * persisted.
 */
export function getTableName(entity: Function): string | undefined {
  const table: unknown = Reflect.getMetadata(TABLE_KEY, entity);
  return typeof table === "string" ? table : undefined;
}

export function getColumnMetadata(entity: Function): ColumnMetadata[] {
  return Reflect.getMetadata(COLUMN_KEY, entity) ?? [];
}

export function getGenerationStrategy(
  entity: Function,
  property: string
): GenerationStrategy {
  const strategies: Record<string, GenerationStrategy> =
    Reflect.getMetadata(GENERATED_KEY, entity) ?? {};
  return strategies[property] ?? "none";
}
