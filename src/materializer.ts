/**
 * Turns result rows back into entity instances and shapes the value a
 * repository method returns.
 */

import type { QueryResult } from "./connection";
import type { Logger } from "./logger";
import { fromStorageValue } from "./type-mapper";
import type { EntityDescriptor, Row } from "./types";

/**
 * What a repository method returns:
 * - list: every row, in result order
 * - single: first row, or null
 * - optional: first row, or undefined
 * - count: affected-row count
 * - void: nothing
 */
export type ReturnShape = "list" | "single" | "optional" | "count" | "void";

export type ShapedResult<T, S extends ReturnShape> = S extends "list"
  ? T[]
  : S extends "single"
    ? T | null
    : S extends "optional"
      ? T | undefined
      : S extends "count"
        ? number
        : void;

/**
 * Map one row onto a fresh entity instance.
 *
 * Mapped columns are converted to their field type. Properties without
 * column metadata read the column of the same name unconverted. Columns
 * missing from the row leave the property at its initial value, so partial
 * projections work.
 */
export function materializeRow<T extends object>(
  row: Row,
  descriptor: EntityDescriptor<T>
): T {
  const instance = new descriptor.entity();
  const mapped = new Set<string>();

  for (const column of descriptor.columns) {
    mapped.add(column.property);
    if (Object.prototype.hasOwnProperty.call(row, column.name)) {
      Reflect.set(
        instance,
        column.property,
        fromStorageValue(row[column.name], column.fieldType)
      );
    }
  }

  for (const property of Object.keys(instance)) {
    if (!mapped.has(property) && Object.prototype.hasOwnProperty.call(row, property)) {
      Reflect.set(instance, property, row[property]);
    }
  }

  return instance;
}

export function materialize<T extends object, S extends ReturnShape>(
  result: QueryResult,
  descriptor: EntityDescriptor<T>,
  shape: S,
  logger?: Logger
): ShapedResult<T, S>;
export function materialize<T extends object>(
  result: QueryResult,
  descriptor: EntityDescriptor<T>,
  shape: ReturnShape,
  logger?: Logger
): T[] | T | null | undefined | number | void {
  switch (shape) {
    case "count":
      return result.rowCount;
    case "void":
      return undefined;
    case "list":
      return result.rows.map((row) => materializeRow(row, descriptor));
  }

  const [first] = result.rows;
  if (first === undefined) {
    return shape === "single" ? null : undefined;
  }
  if (result.rows.length > 1) {
    logger?.warn(
      `${result.rows.length} rows returned for a ${shape} result from "${descriptor.tableName}"; using the first.`
    );
  }
  return materializeRow(first, descriptor);
}
