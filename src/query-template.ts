/**
 * Named-parameter SQL templates.
 *
 * `SELECT * FROM users WHERE id = :id` is parsed once into the driver's
 * positional form plus the ordered list of names, then bound per call.
 */

import type { Dialect } from "./dialect";
import type { FieldType } from "./field-types";
import { toStorageValue, type StorageValue } from "./type-mapper";

export interface ParsedTemplate {
  /** The template as written */
  readonly sql: string;
  /** The template with every placeholder replaced by a positional one */
  readonly statement: string;
  /** One entry per placeholder occurrence, in source order */
  readonly parameterNames: readonly string[];
}

// Every colon followed by a name is a parameter, including the `b` in `a::b`
const PLACEHOLDER = /:([A-Za-z0-9_]+)/g;

export function parseTemplate(sql: string, dialect: Dialect): ParsedTemplate {
  const parameterNames: string[] = [];
  const statement = sql.replace(PLACEHOLDER, (_match, name: string) => {
    parameterNames.push(name);
    return dialect.placeholder(parameterNames.length);
  });

  return Object.freeze({
    sql,
    statement,
    parameterNames: Object.freeze(parameterNames),
  });
}

/**
 * Pair declared parameter names with the arguments of one call. Extra
 * arguments are ignored; missing ones are absent from the map.
 */
export function buildArgumentMap(
  names: readonly string[],
  args: readonly unknown[]
): Map<string, unknown> {
  const argumentMap = new Map<string, unknown>();
  names.forEach((name, index) => {
    if (index < args.length) {
      argumentMap.set(name, args[index]);
    }
  });
  return argumentMap;
}

/**
 * Positional bind values for a parsed template. A name with no argument
 * binds null.
 *
 * @param resolveType - field type to convert a named value with, if known
 */
export function bindParameters(
  parameterNames: readonly string[],
  argumentMap: ReadonlyMap<string, unknown>,
  resolveType: (name: string) => FieldType | undefined = () => undefined
): StorageValue[] {
  return parameterNames.map((name) =>
    argumentMap.has(name)
      ? toStorageValue(argumentMap.get(name), resolveType(name))
      : null
  );
}
