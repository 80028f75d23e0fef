/**
 * Type mapping between TypeScript values and SQL columns.
 *
 * - resolveColumnType: field type + generation strategy -> column type text
 * - toStorageValue: value -> what gets bound to a statement
 * - fromStorageValue: raw column value -> value of the declared field type
 *
 * For every scalar, calendar, enum and structured kind the two conversions
 * are inverse. Driver quirks (SQLite cannot bind booleans) are left to the
 * adapters.
 */

import type { Dialect } from "./dialect";
import { SerializationError, errorMessage } from "./errors";
import {
  enumMemberNames,
  type EnumLike,
  type FieldType,
} from "./field-types";
import type { GenerationStrategy } from "./types";

export type StorageValue = string | number | bigint | boolean | Buffer | null;

export function resolveColumnType(
  type: FieldType,
  dialect: Dialect,
  strategy: GenerationStrategy = "none"
): string {
  if (strategy === "uuid") {
    return dialect.uuidDefaultType;
  }

  switch (type.kind) {
    case "optional":
      return resolveColumnType(type.inner, dialect, strategy);
    case "int32":
    case "int64":
      return strategy === "auto"
        ? dialect.autoIncrementTypes[type.kind]
        : dialect.columnTypes[type.kind];
    default:
      return dialect.columnTypes[type.kind];
  }
}

export function toStorageValue(value: unknown, type?: FieldType): StorageValue {
  if (value === null || value === undefined) {
    return null;
  }
  if (!type) {
    return inferStorageValue(value);
  }

  switch (type.kind) {
    case "optional":
      return toStorageValue(value, type.inner);
    case "boolean":
      return typeof value === "string" ? parseBoolean(value) : Boolean(value);
    case "int8":
    case "int16":
    case "int32":
    case "float32":
    case "float64":
      return Number(value);
    case "int64":
      return typeof value === "number" ? value : String(value);
    case "decimal":
    case "char":
    case "uuid":
    case "text":
      return String(value);
    case "binary":
      return toBuffer(value, type.kind);
    case "date":
      return formatDate(toDate(value, type.kind));
    case "time":
      return value instanceof Date
        ? value.toISOString().slice(11, 23)
        : String(value);
    case "timestamp":
    case "instant":
      return toDate(value, type.kind).toISOString();
    case "enum":
      return enumName(value, type.values);
    case "list":
      return stringifyJson(toArray(value), type.kind);
    case "set":
      return stringifyJson(
        value instanceof Set ? Array.from(value) : toArray(value),
        type.kind
      );
    case "map":
      return stringifyJson(
        value instanceof Map ? mapToObject(value) : value,
        type.kind
      );
    case "json":
      return stringifyJson(value, type.kind);
    case "unknown":
      return String(value);
  }
}

export function fromStorageValue(raw: unknown, type?: FieldType): unknown {
  if (raw === null || raw === undefined) {
    return null;
  }
  if (!type) {
    return raw;
  }

  switch (type.kind) {
    case "optional":
      return fromStorageValue(raw, type.inner);
    case "boolean":
      return parseBoolean(raw);
    case "int8":
    case "int16":
    case "int32":
    case "float32":
    case "float64":
      return typeof raw === "number" ? raw : Number(raw);
    case "int64":
      return parseBigInt(raw);
    case "decimal":
    case "uuid":
    case "text":
    case "time":
      return typeof raw === "string" ? raw : String(raw);
    case "char": {
      const text = String(raw);
      return text.length === 0 ? null : text.charAt(0);
    }
    case "binary":
      return toBuffer(raw, type.kind);
    case "date":
      return parseDate(raw);
    case "timestamp":
    case "instant":
      return parseTimestamp(raw, type.kind);
    case "enum":
      return enumMember(raw, type.values);
    case "list":
      return expectArray(parseJson(raw, type.kind), type.kind);
    case "set":
      return new Set(expectArray(parseJson(raw, type.kind), type.kind));
    case "map":
      return objectToMap(parseJson(raw, type.kind));
    case "json":
      return parseJson(raw, type.kind);
    case "unknown":
      return typeof raw === "string" ? raw : String(raw);
  }
}

/**
 * Conversion by runtime shape, for parameters nothing declares a type for.
 */
function inferStorageValue(value: unknown): StorageValue {
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) return Buffer.from(value);
  if (value instanceof Set) return stringifyJson(Array.from(value), "set");
  if (value instanceof Map) return stringifyJson(mapToObject(value), "map");
  if (Array.isArray(value)) return stringifyJson(value, "list");
  if (typeof value === "object") return stringifyJson(value, "json");
  return String(value);
}

function stringifyJson(value: unknown, kind: string): string {
  let text: string | undefined;
  try {
    text = JSON.stringify(value);
  } catch (error) {
    throw new SerializationError(
      `Cannot serialize ${kind} value to JSON: ${errorMessage(error)}`,
      kind,
      { cause: error }
    );
  }
  if (text === undefined) {
    throw new SerializationError(
      `Cannot serialize ${kind} value to JSON: ${typeof value} has no JSON form`,
      kind
    );
  }
  return text;
}

function parseJson(raw: unknown, kind: string): unknown {
  if (typeof raw !== "string") {
    if (Buffer.isBuffer(raw)) return parseJson(raw.toString("utf8"), kind);
    return raw;
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new SerializationError(
      `Cannot parse ${kind} column as JSON: ${errorMessage(error)}`,
      kind,
      { cause: error }
    );
  }
}

function expectArray(value: unknown, kind: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new SerializationError(
      `Expected a JSON array for ${kind} column, got ${typeof value}`,
      kind
    );
  }
  return value;
}

function toArray(value: unknown): unknown[] {
  if (Array.isArray(value)) return value;
  if (value instanceof Set) return Array.from(value);
  throw new SerializationError(
    `Expected an array, got ${describeValue(value)}`,
    "list"
  );
}

function mapToObject(map: Map<unknown, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, entry] of map) {
    result[String(key)] = entry;
  }
  return result;
}

function objectToMap(value: unknown): Map<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new SerializationError(
      `Expected a JSON object for map column, got ${describeValue(value)}`,
      "map"
    );
  }
  return new Map(Object.entries(value));
}

function enumName(value: unknown, values: EnumLike): string {
  const names = enumMemberNames(values);
  const byValue = names.find((name) => values[name] === value);
  if (byValue !== undefined) return byValue;
  if (typeof value === "string" && names.includes(value)) return value;
  throw new SerializationError(
    `${describeValue(value)} is not a member of enum (${names.join(", ")})`,
    "enum"
  );
}

function enumMember(raw: unknown, values: EnumLike): string | number {
  const name = String(raw);
  if (!enumMemberNames(values).includes(name)) {
    throw new SerializationError(
      `Stored value "${name}" is not a member name of enum`,
      "enum"
    );
  }
  return values[name];
}

function parseBoolean(raw: unknown): boolean {
  if (typeof raw === "boolean") return raw;
  if (typeof raw === "number" || typeof raw === "bigint") return Number(raw) !== 0;
  const text = String(raw).toLowerCase();
  return text === "t" || text === "true" || text === "1";
}

function parseBigInt(raw: unknown): bigint {
  if (typeof raw === "bigint") return raw;
  try {
    return typeof raw === "number" ? BigInt(raw) : BigInt(String(raw));
  } catch (error) {
    throw new SerializationError(
      `Cannot read ${describeValue(raw)} as a 64-bit integer`,
      "int64",
      { cause: error }
    );
  }
}

function toBuffer(value: unknown, kind: string): Buffer {
  if (Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) return Buffer.from(value);
  if (typeof value === "string") {
    // PostgreSQL text form of bytea
    return value.startsWith("\\x")
      ? Buffer.from(value.slice(2), "hex")
      : Buffer.from(value, "utf8");
  }
  throw new SerializationError(
    `Expected binary data, got ${describeValue(value)}`,
    kind
  );
}

function toDate(value: unknown, kind: string): Date {
  const date =
    value instanceof Date
      ? value
      : typeof value === "string" || typeof value === "number"
        ? new Date(value)
        : undefined;
  if (!date || Number.isNaN(date.getTime())) {
    throw new SerializationError(
      `Expected a valid date for ${kind} value, got ${describeValue(value)}`,
      kind
    );
  }
  return date;
}

/** YYYY-MM-DD of the UTC calendar day, with an expanded year when needed. */
function formatDate(date: Date): string {
  const iso = date.toISOString();
  return iso.slice(0, iso.indexOf("T"));
}

function parseDate(raw: unknown): Date {
  if (raw instanceof Date) {
    // A driver that parses DATE itself yields local midnight; keep the day.
    const day = new Date(0);
    day.setUTCFullYear(raw.getFullYear(), raw.getMonth(), raw.getDate());
    return day;
  }
  const match = /^([+-]?\d{4,6}-\d{2}-\d{2})/.exec(String(raw));
  if (!match) {
    throw new SerializationError(
      `Cannot read ${describeValue(raw)} as a date`,
      "date"
    );
  }
  return toDate(`${match[1]}T00:00:00.000Z`, "date");
}

const ZONE_SUFFIX = /(Z|[+-]\d{2}(:?\d{2})?)$/i;

/** TIMESTAMP carries no zone, so text without an offset is read as UTC. */
function parseTimestamp(raw: unknown, kind: string): Date {
  if (raw instanceof Date) return raw;
  if (typeof raw === "number") return toDate(raw, kind);
  const text = String(raw).trim().replace(" ", "T");
  return toDate(ZONE_SUFFIX.test(text) ? text : `${text}Z`, kind);
}

function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "string") return `"${value}"`;
  if (typeof value === "object") return value.constructor?.name ?? "object";
  return String(value);
}
