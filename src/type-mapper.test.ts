import { postgresDialect, sqliteDialect } from "./dialect";
import { SerializationError } from "./errors";
import { Types, type FieldType } from "./field-types";
import { fromStorageValue, resolveColumnType, toStorageValue } from "./type-mapper";

enum Color {
  Red,
  Green,
}

enum Status {
  Active = "active",
  Paused = "paused",
}

const utc = (...parts: [number, number, number, number?, number?, number?, number?]) =>
  new Date(Date.UTC(parts[0], parts[1], parts[2], parts[3] ?? 0, parts[4] ?? 0, parts[5] ?? 0, parts[6] ?? 0));

// =============================================================================
// Column types
// =============================================================================

describe("resolveColumnType", () => {
  it.each<[FieldType, string]>([
    [Types.boolean, "BOOLEAN"],
    [Types.int8, "SMALLINT"],
    [Types.int16, "SMALLINT"],
    [Types.int32, "INT"],
    [Types.int64, "BIGINT"],
    [Types.decimal, "NUMERIC(18,4)"],
    [Types.char, "CHAR(1)"],
    [Types.binary, "BYTEA"],
    [Types.uuid, "UUID"],
    [Types.date, "DATE"],
    [Types.time, "TIME"],
    [Types.timestamp, "TIMESTAMP"],
    [Types.list, "JSONB"],
    [Types.map, "JSONB"],
    [Types.enumOf(Color), "TEXT"],
    [{ kind: "unknown", typeName: "Point" }, "TEXT"],
    [Types.optional(Types.int64), "BIGINT"],
  ])("maps %j to %s on PostgreSQL", (type, expected) => {
    expect(resolveColumnType(type, postgresDialect)).toBe(expected);
  });

  it("uses serial types for auto-generated integers", () => {
    expect(resolveColumnType(Types.int32, postgresDialect, "auto")).toBe("SERIAL");
    expect(resolveColumnType(Types.int64, postgresDialect, "auto")).toBe("BIGSERIAL");
    expect(resolveColumnType(Types.int32, sqliteDialect, "auto")).toBe("INTEGER");
  });

  it("ignores the auto strategy for non-integer fields", () => {
    expect(resolveColumnType(Types.text, postgresDialect, "auto")).toBe("TEXT");
  });

  it("gives uuid-generated columns a random default", () => {
    expect(resolveColumnType(Types.uuid, postgresDialect, "uuid")).toBe(
      "UUID DEFAULT gen_random_uuid()"
    );
    expect(resolveColumnType(Types.text, sqliteDialect, "uuid")).toBe(
      "TEXT DEFAULT (lower(hex(randomblob(16))))"
    );
  });

  it("uses SQLite names for binary and JSON columns", () => {
    expect(resolveColumnType(Types.binary, sqliteDialect)).toBe("BLOB");
    expect(resolveColumnType(Types.list, sqliteDialect)).toBe("JSON");
    expect(resolveColumnType(Types.uuid, sqliteDialect)).toBe("TEXT");
  });

  it("stores decimals as text on SQLite", () => {
    expect(resolveColumnType(Types.decimal, sqliteDialect)).toBe("TEXT");
    expect(resolveColumnType(Types.optional(Types.decimal), sqliteDialect)).toBe("TEXT");
  });
});

// =============================================================================
// Writing values
// =============================================================================

describe("toStorageValue", () => {
  it("binds null for absent values of any type", () => {
    expect(toStorageValue(null, Types.int32)).toBeNull();
    expect(toStorageValue(undefined, Types.list)).toBeNull();
    expect(toStorageValue(undefined)).toBeNull();
  });

  it("writes 64-bit integers as decimal text", () => {
    expect(toStorageValue(9223372036854775807n, Types.int64)).toBe("9223372036854775807");
    expect(toStorageValue(-9223372036854775808n, Types.int64)).toBe("-9223372036854775808");
    expect(toStorageValue(5, Types.int64)).toBe(5);
  });

  it("writes calendar values in ISO form", () => {
    expect(toStorageValue(utc(2024, 0, 31), Types.date)).toBe("2024-01-31");
    expect(toStorageValue(utc(2024, 0, 1, 12, 30, 5, 250), Types.time)).toBe("12:30:05.250");
    expect(toStorageValue("08:00", Types.time)).toBe("08:00");
    expect(toStorageValue(utc(2024, 0, 31, 10, 20, 30), Types.timestamp)).toBe(
      "2024-01-31T10:20:30.000Z"
    );
  });

  it("writes boolean text the way stored booleans are read", () => {
    expect(toStorageValue(true, Types.boolean)).toBe(true);
    expect(toStorageValue("false", Types.boolean)).toBe(false);
    expect(toStorageValue("0", Types.boolean)).toBe(false);
    expect(toStorageValue("TRUE", Types.boolean)).toBe(true);
    expect(toStorageValue("t", Types.boolean)).toBe(true);
    expect(toStorageValue(0, Types.boolean)).toBe(false);
  });

  it("writes enums by member name", () => {
    expect(toStorageValue(Color.Green, Types.enumOf(Color))).toBe("Green");
    expect(toStorageValue(Status.Paused, Types.enumOf(Status))).toBe("Paused");
    expect(toStorageValue("Active", Types.enumOf(Status))).toBe("Active");
  });

  it("rejects values outside the enum", () => {
    expect(() => toStorageValue(7, Types.enumOf(Color))).toThrow(SerializationError);
  });

  it("writes structured values as JSON text", () => {
    expect(toStorageValue(["x", "y"], Types.list)).toBe('["x","y"]');
    expect(toStorageValue(new Set([1, 2]), Types.set)).toBe("[1,2]");
    expect(toStorageValue(new Map([["a", 1]]), Types.map)).toBe('{"a":1}');
    expect(toStorageValue({ a: { b: true } }, Types.json)).toBe('{"a":{"b":true}}');
  });

  it("raises SerializationError for values without a JSON form", () => {
    const circular: Record<string, unknown> = {};
    circular.self = circular;

    expect(() => toStorageValue(circular, Types.json)).toThrow(SerializationError);
    expect(() => toStorageValue(() => 1, Types.json)).toThrow(
      "Cannot serialize json value to JSON: function has no JSON form"
    );
    expect(() => toStorageValue("abc", Types.list)).toThrow('Expected an array, got "abc"');
  });

  it("infers a representation when no type is declared", () => {
    expect(toStorageValue("text")).toBe("text");
    expect(toStorageValue(10n)).toBe("10");
    expect(toStorageValue(utc(2024, 0, 31))).toBe("2024-01-31T00:00:00.000Z");
    expect(toStorageValue(["a"])).toBe('["a"]');
    expect(toStorageValue(new Uint8Array([1, 2]))).toEqual(Buffer.from([1, 2]));
  });

  it("writes unknown types through their string form", () => {
    expect(toStorageValue(42, { kind: "unknown", typeName: "Point" })).toBe("42");
  });
});

// =============================================================================
// Reading values
// =============================================================================

describe("fromStorageValue", () => {
  it("reads null as null", () => {
    expect(fromStorageValue(null, Types.text)).toBeNull();
    expect(fromStorageValue(null, Types.optional(Types.int64))).toBeNull();
  });

  it("returns the raw value when no type is declared", () => {
    const raw = { any: "thing" };
    expect(fromStorageValue(raw)).toBe(raw);
  });

  it("reads booleans from every driver form", () => {
    expect(fromStorageValue(1, Types.boolean)).toBe(true);
    expect(fromStorageValue(0, Types.boolean)).toBe(false);
    expect(fromStorageValue("t", Types.boolean)).toBe(true);
    expect(fromStorageValue("false", Types.boolean)).toBe(false);
  });

  it("reads 64-bit integers exactly", () => {
    expect(fromStorageValue("9223372036854775807", Types.int64)).toBe(9223372036854775807n);
    expect(fromStorageValue("-9223372036854775808", Types.int64)).toBe(-9223372036854775808n);
    expect(fromStorageValue(42, Types.int64)).toBe(42n);
    expect(fromStorageValue("5", Types.optional(Types.int64))).toBe(5n);
  });

  it("rejects text that is not an integer", () => {
    expect(() => fromStorageValue("abc", Types.int64)).toThrow(
      'Cannot read "abc" as a 64-bit integer'
    );
  });

  it("reads the first character of a char column", () => {
    expect(fromStorageValue("xy", Types.char)).toBe("x");
    expect(fromStorageValue("", Types.char)).toBeNull();
  });

  it("decodes the PostgreSQL hex form of bytea", () => {
    expect(fromStorageValue("\\x0102ff", Types.binary)).toEqual(Buffer.from([1, 2, 255]));
  });

  it("reads dates as UTC midnight", () => {
    expect(fromStorageValue("2024-01-31", Types.date)).toEqual(utc(2024, 0, 31));
    expect(fromStorageValue(new Date(2024, 0, 31), Types.date)).toEqual(utc(2024, 0, 31));
  });

  it("reads zone-less timestamps as UTC", () => {
    expect(fromStorageValue("2024-01-31 10:20:30", Types.timestamp)).toEqual(
      utc(2024, 0, 31, 10, 20, 30)
    );
    expect(fromStorageValue("2024-01-31T10:20:30+02:00", Types.timestamp)).toEqual(
      utc(2024, 0, 31, 8, 20, 30)
    );
  });

  it("reads enums by member name", () => {
    expect(fromStorageValue("Green", Types.enumOf(Color))).toBe(Color.Green);
    expect(fromStorageValue("Active", Types.enumOf(Status))).toBe(Status.Active);
    expect(() => fromStorageValue("Purple", Types.enumOf(Color))).toThrow(
      'Stored value "Purple" is not a member name of enum'
    );
  });

  it("parses structured columns", () => {
    expect(fromStorageValue('["x","y"]', Types.list)).toEqual(["x", "y"]);
    expect(fromStorageValue("[1,2]", Types.set)).toEqual(new Set([1, 2]));
    expect(fromStorageValue('{"a":1}', Types.map)).toEqual(new Map([["a", 1]]));
    expect(fromStorageValue(Buffer.from('{"a":1}'), Types.json)).toEqual({ a: 1 });
    expect(fromStorageValue(42, Types.json)).toBe(42);
  });

  it("raises SerializationError for malformed JSON", () => {
    expect(() => fromStorageValue("not json", Types.json)).toThrow(SerializationError);
    expect(() => fromStorageValue('{"a":1}', Types.list)).toThrow(
      "Expected a JSON array for list column, got object"
    );
    expect(() => fromStorageValue("[1]", Types.map)).toThrow(
      "Expected a JSON object for map column, got Array"
    );
  });
});

// =============================================================================
// Round trips
// =============================================================================

describe("round trips", () => {
  it.each<[string, FieldType, unknown]>([
    ["true", Types.boolean, true],
    ["false", Types.boolean, false],
    ["smallest int8", Types.int8, -128],
    ["largest int8", Types.int8, 127],
    ["smallest int16", Types.int16, -32768],
    ["largest int16", Types.int16, 32767],
    ["zero", Types.int32, 0],
    ["smallest int32", Types.int32, -2147483648],
    ["largest int32", Types.int32, 2147483647],
    ["largest float32", Types.float32, 3.4028234663852886e38],
    ["smallest positive float32", Types.float32, 1.401298464324817e-45],
    ["largest float64", Types.float64, Number.MAX_VALUE],
    ["negative float", Types.float64, -1.5],
    ["empty text", Types.text, ""],
    ["non-ASCII text", Types.text, "naïve ☃ 🚲"],
    ["char", Types.char, "z"],
    ["nil uuid", Types.uuid, "00000000-0000-0000-0000-000000000000"],
    ["max uuid", Types.uuid, "ffffffff-ffff-ffff-ffff-ffffffffffff"],
    ["empty list", Types.list, []],
    ["empty map", Types.map, new Map()],
    ["time of day", Types.time, "23:59:59.999"],
    ["decimal text", Types.decimal, "-12.3400"],
    ["largest int64", Types.int64, 9223372036854775807n],
    ["smallest int64", Types.int64, -9223372036854775808n],
    ["first calendar day", Types.date, new Date("0001-01-01T00:00:00.000Z")],
    ["last four-digit day", Types.date, new Date("9999-12-31T00:00:00.000Z")],
    ["earliest timestamp", Types.timestamp, new Date(-8.64e15)],
    ["latest timestamp", Types.timestamp, new Date(8.64e15)],
    ["epoch instant", Types.instant, new Date(0)],
    ["instant with milliseconds", Types.instant, new Date("2024-02-29T23:59:59.999Z")],
    ["nested json", Types.json, { a: [1, null, { b: "c" }], d: false }],
    ["json scalar", Types.json, false],
    ["empty json array", Types.json, []],
    ["present optional", Types.optional(Types.int64), 9223372036854775807n],
    ["absent optional", Types.optional(Types.text), null],
    ["optional date", Types.optional(Types.date), new Date("2000-02-29T00:00:00.000Z")],
    ["string enum", Types.enumOf(Status), Status.Paused],
    ["numeric enum", Types.enumOf(Color), Color.Red],
    ["set", Types.set, new Set(["a", "b"])],
    ["map", Types.map, new Map<string, unknown>([["k", [1, 2]]])],
    ["binary", Types.binary, Buffer.from([0, 127, 255])],
  ])("preserves the %s", (_label, type, value) => {
    expect(fromStorageValue(toStorageValue(value, type), type)).toEqual(value);
  });
});
