/**
 * Semantic value types for entity fields and query parameters.
 *
 * TypeScript erases most of a property's type at run time, so the ORM works
 * from these descriptors instead. @Column infers one from the `design:type`
 * metadata emitted under emitDecoratorMetadata; anything finer grained
 * (64-bit integers, enums, optional wrappers) is declared with `Types`.
 */

export type ScalarKind =
  | "boolean"
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "float32"
  | "float64"
  | "decimal"
  | "char"
  | "binary"
  | "uuid"
  | "text";

export type TemporalKind = "date" | "time" | "timestamp" | "instant";

export type StructuredKind = "list" | "set" | "map" | "json";

/** A TypeScript enum object, numeric or string valued. */
export type EnumLike = Readonly<Record<string, string | number>>;

export type FieldType =
  | { readonly kind: ScalarKind | TemporalKind | StructuredKind }
  | { readonly kind: "enum"; readonly values: EnumLike }
  | { readonly kind: "optional"; readonly inner: FieldType }
  | { readonly kind: "unknown"; readonly typeName: string };

export type FieldKind = FieldType["kind"];

export const Types = {
  boolean: { kind: "boolean" },
  int8: { kind: "int8" },
  int16: { kind: "int16" },
  int32: { kind: "int32" },
  int64: { kind: "int64" },
  float32: { kind: "float32" },
  float64: { kind: "float64" },
  decimal: { kind: "decimal" },
  char: { kind: "char" },
  binary: { kind: "binary" },
  uuid: { kind: "uuid" },
  text: { kind: "text" },
  date: { kind: "date" },
  time: { kind: "time" },
  timestamp: { kind: "timestamp" },
  instant: { kind: "instant" },
  list: { kind: "list" },
  set: { kind: "set" },
  map: { kind: "map" },
  json: { kind: "json" },

  enumOf(values: EnumLike): FieldType {
    return { kind: "enum", values };
  },

  optional(inner: FieldType): FieldType {
    return { kind: "optional", inner };
  },
} as const satisfies Record<string, FieldType | ((...args: never[]) => FieldType)>;

/**
 * Map the constructor TypeScript records as `design:type` to a field type.
 * Number maps to int32, matching the INTEGER default of plain number fields.
 */
export function inferFieldType(designType: unknown): FieldType {
  switch (designType) {
    case String:
      return Types.text;
    case Number:
      return Types.int32;
    case BigInt:
      return Types.int64;
    case Boolean:
      return Types.boolean;
    case Date:
      return Types.timestamp;
    case Array:
      return Types.list;
    case Set:
      return Types.set;
    case Map:
      return Types.map;
    case Buffer:
    case Uint8Array:
      return Types.binary;
    case Object:
      return Types.json;
  }

  const typeName =
    typeof designType === "function" && designType.name
      ? designType.name
      : String(designType);
  return { kind: "unknown", typeName };
}

/** Strip any optional wrappers. */
export function unwrapOptional(type: FieldType): FieldType {
  return type.kind === "optional" ? unwrapOptional(type.inner) : type;
}

/**
 * Symbolic member names of an enum, skipping the reverse mappings TypeScript
 * adds for numeric members.
 */
export function enumMemberNames(values: EnumLike): string[] {
  return Object.keys(values).filter((key) => !/^-?\d+(\.\d+)?$/.test(key));
}
