import type { Row } from "./types";

/**
 * Type predicate for one driver result row.
 * Ensures safe handling of untyped driver output at the I/O boundary.
 */
export function isRow(data: unknown): data is Row {
  return typeof data === "object" && data !== null && !Array.isArray(data);
}

/**
 * Narrow a driver's result rows, failing loudly on anything that is not a
 * plain row object.
 */
export function toRows(data: readonly unknown[]): Row[] {
  return data.map((row, index) => {
    if (!isRow(row)) {
      throw new TypeError(
        `Driver returned a non-object row at index ${index}: ${typeof row}`
      );
    }
    return row;
  });
}

/** Read a string-valued column, as catalog queries return them. */
export function stringColumn(row: Row, column: string): string | undefined {
  const value = row[column];
  return typeof value === "string" ? value : undefined;
}
