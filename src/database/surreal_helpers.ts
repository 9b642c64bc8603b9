/**
 * SurrealDB helper utilities
 */

import { RecordId } from "surrealdb";
import type { ColumnType } from "./tables/table_definition.ts";

/**
 * Unwrap a RecordId to its plain id part ("users:42" -> 42).
 * Other values are returned unchanged.
 */
export function unwrapRecordId(value: unknown): unknown {
  return value instanceof RecordId ? value.id : value;
}

/**
 * Convert a SurrealDB datetime to a JavaScript Date.
 *
 * Depending on the driver version datetimes arrive as Date objects or as
 * objects with a toDate() method; strings and numbers are parsed.
 */
export function toDate(value: unknown): unknown {
  if (value instanceof Date) {
    return value;
  }
  if (value && typeof value === "object" && "toDate" in value && typeof value.toDate === "function") {
    const converted: unknown = value.toDate();
    return converted;
  }
  if (typeof value === "string" || typeof value === "number") {
    return new Date(value);
  }
  return value;
}

/**
 * Decode a value read from SurrealDB for a column of the given type.
 */
export function decodeSurrealValue(type: ColumnType, value: unknown): unknown {
  if (value === null || value === undefined) return null;

  const unwrapped = unwrapRecordId(value);
  return type === "datetime" ? toDate(unwrapped) : unwrapped;
}
