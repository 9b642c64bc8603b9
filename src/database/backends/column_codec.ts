import type { ColumnType, TableDefinition } from "../tables/table_definition.ts";
import type { Row } from "../types.ts";

/**
 * Check that a driver result is a plain row object.
 */
export function isRow(value: unknown): value is Row {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Encode a record value for a SQL column.
 * SQLite has no boolean, json or datetime storage class.
 */
export function encodeSqlValue(type: ColumnType, value: unknown): unknown {
  if (value === null || value === undefined) return null;

  switch (type) {
    case "boolean":
      return value ? 1 : 0;
    case "json":
      return JSON.stringify(value);
    case "datetime":
      return value instanceof Date ? value.toISOString() : String(value);
    default:
      return value;
  }
}

/**
 * Decode a SQL column value back into the record's representation.
 */
export function decodeSqlValue(type: ColumnType, value: unknown): unknown {
  if (value === null || value === undefined) return null;

  switch (type) {
    case "boolean":
      return typeof value === "number" || typeof value === "bigint"
        ? Number(value) !== 0
        : value;
    case "json":
      return typeof value === "string" ? JSON.parse(value) : value;
    case "datetime":
      return typeof value === "string" || typeof value === "number"
        ? new Date(value)
        : value;
    default:
      return value;
  }
}

/**
 * Encode every declared column of a row, in declaration order.
 */
export function encodeSqlRow(table: TableDefinition, row: Row): unknown[] {
  return Object.entries(table.columns).map(([column, type]) =>
    encodeSqlValue(type, row[column])
  );
}

/**
 * Decode a driver row into a row keyed by the table's columns.
 */
export function decodeSqlRow(table: TableDefinition, raw: Row): Row {
  const row: Row = {};
  for (const [column, type] of Object.entries(table.columns)) {
    row[column] = decodeSqlValue(type, raw[column]);
  }
  return row;
}

/**
 * Name a table is stored under. Bare names may repeat across namespaces, so
 * storage is keyed by the qualified name.
 */
export function storageName(table: TableDefinition): string {
  return table.qualifiedName;
}

/**
 * Quote an identifier for SQL.
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

const SQL_COLUMN_TYPES: Record<ColumnType, string> = {
  text: "TEXT",
  integer: "INTEGER",
  real: "REAL",
  boolean: "INTEGER",
  json: "TEXT",
  datetime: "TEXT",
};

/**
 * CREATE TABLE statement for a table definition.
 */
export function createTableSql(table: TableDefinition): string {
  const columns = Object.entries(table.columns).map(([column, type]) => {
    const primaryKey = column === table.primaryKey ? " PRIMARY KEY" : "";
    return `${quoteIdentifier(column)} ${SQL_COLUMN_TYPES[type]}${primaryKey}`;
  });
  return `CREATE TABLE IF NOT EXISTS ${quoteIdentifier(storageName(table))} (${columns.join(", ")})`;
}
