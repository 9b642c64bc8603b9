import type { z } from "zod";
import { InvalidTableDefinitionError } from "../errors.ts";
import type { Row } from "../types.ts";

/**
 * Column value kinds understood by every backend.
 * Backends without a native type store the encoded form (e.g. SQLite keeps
 * booleans as 0/1 and json as text).
 */
export type ColumnType = "text" | "integer" | "real" | "boolean" | "json" | "datetime";

const TABLE_MARKER: unique symbol = Symbol("pluggable-db.table");

const IDENTIFIER_REGEX = /^[A-Za-z_][A-Za-z0-9_]*$/;
const NAMESPACE_REGEX = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)*$/;

/**
 * A persisted record type. Created with {@link defineTable}; handles manage a
 * fixed set of these.
 */
export interface TableDefinition<TRecord = unknown> {
  readonly [TABLE_MARKER]: true;
  /** Storage table name */
  readonly name: string;
  /** Dotted namespace, null when the table is not namespaced */
  readonly namespace: string | null;
  /** Stable identifier: `namespace.name`, or `name` without a namespace */
  readonly qualifiedName: string;
  readonly columns: Readonly<Record<string, ColumnType>>;
  readonly primaryKey: string | null;
  /** Validate a record and pick its declared columns; absent values become null */
  toRow(record: TRecord): Row;
  /** Build a record from a decoded row */
  fromRow(row: Row): TRecord;
}

/**
 * Record type carried by a table definition.
 */
export type TableRecord<TTable> = TTable extends TableDefinition<infer TRecord>
  ? TRecord
  : never;

export interface TableDefinitionInput<TRecord extends object> {
  name: string;
  namespace?: string;
  columns: Record<string, ColumnType>;
  primaryKey?: string;
  schema: z.ZodType<TRecord, z.ZodTypeDef, unknown>;
}

/**
 * Marks a record type as a table.
 *
 * @example
 * ```typescript
 * export const Users = defineTable({
 *   namespace: "shop",
 *   name: "users",
 *   columns: { id: "integer", email: "text", active: "boolean" },
 *   primaryKey: "id",
 *   schema: z.object({ id: z.number().int(), email: z.string(), active: z.boolean() }),
 * });
 * ```
 *
 * @throws {InvalidTableDefinitionError} If a name, namespace or column is malformed
 */
export function defineTable<TRecord extends object>(
  input: TableDefinitionInput<TRecord>,
): TableDefinition<TRecord> {
  const { name, schema } = input;
  const namespace = input.namespace ?? null;

  if (!IDENTIFIER_REGEX.test(name)) {
    throw new InvalidTableDefinitionError(name, "name must be an identifier");
  }
  if (namespace !== null && !NAMESPACE_REGEX.test(namespace)) {
    throw new InvalidTableDefinitionError(name, `namespace '${namespace}' is not a dotted identifier`);
  }

  const columnNames = Object.keys(input.columns);
  if (columnNames.length === 0) {
    throw new InvalidTableDefinitionError(name, "at least one column is required");
  }
  for (const column of columnNames) {
    if (!IDENTIFIER_REGEX.test(column)) {
      throw new InvalidTableDefinitionError(name, `column '${column}' must be an identifier`);
    }
  }

  const primaryKey = input.primaryKey ?? null;
  if (primaryKey !== null && !columnNames.includes(primaryKey)) {
    throw new InvalidTableDefinitionError(name, `primary key '${primaryKey}' is not a column`);
  }

  const columns = Object.freeze({ ...input.columns });

  return Object.freeze({
    [TABLE_MARKER]: true as const,
    name,
    namespace,
    qualifiedName: namespace === null ? name : `${namespace}.${name}`,
    columns,
    primaryKey,
    toRow(record: TRecord): Row {
      const parsed = schema.parse(record);
      const row: Row = {};
      for (const column of columnNames) {
        row[column] = Reflect.get(parsed, column) ?? null;
      }
      return row;
    },
    fromRow(row: Row): TRecord {
      return schema.parse(row);
    },
  });
}

/**
 * The table marker predicate: true for values created by {@link defineTable}.
 */
export function isTable(value: unknown): value is TableDefinition {
  return (
    typeof value === "object" &&
    value !== null &&
    Object.hasOwn(value, TABLE_MARKER) &&
    Reflect.get(value, TABLE_MARKER) === true
  );
}
