import { z } from "zod";
import { InvalidConfigurationError } from "./errors.ts";

/**
 * A database section of a host configuration:
 *
 * ```yaml
 * database:
 *   provider: sqlite
 *   connection:
 *     file: data.db
 *     autoscan: true
 *     package: shop
 * ```
 */
export const DatabaseSectionSchema = z.object({
  provider: z.string().min(1).optional(),
  connection: z.record(z.string(), z.unknown()).nullish(),
});

export type DatabaseSection = z.infer<typeof DatabaseSectionSchema>;

/**
 * Accepts booleans and their string forms, as configuration files often
 * carry `autoscan: "true"`.
 */
const BooleanFlagSchema = z.union([
  z.boolean(),
  z.enum(["true", "false"]).transform((value) => value === "true"),
]);

/**
 * Table discovery settings shared by every provider that manages a schema.
 */
export const TableScanConfigSchema = z.object({
  autoscan: BooleanFlagSchema.default(false),
  package: z.string().min(1).optional(),
  tables: z.array(z.string().min(1)).optional(),
});

export type TableScanConfig = z.infer<typeof TableScanConfigSchema>;

function requireTablesUnlessAutoscan(
  config: TableScanConfig,
  ctx: z.RefinementCtx,
): void {
  if (!config.autoscan && config.tables === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["tables"],
      message: "'tables' is required when 'autoscan' is false",
    });
  }
}

/**
 * Connection settings of the `sqlite` provider.
 */
export const SqliteConnectionSchema = TableScanConfigSchema.extend({
  /** Database file, relative to the host's data directory; ":memory:" for a private in-memory database */
  file: z.string().min(1),
  /** Enable WAL journal mode (default: true) */
  wal: BooleanFlagSchema.default(true),
}).superRefine(requireTablesUnlessAutoscan);

export type SqliteConnectionConfig = z.infer<typeof SqliteConnectionSchema>;

/**
 * Connection settings of the `surreal` provider.
 */
export const SurrealConnectionSchema = TableScanConfigSchema.extend({
  /** WebSocket or HTTP endpoint, e.g. "ws://127.0.0.1:8000/rpc" */
  url: z.string().url(),
  namespace: z.string().min(1).default("main"),
  database: z.string().min(1).default("main"),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
}).superRefine(requireTablesUnlessAutoscan);

export type SurrealConnectionConfig = z.infer<typeof SurrealConnectionSchema>;

/**
 * Optional table settings of the `map` provider.
 */
export const MapConnectionSchema = TableScanConfigSchema.superRefine(requireTablesUnlessAutoscan);

/**
 * Parse a configuration value, converting zod failures into
 * InvalidConfigurationError.
 *
 * @param context - What is being validated, used in the error message
 */
export function parseConfig<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  context: string,
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
      return `${path}${issue.message}`;
    });
    throw new InvalidConfigurationError(context, issues);
  }
  return result.data;
}
