import type { TableDefinition } from "./tables/table_definition.ts";
import type { TableCatalog } from "./tables/table_catalog.ts";
import type { ModuleLoader } from "./tables/module_loader.ts";

/**
 * A generic row object as stored by a backend
 */
export type Row = Record<string, unknown>;

/**
 * A host's configuration tree (already parsed from whatever format the host uses)
 */
export type ConfigRoot = Record<string, unknown>;

/**
 * Provider-specific connection settings: the `connection` mapping of a database section
 */
export type ConnectionConfig = Record<string, unknown>;

/**
 * The component requesting a database: its name, configuration and where its
 * table definitions can be found.
 */
export interface HostContext {
  /** Display name used in error messages (e.g. the application or plugin name) */
  name: string;
  /** Configuration tree holding database sections */
  config: ConfigRoot;
  /** Directory scanned for table definitions in autoscan mode */
  codeRoot?: string;
  /** Base directory for relative file paths (e.g. SQLite database files) */
  dataDirectory?: string;
  /** Tables resolvable by qualified name in explicit mode */
  tables?: TableCatalog;
  /** Overrides how modules under codeRoot are enumerated and loaded */
  moduleLoader?: ModuleLoader;
}

/**
 * Table-scoped operations of a database handle.
 */
export interface TableQuery<TRecord> {
  /** All rows of the table, in storage order */
  select(): Promise<TRecord[]>;
  insert(record: TRecord): Promise<void>;
  count(): Promise<number>;
  deleteAll(): Promise<void>;
}

/**
 * A live connection to one backend, scoped to a fixed set of tables.
 *
 * A handle is either in autocommit mode or inside exactly one transaction.
 * The owner must call close() on every exit path.
 */
export interface DatabaseHandle {
  /** Backend identifier, e.g. "map", "sqlite", "surreal" */
  readonly backendType: string;
  readonly isOpen: boolean;
  readonly inTransaction: boolean;

  /** Tables managed by this handle, in definition order */
  tables(): readonly TableDefinition[];

  /** @throws {TransactionAlreadyActiveError} If a transaction is already open */
  beginTransaction(): Promise<void>;
  /** @throws {NoActiveTransactionError} If no transaction is open */
  commitTransaction(): Promise<void>;
  /** @throws {NoActiveTransactionError} If no transaction is open */
  rollbackTransaction(): Promise<void>;

  /** @throws {TableNotManagedError} If the table is not part of tables() */
  query<TRecord>(table: TableDefinition<TRecord>): TableQuery<TRecord>;

  /** Release the underlying connection. Safe to call multiple times. */
  close(): Promise<void>;
}

/**
 * Checked downcast from a handle to a specific backend type.
 */
export type HandleGuard<T extends DatabaseHandle> = (handle: DatabaseHandle) => handle is T;

/**
 * A named factory that turns connection settings into a database handle.
 */
export interface DatabaseProvider {
  /**
   * Construct a handle.
   *
   * @param host - The requesting host; null when the caller has none and the
   *   backend needs no table discovery
   * @param connection - The `connection` mapping, or null when not configured
   */
  get(host: HostContext | null, connection: ConnectionConfig | null): Promise<DatabaseHandle | null | undefined>;
}
