import type {
  ConnectionConfig,
  DatabaseHandle,
  DatabaseProvider,
  HostContext,
  Row,
  TableQuery,
} from "../types.ts";
import type { TableDefinition } from "../tables/table_definition.ts";
import {
  DatabaseNotOpenError,
  InvalidConfigurationError,
  NoActiveTransactionError,
  TableNotManagedError,
  TransactionAlreadyActiveError,
} from "../errors.ts";
import { MapConnectionSchema, parseConfig } from "../config_schemas.ts";
import { scanTables } from "../tables/entity_scanner.ts";

export interface MapDatabaseOptions {
  /**
   * Tables managed by the database. When omitted the database is
   * schema-less: any table is accepted and adopted on first use.
   */
  tables?: readonly TableDefinition[];
}

/**
 * In-memory table store.
 *
 * Rows are kept as encoded row copies, so records read back are independent
 * of the ones inserted. A transaction snapshots every table at begin and
 * restores the snapshot on rollback.
 *
 * @example
 * ```typescript
 * const db = new MapDatabase({ tables: [Users] });
 * await db.query(Users).insert({ id: 1, email: "a@example.com", active: true });
 * const users = await db.query(Users).select();
 * ```
 */
export class MapDatabase implements DatabaseHandle {
  readonly backendType = "map";

  private readonly managed: TableDefinition[];
  private readonly schemaless: boolean;
  private readonly store = new Map<TableDefinition, Row[]>();
  private snapshot: Map<TableDefinition, Row[]> | null = null;
  private open = true;

  constructor(options: MapDatabaseOptions = {}) {
    this.schemaless = options.tables === undefined;
    this.managed = [...new Set(options.tables ?? [])];
    for (const table of this.managed) {
      this.store.set(table, []);
    }
  }

  get isOpen(): boolean {
    return this.open;
  }

  get inTransaction(): boolean {
    return this.snapshot !== null;
  }

  tables(): readonly TableDefinition[] {
    return [...this.managed];
  }

  // ============== Transactions ==============

  async beginTransaction(): Promise<void> {
    this.ensureOpen();
    if (this.snapshot !== null) {
      throw new TransactionAlreadyActiveError();
    }

    // Synchronous operation, but kept async for API consistency
    await Promise.resolve();

    this.snapshot = new Map();
    for (const [table, rows] of this.store) {
      this.snapshot.set(table, [...rows]);
    }
  }

  async commitTransaction(): Promise<void> {
    this.ensureOpen();
    if (this.snapshot === null) {
      throw new NoActiveTransactionError("commit");
    }

    await Promise.resolve();
    this.snapshot = null;
  }

  async rollbackTransaction(): Promise<void> {
    this.ensureOpen();
    if (this.snapshot === null) {
      throw new NoActiveTransactionError("rollback");
    }

    await Promise.resolve();

    const snapshot = this.snapshot;
    this.snapshot = null;
    this.store.clear();
    for (const [table, rows] of snapshot) {
      this.store.set(table, rows);
    }
    // Tables adopted during the transaction stay managed, but empty
    for (const table of this.managed) {
      if (!this.store.has(table)) {
        this.store.set(table, []);
      }
    }
  }

  // ============== Queries ==============

  query<TRecord>(table: TableDefinition<TRecord>): TableQuery<TRecord> {
    this.ensureOpen();
    this.ensureManaged(table);

    return {
      select: async () => {
        this.ensureOpen();
        await Promise.resolve();
        return this.rowsOf(table).map((row) => table.fromRow(structuredClone(row)));
      },
      insert: async (record) => {
        this.ensureOpen();
        const row = structuredClone(table.toRow(record));
        await Promise.resolve();
        this.rowsOf(table).push(row);
      },
      count: async () => {
        this.ensureOpen();
        await Promise.resolve();
        return this.rowsOf(table).length;
      },
      deleteAll: async () => {
        this.ensureOpen();
        await Promise.resolve();
        this.store.set(table, []);
      },
    };
  }

  async close(): Promise<void> {
    if (!this.open) return;

    await Promise.resolve();
    this.open = false;
    this.snapshot = null;
    this.store.clear();
  }

  // ============== Private Helpers ==============

  private ensureOpen(): void {
    if (!this.open) {
      throw new DatabaseNotOpenError(this.backendType);
    }
  }

  private ensureManaged(table: TableDefinition): void {
    if (this.store.has(table)) return;

    if (!this.schemaless) {
      throw new TableNotManagedError(table.qualifiedName, this.backendType);
    }
    this.managed.push(table);
    this.store.set(table, []);
  }

  private rowsOf(table: TableDefinition): Row[] {
    let rows = this.store.get(table);
    if (!rows) {
      rows = [];
      this.store.set(table, rows);
    }
    return rows;
  }
}

/**
 * Type guard to check if a handle is an in-memory map database.
 */
export function isMapDatabase(handle: DatabaseHandle): handle is MapDatabase {
  return handle instanceof MapDatabase;
}

/**
 * Provider for the `map` backend.
 *
 * Without connection settings the database is schema-less and needs no host.
 * With settings (`autoscan`/`tables`) the managed tables are discovered like
 * any other backend's.
 */
export class MapProvider implements DatabaseProvider {
  async get(host: HostContext | null, connection: ConnectionConfig | null): Promise<MapDatabase> {
    if (connection === null) {
      return new MapDatabase();
    }

    const config = parseConfig(MapConnectionSchema, connection, "map connection");
    if (host === null) {
      throw new InvalidConfigurationError("map connection", [
        "table discovery requires a host context",
      ]);
    }

    const tables = await scanTables(host, config);
    return new MapDatabase({ tables });
  }
}
