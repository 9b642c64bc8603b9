import { mkdir } from "node:fs/promises";
import { dirname, isAbsolute, resolve } from "node:path";
import Database from "better-sqlite3";
import { Mutex, type MutexInterface } from "async-mutex";
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
  DatabaseAccessError,
  DatabaseNotOpenError,
  InvalidConfigurationError,
  NoActiveTransactionError,
  QueryError,
  TableNotManagedError,
  TransactionAlreadyActiveError,
  TransactionError,
} from "../errors.ts";
import { parseConfig, SqliteConnectionSchema } from "../config_schemas.ts";
import { scanTables } from "../tables/entity_scanner.ts";
import {
  createTableSql,
  decodeSqlRow,
  encodeSqlRow,
  isRow,
  quoteIdentifier,
  storageName,
} from "./column_codec.ts";
import { logger } from "../../utils/logger.ts";

const IN_MEMORY_PATH = ":memory:";

/**
 * Configuration options for SqliteDatabase
 */
export interface SqliteDatabaseOptions {
  /** Path to the database file (e.g., "data/database.db"), or ":memory:" */
  databasePath: string;
  /** Tables to create and manage */
  tables: readonly TableDefinition[];
  /** Whether to enable WAL mode for better concurrent read performance (default: true) */
  enableWal?: boolean;
  /** Whether to create the database file if it doesn't exist (default: true) */
  createIfNotExists?: boolean;
}

/**
 * Embedded file database backed by better-sqlite3.
 *
 * Features:
 * - One SQL table per table definition, created on open()
 * - WAL mode for concurrent read performance
 * - Mutex-protected writes outside transactions
 * - Explicit transactions holding the write mutex from BEGIN to COMMIT/ROLLBACK
 *
 * @example
 * ```typescript
 * const db = new SqliteDatabase({ databasePath: "data/shop.db", tables: [Users] });
 * await db.open();
 *
 * await db.beginTransaction();
 * await db.query(Users).insert({ id: 1, email: "a@example.com", active: true });
 * await db.commitTransaction();
 *
 * await db.close();
 * ```
 */
export class SqliteDatabase implements DatabaseHandle {
  readonly backendType = "sqlite";

  private readonly databasePath: string;
  private readonly enableWal: boolean;
  private readonly createIfNotExists: boolean;
  private readonly managed: readonly TableDefinition[];
  private readonly writeMutex = new Mutex();

  private db: Database.Database | null = null;
  private releaseTransactionLock: MutexInterface.Releaser | null = null;

  constructor(options: SqliteDatabaseOptions) {
    this.databasePath = options.databasePath;
    this.enableWal = options.enableWal ?? true;
    this.createIfNotExists = options.createIfNotExists ?? true;
    this.managed = [...new Set(options.tables)];
  }

  // ============== Connection Management ==============

  /**
   * Opens the database connection and creates missing tables.
   * Creates the parent directory if it doesn't exist.
   */
  async open(): Promise<void> {
    if (this.db) return; // Already open

    await this.ensureParentDirectory();

    let db: Database.Database;
    try {
      db = new Database(this.databasePath, {
        fileMustExist: !this.createIfNotExists,
      });

      if (this.enableWal && this.databasePath !== IN_MEMORY_PATH) {
        db.pragma("journal_mode = WAL");
        db.pragma("synchronous = NORMAL");
      }
    } catch (error) {
      throw new DatabaseAccessError(this.databasePath, error);
    }

    try {
      for (const table of this.managed) {
        const sql = createTableSql(table);
        try {
          db.exec(sql);
        } catch (error) {
          throw new QueryError(sql, error);
        }
      }
    } catch (error) {
      db.close();
      throw error;
    }

    this.db = db;
    logger.debug(
      `[SQLite] Opened ${this.databasePath} with ${this.managed.length} table(s)`,
    );
  }

  /**
   * Closes the database connection. An open transaction is rolled back.
   * Safe to call multiple times.
   */
  async close(): Promise<void> {
    if (!this.db) return;

    // Synchronous operation, but kept async for API consistency
    await Promise.resolve();

    if (this.db.inTransaction) {
      this.db.exec("ROLLBACK");
    }
    this.finishTransaction();
    this.db.close();
    this.db = null;
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  get inTransaction(): boolean {
    return this.releaseTransactionLock !== null;
  }

  tables(): readonly TableDefinition[] {
    return this.managed;
  }

  // ============== Transactions ==============

  /**
   * Begins a transaction with an IMMEDIATE lock (prevents SQLITE_BUSY).
   * Holds the write mutex until commitTransaction() or rollbackTransaction().
   *
   * @throws {TransactionAlreadyActiveError} If a transaction is already open
   * @throws {TransactionError} If BEGIN fails
   */
  async beginTransaction(): Promise<void> {
    const db = this.ensureOpen();
    if (this.inTransaction) {
      throw new TransactionAlreadyActiveError();
    }

    const release = await this.writeMutex.acquire();
    try {
      db.exec("BEGIN IMMEDIATE");
    } catch (error) {
      release();
      throw new TransactionError("Failed to begin transaction", error);
    }
    this.releaseTransactionLock = release;
  }

  /**
   * Commits the open transaction and releases the write mutex.
   * When COMMIT fails the transaction is rolled back.
   *
   * @throws {NoActiveTransactionError} If no transaction is open
   * @throws {TransactionError} If COMMIT fails
   */
  async commitTransaction(): Promise<void> {
    const db = this.ensureOpen();
    if (!this.inTransaction) {
      throw new NoActiveTransactionError("commit");
    }

    await Promise.resolve();

    try {
      db.exec("COMMIT");
    } catch (error) {
      if (db.inTransaction) {
        try {
          db.exec("ROLLBACK");
        } catch (rollbackError) {
          logger.error("[SQLite] Rollback after failed commit also failed", rollbackError);
        }
      }
      throw new TransactionError("Failed to commit transaction", error);
    } finally {
      this.finishTransaction();
    }
  }

  /**
   * Rolls back the open transaction and releases the write mutex.
   *
   * @throws {NoActiveTransactionError} If no transaction is open
   * @throws {TransactionError} If ROLLBACK fails
   */
  async rollbackTransaction(): Promise<void> {
    const db = this.ensureOpen();
    if (!this.inTransaction) {
      throw new NoActiveTransactionError("rollback");
    }

    await Promise.resolve();

    try {
      db.exec("ROLLBACK");
    } catch (error) {
      throw new TransactionError("Failed to roll back transaction", error);
    } finally {
      this.finishTransaction();
    }
  }

  // ============== Queries ==============

  query<TRecord>(table: TableDefinition<TRecord>): TableQuery<TRecord> {
    this.ensureOpen();
    if (!this.managed.includes(table)) {
      throw new TableNotManagedError(table.qualifiedName, this.backendType);
    }

    const tableName = quoteIdentifier(storageName(table));
    const columnNames = Object.keys(table.columns);
    const columnList = columnNames.map(quoteIdentifier).join(", ");
    const placeholders = columnNames.map(() => "?").join(", ");

    return {
      select: async () => {
        const rows = await this.queryAll(`SELECT ${columnList} FROM ${tableName} ORDER BY rowid`);
        return rows.map((raw) => table.fromRow(decodeSqlRow(table, raw)));
      },
      insert: async (record) => {
        const params = encodeSqlRow(table, table.toRow(record));
        await this.execute(
          `INSERT INTO ${tableName} (${columnList}) VALUES (${placeholders})`,
          params,
        );
      },
      count: async () => {
        const rows = await this.queryAll(`SELECT COUNT(*) AS count FROM ${tableName}`);
        const count = rows[0]?.count;
        return typeof count === "number" ? count : Number(count ?? 0);
      },
      deleteAll: async () => {
        await this.execute(`DELETE FROM ${tableName}`, []);
      },
    };
  }

  // ============== Private Helpers ==============

  private ensureOpen(): Database.Database {
    if (!this.db) {
      throw new DatabaseNotOpenError(this.backendType);
    }
    return this.db;
  }

  private finishTransaction(): void {
    const release = this.releaseTransactionLock;
    this.releaseTransactionLock = null;
    release?.();
  }

  private async ensureParentDirectory(): Promise<void> {
    if (this.databasePath === IN_MEMORY_PATH) return;

    const parentDir = dirname(this.databasePath);
    try {
      await mkdir(parentDir, { recursive: true });
    } catch (error) {
      throw new DatabaseAccessError(parentDir, error);
    }
  }

  /**
   * Reads do not take the mutex (safe in WAL mode).
   */
  private async queryAll(sql: string): Promise<Row[]> {
    const db = this.ensureOpen();

    // Synchronous operation, but kept async for API consistency
    await Promise.resolve();

    try {
      return db.prepare(sql).all().filter(isRow);
    } catch (error) {
      throw new QueryError(sql, error);
    }
  }

  /**
   * Writes take the mutex, except inside this handle's own transaction,
   * which already holds it.
   */
  private async execute(sql: string, params: unknown[]): Promise<number> {
    const db = this.ensureOpen();

    if (this.inTransaction) {
      await Promise.resolve();
      return this.executeSync(db, sql, params);
    }

    return await this.writeMutex.runExclusive(() => this.executeSync(db, sql, params));
  }

  private executeSync(db: Database.Database, sql: string, params: unknown[]): number {
    try {
      return db.prepare(sql).run(...params).changes;
    } catch (error) {
      throw new QueryError(sql, error);
    }
  }
}

/**
 * Type guard to check if a handle is a SQLite database.
 */
export function isSqliteDatabase(handle: DatabaseHandle): handle is SqliteDatabase {
  return handle instanceof SqliteDatabase;
}

/**
 * Provider for the `sqlite` backend.
 *
 * Connection settings: `file` (relative to the host's data directory),
 * `wal`, and the table discovery keys `autoscan`, `package`, `tables`.
 */
export class SqliteProvider implements DatabaseProvider {
  async get(host: HostContext | null, connection: ConnectionConfig | null): Promise<SqliteDatabase> {
    const config = parseConfig(SqliteConnectionSchema, connection, "sqlite connection");
    if (host === null) {
      throw new InvalidConfigurationError("sqlite connection", [
        "table discovery requires a host context",
      ]);
    }

    const tables = await scanTables(host, config);
    const database = new SqliteDatabase({
      databasePath: resolveDatabasePath(config.file, host.dataDirectory),
      tables,
      enableWal: config.wal,
    });
    await database.open();
    return database;
  }
}

function resolveDatabasePath(file: string, dataDirectory: string | undefined): string {
  if (file === IN_MEMORY_PATH || isAbsolute(file)) return file;
  return dataDirectory ? resolve(dataDirectory, file) : resolve(file);
}
