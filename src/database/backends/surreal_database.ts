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
  QueryError,
  TableNotManagedError,
  TransactionAlreadyActiveError,
  TransactionError,
} from "../errors.ts";
import {
  parseConfig,
  SurrealConnectionSchema,
  type SurrealConnectionConfig,
} from "../config_schemas.ts";
import { scanTables } from "../tables/entity_scanner.ts";
import { decodeSurrealValue } from "../surreal_helpers.ts";
import { isRow, storageName } from "./column_codec.ts";
import { SurrealConnection, type SurrealQueryable } from "./surreal_connection.ts";
import { logger } from "../../utils/logger.ts";

interface BufferedStatement {
  sql: string;
  vars: Record<string, unknown>;
}

export interface SurrealDatabaseOptions {
  /** An open connection; closed together with the database */
  connection: SurrealQueryable;
  tables: readonly TableDefinition[];
}

/**
 * Networked database backed by a SurrealDB server.
 *
 * SurrealDB transactions cannot span several RPC calls, so writes issued
 * inside a transaction are buffered and sent at commit as a single
 * `BEGIN TRANSACTION; ...; COMMIT TRANSACTION;` query. Reads inside a
 * transaction only see committed data.
 */
export class SurrealDatabase implements DatabaseHandle {
  readonly backendType = "surreal";

  private readonly managed: readonly TableDefinition[];
  private connection: SurrealQueryable | null;
  private buffer: BufferedStatement[] | null = null;

  constructor(options: SurrealDatabaseOptions) {
    this.connection = options.connection;
    this.managed = [...new Set(options.tables)];
  }

  get isOpen(): boolean {
    return this.connection !== null;
  }

  get inTransaction(): boolean {
    return this.buffer !== null;
  }

  tables(): readonly TableDefinition[] {
    return this.managed;
  }

  // ============== Transactions ==============

  async beginTransaction(): Promise<void> {
    this.ensureOpen();
    if (this.buffer !== null) {
      throw new TransactionAlreadyActiveError();
    }

    await Promise.resolve();
    this.buffer = [];
  }

  /**
   * Sends every buffered write in one transaction.
   *
   * @throws {TransactionError} If the server rejects the transaction
   */
  async commitTransaction(): Promise<void> {
    const connection = this.ensureOpen();
    const buffer = this.buffer;
    if (buffer === null) {
      throw new NoActiveTransactionError("commit");
    }
    this.buffer = null;

    if (buffer.length === 0) return;

    const vars: Record<string, unknown> = {};
    const statements = buffer.map((statement, index) => {
      let sql = statement.sql;
      for (const [name, value] of Object.entries(statement.vars)) {
        const indexed = `${name}_${index}`;
        sql = sql.replaceAll(`$${name}`, `$${indexed}`);
        vars[indexed] = value;
      }
      return `${sql};`;
    });

    const sql = ["BEGIN TRANSACTION;", ...statements, "COMMIT TRANSACTION;"].join("\n");
    try {
      await connection.query(sql, vars);
    } catch (error) {
      throw new TransactionError("Failed to commit transaction", error);
    }
    logger.debug(`[Surreal] Committed ${buffer.length} buffered statement(s)`);
  }

  async rollbackTransaction(): Promise<void> {
    this.ensureOpen();
    if (this.buffer === null) {
      throw new NoActiveTransactionError("rollback");
    }

    await Promise.resolve();
    this.buffer = null;
  }

  // ============== Queries ==============

  query<TRecord>(table: TableDefinition<TRecord>): TableQuery<TRecord> {
    this.ensureOpen();
    if (!this.managed.includes(table)) {
      throw new TableNotManagedError(table.qualifiedName, this.backendType);
    }

    const tableName = storageName(table);
    return {
      select: async () => {
        const sql = "SELECT * FROM type::table($table)";
        const rows = await this.queryRows(sql, { table: tableName });
        return rows.map((raw) => table.fromRow(this.decodeRow(table, raw)));
      },
      insert: async (record) => {
        await this.write("CREATE type::table($table) CONTENT $record", {
          table: tableName,
          record: table.toRow(record),
        });
      },
      count: async () => {
        const sql = "SELECT count() AS count FROM type::table($table) GROUP ALL";
        const rows = await this.queryRows(sql, { table: tableName });
        const count = rows[0]?.count;
        return typeof count === "number" ? count : 0;
      },
      deleteAll: async () => {
        await this.write("DELETE type::table($table)", { table: tableName });
      },
    };
  }

  async close(): Promise<void> {
    if (!this.connection) return;

    if (this.buffer !== null && this.buffer.length > 0) {
      logger.warn(
        `[Surreal] Closing with an open transaction; ${this.buffer.length} buffered statement(s) discarded`,
      );
    }
    const connection = this.connection;
    this.connection = null;
    this.buffer = null;
    await connection.close();
  }

  // ============== Private Helpers ==============

  private ensureOpen(): SurrealQueryable {
    if (!this.connection) {
      throw new DatabaseNotOpenError(this.backendType);
    }
    return this.connection;
  }

  private async write(sql: string, vars: Record<string, unknown>): Promise<void> {
    const connection = this.ensureOpen();

    if (this.buffer !== null) {
      this.buffer.push({ sql, vars });
      return;
    }
    await connection.query(sql, vars);
  }

  private async queryRows(sql: string, vars: Record<string, unknown>): Promise<Row[]> {
    const connection = this.ensureOpen();
    const [result] = await connection.query(sql, vars);

    if (!Array.isArray(result)) {
      throw new QueryError(sql, new Error("Expected a list of records"));
    }
    return result.filter(isRow);
  }

  private decodeRow(table: TableDefinition, raw: Row): Row {
    const row: Row = {};
    for (const [column, type] of Object.entries(table.columns)) {
      row[column] = decodeSurrealValue(type, raw[column]);
    }
    return row;
  }
}

/**
 * Type guard to check if a handle is a SurrealDB database.
 */
export function isSurrealDatabase(handle: DatabaseHandle): handle is SurrealDatabase {
  return handle instanceof SurrealDatabase;
}

/**
 * Opens a connection for validated settings.
 */
export type SurrealConnector = (config: SurrealConnectionConfig) => Promise<SurrealQueryable>;

async function connectToSurreal(config: SurrealConnectionConfig): Promise<SurrealQueryable> {
  const connection = new SurrealConnection({
    connectionUrl: config.url,
    username: config.username,
    password: config.password,
    namespace: config.namespace,
    database: config.database,
  });
  await connection.open();
  return connection;
}

/**
 * Provider for the `surreal` backend.
 *
 * Connection settings: `url`, `namespace`, `database`, `username`,
 * `password`, and the table discovery keys `autoscan`, `package`, `tables`.
 * Tables are discovered before connecting, so a bad table list never opens
 * a socket.
 */
export class SurrealProvider implements DatabaseProvider {
  private readonly connect: SurrealConnector;

  constructor(connect: SurrealConnector = connectToSurreal) {
    this.connect = connect;
  }

  async get(host: HostContext | null, connection: ConnectionConfig | null): Promise<SurrealDatabase> {
    const config = parseConfig(SurrealConnectionSchema, connection, "surreal connection");
    if (host === null) {
      throw new InvalidConfigurationError("surreal connection", [
        "table discovery requires a host context",
      ]);
    }

    const tables = await scanTables(host, config);
    const queryable = await this.connect(config);
    return new SurrealDatabase({ connection: queryable, tables });
  }
}
