import { Surreal } from "surrealdb";
import { DatabaseAccessError, DatabaseNotOpenError, QueryError } from "../errors.ts";

/**
 * The part of a SurrealDB connection a SurrealDatabase needs.
 * Tests substitute an in-process fake.
 */
export interface SurrealQueryable {
  /**
   * Run SurrealQL and return one result per statement.
   * Rejects when any statement fails.
   */
  query(sql: string, vars?: Record<string, unknown>): Promise<unknown[]>;
  close(): Promise<void>;
}

/**
 * Configuration options for SurrealConnection
 */
export interface SurrealConnectionOptions {
  /** WebSocket or HTTP endpoint (e.g., "ws://127.0.0.1:8000/rpc") */
  connectionUrl: string;
  /** Root or namespace username; no sign-in when omitted */
  username?: string;
  password?: string;
  /** Namespace to use (default: "main") */
  namespace?: string;
  /** Database name to use (default: "main") */
  database?: string;
}

/**
 * A connection to a running SurrealDB server.
 *
 * @example
 * ```typescript
 * const connection = new SurrealConnection({
 *   connectionUrl: "ws://127.0.0.1:8000/rpc",
 *   username: "root",
 *   password: "root",
 * });
 * await connection.open();
 * const [users] = await connection.query("SELECT * FROM users");
 * await connection.close();
 * ```
 */
export class SurrealConnection implements SurrealQueryable {
  private readonly connectionUrl: string;
  private readonly username: string | undefined;
  private readonly password: string;
  private readonly namespace: string;
  private readonly database: string;

  private db: Surreal | null = null;

  constructor(options: SurrealConnectionOptions) {
    this.connectionUrl = options.connectionUrl;
    this.username = options.username;
    this.password = options.password ?? "";
    this.namespace = options.namespace ?? "main";
    this.database = options.database ?? "main";
  }

  // ============== Connection Management ==============

  /**
   * Connects, signs in (when a username is configured) and selects the
   * namespace and database.
   */
  async open(): Promise<void> {
    if (this.db) return; // Already open

    const db = new Surreal();
    try {
      await db.connect(this.connectionUrl, {
        namespace: this.namespace,
        database: this.database,
        auth: this.username === undefined
          ? undefined
          : { username: this.username, password: this.password },
      });
    } catch (error) {
      await db.close();
      throw new DatabaseAccessError(this.connectionUrl, error);
    }

    this.db = db;
  }

  /**
   * Closes the connection.
   * Safe to call multiple times.
   */
  async close(): Promise<void> {
    if (!this.db) return;

    const db = this.db;
    this.db = null;
    await db.close();
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  // ============== Query Operations ==============

  async query(sql: string, vars?: Record<string, unknown>): Promise<unknown[]> {
    if (!this.db) {
      throw new DatabaseNotOpenError("surreal");
    }

    try {
      return await this.db.query<unknown[]>(sql, vars);
    } catch (error) {
      throw new QueryError(sql, error);
    }
  }
}
