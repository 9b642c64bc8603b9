/**
 * Base error class for database-related errors
 */
export class DatabaseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DatabaseError";
  }
}

// ============== Connection & Query Errors ==============

/**
 * Thrown when attempting operations on a closed database handle
 */
export class DatabaseNotOpenError extends DatabaseError {
  constructor(backendType?: string) {
    super(
      backendType
        ? `Database connection (${backendType}) is not open`
        : "Database connection is not open",
    );
    this.name = "DatabaseNotOpenError";
  }
}

/**
 * Thrown when the database file, directory or server cannot be accessed
 */
export class DatabaseAccessError extends DatabaseError {
  public readonly location: string;
  public readonly originalError: unknown;

  constructor(location: string, originalError: unknown) {
    super(`Cannot access database at: ${location}`);
    this.name = "DatabaseAccessError";
    this.location = location;
    this.originalError = originalError;
  }
}

/**
 * Thrown when a query fails to execute
 */
export class QueryError extends DatabaseError {
  public readonly sql: string;
  public readonly originalError: unknown;

  constructor(sql: string, originalError: unknown) {
    // In production, don't include SQL in error message to prevent information leakage
    const isProduction = process.env.NODE_ENV === "production";
    let message: string;

    if (isProduction) {
      message = "Query execution failed";
    } else {
      const truncatedSql = sql.length > 100 ? `${sql.substring(0, 100)}...` : sql;
      message = `Query execution failed: ${truncatedSql}`;
    }

    super(message);
    this.name = "QueryError";
    this.sql = sql; // Still stored for debugging/logging purposes
    this.originalError = originalError;
  }
}

/**
 * Thrown when a handle is asked to query a table it does not manage
 */
export class TableNotManagedError extends DatabaseError {
  public readonly tableName: string;

  constructor(tableName: string, backendType: string) {
    super(`Table '${tableName}' is not managed by this ${backendType} database`);
    this.name = "TableNotManagedError";
    this.tableName = tableName;
  }
}

// ============== Transaction Errors ==============

/**
 * Thrown when beginTransaction() is called while a transaction is already open
 */
export class TransactionAlreadyActiveError extends DatabaseError {
  constructor(message = "A transaction is already active; nested transactions are not supported") {
    super(message);
    this.name = "TransactionAlreadyActiveError";
  }
}

/**
 * Thrown when commit or rollback is requested without an open transaction
 */
export class NoActiveTransactionError extends DatabaseError {
  constructor(operation: "commit" | "rollback") {
    super(`Cannot ${operation}: no active transaction`);
    this.name = "NoActiveTransactionError";
  }
}

/**
 * Thrown when a transaction operation fails (BEGIN, COMMIT, ROLLBACK)
 */
export class TransactionError extends DatabaseError {
  public override readonly cause?: unknown;

  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "TransactionError";
    this.cause = cause;
  }
}

/**
 * Thrown when a dump cannot open its transaction on one side
 */
export class TransactionStartFailedError extends TransactionError {
  public readonly side: "source" | "destination";

  constructor(side: "source" | "destination", cause: unknown) {
    super(`Failed to begin transaction on ${side} database`, cause);
    this.name = "TransactionStartFailedError";
    this.side = side;
  }
}

/**
 * Thrown when a dump cannot commit one side.
 * The destination's state after this error depends on the backend.
 */
export class TransactionCommitFailedError extends TransactionError {
  public readonly side: "source" | "destination";

  constructor(side: "source" | "destination", cause: unknown) {
    super(`Failed to commit transaction on ${side} database`, cause);
    this.name = "TransactionCommitFailedError";
    this.side = side;
  }
}

// ============== Provider & Resolution Errors ==============

/**
 * Thrown when no provider is registered under a name
 */
export class ProviderNotFoundError extends DatabaseError {
  public readonly providerName: string;

  constructor(providerName: string, available: readonly string[]) {
    const list = available.length > 0 ? available.join(", ") : "none";
    super(`Provider '${providerName}' not found. Available: ${list}`);
    this.name = "ProviderNotFoundError";
    this.providerName = providerName;
  }
}

/**
 * Thrown when a provider resolves without a database handle
 */
export class ProviderReturnedInvalidError extends DatabaseError {
  public readonly providerName: string;

  constructor(providerName: string) {
    super(`Provider '${providerName}' returned no database`);
    this.name = "ProviderReturnedInvalidError";
    this.providerName = providerName;
  }
}

/**
 * Thrown when the handle a provider produced is not the type the caller asked for
 */
export class TypeMismatchError extends DatabaseError {
  public readonly providerName: string;
  public readonly expected: string;
  public readonly actual: string;

  constructor(providerName: string, expected: string, actual: string) {
    super(
      `Provider '${providerName}' produced a '${actual}' database, which does not satisfy ${expected}`,
    );
    this.name = "TypeMismatchError";
    this.providerName = providerName;
    this.expected = expected;
    this.actual = actual;
  }
}

/**
 * Thrown when a provider fails with an error that is not a DatabaseError
 */
export class BackendConstructionError extends DatabaseError {
  public readonly providerName: string;
  public readonly originalError: unknown;

  constructor(providerName: string, originalError: unknown) {
    const detail = originalError instanceof Error ? `: ${originalError.message}` : "";
    super(`Provider '${providerName}' failed to construct a database${detail}`);
    this.name = "BackendConstructionError";
    this.providerName = providerName;
    this.originalError = originalError;
  }
}

/**
 * Thrown when the configured database section does not exist
 */
export class MissingConfigSectionError extends DatabaseError {
  public readonly sectionName: string;

  constructor(sectionName: string, hostName: string) {
    super(
      `Please add a '${sectionName}' section containing a 'provider' value and (if the provider requires it) a 'connection' section to ${hostName}'s configuration`,
    );
    this.name = "MissingConfigSectionError";
    this.sectionName = sectionName;
  }
}

/**
 * Thrown when a database section has no provider key
 */
export class MissingProviderKeyError extends DatabaseError {
  public readonly sectionName: string;

  constructor(sectionName: string, available: readonly string[]) {
    super(
      `Please add a 'provider' value in the '${sectionName}' section. Available: ${available.join(", ")}`,
    );
    this.name = "MissingProviderKeyError";
    this.sectionName = sectionName;
  }
}

/**
 * Thrown when the calling host cannot be determined from the current context
 */
export class CallerResolutionFailedError extends DatabaseError {
  constructor() {
    super(
      "Cannot determine the calling host: no host context is active. Wrap the call in runWithHost() or pass the host explicitly",
    );
    this.name = "CallerResolutionFailedError";
  }
}

/**
 * Thrown when configuration values fail validation
 */
export class InvalidConfigurationError extends DatabaseError {
  public readonly issues: readonly string[];

  constructor(context: string, issues: readonly string[]) {
    super(`Invalid ${context} configuration: ${issues.join("; ")}`);
    this.name = "InvalidConfigurationError";
    this.issues = issues;
  }
}

// ============== Table Discovery Errors ==============

/**
 * Thrown when a table definition is malformed
 */
export class InvalidTableDefinitionError extends DatabaseError {
  constructor(tableName: string, reason: string) {
    super(`Invalid table definition '${tableName}': ${reason}`);
    this.name = "InvalidTableDefinitionError";
  }
}

/**
 * Thrown when two different definitions claim the same qualified name
 */
export class DuplicateTableError extends DatabaseError {
  public readonly qualifiedName: string;

  constructor(qualifiedName: string) {
    super(`A different table is already registered as '${qualifiedName}'`);
    this.name = "DuplicateTableError";
    this.qualifiedName = qualifiedName;
  }
}

/**
 * Thrown when a configured table name cannot be resolved
 */
export class UnknownTableError extends DatabaseError {
  public readonly tableName: string;

  constructor(tableName: string) {
    super(`Unknown table '${tableName}'`);
    this.name = "UnknownTableError";
    this.tableName = tableName;
  }
}

/**
 * Thrown when the code root cannot be enumerated during autoscan
 */
export class ScanIOFailureError extends DatabaseError {
  public readonly root: string;
  public readonly originalError: unknown;

  constructor(root: string, originalError: unknown) {
    super(`Failed to scan for tables under: ${root}`);
    this.name = "ScanIOFailureError";
    this.root = root;
    this.originalError = originalError;
  }
}

// ============== Dump Errors ==============

/**
 * Thrown when the destination does not manage every table of the source
 */
export class IncompatibleSchemasError extends DatabaseError {
  public readonly missingTables: readonly string[];

  constructor(missingTables: readonly string[]) {
    super(
      `Destination database does not contain all tables to be dumped. Missing: ${missingTables.join(", ")}`,
    );
    this.name = "IncompatibleSchemasError";
    this.missingTables = missingTables;
  }
}

/**
 * Thrown when reading or inserting a row aborts a dump
 */
export class DumpTableError extends DatabaseError {
  public readonly tableName: string;
  /** Index of the failed row, or null when reading the table failed */
  public readonly rowIndex: number | null;
  public override readonly cause: unknown;

  constructor(tableName: string, rowIndex: number | null, cause: unknown) {
    const where = rowIndex === null ? "reading" : `inserting row ${rowIndex} of`;
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Dump failed while ${where} table '${tableName}'${detail}`);
    this.name = "DumpTableError";
    this.tableName = tableName;
    this.rowIndex = rowIndex;
    this.cause = cause;
  }
}
