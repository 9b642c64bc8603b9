/**
 * Database Module
 *
 * Pluggable database handles resolved from configuration:
 * - Table definitions and discovery (explicit lists or autoscan)
 * - Named providers for the map, sqlite and surreal backends
 * - Resolution by name, by configuration section, or for the current host
 * - Copying every table of one database into another
 */

// Tables
export { defineTable, isTable } from "./tables/table_definition.ts";
export type {
  ColumnType,
  TableDefinition,
  TableDefinitionInput,
  TableRecord,
} from "./tables/table_definition.ts";
export { TableCatalog } from "./tables/table_catalog.ts";
export { FileSystemModuleLoader, isScannableModule } from "./tables/module_loader.ts";
export type { ModuleLoader } from "./tables/module_loader.ts";
export { scanTables } from "./tables/entity_scanner.ts";

// Backends
export { MapDatabase, MapProvider, isMapDatabase } from "./backends/map_database.ts";
export type { MapDatabaseOptions } from "./backends/map_database.ts";
export { SqliteDatabase, SqliteProvider, isSqliteDatabase } from "./backends/sqlite_database.ts";
export type { SqliteDatabaseOptions } from "./backends/sqlite_database.ts";
export {
  SurrealDatabase,
  SurrealProvider,
  isSurrealDatabase,
} from "./backends/surreal_database.ts";
export type { SurrealConnector, SurrealDatabaseOptions } from "./backends/surreal_database.ts";
export { SurrealConnection } from "./backends/surreal_connection.ts";
export type { SurrealConnectionOptions, SurrealQueryable } from "./backends/surreal_connection.ts";

// Providers & resolution
export {
  ProviderRegistry,
  providerRegistry,
  registerProvider,
  unregisterProvider,
  hasProvider,
} from "./provider_registry.ts";
export type { ProviderSnapshot } from "./provider_registry.ts";
export {
  DatabaseResolver,
  databases,
  DEFAULT_SECTION_NAME,
  getConfigSection,
  getDatabase,
  getDatabaseFromSection,
  getCurrentDatabase,
} from "./database_resolver.ts";
export { getCurrentHost, runWithHost } from "./host_context.ts";

// Dump
export {
  assertCompatibleSchemas,
  dumpDatabase,
  DUMP_PROGRESS_BATCH_SIZE,
} from "./dump/dump_service.ts";
export type { DumpProgressCallback, DumpResult } from "./dump/dump_service.ts";

// Configuration
export {
  DatabaseSectionSchema,
  MapConnectionSchema,
  SqliteConnectionSchema,
  SurrealConnectionSchema,
  TableScanConfigSchema,
  parseConfig,
} from "./config_schemas.ts";
export type {
  DatabaseSection,
  SqliteConnectionConfig,
  SurrealConnectionConfig,
  TableScanConfig,
} from "./config_schemas.ts";

// Errors
export {
  DatabaseError,
  DatabaseNotOpenError,
  DatabaseAccessError,
  QueryError,
  TableNotManagedError,
  TransactionAlreadyActiveError,
  NoActiveTransactionError,
  TransactionError,
  TransactionStartFailedError,
  TransactionCommitFailedError,
  ProviderNotFoundError,
  ProviderReturnedInvalidError,
  TypeMismatchError,
  BackendConstructionError,
  MissingConfigSectionError,
  MissingProviderKeyError,
  CallerResolutionFailedError,
  InvalidConfigurationError,
  InvalidTableDefinitionError,
  DuplicateTableError,
  UnknownTableError,
  ScanIOFailureError,
  IncompatibleSchemasError,
  DumpTableError,
} from "./errors.ts";

// Types
export type {
  ConfigRoot,
  ConnectionConfig,
  DatabaseHandle,
  DatabaseProvider,
  HandleGuard,
  HostContext,
  Row,
  TableQuery,
} from "./types.ts";
