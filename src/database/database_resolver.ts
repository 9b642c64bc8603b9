import type {
  ConfigRoot,
  ConnectionConfig,
  DatabaseHandle,
  HandleGuard,
  HostContext,
} from "./types.ts";
import {
  CallerResolutionFailedError,
  MissingConfigSectionError,
  MissingProviderKeyError,
} from "./errors.ts";
import { DatabaseSectionSchema, parseConfig } from "./config_schemas.ts";
import { providerRegistry, type ProviderRegistry } from "./provider_registry.ts";
import { getCurrentHost } from "./host_context.ts";

/** Section read when the caller does not name one */
export const DEFAULT_SECTION_NAME = "database";

export interface DatabaseResolverOptions {
  registry: ProviderRegistry;
}

/**
 * Read a (possibly dotted) section path from a configuration tree.
 * Returns null if any segment is missing or is not a mapping.
 */
export function getConfigSection(root: ConfigRoot, path: string): ConfigRoot | null {
  let current: unknown = root;
  for (const segment of path.split(".")) {
    if (typeof current !== "object" || current === null || Array.isArray(current)) {
      return null;
    }
    current = Reflect.get(current, segment);
  }

  if (typeof current !== "object" || current === null || Array.isArray(current)) {
    return null;
  }
  return Object.fromEntries(Object.entries(current));
}

/**
 * Resolves database handles from configuration, in three forms of
 * decreasing explicitness:
 *
 * 1. get(): provider name and connection settings given directly
 * 2. fromSection(): read `provider` and `connection` from a host's config section
 * 3. forCurrentHost(): like fromSection(), with the host taken from the
 *    surrounding runWithHost() context
 *
 * @example
 * ```typescript
 * const db = await databases.fromSection(host, "storage", isSqliteDatabase);
 * ```
 */
export class DatabaseResolver {
  private readonly registry: ProviderRegistry;

  constructor(options: DatabaseResolverOptions) {
    this.registry = options.registry;
  }

  /**
   * Resolve with an explicit provider name and connection settings.
   */
  get(
    provider: string,
    host: HostContext | null,
    connection: ConnectionConfig | null,
  ): Promise<DatabaseHandle>;
  get<T extends DatabaseHandle>(
    provider: string,
    host: HostContext | null,
    connection: ConnectionConfig | null,
    guard: HandleGuard<T>,
  ): Promise<T>;
  get<T extends DatabaseHandle>(
    provider: string,
    host: HostContext | null,
    connection: ConnectionConfig | null,
    guard?: HandleGuard<T>,
  ): Promise<DatabaseHandle | T> {
    return guard
      ? this.registry.resolve(provider, host, connection, guard)
      : this.registry.resolve(provider, host, connection);
  }

  /**
   * Resolve from a section of the host's configuration.
   * An absent `connection` is passed to the provider as null.
   *
   * @throws {MissingConfigSectionError} If the section does not exist
   * @throws {MissingProviderKeyError} If the section has no `provider`
   */
  fromSection(host: HostContext, sectionName?: string): Promise<DatabaseHandle>;
  fromSection<T extends DatabaseHandle>(
    host: HostContext,
    sectionName: string | undefined,
    guard: HandleGuard<T>,
  ): Promise<T>;
  async fromSection<T extends DatabaseHandle>(
    host: HostContext,
    sectionName: string = DEFAULT_SECTION_NAME,
    guard?: HandleGuard<T>,
  ): Promise<DatabaseHandle | T> {
    const rawSection = getConfigSection(host.config, sectionName);
    if (rawSection === null) {
      throw new MissingConfigSectionError(sectionName, host.name);
    }

    const section = parseConfig(DatabaseSectionSchema, rawSection, `'${sectionName}' section`);
    if (section.provider === undefined) {
      throw new MissingProviderKeyError(sectionName, this.registry.names());
    }

    const connection = section.connection ?? null;
    return guard
      ? await this.get(section.provider, host, connection, guard)
      : await this.get(section.provider, host, connection);
  }

  /**
   * Resolve from a section of the calling host's configuration, the host
   * being the one passed to the surrounding runWithHost().
   *
   * @throws {CallerResolutionFailedError} If no host context is active
   */
  forCurrentHost(sectionName?: string): Promise<DatabaseHandle>;
  forCurrentHost<T extends DatabaseHandle>(
    sectionName: string | undefined,
    guard: HandleGuard<T>,
  ): Promise<T>;
  async forCurrentHost<T extends DatabaseHandle>(
    sectionName: string = DEFAULT_SECTION_NAME,
    guard?: HandleGuard<T>,
  ): Promise<DatabaseHandle | T> {
    const host = getCurrentHost();
    if (!host) {
      throw new CallerResolutionFailedError();
    }
    return guard
      ? await this.fromSection(host, sectionName, guard)
      : await this.fromSection(host, sectionName);
  }
}

/**
 * Resolver bound to the process-wide provider registry.
 */
export const databases = new DatabaseResolver({ registry: providerRegistry });

/**
 * Resolve a database with an explicit provider name and connection settings.
 */
export function getDatabase(
  provider: string,
  host: HostContext | null,
  connection: ConnectionConfig | null,
): Promise<DatabaseHandle>;
export function getDatabase<T extends DatabaseHandle>(
  provider: string,
  host: HostContext | null,
  connection: ConnectionConfig | null,
  guard: HandleGuard<T>,
): Promise<T>;
export function getDatabase<T extends DatabaseHandle>(
  provider: string,
  host: HostContext | null,
  connection: ConnectionConfig | null,
  guard?: HandleGuard<T>,
): Promise<DatabaseHandle | T> {
  return guard
    ? databases.get(provider, host, connection, guard)
    : databases.get(provider, host, connection);
}

/**
 * Resolve a database from a section of the host's configuration
 * (default section: "database").
 */
export function getDatabaseFromSection(
  host: HostContext,
  sectionName?: string,
): Promise<DatabaseHandle>;
export function getDatabaseFromSection<T extends DatabaseHandle>(
  host: HostContext,
  sectionName: string | undefined,
  guard: HandleGuard<T>,
): Promise<T>;
export function getDatabaseFromSection<T extends DatabaseHandle>(
  host: HostContext,
  sectionName?: string,
  guard?: HandleGuard<T>,
): Promise<DatabaseHandle | T> {
  return guard
    ? databases.fromSection(host, sectionName, guard)
    : databases.fromSection(host, sectionName);
}

/**
 * Resolve a database for the host of the current runWithHost() context
 * (default section: "database").
 */
export function getCurrentDatabase(sectionName?: string): Promise<DatabaseHandle>;
export function getCurrentDatabase<T extends DatabaseHandle>(
  sectionName: string | undefined,
  guard: HandleGuard<T>,
): Promise<T>;
export function getCurrentDatabase<T extends DatabaseHandle>(
  sectionName?: string,
  guard?: HandleGuard<T>,
): Promise<DatabaseHandle | T> {
  return guard
    ? databases.forCurrentHost(sectionName, guard)
    : databases.forCurrentHost(sectionName);
}
