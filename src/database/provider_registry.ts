import type {
  ConnectionConfig,
  DatabaseHandle,
  DatabaseProvider,
  HandleGuard,
  HostContext,
} from "./types.ts";
import {
  BackendConstructionError,
  DatabaseError,
  ProviderNotFoundError,
  ProviderReturnedInvalidError,
  TypeMismatchError,
} from "./errors.ts";
import { MapProvider } from "./backends/map_database.ts";
import { SqliteProvider } from "./backends/sqlite_database.ts";
import { SurrealProvider } from "./backends/surreal_database.ts";
import { logger } from "../utils/logger.ts";

/**
 * Registry contents captured by snapshot()
 */
export type ProviderSnapshot = ReadonlyMap<string, DatabaseProvider>;

/**
 * Maps provider names to providers and turns a name plus connection
 * settings into a database handle.
 *
 * The map is only read and written synchronously, so every register,
 * unregister and lookup is atomic on the event loop. resolve() takes the
 * provider out of the map before awaiting it; unregistering a provider while
 * one of its handles is being built does not affect that resolution.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry();
 * registry.register("sqlite", new SqliteProvider());
 * const db = await registry.resolve("sqlite", host, { file: "shop.db", autoscan: true });
 * ```
 */
export class ProviderRegistry {
  private readonly providers = new Map<string, DatabaseProvider>();

  // ============== Provider Registration ==============

  /**
   * Register a provider. The last registration for a name wins.
   */
  register(name: string, provider: DatabaseProvider): void {
    if (this.providers.has(name)) {
      logger.warn(`[Providers] Overwriting existing provider '${name}'`);
    }
    this.providers.set(name, provider);
    logger.info(`[Providers] Registered provider '${name}'`);
  }

  /**
   * Remove a provider.
   *
   * @returns The removed provider, or null if none was registered
   */
  unregister(name: string): DatabaseProvider | null {
    const provider = this.providers.get(name) ?? null;
    this.providers.delete(name);
    if (provider) {
      logger.info(`[Providers] Unregistered provider '${name}'`);
    }
    return provider;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  /** Registered provider names in registration order */
  names(): string[] {
    return [...this.providers.keys()];
  }

  /**
   * Copy of the current registrations, for restore().
   */
  snapshot(): ProviderSnapshot {
    return new Map(this.providers);
  }

  /**
   * Replace all registrations with a snapshot.
   */
  restore(snapshot: ProviderSnapshot): void {
    this.providers.clear();
    for (const [name, provider] of snapshot) {
      this.providers.set(name, provider);
    }
  }

  // ============== Resolution ==============

  /**
   * Build a database handle with the named provider.
   *
   * @param guard - Checked downcast to a specific handle type
   * @throws {ProviderNotFoundError} If no provider is registered under the name
   * @throws {ProviderReturnedInvalidError} If the provider produced no handle
   * @throws {TypeMismatchError} If the handle fails the guard (the handle is closed)
   * @throws {BackendConstructionError} If the provider failed with a non-database error
   */
  resolve(
    name: string,
    host: HostContext | null,
    connection: ConnectionConfig | null,
  ): Promise<DatabaseHandle>;
  resolve<T extends DatabaseHandle>(
    name: string,
    host: HostContext | null,
    connection: ConnectionConfig | null,
    guard: HandleGuard<T>,
  ): Promise<T>;
  async resolve<T extends DatabaseHandle>(
    name: string,
    host: HostContext | null,
    connection: ConnectionConfig | null,
    guard?: HandleGuard<T>,
  ): Promise<DatabaseHandle | T> {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new ProviderNotFoundError(name, this.names());
    }

    let handle: DatabaseHandle | null | undefined;
    try {
      handle = await provider.get(host, connection);
    } catch (error) {
      if (error instanceof DatabaseError) {
        throw error;
      }
      throw new BackendConstructionError(name, error);
    }

    if (!handle) {
      throw new ProviderReturnedInvalidError(name);
    }

    if (guard && !guard(handle)) {
      try {
        await handle.close();
      } catch (closeError) {
        logger.warn(`[Providers] Failed to close rejected handle from '${name}'`, closeError);
      }
      throw new TypeMismatchError(name, guard.name || "the requested handle type", handle.backendType);
    }

    logger.debug(
      `[Providers] Resolved '${name}' for ${host ? `'${host.name}'` : "anonymous caller"}`,
    );
    return handle;
  }
}

/**
 * Process-wide registry, pre-registered with the built-in providers:
 * `map`, `sqlite` and `surreal`.
 */
export const providerRegistry = new ProviderRegistry();

providerRegistry.register("map", new MapProvider());
providerRegistry.register("sqlite", new SqliteProvider());
providerRegistry.register("surreal", new SurrealProvider());

/**
 * Register a provider on the process-wide registry.
 */
export function registerProvider(name: string, provider: DatabaseProvider): void {
  providerRegistry.register(name, provider);
}

/**
 * Remove a provider from the process-wide registry.
 */
export function unregisterProvider(name: string): DatabaseProvider | null {
  return providerRegistry.unregister(name);
}

/**
 * Check the process-wide registry for a provider.
 */
export function hasProvider(name: string): boolean {
  return providerRegistry.has(name);
}
