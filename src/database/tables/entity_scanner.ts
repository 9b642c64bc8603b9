import { InvalidConfigurationError, ScanIOFailureError, UnknownTableError } from "../errors.ts";
import type { TableScanConfig } from "../config_schemas.ts";
import type { HostContext } from "../types.ts";
import { logger } from "../../utils/logger.ts";
import { FileSystemModuleLoader } from "./module_loader.ts";
import { isTable, type TableDefinition } from "./table_definition.ts";

const defaultLoader = new FileSystemModuleLoader();

/**
 * Determine which tables a database handle manages.
 *
 * - autoscan: every table exported by a module under `host.codeRoot`,
 *   optionally limited to qualified names starting with `config.package`.
 *   Modules that fail to load are skipped; a root that cannot be read is fatal.
 * - explicit: every name in `config.tables`, resolved through `host.tables`.
 *   Any unresolved name is fatal.
 *
 * Both modes keep discovery order and never return the same definition twice.
 *
 * @throws {ScanIOFailureError} If the code root cannot be enumerated
 * @throws {UnknownTableError} If an explicitly listed table cannot be resolved
 * @throws {InvalidConfigurationError} If autoscan is requested without a code root
 */
export async function scanTables(
  host: HostContext,
  config: TableScanConfig,
): Promise<TableDefinition[]> {
  if (config.autoscan) {
    return await autoscanTables(host, config.package);
  }
  return resolveExplicitTables(host, config.tables ?? []);
}

async function autoscanTables(
  host: HostContext,
  packagePrefix: string | undefined,
): Promise<TableDefinition[]> {
  const root = host.codeRoot;
  if (!root) {
    throw new InvalidConfigurationError("table scan", [
      `autoscan requires a code root for '${host.name}'`,
    ]);
  }

  const loader = host.moduleLoader ?? defaultLoader;

  let modulePaths: string[];
  try {
    modulePaths = await loader.listModules(root);
  } catch (error) {
    throw new ScanIOFailureError(root, error);
  }

  const found = new Set<TableDefinition>();
  for (const modulePath of modulePaths) {
    let loaded: unknown;
    try {
      loaded = await loader.loadModule(modulePath);
    } catch (error) {
      logger.debug(`[Scanner] Skipping module that failed to load: ${modulePath}`, error);
      continue;
    }

    if (typeof loaded !== "object" || loaded === null) continue;

    for (const exported of Object.values(loaded)) {
      if (!isTable(exported)) continue;
      if (packagePrefix !== undefined && !exported.qualifiedName.startsWith(packagePrefix)) {
        continue;
      }
      found.add(exported);
    }
  }

  logger.debug(
    `[Scanner] Autoscan of ${root} found ${found.size} table(s) for '${host.name}'`,
  );
  return [...found];
}

function resolveExplicitTables(
  host: HostContext,
  names: readonly string[],
): TableDefinition[] {
  const resolved = new Set<TableDefinition>();

  for (const name of names) {
    const table = host.tables?.get(name) ?? null;
    if (table === null) {
      throw new UnknownTableError(name);
    }
    resolved.add(table);
  }

  return [...resolved];
}
