import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { pathToFileURL } from "node:url";

/**
 * Enumerates and loads the modules under a code root during autoscan.
 */
export interface ModuleLoader {
  /**
   * List module paths under a root, in a stable order.
   * Errors propagate: a root that cannot be read fails the scan.
   */
  listModules(root: string): Promise<string[]>;

  /**
   * Load one module and return its namespace object.
   * Errors propagate: the scanner skips modules that fail to load.
   */
  loadModule(path: string): Promise<unknown>;
}

const MODULE_EXTENSION_REGEX = /\.(ts|mts|js|mjs)$/;
const DECLARATION_REGEX = /\.d\.m?ts$/;
const TEST_FILE_REGEX = /(_test|\.test|\.spec)\.[a-z]+$/;

/**
 * Check whether a file name looks like a loadable, non-test source module.
 */
export function isScannableModule(fileName: string): boolean {
  return (
    MODULE_EXTENSION_REGEX.test(fileName) &&
    !DECLARATION_REGEX.test(fileName) &&
    !TEST_FILE_REGEX.test(fileName)
  );
}

/**
 * Loads modules from the local filesystem via dynamic import().
 */
export class FileSystemModuleLoader implements ModuleLoader {
  async listModules(root: string): Promise<string[]> {
    const entries = await readdir(root, { recursive: true, withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && isScannableModule(entry.name))
      .map((entry) => join(entry.parentPath ?? entry.path, entry.name))
      .sort();
  }

  async loadModule(path: string): Promise<unknown> {
    const loaded: unknown = await import(pathToFileURL(path).href);
    return loaded;
  }
}
