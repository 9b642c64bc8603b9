import { DuplicateTableError } from "../errors.ts";
import type { TableDefinition } from "./table_definition.ts";

/**
 * Tables a host makes resolvable by qualified name.
 *
 * Explicit table lists in configuration (`tables: ["shop.users"]`) are
 * resolved against this catalog.
 */
export class TableCatalog {
  private readonly tables = new Map<string, TableDefinition>();

  constructor(tables: readonly TableDefinition[] = []) {
    this.register(...tables);
  }

  /**
   * Register tables under their qualified names.
   * Registering the same definition twice is a no-op.
   *
   * @throws {DuplicateTableError} If another definition already uses the name
   */
  register(...tables: TableDefinition[]): void {
    for (const table of tables) {
      const existing = this.tables.get(table.qualifiedName);
      if (existing === table) continue;
      if (existing) {
        throw new DuplicateTableError(table.qualifiedName);
      }
      this.tables.set(table.qualifiedName, table);
    }
  }

  get(qualifiedName: string): TableDefinition | null {
    return this.tables.get(qualifiedName) ?? null;
  }

  has(qualifiedName: string): boolean {
    return this.tables.has(qualifiedName);
  }

  /** Registered tables in registration order */
  list(): TableDefinition[] {
    return [...this.tables.values()];
  }
}
