import type { DatabaseHandle } from "../types.ts";
import type { TableDefinition } from "../tables/table_definition.ts";
import {
  DumpTableError,
  IncompatibleSchemasError,
  TransactionCommitFailedError,
  TransactionStartFailedError,
} from "../errors.ts";
import { runBackgroundTask } from "../../jobs/background_task.ts";
import type { BackgroundTask, CancellationToken } from "../../jobs/types.ts";
import { logger } from "../../utils/logger.ts";

/** Progress is reported whenever the remaining row count is a multiple of this */
export const DUMP_PROGRESS_BATCH_SIZE = 100;

/**
 * Receives dump progress.
 *
 * Called with (table, total) when a table starts, (table, remaining) when the
 * remaining count reaches a multiple of 100 (so every non-empty table ends
 * with (table, 0)), and once with (null, 0) after both sides have committed.
 * Runs on the dump's own task, so it should return quickly.
 *
 * A throw before the commits fails the dump and rolls both sides back. A
 * throw from the final (null, 0) call is logged; the dump still completes.
 */
export type DumpProgressCallback = (
  table: TableDefinition | null,
  remaining: number,
) => void;

/**
 * Outcome of a successful dump
 */
export interface DumpResult {
  /** Number of tables copied */
  tables: number;
  /** Number of rows copied across all tables */
  rows: number;
  durationMs: number;
}

/**
 * Check that the destination manages every table of the source.
 *
 * @throws {IncompatibleSchemasError} Listing the source tables the destination lacks
 */
export function assertCompatibleSchemas(
  source: DatabaseHandle,
  destination: DatabaseHandle,
): void {
  const destinationTables = new Set(destination.tables());
  const missing = source
    .tables()
    .filter((table) => !destinationTables.has(table))
    .map((table) => table.qualifiedName);

  if (missing.length > 0) {
    throw new IncompatibleSchemasError(missing);
  }
}

/**
 * Copy every row of every source table into the destination.
 *
 * The schema check runs before this returns; the copy itself runs as a
 * background task:
 * 1. begin a transaction on the source, then on the destination
 * 2. per source table, in source order: read all rows, report (table, total),
 *    insert each row, report (table, remaining) on multiples of 100
 * 3. commit the destination, then the source
 * 4. report (null, 0)
 *
 * On any failure both open transactions are rolled back and `done` rejects.
 * The two commits are independent: if the source commit fails after the
 * destination committed, the copied rows stay in the destination.
 *
 * @throws {IncompatibleSchemasError} If the destination lacks a source table (no I/O is done)
 *
 * @example
 * ```typescript
 * const task = dumpDatabase(sqlite, surreal, (table, remaining) => {
 *   logger.info(`${table?.qualifiedName ?? "done"}: ${remaining}`);
 * });
 * const { rows } = await task.done;
 * ```
 */
export function dumpDatabase(
  source: DatabaseHandle,
  destination: DatabaseHandle,
  onProgress: DumpProgressCallback,
): BackgroundTask<DumpResult> {
  assertCompatibleSchemas(source, destination);

  const tables = [...source.tables()];
  return runBackgroundTask("dump", (token) =>
    runDump({ source, destination, tables, onProgress, token })
  );
}

interface DumpRun {
  source: DatabaseHandle;
  destination: DatabaseHandle;
  tables: TableDefinition[];
  onProgress: DumpProgressCallback;
  token: CancellationToken;
}

async function runDump(run: DumpRun): Promise<DumpResult> {
  const { source, destination, tables } = run;
  const startedAt = Date.now();

  try {
    await source.beginTransaction();
  } catch (error) {
    throw new TransactionStartFailedError("source", error);
  }

  try {
    await destination.beginTransaction();
  } catch (error) {
    await rollbackQuietly(source, "source");
    throw new TransactionStartFailedError("destination", error);
  }

  let rows = 0;
  try {
    for (const table of tables) {
      run.token.throwIfCancelled();
      rows += await dumpTable(run, table);
    }
  } catch (error) {
    await rollbackQuietly(destination, "destination");
    await rollbackQuietly(source, "source");
    throw error;
  }

  try {
    await destination.commitTransaction();
  } catch (error) {
    if (destination.inTransaction) {
      await rollbackQuietly(destination, "destination");
    }
    await rollbackQuietly(source, "source");
    throw new TransactionCommitFailedError("destination", error);
  }

  try {
    await source.commitTransaction();
  } catch (error) {
    if (source.inTransaction) {
      await rollbackQuietly(source, "source");
    }
    throw new TransactionCommitFailedError("source", error);
  }

  try {
    run.onProgress(null, 0);
  } catch (error) {
    logger.warn("[Dump] Progress callback failed after both sides committed", error);
  }

  const result: DumpResult = {
    tables: tables.length,
    rows,
    durationMs: Date.now() - startedAt,
  };
  logger.info(
    `[Dump] Copied ${result.rows} row(s) across ${result.tables} table(s) from ${source.backendType} to ${destination.backendType} in ${result.durationMs}ms`,
  );
  return result;
}

async function dumpTable(run: DumpRun, table: TableDefinition): Promise<number> {
  let records: unknown[];
  try {
    records = await run.source.query(table).select();
  } catch (error) {
    throw new DumpTableError(table.qualifiedName, null, error);
  }

  const target = run.destination.query(table);
  let remaining = records.length;
  run.onProgress(table, remaining);

  for (const [index, record] of records.entries()) {
    run.token.throwIfCancelled();

    try {
      await target.insert(record);
    } catch (error) {
      throw new DumpTableError(table.qualifiedName, index, error);
    }

    remaining--;
    if (remaining % DUMP_PROGRESS_BATCH_SIZE === 0) {
      run.onProgress(table, remaining);
    }
  }

  logger.debug(`[Dump] Copied ${records.length} row(s) of ${table.qualifiedName}`);
  return records.length;
}

/**
 * Roll back during failure handling. The original failure is what the caller
 * needs, so a rollback error is logged rather than thrown.
 */
async function rollbackQuietly(
  handle: DatabaseHandle,
  side: "source" | "destination",
): Promise<void> {
  if (!handle.isOpen || !handle.inTransaction) return;

  try {
    await handle.rollbackTransaction();
  } catch (rollbackError) {
    logger.error(`[Dump] Rollback of ${side} database failed`, rollbackError);
  }
}
