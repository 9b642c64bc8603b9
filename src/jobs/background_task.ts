import { randomUUID } from "node:crypto";
import { setImmediate } from "node:timers/promises";
import type { BackgroundTask, TaskStatus, TaskWork } from "./types.ts";
import { TaskCancellation } from "./cancellation_token.ts";
import { TaskCancelledError } from "./errors.ts";
import { logger } from "../utils/logger.ts";

class RunningTask<TResult> implements BackgroundTask<TResult> {
  readonly id: string;
  readonly name: string;
  readonly done: Promise<TResult>;

  private readonly token: TaskCancellation;
  private _status: TaskStatus = "pending";

  constructor(name: string, work: TaskWork<TResult>) {
    this.id = randomUUID();
    this.name = name;
    this.token = new TaskCancellation(this.id);
    this.done = this.run(work);

    // Failures are reported here once; callers awaiting `done` still see the rejection
    this.done.catch((error: unknown) => {
      if (error instanceof TaskCancelledError) {
        logger.info(`[Tasks] ${this.name} (${this.id}) cancelled: ${error.reason ?? "no reason provided"}`);
      } else {
        logger.error(`[Tasks] ${this.name} (${this.id}) failed`, error);
      }
    });
  }

  get status(): TaskStatus {
    return this._status;
  }

  cancel(reason?: string): void {
    this.token.cancel(reason);
  }

  private async run(work: TaskWork<TResult>): Promise<TResult> {
    // Leave the caller's stack before doing any work
    await setImmediate();

    try {
      this.token.throwIfCancelled();
      this._status = "running";
      logger.debug(`[Tasks] ${this.name} (${this.id}) started`);

      const result = await work(this.token);
      this._status = "completed";
      logger.debug(`[Tasks] ${this.name} (${this.id}) completed`);
      return result;
    } catch (error) {
      this._status = error instanceof TaskCancelledError ? "cancelled" : "failed";
      throw error;
    }
  }
}

/**
 * Submit work for asynchronous execution.
 *
 * The work starts on the next macrotask, so the call returns before any of
 * it runs. Cancellation is cooperative through the token the work receives.
 *
 * @example
 * ```typescript
 * const task = runBackgroundTask("export", async (token) => {
 *   for (const batch of batches) {
 *     token.throwIfCancelled();
 *     await write(batch);
 *   }
 *   return batches.length;
 * });
 * const written = await task.done;
 * ```
 */
export function runBackgroundTask<TResult>(
  name: string,
  work: TaskWork<TResult>,
): BackgroundTask<TResult> {
  return new RunningTask(name, work);
}
