import type { CancellationToken } from "./types.ts";
import { TaskCancelledError } from "./errors.ts";

/**
 * Cancellation state of one background task.
 *
 * The task keeps this object and calls cancel(); its work is handed the same
 * object typed as the read-only CancellationToken.
 */
export class TaskCancellation implements CancellationToken {
  private cancelled = false;
  private cancelReason: string | undefined;

  constructor(private readonly taskId: string) {}

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new TaskCancelledError(this.taskId, this.cancelReason);
    }
  }

  /**
   * Request cancellation. Only the first reason is kept.
   */
  cancel(reason?: string): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.cancelReason = reason;
  }
}
