/**
 * Background task status.
 *
 * State transitions:
 * - pending -> running (on the next macrotask after submission)
 * - running -> completed (on success)
 * - running -> failed (on error)
 * - pending/running -> cancelled (when the work observes cancellation)
 */
export type TaskStatus = "pending" | "running" | "completed" | "failed" | "cancelled";

/**
 * Cancellation token passed to task work.
 *
 * Cancellation is cooperative: the work checks the token at its own safe
 * points and bails out there.
 */
export interface CancellationToken {
  /** Whether cancellation has been requested */
  readonly isCancelled: boolean;
  /** The reason for cancellation, if provided */
  readonly reason: string | undefined;
  /** Throws TaskCancelledError if cancellation was requested */
  throwIfCancelled(): void;
}

/**
 * Work run by a background task.
 */
export type TaskWork<TResult> = (token: CancellationToken) => Promise<TResult>;

/**
 * Handle to a unit of work running off the caller's stack.
 *
 * @template TResult - Value the work resolves to
 */
export interface BackgroundTask<TResult> {
  /** Unique task identifier */
  readonly id: string;
  /** Human-readable task name used in logs */
  readonly name: string;
  readonly status: TaskStatus;
  /** Settles with the work's outcome */
  readonly done: Promise<TResult>;
  /** Request cancellation; takes effect at the work's next checkpoint */
  cancel(reason?: string): void;
}
