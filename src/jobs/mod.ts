/**
 * Background Task Module
 *
 * Runs units of work off the caller's stack:
 * - Awaitable handle with status tracking
 * - Cooperative cancellation with tokens
 * - Failure logging at the task boundary
 */

export { runBackgroundTask } from "./background_task.ts";

// Cancellation
export { TaskCancellation } from "./cancellation_token.ts";

// Errors
export { JobError, TaskCancelledError } from "./errors.ts";

// Types
export type {
  BackgroundTask,
  CancellationToken,
  TaskStatus,
  TaskWork,
} from "./types.ts";
