/**
 * Base error class for background task errors.
 */
export class JobError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobError";
  }
}

/**
 * Thrown when task work detects cancellation via the cancellation token.
 */
export class TaskCancelledError extends JobError {
  public readonly taskId: string;
  public readonly reason?: string;

  constructor(taskId: string, reason?: string) {
    super(
      reason
        ? `Task ${taskId} was cancelled: ${reason}`
        : `Task ${taskId} was cancelled`,
    );
    this.name = "TaskCancelledError";
    this.taskId = taskId;
    this.reason = reason;
  }
}
