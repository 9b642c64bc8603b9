import { expect, test } from "vitest";
import { TaskCancellation } from "./cancellation_token.ts";
import { TaskCancelledError } from "./errors.ts";

test("TaskCancellation starts uncancelled", () => {
  const cancellation = new TaskCancellation("task-1");

  expect(cancellation.isCancelled).toBe(false);
  expect(cancellation.reason).toBeUndefined();
  expect(() => cancellation.throwIfCancelled()).not.toThrow();
});

test("TaskCancellation.cancel records the reason and throws at checkpoints", () => {
  const cancellation = new TaskCancellation("task-1");

  cancellation.cancel("stop");

  expect(cancellation.isCancelled).toBe(true);
  expect(cancellation.reason).toBe("stop");
  expect(() => cancellation.throwIfCancelled()).toThrow(TaskCancelledError);
  expect(() => cancellation.throwIfCancelled()).toThrow("Task task-1 was cancelled: stop");
});

test("TaskCancellation keeps the first reason", () => {
  const cancellation = new TaskCancellation("task-1");

  cancellation.cancel("first");
  cancellation.cancel("second");

  expect(cancellation.reason).toBe("first");
});

test("TaskCancelledError message without a reason", () => {
  expect(new TaskCancelledError("task-3").message).toBe("Task task-3 was cancelled");
});
