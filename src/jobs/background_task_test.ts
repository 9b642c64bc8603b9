import { afterEach, expect, test, vi } from "vitest";
import { runBackgroundTask } from "./background_task.ts";
import { TaskCancelledError } from "./errors.ts";
import { getLogLevel, setLogLevel } from "../utils/logger.ts";

const initialLevel = getLogLevel();

afterEach(() => {
  setLogLevel(initialLevel);
  vi.restoreAllMocks();
});

test("runBackgroundTask resolves with the work's result", async () => {
  const task = runBackgroundTask("sum", () => Promise.resolve(42));

  expect(await task.done).toBe(42);
  expect(task.status).toBe("completed");
  expect(task.name).toBe("sum");
});

test("runBackgroundTask returns before the work starts", async () => {
  let started = false;
  const task = runBackgroundTask("deferred", () => {
    started = true;
    return Promise.resolve();
  });

  expect(started).toBe(false);
  expect(task.status).toBe("pending");

  await task.done;
  expect(started).toBe(true);
});

test("runBackgroundTask gives each task its own id", () => {
  const first = runBackgroundTask("a", () => Promise.resolve());
  const second = runBackgroundTask("b", () => Promise.resolve());

  expect(first.id).not.toBe(second.id);
});

test("runBackgroundTask rejects with the work's error and logs it once", async () => {
  setLogLevel("error");
  const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
  const error = new Error("boom");

  const task = runBackgroundTask("failing", () => Promise.reject(error));

  await expect(task.done).rejects.toBe(error);
  expect(task.status).toBe("failed");
  expect(consoleError).toHaveBeenCalledTimes(1);
  expect(consoleError).toHaveBeenCalledWith(`[ERROR] [Tasks] failing (${task.id}) failed`, error);
});

test("runBackgroundTask cancellation is observed through the token", async () => {
  let checkpoints = 0;
  const task = runBackgroundTask("polling", async (token) => {
    for (;;) {
      token.throwIfCancelled();
      checkpoints++;
      await new Promise((resolve) => setImmediate(resolve));
    }
  });

  // Let the work start and pass its first checkpoint
  await new Promise((resolve) => setImmediate(resolve));
  await new Promise((resolve) => setImmediate(resolve));
  expect(checkpoints).toBeGreaterThan(0);
  expect(task.status).toBe("running");
  task.cancel("no longer needed");

  await expect(task.done).rejects.toThrow(TaskCancelledError);
  await expect(task.done).rejects.toMatchObject({ reason: "no longer needed", taskId: task.id });
  expect(task.status).toBe("cancelled");
});

test("runBackgroundTask cancellation is logged at info, not as a failure", async () => {
  setLogLevel("info");
  const consoleInfo = vi.spyOn(console, "info").mockImplementation(() => {});
  const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});

  const task = runBackgroundTask("cancelled", () => Promise.resolve());
  task.cancel();

  await expect(task.done).rejects.toThrow(TaskCancelledError);
  expect(consoleInfo).toHaveBeenCalledWith(
    `[INFO] [Tasks] cancelled (${task.id}) cancelled: no reason provided`,
  );
  expect(consoleError).not.toHaveBeenCalled();
});
