import { afterEach, expect, test, vi } from "vitest";
import { getLogLevel, isLogLevel, logger, setLogLevel } from "./logger.ts";

const initialLevel = getLogLevel();

afterEach(() => {
  setLogLevel(initialLevel);
  vi.restoreAllMocks();
});

// =====================
// Console spy helpers
// =====================

function spyConsole() {
  return {
    debug: vi.spyOn(console, "debug").mockImplementation(() => {}),
    info: vi.spyOn(console, "info").mockImplementation(() => {}),
    warn: vi.spyOn(console, "warn").mockImplementation(() => {}),
    error: vi.spyOn(console, "error").mockImplementation(() => {}),
  };
}

test("logger prefixes messages with their level", () => {
  setLogLevel("debug");
  const spies = spyConsole();
  const detail = { table: "app.users" };

  logger.debug("[Test] debug message", detail);
  logger.info("[Test] info message");
  logger.warn("[Test] warn message");
  logger.error("[Test] error message");

  expect(spies.debug).toHaveBeenCalledWith("[DEBUG] [Test] debug message", detail);
  expect(spies.info).toHaveBeenCalledWith("[INFO] [Test] info message");
  expect(spies.warn).toHaveBeenCalledWith("[WARN] [Test] warn message");
  expect(spies.error).toHaveBeenCalledWith("[ERROR] [Test] error message");
});

test("logger drops messages below the active level", () => {
  setLogLevel("warn");
  const spies = spyConsole();

  logger.debug("hidden");
  logger.info("hidden");
  logger.warn("shown");
  logger.error("shown");

  expect(spies.debug).not.toHaveBeenCalled();
  expect(spies.info).not.toHaveBeenCalled();
  expect(spies.warn).toHaveBeenCalledTimes(1);
  expect(spies.error).toHaveBeenCalledTimes(1);
});

test("logger level none silences everything", () => {
  setLogLevel("none");
  const spies = spyConsole();

  logger.error("hidden");

  expect(spies.error).not.toHaveBeenCalled();
  expect(getLogLevel()).toBe("none");
});

test("isLogLevel accepts known level names only", () => {
  expect(isLogLevel("debug")).toBe(true);
  expect(isLogLevel("none")).toBe(true);
  expect(isLogLevel("verbose")).toBe(false);
  expect(isLogLevel("DEBUG")).toBe(false);
  expect(isLogLevel("toString")).toBe(false);
});
