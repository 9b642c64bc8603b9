/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4,
};

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL?.toLowerCase();
  return raw && isLogLevel(raw) ? raw : "info";
}

// Module-level state
let currentLogLevel: LogLevel = levelFromEnv();

/**
 * Change the active log level at runtime.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Get the active log level.
 */
export function getLogLevel(): LogLevel {
  return currentLogLevel;
}

/**
 * Simple logger with configurable log levels.
 *
 * The initial level comes from the LOG_LEVEL environment variable and
 * defaults to "info". Messages are tagged by component, e.g.
 * `logger.info("[Providers] Registered provider 'sqlite'")`.
 *
 * Log levels (from most to least verbose):
 * - debug: Detailed debugging information
 * - info: General operational information (default)
 * - warn: Warning messages
 * - error: Error messages only
 * - none: No logging
 */
export const logger = {
  debug(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.debug) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  },

  info(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.info) {
      console.info(`[INFO] ${message}`, ...args);
    }
  },

  warn(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.warn) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  },

  error(message: string, ...args: unknown[]) {
    if (LOG_LEVELS[currentLogLevel] <= LOG_LEVELS.error) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  },
};
