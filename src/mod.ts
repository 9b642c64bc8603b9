export * from "./database/mod.ts";
export * from "./jobs/mod.ts";
export { logger, setLogLevel, getLogLevel, isLogLevel } from "./utils/logger.ts";
export type { LogLevel } from "./utils/logger.ts";
