/**
 * Shared utilities for the entrypoint.
 */
export type { EntrypointPaths, Lead, LogEntry, LogLevel, SupabaseCredentials } from "./types.js";
export { LOG_LEVELS, isLogLevel } from "./types.js";
export { Logger, createLogger } from "./logger.js";
export type { LoggerContext, LoggerOptions } from "./logger.js";
