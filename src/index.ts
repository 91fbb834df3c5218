export * from "./types.js";
export * from "./matching/normalize.js";
export * from "./matching/tokenize.js";
export * from "./matching/similarity.js";
export * from "./matching/matcher.js";
export * from "./input/loadSnippets.js";
export * from "./report/formatters.js";
export * from "./config/loadConfig.js";
export * from "./errors/input.errors.js";
export * from "./errors/config.errors.js";
export { noopLogger, createAppLogger, type Logger, type AppLogger, type LogLevel } from "./logging/logger.js";
