export * from "./catalog/index.js";
export * from "./composer/index.js";
export * from "./coordination/index.js";
export * from "./generator/index.js";
export * from "./global/index.js";
export * from "./install/index.js";
export * from "./knowledge/index.js";
export * from "./validation/index.js";
export * from "./errors.js";
export { loadConfig, type AppConfig } from "./config.js";
export { createLogger, getLogger, setDefaultLogger, type Logger, type LoggerConfig } from "./logger.js";
export { runCli, USAGE, type CliContext, type CliOpts, type Command } from "./cli/index.js";
