import pino, { type Logger, type LoggerOptions } from "pino";

export type { Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

export interface LoggerConfig {
  level: LogLevel;
  /** Use pino-pretty (interactive terminals only) */
  pretty?: boolean;
}

/**
 * Create the CLI logger. Logs go to stderr so that stdout carries only
 * command output (tables, generated paths, knowledge content).
 */
export function createLogger(config: LoggerConfig): Logger {
  const options: LoggerOptions = {
    name: "persona-forge",
    level: config.level,
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  if (config.pretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: {
          destination: 2,
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino(options, pino.destination(2));
}

let defaultLogger: Logger = pino({ level: "silent" });

export function setDefaultLogger(logger: Logger): void {
  defaultLogger = logger;
}

export function getLogger(): Logger {
  return defaultLogger;
}
