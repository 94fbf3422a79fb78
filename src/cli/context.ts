import type { AppConfig } from "../config.js";
import type { Logger } from "../logger.js";

export interface CliContext {
  config: AppConfig;
  logger: Logger;
  /** Command output (stdout) */
  out: (line: string) => void;
  /** User-facing errors (stderr) */
  err: (line: string) => void;
}

/** A command returns its exit code. */
export type Command = (argv: string[], ctx: CliContext) => Promise<number>;
