#!/usr/bin/env node
import { runCli } from "./cli/index.js";
import { loadConfig } from "./config.js";
import { createLogger, setDefaultLogger } from "./logger.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, pretty: config.logPretty });
  setDefaultLogger(logger);

  process.exitCode = await runCli(process.argv.slice(2), {
    config,
    logger,
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  });
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
