import { parseArgs } from "node:util";
import { Catalog } from "../catalog/loader.js";
import { formatIssue } from "../coordination/consistency.js";
import { CoordinationValidator } from "../coordination/validator.js";
import { ConfigValidator, formatValidationReport } from "../validation/configValidator.js";
import type { Command } from "./context.js";

const dataDirOption = { "data-dir": { type: "string", short: "d" } } as const;

export const validate: Command = async (argv, ctx) => {
  const { values } = parseArgs({ args: argv, options: dataDirOption });
  const validator = new ConfigValidator({ dataDir: values["data-dir"] ?? ctx.config.dataDir, logger: ctx.logger });

  const report = await validator.validateAll();
  ctx.out(formatValidationReport(report));
  return report.isValid ? 0 : 1;
};

export const validateCoordination: Command = async (argv, ctx) => {
  const { values } = parseArgs({
    args: argv,
    options: { ...dataDirOption, agent: { type: "string", short: "a", multiple: true } },
  });

  const validator = new CoordinationValidator({
    dataDir: values["data-dir"] ?? ctx.config.dataDir,
    logger: ctx.logger,
  });
  const report = await validator.loadAndValidate(values.agent);

  ctx.out(report.summary());
  if (report.consistencyIssues.length > 0) {
    ctx.out("");
    for (const issue of report.consistencyIssues) ctx.out(formatIssue(issue));
  }
  return report.isValid ? 0 : 1;
};

export const listAgents: Command = async (argv, ctx) => {
  const { values } = parseArgs({ args: argv, options: dataDirOption });
  const catalog = new Catalog({ dataDir: values["data-dir"] ?? ctx.config.dataDir, logger: ctx.logger });

  const agents = await catalog.loadAllAgents();
  if (agents.length === 0) {
    ctx.out(`No agents found in ${catalog.personasDir}`);
    return 0;
  }

  const nameWidth = Math.max(...agents.map((a) => a.name.length));
  const modelWidth = Math.max(...agents.map((a) => a.model.length));
  ctx.out(`Available agents (${agents.length}):`);
  for (const agent of agents) {
    ctx.out(`  ${agent.name.padEnd(nameWidth)}  ${agent.model.padEnd(modelWidth)}  ${agent.description}`);
  }
  return 0;
};
