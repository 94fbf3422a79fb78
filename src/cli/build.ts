import path from "node:path";
import { parseArgs } from "node:util";
import { Catalog } from "../catalog/loader.js";
import { AgentComposer } from "../composer/composer.js";
import { ClaudeMdGenerator } from "../generator/claudeMd.js";
import { GlobalConfigBuilder } from "../global/builder.js";
import { install, installGlobal } from "../install/installer.js";
import { ConfigValidator, formatValidationReport } from "../validation/configValidator.js";
import type { Command } from "./context.js";

export const buildAgents: Command = async (argv, ctx) => {
  const { values } = parseArgs({
    args: argv,
    options: {
      "data-dir": { type: "string", short: "d" },
      "template-dir": { type: "string", short: "t" },
      "output-dir": { type: "string", short: "o" },
      agent: { type: "string", short: "a", multiple: true },
      validate: { type: "boolean", default: false },
    },
  });

  const catalog = new Catalog({ dataDir: values["data-dir"] ?? ctx.config.dataDir, logger: ctx.logger });

  if (values.validate) {
    const report = await new ConfigValidator({ catalog, logger: ctx.logger }).validateAll();
    if (!report.isValid) {
      ctx.out(formatValidationReport(report));
      ctx.err("Validation failed; nothing was built");
      return 1;
    }
  }

  const composer = new AgentComposer({
    catalog,
    templateDir: values["template-dir"] ?? ctx.config.templateDir,
    outputDir: values["output-dir"] ?? ctx.config.outputDir,
    logger: ctx.logger,
  });

  const names = values.agent ?? [];
  const result = names.length > 0 ? await composer.buildAgents(names) : await composer.buildAllAgents();

  for (const built of result.built) ctx.out(`Built ${built}`);
  for (const failure of result.failures) ctx.err(`Failed to build ${failure.agent}: ${failure.error}`);
  ctx.out(`Built ${result.built.length} agent(s) into ${composer.outputDir}`);

  return result.failures.length > 0 ? 1 : 0;
};

export const buildClaude: Command = async (argv, ctx) => {
  const { values } = parseArgs({
    args: argv,
    options: {
      "data-dir": { type: "string", short: "d" },
      "template-dir": { type: "string", short: "t" },
      output: { type: "string", short: "o" },
      "skip-validation": { type: "boolean", default: false },
    },
  });

  const generator = new ClaudeMdGenerator({
    dataDir: values["data-dir"] ?? ctx.config.dataDir,
    templateDir: values["template-dir"] ?? ctx.config.templateDir,
    outputDir: ctx.config.outputDir,
    logger: ctx.logger,
  });

  const outputPath = await generator.generateClaudeMd({
    outputPath: values.output,
    validate: !values["skip-validation"],
  });
  ctx.out(`Generated ${outputPath}`);
  return 0;
};

export const installCommand: Command = async (argv, ctx) => {
  const { values } = parseArgs({
    args: argv,
    options: {
      "output-dir": { type: "string", short: "o" },
      target: { type: "string", short: "t" },
      "dry-run": { type: "boolean", default: false },
      "no-clean": { type: "boolean", default: false },
    },
  });

  const result = await install({
    outputDir: values["output-dir"] ?? ctx.config.outputDir,
    targetDir: values.target ?? ctx.config.installDir,
    clean: !values["no-clean"],
    dryRun: values["dry-run"],
    logger: ctx.logger,
  });

  const verb = result.dryRun ? "Would" : "Did";
  for (const file of result.cleaned) ctx.out(`${verb} remove ${file}`);
  for (const file of result.copied) ctx.out(`${verb} copy ${file}`);

  if (result.dryRun) {
    ctx.out(`Dry run: would install ${result.copied.length} file(s) to ${result.targetDir}`);
  } else {
    ctx.out(`Installed ${result.copied.length} file(s) to ${result.targetDir}`);
  }
  return 0;
};

export const buildGlobal: Command = async (argv, ctx) => {
  const { values } = parseArgs({
    args: argv,
    options: {
      "data-dir": { type: "string", short: "d" },
      "template-dir": { type: "string", short: "t" },
      "output-dir": { type: "string", short: "o" },
      profile: { type: "string", short: "p", default: "developer" },
      environment: { type: "string", short: "e", default: "development" },
    },
  });

  const builder = new GlobalConfigBuilder({
    dataDir: values["data-dir"] ?? ctx.config.dataDir,
    templateDir: values["template-dir"] ?? ctx.config.templateDir,
    outputDir: values["output-dir"] ?? ctx.config.outputDir,
    profile: values.profile,
    environment: values.environment,
    logger: ctx.logger,
  });

  const outputPath = await builder.buildAndSave();
  ctx.out(`Generated ${outputPath} (profile ${builder.profile}, environment ${builder.environment})`);
  return 0;
};

export const installGlobalCommand: Command = async (argv, ctx) => {
  const { values } = parseArgs({
    args: argv,
    options: {
      "output-dir": { type: "string", short: "o" },
      target: { type: "string", short: "t" },
      "dry-run": { type: "boolean", default: false },
    },
  });

  const result = await installGlobal({
    sourcePath: path.join(values["output-dir"] ?? ctx.config.outputDir, "global", "CLAUDE.md"),
    targetDir: values.target ?? ctx.config.installDir,
    dryRun: values["dry-run"],
    logger: ctx.logger,
  });

  const verb = result.dryRun ? "Would" : "Did";
  if (result.backupPath) ctx.out(`${verb} back up the existing CLAUDE.md to ${result.backupPath}`);
  ctx.out(`${verb} install ${result.installedPath}`);
  return 0;
};
