import { errorMessage } from "../errors.js";
import { buildAgents, buildClaude, buildGlobal, installCommand, installGlobalCommand } from "./build.js";
import type { CliContext, Command } from "./context.js";
import { knowledgeCommand, knowledgeHealthCommand, type ProviderFactory } from "./knowledge.js";
import { listAgents, validate, validateCoordination } from "./validate.js";

export type { CliContext, Command } from "./context.js";

export const USAGE = `Usage: persona-forge <command> [options]

Commands:
  build, build-agents     Compose agent markdown (-d, -t, -o, -a <name>..., --validate)
  build-claude            Generate CLAUDE.md (-d, -t, -o <file>, --skip-validation)
  validate                Check personas, traits, compositions and content (-d)
  validate-coordination   Check the coordination graph (-d, -a <name>...)
  list-agents             List available agents (-d)
  build-global            Generate the global CLAUDE.md (-d, -t, -o, -p <profile>, -e <environment>)
  install                 Copy build output to ~/.claude (-o, -t/--target, --dry-run, --no-clean)
  install-global          Install the global CLAUDE.md, backing up the old one (-o, -t/--target, --dry-run)
  knowledge <framework>   Fetch documentation or a security checklist (--type, --topic, --version, --tokens)
  knowledge-health        Check the documentation source
`;

export interface CliOpts {
  /** Replaces the MCP-backed provider, mainly for tests */
  knowledgeProvider?: ProviderFactory;
}

export function commandTable(opts: CliOpts = {}): Record<string, Command> {
  return {
    build: buildAgents,
    "build-agents": buildAgents,
    "build-claude": buildClaude,
    validate,
    "validate-coordination": validateCoordination,
    "list-agents": listAgents,
    "build-global": buildGlobal,
    install: installCommand,
    "install-global": installGlobalCommand,
    knowledge: knowledgeCommand(opts.knowledgeProvider),
    "knowledge-health": knowledgeHealthCommand(opts.knowledgeProvider),
  };
}

/** Run one command and return the process exit code. */
export async function runCli(argv: string[], ctx: CliContext, opts: CliOpts = {}): Promise<number> {
  const [name, ...rest] = argv;

  if (name === undefined || name === "help" || name === "--help" || name === "-h") {
    ctx.out(USAGE);
    return name === undefined ? 1 : 0;
  }

  const commands = commandTable(opts);
  if (!Object.hasOwn(commands, name)) {
    ctx.err(`Unknown command: ${name}`);
    ctx.err(USAGE);
    return 1;
  }

  try {
    return await commands[name](rest, ctx);
  } catch (err) {
    ctx.logger.debug({ err, command: name }, "Command failed");
    ctx.err(`Error: ${errorMessage(err)}`);
    return 1;
  }
}
