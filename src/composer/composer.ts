import fs from "node:fs/promises";
import path from "node:path";
import type { Environment } from "nunjucks";
import { Catalog, effectiveCoordination } from "../catalog/loader.js";
import type { AgentConfig } from "../catalog/types.js";
import { errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import { BUNDLED_TEMPLATE_DIR } from "../paths.js";
import { createTemplateEnv, renderTemplate } from "./templates.js";

export const AGENT_TEMPLATE = "agent.md.njk";

export interface AgentComposerOpts {
  dataDir?: string;
  templateDir?: string;
  outputDir?: string;
  catalog?: Catalog;
  logger?: Logger;
}

export interface BuildFailure {
  agent: string;
  error: string;
}

export interface BuildAllResult {
  built: string[];
  failures: BuildFailure[];
}

/**
 * Composes agent markdown from a persona, its traits and its content
 * sections, and writes the result under `<outputDir>/agents/`.
 */
export class AgentComposer {
  readonly dataDir: string;
  readonly templateDir: string;
  readonly outputDir: string;
  readonly catalog: Catalog;
  private env: Environment;
  private logger: Logger;

  constructor(opts: AgentComposerOpts = {}) {
    this.dataDir = opts.catalog?.dataDir ?? opts.dataDir ?? "data";
    this.templateDir = opts.templateDir ?? BUNDLED_TEMPLATE_DIR;
    this.outputDir = opts.outputDir ?? "dist";
    this.logger = (opts.logger ?? getLogger()).child({ component: "composer" });
    this.catalog = opts.catalog ?? new Catalog({ dataDir: this.dataDir, logger: opts.logger });
    this.env = createTemplateEnv({ templateDir: this.templateDir, dataDir: this.dataDir });
  }

  async composeAgent(agent: AgentConfig): Promise<string> {
    const traits = await this.catalog.loadTraits(agent);
    const contentSections = await this.catalog.loadContentSections(agent);

    return renderTemplate(this.env, AGENT_TEMPLATE, {
      agent,
      traits,
      contentSections,
      coordination: effectiveCoordination(agent),
    });
  }

  async buildAgent(name: string): Promise<string> {
    const agent = await this.catalog.resolveAgent(name);
    const content = await this.composeAgent(agent);

    const agentsDir = path.join(this.outputDir, "agents");
    await fs.mkdir(agentsDir, { recursive: true });

    const outputPath = path.join(agentsDir, `${agent.name}.md`);
    await fs.writeFile(outputPath, content, "utf-8");

    this.logger.debug({ agent: agent.name, outputPath }, "Built agent");
    return outputPath;
  }

  async buildAgents(names: string[]): Promise<BuildAllResult> {
    const result: BuildAllResult = { built: [], failures: [] };

    for (const name of names) {
      try {
        result.built.push(await this.buildAgent(name));
      } catch (err) {
        const error = errorMessage(err);
        this.logger.error({ agent: name, err: error }, "Failed to build agent");
        result.failures.push({ agent: name, error });
      }
    }

    return result;
  }

  async buildAllAgents(): Promise<BuildAllResult> {
    return this.buildAgents(await this.catalog.listAgentNames());
  }
}
