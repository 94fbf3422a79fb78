import fs from "node:fs/promises";
import path from "node:path";
import type { Environment } from "nunjucks";
import type { z } from "zod";
import { Catalog, pathExists } from "../catalog/loader.js";
import { createTemplateEnv, renderTemplate } from "../composer/templates.js";
import { ContentNotFoundError } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import { BUNDLED_TEMPLATE_DIR } from "../paths.js";
import { environmentFileSchema, profileFileSchema, type EnvironmentFile, type ProfileFile } from "./schemas.js";

export const GLOBAL_TEMPLATE = "global-CLAUDE.md.njk";

/** Base rules cannot be replaced; environment sections replace profile sections. */
export const BASE_PRIORITY = 100;
export const ENVIRONMENT_PRIORITY = 75;
export const PROFILE_PRIORITY = 50;

export const SECTION_SEPARATOR = "\n\n---\n\n";

export interface ConfigSection {
  name: string;
  content: string;
  priority: number;
  /** e.g. "base/branch-safety.md", "profiles/developer.yaml" */
  source: string;
}

export interface GlobalConfigBuilderOpts {
  dataDir?: string;
  templateDir?: string;
  outputDir?: string;
  profile?: string;
  environment?: string;
  catalog?: Catalog;
  now?: () => Date;
  logger?: Logger;
}

export interface GlobalBuild {
  content: string;
  sections: ConfigSection[];
  /** Agents named in the profile that the catalog does not have */
  unknownAgents: string[];
}

export function sectionName(raw: string): string {
  return raw.replace(/-/g, "_");
}

/**
 * Keep one section per name: the highest priority wins, and ties go to the
 * earlier section. A replaced section keeps its original position.
 */
export function mergeSections(sections: ConfigSection[]): ConfigSection[] {
  const merged = new Map<string, ConfigSection>();
  for (const section of sections) {
    const current = merged.get(section.name);
    if (!current || section.priority > current.priority) merged.set(section.name, section);
  }
  return [...merged.values()];
}

function money(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export function profileSection(profile: ProfileFile): string {
  const lines = ["## Profile-Specific Configuration"];

  const priorities = Object.entries(profile.agent_priorities);
  if (priorities.length > 0) {
    lines.push("", "### Agent Priority Configuration");
    for (const [level, agents] of priorities) {
      lines.push("", `**${level.toUpperCase()} Priority Agents:**`);
      for (const agent of agents) lines.push(`- \`${agent}\` - Enhanced detection and reduced cost thresholds`);
    }
  }

  const cost = profile.cost_preferences;
  if (cost) {
    lines.push(
      "",
      "### Cost Management",
      "",
      `- **Daily Budget**: ${money(cost.daily_budget)}`,
      `- **Session Budget**: ${money(cost.session_budget)}`,
      `- **Tier Preference**: ${cost.tier_preference}`,
      `- **Escalation Threshold**: ${cost.escalation_threshold} attempts`
    );
  }

  const workflow = profile.workflow_preferences;
  if (workflow) {
    lines.push(
      "",
      "### Workflow Preferences",
      "",
      `- **Testing Requirement**: ${workflow.testing_requirement}`,
      `- **Documentation Level**: ${workflow.documentation_level}`,
      `- **Git Workflow**: ${workflow.git_workflow}`,
      `- **Deployment Strategy**: ${workflow.deployment_strategy}`
    );
  }

  return lines.join("\n");
}

export function environmentSection(environment: EnvironmentFile): string {
  const lines = ["## Environment Configuration"];

  const enforcement = environment.enforcement_overrides;
  if (enforcement) {
    lines.push(
      "",
      "### Enforcement Adjustments",
      "",
      `- **Branch Protection**: ${enforcement.branch_protection}`,
      `- **Context Verification**: ${enforcement.context_verification}`,
      `- **Cost Monitoring**: ${enforcement.cost_monitoring}`
    );
  }

  const cost = environment.cost_overrides;
  if (cost) {
    lines.push(
      "",
      "### Cost Adjustments",
      "",
      `- **Daily Budget Multiplier**: ${cost.daily_budget_multiplier}x`,
      `- **Session Budget Multiplier**: ${cost.session_budget_multiplier}x`,
      `- **Escalation Threshold**: ${cost.escalation_threshold} attempts`
    );
  }

  return lines.join("\n");
}

/**
 * Builds the machine-wide CLAUDE.md from three layers under
 * `<dataDir>/global/`:
 *
 *   base/*.md                     mandatory rules, always included
 *   profiles/<profile>.yaml       user preferences
 *   environments/<env>.yaml       per-environment adjustments
 *
 * Missing profile or environment files fall back to defaults; a missing
 * base directory is an error.
 */
export class GlobalConfigBuilder {
  readonly globalDir: string;
  readonly outputDir: string;
  readonly profile: string;
  readonly environment: string;
  readonly catalog: Catalog;
  private env: Environment;
  private now: () => Date;
  private logger: Logger;

  constructor(opts: GlobalConfigBuilderOpts = {}) {
    const dataDir = opts.catalog?.dataDir ?? opts.dataDir ?? "data";
    this.globalDir = path.join(dataDir, "global");
    this.outputDir = opts.outputDir ?? "dist";
    this.profile = opts.profile ?? "developer";
    this.environment = opts.environment ?? "development";
    this.logger = (opts.logger ?? getLogger()).child({ component: "global-builder" });
    this.catalog = opts.catalog ?? new Catalog({ dataDir, logger: opts.logger });
    this.env = createTemplateEnv({ templateDir: opts.templateDir ?? BUNDLED_TEMPLATE_DIR });
    this.now = opts.now ?? (() => new Date());
  }

  get outputPath(): string {
    return path.join(this.outputDir, "global", "CLAUDE.md");
  }

  async loadBaseSections(): Promise<ConfigSection[]> {
    const baseDir = path.join(this.globalDir, "base");
    if (!(await pathExists(baseDir))) {
      throw new ContentNotFoundError("global/base", path.dirname(this.globalDir));
    }

    const files = (await fs.readdir(baseDir)).filter((f) => f.endsWith(".md")).sort();
    return Promise.all(
      files.map(async (file) => ({
        name: sectionName(path.basename(file, ".md")),
        content: await fs.readFile(path.join(baseDir, file), "utf-8"),
        priority: BASE_PRIORITY,
        source: `base/${file}`,
      }))
    );
  }

  loadProfile(): Promise<ProfileFile | undefined> {
    return this.loadLayer(profileFileSchema, "profiles", this.profile);
  }

  loadEnvironment(): Promise<EnvironmentFile | undefined> {
    return this.loadLayer(environmentFileSchema, "environments", this.environment);
  }

  async build(): Promise<GlobalBuild> {
    this.logger.info({ profile: this.profile, environment: this.environment }, "Building global configuration");

    const [base, profile, environment, agentNames] = await Promise.all([
      this.loadBaseSections(),
      this.loadProfile(),
      this.loadEnvironment(),
      this.catalog.listAgentNames(),
    ]);

    const layered: ConfigSection[] = [...base];
    if (profile) {
      layered.push(...this.layerSections(profile.sections, PROFILE_PRIORITY, `profiles/${this.profile}.yaml`));
    }
    if (environment) {
      layered.push(
        ...this.layerSections(environment.sections, ENVIRONMENT_PRIORITY, `environments/${this.environment}.yaml`)
      );
    }
    const sections = mergeSections(layered);

    const body = sections.map((s) => s.content.trim());
    if (profile) body.push(profileSection(profile));
    if (environment) body.push(environmentSection(environment));

    const known = new Set(agentNames);
    const unknownAgents = profile
      ? [...new Set(Object.values(profile.agent_priorities).flat())].filter((agent) => !known.has(agent))
      : [];
    if (unknownAgents.length > 0) {
      this.logger.warn({ agents: unknownAgents, profile: this.profile }, "Profile names unknown agents");
    }

    const content = renderTemplate(this.env, GLOBAL_TEMPLATE, {
      timestamp: this.now().toISOString(),
      profile: this.profile,
      environment: this.environment,
      profileName: profile?.display_name ?? "Default",
      profileDescription: profile?.description ?? "Standard configuration",
      environmentName: environment?.display_name ?? "Default",
      environmentDescription: environment?.description ?? "Default environment",
      agentCount: agentNames.length,
      body: body.join(SECTION_SEPARATOR),
    });

    return { content, sections, unknownAgents };
  }

  /** Build and write `<outputDir>/global/CLAUDE.md`; returns its path. */
  async buildAndSave(): Promise<string> {
    const { content } = await this.build();
    await fs.mkdir(path.dirname(this.outputPath), { recursive: true });
    await fs.writeFile(this.outputPath, content, "utf-8");
    this.logger.info({ outputPath: this.outputPath }, "Saved global configuration");
    return this.outputPath;
  }

  private layerSections(raw: Record<string, string>, priority: number, source: string): ConfigSection[] {
    return Object.entries(raw).map(([name, content]) => ({ name: sectionName(name), content, priority, source }));
  }

  private async loadLayer<S extends z.ZodTypeAny>(
    schema: S,
    dir: string,
    name: string
  ): Promise<z.output<S> | undefined> {
    const filePath = path.join(this.globalDir, dir, `${name}.yaml`);
    if (!(await pathExists(filePath))) {
      this.logger.warn({ filePath }, "Global configuration layer not found; using defaults");
      return undefined;
    }
    return this.catalog.parseFile(schema, filePath);
  }
}
