import fs from "node:fs/promises";
import path from "node:path";
import { performance } from "node:perf_hooks";
import type { Environment } from "nunjucks";
import { Catalog } from "../catalog/loader.js";
import { MODEL_TIERS, isModelTier, type AgentConfig, type ModelTier } from "../catalog/types.js";
import { createTemplateEnv, renderTemplate } from "../composer/templates.js";
import type { AgentCoordinationMetadata } from "../coordination/consistency.js";
import type { AdjacencyList } from "../coordination/cycleDetector.js";
import { GraphOptimizer, type OptimizationResult } from "../coordination/optimizer.js";
import {
  ALWAYS_AVAILABLE_AGENTS,
  CoordinationValidator,
  TRAIT_HANDOFF_TARGETS,
  agentsByName,
  type ValidationReport,
} from "../coordination/validator.js";
import { ValidationError } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import { BUNDLED_TEMPLATE_DIR } from "../paths.js";
import { extractOrchestrationRules } from "./rules.js";

export const CLAUDE_MD_TEMPLATE = "CLAUDE.md.njk";

const TIER_TITLES: Record<ModelTier, string> = {
  haiku: "Tier 1: Efficiency Agents (Haiku)",
  sonnet: "Tier 2: Specialist Agents (Sonnet)",
  opus: "Tier 3: Senior Agents (Opus)",
};

const TIER_COLORS: Record<ModelTier, string> = {
  haiku: "#90EE90",
  sonnet: "#87CEEB",
  opus: "#FFB6C1",
};

const DEFAULT_NODE_COLOR = "#CCCCCC";
const MAX_PATTERNS_SHOWN = 3;
const MAX_DIAGRAM_ENTRIES = 10;
const DEFAULT_MAX_DIAGRAM_NODES = 30;

/** Agents reached by trait handoffs; drawn with solid arrows. */
const HANDOFF_AGENTS: ReadonlySet<string> = new Set(Object.values(TRAIT_HANDOFF_TARGETS));

/** Adjacency list plus metadata and the pre-computed optimization data. */
export class CoordinationGraph {
  constructor(
    readonly adjacencyList: AdjacencyList,
    readonly agentMetadata: Record<string, AgentCoordinationMetadata>,
    readonly optimization: OptimizationResult
  ) {}

  getAgentTier(agent: string): string {
    return Object.hasOwn(this.agentMetadata, agent) ? this.agentMetadata[agent].model : "sonnet";
  }

  getCoordinationTargets(agent: string): string[] {
    return Object.hasOwn(this.adjacencyList, agent) ? this.adjacencyList[agent] : [];
  }

  getAllReachable(agent: string): Set<string> {
    return this.optimization.getAllDescendants(agent);
  }

  isEntryPoint(agent: string): boolean {
    return this.optimization.getAgentInfo(agent)?.isEntryPoint ?? false;
  }
}

export function generateAgentDirectory(agents: AgentConfig[], graph: CoordinationGraph): string {
  const tiers = new Map<ModelTier, AgentConfig[]>(MODEL_TIERS.map((tier) => [tier, []]));
  for (const agent of agents) {
    const tier = agent.model.toLowerCase();
    if (isModelTier(tier)) tiers.get(tier)?.push(agent);
  }

  const lines = ["## Agent Directory", ""];

  for (const [tier, tierAgents] of tiers) {
    if (tierAgents.length === 0) continue;
    lines.push(`### ${TIER_TITLES[tier]}`, "");

    for (const agent of [...tierAgents].sort((a, b) => a.name.localeCompare(b.name))) {
      lines.push(`**${agent.name}** \`model: ${agent.model}\``);
      lines.push(`- ${agent.description}`);

      const targets = graph.getCoordinationTargets(agent.name);
      if (targets.length > 0) lines.push(`- Coordinates with: ${targets.join(", ")}`);

      const patterns = agent.proactiveTriggers.file_patterns ?? [];
      if (patterns.length > 0) {
        let shown = patterns.slice(0, MAX_PATTERNS_SHOWN).join(", ");
        if (patterns.length > MAX_PATTERNS_SHOWN) shown += `, ... (${patterns.length} total)`;
        lines.push(`- Proactive on: ${shown}`);
      }
      lines.push("");
    }
  }

  return lines.join("\n");
}

/**
 * Mermaid flowchart of the busiest entry points and their direct targets.
 * Nodes are coloured by tier; trait handoffs are solid, other coordination
 * dashed.
 */
export function generateMermaidGraph(
  agents: AgentConfig[],
  graph: CoordinationGraph,
  maxNodes = DEFAULT_MAX_DIAGRAM_NODES
): string {
  const index = graph.optimization.agentIndex;
  const entries = agents
    .filter((agent) => index.get(agent.name)?.isEntryPoint)
    .sort((a, b) => (index.get(b.name)?.outDegree ?? 0) - (index.get(a.name)?.outDegree ?? 0))
    .slice(0, MAX_DIAGRAM_ENTRIES);

  const visible = new Set<string>();
  for (const agent of entries) {
    visible.add(agent.name);
    for (const target of graph.getCoordinationTargets(agent.name)) {
      if (visible.size >= maxNodes) break;
      visible.add(target);
    }
    if (visible.size >= maxNodes) break;
  }

  const byName = agentsByName(agents);
  const lines = ["```mermaid", "graph TD"];

  for (const node of visible) {
    if (!Object.hasOwn(byName, node)) continue;
    const agent = byName[node];
    const tier = agent.model.toLowerCase();
    const color = isModelTier(tier) ? TIER_COLORS[tier] : DEFAULT_NODE_COLOR;
    lines.push(`    ${node}[${agent.displayName || agent.name}]`);
    lines.push(`    style ${node} fill:${color}`);
  }

  for (const node of visible) {
    for (const target of graph.getCoordinationTargets(node)) {
      if (!visible.has(target)) continue;
      const arrow = Object.hasOwn(byName, node) && HANDOFF_AGENTS.has(target) ? "-->" : "-.->";
      lines.push(`    ${node} ${arrow} ${target}`);
    }
  }

  lines.push("```");
  return lines.join("\n");
}

export interface ClaudeMdGeneratorOpts {
  dataDir?: string;
  templateDir?: string;
  outputDir?: string;
  catalog?: Catalog;
  logger?: Logger;
  /** Clock for the generation timestamp */
  now?: () => Date;
}

export interface GenerateOpts {
  outputPath?: string;
  validate?: boolean;
}

/**
 * Builds the master CLAUDE.md orchestration file: agent directory,
 * delegation and handoff rules, and a coordination diagram.
 */
export class ClaudeMdGenerator {
  readonly catalog: Catalog;
  readonly outputDir: string;
  readonly validator: CoordinationValidator;
  readonly optimizer: GraphOptimizer;
  private env: Environment;
  private logger: Logger;
  private now: () => Date;

  constructor(opts: ClaudeMdGeneratorOpts = {}) {
    const dataDir = opts.catalog?.dataDir ?? opts.dataDir ?? "data";
    this.logger = (opts.logger ?? getLogger()).child({ component: "generator" });
    this.catalog = opts.catalog ?? new Catalog({ dataDir, logger: opts.logger });
    this.outputDir = opts.outputDir ?? "dist";
    this.validator = new CoordinationValidator({ catalog: this.catalog, logger: opts.logger });
    this.optimizer = new GraphOptimizer(opts.logger);
    this.env = createTemplateEnv({ templateDir: opts.templateDir ?? BUNDLED_TEMPLATE_DIR });
    this.now = opts.now ?? (() => new Date());
  }

  loadAllAgents(): Promise<AgentConfig[]> {
    return this.catalog.loadAllAgents();
  }

  buildCoordinationGraph(agents: AgentConfig[]): CoordinationGraph {
    const configs = agentsByName(agents);
    const adjacencyList = this.validator.buildCoordinationGraph(configs);
    const agentMetadata = this.validator.extractAgentMetadata(configs);
    const entryPoints = this.validator.findEntryPoints(configs, adjacencyList);

    const optimization = this.optimizer.optimize(adjacencyList, agentMetadata, entryPoints);
    this.logger.info(
      {
        agents: Object.keys(adjacencyList).length,
        entryPoints: entryPoints.length,
        cachedPaths: optimization.stats.cachedPaths,
      },
      "Built coordination graph"
    );

    return new CoordinationGraph(adjacencyList, agentMetadata, optimization);
  }

  /** Throws ValidationError when coordination has errors; warnings are logged. */
  validateBeforeGeneration(agents: AgentConfig[]): ValidationReport {
    const report = this.validator.validateCoordination(agentsByName(agents));

    if (!report.isValid) {
      this.logger.error({ summary: report.summary() }, "Coordination validation failed");
      throw new ValidationError(`Coordination validation failed: ${report.errors.length} errors`, report.errors);
    }
    if (report.hasWarnings()) {
      this.logger.warn({ summary: report.summary() }, "Coordination validation warnings");
    }

    this.logger.info({ agents: agents.length }, "Coordination validation passed");
    return report;
  }

  async generateClaudeMd(opts: GenerateOpts = {}): Promise<string> {
    const started = performance.now();

    const agents = await this.loadAllAgents();
    if (agents.length === 0) {
      throw new ValidationError("No agent configurations found");
    }

    if (opts.validate ?? true) {
      this.validateBeforeGeneration(agents);
    }

    const graph = this.buildCoordinationGraph(agents);
    const rules = extractOrchestrationRules(agents, graph.adjacencyList);
    this.logger.info(
      {
        delegationTriggers: rules.mandatoryDelegation.length,
        handoffs: rules.automaticHandoffs.length,
        parallelPatterns: rules.parallelPatterns.length,
      },
      "Extracted orchestration rules"
    );

    const content = renderTemplate(this.env, CLAUDE_MD_TEMPLATE, {
      timestamp: this.now().toISOString(),
      agentCount: agents.length,
      alwaysAvailable: [...ALWAYS_AVAILABLE_AGENTS].filter((name) => agents.some((a) => a.name === name)),
      agentDirectory: generateAgentDirectory(agents, graph),
      rules,
      mermaidGraph: generateMermaidGraph(agents, graph),
      optimizationStats: graph.optimization.stats,
      suggestions: this.optimizer.suggestOptimizations(graph.optimization),
    });

    const outputPath = opts.outputPath ?? path.join(this.outputDir, "CLAUDE.md");
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, content, "utf-8");

    this.logger.info({ outputPath, ms: Math.round(performance.now() - started) }, "Generated CLAUDE.md");
    return outputPath;
  }
}
