import { Catalog, effectiveCoordination, pathExists } from "../catalog/loader.js";
import type { AgentConfig } from "../catalog/types.js";
import { errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import {
  ConsistencyValidator,
  type AgentCoordinationMetadata,
  type ConsistencyIssue,
} from "./consistency.js";
import {
  CircularDependencyDetector,
  formatCycle,
  type AdjacencyList,
  type CoordinationCycle,
} from "./cycleDetector.js";

/** Coordination traits that imply a handoff to a specific agent. */
export const TRAIT_HANDOFF_TARGETS: Readonly<Record<string, string>> = {
  "qa-testing-handoff": "qa-engineer",
  "documentation-handoff": "technical-writer",
  "version-control-coordination": "git-helper",
};

/** Agents users can always invoke directly. */
export const ALWAYS_AVAILABLE_AGENTS: ReadonlySet<string> = new Set(["git-helper", "technical-writer"]);

const COORDINATION_VERBS = new Set(["coordinates", "handoff", "delegates"]);
const COORDINATION_PREPOSITIONS = new Set(["with", "to"]);
const SUMMARY_LIMIT = 5;
const GENERAL_SUMMARY_LIMIT = 3;

export class ValidationReport {
  isValid = true;
  cycles: CoordinationCycle[] = [];
  consistencyIssues: ConsistencyIssue[] = [];
  errors: string[] = [];
  warnings: string[] = [];
  info: string[] = [];

  hasErrors(): boolean {
    return (
      this.errors.length > 0 ||
      this.cycles.length > 0 ||
      this.consistencyIssues.some((i) => i.severity === "error")
    );
  }

  hasWarnings(): boolean {
    return this.warnings.length > 0 || this.consistencyIssues.some((i) => i.severity === "warning");
  }

  summary(): string {
    const lines: string[] = [
      this.isValid ? "Coordination validation PASSED" : "Coordination validation FAILED",
    ];

    if (this.cycles.length > 0) {
      lines.push("", `Circular Dependencies: ${this.cycles.length}`);
      for (const cycle of this.cycles) lines.push(`  - ${formatCycle(cycle)}`);
    }

    const bySeverity = (severity: ConsistencyIssue["severity"]) =>
      this.consistencyIssues.filter((i) => i.severity === severity);

    const listIssues = (title: string, issues: ConsistencyIssue[]) => {
      if (issues.length === 0) return;
      lines.push("", `${title}: ${issues.length}`);
      for (const issue of issues.slice(0, SUMMARY_LIMIT)) lines.push(`  - ${issue.description}`);
      if (issues.length > SUMMARY_LIMIT) lines.push(`  ... and ${issues.length - SUMMARY_LIMIT} more`);
    };

    listIssues("Errors", bySeverity("error"));
    listIssues("Warnings", bySeverity("warning"));

    const info = bySeverity("info");
    if (info.length > 0) lines.push("", `Info: ${info.length}`);

    if (this.errors.length > 0) {
      lines.push("", `General Errors: ${this.errors.length}`);
      for (const error of this.errors.slice(0, GENERAL_SUMMARY_LIMIT)) lines.push(`  - ${error}`);
    }
    if (this.warnings.length > 0) {
      lines.push("", `General Warnings: ${this.warnings.length}`);
      for (const warning of this.warnings.slice(0, GENERAL_SUMMARY_LIMIT)) lines.push(`  - ${warning}`);
    }

    return lines.join("\n");
  }
}

/**
 * Coordination traits of an agent: `imports.coordination` plus any explicit
 * trait reference under `coordination/`.
 */
export function coordinationTraitsOf(agent: AgentConfig): string[] {
  const fromImports = agent.imports.coordination ?? [];
  const fromRefs = agent.traits
    .filter((ref) => ref.startsWith("coordination/"))
    .map((ref) => ref.slice("coordination/".length));
  return [...new Set([...fromImports, ...fromRefs])];
}

/**
 * Agent names mentioned after "coordinates with", "handoff to" or
 * "delegates to" in a free-form sentence.
 */
export function parseCoordinationTargets(sentence: string, knownAgents: ReadonlySet<string>): string[] {
  const words = sentence.toLowerCase().split(/\s+/).filter(Boolean);
  const targets: string[] = [];

  for (let i = 0; i + 2 < words.length; i++) {
    if (COORDINATION_VERBS.has(words[i]) && COORDINATION_PREPOSITIONS.has(words[i + 1])) {
      const candidate = words[i + 2].replace(/[.,;:]+$/, "");
      if (knownAgents.has(candidate)) targets.push(candidate);
    }
  }

  return targets;
}

export interface CoordinationValidatorOpts {
  catalog?: Catalog;
  dataDir?: string;
  logger?: Logger;
}

/**
 * Builds the coordination graph from agent definitions and runs cycle
 * detection plus the consistency checks over it.
 */
export class CoordinationValidator {
  readonly catalog: Catalog;
  private cycleDetector = new CircularDependencyDetector();
  private consistencyValidator = new ConsistencyValidator();
  private logger: Logger;

  constructor(opts: CoordinationValidatorOpts = {}) {
    this.logger = (opts.logger ?? getLogger()).child({ component: "coordination" });
    this.catalog = opts.catalog ?? new Catalog({ dataDir: opts.dataDir ?? "data", logger: opts.logger });
  }

  buildCoordinationGraph(agents: Record<string, AgentConfig>): AdjacencyList {
    const known = new Set(Object.keys(agents));
    const graph: AdjacencyList = {};

    for (const [name, agent] of Object.entries(agents)) {
      const targets: string[] = [];

      for (const sentence of Object.values(effectiveCoordination(agent))) {
        targets.push(...parseCoordinationTargets(sentence, known));
      }

      for (const trait of coordinationTraitsOf(agent)) {
        const target = Object.hasOwn(TRAIT_HANDOFF_TARGETS, trait) ? TRAIT_HANDOFF_TARGETS[trait] : undefined;
        if (target !== undefined && target !== name && known.has(target)) {
          targets.push(target);
        }
      }

      graph[name] = [...new Set(targets)];
    }

    return graph;
  }

  extractAgentMetadata(agents: Record<string, AgentConfig>): Record<string, AgentCoordinationMetadata> {
    const metadata: Record<string, AgentCoordinationMetadata> = {};
    for (const [name, agent] of Object.entries(agents)) {
      metadata[name] = {
        imports: { ...agent.imports, coordination: coordinationTraitsOf(agent) },
        customCoordination: effectiveCoordination(agent),
        proactiveTriggers: agent.proactiveTriggers,
        model: agent.model,
      };
    }
    return metadata;
  }

  /** Every imported trait name of each agent, across categories. */
  extractAgentTraits(agents: Record<string, AgentConfig>): Record<string, string[]> {
    const traits: Record<string, string[]> = {};
    for (const [name, agent] of Object.entries(agents)) {
      const imported = Object.values(agent.imports).flat();
      const referenced = agent.traits.map((ref) => ref.slice(ref.lastIndexOf("/") + 1));
      traits[name] = [...new Set([...imported, ...referenced])];
    }
    return traits;
  }

  /**
   * Entry points: agents with file pattern triggers, agents without incoming
   * coordination edges, and the always-available agents.
   */
  findEntryPoints(agents: Record<string, AgentConfig>, graph?: AdjacencyList): string[] {
    const withIncoming = new Set(graph ? Object.values(graph).flat() : []);

    return Object.entries(agents)
      .filter(([name, agent]) => {
        const filePatterns = agent.proactiveTriggers.file_patterns ?? [];
        return filePatterns.length > 0 || !withIncoming.has(name) || ALWAYS_AVAILABLE_AGENTS.has(name);
      })
      .map(([name]) => name);
  }

  validateCoordination(agents: Record<string, AgentConfig>): ValidationReport {
    const report = new ValidationReport();

    try {
      const graph = this.buildCoordinationGraph(agents);
      this.logger.debug({ agents: Object.keys(graph).length }, "Built coordination graph");

      const cycles = this.cycleDetector.detectCycles(graph);
      report.cycles = cycles;
      if (cycles.length > 0) {
        report.errors.push(`Found ${cycles.length} circular dependencies`);
        this.logger.error({ cycles: cycles.map(formatCycle) }, "Circular dependencies detected");
      }

      const issues = this.consistencyValidator.validateAll({
        graph,
        agentMetadata: this.extractAgentMetadata(agents),
        agentTraits: this.extractAgentTraits(agents),
        definedAgents: new Set(Object.keys(agents)),
        entryPoints: this.findEntryPoints(agents, graph),
      });
      report.consistencyIssues = issues;

      for (const issue of issues) {
        const line = `${issue.issueType}: ${issue.description}`;
        if (issue.severity === "error") report.errors.push(line);
        else if (issue.severity === "warning") report.warnings.push(line);
        else report.info.push(line);
      }

      report.isValid = !report.hasErrors();
      this.logger.info(
        { cycles: cycles.length, issues: issues.length },
        "Coordination validation complete"
      );
    } catch (err) {
      report.isValid = false;
      report.errors.push(`Validation failed: ${errorMessage(err)}`);
      this.logger.error({ err }, "Coordination validation failed");
    }

    return report;
  }

  /** Load agents from the catalog (all, or the named ones) and validate them. */
  async loadAndValidate(agentNames?: string[]): Promise<ValidationReport> {
    if (!(await pathExists(this.catalog.personasDir))) {
      const report = new ValidationReport();
      report.isValid = false;
      report.errors.push(`Personas directory not found: ${this.catalog.personasDir}`);
      return report;
    }

    const names = agentNames ?? (await this.catalog.listAgentNames());
    const agents: Record<string, AgentConfig> = {};

    for (const name of names) {
      try {
        const agent = await this.catalog.resolveAgent(name);
        agents[agent.name] = agent;
      } catch (err) {
        this.logger.warn({ agent: name, err: errorMessage(err) }, "Failed to load agent");
      }
    }

    return this.validateCoordination(agents);
  }
}

export function agentsByName(agents: AgentConfig[]): Record<string, AgentConfig> {
  return Object.fromEntries(agents.map((agent) => [agent.name, agent]));
}
