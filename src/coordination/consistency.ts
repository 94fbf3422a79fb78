import { successorsOf, type AdjacencyList } from "./cycleDetector.js";

export type IssueType = "bidirectional" | "trait_compatibility" | "unreachable" | "missing_agent";
export type IssueSeverity = "error" | "warning" | "info";

export interface ConsistencyIssue {
  issueType: IssueType;
  severity: IssueSeverity;
  agentsInvolved: string[];
  description: string;
  suggestion?: string;
}

export interface AgentCoordinationMetadata {
  imports: Record<string, string[]>;
  customCoordination: Record<string, string>;
  proactiveTriggers: Record<string, string[]>;
  model: string;
}

/** Traits that coordinating agents are expected to share. */
export const SHARED_COORDINATION_TRAITS: ReadonlySet<string> = new Set([
  "qa-testing-handoff",
  "documentation-handoff",
  "version-control-coordination",
  "standard-safety-protocols",
]);

export function formatIssue(issue: ConsistencyIssue): string {
  let msg = `[${issue.severity.toUpperCase()}] ${issue.issueType}: ${issue.description}`;
  if (issue.agentsInvolved.length > 0) {
    msg += ` (Agents: ${issue.agentsInvolved.join(", ")})`;
  }
  if (issue.suggestion) {
    msg += `\n  Suggestion: ${issue.suggestion}`;
  }
  return msg;
}

export interface ConsistencyInput {
  graph: AdjacencyList;
  agentMetadata?: Record<string, AgentCoordinationMetadata>;
  agentTraits?: Record<string, string[]>;
  definedAgents?: ReadonlySet<string>;
  entryPoints?: string[];
}

/**
 * Consistency checks over the coordination graph:
 * bidirectional awareness, shared coordination traits, reachability from
 * entry points, and references to undefined agents.
 */
export class ConsistencyValidator {
  /**
   * If A coordinates with B, B should know about A: either B -> A exists, or
   * B declares coordination traits or custom coordination of its own.
   */
  validateBidirectionalConsistency(
    graph: AdjacencyList,
    agentMetadata: Record<string, AgentCoordinationMetadata> = {}
  ): ConsistencyIssue[] {
    const issues: ConsistencyIssue[] = [];

    for (const [source, targets] of Object.entries(graph)) {
      for (const target of targets) {
        let aware = successorsOf(graph, target).includes(source);

        const metadata = Object.hasOwn(agentMetadata, target) ? agentMetadata[target] : undefined;
        if (!aware && metadata) {
          const coordinationTraits = metadata.imports.coordination ?? [];
          aware = coordinationTraits.length > 0 || Object.keys(metadata.customCoordination).length > 0;
        }

        if (!aware) {
          issues.push({
            issueType: "bidirectional",
            severity: "warning",
            agentsInvolved: [source, target],
            description: `${source} coordinates with ${target}, but ${target} has no awareness of ${source}`,
            suggestion: `Add bidirectional coordination or trait import to ${target}`,
          });
        }
      }
    }

    return issues;
  }

  validateTraitCompatibility(
    graph: AdjacencyList,
    agentTraits: Record<string, string[]>
  ): ConsistencyIssue[] {
    const issues: ConsistencyIssue[] = [];
    const traitsOf = (agent: string): Set<string> =>
      new Set(Object.hasOwn(agentTraits, agent) ? agentTraits[agent] : []);

    for (const [source, targets] of Object.entries(graph)) {
      const sourceTraits = traitsOf(source);
      const sourceCoordination = [...sourceTraits].filter((t) => SHARED_COORDINATION_TRAITS.has(t));
      if (sourceCoordination.length === 0) continue;

      for (const target of targets) {
        const targetTraits = traitsOf(target);
        const shared = sourceCoordination.filter((t) => targetTraits.has(t));

        if (shared.length === 0) {
          issues.push({
            issueType: "trait_compatibility",
            severity: "info",
            agentsInvolved: [source, target],
            description: `${source} and ${target} coordinate but share no common coordination traits`,
            suggestion: "Consider adding shared coordination traits for consistency",
          });
        }
      }
    }

    return issues;
  }

  /**
   * Breadth-first reachability from the entry points. Without explicit entry
   * points, agents with no incoming edges are used.
   */
  findUnreachableAgents(graph: AdjacencyList, entryPoints?: string[]): ConsistencyIssue[] {
    const agents = Object.keys(graph);
    let entries = entryPoints;

    if (entries === undefined) {
      const targets = new Set(Object.values(graph).flat());
      entries = agents.filter((agent) => !targets.has(agent));
    }

    if (entries.length === 0) {
      return [
        {
          issueType: "unreachable",
          severity: "error",
          agentsInvolved: agents,
          description: "No entry points found - coordination graph is isolated",
          suggestion: "Add file patterns or proactive triggers to at least one agent",
        },
      ];
    }

    const reachable = new Set<string>();
    const queue = [...entries];
    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || reachable.has(current)) continue;
      reachable.add(current);
      queue.push(...successorsOf(graph, current));
    }

    return agents
      .filter((agent) => !reachable.has(agent))
      .map((agent) => ({
        issueType: "unreachable" as const,
        severity: "warning" as const,
        agentsInvolved: [agent],
        description: `Agent ${agent} is unreachable from any entry point`,
        suggestion: "Add coordination from reachable agents or make this an entry point",
      }));
  }

  validateAgentExistence(graph: AdjacencyList, definedAgents: ReadonlySet<string>): ConsistencyIssue[] {
    const issues: ConsistencyIssue[] = [];

    for (const [source, targets] of Object.entries(graph)) {
      if (!definedAgents.has(source)) {
        issues.push({
          issueType: "missing_agent",
          severity: "error",
          agentsInvolved: [source],
          description: `Source agent ${source} is not defined`,
          suggestion: `Create ${source}.yaml or remove from coordination graph`,
        });
      }

      for (const target of targets) {
        if (!definedAgents.has(target)) {
          issues.push({
            issueType: "missing_agent",
            severity: "error",
            agentsInvolved: [source, target],
            description: `${source} references undefined agent ${target}`,
            suggestion: `Create ${target}.yaml or remove from ${source}'s coordination`,
          });
        }
      }
    }

    return issues;
  }

  /** Existence first; the remaining checks only run when every agent exists. */
  validateAll(input: ConsistencyInput): ConsistencyIssue[] {
    const issues: ConsistencyIssue[] = [];

    if (input.definedAgents !== undefined) {
      issues.push(...this.validateAgentExistence(input.graph, input.definedAgents));
    }

    const hasMissing = issues.some((i) => i.issueType === "missing_agent" && i.severity === "error");
    if (hasMissing) return issues;

    issues.push(...this.validateBidirectionalConsistency(input.graph, input.agentMetadata));
    if (input.agentTraits !== undefined) {
      issues.push(...this.validateTraitCompatibility(input.graph, input.agentTraits));
    }
    issues.push(...this.findUnreachableAgents(input.graph, input.entryPoints));

    return issues;
  }
}
