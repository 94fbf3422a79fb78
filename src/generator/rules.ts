import { effectiveCoordination } from "../catalog/loader.js";
import type { AgentConfig } from "../catalog/types.js";
import { coordinationTraitsOf, TRAIT_HANDOFF_TARGETS } from "../coordination/validator.js";
import type { AdjacencyList } from "../coordination/cycleDetector.js";

export interface DelegationRule {
  trigger: string;
  agents: string[];
}

export interface HandoffRule {
  source: string;
  target: string;
  condition: string;
}

export interface ParallelPattern {
  scenario: string;
  agents: string[];
  coordinationStrategy: string;
}

export interface TaskWorkflow {
  taskType: string;
  agents: string[];
}

export interface OrchestrationRules {
  mandatoryDelegation: DelegationRule[];
  automaticHandoffs: HandoffRule[];
  parallelPatterns: ParallelPattern[];
  taskDecomposition: TaskWorkflow[];
}

export const PARALLEL_PATTERNS: readonly ParallelPattern[] = [
  {
    scenario: "Full-Stack Feature",
    agents: ["frontend-engineer", "python-engineer", "database-engineer"],
    coordinationStrategy: "Simultaneous development with API contract",
  },
  {
    scenario: "Security Review",
    agents: ["security-engineer", "qa-engineer", "sr-architect"],
    coordinationStrategy: "Multi-perspective vulnerability assessment",
  },
  {
    scenario: "Performance Optimization",
    agents: ["performance-engineer", "database-engineer", "devops-engineer"],
    coordinationStrategy: "Coordinated optimization across stack layers",
  },
];

export const TASK_WORKFLOWS: readonly TaskWorkflow[] = [
  {
    taskType: "Web Application Development",
    agents: [
      "frontend-engineer",
      "python-engineer",
      "database-engineer",
      "qa-engineer",
      "technical-writer",
      "git-helper",
    ],
  },
  {
    taskType: "ML/AI Development",
    agents: ["ai-researcher", "ai-engineer", "data-engineer", "qa-engineer", "technical-writer"],
  },
  {
    taskType: "Infrastructure Development",
    agents: ["devops-engineer", "security-engineer", "database-engineer", "qa-engineer", "technical-writer"],
  },
];

const MIN_WORKFLOW_AGENTS = 3;

const TRAIT_HANDOFF_CONDITIONS: Readonly<Record<string, string>> = {
  "qa-testing-handoff": "After feature development completion",
  "documentation-handoff": "For user-facing features and APIs",
  "version-control-coordination": "For all version control operations",
};

export function handoffCondition(source: AgentConfig, target: string): string {
  for (const trait of coordinationTraitsOf(source)) {
    if (TRAIT_HANDOFF_TARGETS[trait] === target && Object.hasOwn(TRAIT_HANDOFF_CONDITIONS, trait)) {
      return TRAIT_HANDOFF_CONDITIONS[trait];
    }
  }

  for (const sentence of Object.values(effectiveCoordination(source))) {
    if (sentence.toLowerCase().includes(target)) return sentence;
  }

  return `When ${source.name} requires ${target} expertise`;
}

export function extractOrchestrationRules(agents: AgentConfig[], graph: AdjacencyList): OrchestrationRules {
  const byName = new Map(agents.map((agent) => [agent.name, agent]));

  const delegation = new Map<string, string[]>();
  for (const agent of agents) {
    for (const pattern of agent.proactiveTriggers.file_patterns ?? []) {
      const existing = delegation.get(pattern) ?? [];
      if (!existing.includes(agent.name)) existing.push(agent.name);
      delegation.set(pattern, existing);
    }
  }

  const automaticHandoffs: HandoffRule[] = [];
  for (const [name, targets] of Object.entries(graph)) {
    const source = byName.get(name);
    if (!source) continue;
    for (const target of targets) {
      automaticHandoffs.push({ source: name, target, condition: handoffCondition(source, target) });
    }
  }

  const parallelPatterns = PARALLEL_PATTERNS.filter((p) => p.agents.every((a) => byName.has(a))).map((p) => ({
    ...p,
    agents: [...p.agents],
  }));

  const taskDecomposition = TASK_WORKFLOWS.map((w) => ({
    taskType: w.taskType,
    agents: w.agents.filter((a) => byName.has(a)),
  })).filter((w) => w.agents.length >= MIN_WORKFLOW_AGENTS);

  return {
    mandatoryDelegation: [...delegation.entries()].map(([trigger, names]) => ({ trigger, agents: names })),
    automaticHandoffs,
    parallelPatterns,
    taskDecomposition,
  };
}
