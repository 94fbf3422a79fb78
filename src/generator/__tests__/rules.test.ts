import { describe, expect, it } from "vitest";
import { agentConfig } from "../../__tests__/helpers.js";
import { extractOrchestrationRules, handoffCondition } from "../rules.js";

const python = agentConfig({
  name: "python-engineer",
  proactiveTriggers: { file_patterns: ["*.py"] },
  imports: { coordination: ["qa-testing-handoff"] },
  customCoordination: { db: "Coordinates with database-engineer on schemas." },
});

const agents = [
  agentConfig({ name: "frontend-engineer", proactiveTriggers: { file_patterns: ["*.tsx"] } }),
  python,
  agentConfig({ name: "database-engineer", proactiveTriggers: { file_patterns: ["*.sql", "*.py"] } }),
  agentConfig({ name: "qa-engineer" }),
];

describe("handoffCondition", () => {
  it("prefers trait conditions, then custom sentences, then a generic line", () => {
    expect(handoffCondition(python, "qa-engineer")).toBe("After feature development completion");
    expect(handoffCondition(python, "database-engineer")).toBe("Coordinates with database-engineer on schemas.");
    expect(handoffCondition(python, "technical-writer")).toBe(
      "When python-engineer requires technical-writer expertise"
    );
  });
});

describe("extractOrchestrationRules", () => {
  const rules = extractOrchestrationRules(agents, {
    "python-engineer": ["database-engineer", "qa-engineer"],
    ghost: ["qa-engineer"],
  });

  it("groups agents by file pattern in first-seen order", () => {
    expect(rules.mandatoryDelegation).toEqual([
      { trigger: "*.tsx", agents: ["frontend-engineer"] },
      { trigger: "*.py", agents: ["python-engineer", "database-engineer"] },
      { trigger: "*.sql", agents: ["database-engineer"] },
    ]);
  });

  it("lists handoffs for defined sources only", () => {
    expect(rules.automaticHandoffs).toEqual([
      {
        source: "python-engineer",
        target: "database-engineer",
        condition: "Coordinates with database-engineer on schemas.",
      },
      { source: "python-engineer", target: "qa-engineer", condition: "After feature development completion" },
    ]);
  });

  it("keeps parallel patterns whose agents all exist", () => {
    expect(rules.parallelPatterns.map((p) => p.scenario)).toEqual(["Full-Stack Feature"]);
  });

  it("keeps workflows with at least three defined agents", () => {
    expect(rules.taskDecomposition).toEqual([
      {
        taskType: "Web Application Development",
        agents: ["frontend-engineer", "python-engineer", "database-engineer", "qa-engineer"],
      },
    ]);
  });
});
