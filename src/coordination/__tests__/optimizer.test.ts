import { describe, expect, it } from "vitest";
import type { AgentCoordinationMetadata } from "../consistency.js";
import { GraphOptimizer, pathKey } from "../optimizer.js";

function meta(model: string, filePatterns: string[] = []): AgentCoordinationMetadata {
  return {
    imports: { coordination: ["qa-testing-handoff"] },
    customCoordination: {},
    proactiveTriggers: { file_patterns: filePatterns },
    model,
  };
}

const chain = { a: ["b"], b: ["c"], c: ["d"], d: ["e"], e: [] };

describe("GraphOptimizer", () => {
  it("computes reachability without self-loops", () => {
    const optimizer = new GraphOptimizer();

    const closure = optimizer.computeTransitiveClosure({ a: ["b"], b: ["a"], c: [] });

    expect(closure.get("a")).toEqual(new Set(["b"]));
    expect(closure.get("b")).toEqual(new Set(["a"]));
    expect(closure.get("c")).toEqual(new Set());
  });

  it("optimizes a linear chain", () => {
    const optimizer = new GraphOptimizer();

    const result = optimizer.optimize(chain, { a: meta("sonnet", ["*.py"]) });

    expect(result.getAllDescendants("a")).toEqual(new Set(["b", "c", "d", "e"]));
    expect(result.getPath("a", "e")).toEqual(["a", "b", "c", "d", "e"]);
    expect(result.getPath("e", "a")).toBeUndefined();
    expect(result.commonPaths.has(pathKey("b", "d"))).toBe(true);
    expect(result.entryPointPaths.get("a")).toEqual([
      ["a", "b"],
      ["a", "b", "c"],
      ["a", "b", "c", "d"],
      ["a", "b", "c", "d", "e"],
    ]);
    expect(result.getAgentInfo("a")).toEqual({
      outDegree: 1,
      inDegree: 0,
      isEntryPoint: true,
      isTerminal: false,
      model: "sonnet",
      traits: ["qa-testing-handoff"],
      filePatterns: ["*.py"],
    });
    expect(result.getAgentInfo("e")).toMatchObject({ isTerminal: true, model: "sonnet", traits: [] });
    expect(result.stats).toMatchObject({
      totalAgents: 5,
      entryPoints: 1,
      cachedPaths: 10,
      avgOutDegree: 0.8,
      maxTransitiveReach: 4,
    });
    expect(optimizer.cached).toBe(result);
  });

  it("uses the given entry points", () => {
    const result = new GraphOptimizer().optimize(chain, {}, ["c"]);

    expect(result.stats.entryPoints).toBe(1);
    expect([...result.entryPointPaths.keys()]).toEqual(["c"]);
  });

  it("suggests a long chain fix", () => {
    const optimizer = new GraphOptimizer();

    expect(optimizer.suggestOptimizations(optimizer.optimize(chain, {}))).toEqual([
      "Long coordination chain from 'a' to 'e' (5 hops). Consider direct coordination or intermediate delegation.",
    ]);
  });

  it("suggests fixes for bottlenecks, isolated entry points and opus usage", () => {
    const graph = {
      s1: ["hub"],
      s2: ["hub"],
      s3: ["hub"],
      s4: ["hub"],
      s5: ["hub"],
      s6: ["hub"],
      hub: [],
      lonely: [],
    };
    const optimizer = new GraphOptimizer();

    const result = optimizer.optimize(graph, { s1: meta("opus"), s2: meta("Opus"), lonely: meta("opus") });

    expect(optimizer.suggestOptimizations(result)).toEqual([
      "Agent 'hub' has high in-degree (6). Consider splitting responsibilities or adding intermediate agents.",
      "Isolated entry points found: lonely. Consider adding coordination patterns.",
      "High opus usage (3 agents). Consider using sonnet for standard coordination tasks.",
    ]);
  });
});
