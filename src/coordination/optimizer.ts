import { performance } from "node:perf_hooks";
import { getLogger, type Logger } from "../logger.js";
import type { AgentCoordinationMetadata } from "./consistency.js";
import { successorsOf, type AdjacencyList } from "./cycleDetector.js";

export interface AgentIndexEntry {
  outDegree: number;
  inDegree: number;
  isEntryPoint: boolean;
  isTerminal: boolean;
  model: string;
  traits: string[];
  filePatterns: string[];
}

export interface OptimizationStats {
  totalAgents: number;
  entryPoints: number;
  cachedPaths: number;
  optimizationTimeMs: number;
  avgOutDegree: number;
  maxTransitiveReach: number;
}

export const DEFAULT_MAX_PATH_LENGTH = 5;

const BOTTLENECK_IN_DEGREE = 5;
const LONG_CHAIN_HOPS = 4;
const OPUS_SHARE_LIMIT = 0.3;

export function pathKey(source: string, target: string): string {
  return `${source}->${target}`;
}

export class OptimizationResult {
  constructor(
    readonly transitiveClosure: Map<string, Set<string>>,
    readonly agentIndex: Map<string, AgentIndexEntry>,
    readonly commonPaths: Map<string, string[]>,
    readonly entryPointPaths: Map<string, string[][]>,
    readonly stats: OptimizationStats
  ) {}

  getAllDescendants(agent: string): Set<string> {
    return this.transitiveClosure.get(agent) ?? new Set();
  }

  getPath(source: string, target: string): string[] | undefined {
    return this.commonPaths.get(pathKey(source, target));
  }

  getAgentInfo(agent: string): AgentIndexEntry | undefined {
    return this.agentIndex.get(agent);
  }
}

/**
 * Pre-computes reachability, shortest paths and per-agent indices over the
 * coordination graph, and suggests structural improvements.
 */
export class GraphOptimizer {
  private lastResult: OptimizationResult | null = null;
  private logger: Logger;

  constructor(logger?: Logger) {
    this.logger = (logger ?? getLogger()).child({ component: "optimizer" });
  }

  get cached(): OptimizationResult | null {
    return this.lastResult;
  }

  /** Floyd-Warshall reachability. An agent is never listed as reaching itself. */
  computeTransitiveClosure(graph: AdjacencyList): Map<string, Set<string>> {
    const agents = Object.keys(graph);
    const n = agents.length;
    const indexOf = new Map(agents.map((agent, i) => [agent, i]));
    const reach: boolean[][] = agents.map((_, i) => agents.map((__, j) => i === j));

    agents.forEach((agent, i) => {
      for (const target of successorsOf(graph, agent)) {
        const j = indexOf.get(target);
        if (j !== undefined) reach[i][j] = true;
      }
    });

    for (let k = 0; k < n; k++) {
      for (let i = 0; i < n; i++) {
        if (!reach[i][k]) continue;
        for (let j = 0; j < n; j++) {
          if (reach[k][j]) reach[i][j] = true;
        }
      }
    }

    const closure = new Map<string, Set<string>>();
    agents.forEach((agent, i) => {
      closure.set(agent, new Set(agents.filter((_, j) => j !== i && reach[i][j])));
    });
    return closure;
  }

  buildAgentIndex(
    graph: AdjacencyList,
    agentMetadata: Record<string, AgentCoordinationMetadata>
  ): Map<string, AgentIndexEntry> {
    const index = new Map<string, AgentIndexEntry>();
    const targetLists = Object.values(graph);

    for (const agent of Object.keys(graph)) {
      const metadata = Object.hasOwn(agentMetadata, agent) ? agentMetadata[agent] : undefined;
      const outDegree = successorsOf(graph, agent).length;
      const inDegree = targetLists.filter((targets) => targets.includes(agent)).length;

      index.set(agent, {
        outDegree,
        inDegree,
        isEntryPoint: inDegree === 0,
        isTerminal: outDegree === 0,
        model: metadata?.model ?? "sonnet",
        traits: metadata?.imports.coordination ?? [],
        filePatterns: metadata?.proactiveTriggers.file_patterns ?? [],
      });
    }

    return index;
  }

  /** Shortest path (BFS) between every ordered pair of distinct agents. */
  cacheCommonPaths(graph: AdjacencyList, maxPathLength = DEFAULT_MAX_PATH_LENGTH): Map<string, string[]> {
    const paths = new Map<string, string[]>();

    const shortestPath = (start: string, end: string): string[] | undefined => {
      const visited = new Set([start]);
      const queue: Array<[string, string[]]> = [[start, [start]]];

      while (queue.length > 0) {
        const next = queue.shift();
        if (next === undefined) break;
        const [current, path] = next;
        if (path.length > maxPathLength) continue;

        for (const neighbor of successorsOf(graph, current)) {
          if (neighbor === end) return [...path, neighbor];
          if (!visited.has(neighbor)) {
            visited.add(neighbor);
            queue.push([neighbor, [...path, neighbor]]);
          }
        }
      }
      return undefined;
    };

    const agents = Object.keys(graph);
    for (const source of agents) {
      for (const target of agents) {
        if (source === target) continue;
        const path = shortestPath(source, target);
        if (path) paths.set(pathKey(source, target), path);
      }
    }

    return paths;
  }

  /** Every simple path (depth-limited) starting at each entry point. */
  generateEntryPointPaths(
    graph: AdjacencyList,
    entryPoints: string[],
    maxDepth = DEFAULT_MAX_PATH_LENGTH
  ): Map<string, string[][]> {
    const allPaths = (current: string, visited: Set<string>, path: string[]): string[][] => {
      if (path.length >= maxDepth) return [];
      const found: string[][] = [];

      for (const neighbor of successorsOf(graph, current)) {
        if (visited.has(neighbor)) continue;
        const nextPath = [...path, neighbor];
        found.push(nextPath);
        found.push(...allPaths(neighbor, new Set([...visited, neighbor]), nextPath));
      }
      return found;
    };

    const result = new Map<string, string[][]>();
    for (const entry of entryPoints) {
      result.set(entry, allPaths(entry, new Set([entry]), [entry]));
    }
    return result;
  }

  optimize(
    graph: AdjacencyList,
    agentMetadata: Record<string, AgentCoordinationMetadata>,
    entryPoints?: string[]
  ): OptimizationResult {
    const started = performance.now();

    const transitiveClosure = this.computeTransitiveClosure(graph);
    const agentIndex = this.buildAgentIndex(graph, agentMetadata);
    const commonPaths = this.cacheCommonPaths(graph);

    const entries =
      entryPoints ?? [...agentIndex.entries()].filter(([, info]) => info.isEntryPoint).map(([agent]) => agent);
    const entryPointPaths = this.generateEntryPointPaths(graph, entries);

    const agentCount = Object.keys(graph).length;
    const edgeCount = Object.values(graph).reduce((sum, targets) => sum + targets.length, 0);
    const reaches = [...transitiveClosure.values()].map((s) => s.size);

    const stats: OptimizationStats = {
      totalAgents: agentCount,
      entryPoints: entries.length,
      cachedPaths: commonPaths.size,
      optimizationTimeMs: Math.round((performance.now() - started) * 100) / 100,
      avgOutDegree: agentCount > 0 ? edgeCount / agentCount : 0,
      maxTransitiveReach: reaches.length > 0 ? Math.max(...reaches) : 0,
    };

    const result = new OptimizationResult(transitiveClosure, agentIndex, commonPaths, entryPointPaths, stats);
    this.lastResult = result;
    this.logger.info({ ...stats }, "Graph optimization complete");
    return result;
  }

  suggestOptimizations(result: OptimizationResult): string[] {
    const suggestions: string[] = [];
    const index = [...result.agentIndex.entries()];

    const bottlenecks = index
      .filter(([, info]) => info.inDegree > BOTTLENECK_IN_DEGREE)
      .sort(([, a], [, b]) => b.inDegree - a.inDegree);
    if (bottlenecks.length > 0) {
      const [agent, info] = bottlenecks[0];
      suggestions.push(
        `Agent '${agent}' has high in-degree (${info.inDegree}). ` +
          "Consider splitting responsibilities or adding intermediate agents."
      );
    }

    const longChains = [...result.commonPaths.values()]
      .filter((path) => path.length > LONG_CHAIN_HOPS)
      .sort((a, b) => b.length - a.length);
    if (longChains.length > 0) {
      const chain = longChains[0];
      suggestions.push(
        `Long coordination chain from '${chain[0]}' to '${chain[chain.length - 1]}' (${chain.length} hops). ` +
          "Consider direct coordination or intermediate delegation."
      );
    }

    const isolated = index.filter(([, info]) => info.isEntryPoint && info.outDegree === 0).map(([agent]) => agent);
    if (isolated.length > 0) {
      suggestions.push(
        `Isolated entry points found: ${isolated.slice(0, 3).join(", ")}. Consider adding coordination patterns.`
      );
    }

    const opusCount = index.filter(([, info]) => info.model.toLowerCase() === "opus").length;
    if (opusCount > index.length * OPUS_SHARE_LIMIT) {
      suggestions.push(
        `High opus usage (${opusCount} agents). Consider using sonnet for standard coordination tasks.`
      );
    }

    return suggestions;
  }
}
