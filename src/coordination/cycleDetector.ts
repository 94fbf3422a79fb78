/**
 * Circular dependency detection for agent coordination graphs, using
 * Tarjan's strongly connected components algorithm (O(V + E)).
 */

/** Adjacency list: agent -> agents it coordinates with. */
export type AdjacencyList = Record<string, string[]>;

export type CycleType = "self" | "direct" | "transitive";

export interface CoordinationCycle {
  /** Agents in discovery order */
  agents: string[];
  cycleType: CycleType;
}

export function formatCycle(cycle: CoordinationCycle): string {
  const type = cycle.cycleType.charAt(0).toUpperCase() + cycle.cycleType.slice(1);
  return `${type} cycle: ${[...cycle.agents, cycle.agents[0]].join(" -> ")}`;
}

/** Cycles are equal when they cover the same agents with the same type. */
export function cyclesEqual(a: CoordinationCycle, b: CoordinationCycle): boolean {
  if (a.cycleType !== b.cycleType || a.agents.length !== b.agents.length) return false;
  const members = new Set(a.agents);
  return b.agents.every((agent) => members.has(agent));
}

export function successorsOf(graph: AdjacencyList, agent: string): string[] {
  return Object.hasOwn(graph, agent) ? graph[agent] : [];
}

export class CircularDependencyDetector {
  private indexCounter = 0;
  private stack: string[] = [];
  private lowlinks = new Map<string, number>();
  private indices = new Map<string, number>();
  private onStack = new Set<string>();
  private sccs: string[][] = [];

  detectCycles(graph: AdjacencyList): CoordinationCycle[] {
    this.reset();

    for (const agent of Object.keys(graph)) {
      if (!this.indices.has(agent)) {
        this.strongConnect(agent, graph);
      }
    }

    const cycles: CoordinationCycle[] = [];
    for (const scc of this.sccs) {
      if (scc.length > 1) {
        cycles.push({ agents: scc, cycleType: scc.length === 2 ? "direct" : "transitive" });
      } else if (successorsOf(graph, scc[0]).includes(scc[0])) {
        cycles.push({ agents: scc, cycleType: "self" });
      }
    }
    return cycles;
  }

  hasCycles(graph: AdjacencyList): boolean {
    return this.detectCycles(graph).length > 0;
  }

  /**
   * Concrete paths around a cycle, each starting and ending at the cycle's
   * first agent.
   */
  getCyclePaths(cycle: CoordinationCycle, graph: AdjacencyList): string[][] {
    const start = cycle.agents[0];
    if (cycle.cycleType === "self") {
      return [[start, start]];
    }

    const members = new Set(cycle.agents);
    const paths: string[][] = [];
    const visited = new Set<string>([start]);
    const path: string[] = [start];

    const walk = (current: string): void => {
      for (const neighbor of successorsOf(graph, current)) {
        if (neighbor === start && path.length > 1) {
          paths.push([...path, start]);
          return;
        }
        if (members.has(neighbor) && !visited.has(neighbor)) {
          visited.add(neighbor);
          path.push(neighbor);
          walk(neighbor);
          path.pop();
          visited.delete(neighbor);
        }
      }
    };
    walk(start);

    return paths.length > 0 ? paths : [[...cycle.agents, start]];
  }

  private strongConnect(agent: string, graph: AdjacencyList): void {
    this.indices.set(agent, this.indexCounter);
    this.lowlinks.set(agent, this.indexCounter);
    this.indexCounter++;
    this.stack.push(agent);
    this.onStack.add(agent);

    for (const successor of successorsOf(graph, agent)) {
      const successorIndex = this.indices.get(successor);
      if (successorIndex === undefined) {
        this.strongConnect(successor, graph);
        this.lowlinks.set(agent, Math.min(this.lowlink(agent), this.lowlink(successor)));
      } else if (this.onStack.has(successor)) {
        this.lowlinks.set(agent, Math.min(this.lowlink(agent), successorIndex));
      }
    }

    if (this.lowlink(agent) === this.indices.get(agent)) {
      const scc: string[] = [];
      let member: string | undefined;
      do {
        member = this.stack.pop();
        if (member === undefined) break;
        this.onStack.delete(member);
        scc.push(member);
      } while (member !== agent);
      this.sccs.push(scc.reverse());
    }
  }

  private lowlink(agent: string): number {
    return this.lowlinks.get(agent) ?? Number.POSITIVE_INFINITY;
  }

  private reset(): void {
    this.indexCounter = 0;
    this.stack = [];
    this.lowlinks = new Map();
    this.indices = new Map();
    this.onStack = new Set();
    this.sccs = [];
  }
}
