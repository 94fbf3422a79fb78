import { describe, expect, it } from "vitest";
import { agentConfig, persona, writeTree } from "../../__tests__/helpers.js";
import { Catalog } from "../../catalog/loader.js";
import { CoordinationValidator, agentsByName, coordinationTraitsOf, parseCoordinationTargets } from "../validator.js";

async function teamValidator(): Promise<CoordinationValidator> {
  const dataDir = await writeTree({
    "personas/dev.yaml": persona({
      name: "dev",
      filePatterns: ["*.py"],
      coordination: ["qa-testing-handoff", "version-control-coordination"],
      custom: { schemas: "coordinates with dba on schema changes." },
    }),
    "personas/qa-engineer.yaml": persona({ name: "qa-engineer", coordination: ["version-control-coordination"] }),
    "personas/git-helper.yaml": persona({ name: "git-helper" }),
    "personas/dba.yaml": persona({ name: "dba" }),
  });
  return new CoordinationValidator({ catalog: new Catalog({ dataDir }) });
}

describe("parseCoordinationTargets", () => {
  it("picks known agents after coordination phrases", () => {
    const known = new Set(["qa-engineer", "git-helper"]);

    expect(
      parseCoordinationTargets("Coordinates with qa-engineer, and handoff to git-helper. Delegates to nobody.", known)
    ).toEqual(["qa-engineer", "git-helper"]);
  });
});

describe("coordinationTraitsOf", () => {
  it("merges imports with coordination trait references", () => {
    const agent = agentConfig({
      name: "dev",
      traits: ["coordination/documentation-handoff", "safety/branch-check"],
      imports: { coordination: ["qa-testing-handoff", "documentation-handoff"] },
    });

    expect(coordinationTraitsOf(agent)).toEqual(["qa-testing-handoff", "documentation-handoff"]);
  });
});

describe("CoordinationValidator", () => {
  it("builds edges from custom coordination and handoff traits", async () => {
    const validator = await teamValidator();
    const agents = agentsByName(await validator.catalog.loadAllAgents());

    const graph = validator.buildCoordinationGraph(agents);

    expect(graph).toEqual({
      dba: [],
      dev: ["dba", "qa-engineer", "git-helper"],
      "git-helper": [],
      "qa-engineer": ["git-helper"],
    });
    expect(validator.findEntryPoints(agents, graph)).toEqual(["dev", "git-helper"]);
  });

  it("never adds a handoff edge to the agent itself", () => {
    const validator = new CoordinationValidator();
    const agents = agentsByName([
      agentConfig({ name: "qa-engineer", imports: { coordination: ["qa-testing-handoff"] } }),
    ]);

    expect(validator.buildCoordinationGraph(agents)).toEqual({ "qa-engineer": [] });
  });

  it("passes a team with only awareness warnings", async () => {
    const report = await (await teamValidator()).loadAndValidate();

    expect(report.isValid).toBe(true);
    expect(report.warnings).toEqual([
      "bidirectional: dev coordinates with dba, but dba has no awareness of dev",
      "bidirectional: dev coordinates with git-helper, but git-helper has no awareness of dev",
      "bidirectional: qa-engineer coordinates with git-helper, but git-helper has no awareness of qa-engineer",
    ]);
    expect(report.info).toHaveLength(3);
  });

  it("fails on a handoff loop", () => {
    const validator = new CoordinationValidator();
    const agents = agentsByName([
      agentConfig({ name: "a", customCoordination: { review: "handoff to b" } }),
      agentConfig({ name: "b", customCoordination: { fixes: "handoff to a" } }),
    ]);

    const report = validator.validateCoordination(agents);

    expect(report.isValid).toBe(false);
    expect(report.summary()).toBe(
      [
        "Coordination validation FAILED",
        "",
        "Circular Dependencies: 1",
        "  - Direct cycle: a -> b -> a",
        "",
        "Errors: 1",
        "  - No entry points found - coordination graph is isolated",
        "",
        "General Errors: 2",
        "  - Found 1 circular dependencies",
        "  - unreachable: No entry points found - coordination graph is isolated",
      ].join("\n")
    );
  });

  it("reports a missing personas directory", async () => {
    const dataDir = await writeTree({});
    const report = await new CoordinationValidator({ dataDir }).loadAndValidate();

    expect(report.isValid).toBe(false);
    expect(report.errors).toEqual([`Personas directory not found: ${dataDir}/personas`]);
  });

  it("validates only the named agents", async () => {
    const report = await (await teamValidator()).loadAndValidate(["qa-engineer", "git-helper"]);

    expect(report.warnings).toEqual([
      "bidirectional: qa-engineer coordinates with git-helper, but git-helper has no awareness of qa-engineer",
    ]);
  });
});
