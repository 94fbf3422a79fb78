import fs from "node:fs/promises";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { ValidationError } from "../../errors.js";
import { agentConfig, persona, tempDir, writeTree } from "../../__tests__/helpers.js";
import { ClaudeMdGenerator, generateAgentDirectory, generateMermaidGraph } from "../claudeMd.js";

const team = [
  agentConfig({ name: "git-helper", model: "haiku", description: "Git ops" }),
  agentConfig({
    name: "python-engineer",
    proactiveTriggers: { file_patterns: ["*.py", "*.pyi", "pyproject.toml", "setup.cfg"] },
    imports: { coordination: ["version-control-coordination"] },
  }),
  agentConfig({ name: "architect", model: "opus", customCoordination: { impl: "delegates to python-engineer." } }),
];

function graphFor(agents = team) {
  return new ClaudeMdGenerator().buildCoordinationGraph(agents);
}

describe("generateAgentDirectory", () => {
  it("groups agents by tier", () => {
    expect(generateAgentDirectory(team, graphFor())).toBe(
      [
        "## Agent Directory",
        "",
        "### Tier 1: Efficiency Agents (Haiku)",
        "",
        "**git-helper** `model: haiku`",
        "- Git ops",
        "",
        "### Tier 2: Specialist Agents (Sonnet)",
        "",
        "**python-engineer** `model: sonnet`",
        "- The python-engineer agent",
        "- Coordinates with: git-helper",
        "- Proactive on: *.py, *.pyi, pyproject.toml, ... (4 total)",
        "",
        "### Tier 3: Senior Agents (Opus)",
        "",
        "**architect** `model: opus`",
        "- The architect agent",
        "- Coordinates with: python-engineer",
        "",
      ].join("\n")
    );
  });
});

describe("generateMermaidGraph", () => {
  it("draws entry points and their direct targets", () => {
    const graph = graphFor();

    expect(graph.isEntryPoint("architect")).toBe(true);
    expect(graph.getAllReachable("architect")).toEqual(new Set(["python-engineer", "git-helper"]));
    expect(generateMermaidGraph(team, graph)).toBe(
      [
        "```mermaid",
        "graph TD",
        "    architect[architect]",
        "    style architect fill:#FFB6C1",
        "    python-engineer[python-engineer]",
        "    style python-engineer fill:#87CEEB",
        "    architect -.-> python-engineer",
        "```",
      ].join("\n")
    );
  });

  it("draws trait handoffs as solid arrows", () => {
    const pair = team.slice(0, 2);
    const mermaid = generateMermaidGraph(pair, graphFor(pair));

    expect(mermaid.split("\n")).toContain("    python-engineer --> git-helper");
  });

  it("stops at the node limit", () => {
    expect(generateMermaidGraph(team, graphFor(), 1)).toBe(
      ["```mermaid", "graph TD", "    architect[architect]", "    style architect fill:#FFB6C1", "```"].join("\n")
    );
  });
});

describe("ClaudeMdGenerator", () => {
  const fixedNow = () => new Date("2026-01-02T03:04:05Z");

  async function generatorFor(files: Record<string, string>) {
    const dataDir = await writeTree(files);
    const outputDir = await tempDir();
    return { generator: new ClaudeMdGenerator({ dataDir, outputDir, now: fixedNow }), outputDir };
  }

  it("writes CLAUDE.md for a valid team", async () => {
    const { generator, outputDir } = await generatorFor({
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

    const outputPath = await generator.generateClaudeMd();
    const content = await fs.readFile(outputPath, "utf-8");

    expect(outputPath).toBe(path.join(outputDir, "CLAUDE.md"));
    expect(content).toContain("Generated by persona-forge at 2026-01-02T03:04:05.000Z from 4 agent definitions.");
    expect(content).toContain("\nAlways available for direct invocation: git-helper\n");
    expect(content).toContain("| `*.py` | dev |\n");
    expect(content).toContain(
      [
        "- **dev** → **dba**: coordinates with dba on schema changes.",
        "- **dev** → **qa-engineer**: After feature development completion",
        "- **dev** → **git-helper**: For all version control operations",
        "- **qa-engineer** → **git-helper**: For all version control operations",
      ].join("\n")
    );
    expect(content).toContain("Graph: 4 agents, 2 entry points, 4 cached paths.");
    expect(content).not.toContain("## Suggestions");
  });

  it("refuses to generate when coordination is invalid", async () => {
    const { generator } = await generatorFor({
      "personas/a.yaml": persona({ name: "a", custom: { review: "handoff to b" } }),
      "personas/b.yaml": persona({ name: "b", custom: { fixes: "handoff to a" } }),
    });

    const err = await generator.generateClaudeMd().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ValidationError);
    expect(err instanceof ValidationError && err.message).toBe("Coordination validation failed: 2 errors");
  });

  it("skips validation on request and honours the output path", async () => {
    const { generator, outputDir } = await generatorFor({
      "personas/a.yaml": persona({ name: "a", custom: { review: "handoff to b" } }),
      "personas/b.yaml": persona({ name: "b", custom: { fixes: "handoff to a" } }),
    });
    const target = path.join(outputDir, "nested", "ORCHESTRATION.md");

    expect(await generator.generateClaudeMd({ outputPath: target, validate: false })).toBe(target);
    expect(await fs.readFile(target, "utf-8")).toContain(
      "Generated by persona-forge at 2026-01-02T03:04:05.000Z from 2 agent definitions."
    );
  });

  it("fails without agents", async () => {
    const { generator } = await generatorFor({});
    await expect(generator.generateClaudeMd()).rejects.toThrow("No agent configurations found");
  });
});
