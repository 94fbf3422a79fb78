import { describe, expect, it } from "vitest";
import { CatalogParseError, CircularDependencyError, PersonaNotFoundError, TraitNotFoundError } from "../../errors.js";
import { agentConfig, persona, writeTree } from "../../__tests__/helpers.js";
import { Catalog, applyComposition, resolveTraitRefs } from "../loader.js";

const traitYaml = `name: branch-check
category: safety
description: Stay off main
implementation: Check the branch first.
`;

async function catalogFor(files: Record<string, string>): Promise<Catalog> {
  return new Catalog({ dataDir: await writeTree(files) });
}

describe("Catalog", () => {
  it("loads a persona with snake_case keys mapped and defaults filled", async () => {
    const catalog = await catalogFor({
      "personas/api-dev.yaml": persona({ name: "api-dev", filePatterns: ["*.py"], coordination: ["qa-testing-handoff"] }),
    });

    const agent = await catalog.loadAgent("api-dev");

    expect(agent.displayName).toBe("api-dev");
    expect(agent.model).toBe("sonnet");
    expect(agent.proactiveTriggers).toEqual({ file_patterns: ["*.py"] });
    expect(agent.imports).toEqual({ coordination: ["qa-testing-handoff"] });
    expect(agent.expertise).toEqual([]);
    expect(agent.customCoordination).toEqual({});
  });

  it("throws PersonaNotFoundError for a missing persona", async () => {
    const catalog = await catalogFor({ "personas/a.yaml": persona({ name: "a" }) });
    await expect(catalog.loadAgent("ghost")).rejects.toBeInstanceOf(PersonaNotFoundError);
  });

  it("reports the failing field for a persona without a name", async () => {
    const catalog = await catalogFor({ "personas/bad.yaml": "display_name: Bad\ndescription: x\n" });

    const err = await catalog.loadAgent("bad").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CatalogParseError);
    expect(err instanceof CatalogParseError && err.issues).toEqual(["name: Required"]);
  });

  it("wraps invalid YAML in CatalogParseError", async () => {
    const catalog = await catalogFor({ "personas/broken.yaml": "name: [unclosed\n" });
    await expect(catalog.loadAgent("broken")).rejects.toBeInstanceOf(CatalogParseError);
  });

  it("resolves a composition over its base persona", async () => {
    const catalog = await catalogFor({
      "personas/dev.yaml": persona({ name: "dev", traits: ["safety/branch-check"] }),
      "personas/reviewer-composition.yaml":
        "name: reviewer\npersona: dev\nmodel: opus\ntraits:\n  - safety/branch-check\n  - safety/read-only\ncustom_instructions: Review only.\n",
    });

    const agent = await catalog.resolveAgent("reviewer");

    expect(agent.name).toBe("reviewer");
    expect(agent.model).toBe("opus");
    expect(agent.traits).toEqual(["safety/branch-check", "safety/read-only"]);
    expect(agent.customInstructions).toBe("Review only.");
    expect(agent.description).toBe("The dev agent");
  });

  it("detects compositions that refer back to themselves", async () => {
    const catalog = await catalogFor({
      "personas/a-composition.yaml": "name: a\npersona: b\n",
      "personas/b-composition.yaml": "name: b\npersona: a\n",
    });

    const err = await catalog.resolveAgent("a").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(CircularDependencyError);
    expect(err instanceof CircularDependencyError && err.dependencyChain).toEqual(["a", "b", "a"]);
  });

  it("loads yaml and markdown traits", async () => {
    const catalog = await catalogFor({
      "traits/safety/branch-check.yaml": traitYaml,
      "traits/coordination/qa-testing-handoff.md": "Hand off to qa-engineer.\n",
    });

    const yamlTrait = await catalog.loadTrait("safety/branch-check");
    const mdTrait = await catalog.loadTrait("coordination/qa-testing-handoff");

    expect(yamlTrait).toMatchObject({ name: "branch-check", category: "safety", version: "1.0.0" });
    expect(mdTrait).toEqual({
      name: "qa-testing-handoff",
      category: "coordination",
      version: "1.0.0",
      description: "",
      implementation: "Hand off to qa-engineer.\n",
      coordinationPatterns: [],
      ref: "coordination/qa-testing-handoff",
    });
    await expect(catalog.loadTrait("safety/nope")).rejects.toBeInstanceOf(TraitNotFoundError);
  });

  it("renders missing content as a comment", async () => {
    const catalog = await catalogFor({ "content/style.md": "Be brief.\n" });

    expect(await catalog.loadContent("style.md")).toBe("Be brief.\n");
    expect(await catalog.loadContent("missing.md")).toBe("<!-- Content not found: missing.md -->");
  });

  it("lists agents, compositions and trait refs", async () => {
    const catalog = await catalogFor({
      "personas/zed.yaml": persona({ name: "zed" }),
      "personas/alpha.yaml": persona({ name: "alpha" }),
      "personas/alpha-reviewer-composition.yaml": "name: alpha-reviewer\npersona: alpha\n",
      "personas/config.yaml": "settings: {}\n",
      "personas/notes.txt": "ignored",
      "traits/safety/branch-check.yaml": traitYaml,
      "traits/coordination/qa-testing-handoff.md": "x",
    });

    expect(await catalog.listAgentNames()).toEqual(["alpha", "alpha-reviewer", "zed"]);
    expect(await catalog.listCompositionNames()).toEqual(["alpha-reviewer"]);
    expect(await catalog.listPersonaNames()).toEqual(["alpha", "zed"]);
    expect(await catalog.listTraitRefs()).toEqual(["coordination/qa-testing-handoff", "safety/branch-check"]);
  });

  it("skips agents that fail to load", async () => {
    const catalog = await catalogFor({
      "personas/good.yaml": persona({ name: "good" }),
      "personas/bad.yaml": "description: no name\n",
    });

    const agents = await catalog.loadAllAgents();

    expect(agents.map((a) => a.name)).toEqual(["good"]);
  });

  it("returns nothing when the personas directory is absent", async () => {
    const catalog = await catalogFor({});
    expect(await catalog.listAgentNames()).toEqual([]);
    expect(await catalog.listTraitRefs()).toEqual([]);
  });
});

describe("resolveTraitRefs", () => {
  it("puts explicit traits first and dedupes imports", () => {
    const agent = {
      traits: ["safety/branch-check", "coordination/qa-testing-handoff"],
      imports: { coordination: ["qa-testing-handoff", "documentation-handoff"] },
    };
    expect(resolveTraitRefs(agentConfig({ name: "base", ...agent }))).toEqual([
      "safety/branch-check",
      "coordination/qa-testing-handoff",
      "coordination/documentation-handoff",
    ]);
  });
});

describe("applyComposition", () => {
  it("keeps the persona model and instructions when the composition omits them", () => {
    const base = agentConfig({ name: "base", model: "haiku", customInstructions: "Base.", coordinationOverrides: { a: "1" } });
    const composed = applyComposition(base, {
      name: "variant",
      persona: "base",
      traits: [],
      customInstructions: "",
      coordinationOverrides: { b: "2" },
    });

    expect(composed.model).toBe("haiku");
    expect(composed.customInstructions).toBe("Base.");
    expect(composed.coordinationOverrides).toEqual({ a: "1", b: "2" });
  });
});
