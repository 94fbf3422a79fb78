import fs from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import type { z } from "zod";
import {
  CatalogParseError,
  CircularDependencyError,
  PersonaNotFoundError,
  TraitNotFoundError,
  errorMessage,
} from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import {
  agentFileSchema,
  compositionFileSchema,
  formatIssues,
  toAgentComposition,
  toAgentConfig,
  toTraitConfig,
  traitFileSchema,
} from "./schemas.js";
import type { AgentComposition, AgentConfig, TraitConfig } from "./types.js";

const COMPOSITION_SUFFIX = "-composition";
const RESERVED_PERSONA_FILES = new Set(["config"]);
const TRAIT_EXTENSIONS = [".yaml", ".yml", ".md"] as const;

export interface CatalogOpts {
  dataDir: string;
  logger?: Logger;
}

export async function pathExists(p: string): Promise<boolean> {
  return fs.access(p).then(
    () => true,
    () => false
  );
}

/**
 * Read access to the persona/trait/content corpus under a data directory:
 *
 *   <dataDir>/personas/<name>.yaml
 *   <dataDir>/personas/<name>-composition.yaml
 *   <dataDir>/traits/<category>/<trait>.{yaml,yml,md}
 *   <dataDir>/content/<path>
 */
export class Catalog {
  readonly dataDir: string;
  readonly personasDir: string;
  readonly traitsDir: string;
  readonly contentDir: string;
  private logger: Logger;

  constructor(opts: CatalogOpts) {
    this.dataDir = opts.dataDir;
    this.personasDir = path.join(opts.dataDir, "personas");
    this.traitsDir = path.join(opts.dataDir, "traits");
    this.contentDir = path.join(opts.dataDir, "content");
    this.logger = (opts.logger ?? getLogger()).child({ component: "catalog" });
  }

  agentPath(name: string): string {
    return path.join(this.personasDir, `${name}.yaml`);
  }

  compositionPath(name: string): string {
    return path.join(this.personasDir, `${name}${COMPOSITION_SUFFIX}.yaml`);
  }

  hasAgentFile(name: string): Promise<boolean> {
    return pathExists(this.agentPath(name));
  }

  hasComposition(name: string): Promise<boolean> {
    return pathExists(this.compositionPath(name));
  }

  /**
   * Read and parse a YAML file. Throws CatalogParseError on invalid YAML;
   * callers check existence first.
   */
  async readYaml(filePath: string): Promise<unknown> {
    const text = await fs.readFile(filePath, "utf-8");
    try {
      return parseYaml(text);
    } catch (err) {
      throw new CatalogParseError(filePath, [errorMessage(err)], { cause: err });
    }
  }

  /** readYaml, then validate against `schema`. An empty file parses as `{}`. */
  async parseFile<S extends z.ZodTypeAny>(schema: S, filePath: string): Promise<z.output<S>> {
    const data = await this.readYaml(filePath);
    const parsed = schema.safeParse(data ?? {});
    if (!parsed.success) {
      throw new CatalogParseError(filePath, formatIssues(parsed.error));
    }
    return parsed.data;
  }

  async loadAgent(name: string): Promise<AgentConfig> {
    const filePath = this.agentPath(name);
    if (!(await pathExists(filePath))) {
      throw new PersonaNotFoundError(name, this.personasDir);
    }
    return toAgentConfig(await this.parseFile(agentFileSchema, filePath));
  }

  async loadComposition(name: string): Promise<AgentComposition> {
    const filePath = this.compositionPath(name);
    if (!(await pathExists(filePath))) {
      throw new PersonaNotFoundError(`${name}${COMPOSITION_SUFFIX}`, this.personasDir);
    }
    return toAgentComposition(await this.parseFile(compositionFileSchema, filePath));
  }

  /**
   * Resolve an agent by name. A composition file takes precedence over a
   * plain persona file of the same name.
   */
  async resolveAgent(name: string): Promise<AgentConfig> {
    if (await this.hasComposition(name)) {
      return this.resolveComposition(name, []);
    }
    return this.loadAgent(name);
  }

  private async resolveComposition(name: string, chain: string[]): Promise<AgentConfig> {
    if (chain.includes(name)) {
      throw new CircularDependencyError([...chain, name]);
    }
    const composition = await this.loadComposition(name);
    const personaName = composition.persona;

    let persona: AgentConfig;
    if (await this.hasAgentFile(personaName)) {
      persona = await this.loadAgent(personaName);
    } else if (await this.hasComposition(personaName)) {
      persona = await this.resolveComposition(personaName, [...chain, name]);
    } else {
      throw new PersonaNotFoundError(personaName, this.personasDir);
    }

    return applyComposition(persona, composition);
  }

  /**
   * Load a trait by reference. YAML traits carry metadata; a markdown trait
   * is its own implementation.
   */
  async loadTrait(ref: string): Promise<TraitConfig> {
    for (const ext of TRAIT_EXTENSIONS) {
      const filePath = path.join(this.traitsDir, `${ref}${ext}`);
      if (!(await pathExists(filePath))) continue;

      if (ext === ".md") {
        const implementation = await fs.readFile(filePath, "utf-8");
        const category = path.posix.dirname(ref);
        return {
          name: path.posix.basename(ref),
          category: category === "." ? "general" : category,
          version: "1.0.0",
          description: "",
          implementation,
          coordinationPatterns: [],
          ref,
        };
      }
      return toTraitConfig(await this.parseFile(traitFileSchema, filePath), ref);
    }
    throw new TraitNotFoundError(ref, this.traitsDir);
  }

  async traitExists(ref: string): Promise<boolean> {
    for (const ext of TRAIT_EXTENSIONS) {
      if (await pathExists(path.join(this.traitsDir, `${ref}${ext}`))) return true;
    }
    return false;
  }

  async loadTraits(agent: AgentConfig): Promise<TraitConfig[]> {
    const traits: TraitConfig[] = [];
    for (const ref of resolveTraitRefs(agent)) {
      traits.push(await this.loadTrait(ref));
    }
    return traits;
  }

  /** Missing content renders as an HTML comment instead of failing the build. */
  async loadContent(contentPath: string): Promise<string> {
    const fullPath = path.join(this.contentDir, contentPath);
    if (!(await pathExists(fullPath))) {
      return `<!-- Content not found: ${contentPath} -->`;
    }
    return fs.readFile(fullPath, "utf-8");
  }

  async loadContentSections(agent: AgentConfig): Promise<Record<string, string>> {
    const sections: Record<string, string> = {};
    for (const [section, contentPath] of Object.entries(agent.contentSections)) {
      sections[section] = await this.loadContent(contentPath);
    }
    return sections;
  }

  async listPersonaFiles(): Promise<string[]> {
    if (!(await pathExists(this.personasDir))) return [];
    const entries = await fs.readdir(this.personasDir);
    return entries.filter((f) => f.endsWith(".yaml")).sort();
  }

  /** Agent names, including compositions, sorted. */
  async listAgentNames(): Promise<string[]> {
    const names = new Set<string>();
    for (const file of await this.listPersonaFiles()) {
      const stem = file.slice(0, -".yaml".length);
      if (RESERVED_PERSONA_FILES.has(stem)) continue;
      names.add(stem.endsWith(COMPOSITION_SUFFIX) ? stem.slice(0, -COMPOSITION_SUFFIX.length) : stem);
    }
    return [...names].sort();
  }

  async listCompositionNames(): Promise<string[]> {
    return (await this.listPersonaFiles())
      .map((file) => file.slice(0, -".yaml".length))
      .filter((stem) => stem.endsWith(COMPOSITION_SUFFIX))
      .map((stem) => stem.slice(0, -COMPOSITION_SUFFIX.length));
  }

  /** Plain persona names (no compositions), sorted. */
  async listPersonaNames(): Promise<string[]> {
    return (await this.listPersonaFiles())
      .map((file) => file.slice(0, -".yaml".length))
      .filter((stem) => !RESERVED_PERSONA_FILES.has(stem) && !stem.endsWith(COMPOSITION_SUFFIX));
  }

  async listTraitRefs(): Promise<string[]> {
    if (!(await pathExists(this.traitsDir))) return [];
    const entries = await fs.readdir(this.traitsDir, { recursive: true });
    const refs = new Set<string>();
    for (const entry of entries) {
      const ext = path.extname(entry);
      if (!(TRAIT_EXTENSIONS as readonly string[]).includes(ext)) continue;
      refs.add(entry.slice(0, -ext.length).split(path.sep).join("/"));
    }
    return [...refs].sort();
  }

  /** Every resolvable agent. Agents that fail to load are logged and skipped. */
  async loadAllAgents(): Promise<AgentConfig[]> {
    const agents: AgentConfig[] = [];
    for (const name of await this.listAgentNames()) {
      try {
        agents.push(await this.resolveAgent(name));
      } catch (err) {
        this.logger.warn({ agent: name, err: errorMessage(err) }, "Skipping agent that failed to load");
      }
    }
    return agents;
  }
}

/**
 * Ordered, de-duplicated trait references: explicit `traits` first, then
 * `imports` by category.
 */
export function resolveTraitRefs(agent: AgentConfig): string[] {
  const refs: string[] = [...agent.traits];
  for (const [category, names] of Object.entries(agent.imports)) {
    for (const name of names) {
      refs.push(`${category}/${name}`);
    }
  }
  return [...new Set(refs)];
}

/** Custom coordination with overrides replacing entries of the same key. */
export function effectiveCoordination(agent: AgentConfig): Record<string, string> {
  return { ...agent.customCoordination, ...agent.coordinationOverrides };
}

export function applyComposition(persona: AgentConfig, composition: AgentComposition): AgentConfig {
  return {
    ...persona,
    name: composition.name,
    model: composition.model ?? persona.model,
    traits: [...new Set([...persona.traits, ...composition.traits])],
    customInstructions: composition.customInstructions || persona.customInstructions,
    coordinationOverrides: { ...persona.coordinationOverrides, ...composition.coordinationOverrides },
  };
}
