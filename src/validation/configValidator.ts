import fs from "node:fs/promises";
import path from "node:path";
import { Catalog, pathExists, resolveTraitRefs } from "../catalog/loader.js";
import { CatalogParseError, errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import { CircularDependencyDetector, formatCycle, type AdjacencyList } from "../coordination/cycleDetector.js";

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface ValidatedItem {
  name: string;
  result: ValidationResult;
}

export interface ValidationSection {
  title: string;
  items: ValidatedItem[];
}

export interface CatalogValidationReport {
  isValid: boolean;
  sections: ValidationSection[];
}

function ok(): ValidationResult {
  return { isValid: true, errors: [], warnings: [] };
}

function fail(result: ValidationResult, error: string): ValidationResult {
  result.isValid = false;
  result.errors.push(error);
  return result;
}

export interface ConfigValidatorOpts {
  catalog?: Catalog;
  dataDir?: string;
  logger?: Logger;
}

/**
 * Cross-reference checks over the catalog: files parse, referenced traits,
 * personas and content exist, and composition chains terminate.
 */
export class ConfigValidator {
  readonly catalog: Catalog;
  private logger: Logger;

  constructor(opts: ConfigValidatorOpts = {}) {
    this.logger = (opts.logger ?? getLogger()).child({ component: "validator" });
    this.catalog = opts.catalog ?? new Catalog({ dataDir: opts.dataDir ?? "data", logger: opts.logger });
  }

  async validateYamlFile(filePath: string): Promise<ValidationResult> {
    const result = ok();
    if (!(await pathExists(filePath))) {
      return fail(result, `File does not exist: ${filePath}`);
    }
    try {
      await this.catalog.readYaml(filePath);
    } catch (err) {
      const detail = err instanceof CatalogParseError ? err.issues.join("; ") : errorMessage(err);
      fail(result, `Invalid YAML in ${filePath}: ${detail}`);
    }
    return result;
  }

  async validateAgent(name: string): Promise<ValidationResult> {
    const yamlResult = await this.validateYamlFile(this.catalog.agentPath(name));
    if (!yamlResult.isValid) return yamlResult;

    const result = ok();
    try {
      const agent = await this.catalog.loadAgent(name);

      for (const contentPath of Object.values(agent.contentSections)) {
        if (!(await pathExists(path.join(this.catalog.contentDir, contentPath)))) {
          result.warnings.push(`Content file missing: ${contentPath}`);
        }
      }

      for (const ref of resolveTraitRefs(agent)) {
        if (!(await this.catalog.traitExists(ref))) {
          fail(result, `Referenced trait not found: ${ref}`);
        }
      }
    } catch (err) {
      fail(result, `Invalid agent structure in ${name}: ${errorMessage(err)}`);
    }
    return result;
  }

  async validateTrait(ref: string): Promise<ValidationResult> {
    const result = ok();
    if (!(await this.catalog.traitExists(ref))) {
      return fail(result, `Trait not found: ${ref}`);
    }
    try {
      const trait = await this.catalog.loadTrait(ref);
      if (trait.implementation.trim() === "") {
        result.warnings.push(`Trait ${ref} has empty implementation`);
      }
    } catch (err) {
      fail(result, `Invalid trait structure in ${ref}: ${errorMessage(err)}`);
    }
    return result;
  }

  async validateComposition(name: string): Promise<ValidationResult> {
    const result = ok();
    const filePath = this.catalog.compositionPath(name);
    if (!(await pathExists(filePath))) {
      return fail(result, `Composition not found: ${name}`);
    }

    const yamlResult = await this.validateYamlFile(filePath);
    if (!yamlResult.isValid) return yamlResult;

    try {
      const composition = await this.catalog.loadComposition(name);
      const personaExists =
        (await this.catalog.hasAgentFile(composition.persona)) ||
        (await this.catalog.hasComposition(composition.persona));
      if (!personaExists) {
        fail(result, `Referenced persona not found: ${composition.persona}`);
      }

      for (const ref of composition.traits) {
        if (!(await this.catalog.traitExists(ref))) {
          fail(result, `Referenced trait not found: ${ref}`);
        }
      }
    } catch (err) {
      fail(result, `Invalid composition structure in ${name}: ${errorMessage(err)}`);
    }
    return result;
  }

  async validateContentFiles(): Promise<ValidationResult> {
    const result = ok();
    if (!(await pathExists(this.catalog.contentDir))) {
      result.warnings.push("Content directory does not exist");
      return result;
    }

    for (const name of await this.catalog.listPersonaNames()) {
      let sections: Record<string, string>;
      try {
        sections = (await this.catalog.loadAgent(name)).contentSections;
      } catch (err) {
        result.warnings.push(`Could not check content for ${name}.yaml: ${errorMessage(err)}`);
        continue;
      }

      for (const contentPath of Object.values(sections)) {
        const stat = await fs.stat(path.join(this.catalog.contentDir, contentPath)).catch(() => undefined);
        if (stat === undefined) {
          result.warnings.push(`Missing content file: ${contentPath}`);
        } else if (!stat.isFile()) {
          fail(result, `Content path is not a file: ${contentPath}`);
        }
      }
    }
    return result;
  }

  /**
   * Composition -> persona edges, where the persona is itself a composition.
   * A persona file of the same name ends the chain.
   */
  async buildCompositionGraph(): Promise<AdjacencyList> {
    const graph: AdjacencyList = {};
    for (const name of await this.catalog.listCompositionNames()) {
      graph[name] = [];
      try {
        const { persona } = await this.catalog.loadComposition(name);
        if (!(await this.catalog.hasAgentFile(persona)) && (await this.catalog.hasComposition(persona))) {
          graph[name].push(persona);
        }
      } catch (err) {
        this.logger.debug({ composition: name, err: errorMessage(err) }, "Skipping unreadable composition");
      }
    }
    return graph;
  }

  async findCircularDependencies(): Promise<ValidationResult> {
    const result = ok();
    const cycles = new CircularDependencyDetector().detectCycles(await this.buildCompositionGraph());
    for (const cycle of cycles) {
      fail(result, `Circular composition dependency: ${formatCycle(cycle)}`);
    }
    return result;
  }

  async validateAll(): Promise<CatalogValidationReport> {
    const sections: ValidationSection[] = [];

    const section = async (title: string, names: string[], check: (name: string) => Promise<ValidationResult>) => {
      const items: ValidatedItem[] = [];
      for (const name of names) items.push({ name, result: await check(name) });
      sections.push({ title, items });
    };

    await section("Personas", await this.catalog.listPersonaNames(), (n) => this.validateAgent(n));
    await section("Traits", await this.catalog.listTraitRefs(), (r) => this.validateTrait(r));
    await section("Compositions", await this.catalog.listCompositionNames(), (n) => this.validateComposition(n));
    await section("Content Files", ["Content Files"], () => this.validateContentFiles());
    await section("Dependencies", ["Dependencies"], () => this.findCircularDependencies());

    const isValid = sections.every((s) => s.items.every((item) => item.result.isValid));
    const invalid = sections.flatMap((s) => s.items).filter((item) => !item.result.isValid).length;
    this.logger.info({ isValid, invalid }, "Catalog validation complete");

    return { isValid, sections };
  }
}

export function formatValidationReport(report: CatalogValidationReport): string {
  const lines: string[] = ["Validating agent configurations"];
  for (const { title, items } of report.sections) {
    lines.push("", `${title}:`);
    for (const { name, result } of items) {
      lines.push(`  ${result.isValid ? "OK  " : "FAIL"} ${name}`);
      for (const error of result.errors) lines.push(`    error: ${error}`);
      for (const warning of result.warnings) lines.push(`    warning: ${warning}`);
    }
  }
  lines.push("", report.isValid ? "All configurations are valid" : "Validation failed");
  return lines.join("\n");
}
