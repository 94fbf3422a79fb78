/**
 * Persona and trait types. YAML files use snake_case keys; these are the
 * shapes after parsing (see schemas.ts).
 */

/** Trigger lists keyed by kind, e.g. `file_patterns`, `project_indicators`. */
export type ProactiveTriggers = Record<string, string[]>;

export interface TraitConfig {
  name: string;
  category: string;
  version: string;
  description: string;
  /** Markdown spliced into every agent that includes the trait */
  implementation: string;
  coordinationPatterns: Record<string, unknown>[];
  /** Reference the trait was loaded under, e.g. "safety/branch-check" */
  ref: string;
}

export interface AgentConfig {
  name: string;
  displayName: string;
  model: string;
  description: string;
  expertise: string[];
  responsibilities: string[];
  proactiveTriggers: ProactiveTriggers;
  /** Section name -> path relative to the content directory */
  contentSections: Record<string, string>;
  /** Trait references relative to the traits directory */
  traits: string[];
  /** Category -> trait names, resolved to "<category>/<name>" */
  imports: Record<string, string[]>;
  customInstructions: string;
  /** Free-form sentences such as "coordinates with qa-engineer on test plans" */
  customCoordination: Record<string, string>;
  coordinationOverrides: Record<string, string>;
}

/**
 * Legacy format: `<name>-composition.yaml` combining an existing persona
 * with a list of traits.
 */
export interface AgentComposition {
  name: string;
  model?: string;
  persona: string;
  traits: string[];
  customInstructions: string;
  coordinationOverrides: Record<string, string>;
}

export type ModelTier = "haiku" | "sonnet" | "opus";

export const MODEL_TIERS: readonly ModelTier[] = ["haiku", "sonnet", "opus"];

export function isModelTier(value: string): value is ModelTier {
  return (MODEL_TIERS as readonly string[]).includes(value);
}
