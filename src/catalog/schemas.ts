import { z } from "zod";
import type { AgentComposition, AgentConfig, TraitConfig } from "./types.js";

const stringList = z.array(z.string()).default([]);
const stringMap = z.record(z.string()).default({});

export const traitFileSchema = z.object({
  name: z.string().min(1),
  category: z.string().min(1),
  version: z.string().default("1.0.0"),
  description: z.string().default(""),
  implementation: z.string(),
  coordination_patterns: z.array(z.record(z.unknown())).default([]),
});

export const agentFileSchema = z.object({
  name: z.string().min(1),
  display_name: z.string().min(1),
  model: z.string().default("sonnet"),
  description: z.string(),
  expertise: stringList,
  responsibilities: stringList,
  proactive_triggers: z.record(z.array(z.string())).default({}),
  content_sections: stringMap,
  traits: stringList,
  imports: z.record(z.array(z.string())).default({}),
  custom_instructions: z.string().default(""),
  custom_coordination: stringMap,
  coordination_overrides: stringMap,
});

export const compositionFileSchema = z.object({
  name: z.string().min(1),
  model: z.string().optional(),
  persona: z.string().min(1),
  traits: stringList,
  custom_instructions: z.string().default(""),
  coordination_overrides: stringMap,
});

export function toTraitConfig(raw: z.infer<typeof traitFileSchema>, ref: string): TraitConfig {
  return {
    name: raw.name,
    category: raw.category,
    version: raw.version,
    description: raw.description,
    implementation: raw.implementation,
    coordinationPatterns: raw.coordination_patterns,
    ref,
  };
}

export function toAgentConfig(raw: z.infer<typeof agentFileSchema>): AgentConfig {
  return {
    name: raw.name,
    displayName: raw.display_name,
    model: raw.model,
    description: raw.description,
    expertise: raw.expertise,
    responsibilities: raw.responsibilities,
    proactiveTriggers: raw.proactive_triggers,
    contentSections: raw.content_sections,
    traits: raw.traits,
    imports: raw.imports,
    customInstructions: raw.custom_instructions,
    customCoordination: raw.custom_coordination,
    coordinationOverrides: raw.coordination_overrides,
  };
}

export function toAgentComposition(raw: z.infer<typeof compositionFileSchema>): AgentComposition {
  return {
    name: raw.name,
    model: raw.model,
    persona: raw.persona,
    traits: raw.traits,
    customInstructions: raw.custom_instructions,
    coordinationOverrides: raw.coordination_overrides,
  };
}

/** Flatten zod issues into "path: message" strings. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
