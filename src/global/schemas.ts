import { z } from "zod";

const sections = z.record(z.string()).default({});

export const profileFileSchema = z.object({
  display_name: z.string().optional(),
  description: z.string().optional(),
  agent_priorities: z.record(z.array(z.string())).default({}),
  cost_preferences: z
    .object({
      daily_budget: z.number().nonnegative().default(50),
      session_budget: z.number().nonnegative().default(15),
      tier_preference: z.string().default("balanced"),
      escalation_threshold: z.number().int().positive().default(3),
    })
    .optional(),
  workflow_preferences: z
    .object({
      testing_requirement: z.string().default("standard"),
      documentation_level: z.string().default("api_focused"),
      git_workflow: z.string().default("feature_branches"),
      deployment_strategy: z.string().default("containerized"),
    })
    .optional(),
  sections,
});

export const environmentFileSchema = z.object({
  display_name: z.string().optional(),
  description: z.string().optional(),
  enforcement_overrides: z
    .object({
      branch_protection: z.string().default("strict"),
      context_verification: z.string().default("strict"),
      cost_monitoring: z.string().default("standard"),
    })
    .optional(),
  cost_overrides: z
    .object({
      daily_budget_multiplier: z.number().positive().default(1),
      session_budget_multiplier: z.number().positive().default(1),
      escalation_threshold: z.number().int().positive().default(3),
    })
    .optional(),
  sections,
});

export type ProfileFile = z.output<typeof profileFileSchema>;
export type EnvironmentFile = z.output<typeof environmentFileSchema>;
