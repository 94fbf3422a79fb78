import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach } from "vitest";
import type { AgentConfig } from "../catalog/types.js";

const tempDirs: string[] = [];

afterEach(async () => {
  await Promise.all(tempDirs.splice(0).map((dir) => fs.rm(dir, { recursive: true, force: true })));
});

/** Fresh temp directory, removed after the current test. */
export async function tempDir(prefix = "persona-forge-"): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

/** Write `files` (relative path -> contents) under a fresh temp directory. */
export async function writeTree(files: Record<string, string>): Promise<string> {
  const root = await tempDir();
  for (const [rel, contents] of Object.entries(files)) {
    const full = path.join(root, rel);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, contents, "utf-8");
  }
  return root;
}

export function persona(fields: {
  name: string;
  model?: string;
  description?: string;
  filePatterns?: string[];
  coordination?: string[];
  traits?: string[];
  custom?: Record<string, string>;
  content?: Record<string, string>;
}): string {
  const lines = [
    `name: ${fields.name}`,
    `display_name: ${fields.name}`,
    `model: ${fields.model ?? "sonnet"}`,
    `description: ${fields.description ?? `The ${fields.name} agent`}`,
  ];
  if (fields.filePatterns) {
    lines.push("proactive_triggers:", "  file_patterns:", ...fields.filePatterns.map((p) => `    - "${p}"`));
  }
  if (fields.traits) {
    lines.push("traits:", ...fields.traits.map((t) => `  - ${t}`));
  }
  if (fields.coordination) {
    lines.push("imports:", "  coordination:", ...fields.coordination.map((t) => `    - ${t}`));
  }
  if (fields.custom) {
    lines.push("custom_coordination:", ...Object.entries(fields.custom).map(([k, v]) => `  ${k}: ${v}`));
  }
  if (fields.content) {
    lines.push("content_sections:", ...Object.entries(fields.content).map(([k, v]) => `  ${k}: ${v}`));
  }
  return lines.join("\n") + "\n";
}

export function agentConfig(overrides: Partial<AgentConfig> & { name: string }): AgentConfig {
  return {
    displayName: overrides.name,
    model: "sonnet",
    description: `The ${overrides.name} agent`,
    expertise: [],
    responsibilities: [],
    proactiveTriggers: {},
    contentSections: {},
    traits: [],
    imports: {},
    customInstructions: "",
    customCoordination: {},
    coordinationOverrides: {},
    ...overrides,
  };
}
