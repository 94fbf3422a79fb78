import os from "node:os";
import path from "node:path";
import { z } from "zod";
import { BUNDLED_TEMPLATE_DIR } from "./paths.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  PERSONA_FORGE_DATA_DIR: z.string().default("data"),
  PERSONA_FORGE_TEMPLATE_DIR: z.string().default(BUNDLED_TEMPLATE_DIR),
  PERSONA_FORGE_OUTPUT_DIR: z.string().default("dist"),
  PERSONA_FORGE_INSTALL_DIR: z.string().optional(),
  PERSONA_FORGE_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info"),
  PERSONA_FORGE_LOG_PRETTY: booleanFlag,
  PERSONA_FORGE_CACHE_DB: z.string().optional(),
  PERSONA_FORGE_KNOWLEDGE_COMMAND: z.string().default("npx"),
  PERSONA_FORGE_KNOWLEDGE_ARGS: z.string().default("-y @upstash/context7-mcp"),
});

export interface AppConfig {
  dataDir: string;
  templateDir: string;
  outputDir: string;
  installDir: string;
  logLevel: z.infer<typeof envSchema>["PERSONA_FORGE_LOG_LEVEL"];
  logPretty: boolean;
  cacheDbPath: string;
  knowledgeCommand: string;
  knowledgeArgs: string[];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid environment configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;

  return {
    dataDir: e.PERSONA_FORGE_DATA_DIR,
    templateDir: e.PERSONA_FORGE_TEMPLATE_DIR,
    outputDir: e.PERSONA_FORGE_OUTPUT_DIR,
    installDir: e.PERSONA_FORGE_INSTALL_DIR ?? path.join(os.homedir(), ".claude"),
    logLevel: e.PERSONA_FORGE_LOG_LEVEL,
    logPretty: e.PERSONA_FORGE_LOG_PRETTY,
    cacheDbPath:
      e.PERSONA_FORGE_CACHE_DB ?? path.join(os.homedir(), ".persona-forge", "knowledge.sqlite"),
    knowledgeCommand: e.PERSONA_FORGE_KNOWLEDGE_COMMAND,
    knowledgeArgs: e.PERSONA_FORGE_KNOWLEDGE_ARGS.split(/\s+/).filter(Boolean),
  };
}
