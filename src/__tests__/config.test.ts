import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { loadConfig } from "../config.js";
import { BUNDLED_TEMPLATE_DIR } from "../paths.js";

describe("loadConfig", () => {
  it("applies defaults", () => {
    expect(loadConfig({})).toEqual({
      dataDir: "data",
      templateDir: BUNDLED_TEMPLATE_DIR,
      outputDir: "dist",
      installDir: path.join(os.homedir(), ".claude"),
      logLevel: "info",
      logPretty: false,
      cacheDbPath: path.join(os.homedir(), ".persona-forge", "knowledge.sqlite"),
      knowledgeCommand: "npx",
      knowledgeArgs: ["-y", "@upstash/context7-mcp"],
    });
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      PERSONA_FORGE_DATA_DIR: "catalog",
      PERSONA_FORGE_LOG_LEVEL: "debug",
      PERSONA_FORGE_LOG_PRETTY: "1",
      PERSONA_FORGE_KNOWLEDGE_COMMAND: "docs-server",
      PERSONA_FORGE_KNOWLEDGE_ARGS: "  --stdio   --port 0 ",
    });

    expect(config).toMatchObject({
      dataDir: "catalog",
      logLevel: "debug",
      logPretty: true,
      knowledgeCommand: "docs-server",
      knowledgeArgs: ["--stdio", "--port", "0"],
    });
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ PERSONA_FORGE_LOG_LEVEL: "loud" })).toThrow(
      /^Invalid environment configuration: PERSONA_FORGE_LOG_LEVEL: /
    );
  });
});
