import { parseArgs } from "node:util";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import { createKnowledgeProvider, type KnowledgeProvider } from "../knowledge/provider.js";
import { KNOWLEDGE_TYPES } from "../knowledge/types.js";
import type { CliContext, Command } from "./context.js";

export type ProviderFactory = (ctx: CliContext) => KnowledgeProvider;

const defaultFactory: ProviderFactory = (ctx) => createKnowledgeProvider(ctx.config, ctx.logger);

export function knowledgeCommand(factory: ProviderFactory = defaultFactory): Command {
  return async (argv, ctx) => {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        type: { type: "string", default: "framework_docs" },
        topic: { type: "string" },
        version: { type: "string" },
        tokens: { type: "string" },
      },
    });

    const framework = positionals[0];
    if (framework === undefined) {
      throw new ValidationError("Usage: knowledge <framework> [--type t] [--topic t] [--version v]");
    }

    const type = z.enum(KNOWLEDGE_TYPES).safeParse(values.type);
    if (!type.success) {
      throw new ValidationError(`--type must be one of ${KNOWLEDGE_TYPES.join(", ")}, got '${values.type}'`);
    }

    const maxTokens = values.tokens === undefined ? undefined : Number(values.tokens);
    if (maxTokens !== undefined && (!Number.isInteger(maxTokens) || maxTokens <= 0)) {
      throw new ValidationError(`--tokens must be a positive integer, got '${values.tokens}'`);
    }

    const provider = factory(ctx);
    try {
      const response = await provider.getKnowledge({
        type: type.data,
        framework,
        topic: values.topic,
        version: values.version,
        maxTokens,
      });

      ctx.out(`Source: ${response.source} (authority ${response.authorityScore})`);
      ctx.out(`Cache: ${response.cacheHit ? "hit" : "miss"}, ${response.responseTimeMs}ms`);
      ctx.out("");
      ctx.out(response.content);
      return response.source === "Internal:Fallback" ? 1 : 0;
    } finally {
      await provider.close();
    }
  };
}

export function knowledgeHealthCommand(factory: ProviderFactory = defaultFactory): Command {
  return async (_argv, ctx) => {
    const provider = factory(ctx);
    try {
      const report = await provider.healthCheck();
      for (const [name, health] of Object.entries(report.sources)) {
        const detail = health.status === "healthy" ? `${health.responseTimeMs ?? 0}ms` : (health.error ?? "");
        ctx.out(`${name}: ${health.status} (circuit ${health.circuit}) ${detail}`.trimEnd());
      }
      ctx.out(
        `System: ${report.system.overallStatus} (${report.system.healthySources}/${report.system.totalSources} sources healthy)`
      );
      const metrics = provider.cache.metrics();
      ctx.out(`Cache: ${metrics.persistentEntries} persisted entries`);
      return report.system.overallStatus === "healthy" ? 0 : 1;
    } finally {
      await provider.close();
    }
  };
}
