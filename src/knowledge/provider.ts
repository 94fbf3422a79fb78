import { performance } from "node:perf_hooks";
import type { RetryPolicy } from "cockatiel";
import { z } from "zod";
import type { AppConfig } from "../config.js";
import { openDb } from "../db/db.js";
import { migrate } from "../db/migrate.js";
import { KnowledgeSourceError, errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import { KnowledgeCache, MAX_TTL_SECONDS } from "./cache.js";
import { McpKnowledgeSource } from "./mcpSource.js";
import { CircuitBreaker, callGuarded, createRetryPolicy, type RetryOpts } from "./reliability.js";
import {
  COMPLIANCE_FRAMEWORKS,
  DEFAULT_CHECKLIST_FRAMEWORKS,
  SecurityComplianceProvider,
  renderChecklist,
  type ComplianceFramework,
} from "./security.js";
import {
  knowledgeRequestSchema,
  type KnowledgeRequest,
  type KnowledgeRequestInput,
  type KnowledgeResponse,
  type KnowledgeSource,
  type KnowledgeType,
  type LibraryCandidate,
  type SourceHealth,
} from "./types.js";

export const FRAMEWORK_DOCS_TTL_SECONDS = 7200;
export const SECURITY_STANDARDS_SOURCE = "SecurityStandards";
export const SECURITY_STANDARDS_AUTHORITY = 9.5;

const FALLBACK_AUTHORITY = 6.0;
const UNAVAILABLE_AUTHORITY = 1.0;
const FALLBACK_AGE_MS = 24 * 3600 * 1000;
const HEALTH_CHECK_LIBRARY = "react";

const cachedResponseSchema = z.object({
  content: z.string(),
  source: z.string(),
  authorityScore: z.number(),
  lastUpdated: z.string().datetime(),
});

type CachedResponse = z.infer<typeof cachedResponseSchema>;

export interface HealthReport {
  sources: Record<string, SourceHealth>;
  system: {
    overallStatus: "healthy" | "degraded";
    healthySources: number;
    totalSources: number;
    availabilityPercentage: number;
  };
}

export function frameworkCacheKey(request: KnowledgeRequest): string {
  return `framework:${request.framework ?? ""}:${request.topic ?? ""}:${request.version ?? ""}`;
}

export function securityCacheKey(request: KnowledgeRequest): string {
  return `security:${request.framework ?? ""}:${request.topic ?? ""}`;
}

/** A request's topic names one compliance framework; without one the default checklist frameworks apply. */
export function checklistFrameworks(topic: string | undefined): readonly ComplianceFramework[] {
  if (topic === undefined) return DEFAULT_CHECKLIST_FRAMEWORKS;
  const parsed = z.enum(COMPLIANCE_FRAMEWORKS).safeParse(topic);
  if (!parsed.success) {
    throw new KnowledgeSourceError(
      `Unknown compliance framework '${topic}'; expected one of ${COMPLIANCE_FRAMEWORKS.join(", ")}`
    );
  }
  return [parsed.data];
}

/**
 * Highest trust score at or above the threshold; snippet count breaks ties.
 */
export function selectBestLibrary(
  candidates: LibraryCandidate[],
  trustThreshold: number
): LibraryCandidate | undefined {
  return candidates
    .filter((c) => c.trustScore >= trustThreshold)
    .sort((a, b) => b.trustScore - a.trustScore || b.snippetCount - a.snippetCount)[0];
}

export interface KnowledgeProviderOpts {
  source: KnowledgeSource;
  cache?: KnowledgeCache;
  breaker?: CircuitBreaker;
  security?: SecurityComplianceProvider;
  retry?: Omit<RetryOpts, "logger">;
  now?: () => number;
  logger?: Logger;
}

/**
 * Framework documentation from an external source, with caching, retries,
 * a circuit breaker and cached fallbacks when the source is unavailable.
 * Security checklists come from bundled control data.
 */
export class KnowledgeProvider {
  readonly source: KnowledgeSource;
  readonly cache: KnowledgeCache;
  readonly breaker: CircuitBreaker;
  readonly security: SecurityComplianceProvider;
  private retryPolicy: RetryPolicy;
  private now: () => number;
  private logger: Logger;

  constructor(opts: KnowledgeProviderOpts) {
    this.logger = (opts.logger ?? getLogger()).child({ component: "knowledge" });
    this.source = opts.source;
    this.now = opts.now ?? Date.now;
    this.cache = opts.cache ?? new KnowledgeCache({ now: this.now, logger: opts.logger });
    this.breaker = opts.breaker ?? new CircuitBreaker({ logger: opts.logger });
    this.security = opts.security ?? new SecurityComplianceProvider({ logger: opts.logger });
    this.retryPolicy = createRetryPolicy({ ...opts.retry, logger: this.logger });
  }

  /** Dispatch on the request type. */
  getKnowledge(input: KnowledgeRequestInput): Promise<KnowledgeResponse> {
    const request = knowledgeRequestSchema.parse(input);
    return request.type === "security_standards"
      ? this.getSecurityStandards(request)
      : this.getFrameworkDocumentation(request);
  }

  /**
   * Security checklist for the request's technology (`framework`), across
   * the compliance framework named by `topic` or the default ones.
   */
  async getSecurityStandards(input: KnowledgeRequestInput): Promise<KnowledgeResponse> {
    const request = knowledgeRequestSchema.parse(input);
    const technology = request.framework;
    if (technology === undefined) {
      throw new KnowledgeSourceError("A technology is required for security standards");
    }
    const frameworks = checklistFrameworks(request.topic);

    const started = performance.now();
    const elapsed = () => Math.round(performance.now() - started);
    const cacheKey = securityCacheKey(request);

    const cached = cachedResponseSchema.safeParse(this.cache.get(cacheKey));
    if (cached.success) {
      return { ...this.fromCached(cached.data), cacheHit: true, responseTimeMs: elapsed() };
    }

    const checklist = await this.security.getSecurityChecklist([technology], frameworks);
    const response: KnowledgeResponse = {
      content: renderChecklist(technology, checklist),
      source: `${SECURITY_STANDARDS_SOURCE}:${frameworks.join(",")}`,
      authorityScore: SECURITY_STANDARDS_AUTHORITY,
      lastUpdated: new Date(this.now()),
      cacheHit: false,
      responseTimeMs: elapsed(),
    };

    this.cache.set(cacheKey, this.toCached(response), {
      authorityScore: response.authorityScore,
      source: response.source,
    });
    return response;
  }

  async getFrameworkDocumentation(input: KnowledgeRequestInput): Promise<KnowledgeResponse> {
    const request = knowledgeRequestSchema.parse(input);
    const framework = request.framework;
    if (framework === undefined) {
      throw new KnowledgeSourceError("A framework name is required for framework documentation");
    }

    const started = performance.now();
    const elapsed = () => Math.round(performance.now() - started);
    const cacheKey = frameworkCacheKey(request);

    const cached = cachedResponseSchema.safeParse(this.cache.get(cacheKey));
    if (cached.success) {
      return { ...this.fromCached(cached.data), cacheHit: true, responseTimeMs: elapsed() };
    }

    try {
      const candidates = await this.guarded(() => this.source.resolveLibrary(framework));
      const best = selectBestLibrary(candidates, request.trustThreshold);
      if (!best) {
        this.logger.warn(
          { framework, candidates: candidates.length, trustThreshold: request.trustThreshold },
          "No library meets the trust threshold"
        );
        throw new KnowledgeSourceError(`No reliable library found for ${framework}`);
      }

      const content = await this.guarded(() =>
        this.source.getLibraryDocs(best.id, { topic: request.topic, tokens: request.maxTokens })
      );

      const response: KnowledgeResponse = {
        content,
        source: `${this.source.name}:${best.id}`,
        authorityScore: best.trustScore,
        lastUpdated: new Date(this.now()),
        cacheHit: false,
        responseTimeMs: elapsed(),
      };

      this.cache.set(cacheKey, this.toCached(response), {
        ttlSeconds: FRAMEWORK_DOCS_TTL_SECONDS,
        authorityScore: response.authorityScore,
        source: response.source,
      });
      return response;
    } catch (err) {
      this.logger.error({ framework, err: errorMessage(err) }, "Framework documentation fetch failed");
      return { ...this.fallbackResponse(request, errorMessage(err)), responseTimeMs: elapsed() };
    }
  }

  /** Seed content served when the source fails. `*` matches any type or framework. */
  storeFallbackContent(type: KnowledgeType | "*", framework: string | "*" | undefined, content: string): void {
    const key = framework === undefined && type === "*" ? "fallback:generic" : `fallback:${type}:${framework ?? "*"}`;
    this.cache.set(key, content, { ttlSeconds: MAX_TTL_SECONDS, authorityScore: FALLBACK_AUTHORITY, source: "Fallback" });
  }

  async healthCheck(): Promise<HealthReport> {
    const started = performance.now();
    const lastCheck = new Date(this.now()).toISOString();
    let health: SourceHealth;

    try {
      await this.breaker.call(() => this.source.resolveLibrary(HEALTH_CHECK_LIBRARY));
      health = {
        status: "healthy",
        responseTimeMs: Math.round(performance.now() - started),
        circuit: this.breaker.state,
        lastCheck,
      };
    } catch (err) {
      health = { status: "unhealthy", error: errorMessage(err), circuit: this.breaker.state, lastCheck };
    }

    const sources = { [this.source.name]: health };
    const total = Object.keys(sources).length;
    const healthy = Object.values(sources).filter((s) => s.status === "healthy").length;

    return {
      sources,
      system: {
        overallStatus: healthy === total ? "healthy" : "degraded",
        healthySources: healthy,
        totalSources: total,
        availabilityPercentage: (healthy / total) * 100,
      },
    };
  }

  async close(): Promise<void> {
    try {
      await this.source.close();
    } finally {
      this.cache.close();
    }
  }

  private guarded<T>(fn: () => Promise<T>): Promise<T> {
    return callGuarded(fn, this.retryPolicy, this.breaker);
  }

  private fallbackResponse(request: KnowledgeRequest, error: string): Omit<KnowledgeResponse, "responseTimeMs"> {
    const content = this.cache.getFallbackContent(request.type, request.framework);
    if (content !== undefined) {
      return {
        content,
        source: "Cache:Fallback",
        authorityScore: FALLBACK_AUTHORITY,
        lastUpdated: new Date(this.now() - FALLBACK_AGE_MS),
        cacheHit: true,
      };
    }

    return {
      content: `External knowledge temporarily unavailable for ${request.framework ?? "unknown"}. Error: ${error}`,
      source: "Internal:Fallback",
      authorityScore: UNAVAILABLE_AUTHORITY,
      lastUpdated: new Date(this.now()),
      cacheHit: false,
    };
  }

  private toCached(response: KnowledgeResponse): CachedResponse {
    return {
      content: response.content,
      source: response.source,
      authorityScore: response.authorityScore,
      lastUpdated: response.lastUpdated.toISOString(),
    };
  }

  private fromCached(cached: CachedResponse): Omit<KnowledgeResponse, "cacheHit" | "responseTimeMs"> {
    return { ...cached, lastUpdated: new Date(cached.lastUpdated) };
  }
}

/** Provider wired to the configured MCP server and the SQLite cache. */
export function createKnowledgeProvider(config: AppConfig, logger?: Logger): KnowledgeProvider {
  const db = openDb(config.cacheDbPath);
  migrate(db);

  return new KnowledgeProvider({
    source: new McpKnowledgeSource({
      command: config.knowledgeCommand,
      args: config.knowledgeArgs,
      logger,
    }),
    cache: new KnowledgeCache({ db, logger }),
    logger,
  });
}
