import { z } from "zod";

export const KNOWLEDGE_TYPES = ["framework_docs", "security_standards"] as const;

export type KnowledgeType = (typeof KNOWLEDGE_TYPES)[number];

export const knowledgeRequestSchema = z.object({
  type: z.enum(KNOWLEDGE_TYPES).default("framework_docs"),
  framework: z.string().min(1).optional(),
  topic: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  maxTokens: z.number().int().positive().default(8000),
  trustThreshold: z.number().min(0).max(10).default(7.5),
});

export type KnowledgeRequest = z.output<typeof knowledgeRequestSchema>;
export type KnowledgeRequestInput = z.input<typeof knowledgeRequestSchema>;

export interface KnowledgeResponse {
  content: string;
  /** e.g. "Context7:/vercel/next.js", "Cache:Fallback" */
  source: string;
  authorityScore: number;
  lastUpdated: Date;
  cacheHit: boolean;
  responseTimeMs: number;
}

export interface LibraryCandidate {
  id: string;
  name: string;
  description: string;
  trustScore: number;
  snippetCount: number;
}

export interface LibraryDocsOpts {
  topic?: string;
  tokens: number;
}

/** A documentation backend. McpKnowledgeSource is the real one; tests use fakes. */
export interface KnowledgeSource {
  readonly name: string;
  resolveLibrary(libraryName: string): Promise<LibraryCandidate[]>;
  getLibraryDocs(libraryId: string, opts: LibraryDocsOpts): Promise<string>;
  close(): Promise<void>;
}

export type SourceStatus = "healthy" | "unhealthy";

export interface SourceHealth {
  status: SourceStatus;
  responseTimeMs?: number;
  error?: string;
  circuit: CircuitState;
  lastCheck: string;
}

export type CircuitState = "closed" | "open" | "half-open";
