import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { z } from "zod";
import { KnowledgeSourceError, errorMessage } from "../errors.js";
import { getLogger, type Logger } from "../logger.js";
import type { KnowledgeSource, LibraryCandidate, LibraryDocsOpts } from "./types.js";

export const RESOLVE_TOOL = "resolve-library-id";
export const DOCS_TOOL = "get-library-docs";

export interface McpKnowledgeSourceOpts {
  /** Command that starts the documentation MCP server (default: "npx") */
  command?: string;
  args?: string[];
  cwd?: string;
  /** Replaces the stdio transport; called once per connection */
  createTransport?: () => Transport;
  logger?: Logger;
}

const toolResultSchema = z.object({
  content: z
    .array(z.object({ type: z.string(), text: z.string().optional() }).passthrough())
    .default([]),
  isError: z.boolean().optional(),
});

const jsonCandidateSchema = z
  .object({
    id: z.string().optional(),
    libraryId: z.string().optional(),
    name: z.string().optional(),
    title: z.string().optional(),
    description: z.string().default(""),
    trust_score: z.number().optional(),
    trustScore: z.number().optional(),
    snippet_count: z.number().optional(),
    codeSnippets: z.number().optional(),
  })
  .passthrough();

/** Text of every `text` content item, joined by newlines. */
export function extractToolText(result: unknown): string {
  const parsed = toolResultSchema.safeParse(result);
  if (!parsed.success) return "";
  return parsed.data.content
    .filter((item) => item.type === "text" && item.text !== undefined)
    .map((item) => item.text ?? "")
    .join("\n");
}

function parseJsonCandidates(text: string): LibraryCandidate[] | undefined {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    return undefined;
  }

  const parsed = z.array(jsonCandidateSchema).safeParse(data);
  if (!parsed.success) return undefined;

  return parsed.data.flatMap((c) => {
    const id = c.id ?? c.libraryId;
    if (!id) return [];
    return [
      {
        id,
        name: c.name ?? c.title ?? id,
        description: c.description,
        trustScore: c.trust_score ?? c.trustScore ?? 0,
        snippetCount: c.snippet_count ?? c.codeSnippets ?? 0,
      },
    ];
  });
}

/**
 * Library candidates from a resolve-library-id response: either a JSON array
 * or the server's text listing of "- Field: value" blocks.
 */
export function parseLibraryCandidates(text: string): LibraryCandidate[] {
  const fromJson = parseJsonCandidates(text.trim());
  if (fromJson) return fromJson;

  const candidates: LibraryCandidate[] = [];
  let current: Partial<LibraryCandidate> = {};

  const flush = () => {
    if (current.id) {
      candidates.push({
        id: current.id,
        name: current.name ?? current.id,
        description: current.description ?? "",
        trustScore: current.trustScore ?? 0,
        snippetCount: current.snippetCount ?? 0,
      });
    }
    current = {};
  };

  for (const raw of text.split("\n")) {
    const line = raw.trim().replace(/^-\s*/, "");
    const sep = line.indexOf(":");
    if (line.startsWith("---")) {
      flush();
      continue;
    }
    if (sep === -1) continue;

    const field = line.slice(0, sep).trim().toLowerCase();
    const value = line.slice(sep + 1).trim();

    if (field === "title" || field === "name") {
      if (current.id) flush();
      current.name = value;
    } else if ((field === "context7-compatible library id" || field === "library id") && value.startsWith("/")) {
      current.id = value;
    } else if (field === "description") {
      current.description = value;
    } else if (field === "code snippets") {
      current.snippetCount = Number.parseInt(value, 10) || 0;
    } else if (field === "trust score") {
      current.trustScore = Number.parseFloat(value) || 0;
    }
  }
  flush();

  return candidates;
}

/**
 * Documentation source backed by an MCP server, over stdio unless
 * `createTransport` says otherwise. The server process is spawned on first
 * use and stopped by close().
 */
export class McpKnowledgeSource implements KnowledgeSource {
  readonly name = "Context7";
  private client: Client | null = null;
  private transport: Transport | null = null;
  private connecting: Promise<Client> | null = null;
  private opts: Required<Omit<McpKnowledgeSourceOpts, "logger" | "cwd">> & { cwd?: string };
  private logger: Logger;

  constructor(opts: McpKnowledgeSourceOpts = {}) {
    const command = opts.command ?? "npx";
    const args = opts.args ?? ["-y", "@upstash/context7-mcp"];
    this.opts = {
      command,
      args,
      cwd: opts.cwd,
      createTransport:
        opts.createTransport ?? (() => new StdioClientTransport({ command, args, cwd: opts.cwd, stderr: "pipe" })),
    };
    this.logger = (opts.logger ?? getLogger()).child({ component: "mcp-source" });
  }

  isConnected(): boolean {
    return this.client !== null;
  }

  /** Concurrent callers share one pending connection. */
  connect(): Promise<Client> {
    if (this.client) return Promise.resolve(this.client);
    this.connecting ??= this.openConnection().finally(() => {
      this.connecting = null;
    });
    return this.connecting;
  }

  private async openConnection(): Promise<Client> {
    const transport = this.opts.createTransport();
    const client = new Client({ name: "persona-forge", version: "0.1.0" }, { capabilities: {} });

    try {
      await client.connect(transport);

      const tools = await client.listTools();
      const names = new Set(tools.tools.map((t) => t.name));
      for (const required of [RESOLVE_TOOL, DOCS_TOOL]) {
        if (!names.has(required)) {
          throw new KnowledgeSourceError(`MCP server does not expose '${required}' tool`);
        }
      }
    } catch (err) {
      await transport.close().catch((closeErr: unknown) => {
        this.logger.debug({ err: errorMessage(closeErr) }, "Transport close failed");
      });
      throw err instanceof KnowledgeSourceError
        ? err
        : new KnowledgeSourceError(`Failed to connect to ${this.opts.command}: ${errorMessage(err)}`, {
            cause: err,
          });
    }

    this.client = client;
    this.transport = transport;
    this.logger.info({ command: this.opts.command, args: this.opts.args }, "Connected to MCP server");
    return client;
  }

  async resolveLibrary(libraryName: string): Promise<LibraryCandidate[]> {
    const text = await this.callTool(RESOLVE_TOOL, { libraryName });
    return parseLibraryCandidates(text);
  }

  async getLibraryDocs(libraryId: string, opts: LibraryDocsOpts): Promise<string> {
    const args: Record<string, unknown> = { context7CompatibleLibraryID: libraryId, tokens: opts.tokens };
    if (opts.topic) args.topic = opts.topic;
    return this.callTool(DOCS_TOOL, args);
  }

  async close(): Promise<void> {
    const pending = this.connecting;
    if (pending) {
      await pending.catch((err: unknown) => {
        this.logger.debug({ err: errorMessage(err) }, "Pending connection failed before close");
      });
    }

    const transport = this.transport;
    this.client = null;
    this.transport = null;
    if (transport) await transport.close();
  }

  private async callTool(name: string, args: Record<string, unknown>): Promise<string> {
    const client = await this.connect();

    let result: unknown;
    try {
      result = await client.callTool({ name, arguments: args });
    } catch (err) {
      // Drop the connection so the next call respawns the server.
      await this.close().catch((closeErr: unknown) => {
        this.logger.debug({ err: errorMessage(closeErr) }, "Transport close failed");
      });
      throw new KnowledgeSourceError(`Tool '${name}' failed: ${errorMessage(err)}`, { cause: err });
    }

    const text = extractToolText(result);
    const parsed = toolResultSchema.safeParse(result);
    if (parsed.success && parsed.data.isError) {
      throw new KnowledgeSourceError(`Tool '${name}' returned an error: ${text}`);
    }
    return text;
  }
}
