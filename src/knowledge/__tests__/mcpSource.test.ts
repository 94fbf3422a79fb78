import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { describe, expect, it } from "vitest";
import { z } from "zod";
import { KnowledgeSourceError } from "../../errors.js";
import { DOCS_TOOL, McpKnowledgeSource, RESOLVE_TOOL, extractToolText, parseLibraryCandidates } from "../mcpSource.js";
import { selectBestLibrary } from "../provider.js";

const resolveListing = `Available Libraries (top matches):

Each result includes:
- Library ID: Context7-compatible identifier (format: /org/project)
- Name: Library or package name
- Code Snippets: Number of available code examples
- Trust Score: Authority indicator

----------

- Title: React
- Context7-compatible library ID: /facebook/react
- Description: The library for web and native user interfaces.
- Code Snippets: 2461
- Trust Score: 9
----------
- Title: React Native
- Context7-compatible library ID: /facebook/react-native
- Description: A framework for building native apps with React.
- Code Snippets: 1200
- Trust Score: 9.2
`;

describe("extractToolText", () => {
  it("joins text content items", () => {
    const result = {
      content: [
        { type: "text", text: "first" },
        { type: "image", data: "aGVsbG8=", mimeType: "image/png" },
        { type: "text", text: "second" },
      ],
    };

    expect(extractToolText(result)).toBe("first\nsecond");
  });

  it("returns an empty string for unexpected shapes", () => {
    expect(extractToolText("not a result")).toBe("");
    expect(extractToolText({})).toBe("");
  });
});

describe("parseLibraryCandidates", () => {
  it("parses the text listing and skips the legend", () => {
    expect(parseLibraryCandidates(resolveListing)).toEqual([
      {
        id: "/facebook/react",
        name: "React",
        description: "The library for web and native user interfaces.",
        trustScore: 9,
        snippetCount: 2461,
      },
      {
        id: "/facebook/react-native",
        name: "React Native",
        description: "A framework for building native apps with React.",
        trustScore: 9.2,
        snippetCount: 1200,
      },
    ]);
  });

  it("accepts a JSON array", () => {
    const json = JSON.stringify([
      { id: "/vercel/next.js", title: "Next.js", trust_score: 10, codeSnippets: 3000 },
      { name: "no id" },
    ]);

    expect(parseLibraryCandidates(json)).toEqual([
      { id: "/vercel/next.js", name: "Next.js", description: "", trustScore: 10, snippetCount: 3000 },
    ]);
  });

  it("returns nothing for free text", () => {
    expect(parseLibraryCandidates("No libraries found matching your query.")).toEqual([]);
  });
});

describe("selectBestLibrary", () => {
  const candidates = [
    { id: "/a", name: "a", description: "", trustScore: 9, snippetCount: 10 },
    { id: "/b", name: "b", description: "", trustScore: 9, snippetCount: 50 },
    { id: "/c", name: "c", description: "", trustScore: 7, snippetCount: 900 },
  ];

  it("prefers trust, then snippet count", () => {
    expect(selectBestLibrary(candidates, 7.5)?.id).toBe("/b");
  });

  it("returns nothing below the threshold", () => {
    expect(selectBestLibrary(candidates, 9.5)).toBeUndefined();
  });
});

function docsServer(withDocsTool = true): McpServer {
  const server = new McpServer({ name: "test-docs", version: "0.0.1" });
  server.tool(RESOLVE_TOOL, { libraryName: z.string() }, async ({ libraryName }) => ({
    content: [{ type: "text", text: JSON.stringify([{ id: `/test/${libraryName}`, title: libraryName, trust_score: 9 }]) }],
  }));
  if (withDocsTool) {
    server.tool(
      DOCS_TOOL,
      { context7CompatibleLibraryID: z.string(), tokens: z.number(), topic: z.string().optional() },
      async ({ context7CompatibleLibraryID }) => ({
        content: [{ type: "text", text: `Docs for ${context7CompatibleLibraryID}` }],
      })
    );
  }
  return server;
}

/** Source wired to fresh in-process servers; `servers` holds each server's connect promise. */
function inMemorySource(withDocsTool: () => boolean = () => true) {
  const servers: Promise<void>[] = [];
  const source = new McpKnowledgeSource({
    createTransport: () => {
      const [clientSide, serverSide] = InMemoryTransport.createLinkedPair();
      servers.push(docsServer(withDocsTool()).connect(serverSide));
      return clientSide;
    },
  });
  return { source, servers };
}

describe("McpKnowledgeSource", () => {
  it("shares one connection between concurrent calls", async () => {
    const { source, servers } = inMemorySource();

    const [react, vue] = await Promise.all([source.resolveLibrary("react"), source.resolveLibrary("vue")]);

    expect(servers).toHaveLength(1);
    expect(react).toEqual([{ id: "/test/react", name: "react", description: "", trustScore: 9, snippetCount: 0 }]);
    expect(vue.map((c) => c.id)).toEqual(["/test/vue"]);
    expect(await source.getLibraryDocs("/test/vue", { tokens: 100 })).toBe("Docs for /test/vue");

    await source.close();
    await Promise.all(servers);
    expect(source.isConnected()).toBe(false);
  });

  it("connects again after a failed attempt", async () => {
    let attempts = 0;
    const { source, servers } = inMemorySource(() => ++attempts > 1);

    const failed = await Promise.allSettled([source.resolveLibrary("react"), source.resolveLibrary("vue")]);

    expect(servers).toHaveLength(1);
    for (const result of failed) {
      expect(result.status).toBe("rejected");
      if (result.status === "rejected") {
        expect(result.reason).toBeInstanceOf(KnowledgeSourceError);
        expect(result.reason.message).toBe("MCP server does not expose 'get-library-docs' tool");
      }
    }

    expect((await source.resolveLibrary("react"))[0]?.id).toBe("/test/react");
    expect(servers).toHaveLength(2);
    await source.close();
    await Promise.all(servers);
  });
});
