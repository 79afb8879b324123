/**
 * MCP server for idiomkit.
 *
 * Exposes the snippet catalog to AI agents via the Model Context
 * Protocol (stdio transport). Two tools are registered: "list-snippets"
 * describes the catalog and "verify-snippets" runs the verifier and
 * returns the report as structured JSON text.
 *
 * Dependencies: Types, Snippet, Orchestration, Formatter (same level as CLI).
 */

import { z } from "zod";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { TOPIC_IDS } from "../types/topic.js";
import type { TopicId } from "../types/topic.js";
import { summarizeSnippet } from "../types/snippet.js";
import type { SnippetRegistry } from "../snippet/registry.js";
import { verify } from "../orchestration/verifier.js";
import { onlyFailures } from "../orchestration/report-transforms.js";
import { formatJson } from "../formatter/json.js";
import { VERSION } from "../version.js";

/**
 * Injectable dependencies for the MCP server.
 */
export interface McpServerDeps {
  readonly registry: SnippetRegistry;
  readonly timestampFn?: () => string;
}

/**
 * The shape returned by the tool handlers. A type alias rather than an
 * interface so it stays assignable to the SDK's open-ended result type.
 */
export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

interface ListArgs {
  readonly topic?: TopicId | undefined;
}

interface VerifyArgs {
  readonly topics?: readonly TopicId[] | undefined;
  readonly snippetIds?: readonly string[] | undefined;
  readonly failuresOnly?: boolean | undefined;
}

function textResult(text: string, isError = false): ToolResult {
  return isError
    ? { content: [{ type: "text", text }], isError: true }
    : { content: [{ type: "text", text }] };
}

/**
 * Core logic for the list-snippets tool call, extracted for testability.
 */
export function handleListCall(args: ListArgs, deps: McpServerDeps): ToolResult {
  const snippets = args.topic !== undefined
    ? deps.registry.getSnippetsForTopic(args.topic)
    : deps.registry.getAll();
  return textResult(JSON.stringify(snippets.map(summarizeSnippet), null, 2));
}

/**
 * Core logic for the verify-snippets tool call, extracted for testability.
 *
 * Runs the verifier with the given selection and returns the report
 * formatted as JSON text content suitable for MCP responses.
 */
export function handleVerifyCall(args: VerifyArgs, deps: McpServerDeps): ToolResult {
  const options = deps.timestampFn !== undefined
    ? { timestampFn: deps.timestampFn }
    : undefined;

  const result = verify(
    { topics: args.topics ?? [], snippetIds: args.snippetIds ?? [] },
    deps.registry,
    options,
  );

  if (!result.ok) {
    return textResult(result.error.message, true);
  }

  const report = args.failuresOnly === true ? onlyFailures(result.value) : result.value;
  return textResult(formatJson(report));
}

/**
 * Create a configured McpServer instance with both tools registered.
 *
 * The caller is responsible for connecting the server to a transport
 * (e.g., StdioServerTransport) and starting it.
 */
export function createMcpServer(deps: McpServerDeps): McpServer {
  const server = new McpServer({
    name: "idiomkit",
    version: VERSION,
  });

  server.registerTool(
    "list-snippets",
    {
      title: "List Idiom Snippets",
      description:
        "List the idiom snippets in the catalog (id, title, topic, description). " +
        `Topics: ${TOPIC_IDS.join(", ")}`,
      inputSchema: {
        topic: z
          .enum(TOPIC_IDS)
          .optional()
          .describe("Only list snippets of this topic"),
      },
    },
    async (args) => handleListCall({ topic: args.topic }, deps),
  );

  server.registerTool(
    "verify-snippets",
    {
      title: "Verify Idiom Snippets",
      description:
        "Run idiom snippets and compare what they print with their documented output. " +
        "Returns a JSON report with a status per snippet and line-level mismatches.",
      inputSchema: {
        topics: z
          .array(z.enum(TOPIC_IDS))
          .optional()
          .describe("Topics to verify. If neither topics nor snippetIds are given, every snippet runs."),
        snippetIds: z
          .array(z.string())
          .optional()
          .describe("Individual snippet ids to verify"),
        failuresOnly: z
          .boolean()
          .optional()
          .describe("Leave passing snippets out of the report"),
      },
    },
    async (args) =>
      handleVerifyCall(
        { topics: args.topics, snippetIds: args.snippetIds, failuresOnly: args.failuresOnly },
        deps,
      ),
  );

  return server;
}
