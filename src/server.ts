import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { APP_VERSION } from "./config";
import type { AppContext } from "./context";
import { callTool, isToolError, TOOL_DEFINITIONS } from "./tools";

/**
 * Build a new MCP Server bound to the shared application context.
 *
 * A fresh server is created per transport session (the HTTP transport may
 * hold several); the context, and with it the tree, cache and index, is shared.
 * Results are returned as one JSON text block. Library errors set `isError`
 * and carry the `_error` payload; unknown tools and invalid arguments are
 * protocol errors.
 */
export function createServer(ctx: AppContext): Server {
  const server = new Server({ name: "inkvault-mcp", version: APP_VERSION }, { capabilities: { tools: {} } });

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (req, extra) => {
    const result = await callTool(ctx, req.params.name, req.params.arguments, extra.signal);
    return {
      content: [{ type: "text", text: JSON.stringify(result, null, 2) }],
      ...(isToolError(result) ? { isError: true } : {}),
    };
  });

  return server;
}
