import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { registerAnalysisTools, registerLedgerTools } from "../tools/index.js";
import { registerResources } from "../tools/resources.js";
import { registerPrompts } from "../tools/prompts.js";
import type { ToolContext } from "../tools/shared.js";

export const SERVER_NAME = "finance-analytics";
export const SERVER_VERSION = "0.1.0";

/**
 * Create and configure a fully-loaded MCP server instance
 * with all tools, resources, and prompts registered.
 * The ledger store must be initialized first.
 */
export function createMcpServer(context: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  // Data tools: ledger reads and writes
  registerLedgerTools(server, context);

  // Analysis tools: computed insights
  registerAnalysisTools(server, context);

  // Resources: read-only data surfaces
  registerResources(server);

  // Prompts: canned analysis templates
  registerPrompts(server);

  return server;
}
