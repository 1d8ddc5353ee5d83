import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { listCategories, loadSnapshot } from "../ledger/store.js";
import { summarizeMonth } from "../analysis/index.js";

export function registerResources(server: McpServer) {
  server.registerResource(
    "categories",
    "finance://categories",
    {
      description: "All ledger categories with their monthly budgets",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(listCategories(), null, 2),
        },
      ],
    }),
  );

  server.registerResource(
    "summary-latest",
    "finance://summary/latest",
    {
      description: "Income, spending and budget summary of the most recent month with transactions",
      mimeType: "application/json",
    },
    async (uri) => ({
      contents: [
        {
          uri: uri.href,
          mimeType: "application/json",
          text: JSON.stringify(summarizeMonth(loadSnapshot()), null, 2),
        },
      ],
    }),
  );
}
