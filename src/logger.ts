import pino from "pino";

/**
 * Process-wide logger. Writes to stderr: in stdio mode stdout carries
 * the MCP protocol and must stay clean.
 */
const logger = pino(
  {
    name: "finance-analytics-mcp",
    level: process.env.LOG_LEVEL || "info",
  },
  pino.destination(2),
);

export default logger;
