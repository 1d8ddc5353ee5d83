import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "pino";
import { z } from "zod";
import { AnalysisError, describeError } from "../analysis/index.js";
import type { Config } from "../config.js";

/** What every tool module needs besides the ledger store. */
export interface ToolContext {
  analytics: Config["analytics"];
  logger: Logger;
}

export const periodArg = z
  .string()
  .regex(/^\d{4}-(0[1-9]|1[0-2])$/, "expected YYYY-MM")
  .optional();

export const dateArg = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD");

export function jsonResult(data: unknown): CallToolResult {
  return {
    content: [{ type: "text" as const, text: JSON.stringify(data, null, 2) }],
  };
}

/**
 * Turn a thrown value into an `isError` tool result. Engine and store
 * errors are expected outcomes of bad input; anything else is logged.
 */
export function errorResult(error: unknown, tool: string, logger: Logger): CallToolResult {
  if (!(error instanceof AnalysisError)) {
    logger.error({ err: error, tool }, "Tool call failed");
  }
  return {
    content: [{ type: "text" as const, text: `Error: ${describeError(error)}` }],
    isError: true,
  };
}
