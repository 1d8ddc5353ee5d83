import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";

/**
 * Structured audit logging middleware.
 *
 * Emits one log line per request with timing, status, method, path,
 * and client IP. Level follows the response status.
 */
export function auditLog(logger: Logger): MiddlewareHandler {
  return async (c, next) => {
    const start = Date.now();
    const method = c.req.method;
    const path = c.req.path;
    const ip =
      c.req.header("x-forwarded-for")?.split(",")[0]?.trim() ||
      c.req.header("x-real-ip") ||
      "unknown";
    const userAgent = c.req.header("user-agent") || "unknown";
    const sessionId = c.req.header("mcp-session-id");

    await next();

    const duration = Date.now() - start;
    const status = c.res.status;
    const entry = { method, path, status, duration, ip, userAgent, sessionId };

    if (status >= 500) logger.error(entry, "request failed");
    else if (status >= 400) logger.warn(entry, "request rejected");
    else logger.info(entry, "request completed");
  };
}
