import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
  isJSONRPCError,
  isJSONRPCRequest,
  isJSONRPCResponse,
  type JSONRPCMessage,
  type RequestId,
} from "@modelcontextprotocol/sdk/types.js";

export const DEFAULT_REQUEST_TIMEOUT_MS = 60_000;

/** JSON-RPC server error code used for transport-level failures. */
const TRANSPORT_ERROR = -32000;

export interface HttpTransportOptions {
  /** How long a request waits for the server's response (default: 60s) */
  requestTimeoutMs?: number;
}

interface PendingResponse {
  resolve: (response: JSONRPCMessage) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * A lightweight HTTP transport for MCP that works with Hono.
 *
 * Bridges individual HTTP requests to the MCP Server's transport interface.
 * Each JSON-RPC request gets a response via a Promise-based dispatch.
 */
export class HttpTransport implements Transport {
  private pendingResponses = new Map<RequestId, PendingResponse>();
  private readonly requestTimeoutMs: number;

  onmessage?: (message: JSONRPCMessage) => void;
  onclose?: () => void;
  onerror?: (error: Error) => void;

  constructor(options: HttpTransportOptions = {}) {
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async start(): Promise<void> {
    // No-op: HTTP transport is request-driven
  }

  async close(): Promise<void> {
    for (const [id, pending] of this.pendingResponses) {
      clearTimeout(pending.timer);
      pending.resolve(errorResponse(id, "Transport closed"));
    }
    this.pendingResponses.clear();
    this.onclose?.();
  }

  async send(message: JSONRPCMessage): Promise<void> {
    // Route the server's response to the waiting HTTP request
    if (isJSONRPCResponse(message) || isJSONRPCError(message)) {
      const pending = this.pendingResponses.get(message.id);
      if (pending) {
        clearTimeout(pending.timer);
        this.pendingResponses.delete(message.id);
        pending.resolve(message);
      }
    }
    // Notifications (no id) are ignored in HTTP mode
  }

  /**
   * Handle an incoming JSON-RPC message from an HTTP POST.
   * Resolves to the response, or null for notifications and responses
   * that expect no reply.
   */
  async handleJsonRpc(body: JSONRPCMessage): Promise<JSONRPCMessage | null> {
    if (!isJSONRPCRequest(body)) {
      this.onmessage?.(body);
      return null;
    }

    const id = body.id;
    return new Promise<JSONRPCMessage>((resolve) => {
      const timer = setTimeout(() => {
        if (this.pendingResponses.delete(id)) {
          resolve(errorResponse(id, "Request timed out"));
        }
      }, this.requestTimeoutMs);

      // Register BEFORE dispatching: the server may answer synchronously
      this.pendingResponses.set(id, { resolve, timer });
      this.onmessage?.(body);
    });
  }
}

function errorResponse(id: RequestId, message: string): JSONRPCMessage {
  return { jsonrpc: "2.0", id, error: { code: TRANSPORT_ERROR, message } };
}
