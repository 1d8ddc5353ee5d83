import { afterEach, describe, expect, test, vi } from "vitest";
import type { JSONRPCMessage } from "@modelcontextprotocol/sdk/types.js";
import { HttpTransport } from "./transport.js";

afterEach(() => {
  vi.useRealTimers();
});

describe("HttpTransport", () => {
  test("resolves a request with the matching response", async () => {
    const transport = new HttpTransport();
    transport.onmessage = (message) => {
      if ("id" in message && "method" in message) {
        void transport.send({ jsonrpc: "2.0", id: message.id, result: { ok: true } });
      }
    };

    const response = await transport.handleJsonRpc({ jsonrpc: "2.0", id: 7, method: "ping" });
    expect(response).toEqual({ jsonrpc: "2.0", id: 7, result: { ok: true } });
  });

  test("returns null for notifications", async () => {
    const received: JSONRPCMessage[] = [];
    const transport = new HttpTransport();
    transport.onmessage = (message) => received.push(message);

    const response = await transport.handleJsonRpc({
      jsonrpc: "2.0",
      method: "notifications/initialized",
    });

    expect(response).toBeNull();
    expect(received).toHaveLength(1);
  });

  test("times out a request the server never answers", async () => {
    vi.useFakeTimers();
    const transport = new HttpTransport({ requestTimeoutMs: 500 });

    const pending = transport.handleJsonRpc({ jsonrpc: "2.0", id: "a", method: "ping" });
    await vi.advanceTimersByTimeAsync(500);

    expect(await pending).toEqual({
      jsonrpc: "2.0",
      id: "a",
      error: { code: -32000, message: "Request timed out" },
    });
  });

  test("fails pending requests when closed", async () => {
    const transport = new HttpTransport();
    let closed = false;
    transport.onclose = () => {
      closed = true;
    };

    const pending = transport.handleJsonRpc({ jsonrpc: "2.0", id: 1, method: "ping" });
    await transport.close();

    expect(await pending).toEqual({
      jsonrpc: "2.0",
      id: 1,
      error: { code: -32000, message: "Transport closed" },
    });
    expect(closed).toBe(true);
  });
});
