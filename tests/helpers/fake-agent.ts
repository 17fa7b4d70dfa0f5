/**
 * In-process stand-in for WebDriverAgent: a fetch mock that answers from a
 * route table keyed by "METHOD /path". Unrouted paths answer the way the
 * agent does for endpoints it does not implement.
 */

import { jest } from "@jest/globals";
import { Logger, type LogSink } from "../../src/utils/logger.js";
import { WdaClient } from "../../src/wda/client.js";
import { HttpTransport } from "../../src/wda/transport.js";

export interface Reply {
  status?: number;
  body: unknown;
}

export type Route = Reply | ((body: unknown) => Reply | Promise<Reply>);

export interface RecordedCall {
  method: string;
  path: string;
  body: unknown;
}

export const AGENT_URL = "http://127.0.0.1:8100";

export function fakeAgent(routes: Record<string, Route> = {}) {
  const calls: RecordedCall[] = [];

  const fetch = jest.fn<typeof globalThis.fetch>(async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    const method = init?.method ?? "GET";
    const path = `${url.pathname}${url.search}`;
    const body: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
    calls.push({ method, path, body });

    const route = routes[`${method} ${path}`];
    if (route === undefined) {
      return new Response(
        JSON.stringify({ value: { error: "unknown command", message: `Unhandled endpoint: ${path}` } }),
        { status: 404 },
      );
    }
    // Honour aborts the way fetch does, so transport timeouts can fire.
    const reply = await new Promise<Reply>((resolve, reject) => {
      init?.signal?.addEventListener("abort", () => reject(new Error("This operation was aborted")));
      Promise.resolve(typeof route === "function" ? route(body) : route).then(resolve, reject);
    });
    return new Response(JSON.stringify(reply.body), { status: reply.status ?? 200 });
  });

  const transport = new HttpTransport({ baseUrl: AGENT_URL, timeoutMs: 1000, fetch });

  return {
    routes,
    calls,
    fetch,
    transport,
    client: (logger?: Logger) => new WdaClient(transport, logger),
  };
}

/** Logger that keeps its lines for assertions. */
export function memoryLogger(level: "DEBUG" | "INFO" | "WARN" | "ERROR" = "DEBUG") {
  const lines: string[] = [];
  const sink: LogSink = (line) => {
    lines.push(line);
  };
  return { logger: new Logger(level, undefined, sink), lines };
}

export const ok = (value: unknown = null): Reply => ({ body: { value, sessionId: "s1" } });
