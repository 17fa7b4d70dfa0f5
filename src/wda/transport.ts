export type HttpMethod = "GET" | "POST" | "DELETE";

export interface TransportResponse {
  status: number;
  body: unknown;
}

export interface RequestOptions {
  timeoutMs?: number;
}

export type TransportFailure = "refused" | "dns" | "timeout" | "network";

/**
 * Network-level failure: the request never produced an HTTP response.
 * Protocol-level errors (4xx/5xx with a body) are not raised here.
 */
export class TransportError extends Error {
  readonly failure: TransportFailure;
  readonly method: HttpMethod;
  readonly url: string;

  constructor(failure: TransportFailure, method: HttpMethod, url: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "TransportError";
    this.failure = failure;
    this.method = method;
    this.url = url;
  }
}

export interface TransportOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const REFUSED_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "EPIPE", "EHOSTUNREACH"]);
const DNS_CODES = new Set(["ENOTFOUND", "EAI_AGAIN"]);

/**
 * Minimal JSON-over-HTTP wrapper for the agent. No retries: whether an
 * operation may be repeated is the caller's decision.
 */
export class HttpTransport {
  readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TransportOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(
    method: HttpMethod,
    path: string,
    body?: unknown,
    options?: RequestOptions,
  ): Promise<TransportResponse> {
    const url = `${this.baseUrl}${path}`;
    const timeoutMs = options?.timeoutMs ?? this.timeoutMs;

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      const init: RequestInit = {
        method,
        headers: { "Content-Type": "application/json" },
        signal: controller.signal,
      };
      if (body !== undefined) {
        init.body = JSON.stringify(body);
      }

      const response = await this.fetchImpl(url, init);
      const text = await response.text();
      return { status: response.status, body: decodeBody(text) };
    } catch (error) {
      if (timedOut) {
        throw new TransportError(
          "timeout",
          method,
          url,
          `${method} ${path} timed out after ${timeoutMs}ms`,
          error,
        );
      }
      const failure = classifyNetworkError(error);
      throw new TransportError(
        failure,
        method,
        url,
        `${method} ${path} failed: ${describeNetworkError(error)}`,
        error,
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function decodeBody(text: string): unknown {
  if (text.trim() === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

// undici wraps the socket error: TypeError("fetch failed", { cause: { code } })
function errorCode(error: unknown): string | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ("code" in current && typeof current.code === "string") {
      return current.code;
    }
    current = current.cause;
  }
  return undefined;
}

function classifyNetworkError(error: unknown): TransportFailure {
  const code = errorCode(error);
  if (code && REFUSED_CODES.has(code)) return "refused";
  if (code && DNS_CODES.has(code)) return "dns";
  return "network";
}

function describeNetworkError(error: unknown): string {
  const code = errorCode(error);
  const message = error instanceof Error ? error.message : String(error);
  return code ? `${message} (${code})` : message;
}
