import type { TransportError } from "./transport.js";

export type AutomationErrorKind =
  | "NoSuchElement"
  | "SessionExpired"
  | "ConnectionRefused"
  | "InvalidArgument"
  | "UnknownAgentError"
  | "Timeout";

export interface AutomationErrorDetails {
  /** Raw agent body, kept for diagnosis. */
  payload?: unknown;
  status?: number;
  /** Error identifier reported by the agent, e.g. "no such element". */
  agentError?: string;
  /** Set when the agent does not implement the endpoint that was called. */
  unsupported?: boolean;
  cause?: unknown;
}

export class AutomationError extends Error {
  readonly kind: AutomationErrorKind;
  readonly payload?: unknown;
  readonly status?: number;
  readonly agentError?: string;
  readonly unsupported: boolean;

  constructor(kind: AutomationErrorKind, message: string, details: AutomationErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "AutomationError";
    this.kind = kind;
    this.payload = details.payload;
    this.status = details.status;
    this.agentError = details.agentError;
    this.unsupported = details.unsupported ?? false;
  }
}

/** Failure of the simctl device-lifecycle CLI. Never an AutomationError. */
export class DeviceManagementError extends Error {
  readonly command: string;
  readonly exitCode?: number;
  readonly stderr: string;

  constructor(command: string, message: string, exitCode?: number, stderr = "") {
    super(message);
    this.name = "DeviceManagementError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export function isAutomationError(
  error: unknown,
  kind?: AutomationErrorKind,
): error is AutomationError {
  return error instanceof AutomationError && (kind === undefined || error.kind === kind);
}

export function isUnsupportedEndpoint(error: unknown): boolean {
  return error instanceof AutomationError && error.kind === "UnknownAgentError" && error.unsupported;
}

// ---------------------------------------------------------------------------
// Envelope sniffing
// ---------------------------------------------------------------------------

type EnvelopeShape = "top-level" | "nested" | "legacy";

interface AgentEnvelope {
  shape: EnvelopeShape;
  error: string;
  message: string;
  legacyStatus?: number;
}

type EnvelopeMatcher = (body: unknown) => AgentEnvelope | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const matchTopLevel: EnvelopeMatcher = (body) => {
  if (!isRecord(body)) return undefined;
  const { error, message } = body;
  if (typeof error !== "string" || typeof message !== "string") return undefined;
  return { shape: "top-level", error, message };
};

const matchNestedValue: EnvelopeMatcher = (body) => {
  if (!isRecord(body) || !isRecord(body.value)) return undefined;
  const { error, message } = body.value;
  if (typeof error !== "string" || typeof message !== "string") return undefined;
  return { shape: "nested", error, message };
};

// JSON Wire Protocol status codes still emitted by older agents.
const LEGACY_STATUS_NAMES: Record<number, string> = {
  6: "no such driver",
  7: "no such element",
  9: "unknown command",
  13: "unknown error",
  21: "timeout",
  27: "no such alert",
};

const matchLegacyStatus: EnvelopeMatcher = (body) => {
  if (!isRecord(body) || !isRecord(body.value)) return undefined;
  const { status } = body;
  const { message } = body.value;
  if (typeof status !== "number" || status === 0 || typeof message !== "string") {
    return undefined;
  }
  return {
    shape: "legacy",
    error: LEGACY_STATUS_NAMES[status] ?? `status ${status}`,
    message,
    legacyStatus: status,
  };
};

/** Tried in order; the first match wins. */
const ENVELOPE_MATCHERS: readonly EnvelopeMatcher[] = [
  matchTopLevel,
  matchNestedValue,
  matchLegacyStatus,
];

// ---------------------------------------------------------------------------
// Classification
// ---------------------------------------------------------------------------

interface Classification {
  kind: AutomationErrorKind;
  unsupported?: boolean;
}

const LEGACY_STATUS_KINDS: Record<number, Classification> = {
  6: { kind: "SessionExpired" },
  7: { kind: "NoSuchElement" },
  9: { kind: "UnknownAgentError", unsupported: true },
  13: { kind: "UnknownAgentError" },
  21: { kind: "Timeout" },
  27: { kind: "NoSuchElement" },
};

interface ClassificationRule extends Classification {
  pattern: string;
}

// Specific phrases first, then the broad "session" and "not found" catch-alls.
const CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  { pattern: "unknown command", kind: "UnknownAgentError", unsupported: true },
  { pattern: "unknown method", kind: "UnknownAgentError", unsupported: true },
  { pattern: "unhandled endpoint", kind: "UnknownAgentError", unsupported: true },
  { pattern: "not implemented", kind: "UnknownAgentError", unsupported: true },
  { pattern: "unsupported operation", kind: "UnknownAgentError", unsupported: true },
  { pattern: "session not created", kind: "UnknownAgentError" },
  { pattern: "invalid session id", kind: "SessionExpired" },
  { pattern: "session does not exist", kind: "SessionExpired" },
  { pattern: "session is either terminated", kind: "SessionExpired" },
  { pattern: "no such driver", kind: "SessionExpired" },
  { pattern: "no such element", kind: "NoSuchElement" },
  { pattern: "no such alert", kind: "NoSuchElement" },
  { pattern: "stale element", kind: "NoSuchElement" },
  { pattern: "invalid argument", kind: "InvalidArgument" },
  { pattern: "invalid element state", kind: "InvalidArgument" },
  { pattern: "invalid selector", kind: "InvalidArgument" },
  { pattern: "session", kind: "SessionExpired" },
  { pattern: "not found", kind: "NoSuchElement" },
  { pattern: "timeout", kind: "Timeout" },
  { pattern: "timed out", kind: "Timeout" },
];

function classify(envelope: AgentEnvelope): Classification {
  if (envelope.legacyStatus !== undefined) {
    const known = LEGACY_STATUS_KINDS[envelope.legacyStatus];
    if (known) return known;
  }
  const haystack = `${envelope.error} ${envelope.message}`.toLowerCase();
  const rule = CLASSIFICATION_RULES.find((r) => haystack.includes(r.pattern));
  return rule ?? { kind: "UnknownAgentError" };
}

const UNSUPPORTED_STATUSES = new Set([404, 405, 501]);

/**
 * Maps an agent response to an AutomationError, or `undefined` when the
 * response is a success. Bodies in no known envelope are only errors when
 * the HTTP status says so.
 */
export function normalizeAgentResponse(status: number, body: unknown): AutomationError | undefined {
  for (const matcher of ENVELOPE_MATCHERS) {
    const envelope = matcher(body);
    if (!envelope) continue;

    const { kind, unsupported } = classify(envelope);
    return new AutomationError(kind, envelope.message || envelope.error, {
      payload: body,
      status,
      agentError: envelope.error,
      unsupported,
    });
  }

  if (status >= 400) {
    return new AutomationError(
      "UnknownAgentError",
      `Agent responded with HTTP ${status} and an unrecognised body`,
      { payload: body, status, unsupported: UNSUPPORTED_STATUSES.has(status) },
    );
  }

  return undefined;
}

export function fromTransportError(error: TransportError): AutomationError {
  if (error.failure === "timeout") {
    return new AutomationError("Timeout", error.message, { cause: error });
  }
  return new AutomationError(
    "ConnectionRefused",
    `Agent unreachable at ${error.url}: ${error.message}`,
    { cause: error },
  );
}

/**
 * Single-line rendering used in tool results. UnknownAgentError keeps the raw
 * payload so a changed agent contract can be diagnosed from the output.
 */
export function describeError(error: unknown): string {
  if (error instanceof AutomationError) {
    const base = `[${error.kind}] ${error.message}`;
    if (error.kind === "UnknownAgentError" && error.payload !== undefined) {
      return `${base}\nAgent payload: ${JSON.stringify(error.payload)}`;
    }
    return base;
  }
  if (error instanceof DeviceManagementError) {
    const exit = error.exitCode === undefined ? "" : ` (exit ${error.exitCode})`;
    return `[DeviceManagementError] ${error.message}${exit}`;
  }
  if (error instanceof Error) {
    return `[Error] ${error.message}`;
  }
  return `[Error] ${String(error)}`;
}
