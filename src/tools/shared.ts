import type { McpServer, ToolCallback } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z, type ZodRawShape } from "zod";
import type { Bridge } from "../bridge/bridge.js";
import type { ServerContext } from "../context.js";
import type { IndexedElement, SourceFormat } from "../types.js";
import type { Predicate } from "../ui/predicate.js";
import { indexTree } from "../ui/tree.js";
import { buildResponseContent, type ToolResult } from "../utils/format-response.js";
import { type ObserveMode, performObservation } from "../utils/observe.js";

/**
 * Registers a tool and records it in the context catalog, which the
 * api-reference resource lists.
 */
export function defineTool<Shape extends ZodRawShape>(
  server: McpServer,
  context: ServerContext,
  name: string,
  description: string,
  shape: Shape,
  handler: ToolCallback<Shape>,
): void {
  server.tool<Shape>(name, description, shape, handler);
  context.tools.set(name, { description, shape });
}

export const deviceId = z.string().min(1).describe("Simulator UDID (see list_devices)");

export const timeoutMs = z
  .number()
  .int()
  .positive()
  .optional()
  .describe("Abort the agent request after this many ms. Default: server WDA_TIMEOUT_MS");

export const coordinate = (what: string) => z.number().describe(what);

export const bundleId = z.string().min(1).describe("Bundle identifier, e.g. com.example.todo");

export const alertButton = z
  .string()
  .optional()
  .describe("Label of the alert button to press. Default: the alert's own accept/cancel button");

export const capabilitiesShape = {
  bundle_id: z
    .string()
    .optional()
    .describe("App to launch when the session starts (capability bundleId)"),
  capabilities: z
    .record(z.unknown())
    .optional()
    .describe("Extra capabilities merged into alwaysMatch"),
};

export function sessionCapabilities(bundle: string | undefined, extra: Record<string, unknown> | undefined) {
  const capabilities: Record<string, unknown> = { ...extra };
  if (bundle !== undefined) capabilities.bundleId = bundle;
  return capabilities;
}

export const observeShape = {
  observe: z
    .enum(["none", "ui_tree", "screenshot", "both"])
    .optional()
    .describe("Capture screen state after the action. Default: none"),
  observe_delay_ms: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Ms to wait before observing. Default: 500"),
};

const matchRule = z
  .union([
    z.string(),
    z.object({ exact: z.string() }),
    z.object({ contains: z.string() }),
    z.object({ startsWith: z.string() }),
  ])
  .optional();

export const predicateShape = {
  type: matchRule.describe('Element type without the XCUIElementType prefix, e.g. "Button"'),
  label: matchRule.describe('Accessibility label; a string is exact, or {"contains": "..."} / {"startsWith": "..."}'),
  value: matchRule.describe("Element value"),
  identifier: matchRule.describe("Accessibility identifier"),
  text: matchRule.describe("Element name as reported by the agent"),
  enabled: z.boolean().optional().describe("Only match enabled (or disabled) elements"),
  visible: z.boolean().optional().describe("Only match visible (or hidden) elements"),
  index: z
    .number()
    .int()
    .min(0)
    .optional()
    .describe("Pick the nth (0-based) match. Without it, more than one match is an error"),
};

type PredicateArgs = { [K in keyof typeof predicateShape]?: z.infer<(typeof predicateShape)[K]> };

export function toPredicate(args: PredicateArgs): Predicate {
  return {
    type: args.type,
    label: args.label,
    value: args.value,
    identifier: args.identifier,
    text: args.text,
    enabled: args.enabled,
    visible: args.visible,
    index: args.index,
  };
}

/** Appends the requested observation to an action's confirmation. */
export async function respondWithObservation(
  context: ServerContext,
  bridge: Bridge,
  confirmation: string,
  observe: ObserveMode | undefined,
  observeDelayMs: number | undefined,
): Promise<ToolResult> {
  const observation = await performObservation(bridge, {
    mode: observe ?? "none",
    delayMs: observeDelayMs ?? 500,
    scale: context.config.screenshotScale,
    quality: context.config.screenshotQuality,
  });
  return { content: buildResponseContent(confirmation, observation) };
}

/** One bridge turn: fetch the source and index it. */
export async function readElements(
  bridge: Bridge,
  format: SourceFormat = "json",
  requestTimeoutMs?: number,
): Promise<IndexedElement[]> {
  const root = await bridge.run(
    "get ui tree",
    (client, sessionId) => client.getUiTree(sessionId, format),
    { timeoutMs: requestTimeoutMs },
  );
  return indexTree(root);
}
