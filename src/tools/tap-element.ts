import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { findElement } from "../ui/predicate.js";
import { displayName, indexTree } from "../ui/tree.js";
import { waitForElement } from "../ui/wait.js";
import { runTool } from "../utils/format-response.js";
import {
  defineTool,
  deviceId,
  observeShape,
  predicateShape,
  readElements,
  respondWithObservation,
  timeoutMs,
  toPredicate,
} from "./shared.js";

export function registerTapElementTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "tap_element",
    "Find an element by predicate and tap its center. Combines get_ui_tree + tap in one call. Optionally waits for the element to appear first.",
    {
      device_id: deviceId,
      ...predicateShape,
      wait_for: z.boolean().optional().describe("Poll until the element appears before tapping. Default: false"),
      wait_timeout_ms: z.number().int().positive().optional().describe("Max wait time when wait_for is true. Default: 10000"),
      timeout_ms: timeoutMs,
      ...observeShape,
    },
    async ({ device_id, wait_for, wait_timeout_ms, timeout_ms, observe, observe_delay_ms, ...query }) =>
      runTool(logger, "tap_element", async () => {
        const bridge = registry.require(device_id);
        const predicate = toPredicate(query);
        if (wait_for) {
          await waitForElement(() => readElements(bridge, "json", timeout_ms), predicate, {
            timeoutMs: wait_timeout_ms,
          });
        }

        // Read, resolve and tap in one turn so no other command lands in between.
        const { target, tier } = await bridge.run(
          "tap element",
          async (client, sessionId) => {
            const target = findElement(indexTree(await client.getUiTree(sessionId)), predicate);
            return { target, tier: await client.tap(sessionId, target.center) };
          },
          { timeoutMs: timeout_ms },
        );

        const name = displayName(target);
        const label = name === undefined ? target.type : `${target.type} "${name}"`;
        return respondWithObservation(
          context,
          bridge,
          `Tapped [${target.index}] ${label} at (${target.center.x}, ${target.center.y}) via ${tier}`,
          observe,
          observe_delay_ms,
        );
      }),
  );
}
