import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { waitForElement } from "../ui/wait.js";
import { buildResponseContent, runTool } from "../utils/format-response.js";
import { performObservation } from "../utils/observe.js";
import {
  defineTool,
  deviceId,
  observeShape,
  predicateShape,
  readElements,
  timeoutMs,
  toPredicate,
} from "./shared.js";

export function registerWaitForElementTool(server: McpServer, context: ServerContext) {
  const { logger, registry, config } = context;

  defineTool(
    server,
    context,
    "wait_for_element",
    "Poll the UI tree until an element matching the predicate appears, then return it. Fails with Timeout when it never does.",
    {
      device_id: deviceId,
      ...predicateShape,
      wait_timeout_ms: z.number().int().positive().optional().describe("Maximum time to wait in ms. Default: 10000"),
      poll_interval_ms: z.number().int().positive().optional().describe("Polling interval in ms. Default: 500"),
      ...observeShape,
    },
    async ({ device_id, wait_timeout_ms, poll_interval_ms, observe, observe_delay_ms, ...query }) =>
      runTool(logger, "wait_for_element", async () => {
        const bridge = registry.require(device_id);
        const { element, elapsedMs, attempts } = await waitForElement(
          () => readElements(bridge),
          toPredicate(query),
          { timeoutMs: wait_timeout_ms, pollIntervalMs: poll_interval_ms },
        );
        const observation = await performObservation(bridge, {
          mode: observe ?? "none",
          delayMs: observe_delay_ms ?? 0,
          scale: config.screenshotScale,
          quality: config.screenshotQuality,
        });
        return {
          content: buildResponseContent(
            `Found element after ${elapsedMs}ms (${attempts} attempts):\n${JSON.stringify(element, null, 2)}`,
            observation,
          ),
        };
      }),
  );
}
