import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool } from "../utils/format-response.js";
import {
  coordinate,
  defineTool,
  deviceId,
  observeShape,
  respondWithObservation,
  timeoutMs,
} from "./shared.js";

export function registerLongPressTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "long_press",
    "Touch and hold at a screen point.",
    {
      device_id: deviceId,
      x: coordinate("X coordinate"),
      y: coordinate("Y coordinate"),
      duration_ms: z.number().int().positive().optional().describe("Hold duration in ms. Default: 1000"),
      timeout_ms: timeoutMs,
      ...observeShape,
    },
    async ({ device_id, x, y, duration_ms, timeout_ms, observe, observe_delay_ms }) =>
      runTool(logger, "long_press", async () => {
        const bridge = registry.require(device_id);
        const duration = duration_ms ?? 1000;
        const tier = await bridge.run(
          "long press",
          (client, sessionId) => client.longPress(sessionId, { x, y }, duration),
          { timeoutMs: timeout_ms },
        );
        return respondWithObservation(
          context,
          bridge,
          `Long-pressed at (${x}, ${y}) for ${duration}ms via ${tier}`,
          observe,
          observe_delay_ms,
        );
      }),
  );
}
