import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
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

export function registerDoubleTapTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "double_tap",
    "Double-tap at a screen point.",
    {
      device_id: deviceId,
      x: coordinate("X coordinate"),
      y: coordinate("Y coordinate"),
      timeout_ms: timeoutMs,
      ...observeShape,
    },
    async ({ device_id, x, y, timeout_ms, observe, observe_delay_ms }) =>
      runTool(logger, "double_tap", async () => {
        const bridge = registry.require(device_id);
        const tier = await bridge.run("double tap", (client, sessionId) => client.doubleTap(sessionId, { x, y }), {
          timeoutMs: timeout_ms,
        });
        return respondWithObservation(
          context,
          bridge,
          `Double-tapped at (${x}, ${y}) via ${tier}`,
          observe,
          observe_delay_ms,
        );
      }),
  );
}
