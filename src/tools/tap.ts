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

export function registerTapTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "tap",
    "Tap at a screen point (in points, not pixels). Uses W3C pointer actions, falling back to the agent's tap verb when actions are unsupported.",
    {
      device_id: deviceId,
      x: coordinate("X coordinate"),
      y: coordinate("Y coordinate"),
      timeout_ms: timeoutMs,
      ...observeShape,
    },
    async ({ device_id, x, y, timeout_ms, observe, observe_delay_ms }) =>
      runTool(logger, "tap", async () => {
        const bridge = registry.require(device_id);
        const tier = await bridge.run("tap", (client, sessionId) => client.tap(sessionId, { x, y }), {
          timeoutMs: timeout_ms,
        });
        return respondWithObservation(context, bridge, `Tapped at (${x}, ${y}) via ${tier}`, observe, observe_delay_ms);
      }),
  );
}
