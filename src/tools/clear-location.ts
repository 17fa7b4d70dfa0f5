import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerClearLocationTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "clear_location",
    "Stop simulating a GPS location.",
    { device_id: deviceId, timeout_ms: timeoutMs },
    async ({ device_id, timeout_ms }) =>
      runTool(logger, "clear_location", async () => {
        await registry
          .require(device_id)
          .run("clear location", (client, sessionId) => client.clearLocation(sessionId), { timeoutMs: timeout_ms });
        return textResult("Simulated location cleared");
      }),
  );
}
