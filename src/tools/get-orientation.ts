import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerGetOrientationTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "get_orientation",
    "Current interface orientation as reported by the agent.",
    { device_id: deviceId, timeout_ms: timeoutMs },
    async ({ device_id, timeout_ms }) =>
      runTool(logger, "get_orientation", async () => {
        const orientation = await registry
          .require(device_id)
          .run("orientation", (client, sessionId) => client.getOrientation(sessionId), { timeoutMs: timeout_ms });
        return textResult(orientation);
      }),
  );
}
