import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerStopBridgeTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "stop_bridge",
    "Delete the agent session and forget the bridge.",
    { device_id: deviceId },
    async ({ device_id }) =>
      runTool(logger, "stop_bridge", async () => {
        const removed = await registry.remove(device_id);
        return textResult(removed ? `Bridge for ${device_id} stopped` : `No bridge was open for ${device_id}`);
      }),
  );
}
