import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { jsonResult, runTool } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerGetWindowSizeTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "get_window_size",
    "Screen size in points, the coordinate space taps and swipes use.",
    { device_id: deviceId, timeout_ms: timeoutMs },
    async ({ device_id, timeout_ms }) =>
      runTool(logger, "get_window_size", async () => {
        const size = await registry
          .require(device_id)
          .run("window size", (client, sessionId) => client.getWindowSize(sessionId), { timeoutMs: timeout_ms });
        return jsonResult(size);
      }),
  );
}
