import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { jsonResult, runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerGetLocationTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "get_location",
    "Read the simulated GPS location, if one is set.",
    { device_id: deviceId, timeout_ms: timeoutMs },
    async ({ device_id, timeout_ms }) =>
      runTool(logger, "get_location", async () => {
        const location = await registry
          .require(device_id)
          .run("get location", (client, sessionId) => client.getLocation(sessionId), { timeoutMs: timeout_ms });
        return location ? jsonResult(location) : textResult("No simulated location is set");
      }),
  );
}
