import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerGetAppearanceTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "get_appearance",
    "Whether the simulator is in light or dark mode.",
    { device_id: deviceId, timeout_ms: timeoutMs },
    async ({ device_id, timeout_ms }) =>
      runTool(logger, "get_appearance", async () => {
        const appearance = await registry
          .require(device_id)
          .run("get appearance", (client, sessionId) => client.getAppearance(sessionId), { timeoutMs: timeout_ms });
        return textResult(appearance);
      }),
  );
}
