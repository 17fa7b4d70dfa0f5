import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerGetAlertTextTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "get_alert_text",
    "Read the text of the alert on screen. Fails with NoSuchElement when none is shown.",
    { device_id: deviceId, timeout_ms: timeoutMs },
    async ({ device_id, timeout_ms }) =>
      runTool(logger, "get_alert_text", async () => {
        const text = await registry
          .require(device_id)
          .run("alert text", (client, sessionId) => client.getAlertText(sessionId), { timeoutMs: timeout_ms });
        return textResult(text);
      }),
  );
}
