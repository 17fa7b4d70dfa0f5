import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { alertButton, defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerDismissAlertTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "dismiss_alert",
    "Dismiss the alert on screen.",
    { device_id: deviceId, button: alertButton, timeout_ms: timeoutMs },
    async ({ device_id, button: name, timeout_ms }) =>
      runTool(logger, "dismiss_alert", async () => {
        await registry
          .require(device_id)
          .run("dismiss alert", (client, sessionId) => client.dismissAlert(sessionId, name), {
            timeoutMs: timeout_ms,
          });
        return textResult(name ? `Pressed "${name}"` : "Alert dismissed");
      }),
  );
}
