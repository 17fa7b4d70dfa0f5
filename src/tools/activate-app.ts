import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { bundleId, defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerActivateAppTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "activate_app",
    "Bring an app to the foreground, launching it if needed.",
    { device_id: deviceId, bundle_id: bundleId, timeout_ms: timeoutMs },
    async ({ device_id, bundle_id, timeout_ms }) =>
      runTool(logger, "activate_app", async () => {
        await registry
          .require(device_id)
          .run("activate app", (client, sessionId) => client.activateApp(sessionId, bundle_id), {
            timeoutMs: timeout_ms,
          });
        return textResult(`Activated ${bundle_id}`);
      }),
  );
}
