import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { AppState } from "../types.js";
import { runTool, textResult } from "../utils/format-response.js";
import { bundleId, defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerGetAppStateTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "get_app_state",
    "Report whether an app is not running, suspended, in the background or in the foreground.",
    { device_id: deviceId, bundle_id: bundleId, timeout_ms: timeoutMs },
    async ({ device_id, bundle_id, timeout_ms }) =>
      runTool(logger, "get_app_state", async () => {
        const state = await registry
          .require(device_id)
          .run("app state", (client, sessionId) => client.getAppState(sessionId, bundle_id), {
            timeoutMs: timeout_ms,
          });
        return textResult(`${bundle_id}: ${AppState[state]} (${state})`);
      }),
  );
}
