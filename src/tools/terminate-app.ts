import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { bundleId, defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerTerminateAppTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "terminate_app",
    "Terminate a running app.",
    { device_id: deviceId, bundle_id: bundleId, timeout_ms: timeoutMs },
    async ({ device_id, bundle_id, timeout_ms }) =>
      runTool(logger, "terminate_app", async () => {
        const terminated = await registry
          .require(device_id)
          .run("terminate app", (client, sessionId) => client.terminateApp(sessionId, bundle_id), {
            timeoutMs: timeout_ms,
          });
        return textResult(terminated ? `Terminated ${bundle_id}` : `${bundle_id} was not running`);
      }),
  );
}
