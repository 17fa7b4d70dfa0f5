import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { bundleId, defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerLaunchAppTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "launch_app",
    "Launch an installed app in the foreground, optionally with launch arguments and environment.",
    {
      device_id: deviceId,
      bundle_id: bundleId,
      arguments: z.array(z.string()).optional().describe("Process arguments"),
      environment: z.record(z.string()).optional().describe("Environment variables"),
      timeout_ms: timeoutMs,
    },
    async ({ device_id, bundle_id, arguments: args, environment, timeout_ms }) =>
      runTool(logger, "launch_app", async () => {
        await registry
          .require(device_id)
          .run("launch app", (client, sessionId) => client.launchApp(sessionId, bundle_id, args, environment), {
            timeoutMs: timeout_ms,
          });
        return textResult(`Launched ${bundle_id}`);
      }),
  );
}
