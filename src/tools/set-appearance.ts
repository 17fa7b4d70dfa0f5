import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerSetAppearanceTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "set_appearance",
    "Switch between light and dark mode.",
    { device_id: deviceId, appearance: z.enum(["light", "dark"]), timeout_ms: timeoutMs },
    async ({ device_id, appearance, timeout_ms }) =>
      runTool(logger, "set_appearance", async () => {
        await registry
          .require(device_id)
          .run("set appearance", (client, sessionId) => client.setAppearance(sessionId, appearance), {
            timeoutMs: timeout_ms,
          });
        return textResult(`Appearance set to ${appearance}`);
      }),
  );
}
