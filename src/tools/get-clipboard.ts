import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerGetClipboardTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "get_clipboard",
    "Read the plain-text pasteboard.",
    { device_id: deviceId, timeout_ms: timeoutMs },
    async ({ device_id, timeout_ms }) =>
      runTool(logger, "get_clipboard", async () => {
        const text = await registry
          .require(device_id)
          .run("get clipboard", (client, sessionId) => client.getClipboard(sessionId), { timeoutMs: timeout_ms });
        return textResult(text);
      }),
  );
}
