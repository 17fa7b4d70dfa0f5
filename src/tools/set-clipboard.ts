import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerSetClipboardTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "set_clipboard",
    "Replace the pasteboard with plain text.",
    { device_id: deviceId, text: z.string(), timeout_ms: timeoutMs },
    async ({ device_id, text, timeout_ms }) =>
      runTool(logger, "set_clipboard", async () => {
        await registry
          .require(device_id)
          .run("set clipboard", (client, sessionId) => client.setClipboard(sessionId, text), {
            timeoutMs: timeout_ms,
          });
        return textResult(`Clipboard set (${text.length} characters)`);
      }),
  );
}
