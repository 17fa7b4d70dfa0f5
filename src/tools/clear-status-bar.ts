import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerClearStatusBarTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "clear_status_bar",
    "Remove all status bar overrides.",
    { device_id: deviceId },
    async ({ device_id }) =>
      runTool(logger, "clear_status_bar", async () => {
        await simctl.clearStatusBar(device_id);
        return textResult(`Status bar overrides cleared on ${device_id}`);
      }),
  );
}
