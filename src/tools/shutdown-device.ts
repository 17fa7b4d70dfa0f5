import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerShutdownDeviceTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "shutdown_device",
    "Shut a simulator down. Stops its bridge first if one is open.",
    { device_id: deviceId },
    async ({ device_id }) =>
      runTool(logger, "shutdown_device", async () => {
        await context.registry.remove(device_id);
        const stopped = await simctl.shutdownDevice(device_id);
        return textResult(stopped ? `Shut down ${device_id}` : `${device_id} was already shut down`);
      }),
  );
}
