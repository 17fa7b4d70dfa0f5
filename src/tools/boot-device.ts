import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerBootDeviceTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "boot_device",
    "Boot a simulator. Booting one that is already running is not an error.",
    { device_id: deviceId },
    async ({ device_id }) =>
      runTool(logger, "boot_device", async () => {
        const booted = await simctl.bootDevice(device_id);
        return textResult(booted ? `Booted ${device_id}` : `${device_id} was already booted`);
      }),
  );
}
