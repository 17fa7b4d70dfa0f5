import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerInstallAppTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "install_app",
    "Install a .app bundle built for the simulator.",
    {
      device_id: deviceId,
      app_path: z.string().min(1).describe("Path to the .app directory on this machine"),
    },
    async ({ device_id, app_path }) =>
      runTool(logger, "install_app", async () => {
        await simctl.installApp(device_id, app_path);
        return textResult(`Installed ${app_path} on ${device_id}`);
      }),
  );
}
