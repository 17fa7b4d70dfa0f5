import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerUninstallAppTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "uninstall_app",
    "Remove an installed app by bundle id.",
    {
      device_id: deviceId,
      bundle_id: z.string().min(1).describe("Bundle identifier, e.g. com.example.todo"),
    },
    async ({ device_id, bundle_id }) =>
      runTool(logger, "uninstall_app", async () => {
        await simctl.uninstallApp(device_id, bundle_id);
        return textResult(`Uninstalled ${bundle_id} from ${device_id}`);
      }),
  );
}
