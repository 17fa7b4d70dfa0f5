import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { jsonResult, runTool } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerListAppsTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "list_apps",
    "List apps installed on the simulator (bundle id, display name, User or System).",
    {
      device_id: deviceId,
      user_only: z.boolean().optional().describe("Hide system apps. Default: false"),
    },
    async ({ device_id, user_only }) =>
      runTool(logger, "list_apps", async () => {
        const apps = await simctl.listApps(device_id);
        return jsonResult(user_only ? apps.filter((app) => app.type === "User") : apps);
      }),
  );
}
