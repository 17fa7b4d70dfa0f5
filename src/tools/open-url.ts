import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerOpenUrlTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "open_url",
    "Open a URL or deep link on the simulator.",
    {
      device_id: deviceId,
      url: z.string().min(1).describe("URL or custom-scheme deep link"),
    },
    async ({ device_id, url }) =>
      runTool(logger, "open_url", async () => {
        await simctl.openUrl(device_id, url);
        return textResult(`Opened ${url} on ${device_id}`);
      }),
  );
}
