import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { jsonResult, runTool } from "../utils/format-response.js";
import { defineTool } from "./shared.js";

export function registerBridgeStatusTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "bridge_status",
    "Report bridge state, session id, agent reachability and whether a command is in flight.",
    {
      device_id: z.string().optional().describe("Limit to one device. Omit for every bridge."),
    },
    async ({ device_id }) =>
      runTool(logger, "bridge_status", async () => {
        const bridges = device_id === undefined ? registry.list() : [registry.require(device_id)];
        return jsonResult(await Promise.all(bridges.map((bridge) => bridge.health())));
      }),
  );
}
