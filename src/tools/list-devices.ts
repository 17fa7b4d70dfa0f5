import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { jsonResult, runTool } from "../utils/format-response.js";
import { defineTool } from "./shared.js";

export function registerListDevicesTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "list_devices",
    "List available iOS simulators with their UDID, OS version and boot state. Booted simulators come first.",
    {
      booted_only: z.boolean().optional().describe("Only list booted simulators. Default: false"),
    },
    async ({ booted_only }) =>
      runTool(logger, "list_devices", async () => {
        const devices = await simctl.listDevices();
        return jsonResult(booted_only ? devices.filter((d) => d.state === "Booted") : devices);
      }),
  );
}
