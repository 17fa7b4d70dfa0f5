import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { jsonResult, runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerDiscoverDtdUrisTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "discover_dtd_uris",
    "Find Dart Tooling Daemon and Dart VM service WebSocket URIs that Flutter debug builds printed to the simulator log, newest first. Works without a bridge.",
    {
      device_id: deviceId,
      lookback_minutes: z
        .number()
        .int()
        .min(1)
        .max(1440)
        .optional()
        .describe("How far back to search the device log. Default: 10"),
    },
    async ({ device_id, lookback_minutes }) =>
      runTool(logger, "discover_dtd_uris", async () => {
        const minutes = lookback_minutes ?? 10;
        const uris = await simctl.discoverDtdUris(device_id, minutes);
        if (uris.length === 0) {
          return textResult(
            `No Dart Tooling Daemon or VM service URIs in the last ${minutes} minutes of the ${device_id} log. Is a Flutter debug build running?`,
          );
        }
        return jsonResult(uris);
      }),
  );
}
