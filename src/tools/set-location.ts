import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerSetLocationTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "set_location",
    "Simulate a GPS location.",
    {
      device_id: deviceId,
      latitude: z.number().min(-90).max(90),
      longitude: z.number().min(-180).max(180),
      timeout_ms: timeoutMs,
    },
    async ({ device_id, latitude, longitude, timeout_ms }) =>
      runTool(logger, "set_location", async () => {
        await registry
          .require(device_id)
          .run("set location", (client, sessionId) => client.setLocation(sessionId, { latitude, longitude }), {
            timeoutMs: timeout_ms,
          });
        return textResult(`Location set to ${latitude}, ${longitude}`);
      }),
  );
}
