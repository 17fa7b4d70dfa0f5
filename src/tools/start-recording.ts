import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerStartRecordingTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "start_recording",
    "Start recording the screen. Stop with stop_recording.",
    {
      device_id: deviceId,
      fps: z.number().int().min(1).max(60).optional().describe("Frames per second. Default: 24"),
      timeout_ms: timeoutMs,
    },
    async ({ device_id, fps, timeout_ms }) =>
      runTool(logger, "start_recording", async () => {
        await registry
          .require(device_id)
          .run("start recording", (client, sessionId) => client.startRecording(sessionId, { fps }), {
            timeoutMs: timeout_ms,
          });
        return textResult(`Recording started on ${device_id}`);
      }),
  );
}
