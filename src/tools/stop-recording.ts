import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerStopRecordingTool(server: McpServer, context: ServerContext) {
  const { logger, registry, artifacts } = context;

  defineTool(
    server,
    context,
    "stop_recording",
    "Stop the screen recording and save the video to the artifacts directory.",
    { device_id: deviceId, timeout_ms: timeoutMs },
    async ({ device_id, timeout_ms }) =>
      runTool(logger, "stop_recording", async () => {
        const result = await registry
          .require(device_id)
          .run("stop recording", (client, sessionId) => client.stopRecording(sessionId), { timeoutMs: timeout_ms });
        const seconds = (result.durationMs / 1000).toFixed(1);
        if (!result.video) {
          return textResult(`Recording stopped after ${seconds}s; the agent returned no video data`);
        }
        const path = await artifacts.save(`recording-${device_id}`, "mp4", result.video);
        return textResult(`Recording stopped after ${seconds}s (${result.video.length} bytes)\nSaved to ${path}`);
      }),
  );
}
