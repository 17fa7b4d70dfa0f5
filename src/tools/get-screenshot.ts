import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import type { Orientation } from "../types.js";
import { runTool } from "../utils/format-response.js";
import { type ProcessedScreenshot, processScreenshot } from "../utils/image.js";
import { captureScreen } from "../utils/observe.js";
import { defineTool, deviceId } from "./shared.js";

export function registerGetScreenshotTool(server: McpServer, context: ServerContext) {
  const { logger, registry, config, artifacts } = context;

  defineTool(
    server,
    context,
    "get_screenshot",
    "Capture the simulator screen, rotated upright for landscape, downscaled and re-encoded. Uses the agent when a bridge is open, simctl otherwise. The file is kept in the artifacts directory.",
    {
      device_id: deviceId,
      scale: z.number().min(0.1).max(1).optional().describe("Scale factor (0.1-1.0). Default: SCREENSHOT_SCALE"),
      quality: z.number().min(1).max(100).optional().describe("JPEG quality (1-100). Default: SCREENSHOT_QUALITY"),
      format: z.enum(["jpeg", "png"]).optional().describe("Output encoding. Default: jpeg"),
      save: z.boolean().optional().describe("Write the processed image to the artifacts directory. Default: true"),
    },
    async ({ device_id, scale, quality, format, save }) =>
      runTool(logger, "get_screenshot", async () => {
        const options = {
          scale: scale ?? config.screenshotScale,
          quality: quality ?? config.screenshotQuality,
          format,
        };
        const bridge = registry.get(device_id);

        let shot: ProcessedScreenshot;
        let orientation: Orientation | undefined;
        let source: string;
        if (bridge && bridge.state !== "Disconnected") {
          const screen = await captureScreen(bridge, options);
          shot = screen;
          orientation = screen.orientation;
          source = "agent";
        } else {
          shot = await processScreenshot(await simctl.captureScreenshot(device_id), options);
          source = "simctl";
        }

        const lines = [
          `Screenshot captured (${shot.width}x${shot.height}, ${orientation ?? "orientation not queried"}, via ${source})`,
          `${shot.originalBytes} -> ${shot.optimizedBytes} bytes (${shot.reductionPercent}% smaller)`,
        ];
        if (save !== false) {
          const path = await artifacts.save(`screenshot-${device_id}`, shot.format === "png" ? "png" : "jpg", shot.data);
          lines.push(`Saved to ${path}`);
        }

        return {
          content: [
            { type: "image" as const, data: shot.base64, mimeType: shot.mimeType },
            { type: "text" as const, text: lines.join("\n") },
          ],
        };
      }),
  );
}
