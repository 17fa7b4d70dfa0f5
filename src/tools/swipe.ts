import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import type { Point, WindowSize } from "../types.js";
import { runTool } from "../utils/format-response.js";
import type { WdaClient } from "../wda/client.js";
import { AutomationError } from "../wda/errors.js";
import { defineTool, deviceId, observeShape, respondWithObservation, timeoutMs } from "./shared.js";

export type SwipeDirection = "up" | "down" | "left" | "right";

export interface SwipePoints {
  from: Point;
  to: Point;
}

/** Start and end points spanning the middle 60% of the window along the swipe axis. */
export function directionPoints(size: WindowSize, direction: SwipeDirection): SwipePoints {
  const cx = Math.round(size.width / 2);
  const cy = Math.round(size.height / 2);
  const distX = Math.round(size.width * 0.3);
  const distY = Math.round(size.height * 0.3);

  switch (direction) {
    case "up":
      return { from: { x: cx, y: cy + distY }, to: { x: cx, y: cy - distY } };
    case "down":
      return { from: { x: cx, y: cy - distY }, to: { x: cx, y: cy + distY } };
    case "left":
      return { from: { x: cx + distX, y: cy }, to: { x: cx - distX, y: cy } };
    case "right":
      return { from: { x: cx - distX, y: cy }, to: { x: cx + distX, y: cy } };
  }
}

export function registerSwipeTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "swipe",
    "Swipe on the screen. Provide explicit coordinates or a direction (up/down/left/right) computed from the window size.",
    {
      device_id: deviceId,
      from_x: z.number().optional().describe("Start X. Required if direction is not set."),
      from_y: z.number().optional().describe("Start Y. Required if direction is not set."),
      to_x: z.number().optional().describe("End X. Required if direction is not set."),
      to_y: z.number().optional().describe("End Y. Required if direction is not set."),
      direction: z
        .enum(["up", "down", "left", "right"])
        .optional()
        .describe("Swipe direction. Overrides explicit coordinates."),
      duration_ms: z.number().int().positive().optional().describe("Duration of the swipe in ms. Default: 300"),
      timeout_ms: timeoutMs,
      ...observeShape,
    },
    async ({ device_id, from_x, from_y, to_x, to_y, direction, duration_ms, timeout_ms, observe, observe_delay_ms }) =>
      runTool(logger, "swipe", async () => {
        const bridge = registry.require(device_id);
        const duration = duration_ms ?? 300;

        let resolvePoints: (client: WdaClient, sessionId: string) => Promise<SwipePoints>;
        if (direction) {
          const axis = direction;
          resolvePoints = async (client, sessionId) => directionPoints(await client.getWindowSize(sessionId), axis);
        } else if (from_x !== undefined && from_y !== undefined && to_x !== undefined && to_y !== undefined) {
          const fixed = { from: { x: from_x, y: from_y }, to: { x: to_x, y: to_y } };
          resolvePoints = async () => fixed;
        } else {
          throw new AutomationError(
            "InvalidArgument",
            "Provide either direction or all four coordinates (from_x, from_y, to_x, to_y)",
          );
        }

        // The window size read and the swipe share one turn.
        const { from, to, tier } = await bridge.run(
          "swipe",
          async (client, sessionId) => {
            const points = await resolvePoints(client, sessionId);
            return { ...points, tier: await client.swipe(sessionId, points.from, points.to, duration) };
          },
          { timeoutMs: timeout_ms },
        );
        return respondWithObservation(
          context,
          bridge,
          `Swiped from (${from.x}, ${from.y}) to (${to.x}, ${to.y}) over ${duration}ms via ${tier}`,
          observe,
          observe_delay_ms,
        );
      }),
  );
}
