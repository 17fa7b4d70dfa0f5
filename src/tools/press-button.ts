import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool } from "../utils/format-response.js";
import { defineTool, deviceId, observeShape, respondWithObservation, timeoutMs } from "./shared.js";

export function registerPressButtonTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "press_button",
    "Press a hardware button: home, volumeUp or volumeDown.",
    {
      device_id: deviceId,
      button: z.enum(["home", "volumeUp", "volumeDown"]).describe("Hardware button"),
      timeout_ms: timeoutMs,
      ...observeShape,
    },
    async ({ device_id, button, timeout_ms, observe, observe_delay_ms }) =>
      runTool(logger, "press_button", async () => {
        const bridge = registry.require(device_id);
        await bridge.run("press button", (client, sessionId) => client.pressButton(sessionId, button), {
          timeoutMs: timeout_ms,
        });
        return respondWithObservation(context, bridge, `Pressed ${button}`, observe, observe_delay_ms);
      }),
  );
}
