import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool } from "../utils/format-response.js";
import { defineTool, deviceId, observeShape, respondWithObservation, timeoutMs } from "./shared.js";

export function registerTypeTextTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "type_text",
    "Type text into the focused field. Tap the field first.",
    {
      device_id: deviceId,
      text: z.string().min(1).describe("Text to type"),
      timeout_ms: timeoutMs,
      ...observeShape,
    },
    async ({ device_id, text, timeout_ms, observe, observe_delay_ms }) =>
      runTool(logger, "type_text", async () => {
        const bridge = registry.require(device_id);
        await bridge.run("type text", (client, sessionId) => client.typeText(sessionId, text), {
          timeoutMs: timeout_ms,
        });
        return respondWithObservation(
          context,
          bridge,
          `Typed ${text.length} character(s)`,
          observe,
          observe_delay_ms,
        );
      }),
  );
}
