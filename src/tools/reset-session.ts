import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { capabilitiesShape, defineTool, deviceId, sessionCapabilities } from "./shared.js";

export function registerResetSessionTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "reset_session",
    "Replace the agent session with a fresh one. Use after a SessionExpired error.",
    { device_id: deviceId, ...capabilitiesShape },
    async ({ device_id, bundle_id, capabilities }) =>
      runTool(logger, "reset_session", async () => {
        const bridge = registry.require(device_id);
        const sessionId = await bridge.resetSession(sessionCapabilities(bundle_id, capabilities));
        return textResult(`Session for ${device_id} reset (session ${sessionId})`);
      }),
  );
}
