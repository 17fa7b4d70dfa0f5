import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { capabilitiesShape, defineTool, deviceId, sessionCapabilities } from "./shared.js";

export function registerStartBridgeTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "start_bridge",
    "Connect to the WebDriverAgent serving a simulator and open a session. Every UI command needs this first. Calling it again on a live bridge returns the same session.",
    {
      device_id: deviceId,
      host: z.string().optional().describe("Agent host. Default: WDA_HOST"),
      port: z.number().int().min(1).max(65535).optional().describe("Agent port. Default: WDA_PORT"),
      ...capabilitiesShape,
    },
    async ({ device_id, host, port, bundle_id, capabilities }) =>
      runTool(logger, "start_bridge", async () => {
        const bridge = registry.open(device_id, { host, port });
        const sessionId = await bridge.start(sessionCapabilities(bundle_id, capabilities));
        return textResult(`Bridge for ${device_id} active at ${bridge.agentUrl} (session ${sessionId})`);
      }),
  );
}
