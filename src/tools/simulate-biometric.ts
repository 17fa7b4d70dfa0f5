import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, timeoutMs } from "./shared.js";

export function registerSimulateBiometricTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "simulate_biometric",
    "Answer a pending Face ID / Touch ID prompt with a matching or non-matching finger or face.",
    {
      device_id: deviceId,
      match: z.boolean().describe("true to authenticate, false to fail"),
      timeout_ms: timeoutMs,
    },
    async ({ device_id, match, timeout_ms }) =>
      runTool(logger, "simulate_biometric", async () => {
        await registry
          .require(device_id)
          .run("biometric", (client, sessionId) => client.simulateBiometric(sessionId, match), {
            timeoutMs: timeout_ms,
          });
        return textResult(match ? "Sent matching biometric" : "Sent non-matching biometric");
      }),
  );
}
