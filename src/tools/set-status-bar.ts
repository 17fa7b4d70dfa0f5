import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import * as simctl from "../platforms/simctl.js";
import { runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId } from "./shared.js";

export function registerSetStatusBarTool(server: McpServer, context: ServerContext) {
  const { logger } = context;

  defineTool(
    server,
    context,
    "set_status_bar",
    "Override status bar values (time, network, battery) for clean screenshots.",
    {
      device_id: deviceId,
      time: z.string().optional().describe('Displayed time, e.g. "9:41"'),
      data_network: z
        .enum(["hide", "wifi", "3g", "4g", "lte", "lte-a", "lte+", "5g", "5g+", "5g-uwb", "5g-uc"])
        .optional(),
      wifi_bars: z.number().int().min(0).max(3).optional(),
      cellular_bars: z.number().int().min(0).max(4).optional(),
      operator_name: z.string().optional(),
      battery_state: z.enum(["charging", "charged", "discharging"]).optional(),
      battery_level: z.number().int().min(0).max(100).optional(),
    },
    async ({ device_id, ...values }) =>
      runTool(logger, "set_status_bar", async () => {
        await simctl.overrideStatusBar(device_id, {
          time: values.time,
          dataNetwork: values.data_network,
          wifiBars: values.wifi_bars,
          cellularBars: values.cellular_bars,
          operatorName: values.operator_name,
          batteryState: values.battery_state,
          batteryLevel: values.battery_level,
        });
        return textResult(`Status bar overridden on ${device_id}`);
      }),
  );
}
