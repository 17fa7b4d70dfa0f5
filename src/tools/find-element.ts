import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { findElement, findElements } from "../ui/predicate.js";
import { jsonResult, runTool } from "../utils/format-response.js";
import { defineTool, deviceId, predicateShape, readElements, timeoutMs, toPredicate } from "./shared.js";

export function registerFindElementTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "find_element",
    "Find one element by predicate over type/label/value/identifier/text/enabled/visible. More than one match without `index` is an error listing the candidates.",
    {
      device_id: deviceId,
      ...predicateShape,
      all: z.boolean().optional().describe("Return every match instead of resolving to one. Default: false"),
      timeout_ms: timeoutMs,
    },
    async ({ device_id, all, timeout_ms, ...query }) =>
      runTool(logger, "find_element", async () => {
        const elements = await readElements(registry.require(device_id), "json", timeout_ms);
        const predicate = toPredicate(query);
        if (all) return jsonResult(findElements(elements, predicate));
        return jsonResult(findElement(elements, predicate));
      }),
  );
}
