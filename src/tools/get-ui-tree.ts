import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ServerContext } from "../context.js";
import { filterInteresting, renderTree } from "../ui/tree.js";
import { jsonResult, runTool, textResult } from "../utils/format-response.js";
import { defineTool, deviceId, readElements, timeoutMs } from "./shared.js";

export function registerGetUiTreeTool(server: McpServer, context: ServerContext) {
  const { logger, registry } = context;

  defineTool(
    server,
    context,
    "get_ui_tree",
    "Fetch the accessibility hierarchy as an indexed outline: one line per element, `[index] Type \"name\"`, indented by depth. Indices are stable for an unchanged screen and can be passed to find_element/tap_element.",
    {
      device_id: deviceId,
      source_format: z.enum(["json", "xml"]).optional().describe("Agent source format to request. Default: json"),
      filter: z
        .boolean()
        .optional()
        .describe("Only show named or interactive elements (indices keep their full-tree values). Default: true"),
      output: z.enum(["tree", "json"]).optional().describe("Indented outline or the element list as JSON. Default: tree"),
      timeout_ms: timeoutMs,
    },
    async ({ device_id, source_format, filter, output, timeout_ms }) =>
      runTool(logger, "get_ui_tree", async () => {
        const elements = await readElements(registry.require(device_id), source_format, timeout_ms);
        const shown = filter === false ? elements : filterInteresting(elements);
        if (output === "json") return jsonResult(shown);
        return textResult(`${shown.length} of ${elements.length} elements\n${renderTree(shown)}`);
      }),
  );
}
