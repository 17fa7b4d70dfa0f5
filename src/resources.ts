import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext, ToolEntry } from "./context.js";

export const API_REFERENCE_URI = "simbridge://api-reference";
export const AUTOMATION_GUIDE_URI = "simbridge://automation-guide";

export const AUTOMATION_GUIDE = `# Automating an iOS simulator

1. \`list_devices\` and pick a UDID. \`boot_device\` it if it is not booted.
2. Make sure WebDriverAgent is running for that simulator (default port 8100),
   then \`start_bridge\`. Every UI command needs an active bridge.
3. \`get_ui_tree\` prints one line per element: \`[index] Type "name"\`.
4. Act on elements with \`tap_element\` (predicate over type, label, value,
   identifier, text, enabled, visible, or just the \`index\` from the
   outline) or \`tap\` at the element's center.
   When a predicate matches several elements the call fails and lists their
   indices; add \`index\` or narrow the predicate.
5. Use \`wait_for_element\`, or \`observe\` on gestures, after anything that
   changes the screen.
6. On \`[SessionExpired]\` call \`reset_session\`; the bridge refuses further
   commands until then. On \`[ConnectionRefused]\` the agent is not reachable.
7. \`get_screenshot\` returns an upright, downscaled image and keeps a copy in
   the artifacts directory.

Errors always start with their kind in brackets: NoSuchElement,
SessionExpired, ConnectionRefused, InvalidArgument, UnknownAgentError (with
the agent's raw payload), Timeout, or DeviceManagementError for simctl.
`;

export function renderApiReference(tools: Map<string, ToolEntry>): string {
  const sections = [...tools.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([name, tool]) => {
      const lines = [`## ${name}`, "", tool.description];
      const params = Object.entries(tool.shape);
      if (params.length > 0) {
        lines.push("");
        for (const [param, schema] of params) {
          const optional = schema.isOptional() ? " (optional)" : "";
          const description = schema.description ? `: ${schema.description}` : "";
          lines.push(`- \`${param}\`${optional}${description}`);
        }
      }
      return lines.join("\n");
    });
  return [`# simbridge tools (${tools.size})`, ...sections].join("\n\n") + "\n";
}

export function registerResources(server: McpServer, context: ServerContext) {
  server.resource(
    "api-reference",
    API_REFERENCE_URI,
    { description: "Every tool with its parameters", mimeType: "text/markdown" },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: "text/markdown", text: renderApiReference(context.tools) }],
    }),
  );

  server.resource(
    "automation-guide",
    AUTOMATION_GUIDE_URI,
    { description: "Typical workflow and error kinds", mimeType: "text/markdown" },
    async (uri) => ({
      contents: [{ uri: uri.href, mimeType: "text/markdown", text: AUTOMATION_GUIDE }],
    }),
  );
}
