import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { ServerContext } from "./context.js";
import { registerResources } from "./resources.js";
import { registerListDevicesTool } from "./tools/list-devices.js";
import { registerBootDeviceTool } from "./tools/boot-device.js";
import { registerShutdownDeviceTool } from "./tools/shutdown-device.js";
import { registerInstallAppTool } from "./tools/install-app.js";
import { registerUninstallAppTool } from "./tools/uninstall-app.js";
import { registerOpenUrlTool } from "./tools/open-url.js";
import { registerListAppsTool } from "./tools/list-apps.js";
import { registerSetStatusBarTool } from "./tools/set-status-bar.js";
import { registerClearStatusBarTool } from "./tools/clear-status-bar.js";
import { registerDiscoverDtdUrisTool } from "./tools/discover-dtd-uris.js";
import { registerStartBridgeTool } from "./tools/start-bridge.js";
import { registerStopBridgeTool } from "./tools/stop-bridge.js";
import { registerResetSessionTool } from "./tools/reset-session.js";
import { registerBridgeStatusTool } from "./tools/bridge-status.js";
import { registerGetScreenshotTool } from "./tools/get-screenshot.js";
import { registerGetUiTreeTool } from "./tools/get-ui-tree.js";
import { registerFindElementTool } from "./tools/find-element.js";
import { registerWaitForElementTool } from "./tools/wait-for-element.js";
import { registerTapTool } from "./tools/tap.js";
import { registerTapElementTool } from "./tools/tap-element.js";
import { registerDoubleTapTool } from "./tools/double-tap.js";
import { registerLongPressTool } from "./tools/long-press.js";
import { registerSwipeTool } from "./tools/swipe.js";
import { registerTypeTextTool } from "./tools/type-text.js";
import { registerPressButtonTool } from "./tools/press-button.js";
import { registerLaunchAppTool } from "./tools/launch-app.js";
import { registerTerminateAppTool } from "./tools/terminate-app.js";
import { registerActivateAppTool } from "./tools/activate-app.js";
import { registerGetAppStateTool } from "./tools/get-app-state.js";
import { registerSetLocationTool } from "./tools/set-location.js";
import { registerGetLocationTool } from "./tools/get-location.js";
import { registerClearLocationTool } from "./tools/clear-location.js";
import { registerGetClipboardTool } from "./tools/get-clipboard.js";
import { registerSetClipboardTool } from "./tools/set-clipboard.js";
import { registerGetWindowSizeTool } from "./tools/get-window-size.js";
import { registerGetOrientationTool } from "./tools/get-orientation.js";
import { registerGetAppearanceTool } from "./tools/get-appearance.js";
import { registerSetAppearanceTool } from "./tools/set-appearance.js";
import { registerSimulateBiometricTool } from "./tools/simulate-biometric.js";
import { registerStartRecordingTool } from "./tools/start-recording.js";
import { registerStopRecordingTool } from "./tools/stop-recording.js";
import { registerGetAlertTextTool } from "./tools/get-alert-text.js";
import { registerAcceptAlertTool } from "./tools/accept-alert.js";
import { registerDismissAlertTool } from "./tools/dismiss-alert.js";

export const SERVER_NAME = "simbridge-mcp";
export const SERVER_VERSION = "1.0.0";

export function createServer(context: ServerContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  registerListDevicesTool(server, context);
  registerBootDeviceTool(server, context);
  registerShutdownDeviceTool(server, context);
  registerInstallAppTool(server, context);
  registerUninstallAppTool(server, context);
  registerOpenUrlTool(server, context);
  registerListAppsTool(server, context);
  registerSetStatusBarTool(server, context);
  registerClearStatusBarTool(server, context);
  registerDiscoverDtdUrisTool(server, context);
  registerStartBridgeTool(server, context);
  registerStopBridgeTool(server, context);
  registerResetSessionTool(server, context);
  registerBridgeStatusTool(server, context);
  registerGetScreenshotTool(server, context);
  registerGetUiTreeTool(server, context);
  registerFindElementTool(server, context);
  registerWaitForElementTool(server, context);
  registerTapTool(server, context);
  registerTapElementTool(server, context);
  registerDoubleTapTool(server, context);
  registerLongPressTool(server, context);
  registerSwipeTool(server, context);
  registerTypeTextTool(server, context);
  registerPressButtonTool(server, context);
  registerLaunchAppTool(server, context);
  registerTerminateAppTool(server, context);
  registerActivateAppTool(server, context);
  registerGetAppStateTool(server, context);
  registerSetLocationTool(server, context);
  registerGetLocationTool(server, context);
  registerClearLocationTool(server, context);
  registerGetClipboardTool(server, context);
  registerSetClipboardTool(server, context);
  registerGetWindowSizeTool(server, context);
  registerGetOrientationTool(server, context);
  registerGetAppearanceTool(server, context);
  registerSetAppearanceTool(server, context);
  registerSimulateBiometricTool(server, context);
  registerStartRecordingTool(server, context);
  registerStopRecordingTool(server, context);
  registerGetAlertTextTool(server, context);
  registerAcceptAlertTool(server, context);
  registerDismissAlertTool(server, context);
  registerResources(server, context);

  return server;
}
