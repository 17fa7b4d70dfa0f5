import type { Bridge } from "../bridge/bridge.js";
import type { Orientation } from "../types.js";
import { filterInteresting, indexTree, renderTree } from "../ui/tree.js";
import type { ObservationResult } from "./format-response.js";
import { type ImageFormat, type ProcessedScreenshot, processScreenshot } from "./image.js";

export type ObserveMode = "none" | "ui_tree" | "screenshot" | "both";

export interface ObserveOptions {
  mode: ObserveMode;
  delayMs?: number;
  scale?: number;
  quality?: number;
  /** When false the full tree is rendered instead of the named/interactive subset. */
  filterUi?: boolean;
}

export interface CaptureOptions {
  scale?: number;
  quality?: number;
  format?: ImageFormat;
}

export interface CapturedScreen extends ProcessedScreenshot {
  orientation: Orientation;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Grabs orientation and raw PNG in one bridge turn, then rotates and
 * re-encodes outside the queue.
 */
export async function captureScreen(bridge: Bridge, options: CaptureOptions = {}): Promise<CapturedScreen> {
  const { orientation, raw } = await bridge.run("screenshot", async (client, sessionId) => ({
    orientation: await client.getOrientation(sessionId),
    raw: await client.getScreenshot(sessionId),
  }));
  const processed = await processScreenshot(raw, { ...options, orientation });
  return { ...processed, orientation };
}

/** Waits `delayMs`, then captures the tree, the screenshot or both through the bridge queue. */
export async function performObservation(
  bridge: Bridge,
  options: ObserveOptions,
): Promise<ObservationResult | undefined> {
  if (options.mode === "none") return undefined;

  if (options.delayMs && options.delayMs > 0) {
    await delay(options.delayMs);
  }

  const result: ObservationResult = {};

  if (options.mode === "ui_tree" || options.mode === "both") {
    const root = await bridge.run("observe ui tree", (client, sessionId) => client.getUiTree(sessionId));
    const indexed = indexTree(root);
    const shown = options.filterUi === false ? indexed : filterInteresting(indexed);
    result.uiTree = { text: renderTree(shown), count: shown.length };
  }

  if (options.mode === "screenshot" || options.mode === "both") {
    const screen = await captureScreen(bridge, { scale: options.scale, quality: options.quality });
    result.screenshot = {
      base64: screen.base64,
      mimeType: screen.mimeType,
      width: screen.width,
      height: screen.height,
    };
  }

  return result;
}
