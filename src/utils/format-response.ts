import { describeError } from "../wda/errors.js";
import type { Logger } from "./logger.js";

export interface ObservationResult {
  uiTree?: { text: string; count: number };
  screenshot?: {
    base64: string;
    mimeType: "image/jpeg" | "image/png";
    width: number;
    height: number;
  };
}

export type ContentItem =
  | { type: "text"; text: string }
  | { type: "image"; data: string; mimeType: "image/jpeg" | "image/png" };

export type ToolResult = {
  content: ContentItem[];
  isError?: boolean;
};

export function textResult(text: string): ToolResult {
  return { content: [{ type: "text" as const, text }] };
}

export function jsonResult(data: unknown): ToolResult {
  return textResult(JSON.stringify(data, null, 2));
}

export function errorResult(error: unknown): ToolResult {
  return {
    content: [{ type: "text" as const, text: describeError(error) }],
    isError: true,
  };
}

/**
 * Runs a tool body and turns any failure into an `isError` result carrying
 * the tagged error text.
 */
export async function runTool(
  logger: Logger,
  name: string,
  action: () => Promise<ToolResult>,
): Promise<ToolResult> {
  try {
    return await action();
  } catch (error) {
    logger.error(`${name}: ${describeError(error)}`);
    return errorResult(error);
  }
}

/** Confirmation line first, then whatever the observation captured. */
export function buildResponseContent(
  confirmationText: string,
  observation?: ObservationResult,
): ContentItem[] {
  const content: ContentItem[] = [
    { type: "text" as const, text: confirmationText },
  ];

  if (!observation) return content;

  if (observation.uiTree) {
    content.push({
      type: "text" as const,
      text: `--- UI Tree (${observation.uiTree.count} elements) ---\n${observation.uiTree.text}`,
    });
  }

  if (observation.screenshot) {
    content.push({
      type: "image" as const,
      data: observation.screenshot.base64,
      mimeType: observation.screenshot.mimeType,
    });
    content.push({
      type: "text" as const,
      text: `Screenshot captured (${observation.screenshot.width}x${observation.screenshot.height})`,
    });
  }

  return content;
}
