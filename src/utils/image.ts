import sharp from "sharp";
import type { Orientation } from "../types.js";

export type ImageFormat = "jpeg" | "png";

export interface ProcessOptions {
  scale?: number; // 0.1-1.0, default 0.5
  quality?: number; // 1-100, default 60, jpeg only
  format?: ImageFormat;
  orientation?: Orientation;
}

export interface ProcessedScreenshot {
  data: Buffer;
  base64: string;
  format: ImageFormat;
  mimeType: "image/jpeg" | "image/png";
  width: number;
  height: number;
  originalBytes: number;
  optimizedBytes: number;
  reductionPercent: number;
}

export const DEFAULT_SCALE = 0.5;
export const DEFAULT_QUALITY = 60;

export function clamp(value: number, min: number, max: number, fallback: number): number {
  if (!Number.isFinite(value)) return fallback;
  return Math.min(max, Math.max(min, value));
}

/**
 * Clockwise rotation that turns a capture taken in the given orientation
 * upright.
 */
export function rotationFor(orientation: Orientation): 0 | 90 | 180 | 270 {
  switch (orientation) {
    case "LANDSCAPE":
      return 90;
    case "UIA_DEVICE_ORIENTATION_LANDSCAPERIGHT":
      return 270;
    case "UIA_DEVICE_ORIENTATION_PORTRAIT_UPSIDEDOWN":
      return 180;
    case "PORTRAIT":
      return 0;
  }
}

export async function processScreenshot(
  input: Buffer,
  options: ProcessOptions = {},
): Promise<ProcessedScreenshot> {
  const scale = clamp(options.scale ?? DEFAULT_SCALE, 0.1, 1, DEFAULT_SCALE);
  const quality = Math.round(clamp(options.quality ?? DEFAULT_QUALITY, 1, 100, DEFAULT_QUALITY));
  const format = options.format ?? "jpeg";
  const angle = rotationFor(options.orientation ?? "PORTRAIT");

  // Rotate in its own pass so the resize below sees the upright dimensions.
  const upright = angle === 0 ? input : await sharp(input).rotate(angle).toBuffer();
  const metadata = await sharp(upright).metadata();

  const origWidth = metadata.width ?? 1170;
  const origHeight = metadata.height ?? 2532;

  const newWidth = Math.max(1, Math.round(origWidth * scale));
  const newHeight = Math.max(1, Math.round(origHeight * scale));

  const pipeline = sharp(upright).resize(newWidth, newHeight);
  const data =
    format === "png"
      ? await pipeline.png().toBuffer()
      : await pipeline.jpeg({ quality }).toBuffer();

  const originalBytes = input.length;
  const optimizedBytes = data.length;
  const reductionPercent =
    originalBytes > 0 ? Math.round((1 - optimizedBytes / originalBytes) * 1000) / 10 : 0;

  return {
    data,
    base64: data.toString("base64"),
    format,
    mimeType: format === "png" ? "image/png" : "image/jpeg",
    width: newWidth,
    height: newHeight,
    originalBytes,
    optimizedBytes,
    reductionPercent,
  };
}
