/**
 * Tests for src/utils/image.ts: processScreenshot
 *
 * Uses real sharp on small generated images, so the rotation and scaling
 * are checked on actual pixels rather than on a mocked pipeline.
 */

import sharp from "sharp";
import { clamp, processScreenshot, rotationFor } from "../../src/utils/image.js";

function solidPng(width: number, height: number): Promise<Buffer> {
  return sharp({
    create: { width, height, channels: 3, background: { r: 10, g: 20, b: 30 } },
  })
    .png()
    .toBuffer();
}

describe("processScreenshot", () => {
  it("rotates a landscape capture upright before scaling", async () => {
    const raw = await solidPng(2532, 1170);

    const result = await processScreenshot(raw, { scale: 0.5, format: "jpeg", orientation: "LANDSCAPE" });

    expect(result.width).toBe(585);
    expect(result.height).toBe(1266);
    expect(result.mimeType).toBe("image/jpeg");
    const metadata = await sharp(result.data).metadata();
    expect(metadata.format).toBe("jpeg");
    expect(metadata.width).toBe(585);
    expect(metadata.height).toBe(1266);
  });

  it("leaves portrait captures unrotated", async () => {
    const raw = await solidPng(400, 800);
    const result = await processScreenshot(raw, { scale: 0.25, orientation: "PORTRAIT" });
    expect([result.width, result.height]).toEqual([100, 200]);
  });

  it("encodes png when asked", async () => {
    const raw = await solidPng(100, 50);
    const result = await processScreenshot(raw, { scale: 1, format: "png" });

    expect(result.format).toBe("png");
    expect(result.mimeType).toBe("image/png");
    expect((await sharp(result.data).metadata()).format).toBe("png");
    expect(result.base64).toBe(result.data.toString("base64"));
  });

  it("clamps out-of-range scale and quality instead of failing", async () => {
    const raw = await solidPng(1000, 500);

    const tiny = await processScreenshot(raw, { scale: 0.01, quality: 0 });
    expect([tiny.width, tiny.height]).toEqual([100, 50]);

    const huge = await processScreenshot(raw, { scale: 3, quality: 500 });
    expect([huge.width, huge.height]).toEqual([1000, 500]);
  });

  it("reports sizes and the reduction", async () => {
    const raw = await solidPng(300, 300);
    const result = await processScreenshot(raw, { scale: 0.5 });

    expect(result.originalBytes).toBe(raw.length);
    expect(result.optimizedBytes).toBe(result.data.length);
    expect(result.reductionPercent).toBe(
      Math.round((1 - result.data.length / raw.length) * 1000) / 10,
    );
  });
});

describe("rotationFor", () => {
  it("maps every orientation to a clockwise angle", () => {
    expect(rotationFor("PORTRAIT")).toBe(0);
    expect(rotationFor("LANDSCAPE")).toBe(90);
    expect(rotationFor("UIA_DEVICE_ORIENTATION_LANDSCAPERIGHT")).toBe(270);
    expect(rotationFor("UIA_DEVICE_ORIENTATION_PORTRAIT_UPSIDEDOWN")).toBe(180);
  });
});

describe("clamp", () => {
  it("bounds the value and replaces non-finite input", () => {
    expect(clamp(5, 1, 3, 2)).toBe(3);
    expect(clamp(-5, 1, 3, 2)).toBe(1);
    expect(clamp(Number.NaN, 1, 3, 2)).toBe(2);
  });
});
