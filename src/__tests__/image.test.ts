import { describe, it, expect, beforeEach, afterEach } from "vitest";
import sharp from "sharp";
import fs from "node:fs/promises";
import path from "node:path";
import { convertImage } from "../image.js";
import type { FileItem } from "../types.js";
import { cleanup, createTestImage, tmpDir } from "./fixtures.js";

function imageItem(sourcePath: string, outputPath: string): FileItem {
  return {
    sourcePath,
    displayName: path.basename(sourcePath),
    outputName: path.basename(outputPath),
    outputPath,
    kind: "image",
  };
}

describe("convertImage", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir("mediabatch-image");
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await cleanup(workDir);
  });

  it("converts a PNG to WebP", async () => {
    const inputPath = path.join(workDir, "test.png");
    const outputPath = path.join(workDir, "test.webp");
    await createTestImage(inputPath);

    const result = await convertImage(imageItem(inputPath, outputPath), 85);

    expect(result).toEqual({ success: true, outputPath });
    const metadata = await sharp(outputPath).metadata();
    expect(metadata.format).toBe("webp");
    expect(metadata.width).toBe(10);
  });

  it("converts a JPEG to WebP", async () => {
    const inputPath = path.join(workDir, "photo.jpg");
    const outputPath = path.join(workDir, "photo.webp");
    await createTestImage(inputPath, "jpeg");

    const result = await convertImage(imageItem(inputPath, outputPath), 50);

    expect(result.success).toBe(true);
    expect((await fs.stat(outputPath)).size).toBeGreaterThan(0);
  });

  it("keeps transparency", async () => {
    const inputPath = path.join(workDir, "alpha.png");
    const outputPath = path.join(workDir, "alpha.webp");
    await createTestImage(inputPath, "png", 4);

    const result = await convertImage(imageItem(inputPath, outputPath), 85);

    expect(result.success).toBe(true);
    const metadata = await sharp(outputPath).metadata();
    expect(metadata.hasAlpha).toBe(true);
    expect(metadata.channels).toBe(4);
  });

  it("keeps transparency of palette images", async () => {
    const inputPath = path.join(workDir, "palette.png");
    const outputPath = path.join(workDir, "palette.webp");
    await sharp({
      create: { width: 10, height: 10, channels: 4, background: { r: 0, g: 0, b: 255, alpha: 0 } },
    })
      .png({ palette: true })
      .toFile(inputPath);

    const result = await convertImage(imageItem(inputPath, outputPath), 85);

    expect(result.success).toBe(true);
    expect((await sharp(outputPath).metadata()).hasAlpha).toBe(true);
  });

  it("overwrites an existing output", async () => {
    const inputPath = path.join(workDir, "again.png");
    const outputPath = path.join(workDir, "again.webp");
    await createTestImage(inputPath);
    await fs.writeFile(outputPath, "stale");

    const result = await convertImage(imageItem(inputPath, outputPath), 85);

    expect(result.success).toBe(true);
    expect((await sharp(outputPath).metadata()).format).toBe("webp");
  });

  it("produces smaller files at lower quality", async () => {
    const inputPath = path.join(workDir, "noise.png");
    const size = 200;
    const channels = 3;
    const noise = Buffer.alloc(size * size * channels);
    for (let i = 0; i < noise.length; i++) {
      noise[i] = Math.floor(Math.random() * 256);
    }
    await sharp(noise, { raw: { width: size, height: size, channels } }).png().toFile(inputPath);

    const high = path.join(workDir, "high.webp");
    const low = path.join(workDir, "low.webp");
    await convertImage(imageItem(inputPath, high), 100);
    await convertImage(imageItem(inputPath, low), 1);

    expect((await fs.stat(low)).size).toBeLessThan((await fs.stat(high)).size);
  });

  it("fails a corrupt source as a decode error", async () => {
    const inputPath = path.join(workDir, "corrupt.png");
    await fs.writeFile(inputPath, "not a real image");

    const result = await convertImage(imageItem(inputPath, path.join(workDir, "corrupt.webp")), 85);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.failure).toBe("decode");
    expect(result.error.length).toBeGreaterThan(0);
  });

  it("fails an unwritable output path as an encode error", async () => {
    const inputPath = path.join(workDir, "ok.png");
    await createTestImage(inputPath);

    const result = await convertImage(imageItem(inputPath, path.join(workDir, "missing-dir", "ok.webp")), 85);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.failure).toBe("encode");
  });

  it("rejects out-of-range quality without touching the output", async () => {
    const inputPath = path.join(workDir, "q.png");
    const outputPath = path.join(workDir, "q.webp");
    await createTestImage(inputPath);

    const result = await convertImage(imageItem(inputPath, outputPath), 0);

    expect(result).toEqual({
      success: false,
      error: "Quality must be an integer between 1 and 100, got 0",
      failure: "encode",
    });
    await expect(fs.access(outputPath)).rejects.toThrow();
  });
});
