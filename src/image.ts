import sharp from "sharp";
import { ConversionError, errorMessage, failureKind } from "./errors.js";
import { isValidImageQuality } from "./presets.js";
import type { FileItem, ItemProcessor, ItemResult } from "./types.js";

sharp.cache({ memory: 512 });

async function decode(inputPath: string): Promise<sharp.Sharp> {
  const pipeline = sharp(inputPath, {
    limitInputPixels: 268402689, // 16384 x 16384
    sequentialRead: true,
  });

  let metadata: sharp.Metadata;
  try {
    metadata = await pipeline.metadata();
  } catch (err) {
    throw new ConversionError("decode", errorMessage(err), { cause: err });
  }

  // Palette images with a transparency table also report hasAlpha.
  if (metadata.hasAlpha) {
    return pipeline.toColorspace("srgb").ensureAlpha();
  }
  return pipeline;
}

/**
 * Converts one image to lossy WebP at `outputPath`. Never throws: every
 * failure comes back as an unsuccessful result carrying the error message.
 */
export async function convertImage(item: FileItem, quality: number): Promise<ItemResult> {
  try {
    if (!isValidImageQuality(quality)) {
      throw new ConversionError("encode", `Quality must be an integer between 1 and 100, got ${quality}`);
    }

    const pipeline = await decode(item.sourcePath);

    try {
      await pipeline
        .webp({
          quality,
          alphaQuality: 100,
          lossless: false,
          nearLossless: false,
        })
        .toFile(item.outputPath);
    } catch (err) {
      throw new ConversionError("encode", errorMessage(err), { cause: err });
    }

    return { success: true, outputPath: item.outputPath };
  } catch (err) {
    return { success: false, error: errorMessage(err), failure: failureKind(err, "io") };
  }
}

export function createImageProcessor(quality: number): ItemProcessor {
  return (item) => convertImage(item, quality);
}
