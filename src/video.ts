import fs from "node:fs/promises";
import { ConversionError, errorMessage, failureKind } from "./errors.js";
import { compressionRatio } from "./utils.js";
import type { FileItem, ItemProcessor, ItemResult, Transcoder, VideoPreset } from "./types.js";

async function fileSizes(inputPath: string, outputPath: string): Promise<[number, number]> {
  try {
    const [input, output] = await Promise.all([fs.stat(inputPath), fs.stat(outputPath)]);
    return [input.size, output.size];
  } catch (err) {
    throw new ConversionError("io", errorMessage(err), { cause: err });
  }
}

/**
 * Transcodes one video to H.264/AAC and reports how much smaller the output
 * is. A negative ratio means the output grew; that still counts as success.
 */
export async function compressVideo(item: FileItem, preset: VideoPreset, transcoder: Transcoder): Promise<ItemResult> {
  try {
    await transcoder.transcode({
      inputPath: item.sourcePath,
      outputPath: item.outputPath,
      crf: preset.crf,
      preset: preset.preset,
    });

    const [inputSize, outputSize] = await fileSizes(item.sourcePath, item.outputPath);

    return {
      success: true,
      outputPath: item.outputPath,
      inputSize,
      outputSize,
      compressionRatio: compressionRatio(inputSize, outputSize),
    };
  } catch (err) {
    return { success: false, error: errorMessage(err), failure: failureKind(err, "io") };
  }
}

export function createVideoProcessor(preset: VideoPreset, transcoder: Transcoder): ItemProcessor {
  return (item) => compressVideo(item, preset, transcoder);
}
