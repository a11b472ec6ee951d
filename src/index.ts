#!/usr/bin/env node

import { createRequire } from "node:module";
import fs from "node:fs/promises";
import path from "node:path";
import { BatchRunner, buildImageBatch, buildVideoBatch } from "./batch.js";
import { errorMessage } from "./errors.js";
import { probeFfmpeg } from "./ffmpeg.js";
import { DEFAULT_IMAGE_QUALITY, DEFAULT_VIDEO_QUALITY, clampQuality, parseVideoQuality } from "./presets.js";
import { formatBytes, formatDuration, isImageFile, isVideoFile } from "./utils.js";
import type { Batch, BatchResult, ParsedArgs } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
mediabatch v${VERSION} — Convert images to WebP and compress videos

Usage:
  mediabatch images -o <dir> <input...>   Convert images to WebP
  mediabatch videos -o <dir> <input...>   Compress videos to H.264 MP4
  mediabatch check                        Check that ffmpeg is available

Inputs may be files or directories.

Options:
  -o, --output <dir>  Output directory (required for images and videos)
  -q, --quality <n>   WebP quality 1-100 (default: ${DEFAULT_IMAGE_QUALITY})
  -t, --tier <tier>   Video quality: high, medium or low (default: ${DEFAULT_VIDEO_QUALITY})
  -r, --recursive     Include files in subdirectories
  -h, --help          Show this help message
  -v, --version       Show version number

Environment:
  FFMPEG_PATH         Path to the ffmpeg binary (default: ffmpeg on PATH)

Image formats: png, jpg, jpeg, bmp, gif, tiff, tif
Video formats: mp4, avi, mkv, mov, wmv, flv, webm, mpeg, mpg
`.trim();

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run mediabatch --help for usage");
  process.exit(1);
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    inputs: [],
    quality: DEFAULT_IMAGE_QUALITY,
    tier: DEFAULT_VIDEO_QUALITY,
    recursive: false,
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "-r" || arg === "--recursive") {
      result.recursive = true;
      continue;
    }

    if (arg === "-q" || arg === "--quality") {
      const next = args[++i];
      if (next === undefined) {
        fail("--quality requires a numeric argument");
      }
      const val = parseInt(next, 10);
      if (isNaN(val)) {
        fail(`invalid quality value: ${next}`);
      }
      result.quality = clampQuality(val);
      continue;
    }

    if (arg === "-t" || arg === "--tier") {
      const next = args[++i];
      if (next === undefined) {
        fail("--tier requires one of high, medium, low");
      }
      try {
        result.tier = parseVideoQuality(next);
      } catch (err) {
        fail(errorMessage(err));
      }
      continue;
    }

    if (arg === "-o" || arg === "--output") {
      const next = args[++i];
      if (next === undefined) {
        fail("--output requires a directory argument");
      }
      result.outputDir = next;
      continue;
    }

    if (arg.startsWith("-")) {
      fail(`unknown option: ${arg}`);
    }

    if (result.command === undefined) {
      if (arg !== "images" && arg !== "videos" && arg !== "check") {
        fail(`unknown command: ${arg}`);
      }
      result.command = arg;
      continue;
    }

    result.inputs.push(arg);
  }

  return result;
}

async function collectInputs(inputs: string[], accepts: (file: string) => boolean, recursive: boolean): Promise<string[]> {
  const files: string[] = [];

  for (const input of inputs) {
    const stat = await fs.stat(input);

    if (stat.isFile()) {
      files.push(input);
    } else if (stat.isDirectory()) {
      const entries = recursive
        ? await fs.readdir(input, { recursive: true })
        : await fs.readdir(input);
      const matches = entries.filter((entry) => accepts(entry)).sort();
      if (matches.length === 0) {
        console.warn(`Warning: no supported files found in ${input}`);
      }
      files.push(...matches.map((entry) => path.join(input, entry)));
    } else {
      throw new Error(`Input is neither a file nor a directory: ${input}`);
    }
  }

  return files;
}

async function runBatch(batch: Batch, skipped: string[]): Promise<BatchResult> {
  for (const file of skipped) {
    console.warn(`Skipping: not a supported ${batch.kind} file: ${file}`);
  }

  if (batch.items.length === 0) {
    throw new Error(`No valid ${batch.kind} files found`);
  }

  const runner = new BatchRunner(batch.kind);
  runner.on("progress", (percent, message) => console.log(`[${percent}%] ${message}`));
  runner.on("error", (message) => console.warn(message));

  return runner.run(batch);
}

function printSummary(results: BatchResult, skipped: number, startTime: number): number {
  let succeeded = 0;
  let inputBytes = 0;
  let outputBytes = 0;
  const failed: [string, string][] = [];

  for (const [file, result] of results) {
    if (result.success) {
      succeeded++;
      inputBytes += result.inputSize ?? 0;
      outputBytes += result.outputSize ?? 0;
    } else {
      failed.push([file, result.error]);
    }
  }

  console.log("\nCompleted:");
  console.log(`  Total files: ${results.size}`);
  console.log(`  Succeeded:   ${succeeded}`);
  console.log(`  Failed:      ${failed.length}`);
  console.log(`  Skipped:     ${skipped}`);
  console.log(`  Duration:    ${formatDuration(Date.now() - startTime)}`);

  if (inputBytes > 0) {
    const ratio = (((inputBytes - outputBytes) / inputBytes) * 100).toFixed(2);
    console.log(`  Total size:  ${formatBytes(inputBytes)} -> ${formatBytes(outputBytes)}`);
    console.log(`  Compression: ${ratio}%`);
  }

  if (failed.length > 0) {
    console.log("\nFailed:");
    failed.forEach(([file, error]) => console.log(`  - ${file}: ${error}`));
  }

  return failed.length;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  if (parsed.command === undefined) {
    fail("no command specified");
  }

  if (parsed.command === "check") {
    const { available, diagnostic } = await probeFfmpeg();
    if (!available) {
      console.error(`ffmpeg unavailable: ${diagnostic ?? "unknown error"}`);
      process.exit(1);
    }
    console.log("ffmpeg is available");
    return;
  }

  if (parsed.inputs.length === 0) {
    fail("no input file or directory specified");
  }

  if (!parsed.outputDir) {
    fail("--output is required");
  }

  await fs.mkdir(parsed.outputDir, { recursive: true });
  const startTime = Date.now();

  let results: BatchResult;
  let skipped: number;

  if (parsed.command === "images") {
    const files = await collectInputs(parsed.inputs, isImageFile, parsed.recursive);
    const built = buildImageBatch(files, parsed.outputDir, parsed.quality);
    skipped = built.skipped.length;
    results = await runBatch(built.batch, built.skipped);
  } else {
    const { available, diagnostic } = await probeFfmpeg();
    if (!available) {
      console.error(`Error: ffmpeg unavailable: ${diagnostic ?? "unknown error"}`);
      process.exit(1);
    }
    const files = await collectInputs(parsed.inputs, isVideoFile, parsed.recursive);
    const built = buildVideoBatch(files, parsed.outputDir, parsed.tier);
    skipped = built.skipped.length;
    results = await runBatch(built.batch, built.skipped);
  }

  const failures = printSummary(results, skipped, startTime);
  if (failures > 0) {
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
