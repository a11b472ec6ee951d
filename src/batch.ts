import path from "node:path";
import { EventEmitter } from "node:events";
import { FfmpegTranscoder } from "./ffmpeg.js";
import { RunInProgressError, errorMessage } from "./errors.js";
import { createImageProcessor } from "./image.js";
import { createVideoProcessor } from "./video.js";
import { IMAGE_OUTPUT_SUFFIX, VIDEO_OUTPUT_SUFFIX, resolveOutputName } from "./naming.js";
import { videoPreset } from "./presets.js";
import { isImageFile, isVideoFile } from "./utils.js";
import type {
  Batch,
  BatchListener,
  BatchResult,
  BatchRunnerEvents,
  BuiltBatch,
  FileItem,
  ImageBatch,
  ItemProcessor,
  ItemResult,
  ItemStatus,
  MediaKind,
  RunState,
  Transcoder,
  VideoBatch,
  VideoQuality,
} from "./types.js";

const NEXT_STATUSES: Record<ItemStatus, readonly ItemStatus[]> = {
  pending: ["processing"],
  processing: ["succeeded", "failed"],
  succeeded: [],
  failed: [],
};

export function advanceStatus(from: ItemStatus, to: ItemStatus): ItemStatus {
  if (!NEXT_STATUSES[from].includes(to)) {
    throw new Error(`Invalid status transition: ${from} -> ${to}`);
  }
  return to;
}

function collectItems(
  kind: MediaKind,
  inputs: readonly string[],
  outputDir: string,
  accepts: (filePath: string) => boolean,
  targetSuffix: string,
): { items: FileItem[]; skipped: string[] } {
  const seen = new Set<string>();
  const taken = new Set<string>();
  const items: FileItem[] = [];
  const skipped: string[] = [];

  for (const input of inputs) {
    const sourcePath = path.resolve(input);
    if (seen.has(sourcePath)) continue;
    seen.add(sourcePath);

    if (!accepts(sourcePath)) {
      skipped.push(sourcePath);
      continue;
    }

    const displayName = path.basename(sourcePath);
    const outputName = resolveOutputName(displayName, taken, targetSuffix);
    items.push(
      Object.freeze({
        sourcePath,
        displayName,
        outputName,
        outputPath: path.join(outputDir, outputName),
        kind,
      }),
    );
  }

  return { items, skipped };
}

export function buildImageBatch(inputs: readonly string[], outputDir: string, quality: number): BuiltBatch<ImageBatch> {
  const dir = path.resolve(outputDir);
  const { items, skipped } = collectItems("image", inputs, dir, isImageFile, IMAGE_OUTPUT_SUFFIX);
  const batch: ImageBatch = Object.freeze({
    kind: "image",
    items: Object.freeze(items),
    outputDir: dir,
    quality,
  });
  return { batch, skipped };
}

export function buildVideoBatch(inputs: readonly string[], outputDir: string, quality: VideoQuality): BuiltBatch<VideoBatch> {
  const dir = path.resolve(outputDir);
  const { items, skipped } = collectItems("video", inputs, dir, isVideoFile, VIDEO_OUTPUT_SUFFIX);
  const batch: VideoBatch = Object.freeze({
    kind: "video",
    items: Object.freeze(items),
    outputDir: dir,
    quality,
  });
  return { batch, skipped };
}

function progressMessage(item: FileItem, result: ItemResult, index: number, total: number): string {
  const verb = result.success ? (item.kind === "image" ? "Converted" : "Compressed") : "Failed";
  return `${verb} ${item.displayName} (${index + 1}/${total})`;
}

function notify(name: string, call: () => void): void {
  try {
    call();
  } catch (err) {
    console.error(`Error in ${name} listener: ${errorMessage(err)}`);
  }
}

function failureNotice(item: FileItem, error: string): string {
  const action = item.kind === "image" ? "Conversion" : "Compression";
  return `${action} failed for ${item.displayName}: ${error}`;
}

/**
 * Runs every item of `batch` through `processor`, one at a time and in order.
 * A processor that throws fails only its own item, and a listener that throws
 * is logged and skipped. Resolves with one result per item once the last one
 * has finished.
 */
export async function processBatch(batch: Batch, processor: ItemProcessor, listener: BatchListener = {}): Promise<BatchResult> {
  const results: BatchResult = new Map();
  const total = batch.items.length;

  for (const [index, item] of batch.items.entries()) {
    notify("status", () => listener.onStatus?.(item, "processing"));

    let result: ItemResult;
    try {
      result = await processor(item);
    } catch (err) {
      result = { success: false, error: errorMessage(err), failure: "internal" };
    }

    const outcome = result;
    notify("status", () => listener.onStatus?.(item, outcome.success ? "succeeded" : "failed"));
    results.set(item.sourcePath, outcome);

    if (!outcome.success) {
      notify("error", () => listener.onError?.(failureNotice(item, outcome.error)));
    }
    notify("progress", () =>
      listener.onProgress?.(Math.round((100 * (index + 1)) / total), progressMessage(item, outcome, index, total)),
    );
  }

  return results;
}

export interface BatchRunnerOptions {
  transcoder?: Transcoder;
  processorFor?: (batch: Batch) => ItemProcessor;
}

// Categories with a run in flight, across all runners.
const activeKinds = new Set<MediaKind>();

export class BatchRunner {
  readonly kind: MediaKind;
  private readonly events = new EventEmitter();
  private readonly transcoder: Transcoder | undefined;
  private readonly processorFor: ((batch: Batch) => ItemProcessor) | undefined;
  private currentState: RunState = "idle";
  private statuses = new Map<string, ItemStatus>();

  constructor(kind: MediaKind, options: BatchRunnerOptions = {}) {
    this.kind = kind;
    this.transcoder = options.transcoder;
    this.processorFor = options.processorFor;
  }

  get state(): RunState {
    return this.currentState;
  }

  statusOf(sourcePath: string): ItemStatus | undefined {
    return this.statuses.get(sourcePath);
  }

  on<E extends keyof BatchRunnerEvents>(event: E, listener: BatchRunnerEvents[E]): this {
    this.events.on(event, listener);
    return this;
  }

  off<E extends keyof BatchRunnerEvents>(event: E, listener: BatchRunnerEvents[E]): this {
    this.events.off(event, listener);
    return this;
  }

  async run(batch: Batch): Promise<BatchResult> {
    if (this.currentState === "running") {
      throw new RunInProgressError(this.kind);
    }
    if (batch.kind !== this.kind) {
      throw new Error(`Cannot run a ${batch.kind} batch on a ${this.kind} runner`);
    }
    if (activeKinds.has(batch.kind)) {
      throw new RunInProgressError(batch.kind);
    }
    if (new Set(batch.items.map((item) => item.sourcePath)).size !== batch.items.length) {
      throw new Error("Batch contains the same source path more than once");
    }

    this.currentState = "running";
    activeKinds.add(batch.kind);
    this.statuses = new Map(batch.items.map((item): [string, ItemStatus] => [item.sourcePath, "pending"]));

    // Released before "complete" fires, so a listener may start the next run.
    let released = false;
    const release = (): void => {
      if (released) return;
      released = true;
      this.currentState = "completed";
      activeKinds.delete(batch.kind);
    };

    try {
      const results = await processBatch(batch, this.resolveProcessor(batch), {
        onStatus: (item, status) => this.setStatus(item, status),
        onProgress: (percent, message) => this.emit("progress", percent, message),
        onError: (message) => this.emit("error", message),
      });

      release();
      this.emit("complete", results);
      return results;
    } finally {
      release();
    }
  }

  private resolveProcessor(batch: Batch): ItemProcessor {
    if (this.processorFor) {
      return this.processorFor(batch);
    }
    if (batch.kind === "image") {
      return createImageProcessor(batch.quality);
    }
    return createVideoProcessor(videoPreset(batch.quality), this.transcoder ?? new FfmpegTranscoder());
  }

  private setStatus(item: FileItem, status: ItemStatus): void {
    const current = this.statuses.get(item.sourcePath) ?? "pending";
    this.statuses.set(item.sourcePath, advanceStatus(current, status));
  }

  // Listener failures are reported but never interrupt the run.
  private emit<E extends keyof BatchRunnerEvents>(event: E, ...args: Parameters<BatchRunnerEvents[E]>): void {
    if (this.events.listenerCount(event) === 0) return;
    try {
      this.events.emit(event, ...args);
    } catch (err) {
      console.error(`Error in ${event} listener: ${errorMessage(err)}`);
    }
  }
}
