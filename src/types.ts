export type MediaKind = "image" | "video";

export type ItemStatus = "pending" | "processing" | "succeeded" | "failed";

export const VIDEO_QUALITIES = ["high", "medium", "low"] as const;

export type VideoQuality = (typeof VIDEO_QUALITIES)[number];

export type X264Preset = "slow" | "medium" | "fast";

export interface VideoPreset {
  crf: number;
  preset: X264Preset;
}

export type FailureKind =
  | "tool-unavailable"
  | "tool-execution"
  | "decode"
  | "encode"
  | "io"
  | "internal";

export interface FileItem {
  readonly sourcePath: string;
  readonly displayName: string;
  readonly outputName: string;
  readonly outputPath: string;
  readonly kind: MediaKind;
}

interface BatchBase {
  readonly items: readonly FileItem[];
  readonly outputDir: string;
}

export interface ImageBatch extends BatchBase {
  readonly kind: "image";
  readonly quality: number;
}

export interface VideoBatch extends BatchBase {
  readonly kind: "video";
  readonly quality: VideoQuality;
}

export type Batch = ImageBatch | VideoBatch;

export interface BuiltBatch<B extends Batch> {
  batch: B;
  skipped: string[];
}

export interface ItemSuccess {
  success: true;
  outputPath: string;
  inputSize?: number;
  outputSize?: number;
  compressionRatio?: number;
}

export interface ItemFailure {
  success: false;
  error: string;
  failure: FailureKind;
}

export type ItemResult = ItemSuccess | ItemFailure;

export type BatchResult = Map<string, ItemResult>;

export type ItemProcessor = (item: FileItem) => Promise<ItemResult>;

export type RunState = "idle" | "running" | "completed";

export interface BatchRunnerEvents {
  progress: (percent: number, message: string) => void;
  error: (message: string) => void;
  complete: (results: BatchResult) => void;
}

export interface BatchListener {
  onStatus?: (item: FileItem, status: ItemStatus) => void;
  onProgress?: (percent: number, message: string) => void;
  onError?: (message: string) => void;
}

export interface TranscodeRequest {
  inputPath: string;
  outputPath: string;
  crf: number;
  preset: X264Preset;
}

export interface Transcoder {
  transcode(request: TranscodeRequest): Promise<void>;
}

export interface ToolAvailability {
  available: boolean;
  diagnostic?: string;
}

export interface ParsedArgs {
  command?: "images" | "videos" | "check";
  inputs: string[];
  outputDir?: string;
  quality: number;
  tier: VideoQuality;
  recursive: boolean;
  help: boolean;
  version: boolean;
}
