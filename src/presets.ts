import { VIDEO_QUALITIES } from "./types.js";
import type { VideoPreset, VideoQuality } from "./types.js";

export const DEFAULT_IMAGE_QUALITY = 85;
export const DEFAULT_VIDEO_QUALITY: VideoQuality = "medium";

export const VIDEO_PRESETS: Readonly<Record<VideoQuality, VideoPreset>> = {
  high: { crf: 18, preset: "slow" },
  medium: { crf: 23, preset: "medium" },
  low: { crf: 28, preset: "fast" },
};

export function videoPreset(quality: VideoQuality): VideoPreset {
  return VIDEO_PRESETS[quality];
}

export function isVideoQuality(value: string): value is VideoQuality {
  return VIDEO_QUALITIES.some((q) => q === value);
}

export function parseVideoQuality(value: string): VideoQuality {
  const normalized = value.toLowerCase();
  if (!isVideoQuality(normalized)) {
    throw new Error(`invalid quality tier: ${value} (expected ${VIDEO_QUALITIES.join(", ")})`);
  }
  return normalized;
}

export function clampQuality(quality: number): number {
  return Math.max(1, Math.min(Math.round(quality), 100));
}

export function isValidImageQuality(quality: number): boolean {
  return Number.isInteger(quality) && quality >= 1 && quality <= 100;
}
