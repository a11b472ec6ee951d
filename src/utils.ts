import path from "node:path";
import type { MediaKind } from "./types.js";

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".bmp", ".gif", ".tiff", ".tif"];
export const VIDEO_EXTENSIONS = [".mp4", ".avi", ".mkv", ".mov", ".wmv", ".flv", ".webm", ".mpeg", ".mpg"];

export function hasExtension(filePath: string, extensions: readonly string[]): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return extensions.includes(ext);
}

export function isImageFile(filePath: string): boolean {
  return hasExtension(filePath, IMAGE_EXTENSIONS);
}

export function isVideoFile(filePath: string): boolean {
  return hasExtension(filePath, VIDEO_EXTENSIONS);
}

export function classifyFile(filePath: string): MediaKind | null {
  if (isImageFile(filePath)) return "image";
  if (isVideoFile(filePath)) return "video";
  return null;
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${units[unit]}`;
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}

export function compressionRatio(inputSize: number, outputSize: number): number {
  if (inputSize === 0) return 0;
  return Math.round((1 - outputSize / inputSize) * 100 * 100) / 100;
}
