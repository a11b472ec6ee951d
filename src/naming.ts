import path from "node:path";

export const IMAGE_OUTPUT_SUFFIX = ".webp";
export const VIDEO_OUTPUT_SUFFIX = "_compressed.mp4";

/**
 * Picks an output file name for `filename` that is not yet in `taken`, and
 * records it there. The input's own extension is replaced by `targetSuffix`;
 * on a collision `_1`, `_2`, ... is inserted before the suffix.
 */
export function resolveOutputName(filename: string, taken: Set<string>, targetSuffix: string): string {
  const base = path.parse(filename).name;
  let candidate = `${base}${targetSuffix}`;
  let counter = 1;

  while (taken.has(candidate)) {
    candidate = `${base}_${counter}${targetSuffix}`;
    counter++;
  }

  taken.add(candidate);
  return candidate;
}
