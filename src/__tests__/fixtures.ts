import sharp from "sharp";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

export function tmpDir(prefix = "mediabatch-test"): string {
  return path.join(os.tmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

export async function cleanup(dir: string): Promise<void> {
  try {
    await fs.rm(dir, { recursive: true, force: true });
  } catch {
    // ignore
  }
}

export async function createTestImage(
  filePath: string,
  format: "png" | "jpeg" = "png",
  channels: 3 | 4 = 3,
): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const background = channels === 4
    ? { r: 255, g: 0, b: 0, alpha: 0.5 }
    : { r: 0, g: 255, b: 0 };
  await sharp({
    create: { width: 10, height: 10, channels, background },
  })
    .toFormat(format)
    .toFile(filePath);
}

/**
 * Writes an executable shell script that stands in for ffmpeg. The body sees
 * the same arguments ffmpeg would, so "$3" is the input and the last argument
 * is the output. Needs a POSIX `/bin/sh`; the tests that use these scripts
 * run on Linux and macOS only.
 */
export async function writeFakeFfmpeg(dir: string, body: string): Promise<string> {
  const scriptPath = path.join(dir, `fake-ffmpeg-${Math.random().toString(36).slice(2)}`);
  await fs.writeFile(scriptPath, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
  return scriptPath;
}

// Copies the first `bytes` bytes of the input to the output.
export function truncatingFfmpeg(bytes: number): string {
  return `for last; do :; done\nhead -c ${bytes} "$3" > "$last"`;
}
