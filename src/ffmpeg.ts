import { spawn } from "node:child_process";
import { ConversionError, ToolExecutionError, ToolUnavailableError, errorMessage } from "./errors.js";
import type { ToolAvailability, TranscodeRequest, Transcoder } from "./types.js";

const AUDIO_BITRATE = "128k";
const MAX_STDERR_BYTES = 64 * 1024;

export function resolveFfmpegPath(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.FFMPEG_PATH?.trim();
  return configured ? configured : "ffmpeg";
}

export function buildFfmpegArgs(request: TranscodeRequest): string[] {
  return [
    "-y",
    "-i", request.inputPath,
    "-c:v", "libx264",
    "-crf", String(request.crf),
    "-preset", request.preset,
    "-c:a", "aac",
    "-b:a", AUDIO_BITRATE,
    request.outputPath,
  ];
}

// Invalid UTF-8 sequences are dropped, not replaced.
export function decodeStderr(buffer: Buffer): string {
  return buffer.toString("utf8").replace(/\uFFFD/g, "");
}

function isMissingBinary(err: NodeJS.ErrnoException): boolean {
  return err.code === "ENOENT" || err.code === "EACCES";
}

interface ExitStatus {
  code: number | null;
  signal: NodeJS.Signals | null;
  stderr: string;
}

function execute(binaryPath: string, args: string[]): Promise<ExitStatus> {
  return new Promise((resolve, reject) => {
    const child = spawn(binaryPath, args, {
      stdio: ["ignore", "ignore", "pipe"],
      windowsHide: true,
    });

    const chunks: Buffer[] = [];
    let captured = 0;

    child.stderr.on("data", (chunk: Buffer) => {
      if (captured >= MAX_STDERR_BYTES) return;
      chunks.push(chunk);
      captured += chunk.length;
    });

    child.on("error", (err) => {
      if (isMissingBinary(err)) {
        reject(new ToolUnavailableError(binaryPath, { cause: err }));
      } else {
        reject(new ConversionError("io", errorMessage(err), { cause: err }));
      }
    });

    child.on("close", (code, signal) => {
      resolve({ code, signal, stderr: decodeStderr(Buffer.concat(chunks)) });
    });
  });
}

export class FfmpegTranscoder implements Transcoder {
  readonly binaryPath: string;

  constructor(binaryPath = resolveFfmpegPath()) {
    this.binaryPath = binaryPath;
  }

  async transcode(request: TranscodeRequest): Promise<void> {
    const { code, signal, stderr } = await execute(this.binaryPath, buildFfmpegArgs(request));
    if (code !== 0) {
      throw new ToolExecutionError(code, stderr, signal);
    }
  }
}

export async function probeFfmpeg(binaryPath = resolveFfmpegPath()): Promise<ToolAvailability> {
  try {
    const { code, signal, stderr } = await execute(binaryPath, ["-version"]);
    if (code === 0) {
      return { available: true };
    }
    const detail = stderr.trim().slice(0, 200);
    if (detail) {
      return { available: false, diagnostic: `ffmpeg -version failed: ${detail}` };
    }
    return {
      available: false,
      diagnostic: signal ? `ffmpeg -version was terminated by ${signal}` : `ffmpeg -version exited with code ${code ?? "null"}`,
    };
  } catch (err) {
    return { available: false, diagnostic: errorMessage(err) };
  }
}
