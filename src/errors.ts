import type { FailureKind } from "./types.js";

export class ConversionError extends Error {
  readonly kind: FailureKind;

  constructor(kind: FailureKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ConversionError";
    this.kind = kind;
  }
}

export class ToolUnavailableError extends ConversionError {
  constructor(binaryPath: string, options?: ErrorOptions) {
    super(
      "tool-unavailable",
      `ffmpeg not found (${binaryPath}). Install ffmpeg and add it to PATH, or set FFMPEG_PATH to its location`,
      options,
    );
    this.name = "ToolUnavailableError";
  }
}

function executionDiagnostic(exitCode: number | null, stderr: string, signal: NodeJS.Signals | null): string {
  if (stderr.length > 0) return `ffmpeg error: ${stderr.slice(0, 200)}`;
  if (signal) return `ffmpeg was terminated by ${signal}`;
  return `ffmpeg exited with code ${exitCode ?? "null"}`;
}

export class ToolExecutionError extends ConversionError {
  readonly exitCode: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stderr: string;

  constructor(exitCode: number | null, stderr: string, signal: NodeJS.Signals | null = null) {
    super("tool-execution", executionDiagnostic(exitCode, stderr, signal));
    this.name = "ToolExecutionError";
    this.exitCode = exitCode;
    this.signal = signal;
    this.stderr = stderr;
  }
}

export class RunInProgressError extends Error {
  constructor(kind: string) {
    super(`A ${kind} batch is already running`);
    this.name = "RunInProgressError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function failureKind(err: unknown, fallback: FailureKind): FailureKind {
  return err instanceof ConversionError ? err.kind : fallback;
}
