export type PipelineErrorCode =
  | "invalid_source"
  | "unsupported_content"
  | "download_failed"
  | "no_clips_produced"
  | "out_of_memory"
  | "timeout"
  | "insufficient_credits"
  | "invalid_transition";

/**
 * Base class for failures the pipeline knows how to describe to a user.
 * `message` is safe to persist and show; `detail` stays in the logs.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly detail?: string;

  constructor(code: PipelineErrorCode, message: string, detail?: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.detail = detail;
  }
}

export class InvalidSourceError extends PipelineError {
  constructor(message = "Please provide a valid YouTube URL.", detail?: string) {
    super("invalid_source", message, detail);
  }
}

export class UnsupportedContentError extends PipelineError {
  constructor(message: string, detail?: string) {
    super("unsupported_content", message, detail);
  }
}

export class DownloadFailedError extends PipelineError {
  constructor(message = "Failed to download video.", detail?: string) {
    super("download_failed", message, detail);
  }
}

export class NoClipsProducedError extends PipelineError {
  constructor(message = "No clips were successfully created.", detail?: string) {
    super("no_clips_produced", message, detail);
  }
}

export class OutOfMemoryError extends PipelineError {
  constructor(usedMb: number, limitMb: number) {
    super(
      "out_of_memory",
      "The server ran out of memory while processing this video.",
      `Memory usage too high: ${usedMb.toFixed(2)}MB > ${limitMb}MB`
    );
  }
}

export class TimeoutError extends PipelineError {
  constructor(limitMs: number) {
    super("timeout", `Processing timed out after ${Math.round(limitMs / 60000)} minutes.`);
  }
}

export class InsufficientCreditsError extends PipelineError {
  constructor(required: number, available: number) {
    super("insufficient_credits", "Insufficient credits.", `required=${required} available=${available}`);
  }
}

export class InvalidTransitionError extends PipelineError {
  constructor(from: string, to: string) {
    super("invalid_transition", "Processing failed unexpectedly.", `Illegal status transition ${from} -> ${to}`);
  }
}

export function describeFailure(error: unknown) {
  if (error instanceof PipelineError) {
    return error.message;
  }
  return "Processing failed unexpectedly.";
}

export function describeForLog(error: unknown) {
  if (error instanceof PipelineError) {
    return error.detail ? `${error.code}: ${error.message} (${error.detail})` : `${error.code}: ${error.message}`;
  }
  return error instanceof Error ? error.message : "Unknown error";
}
