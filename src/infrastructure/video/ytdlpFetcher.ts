import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DownloadFailedError, PipelineError, UnsupportedContentError } from "../../domain/errors";
import { validateSourceUrl } from "../../domain/sourceUrl";
import type { FetchedVideo } from "../../domain/types";
import type { VideoFetcherPort } from "../../interfaces/ports";
import { runCommand, type CommandRunner } from "../process/runCommand";

export const DEFAULT_DURATION_SEC = 60;

export interface FetchLimits {
  maxDurationSec: number;
  maxFileSizeBytes: number;
  minFileSizeBytes: number;
  maxHeight: number;
}

const metadataSchema = z.object({
  title: z.string().nullish(),
  description: z.string().nullish(),
  duration: z.number().nonnegative().nullish(),
  is_live: z.boolean().nullish(),
  live_status: z.string().nullish(),
  filesize: z.number().nullish(),
  filesize_approx: z.number().nullish()
});

export type VideoMetadata = z.infer<typeof metadataSchema>;

export function buildFormatSelector(limits: Pick<FetchLimits, "maxHeight" | "maxFileSizeBytes">) {
  const sizeMb = Math.floor(limits.maxFileSizeBytes / 1024 / 1024);
  return `best[height<=${limits.maxHeight}][filesize<${sizeMb}M]/best[height<=480]`;
}

/** Throws UnsupportedContentError when the metadata breaks a duration, live or size ceiling. */
export function assertSupported(metadata: VideoMetadata, limits: FetchLimits) {
  if (metadata.duration && metadata.duration > limits.maxDurationSec) {
    const hours = Math.round((limits.maxDurationSec / 3600) * 10) / 10;
    throw new UnsupportedContentError(
      `Video too long. Maximum duration is ${hours} hours.`,
      `duration=${metadata.duration}s`
    );
  }
  if (metadata.is_live || metadata.live_status === "is_live") {
    throw new UnsupportedContentError("Live streams are not supported.");
  }
  const approxSize = metadata.filesize ?? metadata.filesize_approx;
  if (approxSize && approxSize > limits.maxFileSizeBytes) {
    const limitMb = Math.floor(limits.maxFileSizeBytes / 1024 / 1024);
    throw new UnsupportedContentError(
      `Video file is too large. Maximum size is ${limitMb}MB.`,
      `approx=${approxSize} bytes`
    );
  }
}

export class YtdlpFetcher implements VideoFetcherPort {
  constructor(
    private readonly limits: FetchLimits,
    private readonly run: CommandRunner = runCommand
  ) {}

  async fetch(options: { url: string; scratchDir: string; signal?: AbortSignal }): Promise<FetchedVideo> {
    const url = validateSourceUrl(options.url);
    const metadata = await this.resolveMetadata(url, options.signal);
    assertSupported(metadata, this.limits);

    await this.download(url, options.scratchDir, options.signal);
    const filePath = await this.locateDownload(options.scratchDir);

    return {
      filePath,
      title: metadata.title?.trim() || "Unknown Title",
      description: metadata.description?.trim() || null,
      durationSec: metadata.duration || DEFAULT_DURATION_SEC
    };
  }

  async resolveMetadata(url: string, signal?: AbortSignal): Promise<VideoMetadata> {
    // Sizes in the dump describe the selected format, so select the one download() fetches.
    const args = [
      "--dump-single-json",
      "-f",
      buildFormatSelector(this.limits),
      "--no-playlist",
      "--skip-download",
      "--no-warnings",
      "--socket-timeout",
      "30",
      url
    ];
    let payload: unknown;
    try {
      const { stdout } = await this.run("yt-dlp", args, { signal });
      payload = JSON.parse(stdout);
    } catch (error) {
      throw this.wrap(error, "Failed to get video information.", signal);
    }

    const parsed = metadataSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DownloadFailedError("Failed to get video information.", parsed.error.issues[0]?.message);
    }
    return parsed.data;
  }

  private async download(url: string, scratchDir: string, signal?: AbortSignal) {
    const args = [
      "-f",
      buildFormatSelector(this.limits),
      "--no-playlist",
      "--no-part",
      "--no-warnings",
      "--retries",
      "3",
      "--socket-timeout",
      "30",
      "-o",
      path.join(scratchDir, "video.%(ext)s"),
      url
    ];
    try {
      await this.run("yt-dlp", args, { signal });
    } catch (error) {
      throw this.wrap(error, "Failed to download video.", signal);
    }
  }

  private async locateDownload(scratchDir: string) {
    const entries = await fs.readdir(scratchDir);
    const name = entries.find((entry) => entry.startsWith("video."));
    if (!name) {
      throw new DownloadFailedError("Failed to download video.", "Downloaded video file not found");
    }

    const filePath = path.join(scratchDir, name);
    const { size } = await fs.stat(filePath);
    if (size < this.limits.minFileSizeBytes) {
      throw new DownloadFailedError("Failed to download video.", `Downloaded file is too small (${size} bytes)`);
    }
    if (size > this.limits.maxFileSizeBytes) {
      throw new DownloadFailedError("Failed to download video.", `Downloaded file is too large (${size} bytes)`);
    }
    return filePath;
  }

  private wrap(error: unknown, message: string, signal?: AbortSignal) {
    if (signal?.aborted || error instanceof PipelineError) {
      return error;
    }
    return new DownloadFailedError(message, error instanceof Error ? error.message : undefined);
  }
}
