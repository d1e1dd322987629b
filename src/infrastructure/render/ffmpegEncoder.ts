import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { MediaProbe, SegmentEncoderPort } from "../../interfaces/ports";
import { runCommand, type CommandRunner } from "../process/runCommand";

export interface EncodeProfile {
  width: number;
  height: number;
  videoBitrate: string;
  audioBitrate: string;
  fps: number;
  preset: string;
}

const probeSchema = z.object({
  streams: z
    .array(
      z.object({
        width: z.number().int().positive().optional(),
        height: z.number().int().positive().optional()
      })
    )
    .default([]),
  format: z
    .object({
      duration: z.coerce.number().nonnegative().optional()
    })
    .default({})
});

/**
 * Scales the source so its height fills the canvas, then center-crops a wide
 * frame or pads a narrow one to the exact canvas width.
 */
export function buildVerticalFilters(source: Pick<MediaProbe, "width" | "height">, profile: EncodeProfile) {
  const scaledWidth = evenFloor((source.width * profile.height) / source.height);
  const filters = [`scale=${scaledWidth}:${profile.height}`];

  if (scaledWidth > profile.width) {
    const x = Math.floor((scaledWidth - profile.width) / 2);
    filters.push(`crop=${profile.width}:${profile.height}:${x}:0`);
  } else if (scaledWidth < profile.width) {
    filters.push(`pad=${profile.width}:${profile.height}:(ow-iw)/2:0:black`);
  }

  filters.push(`fps=${profile.fps}`, "setsar=1");
  return filters.join(",");
}

export function buildEncodeArgs(options: {
  inputPath: string;
  outputPath: string;
  start: number;
  end: number;
  source: Pick<MediaProbe, "width" | "height">;
  profile: EncodeProfile;
}) {
  const { profile } = options;
  const duration = Math.max(0.1, options.end - options.start);
  return [
    "-y",
    "-v",
    "error",
    "-ss",
    options.start.toFixed(2),
    "-i",
    options.inputPath,
    "-t",
    duration.toFixed(2),
    "-vf",
    buildVerticalFilters(options.source, profile),
    "-c:v",
    "libx264",
    "-preset",
    profile.preset,
    "-b:v",
    profile.videoBitrate,
    "-r",
    String(profile.fps),
    "-pix_fmt",
    "yuv420p",
    "-c:a",
    "aac",
    "-b:a",
    profile.audioBitrate,
    "-movflags",
    "+faststart",
    options.outputPath
  ];
}

export class FfmpegEncoder implements SegmentEncoderPort {
  constructor(
    private readonly profile: EncodeProfile,
    private readonly run: CommandRunner = runCommand
  ) {}

  async probe(inputPath: string, signal?: AbortSignal): Promise<MediaProbe> {
    const args = [
      "-v",
      "error",
      "-select_streams",
      "v:0",
      "-show_entries",
      "stream=width,height:format=duration",
      "-of",
      "json",
      inputPath
    ];
    const { stdout } = await this.run("ffprobe", args, { signal });

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch {
      throw new Error(`ffprobe returned invalid JSON. ${stdout.trim().replaceAll(/\s+/g, " ")}`.trim());
    }
    const parsed = probeSchema.parse(json);
    const stream = parsed.streams[0];
    if (!stream?.width || !stream.height) {
      throw new Error("ffprobe found no video stream.");
    }
    const durationSec = parsed.format.duration;
    if (!durationSec) {
      throw new Error("ffprobe reported no duration.");
    }
    return { width: stream.width, height: stream.height, durationSec };
  }

  /** Encodes into the segment's work dir first so a half-written file never lands in the clips dir. */
  async encode(options: {
    inputPath: string;
    outputPath: string;
    start: number;
    end: number;
    source: MediaProbe;
    workDir: string;
    signal?: AbortSignal;
  }) {
    await fs.mkdir(options.workDir, { recursive: true });
    const staged = path.join(options.workDir, "segment.mp4");
    await this.run(
      "ffmpeg",
      buildEncodeArgs({ ...options, outputPath: staged, profile: this.profile }),
      { signal: options.signal }
    );
    await fs.copyFile(staged, options.outputPath);
  }
}

function evenFloor(value: number) {
  return Math.max(2, Math.floor(value / 2) * 2);
}
