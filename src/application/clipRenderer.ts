import path from "node:path";
import type { RenderedClip, Segment } from "../domain/types";
import { NoClipsProducedError, PipelineError } from "../domain/errors";
import type {
  ClipRendererPort,
  LoggerPort,
  MediaProbe,
  ResourceGuardPort,
  SegmentEncoderPort,
  StoragePort
} from "../interfaces/ports";
import { buildClipFilename, type ClipNamer } from "./clipNaming";

export interface ClipRendererOptions {
  width: number;
  height: number;
  minClipSec: number;
  minFileSizeBytes: number;
}

export function clampSegment(segment: Pick<Segment, "start" | "end">, sourceDurationSec: number, minClipSec: number) {
  const start = Math.max(0, segment.start);
  const end = Math.min(segment.end, sourceDurationSec);
  if (!Number.isFinite(start) || !Number.isFinite(end) || end <= start || end - start < minClipSec) {
    return null;
  }
  return { start, end };
}

export class ClipRenderer implements ClipRendererPort {
  constructor(
    private readonly encoder: SegmentEncoderPort,
    private readonly storage: StoragePort,
    private readonly guard: ResourceGuardPort,
    private readonly logger: LoggerPort,
    private readonly options: ClipRendererOptions,
    private readonly nameClip: ClipNamer = buildClipFilename
  ) {}

  async renderAll(options: {
    jobId: string;
    inputPath: string;
    segments: Segment[];
    scratchDir: string;
    signal?: AbortSignal;
  }): Promise<RenderedClip[]> {
    const { jobId, segments, signal } = options;
    this.guard.check("render:start");
    const source = await this.probeSource(jobId, options.inputPath, signal);
    await this.storage.ensureClipsDir();
    await this.logger.info(jobId, `Creating ${segments.length} clips from ${source.width}x${source.height} source.`);

    const rendered: RenderedClip[] = [];
    for (const [index, segment] of segments.entries()) {
      signal?.throwIfAborted();
      this.guard.check(`render:segment:${index + 1}`);

      const window = clampSegment(segment, source.durationSec, this.options.minClipSec);
      if (!window) {
        await this.logger.warn(jobId, `Clip ${index + 1} has an invalid or too short range (${segment.start}-${segment.end}s), skipping.`);
        continue;
      }

      const clip = await this.renderSegment({ ...options, index, segment, window, source });
      if (clip) {
        rendered.push(clip);
      }
    }

    await this.logger.info(jobId, `Clip creation completed: ${rendered.length}/${segments.length} clips created.`);
    return rendered;
  }

  private async probeSource(jobId: string, inputPath: string, signal?: AbortSignal) {
    try {
      return await this.encoder.probe(inputPath, signal);
    } catch (error) {
      if (error instanceof PipelineError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : "unknown probe error";
      await this.logger.error(jobId, `Failed to load video file: ${detail}`);
      throw new NoClipsProducedError("Failed to read the downloaded video.", detail);
    }
  }

  private async renderSegment(options: {
    jobId: string;
    inputPath: string;
    scratchDir: string;
    signal?: AbortSignal;
    index: number;
    segment: Segment;
    window: { start: number; end: number };
    source: MediaProbe;
  }): Promise<RenderedClip | null> {
    const { jobId, index, segment, window, signal } = options;
    const filename = this.nameClip({ index, title: segment.title });
    const outputPath = this.storage.clipPath(filename);
    const workDir = path.join(options.scratchDir, `segment-${index + 1}`);

    try {
      await this.encoder.encode({
        inputPath: options.inputPath,
        outputPath,
        start: window.start,
        end: window.end,
        source: options.source,
        workDir,
        signal
      });

      const size = await this.storage.fileSize(outputPath);
      if (size === null || size <= this.options.minFileSizeBytes) {
        await this.logger.error(jobId, `Output file verification failed for clip ${index + 1}.`);
        await this.storage.removeFile(outputPath);
        return null;
      }

      await this.logger.info(jobId, `Clip saved: ${filename} (${Math.floor(size / 1024 / 1024)}MB).`);
      return {
        filename,
        title: segment.title,
        durationSec: window.end - window.start,
        startSec: window.start,
        endSec: window.end,
        viralScore: Math.max(0, Math.min(10, segment.score)),
        rationale: segment.rationale,
        fileSizeBytes: size,
        resolution: `${this.options.width}x${this.options.height}`
      };
    } catch (error) {
      await this.storage.removeFile(outputPath);
      if (signal?.aborted || error instanceof PipelineError) {
        throw error;
      }
      const detail = error instanceof Error ? error.message : "unknown error";
      await this.logger.error(jobId, `Failed to render clip ${index + 1}: ${detail}`);
      return null;
    } finally {
      await this.storage.removeDir(workDir);
      this.guard.release();
    }
  }
}
