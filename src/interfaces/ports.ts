import type {
  AnalysisResult,
  ClipRecord,
  FetchedVideo,
  JobRecord,
  JobStatus,
  ProgressStage,
  RenderedClip,
  Segment
} from "../domain/types";

export interface VideoFetcherPort {
  fetch(options: { url: string; scratchDir: string; signal?: AbortSignal }): Promise<FetchedVideo>;
}

export interface ContentSummaryPort {
  summarize(options: { inputPath: string; description: string | null }): Promise<string>;
}

export interface AiModelPort {
  readonly available: boolean;
  generate(prompt: string, options: { temperature: number; maxOutputTokens: number }): Promise<string>;
}

export interface ContentAnalyzerPort {
  analyze(options: { jobId: string; title: string; transcript: string; durationSec: number }): Promise<AnalysisResult>;
}

export interface MediaProbe {
  durationSec: number;
  width: number;
  height: number;
}

export interface SegmentEncoderPort {
  probe(inputPath: string, signal?: AbortSignal): Promise<MediaProbe>;
  encode(options: {
    inputPath: string;
    outputPath: string;
    start: number;
    end: number;
    source: MediaProbe;
    workDir: string;
    signal?: AbortSignal;
  }): Promise<void>;
}

export interface ClipRendererPort {
  renderAll(options: {
    jobId: string;
    inputPath: string;
    segments: Segment[];
    scratchDir: string;
    signal?: AbortSignal;
  }): Promise<RenderedClip[]>;
}

export interface ResourceGuardPort {
  check(label: string): number;
  release(): void;
  cleanup(scratchDir: string | null): Promise<void>;
}

export interface StoragePort {
  createScratchDir(jobId: string): Promise<string>;
  removeDir(dir: string): Promise<void>;
  ensureClipsDir(): Promise<string>;
  clipPath(filename: string): string;
  fileSize(filePath: string): Promise<number | null>;
  removeFile(filePath: string): Promise<void>;
  sweepStaleScratch(maxAgeMs: number, now?: Date): Promise<string[]>;
}

export interface JobQueuePort {
  enqueue(jobId: string, sourceUrl: string): Promise<void>;
}

export interface ProgressSink {
  report(stage: ProgressStage, message: string): Promise<void>;
}

export type JobPatch = Partial<Omit<JobRecord, "id" | "userId" | "sourceUrl" | "createdAt" | "creditsCharged">>;

export interface JobRepositoryPort {
  /** Deducts the credit cost (unless premium is active) and inserts the job in one transaction. */
  createJobWithCharge(options: { userId: string; sourceUrl: string; creditCost: number }): Promise<JobRecord>;
  refundCharge(jobId: string): Promise<void>;
  getJob(jobId: string): Promise<JobRecord | null>;
  /** Applies the patch only while the job is still in `from`; returns null otherwise. */
  transitionJob(jobId: string, from: JobStatus, patch: JobPatch & { status: JobStatus }): Promise<JobRecord | null>;
  completeJob(
    jobId: string,
    result: {
      clips: RenderedClip[];
      blogArticle: string;
      carouselPosts: string[];
      progressMessage: string;
      completedAt: Date;
      processingTimeSec: number | null;
    }
  ): Promise<JobRecord | null>;
  listClips(jobId: string): Promise<ClipRecord[]>;
}

export interface LoggerPort {
  info(jobId: string, message: string): Promise<void>;
  warn(jobId: string, message: string): Promise<void>;
  error(jobId: string, message: string): Promise<void>;
}
