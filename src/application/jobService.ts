import type { FetchedVideo, JobRecord, JobStatus, TaskStatus } from "../domain/types";
import {
  InvalidTransitionError,
  NoClipsProducedError,
  TimeoutError,
  describeFailure,
  describeForLog
} from "../domain/errors";
import { assertTransition, isTerminal } from "../domain/jobStateMachine";
import { validateSourceUrl } from "../domain/sourceUrl";
import { PLACEHOLDER_TRANSCRIPT } from "../domain/transcript";
import type { PipelineConfig } from "../infrastructure/config";
import type {
  ClipRendererPort,
  ContentAnalyzerPort,
  ContentSummaryPort,
  JobPatch,
  JobQueuePort,
  JobRepositoryPort,
  LoggerPort,
  ProgressSink,
  ResourceGuardPort,
  StoragePort,
  VideoFetcherPort
} from "../interfaces/ports";

export interface JobDependencies {
  config: Pick<PipelineConfig, "creditCost" | "timeLimits" | "runInline">;
  repo: JobRepositoryPort;
  queue: JobQueuePort;
  fetcher: VideoFetcherPort;
  summarizer: ContentSummaryPort;
  analyzer: ContentAnalyzerPort;
  renderer: ClipRendererPort;
  storage: StoragePort;
  guard: ResourceGuardPort;
  logger: LoggerPort;
}

export interface ProcessOptions {
  progress?: ProgressSink;
  signal?: AbortSignal;
  now?: () => Date;
}

const silentProgress: ProgressSink = {
  async report() {}
};

/** Validates the URL, then charges credits and creates the job atomically. */
export async function createJob(input: { userId: string; sourceUrl: string }, deps: JobDependencies) {
  const sourceUrl = validateSourceUrl(input.sourceUrl);
  const job = await deps.repo.createJobWithCharge({
    userId: input.userId,
    sourceUrl,
    creditCost: deps.config.creditCost
  });
  await deps.logger.info(job.id, `Job created (credits charged: ${job.creditsCharged}).`);
  return job;
}

export async function submitJob(input: { userId: string; sourceUrl: string }, deps: JobDependencies) {
  const job = await createJob(input, deps);

  if (deps.config.runInline) {
    await deps.logger.info(job.id, "Inline processing enabled. Starting immediately.");
    runJobWithTimeLimits(job.id, deps).catch((error: unknown) => {
      console.error("Inline job crashed", job.id, error);
    });
    return job;
  }

  try {
    await deps.queue.enqueue(job.id, job.sourceUrl);
  } catch (error) {
    await deps.logger.error(job.id, `Enqueue failed: ${describeForLog(error)}`);
    await deps.repo.transitionJob(job.id, "pending", {
      status: "failed",
      errorMessage: "Failed to start video processing.",
      completedAt: new Date()
    });
    await deps.repo.refundCharge(job.id);
    throw error;
  }
  await deps.logger.info(job.id, "Job queued.");
  return job;
}

export async function processJob(jobId: string, deps: JobDependencies, options: ProcessOptions = {}) {
  const job = await deps.repo.getJob(jobId);
  if (!job) {
    return null;
  }
  if (job.status !== "pending") {
    await deps.logger.warn(jobId, `Job is already ${job.status}. Skipping.`);
    return job;
  }

  const progress = options.progress ?? silentProgress;
  const now = options.now ?? (() => new Date());
  const startedAt = now();
  const tracker = createStatusTracker(job, deps, progress, options.signal);
  let scratchDir: string | null = null;

  try {
    await tracker.advance("downloading", "Downloading video from YouTube...", { startedAt });
    scratchDir = await deps.storage.createScratchDir(jobId);
    deps.guard.check("download:start");
    const video = await deps.fetcher.fetch({ url: job.sourceUrl, scratchDir, signal: options.signal });
    deps.guard.check("download:end");
    await deps.logger.info(jobId, `Download completed: ${video.title} (${video.durationSec}s).`);

    await tracker.advance("processing", "Extracting audio and analyzing content...", {
      originalTitle: video.title,
      originalDescription: video.description,
      videoDurationSec: video.durationSec
    });
    const transcript = await summarizeContent(jobId, video, deps);

    await tracker.advance("analyzing", "AI is analyzing content for viral moments...");
    const analysis = await deps.analyzer.analyze({
      jobId,
      title: video.title,
      transcript,
      durationSec: video.durationSec
    });
    if (!analysis.clips.length) {
      throw new NoClipsProducedError("No clips could be generated from this video.");
    }

    await tracker.advance("creating_clips", `Creating ${analysis.clips.length} video clips...`);
    const clips = await deps.renderer.renderAll({
      jobId,
      inputPath: video.filePath,
      segments: analysis.clips,
      scratchDir,
      signal: options.signal
    });
    if (!clips.length) {
      throw new NoClipsProducedError();
    }

    options.signal?.throwIfAborted();
    await progress.report("saving", "Saving results to database...");
    assertTransition(tracker.current(), "completed");
    const completedAt = now();
    const message = `Created ${clips.length} clips.`;
    const completed = await deps.repo.completeJob(jobId, {
      clips,
      blogArticle: analysis.blogArticle,
      carouselPosts: analysis.carouselPosts,
      progressMessage: message,
      completedAt,
      processingTimeSec: Math.round((completedAt.getTime() - startedAt.getTime()) / 1000)
    });
    if (!completed) {
      throw new InvalidTransitionError(tracker.current(), "completed");
    }
    tracker.settle("completed");
    await progress.report("completed", message);
    await deps.logger.info(jobId, `Video processing completed successfully (${clips.length} clips, ${analysis.source} analysis).`);
    return completed;
  } catch (error) {
    return failJob(jobId, tracker.current(), error, deps, progress, now);
  } finally {
    await releaseScratch(jobId, scratchDir, deps);
  }
}

/**
 * Runs a job under the soft and hard time limits. The soft limit aborts the
 * job's signal so child processes die and the running stage fails; the hard
 * limit stops waiting altogether and marks the job failed.
 */
export async function runJobWithTimeLimits(
  jobId: string,
  deps: JobDependencies,
  options: Omit<ProcessOptions, "signal"> = {}
): Promise<{ job: JobRecord | null; timedOut: boolean }> {
  const { softMs, hardMs } = deps.config.timeLimits;
  const controller = new AbortController();
  const softTimer = setTimeout(() => controller.abort(new TimeoutError(softMs)), softMs);
  let hardTimer: ReturnType<typeof setTimeout> | undefined;
  const hardLimit = new Promise<"hard_timeout">((resolve) => {
    hardTimer = setTimeout(() => resolve("hard_timeout"), hardMs);
  });

  try {
    const outcome = await Promise.race([processJob(jobId, deps, { ...options, signal: controller.signal }), hardLimit]);
    if (outcome !== "hard_timeout") {
      return { job: outcome, timedOut: false };
    }
    controller.abort(new TimeoutError(hardMs));
    await deps.logger.error(jobId, `Hard time limit of ${hardMs}ms reached. Abandoning task.`);
    const job = await forceFail(jobId, new TimeoutError(hardMs), deps);
    await options.progress?.report("failed", describeFailure(new TimeoutError(hardMs)));
    return { job, timedOut: true };
  } finally {
    clearTimeout(softTimer);
    clearTimeout(hardTimer);
  }
}

export async function getTaskStatus(jobId: string, deps: Pick<JobDependencies, "repo">): Promise<TaskStatus | null> {
  const job = await deps.repo.getJob(jobId);
  if (!job) {
    return null;
  }

  if (job.status === "completed") {
    const clips = await deps.repo.listClips(jobId);
    return {
      state: "SUCCESS",
      result: {
        originalTitle: job.originalTitle ?? null,
        clips,
        blogArticle: job.blogArticle ?? "",
        carouselPosts: job.carouselPosts
      }
    };
  }
  if (job.status === "failed") {
    return { state: "FAILURE", status: job.errorMessage ?? "Processing failed" };
  }
  if (job.status === "pending") {
    return { state: "PENDING", status: job.progressMessage ?? "Waiting in queue..." };
  }
  return { state: "PROGRESS", status: job.progressMessage ?? `Processing: ${job.status}` };
}

function createStatusTracker(job: JobRecord, deps: JobDependencies, progress: ProgressSink, signal?: AbortSignal) {
  let current: JobStatus = job.status;

  return {
    current: () => current,
    settle(status: JobStatus) {
      current = status;
    },
    async advance(to: Exclude<JobStatus, "pending" | "completed" | "failed">, message: string, patch: JobPatch = {}) {
      signal?.throwIfAborted();
      assertTransition(current, to);
      const updated = await deps.repo.transitionJob(job.id, current, { ...patch, status: to, progressMessage: message });
      if (!updated) {
        throw new InvalidTransitionError(current, to);
      }
      current = to;
      await progress.report(to, message);
      await deps.logger.info(job.id, message);
    }
  };
}

async function summarizeContent(jobId: string, video: FetchedVideo, deps: JobDependencies) {
  try {
    return await deps.summarizer.summarize({ inputPath: video.filePath, description: video.description });
  } catch (error) {
    await deps.logger.warn(jobId, `Content summary unavailable (${describeForLog(error)}). Using placeholder.`);
    return PLACEHOLDER_TRANSCRIPT;
  }
}

async function failJob(
  jobId: string,
  current: JobStatus,
  error: unknown,
  deps: JobDependencies,
  progress: ProgressSink,
  now: () => Date
) {
  const message = describeFailure(error);
  await deps.logger.error(jobId, `Video processing failed: ${describeForLog(error)}`);
  if (isTerminal(current)) {
    return deps.repo.getJob(jobId);
  }

  try {
    const failed = await deps.repo.transitionJob(jobId, current, {
      status: "failed",
      errorMessage: message,
      progressMessage: message,
      completedAt: now()
    });
    await progress.report("failed", message);
    return failed;
  } catch (persistError) {
    await deps.logger.error(jobId, `Failed to save error status: ${describeForLog(persistError)}`);
    return null;
  }
}

async function forceFail(jobId: string, error: unknown, deps: JobDependencies) {
  const job = await deps.repo.getJob(jobId);
  if (!job || isTerminal(job.status)) {
    return job;
  }
  return deps.repo.transitionJob(jobId, job.status, {
    status: "failed",
    errorMessage: describeFailure(error),
    progressMessage: describeFailure(error),
    completedAt: new Date()
  });
}

async function releaseScratch(jobId: string, scratchDir: string | null, deps: JobDependencies) {
  try {
    await deps.guard.cleanup(scratchDir);
  } catch (error) {
    await deps.logger.warn(jobId, `Failed to clean scratch directory: ${describeForLog(error)}`);
  }
}

export const STALE_SCRATCH_MAX_AGE_MS = 7 * 24 * 60 * 60 * 1000;

/** Removes scratch directories left behind by workers that were killed mid-job. */
export async function sweepStaleScratch(deps: Pick<JobDependencies, "storage">, now = new Date()) {
  const removed = await deps.storage.sweepStaleScratch(STALE_SCRATCH_MAX_AGE_MS, now);
  if (removed.length) {
    console.info(`Removed ${removed.length} stale scratch directories.`);
  }
  return removed;
}
