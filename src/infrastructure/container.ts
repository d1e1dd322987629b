import type { JobDependencies } from "../application/jobService";
import { ClipRenderer } from "../application/clipRenderer";
import { ContentAnalyzer } from "../application/contentAnalyzer";
import { GeminiModel } from "./ai/geminiModel";
import { loadConfig, type PipelineConfig } from "./config";
import { LocalLogger } from "./logger/localLogger";
import { RedisQueue } from "./queue/redisQueue";
import { FfmpegEncoder } from "./render/ffmpegEncoder";
import { getDb } from "./repo/db";
import { DrizzleJobRepository } from "./repo/jobRepository";
import { MemoryGuard } from "./resources/memoryGuard";
import { LocalStorage } from "./storage/localStorage";
import { DescriptionSummarizer } from "./transcription/descriptionSummarizer";
import { YtdlpFetcher } from "./video/ytdlpFetcher";

export type AppDependencies = JobDependencies & {
  config: PipelineConfig;
  queue: RedisQueue;
};

let cached: AppDependencies | null = null;

export function getDependencies(config: PipelineConfig = loadConfig()): AppDependencies {
  if (cached) {
    return cached;
  }
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is not set.");
  }

  const db = getDb(config.databaseUrl);
  const storage = new LocalStorage({ clips: config.paths.clips, scratch: config.paths.scratch });
  const logger = new LocalLogger(config.paths.logs, config.logToDb ? db : null);
  const guard = new MemoryGuard(config.limits.maxMemoryMb, storage);

  cached = {
    config,
    repo: new DrizzleJobRepository(db),
    queue: new RedisQueue(config.redisUrl),
    fetcher: new YtdlpFetcher(config.limits),
    summarizer: new DescriptionSummarizer(),
    analyzer: new ContentAnalyzer(new GeminiModel(config.ai), guard, logger, {
      temperature: config.ai.temperature,
      maxOutputTokens: config.ai.maxOutputTokens,
      minClipSec: config.render.minClipSec,
      maxClips: config.render.maxClips
    }),
    renderer: new ClipRenderer(new FfmpegEncoder(config.render), storage, guard, logger, {
      width: config.render.width,
      height: config.render.height,
      minClipSec: config.render.minClipSec,
      minFileSizeBytes: config.limits.minFileSizeBytes
    }),
    storage,
    guard,
    logger
  };

  return cached;
}
