import os from "node:os";
import path from "node:path";
import { z } from "zod";

const PLACEHOLDER_KEYS = new Set(["", "your_gemini_api_key_here"]);

const positiveInt = (fallback: number) =>
  z.preprocess((value) => {
    const parsed = Number.parseInt(typeof value === "string" ? value : "", 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
  }, z.number().int().positive());

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  REDIS_URL: z.string().default("redis://localhost:6379"),
  STORAGE_PATH: z.string().optional(),
  CLIPS_PATH: z.string().optional(),
  SCRATCH_PATH: z.string().optional(),
  LOGS_PATH: z.string().optional(),
  LOG_TO_DB: z.string().optional(),
  GEMINI_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().default("gemini-2.0-flash"),
  MAX_MEMORY_MB: positiveInt(2048),
  MAX_DURATION_SEC: positiveInt(10800),
  MAX_FILE_SIZE_MB: positiveInt(500),
  MAX_HEIGHT: positiveInt(720),
  CREDIT_COST: positiveInt(10),
  SOFT_TIME_LIMIT_MS: positiveInt(60 * 60 * 1000),
  HARD_TIME_LIMIT_MS: positiveInt(70 * 60 * 1000),
  WORKER_CONCURRENCY: positiveInt(1),
  WORKER_COUNT: positiveInt(1),
  WORKER_MAX_TASKS: positiveInt(100),
  RUN_INLINE: z.string().optional()
});

export interface PipelineConfig {
  databaseUrl: string | null;
  redisUrl: string;
  paths: {
    storage: string;
    clips: string;
    scratch: string;
    logs: string;
  };
  logToDb: boolean;
  ai: {
    apiKey: string | null;
    model: string;
    temperature: number;
    maxOutputTokens: number;
  };
  limits: {
    maxMemoryMb: number;
    maxDurationSec: number;
    maxFileSizeBytes: number;
    maxHeight: number;
    minFileSizeBytes: number;
  };
  render: {
    width: number;
    height: number;
    videoBitrate: string;
    audioBitrate: string;
    fps: number;
    preset: string;
    minClipSec: number;
    maxClips: number;
  };
  creditCost: number;
  timeLimits: {
    softMs: number;
    hardMs: number;
  };
  worker: {
    concurrency: number;
    count: number;
    maxTasks: number;
  };
  runInline: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): PipelineConfig {
  const parsed = envSchema.parse(env);
  const storage = parsed.STORAGE_PATH ?? path.join(cwd, "storage");
  const apiKey = parsed.GEMINI_API_KEY?.trim() ?? "";
  const hardMs = Math.max(parsed.HARD_TIME_LIMIT_MS, parsed.SOFT_TIME_LIMIT_MS);

  return {
    databaseUrl: parsed.DATABASE_URL ?? null,
    redisUrl: parsed.REDIS_URL,
    paths: {
      storage,
      clips: parsed.CLIPS_PATH ?? path.join(storage, "clips"),
      scratch: parsed.SCRATCH_PATH ?? os.tmpdir(),
      logs: parsed.LOGS_PATH ?? path.join(cwd, "logs")
    },
    logToDb: parsed.LOG_TO_DB !== "false" && Boolean(parsed.DATABASE_URL),
    ai: {
      apiKey: PLACEHOLDER_KEYS.has(apiKey) ? null : apiKey,
      model: parsed.GEMINI_MODEL,
      temperature: 0.7,
      maxOutputTokens: 4000
    },
    limits: {
      maxMemoryMb: parsed.MAX_MEMORY_MB,
      maxDurationSec: parsed.MAX_DURATION_SEC,
      maxFileSizeBytes: parsed.MAX_FILE_SIZE_MB * 1024 * 1024,
      maxHeight: parsed.MAX_HEIGHT,
      minFileSizeBytes: 1024
    },
    render: {
      width: 720,
      height: 1280,
      videoBitrate: "1500k",
      audioBitrate: "128k",
      fps: 24,
      preset: "fast",
      minClipSec: 10,
      maxClips: 8
    },
    creditCost: parsed.CREDIT_COST,
    timeLimits: {
      softMs: parsed.SOFT_TIME_LIMIT_MS,
      hardMs
    },
    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
      count: parsed.WORKER_COUNT,
      maxTasks: parsed.WORKER_MAX_TASKS
    },
    runInline: parsed.RUN_INLINE === "true"
  };
}
