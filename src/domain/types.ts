export const JOB_STATUSES = [
  "pending",
  "downloading",
  "processing",
  "analyzing",
  "creating_clips",
  "completed",
  "failed"
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type ProgressStage = Exclude<JobStatus, "pending"> | "saving";

export interface JobRecord {
  id: string;
  userId: string;
  sourceUrl: string;
  status: JobStatus;
  progressMessage?: string | null;
  originalTitle?: string | null;
  originalDescription?: string | null;
  videoDurationSec?: number | null;
  errorMessage?: string | null;
  clipsGenerated: number;
  blogArticle?: string | null;
  carouselPosts: string[];
  createdAt: Date;
  startedAt?: Date | null;
  completedAt?: Date | null;
  processingTimeSec?: number | null;
  creditsCharged: number;
}

export interface ClipRecord {
  id: string;
  jobId: string;
  filename: string;
  title: string;
  durationSec: number;
  startSec: number;
  endSec: number;
  viralScore: number;
  rationale?: string | null;
  fileSizeBytes?: number | null;
  resolution?: string | null;
  createdAt: Date;
}

export interface AccountRecord {
  id: string;
  credits: number;
  isPremium: boolean;
  premiumExpiresAt?: Date | null;
}

export interface Segment {
  start: number;
  end: number;
  title: string;
  score: number;
  rationale: string;
}

export interface AnalysisResult {
  clips: Segment[];
  blogArticle: string;
  carouselPosts: string[];
  source: "model" | "fallback";
}

export type AnalysisErrorKind = "model_unavailable" | "model_error" | "invalid_json" | "invalid_shape" | "no_valid_clips";

export interface AnalysisError {
  kind: AnalysisErrorKind;
  detail: string;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export interface FetchedVideo {
  filePath: string;
  title: string;
  description: string | null;
  durationSec: number;
}

export interface RenderedClip {
  filename: string;
  title: string;
  durationSec: number;
  startSec: number;
  endSec: number;
  viralScore: number;
  rationale: string;
  fileSizeBytes: number;
  resolution: string;
}

export type TaskStatus =
  | { state: "PENDING"; status: string }
  | { state: "PROGRESS"; status: string }
  | {
      state: "SUCCESS";
      result: {
        originalTitle: string | null;
        clips: ClipRecord[];
        blogArticle: string;
        carouselPosts: string[];
      };
    }
  | { state: "FAILURE"; status: string };
