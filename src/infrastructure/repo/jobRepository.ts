import { randomBytes } from "node:crypto";
import { and, asc, desc, eq, sql } from "drizzle-orm";
import { creditCharge } from "../../domain/account";
import { InsufficientCreditsError } from "../../domain/errors";
import type { ClipRecord, JobRecord, JobStatus, RenderedClip } from "../../domain/types";
import type { JobPatch, JobRepositoryPort } from "../../interfaces/ports";
import type { Database } from "./db";
import { clips, processingJobs, users, type ClipRow, type JobRow } from "./schema";

export function createJobId() {
  return randomBytes(32).toString("base64url");
}

const toJobRecord = (job: JobRow): JobRecord => ({
  id: job.id,
  userId: job.userId,
  sourceUrl: job.sourceUrl,
  status: job.status,
  progressMessage: job.progressMessage,
  originalTitle: job.originalTitle,
  originalDescription: job.originalDescription,
  videoDurationSec: job.videoDurationSec,
  errorMessage: job.errorMessage,
  clipsGenerated: job.clipsGenerated,
  blogArticle: job.blogArticle,
  carouselPosts: job.carouselPosts,
  createdAt: job.createdAt,
  startedAt: job.startedAt,
  completedAt: job.completedAt,
  processingTimeSec: job.processingTimeSec,
  creditsCharged: job.creditsCharged
});

const toClipRecord = (clip: ClipRow): ClipRecord => ({
  id: clip.id,
  jobId: clip.jobId,
  filename: clip.filename,
  title: clip.title,
  durationSec: clip.durationSec,
  startSec: clip.startSec,
  endSec: clip.endSec,
  viralScore: clip.viralScore,
  rationale: clip.rationale,
  fileSizeBytes: clip.fileSizeBytes,
  resolution: clip.resolution,
  createdAt: clip.createdAt
});

export class DrizzleJobRepository implements JobRepositoryPort {
  constructor(private readonly db: Database) {}

  async createJobWithCharge(options: { userId: string; sourceUrl: string; creditCost: number }): Promise<JobRecord> {
    return this.db.transaction(async (tx) => {
      const [account] = await tx.select().from(users).where(eq(users.id, options.userId)).for("update");
      if (!account) {
        throw new InsufficientCreditsError(options.creditCost, 0);
      }

      const charge = creditCharge(account, options.creditCost);
      if (charge > 0) {
        await tx
          .update(users)
          .set({ credits: sql`${users.credits} - ${charge}` })
          .where(eq(users.id, account.id));
      }

      const [job] = await tx
        .insert(processingJobs)
        .values({
          id: createJobId(),
          userId: account.id,
          sourceUrl: options.sourceUrl,
          status: "pending",
          progressMessage: "Waiting in queue...",
          creditsCharged: charge
        })
        .returning();
      return toJobRecord(job);
    });
  }

  async refundCharge(jobId: string) {
    await this.db.transaction(async (tx) => {
      const [job] = await tx.select().from(processingJobs).where(eq(processingJobs.id, jobId)).for("update");
      if (!job || job.creditsCharged <= 0) {
        return;
      }
      await tx
        .update(users)
        .set({ credits: sql`${users.credits} + ${job.creditsCharged}` })
        .where(eq(users.id, job.userId));
      await tx.update(processingJobs).set({ creditsCharged: 0 }).where(eq(processingJobs.id, jobId));
    });
  }

  async getJob(jobId: string): Promise<JobRecord | null> {
    const [job] = await this.db.select().from(processingJobs).where(eq(processingJobs.id, jobId)).limit(1);
    return job ? toJobRecord(job) : null;
  }

  async transitionJob(jobId: string, from: JobStatus, patch: JobPatch & { status: JobStatus }): Promise<JobRecord | null> {
    const [job] = await this.db
      .update(processingJobs)
      .set(patch)
      .where(and(eq(processingJobs.id, jobId), eq(processingJobs.status, from)))
      .returning();
    return job ? toJobRecord(job) : null;
  }

  async completeJob(
    jobId: string,
    result: {
      clips: RenderedClip[];
      blogArticle: string;
      carouselPosts: string[];
      progressMessage: string;
      completedAt: Date;
      processingTimeSec: number | null;
    }
  ): Promise<JobRecord | null> {
    return this.db.transaction(async (tx) => {
      const [job] = await tx
        .update(processingJobs)
        .set({
          status: "completed",
          clipsGenerated: result.clips.length,
          blogArticle: result.blogArticle,
          carouselPosts: result.carouselPosts,
          progressMessage: result.progressMessage,
          completedAt: result.completedAt,
          processingTimeSec: result.processingTimeSec,
          errorMessage: null
        })
        .where(and(eq(processingJobs.id, jobId), eq(processingJobs.status, "creating_clips")))
        .returning();
      if (!job) {
        return null;
      }
      if (result.clips.length) {
        await tx.insert(clips).values(result.clips.map((clip) => ({ ...clip, jobId })));
      }
      return toJobRecord(job);
    });
  }

  async listClips(jobId: string): Promise<ClipRecord[]> {
    const rows = await this.db
      .select()
      .from(clips)
      .where(eq(clips.jobId, jobId))
      .orderBy(desc(clips.viralScore), asc(clips.filename));
    return rows.map(toClipRecord);
  }
}
