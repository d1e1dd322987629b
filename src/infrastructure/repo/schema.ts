import { randomUUID } from "node:crypto";
import { boolean, index, integer, jsonb, pgTable, real, serial, text, timestamp } from "drizzle-orm/pg-core";
import { JOB_STATUSES } from "../../domain/types";

export const users = pgTable("users", {
  id: text("id").primaryKey(),
  email: text("email").notNull().unique(),
  credits: integer("credits").notNull().default(30),
  isPremium: boolean("is_premium").notNull().default(false),
  premiumExpiresAt: timestamp("premium_expires_at"),
  createdAt: timestamp("created_at").notNull().defaultNow()
});

export const processingJobs = pgTable(
  "processing_jobs",
  {
    id: text("id").primaryKey(),
    userId: text("user_id")
      .notNull()
      .references(() => users.id),
    sourceUrl: text("source_url").notNull(),
    status: text("status", { enum: JOB_STATUSES }).notNull().default("pending"),
    progressMessage: text("progress_message"),
    originalTitle: text("original_title"),
    originalDescription: text("original_description"),
    videoDurationSec: real("video_duration_sec"),
    errorMessage: text("error_message"),
    clipsGenerated: integer("clips_generated").notNull().default(0),
    blogArticle: text("blog_article"),
    carouselPosts: jsonb("carousel_posts").$type<string[]>().notNull().default([]),
    creditsCharged: integer("credits_charged").notNull().default(0),
    createdAt: timestamp("created_at").notNull().defaultNow(),
    startedAt: timestamp("started_at"),
    completedAt: timestamp("completed_at"),
    processingTimeSec: integer("processing_time_sec")
  },
  (table) => ({
    userIdx: index("processing_jobs_user_idx").on(table.userId),
    statusIdx: index("processing_jobs_status_idx").on(table.status)
  })
);

export const clips = pgTable(
  "clips",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => randomUUID()),
    jobId: text("job_id")
      .notNull()
      .references(() => processingJobs.id, { onDelete: "cascade" }),
    filename: text("filename").notNull().unique(),
    title: text("title").notNull(),
    durationSec: real("duration_sec").notNull(),
    startSec: real("start_sec").notNull(),
    endSec: real("end_sec").notNull(),
    viralScore: real("viral_score").notNull(),
    rationale: text("rationale"),
    fileSizeBytes: integer("file_size_bytes"),
    resolution: text("resolution"),
    createdAt: timestamp("created_at").notNull().defaultNow()
  },
  (table) => ({
    jobIdx: index("clips_job_idx").on(table.jobId)
  })
);

export const jobLogs = pgTable("job_logs", {
  id: serial("id").primaryKey(),
  jobId: text("job_id").notNull(),
  level: text("level", { enum: ["info", "warn", "error"] }).notNull(),
  message: text("message").notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow()
});

export type JobRow = typeof processingJobs.$inferSelect;
export type ClipRow = typeof clips.$inferSelect;
