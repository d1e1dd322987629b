import { z } from "zod";
import type { AnalysisError, AnalysisResult, Result, Segment } from "../domain/types";
import { buildFallbackArticle, buildFallbackPosts } from "./fallbackAnalysis";

const numeric = z.union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)]);

const candidateSchema = z.object({
  title: z.string().trim().min(1),
  start_time: numeric,
  end_time: numeric,
  viral_score: numeric,
  rationale: z.string().optional(),
  reason: z.string().optional()
});

const responseSchema = z.object({
  clips: z.array(z.unknown()).min(1),
  blog_article: z.string().optional().nullable(),
  carousel_posts: z.array(z.string()).optional().nullable()
});

export interface ResponseLimits {
  durationSec: number;
  title: string;
  minClipSec: number;
  maxClips: number;
}

export function stripCodeFence(text: string) {
  const trimmed = text.trim();
  const match = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return match ? match[1] : trimmed;
}

export function parseAnalysisResponse(text: string, limits: ResponseLimits): Result<AnalysisResult, AnalysisError> {
  let payload: unknown;
  try {
    payload = JSON.parse(stripCodeFence(text));
  } catch (error) {
    const detail = error instanceof Error ? error.message : "unparseable response";
    return { ok: false, error: { kind: "invalid_json", detail } };
  }

  const parsed = responseSchema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, error: { kind: "invalid_shape", detail: parsed.error.issues[0]?.message ?? "invalid response" } };
  }

  const clips: Segment[] = [];
  for (const candidate of parsed.data.clips) {
    if (clips.length >= limits.maxClips) {
      break;
    }
    const segment = toSegment(candidate, limits);
    if (segment) {
      clips.push(segment);
    }
  }

  if (!clips.length) {
    return { ok: false, error: { kind: "no_valid_clips", detail: `0 of ${parsed.data.clips.length} clips usable` } };
  }

  const posts = parsed.data.carousel_posts?.filter((post) => post.trim().length > 0) ?? [];
  return {
    ok: true,
    value: {
      clips,
      blogArticle: parsed.data.blog_article?.trim() || buildFallbackArticle(limits.title, limits.durationSec, clips.length),
      carouselPosts: posts.length ? posts : buildFallbackPosts(limits.title, clips.length),
      source: "model"
    }
  };
}

function toSegment(candidate: unknown, limits: ResponseLimits): Segment | null {
  const parsed = candidateSchema.safeParse(candidate);
  if (!parsed.success) {
    return null;
  }
  const { durationSec, minClipSec } = limits;
  const start = clamp(parsed.data.start_time, 0, Math.max(0, durationSec - minClipSec));
  const end = clamp(parsed.data.end_time, 0, durationSec);
  if (end - start < minClipSec) {
    return null;
  }
  return {
    start,
    end,
    title: parsed.data.title,
    score: clamp(parsed.data.viral_score, 0, 10),
    rationale: parsed.data.rationale ?? parsed.data.reason ?? ""
  };
}

function clamp(value: number, min: number, max: number) {
  return Math.max(min, Math.min(max, value));
}
