import type { AnalysisResult, Segment } from "../domain/types";

const MIN_SEGMENTS = 3;
const MAX_SEGMENTS = 6;
const MAX_CLIP_SEC = 60;
const CLIP_WIDTH_RATIO = 0.8;
const MIN_FALLBACK_CLIP_SEC = 15;
const TOP_SCORE = 9;
const SCORE_STEP = 0.5;
const SCORE_FLOOR = 5;

export function fallbackSegmentCount(durationSec: number) {
  return Math.min(MAX_SEGMENTS, Math.max(MIN_SEGMENTS, Math.floor(durationSec / 60)));
}

export function fallbackScore(index: number) {
  return Math.max(SCORE_FLOOR, TOP_SCORE - index * SCORE_STEP);
}

/**
 * Splits the video into equal windows and takes the first 80% of each one,
 * capped at a minute. Windows that end up shorter than 15s are skipped.
 */
export function buildFallbackSegments(title: string, durationSec: number): Segment[] {
  const count = fallbackSegmentCount(durationSec);
  const width = durationSec / count;
  const segments: Segment[] = [];

  for (let index = 0; index < count; index += 1) {
    const start = index * width;
    const length = Math.min(MAX_CLIP_SEC, width * CLIP_WIDTH_RATIO);
    const end = Math.min(start + length, durationSec);
    if (end - start < MIN_FALLBACK_CLIP_SEC) {
      continue;
    }
    segments.push({
      start: roundTenth(start),
      end: roundTenth(end),
      title: `Highlight #${index + 1} - ${title.slice(0, 30)}`,
      score: fallbackScore(index),
      rationale: "Segment chosen from an even split of the video duration."
    });
  }

  return segments;
}

export function buildFallbackArticle(title: string, durationSec: number, clipCount: number) {
  return [
    `<h1>${escapeHtml(title)} - Video Content Analysis</h1>`,
    `<p>This video runs for ${Math.round(durationSec)} seconds. We identified ${clipCount} moments with strong potential to go viral.</p>`,
    "<h2>Video Highlights</h2>",
    "<p>Each clip was picked for its engagement potential and content quality. The original video carries information that can hold the attention of its target audience.</p>"
  ].join("\n");
}

export function buildFallbackPosts(title: string, clipCount: number) {
  return [
    `🎬 Thread: ${title.slice(0, 50)}... - key insights from this video!`,
    `💡 Tip #1: We pulled ${clipCount} standout moments. Great content starts with picking the right moment.`,
    "🚀 Tip #2: Every clip should stand on its own for your audience.",
    "✨ Takeaway: with the right tools, one video becomes a week of content!"
  ];
}

export function buildFallbackAnalysis(title: string, durationSec: number): AnalysisResult {
  const clips = buildFallbackSegments(title, durationSec);
  return {
    clips,
    blogArticle: buildFallbackArticle(title, durationSec, clips.length),
    carouselPosts: buildFallbackPosts(title, clips.length),
    source: "fallback"
  };
}

function roundTenth(value: number) {
  return Math.round(value * 10) / 10;
}

function escapeHtml(value: string) {
  return value.replaceAll("&", "&amp;").replaceAll("<", "&lt;").replaceAll(">", "&gt;");
}
