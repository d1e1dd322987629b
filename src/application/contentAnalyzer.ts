import type { AnalysisError, AnalysisResult, Result } from "../domain/types";
import type { AiModelPort, ContentAnalyzerPort, LoggerPort, ResourceGuardPort } from "../interfaces/ports";
import { parseAnalysisResponse } from "./analysisResponse";
import { buildFallbackAnalysis } from "./fallbackAnalysis";

export interface ContentAnalyzerOptions {
  temperature: number;
  maxOutputTokens: number;
  minClipSec: number;
  maxClips: number;
}

type AnalysisInput = { title: string; transcript: string; durationSec: number };

export function buildAnalysisPrompt({ title, transcript, durationSec }: AnalysisInput) {
  return `Analyze this video content and find the most viral and engaging moments:

Title: ${title}
Duration: ${durationSec} seconds
Content Analysis: ${transcript}

Create clips that are:
1. 30-90 seconds long
2. Self-contained stories or key points
3. Have strong hooks in first 3 seconds
4. Include emotional or surprising moments

Respond with ONLY valid JSON in this exact format:
{
  "clips": [
    {
      "title": "Engaging clip title (max 50 chars)",
      "start_time": 30,
      "end_time": 90,
      "viral_score": 8.5,
      "rationale": "Why this clip will be viral"
    }
  ],
  "blog_article": "<h1>SEO Blog Article Title</h1><p>Full article content...</p>",
  "carousel_posts": [
    "Post 1: Hook + key insight",
    "Post 2: Detailed explanation",
    "Post 3: Call to action"
  ]
}`;
}

/**
 * Asks the model for clip candidates and falls back to an even split of the
 * video whenever the model is unavailable or its answer cannot be used.
 * `analyze` never rejects because of the model; only the memory guard can abort it.
 */
export class ContentAnalyzer implements ContentAnalyzerPort {
  constructor(
    private readonly model: AiModelPort,
    private readonly guard: ResourceGuardPort,
    private readonly logger: LoggerPort,
    private readonly options: ContentAnalyzerOptions
  ) {}

  async analyze(input: { jobId: string } & AnalysisInput): Promise<AnalysisResult> {
    this.guard.check("analysis:start");
    const outcome = await this.analyzeWithModel(input);
    if (outcome.ok) {
      await this.logger.info(input.jobId, `Parsed ${outcome.value.clips.length} valid clips from the model.`);
      return outcome.value;
    }

    await this.logger.warn(
      input.jobId,
      `AI analysis degraded (${outcome.error.kind}): ${outcome.error.detail}. Using fallback analysis.`
    );
    const fallback = buildFallbackAnalysis(input.title, input.durationSec);
    await this.logger.info(input.jobId, `Fallback analysis created with ${fallback.clips.length} clips.`);
    return fallback;
  }

  async analyzeWithModel(input: AnalysisInput): Promise<Result<AnalysisResult, AnalysisError>> {
    if (!this.model.available) {
      return { ok: false, error: { kind: "model_unavailable", detail: "no API key configured" } };
    }

    let text: string;
    try {
      text = await this.model.generate(buildAnalysisPrompt(input), {
        temperature: this.options.temperature,
        maxOutputTokens: this.options.maxOutputTokens
      });
    } catch (error) {
      return { ok: false, error: { kind: "model_error", detail: error instanceof Error ? error.message : "unknown error" } };
    }
    this.guard.check("analysis:response");

    return parseAnalysisResponse(text, {
      durationSec: input.durationSec,
      title: input.title,
      minClipSec: this.options.minClipSec,
      maxClips: this.options.maxClips
    });
  }
}
