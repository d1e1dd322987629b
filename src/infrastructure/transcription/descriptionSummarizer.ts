import { PLACEHOLDER_TRANSCRIPT } from "../../domain/transcript";
import type { ContentSummaryPort } from "../../interfaces/ports";

const MAX_DESCRIPTION_CHARS = 2000;

/**
 * Builds the content summary handed to the analyzer. Real transcription is not
 * wired in, so the uploader's description stands in when there is one.
 */
export class DescriptionSummarizer implements ContentSummaryPort {
  async summarize(options: { inputPath: string; description: string | null }) {
    const description = options.description?.replaceAll(/\s+/g, " ").trim();
    if (!description) {
      return PLACEHOLDER_TRANSCRIPT;
    }
    return `${PLACEHOLDER_TRANSCRIPT} Uploader description: ${description.slice(0, MAX_DESCRIPTION_CHARS)}`;
  }
}
