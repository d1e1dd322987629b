import { describe, expect, it } from "vitest";
import { PLACEHOLDER_TRANSCRIPT } from "../../src/domain/transcript";
import { DescriptionSummarizer } from "../../src/infrastructure/transcription/descriptionSummarizer";

describe("description summarizer", () => {
  it("falls back to the placeholder without a description", async () => {
    const summarizer = new DescriptionSummarizer();
    expect(await summarizer.summarize({ inputPath: "in.mp4", description: null })).toBe(PLACEHOLDER_TRANSCRIPT);
    expect(await summarizer.summarize({ inputPath: "in.mp4", description: "  \n " })).toBe(PLACEHOLDER_TRANSCRIPT);
  });

  it("appends the collapsed description", async () => {
    const summary = await new DescriptionSummarizer().summarize({
      inputPath: "in.mp4",
      description: "Line one\n\nLine   two"
    });
    expect(summary).toBe(`${PLACEHOLDER_TRANSCRIPT} Uploader description: Line one Line two`);
  });
});
