import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { DownloadFailedError, InvalidSourceError, UnsupportedContentError } from "../../src/domain/errors";
import type { CommandRunner } from "../../src/infrastructure/process/runCommand";
import { YtdlpFetcher, buildFormatSelector } from "../../src/infrastructure/video/ytdlpFetcher";

const limits = {
  maxDurationSec: 10800,
  maxFileSizeBytes: 500 * 1024 * 1024,
  minFileSizeBytes: 1024,
  maxHeight: 720
};
const url = "https://www.youtube.com/watch?v=abc123";

type Call = { command: string; args: string[] };

function fakeYtdlp(metadata: unknown, downloadBytes = 4096) {
  const calls: Call[] = [];
  const run: CommandRunner = async (command, args) => {
    calls.push({ command, args });
    if (args.includes("--dump-single-json")) {
      return { stdout: JSON.stringify(metadata), stderr: "" };
    }
    const template = args[args.indexOf("-o") + 1];
    await fs.writeFile(template.replace("%(ext)s", "mp4"), Buffer.alloc(downloadBytes));
    return { stdout: "", stderr: "" };
  };
  return { calls, run };
}

describe("yt-dlp fetcher", () => {
  let scratchDir: string;

  beforeEach(async () => {
    scratchDir = await fs.mkdtemp(path.join(os.tmpdir(), "fetcher-test-"));
  });

  afterEach(async () => {
    await fs.rm(scratchDir, { recursive: true, force: true });
  });

  it("resolves metadata then downloads within the quality profile", async () => {
    const { calls, run } = fakeYtdlp({ title: " Product demo ", description: "All about it", duration: 600 });
    const fetcher = new YtdlpFetcher(limits, run);

    const video = await fetcher.fetch({ url, scratchDir });

    expect(video).toEqual({
      filePath: path.join(scratchDir, "video.mp4"),
      title: "Product demo",
      description: "All about it",
      durationSec: 600
    });
    expect(calls.map((call) => call.command)).toEqual(["yt-dlp", "yt-dlp"]);
    expect(calls[1].args.slice(0, 2)).toEqual(["-f", "best[height<=720][filesize<500M]/best[height<=480]"]);
    expect(calls[1].args).toContain("--retries");
    expect(calls[1].args.at(-1)).toBe(url);
  });

  it("sizes the stream that the download will select", async () => {
    const calls: Call[] = [];
    const run: CommandRunner = async (command, args) => {
      calls.push({ command, args });
      if (args.includes("--dump-single-json")) {
        const filesize_approx = args.includes("-f") ? 300_000_000 : 1_800_000_000;
        return { stdout: JSON.stringify({ title: "Lecture", duration: 3600, filesize_approx }), stderr: "" };
      }
      const template = args[args.indexOf("-o") + 1];
      await fs.writeFile(template.replace("%(ext)s", "mp4"), Buffer.alloc(4096));
      return { stdout: "", stderr: "" };
    };

    const video = await new YtdlpFetcher(limits, run).fetch({ url, scratchDir });

    expect(video.durationSec).toBe(3600);
    const dumpArgs = calls[0].args;
    expect(dumpArgs[dumpArgs.indexOf("-f") + 1]).toBe("best[height<=720][filesize<500M]/best[height<=480]");
  });

  it("builds the format selector from the limits", () => {
    expect(buildFormatSelector({ maxHeight: 480, maxFileSizeBytes: 200 * 1024 * 1024 })).toBe(
      "best[height<=480][filesize<200M]/best[height<=480]"
    );
  });

  it("defaults the title and a missing duration", async () => {
    const { run } = fakeYtdlp({ title: null, duration: null });
    const video = await new YtdlpFetcher(limits, run).fetch({ url, scratchDir });
    expect(video.title).toBe("Unknown Title");
    expect(video.description).toBeNull();
    expect(video.durationSec).toBe(60);
  });

  it("rejects videos longer than three hours before downloading", async () => {
    const { calls, run } = fakeYtdlp({ title: "Marathon", duration: 15000 });
    const promise = new YtdlpFetcher(limits, run).fetch({ url, scratchDir });

    await expect(promise).rejects.toBeInstanceOf(UnsupportedContentError);
    await expect(promise).rejects.toThrow("Video too long. Maximum duration is 3 hours.");
    expect(calls).toHaveLength(1);
  });

  it("rejects live streams and oversized files", async () => {
    const live = fakeYtdlp({ title: "Live", duration: null, is_live: true });
    await expect(new YtdlpFetcher(limits, live.run).fetch({ url, scratchDir })).rejects.toThrow(
      "Live streams are not supported."
    );

    const large = fakeYtdlp({ title: "Large", duration: 600, filesize_approx: 600 * 1024 * 1024 });
    await expect(new YtdlpFetcher(limits, large.run).fetch({ url, scratchDir })).rejects.toThrow(
      "Video file is too large. Maximum size is 500MB."
    );
  });

  it("treats a tiny download as corrupt", async () => {
    const { run } = fakeYtdlp({ title: "Tiny", duration: 30 }, 10);
    const promise = new YtdlpFetcher(limits, run).fetch({ url, scratchDir });
    await expect(promise).rejects.toBeInstanceOf(DownloadFailedError);
    await expect(promise).rejects.toMatchObject({ detail: "Downloaded file is too small (10 bytes)" });
  });

  it("wraps tool failures as download failures", async () => {
    const run: CommandRunner = async () => {
      throw new Error("yt-dlp failed (exit 1). ERROR: Video unavailable");
    };
    const promise = new YtdlpFetcher(limits, run).fetch({ url, scratchDir });
    await expect(promise).rejects.toBeInstanceOf(DownloadFailedError);
    await expect(promise).rejects.toThrow("Failed to get video information.");
  });

  it("validates the url before running anything", async () => {
    const { calls, run } = fakeYtdlp({});
    await expect(new YtdlpFetcher(limits, run).fetch({ url: "https://example.com/v", scratchDir })).rejects.toBeInstanceOf(
      InvalidSourceError
    );
    expect(calls).toEqual([]);
  });
});
