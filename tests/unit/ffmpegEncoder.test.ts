import os from "node:os";
import path from "node:path";
import { promises as fs } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { CommandRunner } from "../../src/infrastructure/process/runCommand";
import { FfmpegEncoder, buildEncodeArgs, buildVerticalFilters } from "../../src/infrastructure/render/ffmpegEncoder";

const profile = { width: 720, height: 1280, videoBitrate: "1500k", audioBitrate: "128k", fps: 24, preset: "fast" };

describe("ffmpeg encoder", () => {
  let root: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), "encoder-test-"));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  it("center-crops landscape sources after filling the height", () => {
    expect(buildVerticalFilters({ width: 1920, height: 1080 }, profile)).toBe(
      "scale=2274:1280,crop=720:1280:777:0,fps=24,setsar=1"
    );
  });

  it("pads sources narrower than the canvas", () => {
    expect(buildVerticalFilters({ width: 400, height: 1000 }, profile)).toBe(
      "scale=512:1280,pad=720:1280:(ow-iw)/2:0:black,fps=24,setsar=1"
    );
  });

  it("only scales sources that already match the canvas ratio", () => {
    expect(buildVerticalFilters({ width: 360, height: 640 }, profile)).toBe("scale=720:1280,fps=24,setsar=1");
  });

  it("encodes with the constrained output profile", () => {
    const args = buildEncodeArgs({
      inputPath: "in.mp4",
      outputPath: "out.mp4",
      start: 12.5,
      end: 42.5,
      source: { width: 1280, height: 720 },
      profile
    });
    expect(args.slice(0, 9)).toEqual(["-y", "-v", "error", "-ss", "12.50", "-i", "in.mp4", "-t", "30.00"]);
    expect(args).toEqual(expect.arrayContaining(["libx264", "1500k", "24", "yuv420p", "aac", "+faststart"]));
    expect(args.at(-1)).toBe("out.mp4");
  });

  it("reads dimensions and duration from ffprobe", async () => {
    const run: CommandRunner = async () => ({
      stdout: JSON.stringify({ streams: [{ width: 1920, height: 1080 }], format: { duration: "600.5" } }),
      stderr: ""
    });
    await expect(new FfmpegEncoder(profile, run).probe("in.mp4")).resolves.toEqual({
      width: 1920,
      height: 1080,
      durationSec: 600.5
    });
  });

  it("fails the probe when there is no video stream", async () => {
    const run: CommandRunner = async () => ({ stdout: JSON.stringify({ streams: [], format: { duration: "5" } }), stderr: "" });
    await expect(new FfmpegEncoder(profile, run).probe("audio.m4a")).rejects.toThrow("ffprobe found no video stream.");
  });

  it("stages the encode in the work dir before copying it out", async () => {
    const calls: string[][] = [];
    const run: CommandRunner = async (_command, args) => {
      calls.push(args);
      await fs.writeFile(args[args.length - 1], "encoded");
      return { stdout: "", stderr: "" };
    };
    const workDir = path.join(root, "segment-1");
    const outputPath = path.join(root, "clip.mp4");

    await new FfmpegEncoder(profile, run).encode({
      inputPath: "in.mp4",
      outputPath,
      start: 0,
      end: 20,
      source: { width: 1920, height: 1080, durationSec: 60 },
      workDir
    });

    expect(calls[0].at(-1)).toBe(path.join(workDir, "segment.mp4"));
    expect(await fs.readFile(outputPath, "utf-8")).toBe("encoded");
  });
});
