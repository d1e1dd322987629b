import { randomBytes } from "node:crypto";

export const CLIP_FILENAME_PATTERN = /^[A-Za-z0-9_-]+\.mp4$/;

export function sanitizeTitle(title: string, maxLength = 30) {
  return title
    .replace(/[^A-Za-z0-9 _-]/g, "")
    .trim()
    .slice(0, maxLength)
    .trim()
    .replaceAll(" ", "_");
}

export function formatStamp(date: Date) {
  const pad = (value: number) => String(value).padStart(2, "0");
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}`;
}

export type ClipNamer = (options: { index: number; title: string }) => string;

export function buildClipFilename(options: {
  index: number;
  title: string;
  now?: Date;
  suffix?: string;
}) {
  const safeTitle = sanitizeTitle(options.title) || "clip";
  const stamp = formatStamp(options.now ?? new Date());
  const suffix = options.suffix ?? randomBytes(3).toString("hex");
  return `clip_${options.index + 1}_${stamp}_${safeTitle}_${suffix}.mp4`;
}

export function isSafeClipFilename(filename: string) {
  return CLIP_FILENAME_PATTERN.test(filename) && filename.length <= 200;
}
