import { InvalidSourceError } from "./errors";

const ALLOWED_HOSTS = new Set(["youtube.com", "www.youtube.com", "m.youtube.com", "music.youtube.com", "youtu.be"]);

export function isAllowedSourceUrl(input: string) {
  try {
    const url = new URL(input);
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return false;
    }
    return ALLOWED_HOSTS.has(url.hostname.toLowerCase());
  } catch {
    return false;
  }
}

export function validateSourceUrl(input: string) {
  const trimmed = input.trim();
  if (!isAllowedSourceUrl(trimmed)) {
    throw new InvalidSourceError("Please provide a valid YouTube URL.", `rejected url: ${trimmed.slice(0, 200)}`);
  }
  return trimmed;
}
