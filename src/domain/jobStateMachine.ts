import type { JobStatus } from "./types";
import { InvalidTransitionError } from "./errors";

export const STAGE_ORDER = ["pending", "downloading", "processing", "analyzing", "creating_clips", "completed"] as const;

export const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(["completed", "failed"]);

export function isTerminal(status: JobStatus) {
  return TERMINAL_STATUSES.has(status);
}

export function nextStatus(status: JobStatus): JobStatus | null {
  if (status === "failed") {
    return null;
  }
  const index = STAGE_ORDER.indexOf(status);
  return STAGE_ORDER[index + 1] ?? null;
}

export function canTransition(from: JobStatus, to: JobStatus) {
  if (isTerminal(from)) {
    return false;
  }
  return to === "failed" || nextStatus(from) === to;
}

export function assertTransition(from: JobStatus, to: JobStatus) {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
}

/** Completion percentage reported alongside each stage; failed jobs report 0. */
export function progressPercent(status: JobStatus) {
  switch (status) {
    case "pending":
      return 0;
    case "downloading":
      return 20;
    case "processing":
      return 40;
    case "analyzing":
      return 60;
    case "creating_clips":
      return 80;
    case "completed":
      return 100;
    case "failed":
      return 0;
  }
}
