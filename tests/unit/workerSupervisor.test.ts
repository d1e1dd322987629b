import { describe, expect, it } from "vitest";
import { WORKER_READY, isReadyMessage, shouldReplaceWorker } from "../../src/infrastructure/process/workerSupervisor";

describe("worker supervisor", () => {
  it("replaces a worker that recycled after becoming ready", () => {
    expect(shouldReplaceWorker({ ready: true, code: 0, signal: null }, false)).toBe(true);
  });

  it("replaces a ready worker that crashed or was killed", () => {
    expect(shouldReplaceWorker({ ready: true, code: 1, signal: null }, false)).toBe(true);
    expect(shouldReplaceWorker({ ready: true, code: null, signal: "SIGKILL" }, false)).toBe(true);
  });

  it("does not replace a worker that failed during startup", () => {
    expect(shouldReplaceWorker({ ready: false, code: 1, signal: null }, false)).toBe(false);
    expect(shouldReplaceWorker({ ready: false, code: null, signal: "SIGKILL" }, false)).toBe(false);
  });

  it("replaces nothing while shutting down", () => {
    expect(shouldReplaceWorker({ ready: true, code: 0, signal: null }, true)).toBe(false);
  });

  it("recognizes the ready message", () => {
    expect(isReadyMessage({ type: WORKER_READY })).toBe(true);
    expect(isReadyMessage({ type: "other" })).toBe(false);
    expect(isReadyMessage("worker:ready")).toBe(false);
    expect(isReadyMessage(null)).toBe(false);
  });
});
