import { OutOfMemoryError } from "../../domain/errors";
import type { ResourceGuardPort, StoragePort } from "../../interfaces/ports";

export interface MemoryProbe {
  sampleMb(): number;
  collect(): void;
}

/** True when node runs with --expose-gc, so `collect` can force a pass. */
export function canForceCollection() {
  return typeof Reflect.get(globalThis, "gc") === "function";
}

export const processMemoryProbe: MemoryProbe = {
  sampleMb: () => process.memoryUsage().rss / 1024 / 1024,
  collect: () => {
    const gc: unknown = Reflect.get(globalThis, "gc");
    if (typeof gc === "function") {
      gc();
    }
  }
};

/**
 * Samples resident memory at stage boundaries. Above the limit it collects
 * once and samples again; a second reading over the limit aborts the job.
 */
export class MemoryGuard implements ResourceGuardPort {
  constructor(
    private readonly limitMb: number,
    private readonly storage: Pick<StoragePort, "removeDir">,
    private readonly probe: MemoryProbe = processMemoryProbe
  ) {}

  check(label: string) {
    const usedMb = this.probe.sampleMb();
    if (usedMb <= this.limitMb) {
      return usedMb;
    }

    this.probe.collect();
    const afterMb = this.probe.sampleMb();
    if (afterMb > this.limitMb) {
      console.warn(`Memory check failed at ${label}: ${afterMb.toFixed(1)}MB > ${this.limitMb}MB`);
      throw new OutOfMemoryError(afterMb, this.limitMb);
    }
    return afterMb;
  }

  release() {
    this.probe.collect();
  }

  async cleanup(scratchDir: string | null) {
    try {
      if (scratchDir) {
        await this.storage.removeDir(scratchDir);
      }
    } finally {
      this.release();
    }
  }
}
