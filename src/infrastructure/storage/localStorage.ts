import { promises as fs } from "node:fs";
import path from "node:path";
import type { StoragePort } from "../../interfaces/ports";

const SCRATCH_PREFIX = "shortform_";

export class LocalStorage implements StoragePort {
  constructor(private readonly paths: { clips: string; scratch: string }) {}

  async createScratchDir(jobId: string) {
    await fs.mkdir(this.paths.scratch, { recursive: true });
    return fs.mkdtemp(path.join(this.paths.scratch, `${SCRATCH_PREFIX}${jobId.slice(0, 12)}_`));
  }

  async removeDir(dir: string) {
    await fs.rm(dir, { recursive: true, force: true });
  }

  async ensureClipsDir() {
    await fs.mkdir(this.paths.clips, { recursive: true });
    return this.paths.clips;
  }

  clipPath(filename: string) {
    return path.join(this.paths.clips, path.basename(filename));
  }

  async fileSize(filePath: string) {
    try {
      const stat = await fs.stat(filePath);
      return stat.isFile() ? stat.size : null;
    } catch (error) {
      if (isMissing(error)) {
        return null;
      }
      throw error;
    }
  }

  async removeFile(filePath: string) {
    await fs.rm(filePath, { force: true });
  }

  /** Deletes scratch directories this service created that were last touched before the cutoff. */
  async sweepStaleScratch(maxAgeMs: number, now = new Date()) {
    let entries: string[];
    try {
      entries = await fs.readdir(this.paths.scratch);
    } catch (error) {
      if (isMissing(error)) {
        return [];
      }
      throw error;
    }

    const cutoff = now.getTime() - maxAgeMs;
    const removed: string[] = [];
    for (const entry of entries) {
      if (!entry.startsWith(SCRATCH_PREFIX)) {
        continue;
      }
      const dir = path.join(this.paths.scratch, entry);
      const stat = await fs.stat(dir);
      if (stat.isDirectory() && stat.mtimeMs < cutoff) {
        await this.removeDir(dir);
        removed.push(dir);
      }
    }
    return removed;
  }
}

function isMissing(error: unknown) {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
