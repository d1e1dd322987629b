import { promises as fs } from "node:fs";
import path from "node:path";
import type { LoggerPort } from "../../interfaces/ports";
import type { Database } from "../repo/db";
import { jobLogs } from "../repo/schema";

type LogLevel = "info" | "warn" | "error";

type LogEntry = {
  timestamp: string;
  level: LogLevel;
  jobId: string;
  message: string;
  pid: number;
};

export class LocalLogger implements LoggerPort {
  constructor(
    private readonly baseDir: string,
    private readonly db: Database | null = null
  ) {}

  async info(jobId: string, message: string) {
    await this.append(jobId, "info", message);
  }

  async warn(jobId: string, message: string) {
    await this.append(jobId, "warn", message);
  }

  async error(jobId: string, message: string) {
    await this.append(jobId, "error", message);
  }

  private async append(jobId: string, level: LogLevel, message: string) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      jobId,
      message,
      pid: process.pid
    };
    const filePath = path.join(this.baseDir, `${path.basename(jobId)}.log`);

    const tasks: Promise<unknown>[] = [
      fs.mkdir(this.baseDir, { recursive: true }).then(() => fs.appendFile(filePath, `${JSON.stringify(entry)}\n`))
    ];
    if (this.db) {
      tasks.push(this.db.insert(jobLogs).values({ jobId, level, message }));
    }

    const results = await Promise.allSettled(tasks);
    for (const result of results) {
      if (result.status === "rejected") {
        console.error("Logger write failed", result.reason);
      }
    }
  }
}
