import { Queue, type Job } from "bullmq";
import IORedis from "ioredis";
import { progressPercent } from "../../domain/jobStateMachine";
import type { JobQueuePort, ProgressSink } from "../../interfaces/ports";

const QUEUE_NAME = "shortform-clips";
const MAINTENANCE_QUEUE_NAME = "shortform-maintenance";

export const PROCESS_JOB = "processJob";
export const SWEEP_SCRATCH = "sweepScratch";

export type ProcessJobData = { jobId: string; sourceUrl: string };

export class RedisQueue implements JobQueuePort {
  private connection: IORedis;
  private queue: Queue<ProcessJobData>;
  private maintenance: Queue;

  constructor(redisUrl: string) {
    this.connection = new IORedis(redisUrl, { maxRetriesPerRequest: null });
    this.queue = new Queue<ProcessJobData>(QUEUE_NAME, { connection: this.connection });
    this.maintenance = new Queue(MAINTENANCE_QUEUE_NAME, { connection: this.connection });
  }

  async enqueue(jobId: string, sourceUrl: string) {
    await this.queue.add(
      PROCESS_JOB,
      { jobId, sourceUrl },
      { jobId, attempts: 1, removeOnComplete: 50, removeOnFail: 50 }
    );
  }

  /** Registers the daily stale scratch sweep. Re-adding the same repeat key is a no-op. */
  async scheduleMaintenance() {
    await this.maintenance.add(
      SWEEP_SCRATCH,
      {},
      { repeat: { pattern: "0 3 * * *" }, jobId: SWEEP_SCRATCH, removeOnComplete: 10, removeOnFail: 10 }
    );
  }

  async close() {
    await this.queue.close();
    await this.maintenance.close();
    await this.connection.quit();
  }
}

export function getQueueName() {
  return QUEUE_NAME;
}

export function getMaintenanceQueueName() {
  return MAINTENANCE_QUEUE_NAME;
}

/** Publishes stage updates on the BullMQ job so pollers see them before the database write lands. */
export function createBullProgressSink(job: Pick<Job, "updateProgress">): ProgressSink {
  return {
    async report(stage, message) {
      const percent = stage === "saving" ? 90 : progressPercent(stage);
      await job.updateProgress({ stage, message, percent });
    }
  };
}
