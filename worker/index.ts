import cluster from "node:cluster";
import { Worker, type Job } from "bullmq";
import IORedis from "ioredis";
import {
  PROCESS_JOB,
  SWEEP_SCRATCH,
  createBullProgressSink,
  getMaintenanceQueueName,
  getQueueName,
  type ProcessJobData
} from "../src/infrastructure/queue/redisQueue";
import { getDependencies } from "../src/infrastructure/container";
import { loadConfig } from "../src/infrastructure/config";
import { closeDb } from "../src/infrastructure/repo/db";
import { isReadyMessage, shouldReplaceWorker, WORKER_READY } from "../src/infrastructure/process/workerSupervisor";
import { canForceCollection } from "../src/infrastructure/resources/memoryGuard";
import { runJobWithTimeLimits, sweepStaleScratch } from "../src/application/jobService";

const config = loadConfig();
const { count: workerCount, concurrency, maxTasks } = config.worker;

if (cluster.isPrimary) {
  superviseWorkers(workerCount);
} else {
  startWorker().catch((error: unknown) => {
    console.error("Worker failed to start", error);
    process.exit(1);
  });
}

// Workers exit to recycle, so even a single worker runs under a primary that forks its replacement.
function superviseWorkers(count: number) {
  const ready = new Set<number>();
  let shuttingDown = false;

  console.log(`Starting ${count} worker processes with concurrency ${concurrency}.`);
  for (let i = 0; i < count; i += 1) {
    cluster.fork();
  }

  cluster.on("message", (worker, message: unknown) => {
    if (isReadyMessage(message)) {
      ready.add(worker.id);
    }
  });

  cluster.on("exit", (worker, code, signal) => {
    const exit = { ready: ready.delete(worker.id), code, signal };
    const label = `Worker ${worker.process.pid} exited (${code ?? "unknown"}, ${signal ?? "unknown"})`;
    if (shouldReplaceWorker(exit, shuttingDown)) {
      console.info(`${label}. Starting a replacement.`);
      cluster.fork();
      return;
    }
    if (!shuttingDown) {
      console.error(`${label} before it was ready. Not replacing it.`);
      process.exitCode = 1;
    }
  });

  const stop = () => {
    shuttingDown = true;
    for (const worker of Object.values(cluster.workers ?? {})) {
      worker?.kill("SIGTERM");
    }
  };
  process.on("SIGTERM", stop);
  process.on("SIGINT", stop);
}

async function startWorker() {
  const connection = new IORedis(config.redisUrl, { maxRetriesPerRequest: null });
  const deps = getDependencies(config);
  let handled = 0;
  let recycling = false;

  const worker = new Worker<ProcessJobData>(
    getQueueName(),
    async (job: Job<ProcessJobData>) => {
      if (job.name !== PROCESS_JOB) {
        return;
      }
      try {
        const { timedOut } = await runJobWithTimeLimits(job.data.jobId, deps, {
          progress: createBullProgressSink(job)
        });
        if (timedOut) {
          // The abandoned task may still hold ffmpeg or memory; only a fresh process is clean.
          recycle("hard time limit reached");
        }
      } finally {
        handled += 1;
        if (handled >= maxTasks) {
          recycle(`handled ${handled} tasks`);
        }
      }
    },
    { connection, concurrency }
  );

  const maintenance = new Worker(
    getMaintenanceQueueName(),
    async (job) => {
      if (job.name === SWEEP_SCRATCH) {
        await sweepStaleScratch(deps);
      }
    },
    { connection, concurrency: 1 }
  );

  worker.on("failed", (job, err) => {
    console.error("Job failed", job?.id, err);
  });

  worker.on("error", (err) => {
    console.error("Worker error", err);
  });

  maintenance.on("error", (err) => {
    console.error("Maintenance worker error", err);
  });

  setupMemoryGuard(worker, config.limits.maxMemoryMb);
  await deps.queue.scheduleMaintenance();

  const shutdown = async () => {
    await worker.close();
    await maintenance.close();
    await deps.queue.close();
    await connection.quit();
    await closeDb();
  };

  function recycle(reason: string) {
    if (recycling) {
      return;
    }
    recycling = true;
    console.info(`Recycling worker ${process.pid}: ${reason}.`);
    shutdown()
      .catch((error: unknown) => console.error("Worker shutdown failed", error))
      .finally(() => process.exit(0));
  }

  const onSignal = () => {
    if (recycling) {
      return;
    }
    recycling = true;
    shutdown()
      .catch((error: unknown) => console.error("Worker shutdown failed", error))
      .finally(() => process.exit(0));
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  if (!canForceCollection()) {
    console.warn("Forced garbage collection is unavailable. Start the worker with --expose-gc.");
  }
  process.send?.({ type: WORKER_READY });
  console.log(`Clip worker running (pid=${process.pid}, concurrency=${concurrency}, maxTasks=${maxTasks}).`);
}

function setupMemoryGuard(worker: Worker<ProcessJobData>, limitMb: number) {
  const resumeThreshold = limitMb * 0.85;
  let paused = false;
  let checking = false;

  const check = async () => {
    if (checking) {
      return;
    }
    checking = true;
    try {
      const rssMb = process.memoryUsage().rss / 1024 / 1024;
      if (!paused && rssMb >= limitMb) {
        await worker.pause(true);
        paused = true;
        console.warn(`Paused new jobs (RSS ${rssMb.toFixed(1)}MB >= ${limitMb}MB).`);
      } else if (paused && rssMb <= resumeThreshold) {
        worker.resume();
        paused = false;
        console.info(`Resumed new jobs (RSS ${rssMb.toFixed(1)}MB <= ${resumeThreshold.toFixed(1)}MB).`);
      }
    } finally {
      checking = false;
    }
  };

  const interval = setInterval(() => {
    check().catch((error: unknown) => console.error("Memory check failed", error));
  }, 5000);

  interval.unref();
}
