import { getDependencies } from "../src/infrastructure/container";
import { closeDb } from "../src/infrastructure/repo/db";
import { getTaskStatus, runJobWithTimeLimits, createJob } from "../src/application/jobService";
import { describeFailure } from "../src/domain/errors";

// Usage:
//  npx tsx scripts/runJob.ts --user=<userId> --url=https://www.youtube.com/watch?v=XXXXX

function parseArgs(argv: string[]) {
  const opts: Record<string, string> = {};
  for (const arg of argv) {
    const match = /^--([^=]+)=(.*)$/.exec(arg);
    if (match) {
      opts[match[1]] = match[2];
    }
  }
  return opts;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.url || !args.user) {
    console.error("Provide --user=<userId> and --url=<youtubeUrl>");
    process.exitCode = 1;
    return;
  }

  const deps = getDependencies();
  try {
    const job = await createJob({ userId: args.user, sourceUrl: args.url }, deps);
    console.log(`Created job ${job.id} (credits charged: ${job.creditsCharged}).`);

    const { timedOut } = await runJobWithTimeLimits(job.id, deps, {
      progress: {
        async report(stage, message) {
          console.log(`[${stage}] ${message}`);
        }
      }
    });
    const status = await getTaskStatus(job.id, deps);
    console.log(JSON.stringify({ timedOut, status }, null, 2));
  } catch (error) {
    console.error(describeFailure(error));
    process.exitCode = 1;
  } finally {
    await deps.queue.close();
    await closeDb();
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
