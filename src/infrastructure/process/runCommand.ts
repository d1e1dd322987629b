import { spawn } from "node:child_process";

export interface CommandResult {
  stdout: string;
  stderr: string;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { signal?: AbortSignal; tailLimit?: number }
) => Promise<CommandResult>;

export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null,
    readonly stderr: string
  ) {
    const suffix = stderr ? ` ${stderr.replaceAll(/\s+/g, " ")}` : "";
    super(`${command} failed (exit ${exitCode ?? "unknown"}).${suffix}`);
    this.name = "CommandFailedError";
  }
}

/** Spawns a tool, collects stdout and keeps only the tail of stderr. */
export const runCommand: CommandRunner = (command, args, options = {}) => {
  const { signal, tailLimit = 8192 } = options;
  return new Promise<CommandResult>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const tail = createTailBuffer(tailLimit);

    const onAbort = () => {
      proc.kill("SIGKILL");
    };
    signal?.addEventListener("abort", onAbort, { once: true });

    proc.stdout.on("data", (data: Buffer) => stdout.push(data));
    proc.stderr.on("data", (data: Buffer) => tail.append(data));
    proc.on("error", (error) => {
      signal?.removeEventListener("abort", onAbort);
      reject(new Error(`${command} not found or failed to start: ${error.message}`));
    });
    proc.on("close", (code) => {
      signal?.removeEventListener("abort", onAbort);
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }
      if (code === 0) {
        resolve({ stdout: Buffer.concat(stdout).toString("utf-8"), stderr: tail.value() });
        return;
      }
      reject(new CommandFailedError(command, code, tail.value()));
    });
  });
};

export function createTailBuffer(limit: number) {
  let buffer = Buffer.alloc(0);
  return {
    append(chunk: Buffer) {
      buffer = Buffer.concat([buffer, chunk]);
      if (buffer.length > limit) {
        buffer = buffer.subarray(buffer.length - limit);
      }
    },
    value() {
      return buffer.toString("utf-8").trim();
    }
  };
}
