export const WORKER_READY = "worker:ready";

export interface WorkerExit {
  ready: boolean;
  code: number | null;
  signal: string | null;
}

export function isReadyMessage(message: unknown) {
  return typeof message === "object" && message !== null && Reflect.get(message, "type") === WORKER_READY;
}

/**
 * A worker that reached ready state is always replaced, since that is how it
 * recycles. One that died before ready is not, or a broken deploy would
 * fork forever.
 */
export function shouldReplaceWorker(exit: WorkerExit, shuttingDown: boolean) {
  if (shuttingDown) {
    return false;
  }
  return exit.ready || exit.code === 0;
}
