import { ConfigRepo, JobRepo } from '../db/repo.js';
import { CommandExecutor } from './executor.js';
import { LivenessRegistry } from './registry.js';
import { workerLoop } from './worker.js';
import { Logger } from '../utils/logger.js';

export interface WorkerProcessOptions {
  workerId: number;
  pid: number;
  registry: LivenessRegistry;
  jobs: JobRepo;
  config: ConfigRepo;
  executor: CommandExecutor;
  logger: Logger;
  signal: AbortSignal;
  pollIntervalMs?: number;
  jobTimeoutMs?: number;
}

/**
 * Lifetime of one worker: visible in the registry exactly while its loop runs.
 */
export async function runWorkerProcess(opts: WorkerProcessOptions) {
  opts.registry.register(opts.pid, opts.workerId);
  opts.logger.info('worker started', { pid: opts.pid });
  try {
    await workerLoop(opts);
  } finally {
    opts.registry.deregister(opts.pid);
    opts.logger.info('worker stopped', { pid: opts.pid });
  }
}

/**
 * Signal handler that aborts `controller` on the first signal only.
 */
export function createShutdownHandler(controller: AbortController, logger: Logger, pid = process.pid) {
  return (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.info('shutdown requested, finishing current cycle', { signal, pid });
    controller.abort();
  };
}
