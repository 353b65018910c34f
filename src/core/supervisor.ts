import { execaNode } from 'execa';
import fs from 'node:fs';
import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { fileURLToPath } from 'node:url';
import { LivenessRegistry } from './registry.js';
import { errorMessage, Logger } from '../utils/logger.js';

export interface WorkerLauncher {
  launch(workerId: number): void;
}

/** Ask a worker process to shut down gracefully. */
export type ShutdownRequester = (pid: number) => void;

export type StopResult =
  | { kind: 'none' }
  | { kind: 'stopped'; count: number }
  | { kind: 'timeout'; remaining: number[] };

export interface SupervisorOptions {
  registry: LivenessRegistry;
  launcher: WorkerLauncher;
  logger: Logger;
  requestShutdown?: ShutdownRequester;
  stopPollMs?: number;
  stopPolls?: number;
}

export const sendSigterm: ShutdownRequester = (pid) => {
  process.kill(pid, 'SIGTERM');
};

/**
 * Starts detached Node processes running worker_main, each appending its
 * output to `<logDir>/worker.<id>.log`. `nodeOptions` defaults to this
 * process's own flags.
 */
export class ProcessLauncher implements WorkerLauncher {
  constructor(
    private readonly home: string,
    private readonly logDir: string,
    private readonly logger: Logger,
    private readonly nodeOptions?: string[]
  ) {}

  private workerScript() {
    const here = fileURLToPath(import.meta.url);
    // same extension as this module so source runs under a TS loader keep working
    return path.join(path.dirname(here), `worker_main${path.extname(here)}`);
  }

  launch(workerId: number) {
    fs.mkdirSync(this.logDir, { recursive: true });
    const fd = fs.openSync(path.join(this.logDir, `worker.${workerId}.log`), 'a');
    try {
      const subprocess = execaNode(this.workerScript(), [String(workerId)], {
        env: { SHELLQ_HOME: this.home },
        stdio: ['ignore', fd, fd],
        detached: true,
        cleanup: false,
        reject: false,
        ipc: false,
        nodeOptions: this.nodeOptions ?? process.execArgv,
      });
      subprocess.unref();
      void subprocess.then((result) => {
        if (result.failed) {
          this.logger.warn('worker process exited abnormally', { workerId, exitCode: result.exitCode });
        }
      });
      this.logger.debug('launched worker process', { workerId, pid: subprocess.pid });
    } finally {
      fs.closeSync(fd);
    }
  }
}

export class Supervisor {
  private readonly requestShutdown: ShutdownRequester;
  private readonly stopPollMs: number;
  private readonly stopPolls: number;

  constructor(private readonly opts: SupervisorOptions) {
    this.requestShutdown = opts.requestShutdown ?? sendSigterm;
    this.stopPollMs = opts.stopPollMs ?? 500;
    this.stopPolls = opts.stopPolls ?? 10;
  }

  /**
   * Launch `count` workers numbered 1..count. Each worker registers itself
   * once it is actually running.
   */
  start(count: number): number[] {
    const ids: number[] = [];
    for (let i = 1; i <= count; i++) {
      this.opts.launcher.launch(i);
      ids.push(i);
    }
    this.opts.logger.info('started workers', { count });
    return ids;
  }

  /** Live worker pids; stale registry entries are pruned as a side effect. */
  activeWorkers(): number[] {
    return this.opts.registry.listAlive();
  }

  async stop(): Promise<StopResult> {
    const pids = this.activeWorkers();
    if (pids.length === 0) return { kind: 'none' };

    this.opts.logger.info('stopping workers', { pids });
    for (const pid of pids) {
      try {
        this.requestShutdown(pid);
      } catch (err) {
        // exited between the scan and the signal; the next scan prunes it
        this.opts.logger.debug('could not signal worker', { pid, error: errorMessage(err) });
      }
    }

    let remaining = this.activeWorkers();
    for (let i = 0; i < this.stopPolls && remaining.length > 0; i++) {
      await sleep(this.stopPollMs);
      remaining = this.activeWorkers();
    }

    if (remaining.length === 0) return { kind: 'stopped', count: pids.length };
    this.opts.logger.warn('some workers did not stop in time', { remaining });
    return { kind: 'timeout', remaining };
  }
}
