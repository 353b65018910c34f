import fs from 'node:fs';
import path from 'node:path';

export type LivenessProbe = (pid: number) => boolean;

/**
 * Which worker processes are running. Not a source of job state.
 */
export interface LivenessRegistry {
  register(pid: number, workerId: number): void;
  deregister(pid: number): void;
  /** Every recorded pid, alive or not. */
  list(): number[];
  /** Drop entries whose process is gone and return the pids removed. */
  pruneStale(): number[];
  /** Recorded pids whose process still exists; stale entries are pruned. */
  listAlive(): number[];
}

/**
 * Signal 0 checks for existence without delivering anything.
 * EPERM means the process exists but belongs to someone else.
 */
export const isProcessAlive: LivenessProbe = (pid) => {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return err instanceof Error && 'code' in err && err.code === 'EPERM';
  }
};

abstract class ProbingRegistry implements LivenessRegistry {
  constructor(protected readonly probe: LivenessProbe) {}

  abstract register(pid: number, workerId: number): void;
  abstract deregister(pid: number): void;
  abstract list(): number[];

  pruneStale(): number[] {
    const stale = this.list().filter((pid) => !this.probe(pid));
    for (const pid of stale) this.deregister(pid);
    return stale;
  }

  listAlive(): number[] {
    const stale = new Set(this.pruneStale());
    return this.list().filter((pid) => !stale.has(pid));
  }
}

const MARKER = /^worker\.(\d+)\.pid$/;

/**
 * One `worker.<pid>.pid` file per live worker, holding its ordinal.
 */
export class FileLivenessRegistry extends ProbingRegistry {
  constructor(private readonly dir: string, probe: LivenessProbe = isProcessAlive) {
    super(probe);
  }

  private markerPath(pid: number) {
    return path.join(this.dir, `worker.${pid}.pid`);
  }

  register(pid: number, workerId: number) {
    fs.mkdirSync(this.dir, { recursive: true });
    fs.writeFileSync(this.markerPath(pid), String(workerId));
  }

  deregister(pid: number) {
    fs.rmSync(this.markerPath(pid), { force: true });
  }

  list(): number[] {
    if (!fs.existsSync(this.dir)) return [];
    const pids: number[] = [];
    for (const name of fs.readdirSync(this.dir)) {
      const m = MARKER.exec(name);
      if (m) {
        pids.push(Number(m[1]));
      } else if (name.startsWith('worker.') && name.endsWith('.pid')) {
        // unparseable marker, nothing can ever match it
        fs.rmSync(path.join(this.dir, name), { force: true });
      }
    }
    return pids.sort((a, b) => a - b);
  }
}

export class MemoryLivenessRegistry extends ProbingRegistry {
  private readonly entries = new Map<number, number>();

  constructor(probe: LivenessProbe) {
    super(probe);
  }

  register(pid: number, workerId: number) {
    this.entries.set(pid, workerId);
  }

  deregister(pid: number) {
    this.entries.delete(pid);
  }

  list(): number[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }
}
