import Database from 'better-sqlite3';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { openDB } from '../../src/db/db.js';
import { ConfigRepo, JobRepo } from '../../src/db/repo.js';
import { CommandExecutor, ExecutionResult } from '../../src/core/executor.js';

export interface TestStore {
  dir: string;
  file: string;
  db: Database.Database;
  clock: ManualClock;
  jobs: JobRepo;
  config: ConfigRepo;
  /** Open another connection to the same file, as a second process would. */
  connect(): { db: Database.Database; jobs: JobRepo };
  cleanup(): void;
}

export class ManualClock {
  constructor(private current: Date) {}

  now = () => new Date(this.current.getTime());

  advance(ms: number) {
    this.current = new Date(this.current.getTime() + ms);
  }
}

export const T0 = new Date('2024-05-01T12:00:00.000Z');

export function createTestStore(start = T0): TestStore {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'shellq-test-'));
  const file = path.join(dir, 'queue.db');
  const db = openDB(file);
  const clock = new ManualClock(start);
  const opened: Database.Database[] = [db];
  return {
    dir,
    file,
    db,
    clock,
    jobs: new JobRepo(db, clock.now),
    config: new ConfigRepo(db),
    connect() {
      const other = openDB(file);
      opened.push(other);
      return { db: other, jobs: new JobRepo(other, clock.now) };
    },
    cleanup() {
      for (const d of opened) d.close();
      fs.rmSync(dir, { recursive: true, force: true });
    },
  };
}

export function result(exitCode: number, stderr = ''): ExecutionResult {
  return { exitCode, timedOut: false, stdout: '', stderr };
}

/** Executor that replays scripted results and records what it ran. */
export class FakeExecutor implements CommandExecutor {
  readonly calls: string[] = [];

  constructor(private readonly next: (command: string) => ExecutionResult | Promise<ExecutionResult>) {}

  async execute(command: string): Promise<ExecutionResult> {
    this.calls.push(command);
    return this.next(command);
  }
}
