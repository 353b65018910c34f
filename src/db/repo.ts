import Database from 'better-sqlite3';
import { DuplicateJobError, NotInDLQError } from '../core/errors.js';
import { Config, DEFAULT_CONFIG, Job, JOB_STATES, JobState } from '../core/types.js';

export type Clock = () => Date;

export interface StatusUpdate {
  attempts?: number;
  nextRunAt?: string | null;
  lastError?: string | null;
}

export interface QueueSummary {
  counts: Record<JobState, number>;
  oldestPending: string | null;
}

const BUSY_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT', 'SQLITE_LOCKED']);

export function isBusyError(err: unknown): boolean {
  return err instanceof Database.SqliteError && BUSY_CODES.has(err.code);
}

/**
 * Job table access. Every cross-process guarantee of the queue lives here:
 * workers only ever coordinate through claimNext().
 */
export class JobRepo {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: Clock = () => new Date()
  ) {}

  private nowIso() {
    return this.clock().toISOString();
  }

  /**
   * Insert a new job. A primary key conflict leaves the existing row alone.
   */
  insert(job: Job) {
    try {
      this.db.prepare<Job>(`
        INSERT INTO jobs(
          id, command, state, attempts, retry_limit,
          created_at, updated_at, next_run_at, last_error
        ) VALUES (
          @id, @command, @state, @attempts, @retry_limit,
          @created_at, @updated_at, @next_run_at, @last_error
        )
      `).run(job);
    } catch (err) {
      if (err instanceof Database.SqliteError && err.code === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
        throw new DuplicateJobError(job.id);
      }
      throw err;
    }
  }

  /**
   * Claim the oldest eligible pending job for processing.
   * Returns null when nothing is eligible or the store is busy.
   */
  claimNext(): Job | null {
    const claim = this.db.transaction((now: string): Job | null => {
      const row = this.db
        .prepare<[string], { id: string }>(`
          SELECT id FROM jobs
          WHERE state = 'pending'
            AND (next_run_at IS NULL OR next_run_at <= ?)
          ORDER BY created_at ASC, rowid ASC
          LIMIT 1
        `)
        .get(now);

      if (!row) return null;

      const res = this.db
        .prepare<[string, string]>(`
          UPDATE jobs
          SET state = 'processing', updated_at = ?
          WHERE id = ? AND state = 'pending'
        `)
        .run(now, row.id);
      if (res.changes === 0) return null;

      return this.getJob(row.id) ?? null;
    });

    try {
      return claim.immediate(this.nowIso());
    } catch (err) {
      if (isBusyError(err)) return null;
      throw err;
    }
  }

  /**
   * Unconditional write of a job's state plus whatever fields are given.
   */
  updateStatus(id: string, state: JobState, fields: StatusUpdate = {}) {
    const sets = ['state = @state', 'updated_at = @updated_at'];
    const params: Record<string, string | number | null> = {
      id,
      state,
      updated_at: this.nowIso(),
    };

    if (fields.attempts !== undefined) {
      sets.push('attempts = @attempts');
      params.attempts = fields.attempts;
    }
    if (fields.nextRunAt !== undefined) {
      sets.push('next_run_at = @next_run_at');
      params.next_run_at = fields.nextRunAt;
    }
    if (fields.lastError !== undefined) {
      sets.push('last_error = @last_error');
      params.last_error = fields.lastError;
    }

    this.db.prepare('UPDATE jobs SET ' + sets.join(', ') + ' WHERE id = @id').run(params);
  }

  /**
   * Move a dead job back to pending with a clean slate.
   */
  resurrect(id: string) {
    const res = this.db
      .prepare<[string, string]>(`
        UPDATE jobs
        SET state = 'pending', attempts = 0, next_run_at = NULL,
            last_error = NULL, updated_at = ?
        WHERE id = ? AND state = 'dead'
      `)
      .run(this.nowIso(), id);
    if (res.changes === 0) throw new NotInDLQError(id);
  }

  getJob(id: string): Job | undefined {
    return this.db.prepare<[string], Job>('SELECT * FROM jobs WHERE id = ?').get(id);
  }

  findByState(state: JobState): Job[] {
    return this.db
      .prepare<[string], Job>('SELECT * FROM jobs WHERE state = ? ORDER BY created_at ASC, rowid ASC')
      .all(state);
  }

  listAll(): Job[] {
    return this.db.prepare<[], Job>('SELECT * FROM jobs ORDER BY created_at ASC, rowid ASC').all();
  }

  listDLQ(): Job[] {
    return this.findByState('dead');
  }

  summary(): QueueSummary {
    const counts: Record<JobState, number> = { pending: 0, processing: 0, completed: 0, dead: 0 };
    const rows = this.db
      .prepare<[], { state: string; c: number }>('SELECT state, COUNT(*) AS c FROM jobs GROUP BY state')
      .all();
    for (const row of rows) {
      const state = JOB_STATES.find((s) => s === row.state);
      if (state) counts[state] = row.c;
    }

    const pendingOldest = this.db
      .prepare<[], { m: string | null }>("SELECT MIN(created_at) AS m FROM jobs WHERE state = 'pending'")
      .get();

    return { counts, oldestPending: pendingOldest?.m ?? null };
  }
}

/**
 * Free-form key/value settings. Values are stored as text.
 */
export class ConfigRepo {
  constructor(private readonly db: Database.Database) {}

  get(key: string): string | undefined {
    const row = this.db.prepare<[string], { value: string }>('SELECT value FROM config WHERE key = ?').get(key);
    return row?.value;
  }

  /**
   * Retrieve a config value as a number, falling back when unset or not numeric.
   */
  getNumber(key: string, def: number): number {
    const raw = this.get(key);
    if (raw === undefined || raw.trim() === '') return def;
    const n = Number(raw);
    return Number.isFinite(n) ? n : def;
  }

  set(key: string, value: string) {
    this.db.prepare<[string, string]>(`
      INSERT INTO config(key, value)
      VALUES (?, ?)
      ON CONFLICT(key)
      DO UPDATE SET value = excluded.value
    `).run(key, value);
  }

  all(): Record<string, string> {
    const rows = this.db.prepare<[], { key: string; value: string }>('SELECT key, value FROM config ORDER BY key').all();
    const res: Record<string, string> = {};
    for (const row of rows) res[row.key] = row.value;
    return res;
  }

  current(): Config {
    return {
      max_retries: this.getNumber('max_retries', DEFAULT_CONFIG.max_retries),
      backoff_base_seconds: this.getNumber('backoff_base_seconds', DEFAULT_CONFIG.backoff_base_seconds),
    };
  }
}
