import { setTimeout as sleep } from 'node:timers/promises';
import { ConfigRepo, JobRepo } from '../db/repo.js';
import { Job } from './types.js';
import { CommandExecutor, ExecutionResult, succeeded, truncate } from './executor.js';
import { nextAttempt, retryAt } from './retry.js';
import { errorMessage, Logger } from '../utils/logger.js';

export const POLL_INTERVAL_MS = 1000;
export const JOB_TIMEOUT_MS = 300_000;

export interface WorkerContext {
  workerId: number;
  jobs: JobRepo;
  config: ConfigRepo;
  executor: CommandExecutor;
  logger: Logger;
  signal: AbortSignal;
  pollIntervalMs?: number;
  jobTimeoutMs?: number;
  clock?: () => Date;
}

/**
 * Poll, claim and run jobs until `signal` is aborted. The signal is only
 * looked at between poll cycles; a running command is never interrupted.
 */
export async function workerLoop(ctx: WorkerContext) {
  const pollIntervalMs = ctx.pollIntervalMs ?? POLL_INTERVAL_MS;

  while (!ctx.signal.aborted) {
    let job: Job | null = null;
    try {
      job = ctx.jobs.claimNext();
    } catch (err) {
      ctx.logger.error('claim failed', { error: errorMessage(err) });
    }

    if (!job) {
      await sleep(pollIntervalMs);
      continue;
    }

    ctx.logger.info('processing job', { jobId: job.id });
    try {
      await runJob(ctx, job);
    } catch (err) {
      // the outcome could not be written; the job stays in processing
      ctx.logger.error('failed to record job outcome', { jobId: job.id, error: errorMessage(err) });
    }
  }

  ctx.logger.info('worker loop stopped');
}

export async function runJob(ctx: WorkerContext, job: Job) {
  const start = Date.now();
  const timeoutMs = ctx.jobTimeoutMs ?? JOB_TIMEOUT_MS;

  let result: ExecutionResult;
  try {
    result = await ctx.executor.execute(job.command, timeoutMs);
  } catch (err) {
    handleFailure(ctx, job, truncate(`execution error: ${errorMessage(err)}`));
    return;
  }

  // the command has run; a store error from here on is not a command failure
  if (succeeded(result)) {
    ctx.jobs.updateStatus(job.id, 'completed', { lastError: null });
    ctx.logger.info('job completed', { jobId: job.id, durationMs: Date.now() - start });
    return;
  }

  let failure = result.timedOut
    ? `timed out after ${timeoutMs}ms`
    : `exited with code ${result.exitCode ?? 'unknown'}`;
  if (result.stderr.trim()) failure += `: ${result.stderr.trim()}`;
  handleFailure(ctx, job, truncate(failure));
}

function handleFailure(ctx: WorkerContext, job: Job, lastError: string) {
  const attempts = job.attempts + 1;
  const { backoff_base_seconds } = ctx.config.current();
  const decision = nextAttempt(attempts, job.retry_limit, backoff_base_seconds);

  if (decision.kind === 'exhausted') {
    ctx.jobs.updateStatus(job.id, 'dead', { attempts, lastError });
    ctx.logger.warn('job moved to DLQ', { jobId: job.id, attempts, lastError });
    return;
  }

  const now = (ctx.clock ?? (() => new Date()))();
  const nextRunAt = retryAt(now, decision.delaySeconds).toISOString();
  ctx.jobs.updateStatus(job.id, 'pending', { attempts, nextRunAt, lastError });
  ctx.logger.warn('job failed, retry scheduled', {
    jobId: job.id,
    attempts,
    delaySeconds: decision.delaySeconds,
    nextRunAt,
    lastError,
  });
}
