import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ConfigRepo, JobRepo } from '../db/repo.js';
import { ValidationError } from '../core/errors.js';
import { Job } from '../core/types.js';

export const JobSpecSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String).optional(),
  command: z.string().refine((s) => s.trim().length > 0, { message: 'command must not be blank' }),
  max_retries: z.number().int().positive().optional(),
});

export type JobSpec = z.infer<typeof JobSpecSchema>;

/**
 * Parse a job description. Accepts a JSON string or an already-parsed value.
 */
export function parseJobSpec(input: unknown): JobSpec {
  let payload = input;
  if (typeof input === 'string') {
    try {
      payload = JSON.parse(input);
    } catch {
      throw new ValidationError('Invalid JSON for job payload.');
    }
  }

  const parsed = JobSpecSchema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => (i.path.length ? `${i.path.join('.')}: ${i.message}` : i.message))
      .join('; ');
    throw new ValidationError(`Invalid job: ${issues}`);
  }
  return parsed.data;
}

/**
 * Enqueue a new job in `pending`. The retry limit falls back to the
 * `max_retries` setting.
 */
export function enqueue(jobs: JobRepo, config: ConfigRepo, input: unknown, now = new Date()): Job {
  const parsed = parseJobSpec(input);
  const ts = now.toISOString();
  const job: Job = {
    id: parsed.id ?? randomUUID(),
    command: parsed.command,
    state: 'pending',
    attempts: 0,
    retry_limit: parsed.max_retries ?? Math.max(1, Math.trunc(config.current().max_retries)),
    created_at: ts,
    updated_at: ts,
    next_run_at: null,
    last_error: null,
  };

  jobs.insert(job);
  return job;
}
