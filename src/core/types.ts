export const JOB_STATES = ['pending', 'processing', 'completed', 'dead'] as const;

export type JobState = (typeof JOB_STATES)[number];

export interface Job {
  id: string;
  command: string;
  state: JobState;
  attempts: number;
  retry_limit: number;
  created_at: string;
  updated_at: string;
  next_run_at: string | null;
  last_error: string | null;
}

export interface Config {
  max_retries: number;          // default retry_limit for new jobs
  backoff_base_seconds: number; // e.g. 2
}

export const DEFAULT_CONFIG: Config = {
  max_retries: 3,
  backoff_base_seconds: 2,
};

export function isJobState(value: string): value is JobState {
  return JOB_STATES.some((s) => s === value);
}
