import { JobRepo } from '../db/repo.js';
import { JOB_STATES, JobState } from '../core/types.js';

export function printList(jobs: JobRepo, state?: JobState) {
  if (!state) console.log('Listing all jobs (use --state to filter):');
  const states = state ? [state] : JOB_STATES;

  for (const s of states) {
    const rows = jobs.findByState(s);
    if (rows.length === 0) continue;
    console.log(`\n--- State: ${s.toUpperCase()} (${rows.length}) ---`);
    for (const job of rows) console.log(JSON.stringify(job, null, 2));
  }
}
