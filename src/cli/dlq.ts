import { JobRepo } from '../db/repo.js';

export function printDLQ(jobs: JobRepo) {
  const rows = jobs.listDLQ();
  if (rows.length === 0) {
    console.log('Dead Letter Queue is empty.');
    return;
  }
  console.log(`--- DLQ Jobs (${rows.length}) ---`);
  for (const job of rows) console.log(JSON.stringify(job, null, 2));
}
