import { JobRepo } from '../db/repo.js';

export function retryFromDLQ(jobs: JobRepo, id: string) {
  jobs.resurrect(id);
  console.log(`Job '${id}' moved from DLQ to 'pending' queue.`);
}
