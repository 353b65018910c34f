import { JobRepo } from '../db/repo.js';
import { Supervisor } from '../core/supervisor.js';

export function formatStatus(jobs: JobRepo, supervisor: Supervisor): string {
  const { counts, oldestPending } = jobs.summary();
  const lines = [
    '--- Queue Status ---',
    `Active Workers: ${supervisor.activeWorkers().length}`,
    `Pending:        ${counts.pending}`,
    `Processing:     ${counts.processing}`,
    `Completed:      ${counts.completed}`,
    `Dead (DLQ):     ${counts.dead}`,
  ];
  if (oldestPending) lines.push(`Oldest pending: ${oldestPending}`);
  return lines.join('\n');
}

export function printStatus(jobs: JobRepo, supervisor: Supervisor) {
  console.log(formatStatus(jobs, supervisor));
}
