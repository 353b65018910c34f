import os from 'node:os';
import path from 'node:path';

/** Root directory for the database, worker markers and worker logs. */
export function queueHome(): string {
  return process.env.SHELLQ_HOME ?? path.join(os.homedir(), '.shellq');
}

export function dbPath(home = queueHome()): string {
  return path.join(home, 'queue.db');
}

export function workersDir(home = queueHome()): string {
  return path.join(home, 'workers');
}

export function logsDir(home = queueHome()): string {
  return path.join(home, 'logs');
}

export function dashboardPort(): number {
  const n = Number(process.env.SHELLQ_PORT);
  return Number.isInteger(n) && n > 0 ? n : 3000;
}
