import { logsDir, queueHome, workersDir } from '../config.js';
import { getDB } from '../db/db.js';
import { ConfigRepo, JobRepo } from '../db/repo.js';
import { FileLivenessRegistry } from '../core/registry.js';
import { ProcessLauncher, Supervisor } from '../core/supervisor.js';
import { createLogger } from '../utils/logger.js';

export interface CliContext {
  jobs: JobRepo;
  config: ConfigRepo;
  supervisor: Supervisor;
}

let ctx: CliContext | null = null;

export function getContext(): CliContext {
  if (ctx) return ctx;
  const db = getDB();
  const home = queueHome();
  const logger = createLogger('supervisor');
  ctx = {
    jobs: new JobRepo(db),
    config: new ConfigRepo(db),
    supervisor: new Supervisor({
      registry: new FileLivenessRegistry(workersDir(home)),
      launcher: new ProcessLauncher(home, logsDir(home), logger),
      logger,
    }),
  };
  return ctx;
}
