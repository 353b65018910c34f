import { workersDir } from '../config.js';
import { getDB } from '../db/db.js';
import { ConfigRepo, JobRepo } from '../db/repo.js';
import { ShellExecutor } from './executor.js';
import { FileLivenessRegistry } from './registry.js';
import { createShutdownHandler, runWorkerProcess } from './worker_process.js';
import { createLogger } from '../utils/logger.js';

const workerId = Number(process.argv[2]) || 1;
const logger = createLogger(`worker:${workerId}`);
const controller = new AbortController();

const requestShutdown = createShutdownHandler(controller, logger);

process.on('SIGTERM', requestShutdown);
process.on('SIGINT', requestShutdown);

const db = getDB();

try {
  await runWorkerProcess({
    workerId,
    pid: process.pid,
    registry: new FileLivenessRegistry(workersDir()),
    jobs: new JobRepo(db),
    config: new ConfigRepo(db),
    executor: new ShellExecutor(),
    logger,
    signal: controller.signal,
  });
} finally {
  db.close();
}
