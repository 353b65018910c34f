#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { dashboardPort, dbPath } from '../config.js';
import { getDB } from '../db/db.js';
import { QueueError } from '../core/errors.js';
import { JOB_STATES, isJobState } from '../core/types.js';
import { startDashboard } from '../web/server.js';
import { createLogger } from '../utils/logger.js';
import { getContext } from './context.js';
import { enqueue } from './enqueue.js';
import { startWorkers, stopWorkers } from './worker_cmd.js';
import { printStatus } from './status.js';
import { printList } from './list.js';
import { printDLQ } from './dlq.js';
import { retryFromDLQ } from './retry.js';
import { getConfigAll, printConfigValue, setConfigKV } from './config_cmd.js';

function positiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) throw new InvalidArgumentError('Must be a positive integer.');
  return n;
}

const program = new Command();

program
  .name('shellq')
  .description('CLI-based background job queue with retries, exponential backoff and a dead letter queue')
  .version('1.0.0');

program
  .command('init-db')
  .description('Initialize the job queue database')
  .action(() => {
    getDB();
    console.log(`Database initialized at: ${dbPath()}`);
  });

program
  .command('enqueue')
  .description(`Add a job, e.g. shellq enqueue '{"id":"job1","command":"echo hello"}'`)
  .argument('<job>', 'Job JSON with command and optional id, max_retries')
  .action((input: string) => {
    const { jobs, config } = getContext();
    const job = enqueue(jobs, config, input);
    console.log(`Job enqueued with ID: ${job.id}`);
  });

const worker = program.command('worker').description('Manage worker processes');
worker
  .command('start')
  .description('Start one or more background workers')
  .option('--count <n>', 'number of workers', positiveInt, 1)
  .action((opts: { count: number }) => startWorkers(getContext().supervisor, opts.count));
worker
  .command('stop')
  .description('Stop all running workers gracefully')
  .action(() => stopWorkers(getContext().supervisor));

program
  .command('status')
  .description('Show job counts per state and active workers')
  .action(() => {
    const { jobs, supervisor } = getContext();
    printStatus(jobs, supervisor);
  });

program
  .command('list')
  .description('List jobs, optionally filtered by state')
  .addOption(new Option('--state <state>', 'filter by state').choices(JOB_STATES))
  .action((opts: { state?: string }) => {
    const state = opts.state !== undefined && isJobState(opts.state) ? opts.state : undefined;
    printList(getContext().jobs, state);
  });

const dlq = program.command('dlq').description('Manage the dead letter queue');
dlq.command('list').description('View all jobs in the DLQ').action(() => printDLQ(getContext().jobs));
dlq
  .command('retry')
  .description('Move a job from the DLQ back to pending')
  .argument('<id>')
  .action((id: string) => retryFromDLQ(getContext().jobs, id));

const config = program.command('config').description('Manage configuration');
config
  .command('get')
  .argument('<key>')
  .action((key: string) => printConfigValue(getContext().config, key));
config
  .command('set')
  .argument('<key>')
  .argument('<value>')
  .action((key: string, value: string) => setConfigKV(getContext().config, key, value));
config
  .command('list')
  .action(() => console.log(getConfigAll(getContext().config)));

program
  .command('dashboard')
  .description('Serve the web dashboard')
  .option('--port <n>', 'port to listen on', positiveInt, dashboardPort())
  .action((opts: { port: number }) => {
    const { jobs, supervisor } = getContext();
    startDashboard(jobs, supervisor, opts.port, createLogger('web'));
  });

try {
  await program.parseAsync(process.argv);
} catch (err) {
  if (!(err instanceof QueueError)) throw err;
  console.error(`Error: ${err.message}`);
  process.exitCode = 1;
}
