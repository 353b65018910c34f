import { Supervisor } from '../core/supervisor.js';

export function startWorkers(supervisor: Supervisor, count: number) {
  supervisor.start(count);
  console.log(`Successfully started ${count} worker(s).`);
  console.log("They will run in the background. Use 'shellq worker stop' to stop them.");
}

export async function stopWorkers(supervisor: Supervisor) {
  const result = await supervisor.stop();
  switch (result.kind) {
    case 'none':
      console.log('No active workers found.');
      break;
    case 'stopped':
      console.log(`All ${result.count} worker(s) stopped gracefully.`);
      break;
    case 'timeout':
      console.warn(
        `Some workers did not stop in time (pids: ${result.remaining.join(', ')}). They may need to be killed manually.`
      );
      process.exitCode = 1;
      break;
  }
}
