import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { enqueue } from '../src/cli/enqueue.js';
import { ShellExecutor } from '../src/core/executor.js';
import { runJob, workerLoop, WorkerContext } from '../src/core/worker.js';
import { silentLogger } from '../src/utils/logger.js';
import { createTestStore, FakeExecutor, result, TestStore } from './_helpers/store.js';

describe('worker', () => {
  let store: TestStore;

  beforeEach(() => {
    store = createTestStore();
  });

  afterEach(() => {
    store.cleanup();
  });

  function context(executor: WorkerContext['executor'], signal = new AbortController().signal): WorkerContext {
    return {
      workerId: 1,
      jobs: store.jobs,
      config: store.config,
      executor,
      logger: silentLogger,
      signal,
      pollIntervalMs: 10,
      clock: store.clock.now,
    };
  }

  function claim() {
    const job = store.jobs.claimNext();
    if (!job) throw new Error('expected a claimable job');
    return job;
  }

  describe('runJob', () => {
    it('marks a zero exit as completed', async () => {
      enqueue(store.jobs, store.config, { id: 'ok', command: 'true' }, store.clock.now());
      const executor = new FakeExecutor(() => result(0));

      await runJob(context(executor), claim());

      expect(executor.calls).toEqual(['true']);
      expect(store.jobs.getJob('ok')).toMatchObject({ state: 'completed', attempts: 0, last_error: null });
    });

    it('follows base^k backoff until the retry limit, then dead', async () => {
      store.config.set('backoff_base_seconds', '3');
      enqueue(store.jobs, store.config, { id: 'flaky', command: 'false', max_retries: 4 }, store.clock.now());
      const ctx = context(new FakeExecutor(() => result(1, 'nope')));

      for (const [k, delay] of [[1, 3], [2, 9], [3, 27]]) {
        const startedAt = store.clock.now().getTime();
        await runJob(ctx, claim());

        const job = store.jobs.getJob('flaky');
        expect(job).toMatchObject({
          state: 'pending',
          attempts: k,
          next_run_at: new Date(startedAt + delay * 1000).toISOString(),
          last_error: 'exited with code 1: nope',
        });
        store.clock.advance(delay * 1000);
      }

      await runJob(ctx, claim());
      expect(store.jobs.getJob('flaky')).toMatchObject({ state: 'dead', attempts: 4 });
      expect(store.jobs.claimNext()).toBeNull();
    });

    it('treats a timeout as a failure', async () => {
      enqueue(store.jobs, store.config, { id: 'slow', command: 'sleep 999' }, store.clock.now());
      const executor = new FakeExecutor(() => ({ exitCode: undefined, timedOut: true, stdout: '', stderr: '' }));

      await runJob({ ...context(executor), jobTimeoutMs: 50 }, claim());

      expect(store.jobs.getJob('slow')).toMatchObject({
        state: 'pending',
        attempts: 1,
        last_error: 'timed out after 50ms',
      });
    });

    it('treats an executor fault as a failure', async () => {
      enqueue(store.jobs, store.config, { id: 'broken', command: 'x', max_retries: 1 }, store.clock.now());
      const executor = new FakeExecutor(() => {
        throw new Error('spawn EACCES');
      });

      await runJob(context(executor), claim());

      expect(store.jobs.getJob('broken')).toMatchObject({
        state: 'dead',
        attempts: 1,
        last_error: 'execution error: spawn EACCES',
      });
    });

    it('runs `exit 1` twice into the DLQ with a base of 1', async () => {
      store.config.set('backoff_base_seconds', '1');
      enqueue(store.jobs, store.config, { id: 'J1', command: 'exit 1', max_retries: 2 }, store.clock.now());
      const ctx = context(new ShellExecutor());

      const firstAt = store.clock.now().getTime();
      await runJob(ctx, claim());
      expect(store.jobs.getJob('J1')).toMatchObject({
        state: 'pending',
        attempts: 1,
        next_run_at: new Date(firstAt + 1000).toISOString(),
      });
      expect(store.jobs.claimNext()).toBeNull();

      store.clock.advance(1000);
      await runJob(ctx, claim());
      expect(store.jobs.getJob('J1')).toMatchObject({ state: 'dead', attempts: 2 });
    });
    it('does not rerun a command whose completion could not be recorded', async () => {
      enqueue(store.jobs, store.config, { id: 'once', command: 'true', max_retries: 1 }, store.clock.now());
      const executor = new FakeExecutor(() => result(0));
      const job = claim();
      vi.spyOn(store.jobs, 'updateStatus').mockImplementationOnce(() => {
        throw new Error('database is locked');
      });

      await expect(runJob(context(executor), job)).rejects.toThrow('database is locked');

      expect(executor.calls).toEqual(['true']);
      expect(store.jobs.getJob('once')).toMatchObject({ state: 'processing', attempts: 0, last_error: null });
    });

    it('pins an oversized backoff to the latest representable run time', async () => {
      store.config.set('backoff_base_seconds', '1e13');
      enqueue(store.jobs, store.config, { id: 'huge', command: 'false', max_retries: 3 }, store.clock.now());
      const ctx = context(new FakeExecutor(() => result(1)));

      await runJob(ctx, claim());

      expect(store.jobs.getJob('huge')).toMatchObject({
        state: 'pending',
        attempts: 1,
        next_run_at: '9999-12-31T23:59:59.999Z',
      });
      expect(store.jobs.claimNext()).toBeNull();
    });
  });

  describe('workerLoop', () => {
    it('drains the queue and stops once aborted', async () => {
      for (const id of ['a', 'b', 'c']) {
        enqueue(store.jobs, store.config, { id, command: `run ${id}` }, store.clock.now());
        store.clock.advance(1);
      }
      const controller = new AbortController();
      const executor = new FakeExecutor((command) => {
        if (command === 'run c') controller.abort();
        return result(0);
      });

      await workerLoop(context(executor, controller.signal));

      expect(executor.calls).toEqual(['run a', 'run b', 'run c']);
      expect(store.jobs.findByState('completed').map((j) => j.id)).toEqual(['a', 'b', 'c']);
    });

    it('finishes the in-flight job before observing shutdown', async () => {
      enqueue(store.jobs, store.config, { id: 'a', command: 'run a' }, store.clock.now());
      store.clock.advance(1);
      enqueue(store.jobs, store.config, { id: 'b', command: 'run b' }, store.clock.now());
      const controller = new AbortController();
      const executor = new FakeExecutor(async () => {
        controller.abort();
        await new Promise((resolve) => setTimeout(resolve, 20));
        return result(0);
      });

      await workerLoop(context(executor, controller.signal));

      expect(store.jobs.getJob('a')?.state).toBe('completed');
      expect(store.jobs.getJob('b')?.state).toBe('pending');
    });

    it('does not claim anything once already aborted', async () => {
      enqueue(store.jobs, store.config, { id: 'a', command: 'run a' }, store.clock.now());
      const controller = new AbortController();
      controller.abort();
      const executor = new FakeExecutor(() => result(0));

      await workerLoop(context(executor, controller.signal));

      expect(executor.calls).toEqual([]);
      expect(store.jobs.getJob('a')?.state).toBe('pending');
    });
  });
});
