import { describe, it, expect } from 'vitest';
import { LATEST_RUN_AT, nextAttempt, retryAt } from '../src/core/retry.js';

describe('nextAttempt', () => {
  it('grows the delay as base^attempts', () => {
    expect(nextAttempt(1, 5, 2)).toEqual({ kind: 'retry', delaySeconds: 2 });
    expect(nextAttempt(2, 5, 2)).toEqual({ kind: 'retry', delaySeconds: 4 });
    expect(nextAttempt(4, 5, 2)).toEqual({ kind: 'retry', delaySeconds: 16 });
    expect(nextAttempt(3, 5, 3)).toEqual({ kind: 'retry', delaySeconds: 27 });
  });

  it('is exhausted once attempts reach the retry limit', () => {
    expect(nextAttempt(3, 3, 2)).toEqual({ kind: 'exhausted' });
    expect(nextAttempt(4, 3, 2)).toEqual({ kind: 'exhausted' });
  });

  it('keeps a base of 1 at one second', () => {
    expect(nextAttempt(1, 2, 1)).toEqual({ kind: 'retry', delaySeconds: 1 });
  });

  it('applies an optional cap', () => {
    expect(nextAttempt(6, 10, 2, 30)).toEqual({ kind: 'retry', delaySeconds: 30 });
    expect(nextAttempt(2, 10, 2, 30)).toEqual({ kind: 'retry', delaySeconds: 4 });
  });
});

describe('retryAt', () => {
  const now = new Date('2024-05-01T12:00:00.000Z');

  it('adds the delay in seconds', () => {
    expect(retryAt(now, 8).toISOString()).toBe('2024-05-01T12:00:08.000Z');
  });

  it('pins delays beyond year 9999 to the latest run time', () => {
    expect(retryAt(now, 1e13).toISOString()).toBe('9999-12-31T23:59:59.999Z');
    expect(retryAt(now, Math.pow(1e13, 30))).toEqual(LATEST_RUN_AT);
    expect(retryAt(now, Infinity)).toEqual(LATEST_RUN_AT);
  });
});
