import { describe, it, expect } from 'vitest';
import { ConcurrencyLimiter, settle } from '@/concurrency/limiter.js';

const delay = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));

describe('ConcurrencyLimiter', () => {
  it('keeps input order even when later tasks finish first', async () => {
    const limiter = new ConcurrencyLimiter(3);
    const results = await limiter.run([
      async () => { await delay(30); return 'slow'; },
      async () => { await delay(10); return 'medium'; },
      async () => 'fast',
    ]);

    expect(results).toEqual([
      { ok: true, value: 'slow' },
      { ok: true, value: 'medium' },
      { ok: true, value: 'fast' },
    ]);
  });

  it('settles every task when some of them reject', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const results = await limiter.run([
      async () => 1,
      async () => { throw new Error('boom'); },
      async () => 3,
    ]);

    expect(results[0]).toEqual({ ok: true, value: 1 });
    expect(results[1].ok).toBe(false);
    if (!results[1].ok) expect(results[1].error.message).toBe('boom');
    expect(results[2]).toEqual({ ok: true, value: 3 });
  });

  it('never has more than `limit` tasks in flight', async () => {
    const limiter = new ConcurrencyLimiter(3);
    let inFlight = 0;
    let maxInFlight = 0;

    const tasks = Array.from({ length: 12 }, () => async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(5);
      inFlight--;
    });

    const results = await limiter.run(tasks);
    expect(results).toHaveLength(12);
    expect(maxInFlight).toBe(3);
  });

  it('returns an empty list for no tasks', async () => {
    expect(await new ConcurrencyLimiter().run([])).toEqual([]);
  });

  it('defaults to a limit of 5', () => {
    expect(new ConcurrencyLimiter().limit).toBe(5);
  });

  it('rejects a limit that is not a positive integer', () => {
    expect(() => new ConcurrencyLimiter(0)).toThrow('Concurrency limit must be a positive integer, got 0');
    expect(() => new ConcurrencyLimiter(2.5)).toThrow('got 2.5');
  });
});

// ─── settle ──────────────────────────────────────────────────────────────────

describe('settle', () => {
  it('wraps a non-Error rejection into an Error', async () => {
    const result = await settle(() => Promise.reject('plain string'));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe('plain string');
    }
  });
});
