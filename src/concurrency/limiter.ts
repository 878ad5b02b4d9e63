import { toError } from '../errors/index.js';
import type { Result } from '../types.js';

export const DEFAULT_CONCURRENCY_LIMIT = 5;

export type Task<T> = () => Promise<T>;

/** Runs one task and captures its outcome instead of throwing. */
export async function settle<T>(task: Task<T>): Promise<Result<T>> {
  try {
    return { ok: true, value: await task() };
  } catch (error) {
    return { ok: false, error: toError(error) };
  }
}

/**
 * Fixed-size worker pool. Each worker pulls the next unstarted task, so at most
 * `limit` tasks are in flight no matter how many are submitted. Results are
 * all-settled and keep input order.
 */
export class ConcurrencyLimiter {
  constructor(readonly limit: number = DEFAULT_CONCURRENCY_LIMIT) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`Concurrency limit must be a positive integer, got ${limit}`);
    }
  }

  async run<T>(tasks: Task<T>[]): Promise<Result<T>[]> {
    const results: Result<T>[] = new Array(tasks.length);
    let next = 0;

    const worker = async (): Promise<void> => {
      while (next < tasks.length) {
        const index = next++;
        results[index] = await settle(tasks[index]);
      }
    };

    const workerCount = Math.min(this.limit, tasks.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));
    return results;
  }
}
