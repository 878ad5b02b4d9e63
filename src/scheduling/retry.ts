import type { ScheduledPost } from '../types.js';
import { HOUR_MS } from './timezone.js';

export interface RetryPolicy {
  maxRetries: number;
  baseBackoffHours: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxRetries: 3, baseBackoffHours: 2 };

export class RetryCoordinator {
  constructor(private readonly policy: RetryPolicy = DEFAULT_RETRY_POLICY) {}

  /** Backoff before the next attempt: base * 2^retryCount (2h, 4h, 8h with the defaults). */
  backoffHours(retryCount: number): number {
    return this.policy.baseBackoffHours * Math.pow(2, retryCount);
  }

  /**
   * Moves a post that failed transiently to its next attempt, or to `failed`
   * once the retry budget is spent. Returns a new value.
   */
  reschedule(post: ScheduledPost, now: Date, message?: string): ScheduledPost {
    if (post.status === 'failed') {
      return post;
    }

    if (post.retry.retryCount >= this.policy.maxRetries) {
      return {
        ...post,
        status: 'failed',
        errorMessage: message ?? post.errorMessage ?? `Gave up after ${post.retry.retryCount} retries`,
        retry: { ...post.retry, lastAttemptAt: now },
        updatedAt: now,
      };
    }

    const delayMs = this.backoffHours(post.retry.retryCount) * HOUR_MS;
    return {
      ...post,
      status: 'pending',
      scheduledTime: new Date(now.getTime() + delayMs),
      errorMessage: message ?? post.errorMessage,
      retry: { version: 1, retryCount: post.retry.retryCount + 1, lastAttemptAt: now },
      updatedAt: now,
    };
  }

  fail(post: ScheduledPost, now: Date, message: string): ScheduledPost {
    return {
      ...post,
      status: 'failed',
      errorMessage: message,
      retry: { ...post.retry, lastAttemptAt: now },
      updatedAt: now,
    };
  }
}
