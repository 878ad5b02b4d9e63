import type { AccountHealth, Notifier, Publisher, PublisherRegistry, Repository } from '../capabilities/index.js';
import { FatalError, toError } from '../errors/index.js';
import { RetryCoordinator } from '../scheduling/retry.js';
import type { ScheduledPost, SocialAccount } from '../types.js';

export const MIN_HEALTH_SCORE = 70;
export const DEFAULT_DISPATCH_BATCH_SIZE = 100;

export type DispatchOutcome = 'published' | 'rescheduled' | 'failed' | 'skipped';

export interface DispatchResult {
  postId: string;
  outcome: DispatchOutcome;
  message?: string;
}

export interface PublishDispatcherDeps {
  repository: Repository;
  publishers: PublisherRegistry;
  retry: RetryCoordinator;
  notifier?: Notifier;
  batchSize?: number;
}

export class PublishDispatcher {
  private running = false;

  constructor(private readonly deps: PublishDispatcherDeps) {}

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Publishes up to `batchSize` pending posts that are due. Only one sweep runs
   * at a time; an overlapping call returns an empty list without touching anything.
   *
   * Posts of an account that fails the health gate stay pending. The rest of
   * that account's posts are reported as skipped and left out of later pages,
   * so they never take the place of publishable posts behind them.
   */
  async sweep(now: Date = new Date()): Promise<DispatchResult[]> {
    if (this.running) {
      console.log('[Dispatcher] Sweep already in progress, skipping');
      return [];
    }

    this.running = true;
    try {
      const batchSize = this.deps.batchSize ?? DEFAULT_DISPATCH_BATCH_SIZE;
      const skippedAccounts = new Set<string>();
      const results: DispatchResult[] = [];
      let attempted = 0;

      while (attempted < batchSize) {
        const due = this.deps.repository.loadDuePosts(now, batchSize - attempted, [...skippedAccounts]);
        if (due.length === 0) break;

        console.log(`[Dispatcher] ${due.length} post(s) due`);
        for (const post of due) {
          if (skippedAccounts.has(post.accountId)) {
            results.push({ postId: post.id, outcome: 'skipped', message: 'account unhealthy' });
            continue;
          }

          const result = await this.dispatch(post, now);
          results.push(result);
          if (result.outcome === 'skipped') {
            skippedAccounts.add(post.accountId);
          } else {
            attempted++;
          }
        }
      }
      return results;
    } finally {
      this.running = false;
    }
  }

  private async dispatch(post: ScheduledPost, now: Date): Promise<DispatchResult> {
    const { repository, publishers, retry } = this.deps;

    const account = repository.getAccount(post.accountId);
    if (!account) {
      const failed = retry.fail(post, now, `Account ${post.accountId} not found`);
      return this.finishFailed(failed, null);
    }

    try {
      const publisher = publishers.forPlatform(account.platform);

      const health = await this.checkHealth(publisher, account);
      if (!health.healthy) {
        console.warn(
          `[Dispatcher] Skipping post ${post.id}: account ${account.id} unhealthy` +
          ` (status=${account.status}, score=${health.score})`
        );
        return { postId: post.id, outcome: 'skipped', message: 'account unhealthy' };
      }

      const receipt = await publisher.publish(account, {
        mediaUrl: post.mediaUrl,
        caption: post.caption,
        hashtags: post.hashtags,
      });

      const published: ScheduledPost = {
        ...post,
        status: 'published',
        platformPostId: receipt.postId,
        platformUrl: receipt.url,
        publishedAt: now,
        errorMessage: undefined,
        retry: { ...post.retry, lastAttemptAt: now },
        updatedAt: now,
      };
      repository.updateScheduledPost(published);
      console.log(`[Dispatcher] Post ${post.id} published to ${account.platform} as ${receipt.postId}`);
      return { postId: post.id, outcome: 'published' };
    } catch (error: unknown) {
      const err = toError(error);

      if (err instanceof FatalError) {
        return this.finishFailed(retry.fail(post, now, err.message), account);
      }

      const next = retry.reschedule(post, now, err.message);
      if (next.status === 'failed') {
        return this.finishFailed(next, account);
      }

      repository.updateScheduledPost(next);
      console.warn(
        `[Dispatcher] Post ${post.id} failed (${err.message}), retry ${next.retry.retryCount}` +
        ` at ${next.scheduledTime.toISOString()}`
      );
      return { postId: post.id, outcome: 'rescheduled', message: err.message };
    }
  }

  /**
   * Local status first, then the platform. A health check that errors counts
   * as unhealthy unless the error is fatal, which fails the post.
   */
  private async checkHealth(publisher: Publisher, account: SocialAccount): Promise<AccountHealth> {
    if (!isLocallyHealthy(account)) {
      return { healthy: false, score: account.healthScore };
    }

    try {
      const health = await publisher.checkHealth(account);
      return { healthy: health.healthy, score: Math.min(health.score, account.healthScore) };
    } catch (error: unknown) {
      const err = toError(error);
      if (err instanceof FatalError) throw err;
      console.warn(`[Dispatcher] Health check for account ${account.id} failed: ${err.message}`);
      return { healthy: false, score: account.healthScore };
    }
  }

  private async finishFailed(post: ScheduledPost, account: SocialAccount | null): Promise<DispatchResult> {
    const message = post.errorMessage ?? 'Publish failed';
    this.deps.repository.updateScheduledPost(post);
    console.error(`[Dispatcher] Post ${post.id} failed permanently: ${message}`);

    if (this.deps.notifier) {
      try {
        await this.deps.notifier.publishFailed(post, account, message);
      } catch (error) {
        console.error(`[Dispatcher] Failure alert for post ${post.id} could not be sent:`, error);
      }
    }

    return { postId: post.id, outcome: 'failed', message };
  }
}

export function isLocallyHealthy(account: SocialAccount): boolean {
  return account.status === 'active' && account.healthScore >= MIN_HEALTH_SCORE;
}
