import type { Repository } from '../capabilities/index.js';
import { KeyedMutex } from '../concurrency/keyed-mutex.js';
import type { AppConfig } from '../config.js';
import { generateUUID } from '../db.js';
import { SchedulingError } from '../errors/index.js';
import { defaultRng, randomInt, type Rng } from '../pipeline/random.js';
import type { ContentItem, Platform, ScheduledPost, SocialAccount } from '../types.js';
import {
  DAY_MS,
  HOUR_MS,
  nextOptimalSlot,
  startOfNextUtcDay,
  startOfUtcDay,
  utcDayKey,
} from './timezone.js';

const MAX_LOOKAHEAD_DAYS = 14;
const JITTER_MINUTES = 30;
const SKIP_DAY_PROBABILITY = 0.1;

export interface PlatformRules {
  optimalHours: number[];
  minIntervalHours: number;
  dailyCap: number;
}

export interface ScheduleOptions {
  startTime?: Date;
  useJitter?: boolean;
}

export interface SchedulingEngineDeps {
  repository: Repository;
  rules: Record<Platform, PlatformRules>;
  useJitterByDefault?: boolean;
  rng?: Rng;
  now?: () => Date;
  mutex?: KeyedMutex;
}

export function platformRulesFromConfig(
  config: Pick<AppConfig, 'optimalHoursByPlatform' | 'minIntervalHoursByPlatform' | 'dailyCapByPlatform'>
): Record<Platform, PlatformRules> {
  const rulesFor = (platform: Platform): PlatformRules => ({
    optimalHours: config.optimalHoursByPlatform[platform],
    minIntervalHours: config.minIntervalHoursByPlatform[platform],
    dailyCap: config.dailyCapByPlatform[platform],
  });
  return {
    instagram: rulesFor('instagram'),
    tiktok: rulesFor('tiktok'),
    twitter: rulesFor('twitter'),
    onlyfans: rulesFor('onlyfans'),
  };
}

/**
 * Shifts a slot by a uniform ±30 minutes and, one time in ten, pushes it a full
 * day later so posting times never settle into a detectable pattern.
 */
export function applyJitter(time: Date, rng: Rng): Date {
  let shifted = time.getTime() + randomInt(rng, -JITTER_MINUTES, JITTER_MINUTES) * 60_000;
  if (rng() < SKIP_DAY_PROBABILITY) {
    shifted += DAY_MS;
  }
  return new Date(shifted);
}

export class SchedulingEngine {
  private readonly mutex: KeyedMutex;
  private readonly rng: Rng;
  private readonly now: () => Date;

  constructor(private readonly deps: SchedulingEngineDeps) {
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.rng = deps.rng ?? defaultRng;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Turns content items into pending posts for one account. Calls for the same
   * account are serialized so interval and daily-cap bookkeeping never interleaves.
   */
  async scheduleBatch(
    account: SocialAccount,
    items: ContentItem[],
    options: ScheduleOptions = {}
  ): Promise<ScheduledPost[]> {
    return this.mutex.runExclusive(account.id, async () => this.scheduleLocked(account, items, options));
  }

  private scheduleLocked(account: SocialAccount, items: ContentItem[], options: ScheduleOptions): ScheduledPost[] {
    const { repository } = this.deps;
    const rules = this.deps.rules[account.platform];
    const useJitter = options.useJitter ?? this.deps.useJitterByDefault ?? false;
    const intervalMs = rules.minIntervalHours * HOUR_MS;
    const timezone = account.timezone;

    const dayCounts = new Map<string, number>();
    const countFor = (date: Date): number => {
      const key = utcDayKey(date);
      const cached = dayCounts.get(key);
      if (cached !== undefined) return cached;
      const seeded = repository.countPendingBetween(account.id, startOfUtcDay(date), startOfNextUtcDay(date));
      dayCounts.set(key, seeded);
      return seeded;
    };

    let cursor = options.startTime ?? this.now();
    let cursorAtDayStart = false;
    let last = repository.lastScheduledTime(account.id);
    const posts: ScheduledPost[] = [];

    for (const item of items) {
      if (item.moderation?.rating === 'rejected') {
        console.warn(`[Scheduler] Skipping item ${item.id}: rejected by moderation`);
        continue;
      }
      if (!item.mediaUrl) {
        console.warn(`[Scheduler] Skipping item ${item.id}: no media to publish`);
        continue;
      }

      const horizon = cursor.getTime() + MAX_LOOKAHEAD_DAYS * DAY_MS;
      let placed: Date | null = null;

      while (placed === null) {
        if (cursor.getTime() > horizon) {
          throw new SchedulingError(
            `No slot within ${MAX_LOOKAHEAD_DAYS} days for item ${item.id} on account ${account.id}`
          );
        }

        if (countFor(cursor) >= rules.dailyCap) {
          cursor = startOfNextUtcDay(cursor);
          cursorAtDayStart = true;
          continue;
        }

        let candidate = nextOptimalSlot(cursor, timezone, rules.optimalHours, cursorAtDayStart);
        if (useJitter) {
          candidate = applyJitter(candidate, this.rng);
        }

        if (last && candidate.getTime() < last.getTime() + intervalMs) {
          const bound = new Date(last.getTime() + intervalMs);
          candidate = nextOptimalSlot(bound, timezone, rules.optimalHours, true);
        }

        if (countFor(candidate) >= rules.dailyCap) {
          const nextDay = startOfNextUtcDay(candidate);
          cursor = nextDay.getTime() > cursor.getTime() ? nextDay : startOfNextUtcDay(cursor);
          cursorAtDayStart = true;
          continue;
        }

        placed = candidate;
      }

      const createdAt = this.now();
      const post: ScheduledPost = {
        id: generateUUID(),
        accountId: account.id,
        contentItemId: item.id,
        scheduledTime: placed,
        timezone,
        status: 'pending',
        caption: item.caption,
        hashtags: item.hashtags,
        mediaUrl: item.mediaUrl,
        retry: { version: 1, retryCount: 0 },
        createdAt,
        updatedAt: createdAt,
      };

      repository.saveScheduledPost(post);
      posts.push(post);

      dayCounts.set(utcDayKey(placed), countFor(placed) + 1);
      cursor = placed;
      cursorAtDayStart = false;
      if (!last || placed.getTime() > last.getTime()) {
        last = placed;
      }
    }

    console.log(`[Scheduler] Scheduled ${posts.length}/${items.length} post(s) for account ${account.id}`);
    return posts;
  }
}
