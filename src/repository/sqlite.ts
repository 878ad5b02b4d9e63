import { z } from 'zod';
import type { Repository, TemplateCatalog } from '../capabilities/index.js';
import { generateUUID, type DatabaseHandle } from '../db.js';
import {
  accountStatusSchema,
  jsonColumn,
  moderationVerdictSchema,
  platformSchema,
  retryStateSchema,
  stringListSchema,
  tierSchema,
} from '../schemas.js';
import type {
  AccountStatus,
  ContentItem,
  GenerationItem,
  Platform,
  ScheduledPost,
  ScheduledPostStatus,
  SocialAccount,
  Template,
} from '../types.js';

const optionalText = z
  .string()
  .nullable()
  .transform((v) => v ?? undefined);

const optionalDate = z
  .string()
  .nullable()
  .transform((v) => (v === null ? undefined : new Date(v)));

const templateRowSchema = z.object({
  id: z.string(),
  category: z.string(),
  tier: tierSchema,
  prompt_fragment: z.string(),
  tags: jsonColumn(stringListSchema),
});

const accountRowSchema = z.object({
  id: z.string(),
  platform: platformSchema,
  username: z.string(),
  platform_user_id: z.string(),
  access_token: z.string(),
  access_secret: optionalText,
  timezone: z.string(),
  status: accountStatusSchema,
  health_score: z.number(),
});

const contentItemRowSchema = z.object({
  id: z.string(),
  job_id: z.string(),
  item_index: z.number(),
  prompt: z.string(),
  template_id: optionalText,
  tier: tierSchema,
  asset_ref: optionalText,
  media_url: optionalText,
  stored: z.number(),
  caption: optionalText,
  hashtags: jsonColumn(stringListSchema),
  moderation: jsonColumn(moderationVerdictSchema).nullable(),
  cost: z.number(),
  duration_seconds: z.number(),
  warnings: jsonColumn(stringListSchema),
  created_at: z.string(),
});

const scheduledPostRowSchema = z.object({
  id: z.string(),
  account_id: z.string(),
  content_item_id: z.string(),
  scheduled_time: z.string(),
  timezone: z.string(),
  status: z.enum(['pending', 'published', 'failed', 'cancelled']),
  caption: optionalText,
  hashtags: jsonColumn(stringListSchema),
  media_url: z.string(),
  retry_state: jsonColumn(retryStateSchema),
  platform_post_id: optionalText,
  platform_url: optionalText,
  published_at: optionalDate,
  error_message: optionalText,
  created_at: z.string(),
  updated_at: z.string(),
});

function toTemplate(row: unknown): Template {
  const r = templateRowSchema.parse(row);
  return { id: r.id, category: r.category, tier: r.tier, promptFragment: r.prompt_fragment, tags: r.tags };
}

function toAccount(row: unknown): SocialAccount {
  const r = accountRowSchema.parse(row);
  return {
    id: r.id,
    platform: r.platform,
    username: r.username,
    platformUserId: r.platform_user_id,
    accessToken: r.access_token,
    accessSecret: r.access_secret,
    timezone: r.timezone,
    status: r.status,
    healthScore: r.health_score,
  };
}

function toContentItem(row: unknown): ContentItem {
  const r = contentItemRowSchema.parse(row);
  return {
    id: r.id,
    jobId: r.job_id,
    index: r.item_index,
    prompt: r.prompt,
    templateId: r.template_id,
    tier: r.tier,
    assetRef: r.asset_ref,
    mediaUrl: r.media_url,
    stored: r.stored === 1,
    caption: r.caption,
    hashtags: r.hashtags,
    moderation: r.moderation ?? undefined,
    cost: r.cost,
    durationSeconds: r.duration_seconds,
    warnings: r.warnings,
    createdAt: new Date(r.created_at),
  };
}

function toScheduledPost(row: unknown): ScheduledPost {
  const r = scheduledPostRowSchema.parse(row);
  return {
    id: r.id,
    accountId: r.account_id,
    contentItemId: r.content_item_id,
    scheduledTime: new Date(r.scheduled_time),
    timezone: r.timezone,
    status: r.status,
    caption: r.caption,
    hashtags: r.hashtags,
    mediaUrl: r.media_url,
    retry: r.retry_state,
    platformPostId: r.platform_post_id,
    platformUrl: r.platform_url,
    publishedAt: r.published_at,
    errorMessage: r.error_message,
    createdAt: new Date(r.created_at),
    updatedAt: new Date(r.updated_at),
  };
}

export interface NewAccount {
  platform: Platform;
  username: string;
  platformUserId: string;
  accessToken: string;
  accessSecret?: string;
  timezone: string;
  status?: AccountStatus;
  healthScore?: number;
}

const iso = (date: Date | undefined): string | null => (date ? date.toISOString() : null);

export class SqliteRepository implements Repository, TemplateCatalog {
  constructor(private readonly db: DatabaseHandle) {}

  // ─── templates ───

  list(): Template[] {
    return this.db.prepare('SELECT * FROM templates ORDER BY id').all().map(toTemplate);
  }

  insertTemplates(templates: Template[]): number {
    const insert = this.db.prepare(`
      INSERT OR REPLACE INTO templates (id, category, tier, prompt_fragment, tags)
      VALUES (?, ?, ?, ?, ?)
    `);
    const insertAll = this.db.transaction((rows: Template[]) => {
      for (const t of rows) {
        insert.run(t.id, t.category, t.tier, t.promptFragment, JSON.stringify(t.tags));
      }
      return rows.length;
    });
    return insertAll(templates);
  }

  // ─── accounts ───

  insertAccount(input: NewAccount): SocialAccount {
    const account: SocialAccount = {
      id: generateUUID(),
      platform: input.platform,
      username: input.username,
      platformUserId: input.platformUserId,
      accessToken: input.accessToken,
      accessSecret: input.accessSecret,
      timezone: input.timezone,
      status: input.status ?? 'active',
      healthScore: input.healthScore ?? 100,
    };
    const now = new Date().toISOString();

    this.db.prepare(`
      INSERT INTO social_accounts (
        id, platform, username, platform_user_id, access_token, access_secret,
        timezone, status, health_score, created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      account.id,
      account.platform,
      account.username,
      account.platformUserId,
      account.accessToken,
      account.accessSecret ?? null,
      account.timezone,
      account.status,
      account.healthScore,
      now,
      now
    );

    return account;
  }

  getAccount(id: string): SocialAccount | null {
    const row: unknown = this.db.prepare('SELECT * FROM social_accounts WHERE id = ?').get(id);
    return row === undefined ? null : toAccount(row);
  }

  // ─── content items ───

  saveContentItem(jobId: string, item: GenerationItem): ContentItem {
    const saved: ContentItem = { ...item, id: generateUUID(), jobId, createdAt: new Date() };

    this.db.prepare(`
      INSERT INTO content_items (
        id, job_id, item_index, prompt, template_id, tier, asset_ref, media_url, stored,
        caption, hashtags, moderation, cost, duration_seconds, warnings, created_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      saved.id,
      jobId,
      saved.index,
      saved.prompt,
      saved.templateId ?? null,
      saved.tier,
      saved.assetRef ?? null,
      saved.mediaUrl ?? null,
      saved.stored ? 1 : 0,
      saved.caption ?? null,
      JSON.stringify(saved.hashtags),
      saved.moderation ? JSON.stringify(saved.moderation) : null,
      saved.cost,
      saved.durationSeconds,
      JSON.stringify(saved.warnings),
      saved.createdAt.toISOString()
    );

    return saved;
  }

  /** Items in the order of `ids`; unknown ids are left out. */
  getContentItems(ids: string[]): ContentItem[] {
    if (ids.length === 0) return [];
    const placeholders = ids.map(() => '?').join(', ');
    const byId = new Map(
      this.db
        .prepare(`SELECT * FROM content_items WHERE id IN (${placeholders})`)
        .all(...ids)
        .map(toContentItem)
        .map((item) => [item.id, item] as const)
    );
    return ids.flatMap((id) => byId.get(id) ?? []);
  }

  getContentItemsForJob(jobId: string): ContentItem[] {
    return this.db
      .prepare('SELECT * FROM content_items WHERE job_id = ? ORDER BY item_index')
      .all(jobId)
      .map(toContentItem);
  }

  // ─── scheduled posts ───

  saveScheduledPost(post: ScheduledPost): void {
    this.db.prepare(`
      INSERT INTO scheduled_posts (
        id, account_id, content_item_id, scheduled_time, timezone, status, caption, hashtags,
        media_url, retry_state, platform_post_id, platform_url, published_at, error_message,
        created_at, updated_at
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      post.id,
      post.accountId,
      post.contentItemId,
      post.scheduledTime.toISOString(),
      post.timezone,
      post.status,
      post.caption ?? null,
      JSON.stringify(post.hashtags),
      post.mediaUrl,
      JSON.stringify(post.retry),
      post.platformPostId ?? null,
      post.platformUrl ?? null,
      iso(post.publishedAt),
      post.errorMessage ?? null,
      post.createdAt.toISOString(),
      post.updatedAt.toISOString()
    );
  }

  updateScheduledPost(post: ScheduledPost): void {
    this.db.prepare(`
      UPDATE scheduled_posts
      SET scheduled_time = ?, status = ?, retry_state = ?, platform_post_id = ?, platform_url = ?,
          published_at = ?, error_message = ?, updated_at = ?
      WHERE id = ?
    `).run(
      post.scheduledTime.toISOString(),
      post.status,
      JSON.stringify(post.retry),
      post.platformPostId ?? null,
      post.platformUrl ?? null,
      iso(post.publishedAt),
      post.errorMessage ?? null,
      post.updatedAt.toISOString(),
      post.id
    );
  }

  getScheduledPost(id: string): ScheduledPost | null {
    const row: unknown = this.db.prepare('SELECT * FROM scheduled_posts WHERE id = ?').get(id);
    return row === undefined ? null : toScheduledPost(row);
  }

  /** The account's posts in scheduled order, optionally with one status only. */
  listScheduledPosts(accountId: string, status?: ScheduledPostStatus): ScheduledPost[] {
    if (status) {
      return this.db
        .prepare('SELECT * FROM scheduled_posts WHERE account_id = ? AND status = ? ORDER BY scheduled_time ASC')
        .all(accountId, status)
        .map(toScheduledPost);
    }
    return this.db
      .prepare('SELECT * FROM scheduled_posts WHERE account_id = ? ORDER BY scheduled_time ASC')
      .all(accountId)
      .map(toScheduledPost);
  }

  /**
   * Moves a pending post to `cancelled` inside one transaction. Returns the
   * updated post, or null when the post is missing or no longer pending.
   */
  cancelPending(id: string, now: Date = new Date()): ScheduledPost | null {
    const cancel = this.db.transaction((postId: string) => {
      const current = this.getScheduledPost(postId);
      if (!current || current.status !== 'pending') return null;

      const cancelled: ScheduledPost = { ...current, status: 'cancelled', updatedAt: now };
      this.updateScheduledPost(cancelled);
      return cancelled;
    });
    return cancel(id);
  }

  loadDuePosts(now: Date, limit: number, excludeAccountIds: readonly string[] = []): ScheduledPost[] {
    return this.db
      .prepare(`
        SELECT * FROM scheduled_posts
        WHERE status = 'pending' AND scheduled_time <= ?
          AND account_id NOT IN (SELECT value FROM json_each(?))
        ORDER BY scheduled_time ASC
        LIMIT ?
      `)
      .all(now.toISOString(), JSON.stringify(excludeAccountIds), limit)
      .map(toScheduledPost);
  }

  lastScheduledTime(accountId: string): Date | null {
    const row = z
      .object({ last: z.string().nullable() })
      .parse(
        this.db
          .prepare(`
            SELECT MAX(scheduled_time) AS last FROM scheduled_posts
            WHERE account_id = ? AND status IN ('pending', 'published')
          `)
          .get(accountId)
      );
    return row.last === null ? null : new Date(row.last);
  }

  countPendingBetween(accountId: string, from: Date, to: Date): number {
    const row = z
      .object({ count: z.number() })
      .parse(
        this.db
          .prepare(`
            SELECT COUNT(*) AS count FROM scheduled_posts
            WHERE account_id = ? AND status = 'pending'
              AND scheduled_time >= ? AND scheduled_time < ?
          `)
          .get(accountId, from.toISOString(), to.toISOString())
      );
    return row.count;
  }
}
