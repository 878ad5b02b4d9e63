import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';

export type DatabaseHandle = BetterSqlite3.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS templates (
    id TEXT PRIMARY KEY,
    category TEXT NOT NULL,
    tier TEXT NOT NULL CHECK(tier IN ('tier1', 'tier2', 'tier3')),
    prompt_fragment TEXT NOT NULL,
    tags TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS social_accounts (
    id TEXT PRIMARY KEY,
    platform TEXT NOT NULL CHECK(platform IN ('instagram', 'tiktok', 'twitter', 'onlyfans')),
    username TEXT NOT NULL,
    platform_user_id TEXT NOT NULL,
    access_token TEXT NOT NULL,
    access_secret TEXT,
    timezone TEXT NOT NULL DEFAULT 'UTC',
    status TEXT NOT NULL DEFAULT 'active'
      CHECK(status IN ('active', 'suspended', 'shadowbanned', 'rate_limited', 'disconnected')),
    health_score INTEGER NOT NULL DEFAULT 100,
    created_at TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at TEXT NOT NULL DEFAULT (datetime('now')),
    UNIQUE(platform, platform_user_id)
  );

  CREATE TABLE IF NOT EXISTS generation_jobs (
    id TEXT PRIMARY KEY,
    spec TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending'
      CHECK(status IN ('pending', 'running', 'completed', 'failed')),
    current_stage TEXT,
    stage_reports TEXT NOT NULL DEFAULT '[]',
    stats TEXT,
    last_error TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS content_items (
    id TEXT PRIMARY KEY,
    job_id TEXT NOT NULL,
    item_index INTEGER NOT NULL,
    prompt TEXT NOT NULL,
    template_id TEXT,
    tier TEXT NOT NULL CHECK(tier IN ('tier1', 'tier2', 'tier3')),
    asset_ref TEXT,
    media_url TEXT,
    stored INTEGER NOT NULL DEFAULT 0,
    caption TEXT,
    hashtags TEXT NOT NULL DEFAULT '[]',
    moderation TEXT,
    cost REAL NOT NULL DEFAULT 0,
    duration_seconds REAL NOT NULL DEFAULT 0,
    warnings TEXT NOT NULL DEFAULT '[]',
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS scheduled_posts (
    id TEXT PRIMARY KEY,
    account_id TEXT NOT NULL,
    content_item_id TEXT NOT NULL,
    scheduled_time TEXT NOT NULL,
    timezone TEXT NOT NULL DEFAULT 'UTC',
    status TEXT NOT NULL DEFAULT 'pending'
      CHECK(status IN ('pending', 'published', 'failed', 'cancelled')),
    caption TEXT,
    hashtags TEXT NOT NULL DEFAULT '[]',
    media_url TEXT NOT NULL,
    retry_state TEXT NOT NULL,
    platform_post_id TEXT,
    platform_url TEXT,
    published_at TEXT,
    error_message TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    FOREIGN KEY (account_id) REFERENCES social_accounts(id) ON DELETE CASCADE,
    FOREIGN KEY (content_item_id) REFERENCES content_items(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_content_items_job_id ON content_items(job_id);
  CREATE INDEX IF NOT EXISTS idx_scheduled_posts_status_time ON scheduled_posts(status, scheduled_time);
  CREATE INDEX IF NOT EXISTS idx_scheduled_posts_account_time ON scheduled_posts(account_id, scheduled_time);
  CREATE INDEX IF NOT EXISTS idx_generation_jobs_status ON generation_jobs(status, created_at);
`;

/**
 * Opens (or creates) the SQLite database and applies the schema.
 * Pass ':memory:' for an isolated throwaway database.
 */
export function openDatabase(dbPath: string): DatabaseHandle {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db: DatabaseHandle = new Database(dbPath);

  db.pragma('foreign_keys = ON');
  db.pragma('journal_mode = WAL');

  db.exec(SCHEMA);

  return db;
}

export const generateUUID = (): string => {
  return randomUUID();
};
