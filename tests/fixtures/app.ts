import os from 'os';
import path from 'path';
import { createApp } from '@/app.js';
import { DEFAULT_TIER_RATIOS } from '@/config.js';
import { GenerationQueue } from '@/queue/index.js';
import { SchedulingEngine } from '@/scheduling/engine.js';
import { TEST_RULES } from './rules.js';
import { createTestDb } from './db.js';

/**
 * The Express app wired as in production over an in-memory database,
 * WITHOUT starting the HTTP server or any worker. Pass `app` to supertest.
 */
export function createTestApp() {
  const { db, repository } = createTestDb();
  const queue = new GenerationQueue(db);
  const scheduler = new SchedulingEngine({ repository, rules: TEST_RULES });

  const app = createApp({
    config: {
      tierRatios: DEFAULT_TIER_RATIOS,
      useJitter: false,
      blob: { dir: path.join(os.tmpdir(), 'studio-test-media'), publicBaseUrl: 'http://localhost:3000/media' },
    },
    queue,
    repository,
    scheduler,
  });

  return { app, db, repository, queue, scheduler };
}
