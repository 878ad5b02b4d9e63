import express from 'express';
import type { Express } from 'express';
import type { AppConfig } from './config.js';
import { errorHandler } from './middleware/error-handler.js';
import { globalLimiter } from './middleware/rate-limit.js';
import type { GenerationQueue } from './queue/index.js';
import type { SqliteRepository } from './repository/sqlite.js';
import { createAccountsRouter } from './routes/accounts.js';
import { createBatchesRouter } from './routes/batches.js';
import { createScheduledPostsRouter } from './routes/scheduled-posts.js';
import type { SchedulingEngine } from './scheduling/engine.js';

export interface AppDeps {
  config: Pick<AppConfig, 'tierRatios' | 'useJitter' | 'blob'>;
  queue: GenerationQueue;
  repository: SqliteRepository;
  scheduler: SchedulingEngine;
}

/**
 * Builds the Express app without starting the HTTP server or any worker,
 * so route tests can hand it straight to supertest.
 */
export function createApp({ config, queue, repository, scheduler }: AppDeps): Express {
  const app = express();

  // Global rate limiter, applied before all routes
  app.use(globalLimiter);
  app.use(express.json({ limit: '1mb' }));

  // Health check endpoint
  app.get('/', (_req, res) => {
    res.json({ message: 'Avatar Content Studio API' });
  });

  // Stored media, referenced by published posts
  app.use('/media', express.static(config.blob.dir));

  app.use('/batches', createBatchesRouter({ queue, repository, defaultTierRatios: config.tierRatios }));
  app.use('/accounts', createAccountsRouter({ repository, scheduler, useJitterByDefault: config.useJitter }));
  app.use('/scheduled-posts', createScheduledPostsRouter(repository));

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
