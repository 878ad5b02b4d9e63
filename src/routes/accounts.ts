import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { SchedulingError } from '../errors/index.js';
import {
  validate,
  createAccountSchema,
  scheduleItemsSchema,
  type CreateAccountBody,
  type ScheduleItemsBody,
} from '../middleware/validation.js';
import type { SqliteRepository } from '../repository/sqlite.js';
import { scheduledPostStatusSchema } from '../schemas.js';
import type { SchedulingEngine } from '../scheduling/engine.js';
import type { SocialAccount } from '../types.js';

export interface AccountsRouterDeps {
  repository: SqliteRepository;
  scheduler: SchedulingEngine;
  useJitterByDefault: boolean;
}

// Credentials never leave the service.
function publicAccount(account: SocialAccount) {
  return {
    id: account.id,
    platform: account.platform,
    username: account.username,
    platform_user_id: account.platformUserId,
    timezone: account.timezone,
    status: account.status,
    health_score: account.healthScore,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

export function createAccountsRouter({ repository, scheduler, useJitterByDefault }: AccountsRouterDeps): Router {
  const router = Router();

  // POST /accounts
  router.post(
    '/',
    validate(createAccountSchema),
    (req: Request<Record<string, string>, unknown, CreateAccountBody>, res: Response, next: NextFunction) => {
      try {
        const account = repository.insertAccount(req.body);
        res.status(201).json(publicAccount(account));
      } catch (error) {
        if (isUniqueViolation(error)) {
          return res.status(409).json({
            error: `A ${req.body.platform} account with user id '${req.body.platformUserId}' already exists`,
          });
        }
        next(error);
      }
    }
  );

  // GET /accounts/:id
  router.get('/:id', (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const account = repository.getAccount(req.params.id);
      if (!account) {
        return res.status(404).json({ error: 'Account not found' });
      }
      res.json(publicAccount(account));
    } catch (error) {
      next(error);
    }
  });

  // GET /accounts/:id/scheduled-posts?status=pending
  router.get('/:id/scheduled-posts', (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const status = scheduledPostStatusSchema.optional().safeParse(req.query.status);
      if (!status.success) {
        return res.status(400).json({
          error: 'Validation failed',
          details: status.error.issues.map((issue) => ({ path: 'status', message: issue.message })),
        });
      }

      const account = repository.getAccount(req.params.id);
      if (!account) {
        return res.status(404).json({ error: 'Account not found' });
      }
      res.json(repository.listScheduledPosts(account.id, status.data));
    } catch (error) {
      next(error);
    }
  });

  // POST /accounts/:id/schedule
  router.post(
    '/:id/schedule',
    validate(scheduleItemsSchema),
    async (req: Request<{ id: string }, unknown, ScheduleItemsBody>, res: Response, next: NextFunction) => {
      try {
        const account = repository.getAccount(req.params.id);
        if (!account) {
          return res.status(404).json({ error: 'Account not found' });
        }

        const { contentItemIds, startTime, useJitter } = req.body;
        const items = repository.getContentItems(contentItemIds);
        if (items.length !== contentItemIds.length) {
          const found = new Set(items.map((item) => item.id));
          return res.status(404).json({
            error: 'Content items not found',
            missing: contentItemIds.filter((id) => !found.has(id)),
          });
        }

        const posts = await scheduler.scheduleBatch(account, items, {
          startTime,
          useJitter: useJitter ?? useJitterByDefault,
        });

        res.status(201).json({ scheduled: posts, skipped: items.length - posts.length });
      } catch (error) {
        if (error instanceof SchedulingError) {
          return res.status(422).json({ error: error.message });
        }
        next(error);
      }
    }
  );

  return router;
}
