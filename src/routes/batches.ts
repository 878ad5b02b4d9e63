import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import { batchLimiter } from '../middleware/rate-limit.js';
import { validate, createBatchSchema, type CreateBatchBody } from '../middleware/validation.js';
import type { GenerationQueue } from '../queue/index.js';
import type { SqliteRepository } from '../repository/sqlite.js';
import type { GenerationJob, TierRatios } from '../types.js';

export interface BatchesRouterDeps {
  queue: GenerationQueue;
  repository: SqliteRepository;
  defaultTierRatios: TierRatios;
}

export function createBatchesRouter({ queue, repository, defaultTierRatios }: BatchesRouterDeps): Router {
  const router = Router();

  // POST /batches
  router.post(
    '/',
    batchLimiter,
    validate(createBatchSchema),
    (req: Request<Record<string, string>, unknown, CreateBatchBody>, res: Response, next: NextFunction) => {
      try {
        const body = req.body;

        if (body.autoSchedule) {
          const account = repository.getAccount(body.autoSchedule.accountId);
          if (!account) {
            return res.status(404).json({ error: `Account '${body.autoSchedule.accountId}' not found` });
          }
          if (account.platform !== body.platform) {
            return res.status(400).json({
              error: `Account '${account.id}' is a ${account.platform} account, batch targets ${body.platform}`,
            });
          }
        }

        const job: GenerationJob = { ...body, tierRatios: body.tierRatios ?? defaultTierRatios };
        const id = queue.enqueue(job);

        res.status(202).json({ id, status: 'pending' });
      } catch (error) {
        next(error);
      }
    }
  );

  // GET /batches/:id
  router.get('/:id', (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const job = queue.get(req.params.id);
      if (!job) {
        return res.status(404).json({ error: 'Batch not found' });
      }

      res.json({
        id: job.id,
        status: job.status,
        current_stage: job.currentStage,
        stages: job.stageReports,
        stats: job.stats,
        error: job.lastError,
        created_at: job.createdAt,
        updated_at: job.updatedAt,
      });
    } catch (error) {
      next(error);
    }
  });

  // GET /batches/:id/items
  router.get('/:id/items', (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      if (!queue.get(req.params.id)) {
        return res.status(404).json({ error: 'Batch not found' });
      }
      res.json({ items: repository.getContentItemsForJob(req.params.id) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
