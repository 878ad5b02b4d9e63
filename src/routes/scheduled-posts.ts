import { Router } from 'express';
import type { NextFunction, Request, Response } from 'express';
import type { SqliteRepository } from '../repository/sqlite.js';

export function createScheduledPostsRouter(repository: SqliteRepository): Router {
  const router = Router();

  // GET /scheduled-posts/:id
  router.get('/:id', (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const post = repository.getScheduledPost(req.params.id);
      if (!post) {
        return res.status(404).json({ error: 'Scheduled post not found' });
      }
      res.json(post);
    } catch (error) {
      next(error);
    }
  });

  // POST /scheduled-posts/:id/cancel
  router.post('/:id/cancel', (req: Request<{ id: string }>, res: Response, next: NextFunction) => {
    try {
      const cancelled = repository.cancelPending(req.params.id);
      if (cancelled) {
        return res.json(cancelled);
      }

      const post = repository.getScheduledPost(req.params.id);
      if (!post) {
        return res.status(404).json({ error: 'Scheduled post not found' });
      }
      res.status(409).json({ error: `Cannot cancel a post that is already ${post.status}` });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
