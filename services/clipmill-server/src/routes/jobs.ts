import { Router } from 'express';
import { jobNotFound } from '../core/jobStore.js';
import type { AppContext } from '../types/appContext.js';

export function createJobsRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/jobs/:id', async (req, res, next) => {
    try {
      const job = await ctx.store.get(req.params.id);
      if (!job) throw jobNotFound(req.params.id);
      res.json(job);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
