import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      providers: ctx.providers,
      registry: {
        artifacts: ctx.registry.size(),
      },
      scheduler: {
        pending: ctx.scheduler.pending(),
      },
    });
  });

  return router;
}
