import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';
import { sendError } from './respond.js';

export function createDebugRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/debug', async (_req, res) => {
    try {
      const sessions = await ctx.debug.list();
      res.json({ sessions, count: sessions.length });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/debug/:debugId', async (req, res) => {
    try {
      res.json(await ctx.debug.get(req.params.debugId));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
