import { Router } from 'express';
import { parseSourceUrl, requiredString } from '../core/validation.js';
import type { AppContext } from '../types/appContext.js';
import { sendError } from './respond.js';

export function createCookiesRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/get-vollna-cookies', async (req, res) => {
    try {
      const email = requiredString(req.query.email, 'email');
      const password = requiredString(req.query.password, 'password');
      const finalUrl = parseSourceUrl(req.query.final_url, 'final_url').toString();

      res.json(await ctx.jobs.extractCookies({ email, password, finalUrl }));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
