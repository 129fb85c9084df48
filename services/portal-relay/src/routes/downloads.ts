import { Router } from 'express';
import { ExpiredError, NotFoundError } from '../core/errors.js';
import { attachmentName } from '../core/jobs.js';
import { isUuid } from '../core/validation.js';
import type { AppContext } from '../types/appContext.js';
import { sendError } from './respond.js';

export function createDownloadsRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/download/:fileId', async (req, res) => {
    const { fileId } = req.params;

    try {
      const lookup = isUuid(fileId) ? await ctx.registry.resolve(fileId) : { status: 'not_found' as const };
      if (lookup.status === 'not_found') {
        throw new NotFoundError('File not found or already removed', 'FILE_NOT_FOUND');
      }
      if (lookup.status === 'expired') {
        throw new ExpiredError('File has expired', 'FILE_EXPIRED');
      }

      const { artifact } = lookup;
      res.download(artifact.path, attachmentName(artifact.logical_date), (error) => {
        if (!error) return;
        // The file disappeared between lookup and send: eviction won the race.
        sendError(res, new ExpiredError('File has expired', 'FILE_EXPIRED'));
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
