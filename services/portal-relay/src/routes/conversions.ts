import { Router } from 'express';
import { ValidationError } from '../core/errors.js';
import { isObject, optionalString } from '../core/validation.js';
import type { AppContext } from '../types/appContext.js';
import { sendError } from './respond.js';

const MIN_DPI = 36;
const MAX_DPI = 600;

function parseDpi(input: unknown): number | undefined {
  if (input === undefined || input === null) return undefined;
  if (typeof input !== 'number' || !Number.isInteger(input) || input < MIN_DPI || input > MAX_DPI) {
    throw new ValidationError(`dpi must be an integer between ${MIN_DPI} and ${MAX_DPI}`);
  }
  return input;
}

function requireBody(body: unknown): Record<string, unknown> {
  if (!isObject(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return body;
}

export function createConversionsRouter(ctx: AppContext): Router {
  const router = Router();

  router.post('/pdf-to-png', async (req, res) => {
    try {
      const body = requireBody(req.body);
      res.json(await ctx.jobs.convertPdfToImages({ pdfUrl: body.pdf_url, dpi: parseDpi(body.dpi) }));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/extract-text', async (req, res) => {
    try {
      const body = requireBody(req.body);
      res.json(await ctx.jobs.extractText({ url: body.url, language: optionalString(body.language) }));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
