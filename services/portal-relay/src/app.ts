import express, { type NextFunction, type Request, type Response } from 'express';
import { RelayError, ValidationError } from './core/errors.js';
import { isObject } from './core/validation.js';
import { createMasterApiKeyMiddleware } from './middleware/masterApiKey.js';
import { createConversionsRouter } from './routes/conversions.js';
import { createCookiesRouter } from './routes/cookies.js';
import { createDebugRouter } from './routes/debug.js';
import { createDownloadsRouter } from './routes/downloads.js';
import { createHealthRouter } from './routes/health.js';
import { createHelpRouter } from './routes/help.js';
import { createReportsRouter } from './routes/reports.js';
import { sendError } from './routes/respond.js';
import type { AppContext } from './types/appContext.js';

// Unknown paths stay ungated so they answer 404 rather than 401.
const GATED_PATHS = [
  '/generate-report',
  '/generate-report-direct',
  '/get-report-default',
  '/get-report-default-direct',
  '/download',
  '/pdf-to-png',
  '/extract-text',
  '/get-vollna-cookies',
  '/debug',
];

function bodyParserFailure(error: unknown): RelayError | undefined {
  if (!isObject(error)) return undefined;
  if (error.type === 'entity.parse.failed') {
    return new ValidationError('Request body is not valid JSON');
  }
  if (error.type === 'entity.too.large') {
    return new RelayError('Request body is too large', 'PAYLOAD_TOO_LARGE', 413);
  }
  return undefined;
}

export function createApp(ctx: AppContext): express.Express {
  const app = express();
  const requireApiKey = createMasterApiKeyMiddleware(ctx.settings.masterApiKey);

  app.use(express.json({ limit: '2mb' }));

  app.use(createHelpRouter(ctx));
  app.use(createHealthRouter(ctx));
  app.use('/files/images', express.static(ctx.settings.imagesDir, { dotfiles: 'ignore', index: false }));
  app.use('/files/debug', express.static(ctx.settings.debugDir, { dotfiles: 'ignore', index: false }));

  app.use(GATED_PATHS, requireApiKey);
  app.use(createReportsRouter(ctx));
  app.use(createDownloadsRouter(ctx));
  app.use(createConversionsRouter(ctx));
  app.use(createCookiesRouter(ctx));
  app.use(createDebugRouter(ctx));

  app.use((req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${req.method} ${req.path} not found`,
      },
    });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    sendError(res, bodyParserFailure(error) ?? error);
  });

  return app;
}
