import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export const SERVICE_VERSION = '0.1.0';

export function createHelpRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const gatewayKeyRequired = Boolean(ctx.settings.masterApiKey);
    res.json({
      service: 'portal-relay',
      version: SERVICE_VERSION,
      summary: 'Attendance reports, session cookies and document conversion as short-lived jobs.',
      base_url: ctx.settings.publicBaseUrl,
      endpoints: {
        'POST /generate-report': 'Generate an attendance report and get a download link',
        'POST /generate-report-direct': 'Generate an attendance report and receive the spreadsheet',
        'GET /get-report-default': 'Report link using the configured default credentials',
        'GET /get-report-default-direct': 'Report file using the configured default credentials',
        'GET /download/{file_id}': 'Download a previously generated report',
        'POST /pdf-to-png': 'Render every page of a PDF to PNG',
        'POST /extract-text': 'Extract text from an image or PDF',
        'GET /get-vollna-cookies': 'Log in to Vollna and return the session cookies',
        'GET /debug': 'List failure diagnostics',
        'GET /debug/{debug_id}': 'Inspect one failure diagnostics session',
        'GET /health': 'Liveness',
      },
      artifacts: {
        report_ttl_seconds: ctx.settings.artifactTtlSeconds,
        image_ttl_seconds: ctx.settings.imageTtlSeconds,
        expired_http_status: 410,
      },
      ...(gatewayKeyRequired ? { auth: { gateway_header: 'x-api-key: <MASTER_API_KEY>' } } : {}),
    });
  });

  return router;
}
