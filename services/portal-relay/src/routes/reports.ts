import { Router, type Response } from 'express';
import { ConfigurationError, ValidationError } from '../core/errors.js';
import type { ReportFile } from '../core/jobs.js';
import { isObject, parseReportDate, requiredString } from '../core/validation.js';
import type { ReportRequest } from '../types/automation.js';
import type { AppContext } from '../types/appContext.js';
import { sendError } from './respond.js';

function credentialField(body: Record<string, unknown>, field: string): string {
  const value = body[field];
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return requiredString(value, field);
}

function parseReportBody(body: unknown): ReportRequest {
  if (!isObject(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  return {
    companyCode: credentialField(body, 'company_code'),
    username: credentialField(body, 'username'),
    password: credentialField(body, 'password'),
    reportDate: parseReportDate(body.report_date),
  };
}

function defaultReportRequest(ctx: AppContext, reportDate: unknown): ReportRequest {
  const { companyCode, username, password } = ctx.settings.defaultCredentials;
  const parsedDate = parseReportDate(reportDate);
  if (!companyCode || !username || !password) {
    throw new ConfigurationError(
      'Default credentials are not configured (DEFAULT_COMPANY_CODE, DEFAULT_USERNAME, DEFAULT_PASSWORD)',
    );
  }
  return { companyCode, username, password, reportDate: parsedDate };
}

export function createReportsRouter(ctx: AppContext): Router {
  const router = Router();

  const sendReportFile = (res: Response, file: ReportFile) => {
    res.download(file.path, file.filename, (error) => {
      ctx.jobs.releaseReportFile(file.path);
      if (error) sendError(res, error);
    });
  };

  router.post('/generate-report', async (req, res) => {
    try {
      const request = parseReportBody(req.body);
      res.json(await ctx.jobs.generateReport(request));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/generate-report-direct', async (req, res) => {
    try {
      const request = parseReportBody(req.body);
      sendReportFile(res, await ctx.jobs.generateReportFile(request));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/get-report-default', async (req, res) => {
    try {
      const request = defaultReportRequest(ctx, req.query.report_date);
      res.json(await ctx.jobs.generateReport(request));
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/get-report-default-direct', async (req, res) => {
    try {
      const request = defaultReportRequest(ctx, req.query.report_date);
      sendReportFile(res, await ctx.jobs.generateReportFile(request));
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
