import type { Response } from 'express';
import { errorMessage, RelayError } from '../core/errors.js';

export function sendError(res: Response, error: unknown): void {
  if (res.headersSent) {
    res.end();
    return;
  }

  if (error instanceof RelayError) {
    res.status(error.statusCode).json({
      error: {
        code: error.code,
        message: error.message,
        ...(error.details ? { details: error.details } : {}),
      },
    });
    return;
  }

  res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message: errorMessage(error, 'Unexpected error'),
    },
  });
}
