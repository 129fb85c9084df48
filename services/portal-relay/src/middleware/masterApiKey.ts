import { createHash, timingSafeEqual } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Operator gate for job and debug routes. Disabled when no key is
 * configured; otherwise `x-api-key` must match.
 */
export function createMasterApiKeyMiddleware(masterApiKey: string) {
  const expected = masterApiKey ? digest(masterApiKey) : undefined;

  return (req: Request, res: Response, next: NextFunction) => {
    if (!expected) {
      next();
      return;
    }

    const incoming = req.header('x-api-key') ?? '';
    if (!incoming || !timingSafeEqual(digest(incoming), expected)) {
      res.status(401).json({
        error: {
          code: 'UNAUTHORIZED',
          message: 'Missing or invalid x-api-key',
        },
      });
      return;
    }

    next();
  };
}
