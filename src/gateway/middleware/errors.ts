import { Request, Response, NextFunction } from 'express';
import { AuthCoreError, ErrorCategory } from '../../shared/errors';
import { createChildLogger } from '../../shared/logger';

const logger = createChildLogger({ module: 'http' });

export const STATUS_BY_CATEGORY: Record<ErrorCategory, number> = {
  'invalid-argument': 400,
  unauthenticated: 401,
  'permission-denied': 403,
  'not-found': 404,
  internal: 500,
};

export function createErrorMiddleware() {
  return (error: unknown, req: Request, res: Response, _next: NextFunction): void => {
    if (error instanceof AuthCoreError && error.category !== 'internal') {
      res.status(STATUS_BY_CATEGORY[error.category]).json({ error: error.message, code: error.code });
      return;
    }

    // express.json() rejects unparseable bodies with a SyntaxError
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Invalid JSON body', code: 'VALIDATION_FAILED' });
      return;
    }

    logger.error({ err: error, method: req.method, path: req.path }, 'Request failed');
    if (error instanceof AuthCoreError && error.retryable) {
      res.set('Retry-After', '1');
    }
    res.status(500).json({ error: 'Internal server error', code: 'INTERNAL' });
  };
}
