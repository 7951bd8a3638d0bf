/**
 * Final Express error middleware
 *
 * Maps HttpError subclasses to their status; everything else is a 500.
 */

import type { NextFunction, Request, Response } from 'express';
import { HttpError, errorMessage } from '../errors.js';
import { renderErrorPage } from '../html/pages.js';
import { logger } from '../observability/logger.js';

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction): void {
  const status = err instanceof HttpError ? err.status : 500;
  const message = err instanceof HttpError ? err.message : 'Internal Server Error';

  logger.error('Request failed', {
    method: req.method,
    path: req.path,
    status,
    error: errorMessage(err),
  });

  if (res.headersSent) {
    next(err);
    return;
  }

  res.status(status).type('html').send(renderErrorPage(status, message));
}
