import type { NextFunction, Request, Response } from 'express';
import { isAppError } from '../lib/errors';
import { logger } from '../logging/logger';

/** Errors raised by body-parser and other http-errors producers. */
function httpErrorStatus(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status >= 400 && err.status < 600 ? err.status : undefined;
  }
  return undefined;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isAppError(err)) {
    logger.error({ err }, 'Application error handled');
    return res.status(err.status).json({
      status: err.status,
      code: err.code,
      message: err.message,
      details: err.details,
    });
  }

  const status = httpErrorStatus(err);
  if (status !== undefined && status < 500) {
    logger.warn({ err }, 'Rejected malformed HTTP request');
    return res.status(status).json({
      status,
      code: 'bad_request',
      message: err instanceof Error ? err.message : 'Bad request.',
    });
  }

  logger.error({ err }, 'Unhandled error');
  return res.status(500).json({
    status: 500,
    code: 'internal_error',
    message: 'Unexpected error occurred.',
  });
}
