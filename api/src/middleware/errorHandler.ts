import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { GradebookError } from '../errors';
import { logger } from '../logger';

function requestId(req: Request): string | undefined {
  return 'id' in req ? String(req.id) : undefined;
}

function statusOf(err: Error): number {
  if (err instanceof GradebookError) return err.statusCode;
  // body-parser errors (malformed JSON, payload too large) carry their own status
  if ('status' in err && typeof err.status === 'number') return err.status;
  return 500;
}

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  const statusCode = statusOf(err);

  if (statusCode === 500) {
    logger.error({
      module: 'middleware.errorHandler',
      error_message: err.message,
      stack_trace: err.stack,
      request_id: requestId(req),
      path: req.path,
      error_type: err.name,
    }, 'Unhandled error');
  } else {
    logger.warn({
      module: 'middleware.errorHandler',
      error_message: err.message,
      request_id: requestId(req),
      path: req.path,
      error_type: err.name,
      status_code: statusCode,
    }, 'Request rejected');
  }

  res.status(statusCode).json({
    error: {
      message: statusCode === 500 ? 'Internal server error' : err.message,
      type: err.name,
      ...(config.nodeEnv !== 'production' && { stack: err.stack }),
    },
  });
}
