import { Request, Response, NextFunction } from 'express';
import { DatabaseError } from 'pg';
import { AppException, ErrorCode } from '../utils/exceptions';
import { metrics } from '../services/metrics.service';
import { logger } from '../config/logger.config';
import { env } from '../config/env.config';

/**
 * pg errors can carry schema details (relation, column, constraint names)
 */
function isDatabaseError(err: Error): boolean {
  return err instanceof DatabaseError || err.name.toLowerCase().includes('databaseerror');
}

export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  metrics.increment('errors_total');

  if (err instanceof AppException) {
    logger.warn('Application error', {
      code: err.errorCode,
      message: err.message,
      statusCode: err.statusCode,
      path: req.path,
      method: req.method,
      requestId: req.requestId,
    });

    return res.status(err.statusCode).json({
      error: {
        code: err.errorCode,
        message: err.message,
        ...(err.details ? { details: err.details } : {}),
      },
    });
  }

  const logPayload: Record<string, unknown> = {
    error: err.message,
    path: req.path,
    method: req.method,
    requestId: req.requestId,
  };

  if (env.NODE_ENV !== 'production') {
    logPayload.stack = err.stack;
  } else {
    logPayload.errorType = err.constructor.name;
  }

  const isDbError = isDatabaseError(err);
  if (isDbError) {
    metrics.increment('database_errors_total');
    logger.error('Database error', logPayload);
  } else {
    logger.error('Unexpected error', logPayload);
  }

  // Never echo internal error text to clients
  return res.status(500).json({
    error: {
      code: isDbError ? ErrorCode.DATABASE_ERROR : ErrorCode.INTERNAL_ERROR,
      message: 'An error occurred while processing your request',
    },
  });
};
