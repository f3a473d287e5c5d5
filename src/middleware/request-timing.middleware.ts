import { Request, Response, NextFunction } from 'express';
import { logger } from '../config/logger.config';
import { metrics } from '../services/metrics.service';

const SLOW_REQUEST_MS = 500;

export function requestTimingMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();

  res.on('finish', () => {
    const durationMs = Date.now() - start;
    metrics.recordDuration('http_request_ms', durationMs);

    if (durationMs > SLOW_REQUEST_MS) {
      logger.warn('Slow request detected', {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs,
        requestId: req.requestId,
      });
    }
  });

  next();
}
