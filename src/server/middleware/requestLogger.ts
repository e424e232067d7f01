import { Request, Response, NextFunction } from 'express';
import { getRequestContext, logger } from '../utils/logger';

/**
 * Structured access log. One `http` level entry per completed request, with
 * the status and duration; the request id comes from the async context.
 */
export const apiRequestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startedAt = getRequestContext()?.startTime ?? Date.now();

  res.on('finish', () => {
    logger.http('HTTP request', {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      durationMs: Date.now() - startedAt,
    });
  });

  next();
};
