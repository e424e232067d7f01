import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';
import { ValidationError } from '../../shared/validation/schemas';
import { GameErrorCode, isGameError } from '../../shared/errors';
import { isEngineError } from '../../shared/engine';
import { config } from '../config';

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
}

/**
 * Body-parser failures carry `type` and `statusCode` instead of our own code.
 */
const bodyErrorType = (error: Error): string | null =>
  'type' in error && typeof error.type === 'string' ? error.type : null;

export const errorHandler = (error: AppError, req: Request, res: Response, _next: NextFunction) => {
  let statusCode = error.statusCode || 500;
  let message = error.message || 'Internal Server Error';
  let code = error.code || 'INTERNAL_ERROR';

  // Handle specific error types
  if (isGameError(error)) {
    statusCode = error.httpStatus;
    code = error.code;
  } else if (error instanceof ZodError) {
    statusCode = 400;
    code = 'INVALID_REQUEST';
    // Use the first issue message when available, fall back to generic message
    if (error.issues.length > 0) {
      const [issue] = error.issues;
      const field = issue.path.join('.');
      message = field ? `${field}: ${issue.message}` : issue.message;
    }
  } else if (error instanceof ValidationError) {
    statusCode = 400;
    code = error.code ?? 'INVALID_REQUEST';
  } else if (bodyErrorType(error) === 'entity.parse.failed') {
    statusCode = 400;
    code = 'INVALID_REQUEST';
    message = 'Request body is not valid JSON';
  } else if (bodyErrorType(error) === 'entity.too.large') {
    statusCode = 413;
    code = 'PAYLOAD_TOO_LARGE';
    message = 'Request body is too large';
  } else if (isEngineError(error)) {
    // Engine errors that escaped the session layer are bugs, not client faults.
    statusCode = 500;
    code = 'INTERNAL_ERROR';
  } else if (statusCode < 500 && !error.code) {
    code = 'INVALID_REQUEST';
  }

  if (isGameError(error) && statusCode >= 500 && error.code !== GameErrorCode.INTERNAL_ERROR) {
    // Capacity refusals are expected under load.
    logger.warn('Service Unavailable:', {
      error: error.message,
      url: req.url,
      method: req.method,
      statusCode,
      code,
    });
  } else if (statusCode >= 500) {
    logger.error('Server Error:', {
      error: error.message,
      stack: error.stack,
      url: req.url,
      method: req.method,
      ip: req.ip,
      userAgent: req.get('User-Agent'),
    });
    // Unexpected failures keep their details in the log only.
    if (code === 'INTERNAL_ERROR' && !config.isDevelopment) {
      message = 'Internal Server Error';
    }
  } else {
    logger.warn('Client Error:', {
      error: error.message,
      url: req.url,
      method: req.method,
      ip: req.ip,
      statusCode,
      code,
    });
  }

  const includeDebugDetails = config.isDevelopment && statusCode >= 500;

  const errorResponse = {
    success: false,
    error: {
      message,
      code,
      timestamp: new Date().toISOString(),
      ...(includeDebugDetails && {
        stack: error.stack,
      }),
    },
  };

  res.status(statusCode).json(errorResponse);
};

// Async error wrapper
type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown> | unknown;

export const asyncHandler = (fn: AsyncRequestHandler) => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};

// Create custom error
export const createError = (message: string, statusCode: number = 500, code?: string): AppError => {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  if (code) {
    error.code = code;
  }
  return error;
};

// Not found handler
export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  const error = createError(`Route ${req.originalUrl} not found`, 404, 'NOT_FOUND');
  next(error);
};
