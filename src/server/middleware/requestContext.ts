import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import { RequestContext as LoggerRequestContext, runWithContext, getRequestContext } from '../utils/logger';

/**
 * Express.Request augmentation so that req.requestId is available
 * throughout the codebase without additional casting.
 */
declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      requestId?: string;
    }
  }
}

/** Longest client-supplied X-Request-Id we echo back; longer ids are replaced. */
const MAX_REQUEST_ID_LENGTH = 128;

/**
 * Request context middleware that:
 * 1. Generates or extracts a request ID for correlation
 * 2. Attaches the ID to the request object and echoes it as X-Request-Id
 * 3. Establishes AsyncLocalStorage context for automatic log propagation
 */
export const requestContext = (req: Request, res: Response, next: NextFunction): void => {
  const headerId = (req.header('x-request-id') ?? '').trim();

  const requestId =
    headerId.length > 0 && headerId.length <= MAX_REQUEST_ID_LENGTH ? headerId : randomUUID();

  req.requestId = requestId;
  res.locals.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const context: LoggerRequestContext = {
    requestId,
    method: req.method,
    path: req.path,
    startTime: Date.now(),
  };

  runWithContext(context, () => {
    next();
  });
};

/**
 * Attach the game being operated on to the current request context so that
 * every log line written while handling the request carries it.
 */
export const updateContextWithGame = (gameId: string): void => {
  // AsyncLocalStorage store is shared by reference
  const context = getRequestContext();
  if (context) {
    context.gameId = gameId;
  }
};
