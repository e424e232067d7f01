import express, { Express } from 'express';
import { setupRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { requestContext } from './middleware/requestContext';
import { apiRequestLogger } from './middleware/requestLogger';
import { securityHeaders } from './middleware/securityHeaders';
import { GameSessionManager } from './game/GameSessionManager';
import { config } from './config';

export interface AppOptions {
  /** Session registry to serve; a fresh one is created when omitted. */
  manager?: GameSessionManager;
}

/**
 * Build the HTTP application without binding a port, so tests can drive it
 * with supertest.
 */
export const createApp = (options: AppOptions = {}): Express => {
  const manager = options.manager ?? new GameSessionManager();
  const app = express();

  app.disable('x-powered-by');
  app.use(securityHeaders);

  // Correlation ids first, so every later log line (including the error
  // handler's) carries the request id.
  app.use(requestContext);
  app.use(apiRequestLogger);

  app.use(express.json({ limit: '16kb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      service: config.app.name,
      version: config.app.version,
      activeGames: manager.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api', setupRoutes(manager));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
