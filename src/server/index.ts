import { createServer } from 'http';
import { createApp } from './app';
import { logger } from './utils/logger';
import { config } from './config';

const app = createApp();
const server = createServer(app);

function startServer(): void {
  const { port, host } = config.server;

  server.listen(port, host, () => {
    logger.info(`Server running on ${host}:${port}`);
    logger.info(`Environment: ${config.nodeEnv}`, {
      version: config.app.version,
      maxActiveGames: config.games.maxActive,
    });
  });

  server.on('error', (error) => {
    logger.error('Failed to start server:', { error });
    process.exit(1);
  });

  // Graceful shutdown
  process.on('SIGTERM', gracefulShutdown);
  process.on('SIGINT', gracefulShutdown);
}

function gracefulShutdown(signal: string) {
  logger.info(`Received ${signal}. Starting graceful shutdown...`);

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force close after 10 seconds
  setTimeout(() => {
    logger.error('Could not close connections in time, forcefully shutting down');
    process.exit(1);
  }, 10000).unref();
}

// Handle uncaught exceptions
process.on('uncaughtException', (error) => {
  logger.error('Uncaught Exception:', { error });
  process.exit(1);
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled Rejection', { reason });
  process.exit(1);
});

startServer();

export { app, server };
