/**
 * TOTP Service Entry Point
 *
 * Serves RFC 6238 code generation and verification over a JSON API.
 */

import { Server } from 'http';
import { getConfig } from './config';
import { createApp } from './app';
import { logger } from './utils/logger';

let server: Server | null = null;
let isShuttingDown = false;

/**
 * Main application entry point
 */
function main(): void {
  logger.info('TOTP service starting...');

  const config = getConfig();
  logger.info(`Environment: ${config.env}`);

  const app = createApp(config);

  server = app.listen(config.port, config.host, () => {
    logger.info(`Server running on http://${config.host}:${config.port}`);
    logger.info(`Health check available at http://${config.host}:${config.port}/api/health`);
  });

  server.on('error', (error) => {
    logger.error('HTTP server error:', error);
    process.exit(1);
  });
}

/**
 * Handle graceful shutdown
 */
function shutdown(signal: string): void {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring signal:', signal);
    return;
  }

  isShuttingDown = true;
  logger.info(`Received ${signal}, shutting down gracefully...`);

  const current = server;
  if (current === null) {
    process.exit(0);
  } else {
    current.close((error) => {
      if (error) {
        logger.error('Error during shutdown:', error);
        process.exit(1);
      }
      logger.info('HTTP server closed');
      process.exit(0);
    });
  }

  // Force shutdown after 10 seconds
  setTimeout(() => {
    logger.error('Forced shutdown after timeout');
    process.exit(1);
  }, 10000).unref();
}

// Handle shutdown signals
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception:', error);
  shutdown('uncaughtException');
});

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection, reason:', reason);
  shutdown('unhandledRejection');
});

try {
  main();
} catch (error) {
  logger.error('Failed to start application:', error);
  process.exit(1);
}
