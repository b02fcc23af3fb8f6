/**
 * Express application factory
 */

import express, { Application, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { AppConfig } from './config';
import { createTotpRouter } from './routes/totp-routes';
import { logger } from './utils/logger';

function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

/**
 * Create Express application with all middleware and routes
 */
export function createApp(config: AppConfig): Application {
  const app: Application = express();

  // Security middleware
  app.use(helmet());

  // CORS middleware
  app.use(cors({ origin: config.corsOrigin }));

  // Body parsing middleware
  app.use(express.json({ limit: config.jsonLimit }));

  app.use('/api', createTotpRouter(config));

  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'NotFound',
      message: `Route ${req.method} ${req.path} not found`,
    });
  });

  // Error handling middleware
  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = errorStatus(error);

    if (status >= 500) {
      logger.error('Unhandled error:', error);
      res.status(500).json({
        success: false,
        error: 'InternalError',
        message: 'Internal server error',
      });
      return;
    }

    res.status(status).json({
      success: false,
      error: 'BadRequest',
      message: error instanceof Error ? error.message : 'Bad request',
    });
  });

  return app;
}
