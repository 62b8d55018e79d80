/**
 * Knowledge Monitor API Server
 * Express server with middleware configuration
 */

import 'dotenv/config';
import { pathToFileURL } from 'url';
import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { createAppContext, type AppContext } from '../app-context.js';
import { loadSettings } from '../config/settings.js';
import { EmbeddingVersionMismatch, PipelineError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { createRouter } from './routes.js';

export const logger = createLogger('api');

export function statusForError(err: Error): number {
  if (err instanceof EmbeddingVersionMismatch) return 503;
  if (err instanceof PipelineError) {
    switch (err.code) {
      case 'VALIDATION':
        return 400;
      case 'NOT_FOUND':
        return 404;
      default:
        return 500;
    }
  }
  // Malformed JSON bodies from express.json()
  if (err instanceof SyntaxError && 'body' in err) return 400;
  return 500;
}

// Create Express app
export function createApp(context: AppContext) {
  const app = express();

  // Security middleware
  app.use(helmet());

  // CORS configuration
  app.use(cors({
    origin: process.env.CORS_ORIGIN || '*',
    methods: ['GET', 'POST', 'PATCH'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  }));

  // JSON parsing
  app.use(express.json({ limit: '1mb' }));

  // Request logging
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = Date.now() - start;
      logger.info({
        method: req.method,
        url: req.url,
        status: res.statusCode,
        duration: `${duration}ms`,
      });
    });

    next();
  });

  // API routes
  app.use('/api/v1', createRouter(context));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Knowledge Monitor API',
      version: '0.1.0',
      description: 'Monitored web content, answered with citations',
      health: '/api/v1/health',
      stats: '/api/v1/stats',
    });
  });

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      error: 'Not found',
      path: req.path,
    });
  });

  // Error handler
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    const status = statusForError(err);

    if (status >= 500) {
      logger.error({
        error: err.message,
        stack: err.stack,
        method: req.method,
        url: req.url,
      }, 'Request failed');
    } else {
      logger.warn({ error: err.message, method: req.method, url: req.url, status }, 'Request rejected');
    }

    res.status(status).json({
      error: status === 500 ? 'Internal server error' : err.message,
      code: err instanceof PipelineError ? err.code : undefined,
      message: status === 500 && process.env.NODE_ENV !== 'development' ? 'An error occurred' : err.message,
    });
  });

  return app;
}

// Start server
export async function startServer(port: number = 3000, context: AppContext = createAppContext(loadSettings())) {
  // Refuse to serve answers from an index built by another embedding model
  await context.indexer.assertCompatible();
  const app = createApp(context);

  return new Promise<void>((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info(`Knowledge Monitor API server running on port ${port}`);
      logger.info(`Health check: http://localhost:${port}/api/v1/health`);
      resolve();
    });

    server.on('error', reject);
  });
}

// Run if executed directly
if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const port = parseInt(process.env.PORT || '3000', 10);
  startServer(port).catch((error: unknown) => {
    logger.error({ error }, 'Failed to start server');
    process.exit(1);
  });
}
