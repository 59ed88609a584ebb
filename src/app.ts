/**
 * Express Application Configuration
 */

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { errorHandler } from './middleware/error-handler';
import { rateLimitMiddleware } from './middleware/rate-limit.middleware';
import { rateLimitManager } from './lib/rate-limit';
import { getLinkStore } from './modules/links/links.store';
import { getClassifierHealth } from './lib/classification';

// Import routers
import crawlerRouter from './modules/crawler/crawler.router';
import linksRouter from './modules/links/links.router';

export const createApp = (): Application => {
  const app = express();

  // ============================================================================
  // Security & Middleware
  // ============================================================================

  app.use(helmet());

  app.use(
    cors({
      origin: env.CLIENT_URL,
      credentials: true,
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));

  if (env.RATE_LIMIT_ENABLED) {
    app.use('/api', rateLimitMiddleware({
      windowMs: env.RATE_LIMIT_WINDOW_MS,
      maxRequests: env.RATE_LIMIT_MAX_REQUESTS,
      message: 'Too many requests, please try again later.',
      standardHeaders: true,
      legacyHeaders: true,
    }));
  }

  // ============================================================================
  // Routes
  // ============================================================================

  app.get('/health', (req: Request, res: Response) => {
    res.json({
      success: true,
      message: 'Link crawler API is running',
      timestamp: new Date().toISOString(),
      environment: env.NODE_ENV,
      linkStore: getLinkStore().name,
      classifier: getClassifierHealth(),
      apiRateLimit: rateLimitManager.getStats(),
    });
  });

  app.use('/api/crawl', crawlerRouter);
  app.use('/api/links', linksRouter);

  // 404 Handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: 'Route not found',
      path: req.path,
    });
  });

  // ============================================================================
  // Error Handler (must be last)
  // ============================================================================

  app.use(errorHandler);

  return app;
};
