import path from 'node:path';
import express, { type Express } from 'express';
import { createApiAuth } from './api/middleware/auth';
import { errorHandler, notFoundHandler } from './api/middleware/errors';
import { createPostsRouter, type PostsRouterDeps } from './api/routes/posts';
import { createPublicationsRouter } from './api/routes/publications';
import type { AppConfig } from './config';
import type { DatabaseClient } from './db';

export interface AppServices extends PostsRouterDeps {
  db: DatabaseClient;
}

export function createApp(config: AppConfig, services: AppServices): Express {
  const app = express();
  const requireApiAuth = createApiAuth({
    token: config.apiAuthToken,
    production: config.nodeEnv === 'production',
  });

  app.use(express.json({ limit: '1mb' }));
  app.use(`/${config.media.dir}`, express.static(path.resolve(config.media.dir)));

  app.get('/', (_req, res) => {
    res.json({
      service: 'social-publisher-server',
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/health', async (_req, res) => {
    const dbOk = await services.db.healthCheck();
    if (!dbOk) {
      res.status(503).json({ status: 'error', db: 'down' });
      return;
    }

    res.status(200).json({ status: 'ok', db: 'up' });
  });

  app.use('/api/posts', requireApiAuth, createPostsRouter(services));
  app.use('/api/publications', requireApiAuth, createPublicationsRouter(services));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
