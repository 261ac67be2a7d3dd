import express from 'express';
import { createApiAuth } from './api/middleware/auth';
import type { AppConfig } from './config';
import type { DatabaseClient } from './db';
import type { PostScheduler } from './services/publishing/scheduler';

export const SERVICE_NAME = 'socialdraft-server';

export interface AppDeps {
  db: Pick<DatabaseClient, 'healthCheck'>;
  scheduler: Pick<PostScheduler, 'getStatus'>;
  config: Pick<AppConfig, 'apiAuthToken' | 'nodeEnv'>;
}

export function createApp({ db, scheduler, config }: AppDeps): express.Express {
  const app = express();
  const requireApiAuth = createApiAuth({ token: config.apiAuthToken, nodeEnv: config.nodeEnv });

  app.use(express.json());

  app.get('/', (_req, res) => {
    res.json({
      service: SERVICE_NAME,
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/health', async (_req, res) => {
    const dbOk = await db.healthCheck();
    if (!dbOk) {
      res.status(503).json({ status: 'error', db: 'down' });
      return;
    }

    res.status(200).json({ status: 'ok', db: 'up' });
  });

  app.get('/api/scheduler/status', requireApiAuth, (_req, res) => {
    res.status(200).json(scheduler.getStatus());
  });

  return app;
}
