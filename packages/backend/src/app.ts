import express from 'express';
import type { Express } from 'express';
import cors from 'cors';
import type { ApiInfoResponse, HealthResponse } from '@symtest/shared';
import { createTestRouter } from './routes/test.route.js';
import { errorHandler } from './middleware/error.middleware.js';
import type { JobDeps } from './services/job.service.js';

export const API_VERSION = '1.0.0';

export function createApp(deps: JobDeps): Express {
  const app = express();

  const { corsOrigin } = deps.config;
  app.use(cors({ origin: corsOrigin === '*' ? true : corsOrigin }));
  app.use(express.json({ limit: deps.config.jsonLimit }));

  app.get('/', (_req, res) => {
    const info: ApiInfoResponse = {
      message: 'Symbolic test runner API',
      version: API_VERSION,
      endpoints: {
        'POST /test': 'Run a symbolic test against the given deploycode',
        'GET /health': 'Health check',
        'GET /': 'API information',
      },
    };
    res.json(info);
  });

  // Health check
  app.get('/health', (_req, res) => {
    const health: HealthResponse = { status: 'ok', timestamp: new Date().toISOString() };
    res.json(health);
  });

  // Routes
  app.use('/test', createTestRouter(deps));

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
