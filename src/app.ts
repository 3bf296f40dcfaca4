import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';

import { createApiRouter, type ApiRouterDeps } from './api/routes/index.js';
import { createHealthRoutes } from './api/routes/health.routes.js';
import { errorMiddleware } from './middleware/error.middleware.js';

export type AppDeps = ApiRouterDeps;

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  app.use(createHealthRoutes());
  app.use('/', createApiRouter(deps));
  app.use(errorMiddleware);

  return app;
}
