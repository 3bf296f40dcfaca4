import { Router } from 'express';

import { snapshot } from '@utils/metrics.js';

export function createHealthRoutes(): Router {
  const router = Router();
  router.get('/health', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });
  router.get('/metrics', (_req, res) => {
    res.status(200).json(snapshot());
  });
  return router;
}
