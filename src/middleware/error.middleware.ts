import { randomUUID } from 'crypto';

import type { NextFunction, Request, Response } from 'express';

import { BaseError } from '@core/errors/base-error.js';

import { logger } from '@utils/logger.js';

export const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const traceId = randomUUID();
  const status = err instanceof BaseError ? err.status : 500;
  const message = err instanceof Error ? err.message : 'Internal error';

  if (status >= 500) {
    logger.error('[api] request failed', { traceId, method: req.method, path: req.path, err });
  } else {
    logger.debug('[api] request rejected', { traceId, status, message });
  }

  res.status(status).json({ message, traceId });
};
