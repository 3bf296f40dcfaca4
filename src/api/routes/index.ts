import { Router } from 'express';

import type { AvailabilityService } from '@services/booking/availability.service.js';
import type { ItemService } from '@services/items/item.service.js';

import { requireApiKey, type ApiAuthOptions } from '@middleware/api-auth.middleware.js';
import { rateLimitMiddleware, type TokenBucketLimiter } from '@middleware/rate-limit.middleware.js';

import { createAvailabilityRoutes } from './availability.routes.js';
import { createItemRoutes } from './items.routes.js';

export interface ApiRouterDeps {
  availability: AvailabilityService;
  items: ItemService;
  auth: ApiAuthOptions;
  limiter: TokenBucketLimiter;
  timezone: string;
}

/** Routes mounted under /api/v1, each guarded by key auth then the per-key limiter. */
export function createApiRouter(deps: ApiRouterDeps): Router {
  const limit = rateLimitMiddleware(deps.limiter);

  const v1Router = Router();
  v1Router.use('/availability', requireApiKey(deps.auth, 'read:availability'), limit);
  v1Router.use('/items', requireApiKey(deps.auth, 'read:items'), limit);
  v1Router.use(createAvailabilityRoutes(deps.availability, deps.timezone));
  v1Router.use(createItemRoutes(deps.items));

  const router = Router();
  router.use('/api/v1', v1Router);
  return router;
}
