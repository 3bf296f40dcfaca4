import type { Express } from 'express';

import type { Store } from '@core/repositories/store.js';

import { TokenBucketLimiter, type ApiAuthOptions, type TokenBucketOptions } from '@middleware/index.js';

import { AvailabilityService } from '@services/booking/availability.service.js';
import { ItemService } from '@services/items/item.service.js';

import { createApp } from '../../app.js';

export interface TestAppOptions {
  auth?: Partial<ApiAuthOptions>;
  rateLimit?: TokenBucketOptions;
  now?: () => number;
}

export const TEST_TIMEZONE = 'Europe/Moscow';

export function buildTestApp(store: Store, options: TestAppOptions = {}): Express {
  return createApp({
    availability: new AvailabilityService(store, TEST_TIMEZONE),
    items: new ItemService(store, TEST_TIMEZONE),
    auth: {
      enabled: false,
      headerKey: 'x-api-key',
      headerExtra: 'x-api-extra',
      keys: [],
      ...options.auth,
    },
    limiter: new TokenBucketLimiter(options.rateLimit ?? { ratePerSecond: 0, burst: 5 }, options.now),
    timezone: TEST_TIMEZONE,
  });
}
