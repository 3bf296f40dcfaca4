import { config } from '@config/env.config';

export const redisConfig = {
  ttlSeconds: config.STATE_TTL_SECONDS,
  prefixes: {
    state: 'booking:state',
    rateLimit: 'booking:rate',
  },
} as const;
