import { z } from 'zod';

import type { StateRepository, UserState } from '@core/repositories/state.repo.js';

import { logger } from '@utils/logger.js';

import type { RedisClient } from './redis.client.js';
import { redisConfig } from './redis.config.js';

/** The subset of Redis commands the state store issues. */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
  incr(key: string): Promise<number>;
  expire(key: string, seconds: number): Promise<void>;
}

export function keyValueFromRedis(client: RedisClient): KeyValueClient {
  return {
    get: (key) => client.get(key),
    set: async (key, value, ttlSeconds) => {
      if (ttlSeconds > 0) {
        await client.set(key, value, { EX: ttlSeconds });
      } else {
        await client.set(key, value);
      }
    },
    del: async (key) => {
      await client.del(key);
    },
    incr: (key) => client.incr(key),
    expire: async (key, seconds) => {
      await client.expire(key, seconds);
    },
  };
}

const StoredStateSchema = z.object({
  step: z.string(),
  data: z.record(z.unknown()),
  updatedAt: z.coerce.date(),
});

function safeParse(userId: number, raw: string | null): UserState | null {
  if (!raw) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn('[redis-state] unreadable state', { userId, err });
    return null;
  }
  const parsed = StoredStateSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn('[redis-state] state does not match schema', { userId });
    return null;
  }
  return { userId, ...parsed.data };
}

export class RedisStateRepository implements StateRepository {
  constructor(
    private readonly client: KeyValueClient,
    private readonly ttlSeconds: number = redisConfig.ttlSeconds,
  ) {}

  async getState(userId: number): Promise<UserState | null> {
    return safeParse(userId, await this.client.get(this.stateKey(userId)));
  }

  async setState(state: UserState): Promise<void> {
    const payload = JSON.stringify({ step: state.step, data: state.data, updatedAt: state.updatedAt.toISOString() });
    await this.client.set(this.stateKey(state.userId), payload, this.ttlSeconds);
  }

  async clearState(userId: number): Promise<void> {
    await this.client.del(this.stateKey(userId));
  }

  /** Fixed window: the first hit in a window sets its expiry. */
  async checkRateLimit(userId: number, limit: number, windowSeconds: number): Promise<boolean> {
    const key = `${redisConfig.prefixes.rateLimit}:${userId}`;
    const count = await this.client.incr(key);
    if (count === 1) {
      await this.client.expire(key, windowSeconds);
    }
    return count <= limit;
  }

  private stateKey(userId: number): string {
    return `${redisConfig.prefixes.state}:${userId}`;
  }
}
