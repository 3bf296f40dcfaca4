import { createClient } from 'redis';

import { logger } from '@utils/logger.js';

export type RedisClient = ReturnType<typeof createClient>;

export function createRedisClient(url: string): RedisClient {
  const client = createClient({ url });

  client.on('error', (err: Error) => {
    logger.error('[redis] error', { message: err.message });
  });
  client.on('connect', () => {
    logger.info('[redis] connected');
  });
  client.on('end', () => {
    logger.info('[redis] connection closed');
  });

  return client;
}

export async function connectRedis(client: RedisClient): Promise<void> {
  if (!client.isOpen) {
    await client.connect();
  }
}

export async function disconnectRedis(client: RedisClient): Promise<void> {
  if (client.isOpen) {
    await client.quit();
  }
}
