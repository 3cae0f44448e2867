// packages/worker/src/infrastructure/redis.ts
// Shared ioredis connection for BullMQ.
import { Redis } from 'ioredis';

import type { WorkerConfig } from '../config/env.js';
import { logger } from './logger.js';

let client: Redis | null = null;

export function createRedisClient(config: WorkerConfig): Redis {
  if (client) return client;

  client = new Redis({
    host: config.redis.host,
    port: config.redis.port,
    password: config.redis.password,
    // BullMQ workers block on Redis and require this to be null
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: false,
  });

  client.on('error', (err: Error) => {
    logger.error(err, { component: 'redis' });
  });

  client.on('connect', () => {
    logger.info('Redis connected', { component: 'redis' });
  });

  return client;
}

export async function closeRedisClient(): Promise<void> {
  if (!client) return;
  const current = client;
  client = null;
  await current.quit();
}
