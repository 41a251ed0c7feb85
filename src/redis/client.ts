import Redis from 'ioredis';
import { env } from '../env';
import { log } from '../log';

let singleton: Redis | null = null;

export function createRedisClient(url: string = env.REDIS_URL): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 2,
    enableReadyCheck: true,
    lazyConnect: true,
  });

  client.on('ready', () => {
    log.info({ event: 'redis_ready' }, 'redis ready');
  });

  client.on('error', (error) => {
    log.error({ event: 'redis_error', err: error }, 'redis error');
  });

  client.on('end', () => {
    log.warn({ event: 'redis_end' }, 'redis connection ended');
  });

  return client;
}

export function getRedisClient(): Redis {
  if (!singleton) {
    singleton = createRedisClient();
  }
  return singleton;
}

export async function closeRedisClient(): Promise<void> {
  const client = singleton;
  singleton = null;
  if (!client) {
    return;
  }
  try {
    await client.quit();
  } catch (error) {
    log.warn({ event: 'redis_quit_failed', err: error }, 'redis quit failed');
    client.disconnect();
  }
}
