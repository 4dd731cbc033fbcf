import { Redis } from 'ioredis';
import { getConfig } from './config.js';

// Lazy-loaded Redis connection - only connect when first accessed

let _client: Redis | null = null;

/**
 * Open a connection that fails commands fast while Redis is down,
 * so a round never blocks on the offline queue.
 */
export function createRedis(url: string): Redis {
  const client = new Redis(url, {
    maxRetriesPerRequest: 1,
    enableOfflineQueue: false,
    lazyConnect: false,
  });
  client.on('error', (err: Error) => {
    console.error('[Redis]', err.message);
  });
  return client;
}

/** The part of a client that waitForReady listens on */
export interface ReadySignal {
  status: string;
  once(event: 'ready', listener: () => void): unknown;
  off(event: 'ready', listener: () => void): unknown;
}

/**
 * Resolves true once the client is ready to take commands, or false if it
 * is still not ready after timeoutMs.
 */
export function waitForReady(client: ReadySignal, timeoutMs: number): Promise<boolean> {
  if (client.status === 'ready') return Promise.resolve(true);

  return new Promise((resolve) => {
    const onReady = () => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      client.off('ready', onReady);
      resolve(false);
    }, timeoutMs);
    client.once('ready', onReady);
  });
}

export function getRedis(): Redis {
  if (!_client) {
    _client = createRedis(getConfig().REDIS_URL);
  }
  return _client;
}

export async function closeRedis(): Promise<void> {
  if (_client) {
    const client = _client;
    _client = null;
    await client.quit();
  }
}
