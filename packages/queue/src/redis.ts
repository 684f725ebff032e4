import { Redis, type RedisOptions } from 'ioredis';
import { createLogger } from '@token-relay/core';

const logger = createLogger('redis');

let connection: Redis | null = null;

export interface RedisConfig {
  /** Wins over the discrete fields (Upstash, Railway, etc.) */
  url?: string;
  host?: string;
  port?: number;
  password?: string;
  db?: number;
}

// BullMQ workers block on Redis; they need unlimited retries per request
const connectionOptions: RedisOptions = {
  maxRetriesPerRequest: null,
  enableReadyCheck: false,
  lazyConnect: true,
};

export function createRedisConnection(config: RedisConfig = {}): Redis {
  if (connection) return connection;

  connection = config.url
    ? new Redis(config.url, connectionOptions)
    : new Redis({
        ...connectionOptions,
        host: config.host ?? 'localhost',
        port: config.port ?? 6379,
        password: config.password,
        db: config.db ?? 0,
      });

  connection.on('connect', () => {
    logger.info('Redis connected');
  });

  connection.on('error', (error: Error) => {
    logger.error('Redis connection error', { error: error.message });
  });

  connection.on('close', () => {
    logger.debug('Redis connection closed');
  });

  return connection;
}

export function getRedisConnection(): Redis {
  if (!connection) {
    return createRedisConnection();
  }
  return connection;
}

export async function closeRedisConnection(): Promise<void> {
  if (connection) {
    await connection.quit();
    connection = null;
  }
}
