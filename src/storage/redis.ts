/**
 * Redis Connection
 *
 * Builds the ioredis connection options from appConfig and hands out a lazy
 * singleton client. The client is not created until first access, so
 * importing storage modules never opens a connection.
 */

import { Redis as IORedis } from 'ioredis';
import { appConfig } from '../config.js';

/** Redis connection config shape for ioredis */
export interface RedisConnectionConfig {
  host: string;
  port: number;
  password?: string;
  tls?: Record<string, never>;
  maxRetriesPerRequest: number;
}

/**
 * Parse a Redis URL into a connection config object.
 *
 * Supports redis:// and rediss:// (TLS) URL formats.
 */
export function parseRedisUrl(url: string, maxRetriesPerRequest: number): RedisConnectionConfig {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    ...(parsed.protocol === 'rediss:' && { tls: {} }),
    maxRetriesPerRequest,
  };
}

/**
 * Create a Redis connection config.
 *
 * If REDIS_URL is set, parses it into host/port/password components.
 * Otherwise uses individual REDIS_HOST/PORT/PASSWORD env vars.
 *
 * maxRetriesPerRequest is bounded so an unreachable server fails the
 * request (StorageUnavailable) instead of queueing it forever.
 */
export function createRedisConnection(): RedisConnectionConfig {
  const { url, host, port, password, maxRetriesPerRequest } = appConfig.redis;
  if (url) {
    return parseRedisUrl(url, maxRetriesPerRequest);
  }

  return { host, port, password, maxRetriesPerRequest };
}

// Lazy singleton, no connection at import time
let _redis: IORedis | null = null;

export function getRedis(): IORedis {
  if (!_redis) {
    _redis = new IORedis(createRedisConnection());
    _redis.on('error', (err: Error) => {
      console.error('[storage] Redis connection error:', err.message);
    });
  }
  return _redis;
}

/**
 * Close the Redis connection for graceful shutdown.
 * Resets the singleton so a new connection can be created if needed.
 */
export async function closeRedis(): Promise<void> {
  if (_redis) {
    await _redis.quit();
    _redis = null;
  }
}
