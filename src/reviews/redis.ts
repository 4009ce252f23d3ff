/**
 * Redis Connection
 *
 * Lazy singleton ioredis client for the reviewed-summary store. Nothing
 * connects at import time, so modules importing this stay test-friendly.
 *
 * If REDIS_URL is set it wins; otherwise REDIS_HOST/PORT/PASSWORD are used.
 */

import { Redis as IORedis, type RedisOptions } from 'ioredis';
import { appConfig } from '../config.js';

/**
 * Parse a Redis URL into connection options.
 *
 * Supports redis:// and rediss:// (TLS) URL formats.
 */
export function parseRedisUrl(url: string): RedisOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: parsed.port ? parseInt(parsed.port, 10) : 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    ...(parsed.protocol === 'rediss:' && { tls: {} }),
  };
}

export function createRedisOptions(): RedisOptions {
  if (appConfig.redis.url) {
    return parseRedisUrl(appConfig.redis.url);
  }

  return {
    host: appConfig.redis.host,
    port: appConfig.redis.port,
    password: appConfig.redis.password,
  };
}

let _redis: IORedis | null = null;

export function getRedis(): IORedis {
  if (_redis) return _redis;
  _redis = new IORedis(createRedisOptions());
  return _redis;
}

/**
 * Close the connection for graceful shutdown.
 * Resets the singleton so a new connection can be created if needed.
 */
export async function closeRedis(): Promise<void> {
  if (_redis) {
    await _redis.quit();
    _redis = null;
  }
}
