import Redis from 'ioredis'
import { getLogger } from '../lib/logger'

/**
 * Redis client for the worker heartbeat. Works with self-hosted Redis (redis://host:6379) and TLS providers
 * (rediss://...); TLS URLs get tls, enableReadyCheck: false, maxRetriesPerRequest: null.
 */
export function createRedisClient(redisUrl: string): Redis {
  const tls = redisUrl.startsWith('rediss://')
  getLogger('worker').info({ transport: tls ? 'tls' : 'tcp' }, 'Redis: connecting for worker heartbeat')
  return new Redis(redisUrl, {
    ...(tls ? { tls: {} } : {}),
    enableReadyCheck: false,
    maxRetriesPerRequest: null,
    lazyConnect: true,
  })
}
