/**
 * Session backend factory
 *
 * Picks the implementation from the cache URL scheme:
 * - memory://            -> MemorySessionBackend
 * - redis:// | rediss:// -> RedisSessionBackend
 */

import { SessionBackend } from './provider.js';
import { MemorySessionBackend } from './memory-provider.js';
import { RedisSessionBackend } from './redis-provider.js';
import { SessionBackendConfig, SessionBackendType } from './types.js';
import { ConfigurationError } from '../utils/errors.js';

export const DEFAULT_CACHE_URL = 'memory://';

export function determineBackendType(cacheUrl: string): SessionBackendType {
  let protocol: string;
  try {
    protocol = new URL(cacheUrl).protocol;
  } catch {
    throw new ConfigurationError(`Invalid cache URL: ${cacheUrl}`);
  }

  switch (protocol) {
    case 'memory:':
      return SessionBackendType.MEMORY;
    case 'redis:':
    case 'rediss:':
      return SessionBackendType.REDIS;
    default:
      throw new ConfigurationError(`Unsupported cache URL scheme '${protocol}' in ${cacheUrl}`);
  }
}

export function createSessionBackend(
  cacheUrl: string = DEFAULT_CACHE_URL,
  config: SessionBackendConfig = {}
): SessionBackend {
  const type = determineBackendType(cacheUrl);

  switch (type) {
    case SessionBackendType.REDIS:
      return new RedisSessionBackend({ ...config, redisUrl: cacheUrl });
    case SessionBackendType.MEMORY:
    default:
      return new MemorySessionBackend(config);
  }
}
