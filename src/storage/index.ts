/**
 * Storage Module - session backends
 *
 *    const backend = createSessionBackend(settings.cacheUrl);
 *    const store = new SessionStore({ backend, maxItems: 50 });
 *    ...
 *    await store.close();
 */

export type { SessionBackendConfig } from './types.js';
export { SessionBackendType } from './types.js';
export { SessionBackend } from './provider.js';
export { MemorySessionBackend } from './memory-provider.js';
export { RedisSessionBackend } from './redis-provider.js';
export { createSessionBackend, determineBackendType, DEFAULT_CACHE_URL } from './factory.js';
