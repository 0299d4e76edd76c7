/**
 * SessionBackend - TTL-capable key/value store behind the session store
 *
 * Implementations:
 * - MemorySessionBackend (single process, tests, `memory://`)
 * - RedisSessionBackend (`redis://`, `rediss://`)
 *
 * Values are opaque strings; the session store owns their format.
 * Implementations reject with CacheUnavailableError when the store
 * cannot be reached.
 */

import { SessionBackendConfig } from './types.js';

export abstract class SessionBackend {
  protected config: SessionBackendConfig;

  constructor(config: SessionBackendConfig = {}) {
    this.config = config;
  }

  abstract readonly type: string;

  /**
   * Read a value. Absent and expired keys resolve to undefined.
   */
  abstract get(key: string): Promise<string | undefined>;

  /**
   * Write a value, replacing any previous one and resetting its TTL.
   */
  abstract set(key: string, value: string, ttlSeconds: number): Promise<void>;

  abstract delete(key: string): Promise<void>;

  /**
   * Release connections. Called once at shutdown.
   */
  abstract close(): Promise<void>;
}
