/**
 * RedisSessionBackend - Redis-backed session storage
 *
 * The client connects lazily on first use; if the connection cannot be
 * established the operation rejects with CacheUnavailableError and the
 * next operation tries again.
 */

import { createClient, type RedisClientType } from 'redis';
import { SessionBackend } from './provider.js';
import { SessionBackendConfig } from './types.js';
import { CacheUnavailableError, ConfigurationError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.child('redis');
const MAX_RECONNECT_ATTEMPTS = 3;

export class RedisSessionBackend extends SessionBackend {
  readonly type = 'redis';
  private readonly client: RedisClientType;
  private readonly keyPrefix: string;
  private connecting: Promise<void> | null = null;

  constructor(config: SessionBackendConfig) {
    super(config);
    if (!config.redisUrl) {
      throw new ConfigurationError('Redis session backend requires a redis URL');
    }
    this.client = createClient({
      url: config.redisUrl,
      socket: {
        connectTimeout: 5000,
        reconnectStrategy: (retries: number) =>
          retries >= MAX_RECONNECT_ATTEMPTS ? new Error('Redis unreachable') : Math.min(retries * 200, 1000),
      },
    });
    this.keyPrefix = config.keyPrefix ?? '';
    this.client.on('error', (error: unknown) => {
      log.warn(`redis client error: ${errorMessage(error)}`);
    });
  }

  async get(key: string): Promise<string | undefined> {
    await this.ensureConnected();
    try {
      const raw = await this.client.get(this.buildKey(key));
      return raw ?? undefined;
    } catch (error) {
      throw new CacheUnavailableError(`Redis GET failed for '${key}': ${errorMessage(error)}`);
    }
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    await this.ensureConnected();
    try {
      await this.client.set(this.buildKey(key), value, { EX: Math.max(1, Math.floor(ttlSeconds)) });
    } catch (error) {
      throw new CacheUnavailableError(`Redis SET failed for '${key}': ${errorMessage(error)}`);
    }
  }

  async delete(key: string): Promise<void> {
    await this.ensureConnected();
    try {
      await this.client.del(this.buildKey(key));
    } catch (error) {
      throw new CacheUnavailableError(`Redis DEL failed for '${key}': ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
      log.debug('Redis connection closed');
    }
  }

  private buildKey(key: string): string {
    return `${this.keyPrefix}${key}`;
  }

  private async ensureConnected(): Promise<void> {
    if (this.client.isReady) {
      return;
    }
    if (!this.connecting) {
      this.connecting = this.client
        .connect()
        .then(() => {
          log.debug('Redis connection established');
        })
        .finally(() => {
          this.connecting = null;
        });
    }
    try {
      await this.connecting;
    } catch (error) {
      throw new CacheUnavailableError(`Redis connection failed: ${errorMessage(error)}`);
    }
  }
}
