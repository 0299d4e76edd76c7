/**
 * MemorySessionBackend - in-process TTL map
 *
 * Expiry is lazy: an expired entry is dropped when it is next read.
 * The clock is injectable so expiry can be exercised without waiting.
 */

import { SessionBackend } from './provider.js';
import { SessionBackendConfig } from './types.js';
import { CacheUnavailableError } from '../utils/errors.js';

interface MemoryEntry {
  value: string;
  expiresAt: number;
}

export class MemorySessionBackend extends SessionBackend {
  readonly type = 'memory';
  private entries: Map<string, MemoryEntry> = new Map();
  private available: boolean = true;
  private now: () => number;

  constructor(config: SessionBackendConfig = {}) {
    super(config);
    this.now = config.now ?? Date.now;
  }

  /**
   * Simulate an outage: while unavailable every operation rejects.
   */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  async get(key: string): Promise<string | undefined> {
    this.requireAvailable();
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlSeconds: number): Promise<void> {
    this.requireAvailable();
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return;
    }
    this.entries.set(key, {
      value,
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async delete(key: string): Promise<void> {
    this.requireAvailable();
    this.entries.delete(key);
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  size(): number {
    return this.entries.size;
  }

  private requireAvailable(): void {
    if (!this.available) {
      throw new CacheUnavailableError('Memory session backend is unavailable');
    }
  }
}
