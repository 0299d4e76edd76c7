import { describe, expect, it } from 'vitest';
import {
  MemorySessionBackend,
  RedisSessionBackend,
  SessionBackendType,
  createSessionBackend,
  determineBackendType,
} from '../../../src/storage/index.js';
import { ConfigurationError } from '../../../src/utils/errors.js';

describe('determineBackendType', () => {
  it.each([
    ['memory://', SessionBackendType.MEMORY],
    ['redis://localhost:6379/0', SessionBackendType.REDIS],
    ['rediss://cache.internal:6380', SessionBackendType.REDIS],
  ])('%s -> %s', (url, expected) => {
    expect(determineBackendType(url)).toBe(expected);
  });

  it('rejects unknown schemes and malformed urls', () => {
    expect(() => determineBackendType('postgres://db')).toThrow(ConfigurationError);
    expect(() => determineBackendType('not a url')).toThrow(ConfigurationError);
  });
});

describe('createSessionBackend', () => {
  it('defaults to the in-process backend', () => {
    expect(createSessionBackend()).toBeInstanceOf(MemorySessionBackend);
  });

  it('creates a redis backend without connecting', async () => {
    const backend = createSessionBackend('redis://localhost:6379');
    expect(backend).toBeInstanceOf(RedisSessionBackend);
    expect(backend.type).toBe('redis');
    await backend.close();
  });
});
