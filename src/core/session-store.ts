/**
 * Session Store
 *
 * Bounded, TTL-scoped conversation history keyed by reply thread.
 *
 * Both operations are fail-open: a backend outage reads as "no history"
 * and skips the write. Neither ever rejects.
 */

import { z } from 'zod';
import {
  ConversationItem,
  NewConversationItem,
  SessionRecord,
  ThreadKey,
  formatThreadKey,
} from './types/conversation.js';
import { SessionBackend } from '../storage/provider.js';
import { CacheUnavailableError, PersistenceError, errorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';

const log = logger.child('session-store');

const ConversationItemSchema = z.object({
  role: z.enum(['user', 'assistant', 'system', 'tool']),
  content: z.string(),
  kind: z.enum(['message', 'tool_call', 'tool_result', 'placeholder']),
  sequenceIndex: z.number().int().nonnegative(),
  toolName: z.string().optional(),
  callId: z.string().optional(),
});

const SessionRecordSchema = z.object({
  version: z.literal(1),
  items: z.array(ConversationItemSchema),
  createdAt: z.string(),
  expiresAt: z.string(),
});

const EXCLUDED_KINDS: ReadonlySet<ConversationItem['kind']> = new Set(['tool_call', 'tool_result', 'placeholder']);

export const DEFAULT_SESSION_TTL_SECONDS = 7 * 24 * 60 * 60;
export const DEFAULT_MAX_SESSION_ITEMS = 50;

/**
 * Drop tool invocation records and placeholder markers. Idempotent.
 */
export function filterItems<T extends Pick<ConversationItem, 'kind'>>(items: readonly T[]): T[] {
  return items.filter(item => !EXCLUDED_KINDS.has(item.kind));
}

/**
 * Keep the most recent `maxItems`, dropping the oldest first.
 */
export function trimItems<T>(items: readonly T[], maxItems: number): T[] {
  if (maxItems <= 0) {
    return [];
  }
  return items.length > maxItems ? items.slice(-maxItems) : [...items];
}

export type AppendableItem = NewConversationItem & { sequenceIndex?: number };

export interface SessionStoreConfig {
  backend: SessionBackend;
  maxItems?: number;
  ttlSeconds?: number;
  /** Budget for a single backend call; exceeding it counts as unavailable. */
  operationTimeoutMs?: number;
  now?: () => number;
}

export class SessionStore {
  private backend: SessionBackend;
  private maxItems: number;
  private ttlSeconds: number;
  private operationTimeoutMs: number;
  private now: () => number;
  private writeQueue: Map<string, Promise<void>> = new Map();

  constructor(config: SessionStoreConfig) {
    this.backend = config.backend;
    this.maxItems = config.maxItems ?? DEFAULT_MAX_SESSION_ITEMS;
    this.ttlSeconds = config.ttlSeconds ?? DEFAULT_SESSION_TTL_SECONDS;
    this.operationTimeoutMs = config.operationTimeoutMs ?? 5000;
    this.now = config.now ?? Date.now;
  }

  getMaxItems(): number {
    return this.maxItems;
  }

  getTtlSeconds(): number {
    return this.ttlSeconds;
  }

  /**
   * Load the persisted history for a thread. Empty when absent, expired,
   * unreadable, or when the backend is down.
   */
  async load(key: ThreadKey): Promise<ConversationItem[]> {
    const cacheKey = formatThreadKey(key);
    try {
      log.debug(`Loading conversation history: ${cacheKey}`);
      const record = await this.readRecord(cacheKey);
      const items = record?.items ?? [];
      log.debug(`Loaded ${items.length} items for ${cacheKey}`);
      return items;
    } catch (error) {
      log.error(`Failed to load session ${cacheKey}: ${errorMessage(error)}`);
      return [];
    }
  }

  /**
   * Append items to a thread's history, filter, trim to `maxItems` and
   * write the result back with a fresh TTL.
   *
   * Writes to the same key are serialised within this process, so two
   * concurrent turns on one thread both land.
   */
  async appendAndSave(key: ThreadKey, newItems: readonly AppendableItem[], ttlSeconds: number = this.ttlSeconds): Promise<void> {
    const cacheKey = formatThreadKey(key);
    const previous = this.writeQueue.get(cacheKey) ?? Promise.resolve();

    const next = previous.then(async () => {
      try {
        await this.writeMerged(cacheKey, newItems, ttlSeconds);
      } catch (error) {
        const failure = error instanceof PersistenceError
          ? error
          : new PersistenceError(`Failed to save session ${cacheKey}: ${errorMessage(error)}`, cacheKey);
        log.error(failure.message);
      }
    });

    this.writeQueue.set(cacheKey, next);

    try {
      await next;
    } finally {
      if (this.writeQueue.get(cacheKey) === next) {
        this.writeQueue.delete(cacheKey);
      }
    }
  }

  async clear(key: ThreadKey): Promise<void> {
    const cacheKey = formatThreadKey(key);
    try {
      await this.guard(this.backend.delete(cacheKey), cacheKey);
      log.debug(`Cleared session ${cacheKey}`);
    } catch (error) {
      log.error(`Failed to clear session ${cacheKey}: ${errorMessage(error)}`);
    }
  }

  async close(): Promise<void> {
    await Promise.all(this.writeQueue.values());
    await this.backend.close();
  }

  private async writeMerged(cacheKey: string, newItems: readonly AppendableItem[], ttlSeconds: number): Promise<void> {
    let existing: SessionRecord | undefined;
    try {
      existing = await this.readRecord(cacheKey);
    } catch (error) {
      throw new PersistenceError(
        `Skipping write for ${cacheKey}, existing history unreadable: ${errorMessage(error)}`,
        cacheKey
      );
    }

    const existingItems = existing?.items ?? [];
    const merged = [...existingItems, ...this.indexItems(existingItems, newItems)];
    const items = trimItems(filterItems(merged), this.maxItems);

    if (merged.length !== items.length) {
      log.debug(`Filtered/trimmed ${cacheKey}: ${merged.length} -> ${items.length} items`);
    }

    const nowMs = this.now();
    const record: SessionRecord = {
      version: 1,
      items,
      createdAt: existing?.createdAt ?? new Date(nowMs).toISOString(),
      expiresAt: new Date(nowMs + ttlSeconds * 1000).toISOString(),
    };

    await this.guard(this.backend.set(cacheKey, JSON.stringify(record), ttlSeconds), cacheKey);
    log.debug(`Saved ${items.length} items to ${cacheKey} with TTL ${ttlSeconds}s`);
  }

  /**
   * Continue the thread's sequence. An incoming index is kept when it is
   * ahead of the sequence, so history copied to a new key keeps its numbering.
   */
  private indexItems(existing: readonly ConversationItem[], incoming: readonly AppendableItem[]): ConversationItem[] {
    let next = existing.length > 0 ? existing[existing.length - 1].sequenceIndex + 1 : 0;
    return incoming.map(item => {
      const sequenceIndex = Math.max(next, item.sequenceIndex ?? 0);
      next = sequenceIndex + 1;
      return { ...item, sequenceIndex };
    });
  }

  private async readRecord(cacheKey: string): Promise<SessionRecord | undefined> {
    const raw = await this.guard(this.backend.get(cacheKey), cacheKey);
    if (raw === undefined) {
      return undefined;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      log.warn(`Discarding unparsable session payload for ${cacheKey}`);
      return undefined;
    }

    const result = SessionRecordSchema.safeParse(parsed);
    if (!result.success) {
      log.warn(`Discarding invalid session payload for ${cacheKey}: ${result.error.issues[0]?.message ?? 'unknown issue'}`);
      return undefined;
    }
    return result.data;
  }

  private guard<T>(operation: Promise<T>, cacheKey: string): Promise<T> {
    return withTimeout(
      operation,
      this.operationTimeoutMs,
      () => new CacheUnavailableError(`Session backend did not answer within ${this.operationTimeoutMs}ms for ${cacheKey}`)
    );
  }
}
