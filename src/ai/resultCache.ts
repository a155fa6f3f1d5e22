/**
 * Result Cache — two-tier store for AnalysisResults keyed by fingerprint.
 *
 * Tier 1: bounded in-process LRU (checked first).
 * Tier 2: shared key/value backend with TTL (Redis in production).
 *
 * Concurrent requests for the same key share one computation: the first
 * caller registers an in-flight promise and later callers await it
 * (wait-and-share). Failed computations are never cached.
 *
 * Stored results are deep-frozen and shared by every hit; callers must copy
 * a result before changing it.
 */

import { LRUCache } from 'lru-cache';
import type { AnalysisResult } from './types.js';
import { logger } from '../utils/logger.js';

export const DEFAULT_MEMORY_MAX_ENTRIES = 100;
export const DEFAULT_TTL_SECONDS = 3600;

const KEY_PREFIX = 'analysis:';

export interface CacheEntry {
  key: string;
  value: AnalysisResult;
  createdAt: number;
  expiresAt: number;
  hitCount: number;
}

export interface SharedCacheBackend {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds: number): Promise<void>;
  del(key: string): Promise<void>;
}

export interface ResultCacheDeps {
  backend: SharedCacheBackend;
  memoryMaxEntries?: number;
  defaultTtlSeconds?: number;
  now?: () => number;
}

export type CacheSource = 'memory' | 'shared' | 'computed' | 'joined';

export interface CacheLookup {
  value: AnalysisResult;
  source: CacheSource;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function isCacheEntry(entry: unknown): entry is CacheEntry {
  if (!isRecord(entry)) return false;
  return (
    typeof entry.key === 'string' &&
    typeof entry.expiresAt === 'number' &&
    typeof entry.createdAt === 'number' &&
    typeof entry.value === 'object' &&
    entry.value !== null
  );
}

export function createResultCache(deps: ResultCacheDeps) {
  const { backend } = deps;
  const now = deps.now ?? Date.now;
  const defaultTtlSeconds = deps.defaultTtlSeconds ?? DEFAULT_TTL_SECONDS;

  const memory = new LRUCache<string, CacheEntry>({
    max: deps.memoryMaxEntries ?? DEFAULT_MEMORY_MAX_ENTRIES,
  });
  const inFlight = new Map<string, Promise<AnalysisResult>>();
  const counters = { hits: 0, misses: 0 };

  async function readShared(key: string): Promise<CacheEntry | null> {
    try {
      const raw = await backend.get(KEY_PREFIX + key);
      if (!raw) return null;

      const parsed: unknown = JSON.parse(raw);
      if (!isCacheEntry(parsed)) {
        logger.warn({ key }, 'Result cache: discarding malformed shared entry');
        return null;
      }
      deepFreeze(parsed.value);
      return parsed;
    } catch (err) {
      logger.error({ err, key }, 'Result cache: shared tier read failed, treating as miss');
      return null;
    }
  }

  async function lookup(key: string): Promise<{ value: AnalysisResult; source: 'memory' | 'shared' } | null> {
    const current = now();

    const local = memory.get(key);
    if (local) {
      if (local.expiresAt > current) {
        local.hitCount += 1;
        counters.hits += 1;
        return { value: local.value, source: 'memory' };
      }
      memory.delete(key);
    }

    const shared = await readShared(key);
    if (shared && shared.expiresAt > current) {
      memory.set(key, { ...shared, hitCount: shared.hitCount + 1 });
      counters.hits += 1;
      return { value: shared.value, source: 'shared' };
    }

    counters.misses += 1;
    return null;
  }

  async function get(key: string): Promise<AnalysisResult | null> {
    const hit = await lookup(key);
    return hit ? hit.value : null;
  }

  /**
   * Write the shared tier first, then the in-process tier. A shared-tier
   * failure is logged and the local write still happens.
   */
  async function put(key: string, value: AnalysisResult, ttlSeconds = defaultTtlSeconds): Promise<void> {
    const createdAt = now();
    const entry: CacheEntry = {
      key,
      value: deepFreeze(value),
      createdAt,
      expiresAt: createdAt + ttlSeconds * 1000,
      hitCount: 0,
    };

    try {
      await backend.set(KEY_PREFIX + key, JSON.stringify(entry), ttlSeconds);
    } catch (err) {
      logger.error({ err, key }, 'Result cache: shared tier write failed');
    }

    memory.set(key, entry);
  }

  async function invalidate(key: string): Promise<void> {
    memory.delete(key);
    try {
      await backend.del(KEY_PREFIX + key);
    } catch (err) {
      logger.error({ err, key }, 'Result cache: shared tier delete failed');
    }
  }

  async function getOrCompute(
    key: string,
    compute: () => Promise<AnalysisResult>,
    ttlSeconds = defaultTtlSeconds,
  ): Promise<CacheLookup> {
    const pending = inFlight.get(key);
    if (pending) {
      logger.debug({ key }, 'Result cache: joining in-flight computation');
      return { value: await pending, source: 'joined' };
    }

    const hit = await lookup(key);
    if (hit) return hit;

    // Another caller may have registered while the lookup was awaiting
    const raced = inFlight.get(key);
    if (raced) {
      return { value: await raced, source: 'joined' };
    }

    const computation = (async () => {
      const value = await compute();
      await put(key, value, ttlSeconds);
      return value;
    })();

    inFlight.set(key, computation);
    try {
      return { value: await computation, source: 'computed' };
    } finally {
      inFlight.delete(key);
    }
  }

  function stats() {
    return {
      hits: counters.hits,
      misses: counters.misses,
      memorySize: memory.size,
      memoryMax: memory.max,
      inFlight: inFlight.size,
    };
  }

  return { get, put, invalidate, getOrCompute, stats };
}

export type ResultCache = ReturnType<typeof createResultCache>;
