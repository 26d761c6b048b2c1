/**
 * Embedding Cache Module
 *
 * In-memory LRU cache for query embeddings. The workflow may embed the same
 * question more than once per run (retries, repeated asks), and each embed
 * is a round trip to Ollama.
 *
 * @example
 * ```typescript
 * const cache = createEmbeddingCache({ maxSize: 500 });
 * cache.set(generateCacheKey('nomic-embed-text', 'query', question), vector);
 *
 * const stats = cache.getStats();
 * console.log(formatCacheStats(stats));
 * ```
 */

import { z } from 'zod';

// =============================================================================
// Cache Configuration Types
// =============================================================================

export const CacheEventSchema = z.object({
  type: z.enum(['set', 'get', 'delete', 'evict', 'expire', 'clear']),
  key: z.string().optional(),
  hit: z.boolean().optional(),
});

export type CacheEvent = z.infer<typeof CacheEventSchema>;

export const EmbeddingCacheConfigSchema = z.object({
  /** Least recently used entries are evicted beyond this */
  maxSize: z.number().int().positive().default(1000),
  /** 0 means entries never expire */
  ttlMs: z.number().int().nonnegative().default(0),
  onUpdate: z.function().args(CacheEventSchema).returns(z.void()).optional(),
});

export type EmbeddingCacheConfig = z.infer<typeof EmbeddingCacheConfigSchema>;
export type EmbeddingCacheConfigInput = z.input<typeof EmbeddingCacheConfigSchema>;

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  /** hits / (hits + misses), 0 before the first lookup */
  hitRate: number;
  evictions: number;
  expirations: number;
}

// =============================================================================
// LRU Cache Implementation
// =============================================================================

/**
 * Generic LRU cache with optional TTL. Map insertion order doubles as the
 * recency list: a hit re-inserts the key at the end.
 */
export class LRUCache<T> {
  private readonly cache = new Map<string, { value: T; expiresAt: number | null }>();
  private readonly maxSize: number;
  private readonly ttlMs: number;

  constructor(maxSize: number, ttlMs = 0) {
    this.maxSize = maxSize;
    this.ttlMs = ttlMs;
  }

  get(key: string): T | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt !== null && Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return undefined;
    }

    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry.value;
  }

  /**
   * Stores `value`, returning the keys evicted to make room.
   */
  set(key: string, value: T): string[] {
    this.cache.delete(key);

    const evicted: string[] = [];
    while (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
      evicted.push(oldest.value);
    }

    const expiresAt = this.ttlMs > 0 ? Date.now() + this.ttlMs : null;
    this.cache.set(key, { value, expiresAt });
    return evicted;
  }

  has(key: string): boolean {
    const entry = this.cache.get(key);
    if (!entry) {
      return false;
    }
    if (entry.expiresAt !== null && Date.now() > entry.expiresAt) {
      this.cache.delete(key);
      return false;
    }
    return true;
  }

  delete(key: string): boolean {
    return this.cache.delete(key);
  }

  clear(): void {
    this.cache.clear();
  }

  /** Includes entries that have expired but not been pruned yet */
  get size(): number {
    return this.cache.size;
  }

  keys(): IterableIterator<string> {
    return this.cache.keys();
  }

  /**
   * Removes expired entries and returns how many were removed.
   */
  prune(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, entry] of this.cache) {
      if (entry.expiresAt !== null && now > entry.expiresAt) {
        this.cache.delete(key);
        removed++;
      }
    }

    return removed;
  }
}

// =============================================================================
// Embedding Cache Implementation
// =============================================================================

/**
 * LRU cache of embedding vectors with hit/miss statistics.
 */
export class EmbeddingCache {
  private readonly config: EmbeddingCacheConfig;
  private readonly lru: LRUCache<number[]>;
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(config?: EmbeddingCacheConfigInput) {
    this.config = EmbeddingCacheConfigSchema.parse(config ?? {});
    this.lru = new LRUCache(this.config.maxSize, this.config.ttlMs);
  }

  get(key: string): number[] | undefined {
    const present = this.lru.size;
    const value = this.lru.get(key);

    if (value === undefined) {
      this.misses++;
      if (this.lru.size < present) {
        this.expirations++;
        this.notify({ type: 'expire', key });
      }
      this.notify({ type: 'get', key, hit: false });
      return undefined;
    }

    this.hits++;
    this.notify({ type: 'get', key, hit: true });
    return value;
  }

  set(key: string, embedding: number[]): void {
    const evicted = this.lru.set(key, embedding);
    for (const evictedKey of evicted) {
      this.evictions++;
      this.notify({ type: 'evict', key: evictedKey });
    }
    this.notify({ type: 'set', key });
  }

  has(key: string): boolean {
    return this.lru.has(key);
  }

  delete(key: string): boolean {
    const deleted = this.lru.delete(key);
    if (deleted) {
      this.notify({ type: 'delete', key });
    }
    return deleted;
  }

  /**
   * Drops every entry and resets the statistics.
   */
  clear(): void {
    this.lru.clear();
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
    this.expirations = 0;
    this.notify({ type: 'clear' });
  }

  get size(): number {
    return this.lru.size;
  }

  prune(): number {
    const removed = this.lru.prune();
    this.expirations += removed;
    return removed;
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.lru.size,
      maxSize: this.config.maxSize,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  private notify(event: CacheEvent): void {
    this.config.onUpdate?.(event);
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function createEmbeddingCache(config?: EmbeddingCacheConfigInput): EmbeddingCache {
  return new EmbeddingCache(config);
}

/**
 * Keys include the model so switching models never serves stale vectors.
 */
export function generateCacheKey(model: string, task: string, text: string): string {
  return `${model}|${task}|${text}`;
}

export function formatCacheStats(stats: CacheStats): string {
  const hitRatePercent = (stats.hitRate * 100).toFixed(2);
  return [
    `Embedding cache: ${stats.size}/${stats.maxSize} entries`,
    `hits=${stats.hits} misses=${stats.misses} (${hitRatePercent}%)`,
    `evictions=${stats.evictions} expirations=${stats.expirations}`,
  ].join(', ');
}
