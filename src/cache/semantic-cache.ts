import type pino from 'pino';
import { CacheConfigSchema, type CacheConfigInput } from '../core/types.js';
import type { EventBus } from '../core/events.js';
import { getLogger } from '../core/logger.js';
import { cosineSimilarity, HashedEmbedder, type EmbeddingFunction } from './embedding.js';

export interface CacheStats {
  size: number;
  hits: number;
  misses: number;
  hitRate: number;
  similarityThreshold: number;
}

/** What the orchestrator needs from a response cache. */
export interface ResponseCache {
  getCachedResponse(query: string): Promise<string | null>;
  cacheResponse(query: string, response: string): Promise<void>;
  getStats(): CacheStats;
  clear(): void;
}

interface CacheEntry {
  key: string;
  embedding: number[];
  response: string;
  storedAt: number;
}

export interface SemanticCacheOptions {
  embed?: EmbeddingFunction;
  logger?: pino.Logger;
  events?: EventBus;
  now?: () => number;
}

/**
 * Reuses a stored response when a new query is an exact (normalized) match
 * or its embedding is at least `similarityThreshold` cosine-similar to a
 * stored one. Entries expire after `ttlMs`; the oldest is evicted first once
 * `maxEntries` is reached.
 */
export class SemanticCache implements ResponseCache {
  private entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;
  private readonly threshold: number;
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly embed: EmbeddingFunction;
  private readonly logger: pino.Logger;
  private readonly events?: EventBus;
  private readonly now: () => number;

  constructor(config: CacheConfigInput = {}, options: SemanticCacheOptions = {}) {
    const resolved = CacheConfigSchema.parse(config);
    this.threshold = resolved.similarityThreshold;
    this.maxEntries = resolved.maxEntries;
    this.ttlMs = resolved.ttlMs;

    const embedder = new HashedEmbedder();
    this.embed = options.embed ?? (text => embedder.embed(text));
    this.logger = options.logger ?? getLogger();
    this.events = options.events;
    this.now = options.now ?? Date.now;
  }

  async getCachedResponse(query: string): Promise<string | null> {
    this.expire();
    const key = normalizeQuery(query);

    const exact = this.entries.get(key);
    if (exact) return this.hit(query, exact, 1);

    const embedding = this.embed(query);
    let best: CacheEntry | undefined;
    let bestScore = -1;
    for (const entry of this.entries.values()) {
      const score = cosineSimilarity(embedding, entry.embedding);
      if (score > bestScore) {
        best = entry;
        bestScore = score;
      }
    }

    if (best && bestScore >= this.threshold) {
      return this.hit(query, best, bestScore);
    }

    this.misses++;
    this.events?.emit('cache:miss', { query });
    return null;
  }

  async cacheResponse(query: string, response: string): Promise<void> {
    const key = normalizeQuery(query);
    this.entries.delete(key);
    this.entries.set(key, { key, embedding: this.embed(query), response, storedAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  getStats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      similarityThreshold: this.threshold,
    };
  }

  clear(): void {
    this.entries.clear();
  }

  private hit(query: string, entry: CacheEntry, similarity: number): string {
    this.hits++;
    this.logger.debug({ similarity, matched: entry.key }, 'Cache hit');
    this.events?.emit('cache:hit', { query });
    return entry.response;
  }

  private expire(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [key, entry] of this.entries) {
      if (entry.storedAt <= cutoff) this.entries.delete(key);
    }
  }
}

function normalizeQuery(query: string): string {
  return query.trim().toLowerCase().replace(/\s+/g, ' ');
}
