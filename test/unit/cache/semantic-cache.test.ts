import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../../src/core/events.js';
import { SemanticCache } from '../../../src/cache/semantic-cache.js';
import { HashedEmbedder, cosineSimilarity, tokenize } from '../../../src/cache/embedding.js';

describe('SemanticCache', () => {
  it('should return a stored response for the same normalized query', async () => {
    const cache = new SemanticCache();
    await cache.cacheResponse('What is TypeScript?', 'A typed superset of JavaScript.');

    expect(await cache.getCachedResponse('  what is   TYPESCRIPT? ')).toBe('A typed superset of JavaScript.');
  });

  it('should match a rephrased query with the same terms', async () => {
    const cache = new SemanticCache();
    await cache.cacheResponse('What is the capital city of France?', 'Paris');

    expect(await cache.getCachedResponse('capital city of France, please')).toBe('Paris');
  });

  it('should miss unrelated queries', async () => {
    const cache = new SemanticCache();
    await cache.cacheResponse('What is the capital city of France?', 'Paris');

    expect(await cache.getCachedResponse('weather forecast tomorrow')).toBeNull();
  });

  it('should respect the similarity threshold of a custom embedder', async () => {
    const vectors: Record<string, number[]> = {
      stored: [1, 0],
      close: [0.96, 0.28],
      far: [0.6, 0.8],
    };
    const cache = new SemanticCache({ similarityThreshold: 0.95 }, { embed: text => vectors[text] ?? [0, 1] });
    await cache.cacheResponse('stored', 'hit');

    expect(await cache.getCachedResponse('close')).toBe('hit');
    expect(await cache.getCachedResponse('far')).toBeNull();
  });

  it('should expire entries after the TTL', async () => {
    let now = 0;
    const cache = new SemanticCache({ ttlMs: 1000 }, { now: () => now });
    await cache.cacheResponse('question', 'answer');

    now = 999;
    expect(await cache.getCachedResponse('question')).toBe('answer');
    now = 1000;
    expect(await cache.getCachedResponse('question')).toBeNull();
    expect(cache.getStats().size).toBe(0);
  });

  it('should evict the oldest entry when full', async () => {
    const cache = new SemanticCache({ maxEntries: 2 });
    await cache.cacheResponse('alpha one', 'a');
    await cache.cacheResponse('bravo two', 'b');
    await cache.cacheResponse('charlie three', 'c');

    expect(cache.getStats().size).toBe(2);
    expect(await cache.getCachedResponse('alpha one')).toBeNull();
    expect(await cache.getCachedResponse('charlie three')).toBe('c');
  });

  it('should track hits and misses', async () => {
    const events = new EventBus();
    const hits = vi.fn();
    const misses = vi.fn();
    events.on('cache:hit', hits);
    events.on('cache:miss', misses);
    const cache = new SemanticCache({}, { events });

    await cache.getCachedResponse('first');
    await cache.cacheResponse('first', 'one');
    await cache.getCachedResponse('first');
    await cache.getCachedResponse('first');

    expect(cache.getStats()).toEqual({ size: 1, hits: 2, misses: 1, hitRate: 2 / 3, similarityThreshold: 0.95 });
    expect(hits).toHaveBeenCalledWith({ query: 'first' });
    expect(misses).toHaveBeenCalledTimes(1);
  });
});

describe('embedding', () => {
  it('should drop stop words and punctuation', () => {
    expect(tokenize('What is the capital of France?')).toEqual(['capital', 'france']);
  });

  it('should produce unit vectors', () => {
    const vector = new HashedEmbedder(64).embed('typed programming language');
    const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
    expect(vector).toHaveLength(64);
    expect(norm).toBeCloseTo(1, 10);
  });

  it('should compute cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});
