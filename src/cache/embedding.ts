/**
 * Hashed bag-of-words embeddings computed locally. Good enough to catch
 * re-phrasings that share most of their terms; no model calls.
 */

export type EmbeddingFunction = (text: string) => number[];

const STOP_WORDS = new Set([
  'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'for', 'from', 'how', 'in', 'is', 'it',
  'me', 'of', 'on', 'or', 'please', 'that', 'the', 'this', 'to', 'was', 'what', 'with', 'you',
]);

export class HashedEmbedder {
  constructor(private readonly dims = 384) {}

  embed(text: string): number[] {
    const tokens = tokenize(text);
    const embedding = new Float64Array(this.dims);

    const tf = new Map<string, number>();
    for (const token of tokens) {
      tf.set(token, (tf.get(token) ?? 0) + 1);
    }

    // each term lands in three slots with a hash-derived sign
    for (const [term, freq] of tf) {
      const weight = freq / tokens.length;
      for (let seed = 0; seed < 3; seed++) {
        const hash = hashString(term, seed);
        embedding[Math.abs(hash) % this.dims] += weight * (hash > 0 ? 1 : -1);
      }
    }

    return normalize(Array.from(embedding));
  }
}

export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, ' ')
    .split(/\s+/)
    .filter(token => token.length > 1 && token.length < 50)
    .filter(token => !STOP_WORDS.has(token));
}

/** FNV-1a with the seed folded into the offset basis. */
function hashString(str: string, seed: number): number {
  let hash = (0x811c9dc5 ^ (seed * 0x9e3779b1)) | 0;
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash;
}

function normalize(vec: number[]): number[] {
  const magnitude = Math.sqrt(vec.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) return vec;
  return vec.map(val => val / magnitude);
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}
