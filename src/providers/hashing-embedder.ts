/**
 * Feature-hashing embedder
 *
 * Deterministic, offline embeddings: lowercase word tokens and adjacent word
 * pairs are hashed (FNV-1a) into a fixed number of signed buckets. Good
 * enough for near-duplicate detection and keyword-level similarity; used
 * when no embedding API is configured and in tests.
 */

import type { Embedder } from './types.js';

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

function fnv1a(text: string): number {
  let hash = FNV_OFFSET;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

export function tokenize(text: string): string[] {
  return text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? [];
}

export class HashingEmbedder implements Embedder {
  readonly name = 'hashing';

  constructor(readonly dimensions: number = 256) {}

  embedOne(text: string): Float32Array {
    const vector = new Float32Array(this.dimensions);
    const tokens = tokenize(text);
    const features = [...tokens];
    for (let i = 0; i + 1 < tokens.length; i++) {
      features.push(`${tokens[i]} ${tokens[i + 1]}`);
    }

    for (const feature of features) {
      const hash = fnv1a(feature);
      const bucket = hash % this.dimensions;
      // Top bit picks the sign so collisions tend to cancel out
      vector[bucket] = (vector[bucket] ?? 0) + (hash & 0x80000000 ? -1 : 1);
    }
    return vector;
  }

  async embed(texts: string[]): Promise<Float32Array[]> {
    return texts.map((text) => this.embedOne(text));
  }
}
