/**
 * Hashing embedder tests
 */

import { describe, it, expect } from 'vitest';
import { HashingEmbedder, tokenize } from '../hashing-embedder.js';

function cosine(a: Float32Array, b: Float32Array): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  return na === 0 || nb === 0 ? 0 : dot / Math.sqrt(na * nb);
}

describe('tokenize', () => {
  it('lowercases and splits on non-word characters', () => {
    expect(tokenize('Quantum-Computing, 101!')).toEqual(['quantum', 'computing', '101']);
  });
});

describe('HashingEmbedder', () => {
  const embedder = new HashingEmbedder(128);

  it('produces vectors of the configured size', async () => {
    const [vector] = await embedder.embed(['hello world']);
    expect(vector).toHaveLength(128);
  });

  it('is deterministic', () => {
    expect(Array.from(embedder.embedOne('qubits and gates'))).toEqual(
      Array.from(embedder.embedOne('qubits and gates'))
    );
  });

  it('scores identical text at 1 and related text above unrelated text', () => {
    const base = embedder.embedOne('quantum computers use qubits');
    const related = embedder.embedOne('qubits power quantum computers');
    const unrelated = embedder.embedOne('bread recipes with sourdough starter');

    expect(cosine(base, base)).toBeCloseTo(1, 6);
    expect(cosine(base, related)).toBeGreaterThan(cosine(base, unrelated));
  });

  it('returns a zero vector for empty text', () => {
    expect(embedder.embedOne('').every((v) => v === 0)).toBe(true);
  });
});
