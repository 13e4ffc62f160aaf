import { describe, it, expect } from 'vitest';
import { closestMatch, levenshtein, similarity } from '../fuzzy.js';

describe('levenshtein', () => {
  it('counts edits', () => {
    expect(levenshtein('kitten', 'sitting')).toBe(3);
    expect(levenshtein('', 'abc')).toBe(3);
    expect(levenshtein('same', 'same')).toBe(0);
  });
});

describe('similarity', () => {
  it('scales by the longer string', () => {
    expect(similarity('qubit', 'qubits')).toBeCloseTo(5 / 6, 6);
    expect(similarity('', '')).toBe(1);
  });
});

describe('closestMatch', () => {
  it('returns the best candidate above the cutoff', () => {
    expect(closestMatch('quantum', ['quanta', 'quantums', 'bread'], 0.8)).toBe('quantums');
  });

  it('returns null when nothing is close enough', () => {
    expect(closestMatch('quantum', ['bread', 'qubit'], 0.8)).toBeNull();
  });
});
