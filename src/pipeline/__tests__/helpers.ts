import type { EvidenceUnit } from '../types.js';

export function unit(overrides: Partial<EvidenceUnit> = {}): EvidenceUnit {
  return {
    sourceUrl: 'https://example.com/quantum',
    title: 'Quantum basics',
    snippet: 'Quantum computers use qubits.',
    score: 0.5,
    citationIndex: 1,
    query: 'quantum computing',
    ...overrides,
  };
}
