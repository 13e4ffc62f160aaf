/**
 * Tests for token estimation
 */

import { describe, it, expect } from 'vitest';
import { estimateTokens, truncateToTokens } from '../tokens.js';

describe('estimateTokens', () => {
  it('uses four characters per token, rounded up', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abcd')).toBe(1);
    expect(estimateTokens('abcde')).toBe(2);
  });
});

describe('truncateToTokens', () => {
  it('leaves short text alone', () => {
    expect(truncateToTokens('short text', 10)).toBe('short text');
  });

  it('cuts at the last space near the limit', () => {
    // limit 3 tokens = 12 chars: "hello world " -> last space at 11 (> 9.6)
    expect(truncateToTokens('hello world again', 3)).toBe('hello world');
  });

  it('hard-cuts when no space is close enough', () => {
    expect(truncateToTokens('abcdefghijklmnop', 2)).toBe('abcdefgh');
  });
});
