/**
 * Fuzzy string matching
 *
 * `similarity` is 1 - levenshtein / longer length, so 1 means identical
 * and 0.8 allows one edit in five characters.
 */

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  let previous = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      current.push(
        Math.min((previous[j] ?? 0) + 1, (current[j - 1] ?? 0) + 1, (previous[j - 1] ?? 0) + cost)
      );
    }
    previous = current;
  }
  return previous[b.length] ?? 0;
}

export function similarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length);
  return longest === 0 ? 1 : 1 - levenshtein(a, b) / longest;
}

/**
 * Best candidate scoring at least `cutoff`, or null.
 */
export function closestMatch(word: string, candidates: Iterable<string>, cutoff: number): string | null {
  let best: string | null = null;
  let bestScore = cutoff;
  for (const candidate of candidates) {
    // Length alone rules out most candidates
    if (Math.abs(candidate.length - word.length) > Math.max(candidate.length, word.length) * (1 - cutoff)) {
      continue;
    }
    const score = similarity(word, candidate);
    if (score >= bestScore) {
      best = candidate;
      bestScore = score;
    }
  }
  return best;
}
