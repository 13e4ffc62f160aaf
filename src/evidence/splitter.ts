/**
 * Recursive text splitter
 *
 * Splits on the coarsest separator that yields pieces under `chunkSize`
 * (paragraphs, then lines, sentences, words), merges neighbours back up to
 * the size limit and carries `chunkOverlap` characters of tail into the next
 * chunk.
 */

export interface SplitOptions {
  chunkSize: number;
  chunkOverlap: number;
}

const SEPARATORS = ['\n\n', '\n', '. ', ' '];

function splitRecursive(text: string, chunkSize: number, separators: string[]): string[] {
  if (text.length <= chunkSize) {
    return [text];
  }
  const [separator, ...rest] = separators;
  if (separator === undefined) {
    // No separator left: hard cut
    const pieces: string[] = [];
    for (let i = 0; i < text.length; i += chunkSize) {
      pieces.push(text.slice(i, i + chunkSize));
    }
    return pieces;
  }

  const parts = text.split(separator);
  if (parts.length === 1) {
    return splitRecursive(text, chunkSize, rest);
  }
  return parts.flatMap((part, i) => {
    // Keep the separator attached so merged chunks read naturally
    const piece = i < parts.length - 1 ? part + separator : part;
    return piece.length > chunkSize ? splitRecursive(piece, chunkSize, rest) : [piece];
  });
}

function overlapTail(text: string, overlap: number): string {
  if (overlap <= 0 || text.length <= overlap) {
    return overlap <= 0 ? '' : text;
  }
  const tail = text.slice(-overlap);
  // Start the overlap on a word boundary when one exists
  const space = tail.indexOf(' ');
  return space > 0 && space < tail.length - 1 ? tail.slice(space + 1) : tail;
}

export function splitText(text: string, options: SplitOptions): string[] {
  const { chunkSize, chunkOverlap } = options;
  const normalized = text.trim();
  if (normalized.length === 0) {
    return [];
  }
  if (normalized.length <= chunkSize) {
    return [normalized];
  }

  const chunks: string[] = [];
  let current = '';

  for (const piece of splitRecursive(normalized, chunkSize, SEPARATORS)) {
    if (current.length + piece.length <= chunkSize) {
      current += piece;
      continue;
    }
    if (current.trim().length > 0) {
      chunks.push(current.trim());
    }
    const tail = overlapTail(current, chunkOverlap);
    current = tail.length + piece.length <= chunkSize ? tail + piece : piece;
  }
  if (current.trim().length > 0) {
    chunks.push(current.trim());
  }
  return chunks;
}
