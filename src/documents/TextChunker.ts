/**
 * Splits document text into overlapping chunks for embedding.
 * Whitespace is collapsed first; a chunk ends after the last sentence break
 * (". ", "! ", "? ") inside its window when there is one.
 */

export interface ChunkOptions {
  chunkSize?: number;
  overlap?: number;
}

export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;

const SENTENCE_BREAKS = ['. ', '! ', '? '];

export function chunkText(text: string, options: ChunkOptions = {}): string[] {
  const size = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const overlap = options.overlap ?? DEFAULT_CHUNK_OVERLAP;

  if (size <= 0 || overlap < 0) {
    throw new RangeError(`Invalid chunk options: size ${size}, overlap ${overlap}`);
  }

  const clean = text.replace(/\s+/g, ' ').trim();
  if (clean.length === 0) return [];
  if (clean.length <= size) return [clean];

  const chunks: string[] = [];
  let start = 0;

  while (start < clean.length) {
    let end = Math.min(start + size, clean.length);

    if (end < clean.length) {
      const window = clean.slice(start, end);
      const lastBreak = Math.max(...SENTENCE_BREAKS.map((b) => window.lastIndexOf(b)));
      if (lastBreak > 0) end = start + lastBreak + 2;
    }

    const chunk = clean.slice(start, end).trim();
    if (chunk) chunks.push(chunk);

    if (end >= clean.length) break;

    // Step back by the overlap, but never to or before the current start.
    const next = end - overlap;
    start = next > start ? next : end;
  }

  return chunks;
}
