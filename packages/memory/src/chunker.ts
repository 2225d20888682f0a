/**
 * @tubeqa/memory - Text chunker
 *
 * Splits a transcript into overlapping windows. Breaks prefer paragraph
 * boundaries, then sentence ends, then spaces, before cutting mid-word.
 *
 * Consecutive chunks always share exactly `chunkOverlap` characters, so the
 * first chunk plus every later chunk minus its first `chunkOverlap`
 * characters reproduces the input.
 */

export interface TextChunk {
  index: number;
  text: string;
  /** Offset of the first character in the source text. */
  start: number;
  /** Offset one past the last character. */
  end: number;
}

export interface ChunkOptions {
  chunkSize: number;
  chunkOverlap: number;
}

export const DEFAULT_CHUNK_OPTIONS: ChunkOptions = {
  chunkSize: 1000,
  chunkOverlap: 200,
};

// Separator tiers, most preferred first
const BREAK_TIERS: readonly (readonly string[])[] = [
  ['\n\n'],
  ['. ', '! ', '? ', '\n'],
  [' '],
];

/**
 * Best end offset for a chunk starting at `start`: the latest boundary in
 * (start + overlap, start + size], trying each tier in turn.
 */
function findBreak(text: string, start: number, size: number, overlap: number): number {
  const limit = start + size;
  const minEnd = start + overlap + 1;

  for (const tier of BREAK_TIERS) {
    let best = -1;
    for (const sep of tier) {
      const at = text.lastIndexOf(sep, limit - sep.length);
      if (at === -1) continue;
      const candidate = at + sep.length;
      if (candidate >= minEnd && candidate <= limit && candidate > best) {
        best = candidate;
      }
    }
    if (best !== -1) return best;
  }

  return limit;
}

export function splitText(
  text: string,
  options: ChunkOptions = DEFAULT_CHUNK_OPTIONS,
): TextChunk[] {
  const { chunkSize, chunkOverlap } = options;

  if (!(chunkSize > 0)) {
    throw new RangeError(`chunkSize must be positive, got ${chunkSize}`);
  }
  if (!(chunkOverlap >= 0)) {
    throw new RangeError(`chunkOverlap must not be negative, got ${chunkOverlap}`);
  }
  if (chunkOverlap >= chunkSize) {
    throw new RangeError(
      `chunkOverlap (${chunkOverlap}) must be smaller than chunkSize (${chunkSize})`,
    );
  }

  const chunks: TextChunk[] = [];
  let start = 0;

  while (start < text.length) {
    if (text.length - start <= chunkSize) {
      chunks.push({ index: chunks.length, text: text.slice(start), start, end: text.length });
      break;
    }

    const end = findBreak(text, start, chunkSize, chunkOverlap);
    chunks.push({ index: chunks.length, text: text.slice(start, end), start, end });
    start = end - chunkOverlap;
  }

  return chunks;
}
