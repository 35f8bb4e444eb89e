import type { TextChunk } from './types';

/**
 * Orders chunks by baseline, then by horizontal position. Nothing in the
 * pipeline sorts with it; rows keep the order they were drawn in.
 */
export function compareTextChunks(a: TextChunk, b: TextChunk): number {
  return a.y - b.y || a.x - b.x;
}

/**
 * Concatenate consecutive chunks that share a baseline. A row keeps the
 * position of its first chunk.
 */
export function mergeTextRows(chunks: readonly TextChunk[]): TextChunk[] {
  const rows: TextChunk[] = [];
  let current: TextChunk | null = null;

  for (const chunk of chunks) {
    if (current && current.y === chunk.y) {
      const merged: TextChunk = { ...current, text: current.text + chunk.text };
      current = merged;
      continue;
    }
    if (current) {
      rows.push(current);
    }
    current = { ...chunk };
  }

  if (current) {
    rows.push(current);
  }
  return rows;
}
