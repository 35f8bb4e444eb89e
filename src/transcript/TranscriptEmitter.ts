import { mergeTextRows } from './RowMerger';
import type { TextChunk } from './types';

/**
 * Final rows after reclassification. Pinned fragments can now share a
 * baseline with their neighbours, so rows are merged again.
 */
export function emitTranscriptRows(rows: readonly TextChunk[]): TextChunk[] {
  return mergeTextRows(rows);
}

export function emitTranscript(rows: readonly TextChunk[]): string[] {
  return emitTranscriptRows(rows).map(row => row.text);
}
