/**
 * Superscript/subscript inference
 *
 * Superscripts lift the baseline a little above the line they belong to.
 * The most common upward jump between consecutive rows is taken as the
 * superscript offset; rows whose baseline differs from the previous line
 * by no more than that are re-tagged as <sup>/<sub> fragments of it.
 */

import { fail, ok, TranscriptErrorKind, type Result } from './errors';
import type { TextChunk } from './types';

/**
 * Tally the magnitudes of upward (negative) offsets between consecutive rows
 */
export function buildOffsetHistogram(rows: readonly TextChunk[]): Map<number, number> {
  const histogram = new Map<number, number>();

  for (let i = 1; i < rows.length; i++) {
    const offset = rows[i].y - rows[i - 1].y;
    if (offset < 0) {
      histogram.set(-offset, (histogram.get(-offset) ?? 0) + 1);
    }
  }

  return histogram;
}

/**
 * Most frequent magnitude; ties go to the smallest. Null when empty.
 */
export function dominantOffset(histogram: ReadonlyMap<number, number>): number | null {
  let best: number | null = null;
  let bestCount = 0;

  for (const magnitude of [...histogram.keys()].sort((a, b) => a - b)) {
    const count = histogram.get(magnitude) ?? 0;
    if (count > bestCount) {
      best = magnitude;
      bestCount = count;
    }
  }

  return best;
}

export function findSuperscriptOffset(rows: readonly TextChunk[]): Result<number> {
  const offset = dominantOffset(buildOffsetHistogram(rows));
  if (offset === null) {
    return fail(
      TranscriptErrorKind.NO_SIGNAL,
      'superscript-inference',
      'No superscript offset found: no row sits above the row before it'
    );
  }
  return ok(offset);
}

function wrap(tag: 'sup' | 'sub', text: string): string {
  return `<${tag}>${text}</${tag}>`;
}

/**
 * Re-tag rows within superscriptOffset of the current baseline. Re-tagged
 * rows are pinned to that baseline and do not move it.
 */
export function reclassifyScripts(rows: readonly TextChunk[], superscriptOffset: number): TextChunk[] {
  const result: TextChunk[] = [];
  let lastX = 0;
  let lastY = 0;

  for (const row of rows) {
    // Moving left starts a new line
    if (row.x < lastX) {
      lastX = row.x;
      lastY = row.y;
      result.push(row);
      continue;
    }

    const offset = row.y - lastY;
    lastX = row.x;
    if (offset !== 0 && Math.abs(offset) <= superscriptOffset) {
      result.push({
        text: wrap(offset > 0 ? 'sub' : 'sup', row.text),
        x: row.x,
        y: lastY
      });
    } else {
      lastY = row.y;
      result.push(row);
    }
  }

  return result;
}
