/**
 * Transcript Pipeline
 *
 * Fonts are resolved for the whole document first, then every page is
 * interpreted in order into one DocumentContext. The collected chunks are
 * merged into rows, superscripts/subscripts are re-tagged, and the rows are
 * merged again for output.
 */

import { interpretPage, type DocumentContext } from './ContentStreamInterpreter';
import { resolveDocumentFonts } from './FontManager';
import { mergeTextRows } from './RowMerger';
import { findSuperscriptOffset, reclassifyScripts } from './ScriptInferencer';
import { emitTranscript, emitTranscriptRows } from './TranscriptEmitter';
import { ok, type Result } from './errors';
import type { DocumentSource, TextChunk, Transcript, TranscriptOptions } from './types';

export const DEFAULT_TRANSCRIPT_OPTIONS: TranscriptOptions = {
  noSignalPolicy: 'skip',
  logger: console
};

/**
 * Interpret every page, returning the document-wide chunk list
 */
export function collectTextChunks<TPage, TRef>(source: DocumentSource<TPage, TRef>): Result<TextChunk[]> {
  const fonts = resolveDocumentFonts(source);
  if (!fonts.ok) return fonts;

  const context: DocumentContext = { fonts: fonts.value, chunks: [] };

  for (const page of source.getPages()) {
    const result = interpretPage(source.getDecodedPageInstructions(page), context);
    if (!result.ok) return result;
  }

  return ok(context.chunks);
}

function toTranscript(superscriptOffset: number | null, rows: readonly TextChunk[]): Transcript {
  return {
    superscriptOffset,
    rows: emitTranscriptRows(rows),
    lines: emitTranscript(rows)
  };
}

/**
 * Turn interpreted chunks into transcript rows
 */
export function buildTranscript(
  chunks: readonly TextChunk[],
  options: Partial<TranscriptOptions> = {}
): Result<Transcript> {
  // Explicit undefined values fall back to the defaults
  const noSignalPolicy = options.noSignalPolicy ?? DEFAULT_TRANSCRIPT_OPTIONS.noSignalPolicy;
  const logger = options.logger ?? DEFAULT_TRANSCRIPT_OPTIONS.logger;
  const merged = mergeTextRows(chunks);

  const offset = findSuperscriptOffset(merged);
  if (!offset.ok) {
    if (noSignalPolicy === 'fail') return offset;

    logger.warn(`[TranscriptPipeline] ${offset.error.message}; rows are emitted without reclassification`);
    return ok(toTranscript(null, merged));
  }

  logger.log(`Superscript offset: ${offset.value}`);
  return ok(toTranscript(offset.value, reclassifyScripts(merged, offset.value)));
}

/**
 * Extract the transcript of a whole document
 */
export function extractTranscript<TPage, TRef>(
  source: DocumentSource<TPage, TRef>,
  options: Partial<TranscriptOptions> = {}
): Result<Transcript> {
  const chunks = collectTextChunks(source);
  if (!chunks.ok) return chunks;
  return buildTranscript(chunks.value, options);
}
