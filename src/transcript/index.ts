/**
 * Transcript Module
 *
 * Layout-aware text extraction from PDF content streams:
 * - Content stream parsing
 * - Font decoding through ToUnicode CMaps and named encodings
 * - Text chunk interpretation, row merging and superscript/subscript tagging
 */

// Types
export * from './types';
export * from './errors';

// Content Stream Parser
export {
  ContentStreamLexer,
  ContentStreamParser,
  parseContentStream
} from './ContentStreamParser';

// Content Stream Interpreter
export {
  createInterpreterState,
  interpretPage,
  step,
  transitions
} from './ContentStreamInterpreter';
export type { DocumentContext, InterpreterState, StepOutcome } from './ContentStreamInterpreter';

// Fonts
export { Font, resolveFont, resolveDocumentFonts } from './FontManager';
export { buildUnicodeTable, parseToUnicodeCMap } from './ToUnicodeCMapParser';
export { decodeLegacyText } from './legacyEncodings';

// Rows
export { compareTextChunks, mergeTextRows } from './RowMerger';
export {
  buildOffsetHistogram,
  dominantOffset,
  findSuperscriptOffset,
  reclassifyScripts
} from './ScriptInferencer';
export { emitTranscript, emitTranscriptRows } from './TranscriptEmitter';

// Pipeline
export {
  DEFAULT_TRANSCRIPT_OPTIONS,
  buildTranscript,
  collectTextChunks,
  extractTranscript
} from './TranscriptPipeline';
export { PdfLibDocumentSource } from './PdfLibDocumentSource';
