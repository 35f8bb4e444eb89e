// ============================================================================
// Error Types
// ============================================================================

/** Error codes for transcript failures */
export enum TranscriptErrorKind {
  MALFORMED_FONT = 'MALFORMED_FONT',
  UNRESOLVABLE_REFERENCE = 'UNRESOLVABLE_REFERENCE',
  MISSING_FONT_CONTEXT = 'MISSING_FONT_CONTEXT',
  MALFORMED_MATRIX = 'MALFORMED_MATRIX',
  MALFORMED_TEXT = 'MALFORMED_TEXT',
  MALFORMED_OPERATOR = 'MALFORMED_OPERATOR',
  NO_SIGNAL = 'NO_SIGNAL',
}

export type PipelineStage =
  | 'font-resolution'
  | 'cmap-parsing'
  | 'content-interpretation'
  | 'superscript-inference';

/** Structured error for a stage that cannot continue */
export class TranscriptError extends Error {
  constructor(
    public kind: TranscriptErrorKind,
    public stage: PipelineStage,
    message: string,
    public details?: unknown
  ) {
    super(message);
    this.name = 'TranscriptError';
  }
}

export type Result<T, E = TranscriptError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function fail(
  kind: TranscriptErrorKind,
  stage: PipelineStage,
  message: string,
  details?: unknown
): Result<never> {
  return { ok: false, error: new TranscriptError(kind, stage, message, details) };
}

/**
 * One-line diagnostic naming the failing stage and kind
 */
export function formatTranscriptError(error: TranscriptError): string {
  return `[${error.stage}] ${error.kind}: ${error.message}`;
}
