/**
 * Content Stream Interpreter
 *
 * Walks one page's operators and emits a positioned text chunk for every
 * closed text object. Each handled operator is a pure transition over
 * InterpreterState; operators without a transition leave the state alone.
 */

import type { Font } from './FontManager';
import { fail, ok, TranscriptErrorKind, type Result } from './errors';
import type { PDFOperator, PDFValue, TextChunk } from './types';

export interface InterpreterState {
  inTextBlock: boolean;
  currentFontId: string | null;
  x: number;
  y: number;
  currentText: string;
}

export interface StepOutcome {
  state: InterpreterState;
  chunk?: TextChunk;
}

/**
 * Document-wide state shared by every page: the resolved fonts and the
 * chunks emitted so far, in page order.
 */
export interface DocumentContext {
  fonts: ReadonlyMap<string, Font>;
  chunks: TextChunk[];
}

type Transition = (
  state: InterpreterState,
  operands: PDFValue[],
  fonts: ReadonlyMap<string, Font>
) => Result<StepOutcome>;

export function createInterpreterState(): InterpreterState {
  return {
    inTextBlock: false,
    currentFontId: null,
    x: 0,
    y: 0,
    currentText: ''
  };
}

function lookupFont(state: InterpreterState, fonts: ReadonlyMap<string, Font>): Result<Font> {
  if (state.currentFontId === null) {
    return fail(
      TranscriptErrorKind.MISSING_FONT_CONTEXT,
      'content-interpretation',
      'Text shown before any font was selected'
    );
  }
  const font = fonts.get(state.currentFontId);
  if (!font) {
    return fail(
      TranscriptErrorKind.MISSING_FONT_CONTEXT,
      'content-interpretation',
      `Font ${state.currentFontId} is not declared by the document`
    );
  }
  return ok(font);
}

function appendText(
  state: InterpreterState,
  strings: Uint8Array[],
  fonts: ReadonlyMap<string, Font>
): Result<StepOutcome> {
  const font = lookupFont(state, fonts);
  if (!font.ok) return font;

  let currentText = state.currentText;
  for (const bytes of strings) {
    const text = font.value.decode(bytes);
    if (!text.ok) return text;
    currentText += text.value;
  }
  return ok({ state: { ...state, currentText } });
}

function matrixTranslation(operands: PDFValue[], index: number): Result<number> {
  const operand = operands[index];
  if (operand === undefined || operand.type !== 'number') {
    return fail(
      TranscriptErrorKind.MALFORMED_MATRIX,
      'content-interpretation',
      `Expected integer or real at Tm operand ${index}, found ${operand === undefined ? 'nothing' : operand.type}`,
      { operands }
    );
  }
  return ok(Math.trunc(operand.value));
}

function malformedOperator(operator: string, expected: string, operands: PDFValue[]): Result<never> {
  return fail(
    TranscriptErrorKind.MALFORMED_OPERATOR,
    'content-interpretation',
    `Expected ${expected} operand for ${operator}`,
    { operands }
  );
}

export const transitions: Readonly<Record<string, Transition>> = {
  // Text Object
  BT: (state) => ok({ state: { ...state, inTextBlock: true } }),

  ET: (state) => ok({
    state: { ...state, inTextBlock: false, currentText: '' },
    chunk: { text: state.currentText, x: state.x, y: state.y }
  }),

  // Text State: lookup is deferred until text is shown
  Tf: (state, operands) => {
    const name = operands[0];
    if (name === undefined || name.type !== 'name') {
      return malformedOperator('Tf', 'a font name', operands);
    }
    return ok({ state: { ...state, currentFontId: name.value } });
  },

  // Text Positioning
  Tm: (state, operands) => {
    const x = matrixTranslation(operands, 4);
    if (!x.ok) return x;
    const y = matrixTranslation(operands, 5);
    if (!y.ok) return y;
    return ok({ state: { ...state, x: x.value, y: y.value } });
  },

  // Text Showing
  Tj: (state, operands, fonts) => {
    if (!state.inTextBlock) return ok({ state });
    const value = operands[0];
    if (value === undefined || value.type !== 'string') {
      return malformedOperator('Tj', 'a string', operands);
    }
    return appendText(state, [value.bytes], fonts);
  },

  // Kerning adjustments between the strings are ignored
  TJ: (state, operands, fonts) => {
    if (!state.inTextBlock) return ok({ state });
    const value = operands[0];
    if (value === undefined || value.type !== 'array') {
      return malformedOperator('TJ', 'an array', operands);
    }
    const strings: Uint8Array[] = [];
    for (const item of value.value) {
      if (item.type === 'string') strings.push(item.bytes);
    }
    return appendText(state, strings, fonts);
  }
};

/**
 * Apply one operator to the state
 */
export function step(
  state: InterpreterState,
  op: PDFOperator,
  fonts: ReadonlyMap<string, Font>
): Result<StepOutcome> {
  const transition = Object.prototype.hasOwnProperty.call(transitions, op.operator)
    ? transitions[op.operator]
    : undefined;
  if (!transition) {
    return ok({ state });
  }
  return transition(state, op.operands, fonts);
}

/**
 * Interpret one page, appending its chunks to the document context. State
 * starts fresh for every page; on error the page's pending chunks are not
 * emitted.
 */
export function interpretPage(operators: PDFOperator[], context: DocumentContext): Result<void> {
  let state = createInterpreterState();
  const pageChunks: TextChunk[] = [];

  for (const op of operators) {
    const outcome = step(state, op, context.fonts);
    if (!outcome.ok) return outcome;
    state = outcome.value.state;
    if (outcome.value.chunk) {
      pageChunks.push(outcome.value.chunk);
    }
  }

  context.chunks.push(...pageChunks);
  return ok(undefined);
}
