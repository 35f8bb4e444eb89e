/**
 * ToUnicode CMap parser
 *
 * Reads the bfchar records of an embedded CMap into a code-to-Unicode table.
 * Records are the operand pairs of each `endbfchar` instruction; every other
 * instruction in the stream is ignored.
 */

import { parseContentStream } from './ContentStreamParser';
import { fail, ok, TranscriptErrorKind, type Result } from './errors';
import type { CodeToUnicodeTable, PDFOperator, PDFValue } from './types';

function readCode(operand: PDFValue): number | null {
  if (operand.type !== 'string' || operand.bytes.length !== 2) {
    return null;
  }
  return (operand.bytes[0] << 8) | operand.bytes[1];
}

function describeOperand(operand: PDFValue): string {
  if (operand.type === 'string') {
    return `${operand.bytes.length}-byte string`;
  }
  return operand.type;
}

/**
 * Build the table from already-parsed CMap instructions. Duplicate codes
 * keep the last mapping.
 */
export function buildUnicodeTable(operators: PDFOperator[]): Result<CodeToUnicodeTable> {
  const table: CodeToUnicodeTable = new Map();

  for (const op of operators) {
    if (op.operator !== 'endbfchar') continue;

    if (op.operands.length % 2 !== 0) {
      return fail(
        TranscriptErrorKind.MALFORMED_FONT,
        'cmap-parsing',
        `Expected even number of endbfchar operands, found ${op.operands.length}`
      );
    }

    for (let i = 0; i < op.operands.length; i += 2) {
      const code = readCode(op.operands[i]);
      const unicode = readCode(op.operands[i + 1]);
      if (code === null || unicode === null) {
        const bad = code === null ? op.operands[i] : op.operands[i + 1];
        return fail(
          TranscriptErrorKind.MALFORMED_FONT,
          'cmap-parsing',
          `Expected a 2-byte hexadecimal string, found ${describeOperand(bad)}`,
          { operand: bad }
        );
      }
      table.set(code, unicode);
    }
  }

  return ok(table);
}

/**
 * Parse a decoded ToUnicode stream
 */
export function parseToUnicodeCMap(data: Uint8Array): Result<CodeToUnicodeTable> {
  return buildUnicodeTable(parseContentStream(data));
}
