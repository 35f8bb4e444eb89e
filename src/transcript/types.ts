/**
 * Transcript Types
 * Instruction, chunk and document-source types shared by the text
 * reconstruction pipeline
 */

import type { Result } from './errors';

// Operators the interpreter and CMap parser act on
export type PDFOperatorType =
  // Text Object Operators
  | 'BT'  // Begin text object
  | 'ET'  // End text object
  // Text State Operators
  | 'Tf'  // Font and size
  // Text Positioning Operators
  | 'Tm'  // Set text matrix
  // Text Showing Operators
  | 'Tj'  // Show text string
  | 'TJ'  // Show text with positioning
  // CMap Operators
  | 'beginbfchar'
  | 'endbfchar'
  // Other
  | string; // Unknown operator

// PDF Value Types
export type PDFValue =
  | PDFNumber
  | PDFString
  | PDFName
  | PDFArray
  | PDFDict
  | PDFBoolean
  | PDFNull;

export interface PDFNumber {
  type: 'number';
  value: number;
}

export interface PDFString {
  type: 'string';
  bytes: Uint8Array;
  encoding: 'literal' | 'hex';
}

export interface PDFName {
  type: 'name';
  value: string;
}

export interface PDFArray {
  type: 'array';
  value: PDFValue[];
}

export interface PDFDict {
  type: 'dict';
  value: Map<string, PDFValue>;
}

export interface PDFBoolean {
  type: 'boolean';
  value: boolean;
}

export interface PDFNull {
  type: 'null';
}

// Parsed operator with the operands collected before it
export interface PDFOperator {
  operator: PDFOperatorType;
  operands: PDFValue[];
}

/**
 * Decoded text positioned at the text-space coordinates current when its
 * text block closed.
 */
export interface TextChunk {
  text: string;
  x: number;
  y: number;
}

// Code-to-Unicode table from a ToUnicode CMap (16-bit code -> scalar)
export type CodeToUnicodeTable = Map<number, number>;

// Font resource as declared on a page
export interface FontResource<TRef> {
  encoding: string;
  toUnicode?: TRef;
}

/**
 * Access to an already-parsed document. Implementations own container
 * parsing and stream decompression; the pipeline only sees instructions,
 * font resources and decoded bytes.
 */
export interface DocumentSource<TPage, TRef> {
  getPages(): TPage[];
  getPageFonts(page: TPage): Map<string, FontResource<TRef>>;
  resolveReference(ref: TRef): Result<Uint8Array>;
  getDecodedPageInstructions(page: TPage): PDFOperator[];
}

// What to do when no superscript offset can be discovered
export type NoSignalPolicy = 'skip' | 'fail';

export type TranscriptLogger = Pick<Console, 'log' | 'warn'>;

export interface TranscriptOptions {
  noSignalPolicy: NoSignalPolicy;
  logger: TranscriptLogger;
}

export interface Transcript {
  superscriptOffset: number | null;
  rows: TextChunk[];
  lines: string[];
}
