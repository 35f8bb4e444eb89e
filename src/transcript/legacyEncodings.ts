/**
 * Byte-to-Unicode rules for the named encodings a simple font can declare.
 *
 * MacRoman maps onto a WHATWG decoder; WinAnsiEncoding, StandardEncoding
 * and PDFDocEncoding are table driven from ./data.
 */

import standardEncodingData from './data/standardEncoding.json';
import pdfDocEncodingData from './data/pdfDocEncoding.json';
import winAnsiEncodingData from './data/winAnsiEncoding.json';

interface EncodingTableData {
  name: string;
  // 'ascii': printable ASCII maps to itself; 'latin1': every byte does
  base: string;
  undefined?: number[];
  overrides: Record<string, number>;
}

export type LegacyDecodeResult =
  | { ok: true; text: string }
  | { ok: false; reason: string };

// Code -> Unicode scalar; codes without an entry have no glyph and are dropped
function buildTable(data: EncodingTableData): Map<number, number> {
  const table = new Map<number, number>();
  if (data.base === 'ascii') {
    for (let code = 0x20; code <= 0x7E; code++) table.set(code, code);
  } else {
    for (let code = 0; code <= 0xFF; code++) table.set(code, code);
  }
  for (const code of data.undefined ?? []) {
    table.delete(code);
  }
  for (const [code, unicode] of Object.entries(data.overrides)) {
    table.set(Number(code), unicode);
  }
  return table;
}

const STANDARD_ENCODING = buildTable(standardEncodingData);
const PDF_DOC_ENCODING = buildTable(pdfDocEncodingData);
// Node's 'windows-1252' decoder is plain Latin-1, so 0x80-0x9F needs the table
const WIN_ANSI_ENCODING = buildTable(winAnsiEncodingData);

function decodeWithTable(table: Map<number, number>, bytes: Uint8Array): string {
  let text = '';
  for (const byte of bytes) {
    const unicode = table.get(byte);
    if (unicode !== undefined) {
      text += String.fromCodePoint(unicode);
    }
  }
  return text;
}

function decodeWith(label: string, bytes: Uint8Array): string {
  return new TextDecoder(label).decode(bytes);
}

/**
 * Decode big-endian 16-bit codes whose values are taken as Unicode scalars
 */
export function decodeIdentity(bytes: Uint8Array): LegacyDecodeResult {
  if (bytes.length % 2 !== 0) {
    return { ok: false, reason: `expected an even number of bytes, found ${bytes.length}` };
  }
  let text = '';
  for (let i = 0; i < bytes.length; i += 2) {
    const code = (bytes[i] << 8) | bytes[i + 1];
    if (!isUnicodeScalar(code)) {
      return { ok: false, reason: `code 0x${code.toString(16).padStart(4, '0')} is not a Unicode scalar value` };
    }
    text += String.fromCodePoint(code);
  }
  return { ok: true, text };
}

/**
 * Decode UTF-16BE, rejecting a trailing odd byte and unpaired surrogates
 */
export function decodeUtf16BE(bytes: Uint8Array): LegacyDecodeResult {
  if (bytes.length % 2 !== 0) {
    return { ok: false, reason: `expected an even number of bytes, found ${bytes.length}` };
  }
  let text = '';
  for (let i = 0; i < bytes.length; i += 2) {
    const unit = (bytes[i] << 8) | bytes[i + 1];
    if (unit >= 0xD800 && unit <= 0xDBFF) {
      const low = i + 3 < bytes.length ? (bytes[i + 2] << 8) | bytes[i + 3] : -1;
      if (low < 0xDC00 || low > 0xDFFF) {
        return { ok: false, reason: `unpaired high surrogate 0x${unit.toString(16)} at byte ${i}` };
      }
      text += String.fromCharCode(unit, low);
      i += 2;
    } else if (unit >= 0xDC00 && unit <= 0xDFFF) {
      return { ok: false, reason: `unpaired low surrogate 0x${unit.toString(16)} at byte ${i}` };
    } else {
      text += String.fromCharCode(unit);
    }
  }
  return { ok: true, text };
}

export function isUnicodeScalar(value: number): boolean {
  return Number.isInteger(value) &&
    value >= 0 &&
    value <= 0x10FFFF &&
    (value < 0xD800 || value > 0xDFFF);
}

/**
 * Decode bytes shown with a font that has no ToUnicode table
 */
export function decodeLegacyText(encoding: string, bytes: Uint8Array): LegacyDecodeResult {
  switch (encoding) {
    case 'StandardEncoding':
      return { ok: true, text: decodeWithTable(STANDARD_ENCODING, bytes) };
    case 'PDFDocEncoding':
      return { ok: true, text: decodeWithTable(PDF_DOC_ENCODING, bytes) };
    case 'WinAnsiEncoding':
      return { ok: true, text: decodeWithTable(WIN_ANSI_ENCODING, bytes) };
    case 'MacRomanEncoding':
      return { ok: true, text: decodeWith('macintosh', bytes) };
    case 'UniGB-UCS2-H':
    case 'UniGB-UTF16-H':
      return decodeUtf16BE(bytes);
    case 'Identity-H':
      return decodeIdentity(bytes);
    default:
      try {
        return { ok: true, text: new TextDecoder('utf-8', { fatal: true }).decode(bytes) };
      } catch (e) {
        return { ok: false, reason: `invalid UTF-8 for encoding ${encoding}: ${String(e)}` };
      }
  }
}
