/**
 * FontManager - font decoders for text extraction
 *
 * Handles:
 * - Decoding shown strings through a ToUnicode table or a named encoding
 * - Resolving every font a document declares, once per font identifier
 */

import { decodeLegacyText, isUnicodeScalar } from './legacyEncodings';
import { parseToUnicodeCMap } from './ToUnicodeCMapParser';
import { fail, ok, TranscriptErrorKind, type Result } from './errors';
import type { CodeToUnicodeTable, DocumentSource, FontResource } from './types';

/**
 * Decoder for the strings shown with one font. A ToUnicode table, when
 * present, always wins over the declared encoding.
 */
export class Font {
  readonly encoding: string;
  readonly unicodeMap: ReadonlyMap<number, number> | null;

  constructor(encoding: string, unicodeMap: ReadonlyMap<number, number> | null = null) {
    this.encoding = encoding;
    this.unicodeMap = unicodeMap;
  }

  decode(bytes: Uint8Array): Result<string> {
    if (this.unicodeMap) {
      return this.decodeWithUnicodeMap(this.unicodeMap, bytes);
    }

    const decoded = decodeLegacyText(this.encoding, bytes);
    if (!decoded.ok) {
      return fail(TranscriptErrorKind.MALFORMED_TEXT, 'content-interpretation', decoded.reason);
    }
    return ok(decoded.text);
  }

  private decodeWithUnicodeMap(unicodeMap: ReadonlyMap<number, number>, bytes: Uint8Array): Result<string> {
    // Table keys are 16-bit codes
    if (bytes.length % 2 !== 0) {
      return fail(
        TranscriptErrorKind.MALFORMED_TEXT,
        'content-interpretation',
        `Expected an even number of bytes for a 16-bit font, found ${bytes.length}`
      );
    }

    let text = '';
    for (let i = 0; i < bytes.length; i += 2) {
      const code = (bytes[i] << 8) | bytes[i + 1];
      // Undeclared codes are taken as their own Unicode value
      const unicode = unicodeMap.get(code) ?? code;
      if (!isUnicodeScalar(unicode)) {
        return fail(
          TranscriptErrorKind.MALFORMED_TEXT,
          'content-interpretation',
          `Code 0x${code.toString(16).padStart(4, '0')} maps to 0x${unicode.toString(16)}, which is not a Unicode scalar value`
        );
      }
      text += String.fromCodePoint(unicode);
    }
    return ok(text);
  }
}

/**
 * Build the Font for one declared font resource
 */
export function resolveFont<TPage, TRef>(
  source: DocumentSource<TPage, TRef>,
  resource: FontResource<TRef>
): Result<Font> {
  if (resource.toUnicode === undefined) {
    return ok(new Font(resource.encoding));
  }

  const bytes = source.resolveReference(resource.toUnicode);
  if (!bytes.ok) return bytes;

  const table: Result<CodeToUnicodeTable> = parseToUnicodeCMap(bytes.value);
  if (!table.ok) return table;

  return ok(new Font(resource.encoding, table.value));
}

/**
 * Resolve every font used across the document. Fonts are deduplicated by
 * identifier; the first page that declares an identifier defines it.
 */
export function resolveDocumentFonts<TPage, TRef>(
  source: DocumentSource<TPage, TRef>
): Result<Map<string, Font>> {
  const fonts = new Map<string, Font>();

  for (const page of source.getPages()) {
    for (const [fontId, resource] of source.getPageFonts(page)) {
      if (fonts.has(fontId)) continue;

      const font = resolveFont(source, resource);
      if (!font.ok) return font;
      fonts.set(fontId, font.value);
    }
  }

  return ok(fonts);
}
