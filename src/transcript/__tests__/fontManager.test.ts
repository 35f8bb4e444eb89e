import { describe, it, expect } from 'vitest';
import { Font, resolveDocumentFonts, resolveFont } from '../FontManager';
import { decodeLegacyText } from '../legacyEncodings';
import { TranscriptErrorKind } from '../errors';
import { DIGIT_CMAP, InMemoryDocumentSource, bytes, unwrap, unwrapError } from './helpers';

describe('Font.decode with a ToUnicode table', () => {
  const font = new Font('WinAnsiEncoding', new Map([[0x0041, 0x0042]]));

  it('returns the mapped character for a code in the table', () => {
    expect(unwrap(font.decode(new Uint8Array([0x00, 0x41])))).toBe('B');
  });

  it('falls back to the code itself for a code missing from the table', () => {
    expect(unwrap(font.decode(new Uint8Array([0x00, 0x43])))).toBe('C');
    expect(unwrap(font.decode(new Uint8Array([0x00, 0x41, 0x00, 0x43, 0x00, 0xE9])))).toBe('BCé');
  });

  it('rejects an odd number of bytes', () => {
    const error = unwrapError(font.decode(new Uint8Array([0x00, 0x41, 0x00])));

    expect(error.kind).toBe(TranscriptErrorKind.MALFORMED_TEXT);
    expect(error.message).toBe('Expected an even number of bytes for a 16-bit font, found 3');
  });

  it('rejects values that are not Unicode scalars instead of substituting', () => {
    const corrupt = new Font('WinAnsiEncoding', new Map([[0x0001, 0xD800]]));

    expect(unwrapError(corrupt.decode(new Uint8Array([0x00, 0x01]))).kind).toBe(TranscriptErrorKind.MALFORMED_TEXT);
    expect(unwrapError(corrupt.decode(new Uint8Array([0xDC, 0x00]))).kind).toBe(TranscriptErrorKind.MALFORMED_TEXT);
  });
});

describe('Font.decode with a named encoding', () => {
  it('decodes WinAnsiEncoding', () => {
    const font = new Font('WinAnsiEncoding');
    expect(unwrap(font.decode(bytes('Hi')))).toBe('Hi');
    expect(unwrap(font.decode(new Uint8Array([0x80, 0x93])))).toBe('€“');
  });

  it('maps the WinAnsi 0x80-0x9F block and drops its unassigned bytes', () => {
    const font = new Font('WinAnsiEncoding');
    expect(unwrap(font.decode(new Uint8Array([0x91, 0x92, 0x96, 0x97, 0x99, 0x9F])))).toBe('‘’–—™Ÿ');
    expect(unwrap(font.decode(new Uint8Array([0x41, 0x81, 0x8D, 0x8F, 0x90, 0x9D, 0x42])))).toBe('AB');
    expect(unwrap(font.decode(new Uint8Array([0xE9, 0xFF])))).toBe('éÿ');
  });

  it('decodes MacRomanEncoding', () => {
    expect(unwrap(new Font('MacRomanEncoding').decode(new Uint8Array([0x8E, 0x41])))).toBe('éA');
  });

  it('decodes StandardEncoding, dropping bytes without a glyph', () => {
    const font = new Font('StandardEncoding');
    expect(unwrap(font.decode(bytes("it's")))).toBe('it’s');
    expect(unwrap(font.decode(new Uint8Array([0xAE, 0x80, 0x6C])))).toBe('ﬁl');
  });

  it('reports malformed text for invalid UTF-8 under an unknown encoding', () => {
    const font = new Font('CustomEncoding');
    expect(unwrap(font.decode(new Uint8Array([0xC3, 0xA9])))).toBe('é');
    expect(unwrapError(font.decode(new Uint8Array([0xFF]))).kind).toBe(TranscriptErrorKind.MALFORMED_TEXT);
  });
});

describe('decodeLegacyText', () => {
  it('decodes PDFDocEncoding', () => {
    expect(decodeLegacyText('PDFDocEncoding', new Uint8Array([0x92, 0xA0, 0xAD, 0x41]))).toEqual({
      ok: true,
      text: '™€A',
    });
  });

  it('decodes Identity-H as 16-bit code points', () => {
    expect(decodeLegacyText('Identity-H', new Uint8Array([0x00, 0x48, 0x00, 0x69]))).toEqual({ ok: true, text: 'Hi' });
    expect(decodeLegacyText('Identity-H', new Uint8Array([0x00])).ok).toBe(false);
  });

  it('decodes the UCS-2 CJK encodings as UTF-16BE', () => {
    expect(decodeLegacyText('UniGB-UCS2-H', new Uint8Array([0x4E, 0x2D]))).toEqual({ ok: true, text: '中' });
    expect(decodeLegacyText('UniGB-UTF16-H', new Uint8Array([0xD8, 0x3D, 0xDE, 0x00]))).toEqual({ ok: true, text: '😀' });
  });

  it('rejects odd byte counts and unpaired surrogates under UTF-16BE', () => {
    expect(decodeLegacyText('UniGB-UCS2-H', new Uint8Array([0x4E, 0x2D, 0x00])).ok).toBe(false);
    expect(decodeLegacyText('UniGB-UCS2-H', new Uint8Array([0xD8, 0x00])).ok).toBe(false);
    expect(decodeLegacyText('UniGB-UTF16-H', new Uint8Array([0xDC, 0x00, 0x00, 0x41])).ok).toBe(false);
    expect(decodeLegacyText('UniGB-UTF16-H', new Uint8Array([0xD8, 0x3D, 0x00, 0x41])).ok).toBe(false);
  });

  it('reports UTF-16BE faults as malformed text', () => {
    const font = new Font('UniGB-UCS2-H');
    expect(unwrapError(font.decode(new Uint8Array([0x4E, 0x2D, 0x00]))).kind).toBe(TranscriptErrorKind.MALFORMED_TEXT);
  });
});

describe('resolveFont', () => {
  it('builds a table-backed font when a ToUnicode reference is declared', () => {
    const source = new InMemoryDocumentSource([], { cmap: DIGIT_CMAP });
    const font = unwrap(resolveFont(source, { encoding: 'Identity-H', toUnicode: 'cmap' }));

    expect(font.encoding).toBe('Identity-H');
    expect(font.unicodeMap).toEqual(new Map([[1, 0x32], [2, 0x33]]));
  });

  it('builds an encoding-only font without a reference', () => {
    const source = new InMemoryDocumentSource([]);
    const font = unwrap(resolveFont(source, { encoding: 'WinAnsiEncoding' }));

    expect(font.unicodeMap).toBeNull();
    expect(source.resolved).toEqual([]);
  });

  it('fails when the reference does not resolve', () => {
    const source = new InMemoryDocumentSource([]);
    const error = unwrapError(resolveFont(source, { encoding: 'Identity-H', toUnicode: 'missing' }));

    expect(error.kind).toBe(TranscriptErrorKind.UNRESOLVABLE_REFERENCE);
    expect(error.stage).toBe('font-resolution');
  });

  it('propagates a malformed CMap', () => {
    const source = new InMemoryDocumentSource([], { bad: '<0001> endbfchar' });
    const error = unwrapError(resolveFont(source, { encoding: 'Identity-H', toUnicode: 'bad' }));

    expect(error.kind).toBe(TranscriptErrorKind.MALFORMED_FONT);
  });
});

describe('resolveDocumentFonts', () => {
  it('resolves each font identifier once, from the first page that declares it', () => {
    const source = new InMemoryDocumentSource(
      [
        { fonts: { F1: { encoding: 'WinAnsiEncoding' } }, content: '' },
        {
          fonts: {
            F1: { encoding: 'MacRomanEncoding', toUnicode: 'cmap' },
            F2: { encoding: 'Identity-H', toUnicode: 'cmap' },
          },
          content: '',
        },
      ],
      { cmap: DIGIT_CMAP }
    );

    const fonts = unwrap(resolveDocumentFonts(source));

    expect([...fonts.keys()]).toEqual(['F1', 'F2']);
    expect(fonts.get('F1')?.encoding).toBe('WinAnsiEncoding');
    expect(fonts.get('F1')?.unicodeMap).toBeNull();
    expect(source.resolved).toEqual(['cmap']);
  });

  it('stops at the first font that cannot be resolved', () => {
    const source = new InMemoryDocumentSource([
      { fonts: { F1: { encoding: 'Identity-H', toUnicode: 'missing' } }, content: '' },
    ]);

    expect(unwrapError(resolveDocumentFonts(source)).kind).toBe(TranscriptErrorKind.UNRESOLVABLE_REFERENCE);
  });
});
