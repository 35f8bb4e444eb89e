/**
 * Shared fixtures for transcript tests
 */
import { PDFDocument, PDFName } from 'pdf-lib';
import { parseContentStream } from '../ContentStreamParser';
import { fail, ok, TranscriptError, TranscriptErrorKind, type Result } from '../errors';
import type { DocumentSource, FontResource, PDFOperator } from '../types';

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function parse(content: string): PDFOperator[] {
  return parseContentStream(bytes(content));
}

export function unwrap<T>(result: Result<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

export function unwrapError<T>(result: Result<T>): TranscriptError {
  if (result.ok) throw new Error(`Expected an error, got ${JSON.stringify(result.value)}`);
  return result.error;
}

export interface FakePage {
  fonts: Record<string, FontResource<string>>;
  content: string;
}

/**
 * DocumentSource over plain strings: streams are keyed by reference name
 */
export class InMemoryDocumentSource implements DocumentSource<FakePage, string> {
  readonly resolved: string[] = [];
  private streams: Map<string, string>;

  constructor(private pages: FakePage[], streams: Record<string, string> = {}) {
    this.streams = new Map(Object.entries(streams));
  }

  getPages(): FakePage[] {
    return this.pages;
  }

  getPageFonts(page: FakePage): Map<string, FontResource<string>> {
    return new Map(Object.entries(page.fonts));
  }

  resolveReference(ref: string): Result<Uint8Array> {
    this.resolved.push(ref);
    const stream = this.streams.get(ref);
    if (stream === undefined) {
      return fail(TranscriptErrorKind.UNRESOLVABLE_REFERENCE, 'font-resolution', `Reference ${ref} not found`);
    }
    return ok(bytes(stream));
  }

  getDecodedPageInstructions(page: FakePage): PDFOperator[] {
    return parseContentStream(bytes(page.content));
  }
}

export const DIGIT_CMAP = [
  '/CIDInit /ProcSet findresource begin',
  '12 dict begin',
  'begincmap',
  '/CIDSystemInfo << /Registry (Adobe) /Ordering (UCS) /Supplement 0 >> def',
  '/CMapName /Adobe-Identity-UCS def',
  '/CMapType 2 def',
  '1 begincodespacerange',
  '<0000> <FFFF>',
  'endcodespacerange',
  '2 beginbfchar',
  '<0001> <0032>',
  '<0002> <0033>',
  'endbfchar',
  'endcmap',
  'CMapName currentdict /CMap defineresource pop',
  'end',
  'end',
].join('\n');

/**
 * One page reading "Water: H", a raised "2" drawn with a CID font, then "O"
 */
export async function buildWaterPdf(): Promise<PDFDocument> {
  const pdfDoc = await PDFDocument.create();
  const context = pdfDoc.context;
  const page = pdfDoc.addPage([300, 300]);

  const cmapRef = context.register(context.flateStream(DIGIT_CMAP));
  const cidFont = context.register(context.obj({
    Type: 'Font',
    Subtype: 'Type0',
    BaseFont: 'TestSans',
    Encoding: 'Identity-H',
    ToUnicode: cmapRef,
  }));
  const simpleFont = context.register(context.obj({
    Type: 'Font',
    Subtype: 'Type1',
    BaseFont: 'Helvetica',
    Encoding: 'WinAnsiEncoding',
  }));
  page.node.set(PDFName.of('Resources'), context.obj({ Font: { F1: cidFont, F2: simpleFont } }));

  const content = context.register(context.stream([
    'BT /F2 12 Tf 1 0 0 1 10 200 Tm (Water: H) Tj ET',
    'BT /F1 12 Tf 1 0 0 1 80 202 Tm <0001> Tj ET',
    'BT /F2 12 Tf 1 0 0 1 90 200 Tm (O) Tj ET',
  ].join('\n')));
  page.node.set(PDFName.of('Contents'), content);

  return pdfDoc;
}
