/**
 * PdfLibDocumentSource - DocumentSource over a pdf-lib PDFDocument
 *
 * pdf-lib owns the container: cross-reference tables, object lookup and
 * stream filters. This class only reads page resources and content.
 */

import {
  PDFDict,
  PDFDocument,
  PDFName,
  PDFPage,
  PDFRef,
  PDFStream,
} from 'pdf-lib';

import { parseContentStream } from './ContentStreamParser';
import { fail, ok, TranscriptErrorKind, type Result } from './errors';
import type { DocumentSource, FontResource, PDFOperator } from './types';
import { concatStreams, decodeStream, getContentStreams } from '../utils/pdfStreamUtils';

const DEFAULT_ENCODING = 'StandardEncoding';

export class PdfLibDocumentSource implements DocumentSource<PDFPage, PDFRef> {
  constructor(private readonly pdfDoc: PDFDocument) {}

  static async load(bytes: Uint8Array): Promise<PdfLibDocumentSource> {
    const pdfDoc = await PDFDocument.load(bytes, { ignoreEncryption: true, updateMetadata: false });
    return new PdfLibDocumentSource(pdfDoc);
  }

  getPages(): PDFPage[] {
    return this.pdfDoc.getPages();
  }

  getPageFonts(page: PDFPage): Map<string, FontResource<PDFRef>> {
    const fonts = new Map<string, FontResource<PDFRef>>();

    const fontsDict = page.node.Resources()?.lookupMaybe(PDFName.of('Font'), PDFDict);
    if (!fontsDict) return fonts;

    for (const [fontName, fontRef] of fontsDict.entries()) {
      const fontDict = this.pdfDoc.context.lookup(fontRef);
      if (!(fontDict instanceof PDFDict)) continue;

      const toUnicode = fontDict.get(PDFName.of('ToUnicode'));
      fonts.set(fontName.decodeText(), {
        encoding: this.readEncoding(fontDict),
        toUnicode: toUnicode instanceof PDFRef ? toUnicode : undefined,
      });
    }

    return fonts;
  }

  resolveReference(ref: PDFRef): Result<Uint8Array> {
    const stream = this.pdfDoc.context.lookup(ref);
    if (!(stream instanceof PDFStream)) {
      return fail(
        TranscriptErrorKind.UNRESOLVABLE_REFERENCE,
        'font-resolution',
        `ToUnicode reference ${ref.toString()} does not resolve to a stream`
      );
    }
    return ok(decodeStream(stream));
  }

  getDecodedPageInstructions(page: PDFPage): PDFOperator[] {
    const streams = getContentStreams(this.pdfDoc.context, page.node.Contents());
    return parseContentStream(concatStreams(streams.map(decodeStream)));
  }

  // /Encoding is a name, or a differences dictionary built on /BaseEncoding
  private readEncoding(fontDict: PDFDict): string {
    const encoding = fontDict.lookup(PDFName.of('Encoding'));
    if (encoding instanceof PDFName) {
      return encoding.decodeText();
    }
    if (encoding instanceof PDFDict) {
      const base = encoding.lookup(PDFName.of('BaseEncoding'));
      if (base instanceof PDFName) {
        return base.decodeText();
      }
    }
    return DEFAULT_ENCODING;
  }
}
