/**
 * Shared PDF stream utilities: locating a page's content streams and
 * decoding stream bodies.
 */

import {
  PDFArray,
  PDFContext,
  PDFName,
  PDFObject,
  PDFRawStream,
  PDFStream,
  decodePDFRawStream,
} from 'pdf-lib';
import * as pako from 'pako';

/**
 * Get content streams from a page's /Contents entry (a stream or an array
 * of streams, possibly behind references)
 */
export function getContentStreams(context: PDFContext, contents: PDFObject | undefined): PDFStream[] {
  const contentStreams: PDFStream[] = [];
  const contentsObj = contents === undefined ? undefined : context.lookup(contents);

  if (contentsObj instanceof PDFArray) {
    for (let i = 0; i < contentsObj.size(); i++) {
      const stream = context.lookup(contentsObj.get(i));
      if (stream instanceof PDFStream) {
        contentStreams.push(stream);
      }
    }
  } else if (contentsObj instanceof PDFStream) {
    contentStreams.push(contentsObj);
  }

  return contentStreams;
}

/**
 * Decode a stream body. Raw streams go through pdf-lib's filters; streams
 * pdf-lib built in memory are either plain or Flate encoded.
 */
export function decodeStream(stream: PDFStream): Uint8Array {
  if (stream instanceof PDFRawStream) {
    return decodePDFRawStream(stream).decode();
  }

  const contents = stream.getContents();
  const filter = stream.dict.get(PDFName.of('Filter'));
  return filter === PDFName.of('FlateDecode') ? pako.inflate(contents) : contents;
}

/**
 * Join stream bodies with a newline so tokens never run together across
 * stream boundaries
 */
export function concatStreams(parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length + 1, 0);
  const result = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    result.set(part, offset);
    offset += part.length;
    result[offset++] = 0x0A;
  }
  return result;
}
