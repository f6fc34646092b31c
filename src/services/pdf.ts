// src/services/pdf.ts
// What: PDF bytes -> plain text and page count.
// How: unpdf's bundled pdf.js build, pages merged into one string. Anything pdf.js cannot open is reported as
//      InvalidArgumentError so upload can answer failed_parse.

import { extractText, getDocumentProxy } from 'unpdf';
import { InvalidArgumentError, errorMessage } from '../errors.js';

export interface ExtractedPdf {
  text: string;
  pageCount: number;
}

export async function extractPdfText(buffer: Uint8Array): Promise<ExtractedPdf> {
  if (buffer.byteLength === 0) {
    throw new InvalidArgumentError('PDF is empty', { operation: 'extract_pdf' });
  }
  try {
    // pdf.js may detach the buffer it is given; hand it a copy.
    const pdf = await getDocumentProxy(new Uint8Array(buffer));
    const { totalPages, text } = await extractText(pdf, { mergePages: true });
    return { text, pageCount: totalPages };
  } catch (err) {
    throw new InvalidArgumentError(`Failed to parse PDF: ${errorMessage(err)}`, {
      operation: 'extract_pdf',
      details: { bytes: buffer.byteLength },
      cause: err,
    });
  }
}
