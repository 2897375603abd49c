import { DecodeError, OcrError, errorMessage } from '../errors';
import type { RasterEngine, RasterOptions } from './types';

// PDF user space is 72 units per inch; pdf-to-img takes a scale over that.
const PDF_POINTS_PER_INCH = 72;

export function isPDF(buf: Uint8Array): boolean {
  // Some producers emit junk before the header; readers look within the first 1024 bytes.
  const head = Buffer.from(buf.buffer, buf.byteOffset, Math.min(buf.byteLength, 1024)).toString('latin1');
  return head.includes('%PDF-');
}

export function dpiToScale(dpi: number): number {
  return dpi / PDF_POINTS_PER_INCH;
}

/**
 * Rasterizes with pdf-to-img (pdfjs-dist underneath). Every failure while
 * opening or rendering is reported as a DecodeError.
 */
export class PdfRasterEngine implements RasterEngine {
  async *rasterize(bytes: Uint8Array, opts: RasterOptions): AsyncIterable<Uint8Array> {
    if (!isPDF(bytes)) {
      throw new DecodeError('Input not recognized as PDF (missing %PDF header)');
    }
    let document: AsyncIterable<Uint8Array>;
    try {
      const { pdf } = await import('pdf-to-img');
      // pdfjs detaches the buffer it is given, so hand it a copy.
      document = await pdf(Buffer.from(bytes), { scale: dpiToScale(opts.dpi) });
    } catch (e) {
      throw new DecodeError(`Failed to open PDF: ${errorMessage(e)}`, { cause: e });
    }
    const it = document[Symbol.asyncIterator]();
    let page = 0;
    for (;;) {
      let next: IteratorResult<Uint8Array>;
      try {
        next = await it.next();
      } catch (e) {
        if (e instanceof OcrError) throw e;
        throw new DecodeError(`Failed to render page ${page + 1}: ${errorMessage(e)}`, { cause: e });
      }
      if (next.done) return;
      page++;
      yield next.value;
    }
  }
}
