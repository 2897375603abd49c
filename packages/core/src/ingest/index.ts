import { DecodeError, ValidationError } from '../errors';
import { isImage } from './image';
import { isPDF } from './pdf';
import type { Adapter, IngestOptions, RasterEngine, RasterOptions } from './types';

export const ALLOWED_EXTENSIONS = ['pdf', 'jpg', 'jpeg', 'png'] as const;
const IMAGE_EXTENSIONS = new Set(['jpg', 'jpeg', 'png']);

export function extensionOf(filename?: string): string {
  const name = (filename || '').toLowerCase();
  const dot = name.lastIndexOf('.');
  return dot >= 0 ? name.slice(dot + 1) : '';
}

export function isAllowedFile(filename?: string): boolean {
  return (ALLOWED_EXTENSIONS as readonly string[]).includes(extensionOf(filename));
}

// The extension decides; the mime type only counts for names without one.
export function guessAdapter(opts: IngestOptions = {}): Adapter {
  const ext = extensionOf(opts.filename);
  if (ext === 'pdf') return 'pdf';
  if (IMAGE_EXTENSIONS.has(ext)) return 'image';
  if (ext) return 'unsupported';
  const m = (opts.mime || '').toLowerCase();
  if (m.includes('application/pdf')) return 'pdf';
  if (m === 'image/png' || m === 'image/jpeg') return 'image';
  return 'unsupported';
}

export function resolveAdapter(bytes: Uint8Array, opts: IngestOptions = {}): Adapter {
  const guessed = guessAdapter(opts);
  if (guessed !== 'unsupported') return guessed;
  // Extensionless uploads still work when the content announces itself.
  if (!extensionOf(opts.filename)) {
    if (isPDF(bytes)) return 'pdf';
    if (isImage(bytes)) return 'image';
  }
  return 'unsupported';
}

/**
 * Page images for a document. PDFs go through the raster engine; an image
 * upload is already a single page.
 */
export async function* pageImages(
  bytes: Uint8Array,
  opts: IngestOptions & RasterOptions,
  raster: RasterEngine
): AsyncIterable<Uint8Array> {
  const adapter = resolveAdapter(bytes, opts);
  if (adapter === 'unsupported') {
    throw new ValidationError('Only PDF and image files (JPG, PNG) are allowed');
  }
  if (adapter === 'image') {
    if (!isImage(bytes)) {
      throw new DecodeError('Input not recognized as an image (expected PNG or JPEG)');
    }
    yield bytes;
    return;
  }
  yield* raster.rasterize(bytes, { dpi: opts.dpi });
}

export { isPDF, PdfRasterEngine, dpiToScale } from './pdf';
export { isImage, TesseractTextEngine, tesseractFactory, normalizeRecognizedText, bundledLangPath } from './image';
export type { Adapter, IngestOptions, RasterEngine, RasterOptions, TextEngine, TextEngineFactory } from './types';
