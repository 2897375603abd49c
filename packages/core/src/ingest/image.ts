import { createRequire } from 'module';
import path from 'path';
import type { Worker } from 'tesseract.js';
import { EngineError, errorMessage } from '../errors';
import { toTesseractLang } from '../lang';
import type { TextEngine, TextEngineFactory } from './types';

const PNG_MAGIC = [0x89, 0x50, 0x4e, 0x47];
const JPEG_MAGIC = [0xff, 0xd8, 0xff];

function startsWith(buf: Uint8Array, magic: number[]): boolean {
  return buf.byteLength >= magic.length && magic.every((b, i) => buf[i] === b);
}

export function isImage(buf: Uint8Array): boolean {
  return startsWith(buf, PNG_MAGIC) || startsWith(buf, JPEG_MAGIC);
}

export type TesseractOptions = {
  // Directory holding <lang>.traineddata.gz; defaults to the @tesseract.js-data package.
  langPath?: string;
};

// Model tesseract.js loads for its default LSTM engine mode.
const BUNDLED_MODEL_DIR = '4.0.0_best_int';
const requireHere = createRequire(import.meta.url);

/**
 * Traineddata directory from the installed `@tesseract.js-data/<code>`
 * packages. tesseract.js takes a single directory, so a combination spread
 * over several packages has none.
 */
export function bundledLangPath(langs: string): string | undefined {
  const dirs = new Set<string>();
  for (const code of langs.split('+')) {
    let manifest: string;
    try {
      manifest = requireHere.resolve(`@tesseract.js-data/${code}/package.json`);
    } catch {
      return undefined;
    }
    dirs.add(path.join(path.dirname(manifest), BUNDLED_MODEL_DIR));
  }
  const [only, ...rest] = dirs;
  return rest.length ? undefined : only;
}

/**
 * Collapse tesseract output into one string per page: one detected line per
 * row, blank rows dropped.
 */
export function normalizeRecognizedText(text: string): string {
  return text
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => line.trimEnd())
    .filter((line) => line.trim().length > 0)
    .join('\n');
}

export class TesseractTextEngine implements TextEngine {
  private constructor(private readonly worker: Worker) {}

  static async create(lang: string, opts: TesseractOptions = {}): Promise<TesseractTextEngine> {
    const { createWorker } = await import('tesseract.js');
    const langs = toTesseractLang(lang);
    const langPath = opts.langPath ?? bundledLangPath(langs);
    if (!langPath) {
      throw new EngineError(
        `No language data for ${langs}: install @tesseract.js-data/<code> or set OCR_LANG_PATH to a traineddata directory`
      );
    }
    try {
      const worker = await createWorker(langs, undefined, {
        langPath,
        gzip: true,
      });
      return new TesseractTextEngine(worker);
    } catch (e) {
      throw new EngineError(`Failed to initialize OCR engine (${langs}): ${errorMessage(e)}`, { cause: e });
    }
  }

  async recognize(image: Uint8Array): Promise<string> {
    // tesseract.js takes Buffer, not a bare Uint8Array
    const buf = Buffer.isBuffer(image) ? image : Buffer.from(image.buffer, image.byteOffset, image.byteLength);
    const result = await this.worker.recognize(buf);
    return normalizeRecognizedText(result.data.text ?? '');
  }

  async terminate(): Promise<void> {
    await this.worker.terminate();
  }
}

export function tesseractFactory(opts: TesseractOptions = {}): TextEngineFactory {
  return (lang) => TesseractTextEngine.create(lang, opts);
}
