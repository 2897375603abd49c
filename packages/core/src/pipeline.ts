import type { TextEngineHandle } from "./engine";
import { EngineError, OcrError, ValidationError, errorMessage } from "./errors";
import { pageImages, resolveAdapter } from "./ingest/index";
import type { RasterEngine } from "./ingest/types";
import { sameLanguage } from "./lang";
import { getLogger } from "./logger";
import type { Logger } from "./logger";
import type { Document, Page, PipelineOptions } from "./types";

export interface PipelineDeps {
  raster: RasterEngine;
  engine: TextEngineHandle;
  logger?: Logger;
}

export interface ProcessOptions extends PipelineOptions {
  mime?: string;
}

/**
 * Rasterize a document and OCR every page, in order.
 *
 * Pages come out numbered 1..N with no gaps. Under the default "fail" policy
 * any page failure fails the whole document; "record" keeps going and marks
 * the page instead. Decode failures always fail the document.
 */
export async function processDocument(
  bytes: Uint8Array,
  filename: string,
  options: ProcessOptions,
  deps: PipelineDeps
): Promise<Document> {
  const log = (deps.logger ?? getLogger("core")).child({ filename });
  const policy = options.pageErrorPolicy ?? "fail";

  if (!bytes.byteLength) throw new ValidationError("Empty file");
  if (resolveAdapter(bytes, { filename, mime: options.mime }) === "unsupported") {
    throw new ValidationError("Only PDF and image files (JPG, PNG) are allowed");
  }
  if (!sameLanguage(options.lang, deps.engine.lang)) {
    throw new ValidationError(`Language '${options.lang}' is not loaded; OCR engine runs '${deps.engine.lang}'`);
  }

  const started = Date.now();
  log.info("ocr.document.start", { bytes: bytes.byteLength, dpi: options.dpi, lang: options.lang, policy });

  // Pay engine construction before rendering anything.
  await deps.engine.get();

  const pages: Page[] = [];
  for await (const image of pageImages(bytes, { filename, mime: options.mime, dpi: options.dpi }, deps.raster)) {
    const page_number = pages.length + 1;
    try {
      const raw_text = await deps.engine.recognize(image);
      pages.push({ page_number, raw_text });
      log.debug("ocr.page.done", { page: page_number, chars: raw_text.length });
    } catch (e) {
      const message = errorMessage(e);
      log.warn("ocr.page.error", { page: page_number, error: message, policy });
      if (policy === "fail") {
        throw e instanceof OcrError ? e : new EngineError(message, { cause: e });
      }
      pages.push({ page_number, raw_text: "", error: message });
    }
  }

  log.info("ocr.document.done", { pages: pages.length, ms: Date.now() - started });
  return { filename, total_pages: pages.length, pages };
}
