import { errorMessage } from "./errors";
import { resolveAdapter } from "./ingest/index";
import { getLogger } from "./logger";
import { processDocument } from "./pipeline";
import type { PipelineDeps } from "./pipeline";
import type { BatchInput, BatchResult, DocumentOutcome, PipelineOptions } from "./types";

export const INVALID_FILE = "Invalid file";

export async function processBatchEntry(
  input: BatchInput,
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<DocumentOutcome> {
  const { bytes, filename, mime } = input;
  if (!filename || !bytes.byteLength || resolveAdapter(bytes, { filename, mime }) === "unsupported") {
    return { ok: false, error: { filename, error: INVALID_FILE } };
  }
  try {
    const document = await processDocument(bytes, filename, { ...options, mime }, deps);
    return { ok: true, document };
  } catch (e) {
    return { ok: false, error: { filename, error: errorMessage(e) } };
  }
}

/**
 * Documents are processed one after another, in input order. A failed entry
 * becomes `{filename, error}` in its slot; it never stops the batch.
 */
export async function processBatch(
  inputs: BatchInput[],
  options: PipelineOptions,
  deps: PipelineDeps
): Promise<BatchResult> {
  const log = (deps.logger ?? getLogger("core")).child({});
  log.info("ocr.batch.start", { files: inputs.length });

  const outcomes: DocumentOutcome[] = [];
  for (const input of inputs) {
    const outcome = await processBatchEntry(input, options, deps);
    if (!outcome.ok) log.warn("ocr.batch.entry_failed", { filename: input.filename, error: outcome.error.error });
    outcomes.push(outcome);
  }

  const failed = outcomes.filter((o) => !o.ok).length;
  log.info("ocr.batch.done", { files: inputs.length, failed });
  return { results: outcomes.map((o) => (o.ok ? o.document : o.error)) };
}
