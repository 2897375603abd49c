import type { PageErrorPolicy } from "./config";

export interface Page {
  page_number: number; // 1-based, contiguous
  raw_text: string;
  // Only set under the "record" page error policy.
  error?: string;
}

export interface Document {
  filename: string;
  total_pages: number;
  pages: Page[];
}

export interface DocumentError {
  filename: string;
  error: string;
}

export type DocumentOutcome =
  | { ok: true; document: Document }
  | { ok: false; error: DocumentError };

export interface BatchResult {
  results: Array<Document | DocumentError>;
}

export interface BatchInput {
  bytes: Uint8Array;
  filename: string;
  mime?: string;
}

export interface PipelineOptions {
  dpi: number;
  lang: string;
  pageErrorPolicy?: PageErrorPolicy;
}

export interface JobInput {
  pdf_url: string;
  filename?: string;
}

export type JobResult = { output: Document } | { error: string };

export type EngineState = "uninitialized" | "ready" | "error";

export interface HealthReport {
  status: "OK";
  ocr_status: "OK" | "ERROR";
  engine: EngineState;
}

export function isDocumentError(v: Document | DocumentError): v is DocumentError {
  return "error" in v && !("pages" in v);
}
