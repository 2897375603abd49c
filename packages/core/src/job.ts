import { z } from "zod";
import { DEFAULT_MAX_UPLOAD_BYTES } from "./config";
import { FetchError, OcrError, errorMessage } from "./errors";
import { extensionOf } from "./ingest/index";
import { getLogger } from "./logger";
import { processDocument } from "./pipeline";
import type { PipelineDeps } from "./pipeline";
import type { JobInput, JobResult, PipelineOptions } from "./types";

export const PDF_URL_REQUIRED = "pdf_url is required";
export const DEFAULT_JOB_FILENAME = "document.pdf";

type FetchLike = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface JobDeps extends PipelineDeps {
  fetchTimeoutMs: number;
  /** Same cap as direct uploads. */
  maxBytes?: number;
  fetch?: FetchLike;
}

const jobInputSchema = z.object(
  {
    pdf_url: z.string({ required_error: PDF_URL_REQUIRED, invalid_type_error: PDF_URL_REQUIRED }).trim().min(1, PDF_URL_REQUIRED),
    filename: z.string().trim().min(1).optional(),
  },
  { required_error: "job input must be an object", invalid_type_error: "job input must be an object" }
);

export function parseJobInput(input: unknown): { ok: true; value: JobInput } | { ok: false; error: string } {
  const parsed = jobInputSchema.safeParse(input);
  if (parsed.success) return { ok: true, value: parsed.data };
  const issue = parsed.error.issues[0];
  const where = issue?.path.join(".");
  return { ok: false, error: where && where !== "pdf_url" ? `${where}: ${issue.message}` : issue?.message ?? PDF_URL_REQUIRED };
}

export function defaultFilename(url: string): string {
  let path = url;
  try {
    path = new URL(url).pathname;
  } catch {
    // not absolute; fetch will reject it below
  }
  const ext = extensionOf(path);
  return ext === "jpg" || ext === "jpeg" || ext === "png" ? `document.${ext}` : DEFAULT_JOB_FILENAME;
}

export async function fetchDocument(
  url: string,
  timeoutMs: number,
  fetchImpl: FetchLike,
  maxBytes = DEFAULT_MAX_UPLOAD_BYTES
): Promise<Uint8Array> {
  let resp: Response;
  try {
    resp = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
  } catch (e) {
    const timedOut = e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError");
    const reason = timedOut ? `timed out after ${timeoutMs}ms` : errorMessage(e);
    throw new FetchError(`Failed to fetch ${url}: ${reason}`, undefined, { cause: e });
  }
  if (!resp.ok) {
    throw new FetchError(`HTTP ${resp.status} fetching ${url}`, resp.status);
  }
  const tooLarge = () => new FetchError(`Document at ${url} is too large (max ${maxBytes} bytes)`, resp.status);
  const declared = Number(resp.headers.get("content-length") ?? "");
  if (Number.isFinite(declared) && declared > maxBytes) throw tooLarge();
  if (!resp.body) return new Uint8Array(0);

  // content-length may be absent, so count while reading too.
  const chunks: Uint8Array[] = [];
  let total = 0;
  try {
    for await (const chunk of resp.body) {
      if (!(chunk instanceof Uint8Array)) continue;
      total += chunk.byteLength;
      if (total > maxBytes) throw tooLarge();
      chunks.push(chunk);
    }
  } catch (e) {
    if (e instanceof FetchError) throw e;
    throw new FetchError(`Failed to read body of ${url}: ${errorMessage(e)}`, resp.status, { cause: e });
  }
  return Buffer.concat(chunks, total);
}

/**
 * One job, one document. Always resolves: every failure (bad input, fetch,
 * decode, engine) comes back as `{error}` so the runtime records a
 * completed job rather than a crashed one.
 */
export async function handleJob(input: unknown, options: PipelineOptions, deps: JobDeps): Promise<JobResult> {
  const log = (deps.logger ?? getLogger("core")).child({});
  const parsed = parseJobInput(input);
  if (!parsed.ok) {
    log.warn("job.input.invalid", { error: parsed.error });
    return { error: parsed.error };
  }
  const { pdf_url } = parsed.value;
  const filename = parsed.value.filename ?? defaultFilename(pdf_url);

  try {
    log.info("job.fetch.start", { url: pdf_url, filename });
    const bytes = await fetchDocument(pdf_url, deps.fetchTimeoutMs, deps.fetch ?? fetch, deps.maxBytes);
    log.info("job.fetch.done", { url: pdf_url, bytes: bytes.byteLength });
    const output = await processDocument(bytes, filename, options, deps);
    return { output };
  } catch (e) {
    const message = errorMessage(e);
    const kind = e instanceof OcrError ? e.code : "INTERNAL_ERROR";
    log.error("job.error", { url: pdf_url, filename, code: kind, error: message });
    return { error: message };
  }
}
