import fetch, { Blob, FormData } from 'node-fetch';
import type { Response } from 'node-fetch';
import { z } from 'zod';
import type { BatchResult, Document, HealthReport, JobInput } from '@pdf-ocr/core';

export type ClientOptions = { baseUrl: string; apiKey?: string };

export type UploadFile = { bytes: Uint8Array; filename: string; mime?: string };

// Response shapes, checked on the way in.
const pageSchema = z.object({ page_number: z.number().int().min(1), raw_text: z.string(), error: z.string().optional() });
const documentSchema = z.object({ filename: z.string(), total_pages: z.number().int().min(0), pages: z.array(pageSchema) });
const documentErrorSchema = z.object({ filename: z.string(), error: z.string() });
const batchSchema = z.object({ results: z.array(z.union([documentSchema, documentErrorSchema])) });
const healthSchema = z.object({
  status: z.literal('OK'),
  ocr_status: z.enum(['OK', 'ERROR']),
  engine: z.enum(['uninitialized', 'ready', 'error']),
});
const jobStatusSchema = z.object({
  id: z.string(),
  status: z.enum(['queued', 'processing', 'done', 'failed']),
  output: documentSchema.optional(),
  error: z.string().optional(),
  created_at: z.string().optional(),
  finished_at: z.string().optional(),
});
const jobQueuedSchema = jobStatusSchema.pick({ id: true, status: true });

export type JobStatus = z.infer<typeof jobStatusSchema>;

export class OcrClientError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = 'OcrClientError';
  }
}

function mimeFor(filename: string): string {
  const lower = filename.toLowerCase();
  if (lower.endsWith('.png')) return 'image/png';
  if (lower.endsWith('.jpg') || lower.endsWith('.jpeg')) return 'image/jpeg';
  return 'application/pdf';
}

abstract class BaseClient {
  constructor(protected opts: ClientOptions) {}

  protected url(path: string) {
    return `${this.opts.baseUrl.replace(/\/$/, '')}${path}`;
  }

  protected headers(json = true) {
    const h: Record<string, string> = {};
    if (json) h['content-type'] = 'application/json';
    if (this.opts.apiKey) h['authorization'] = `Bearer ${this.opts.apiKey}`;
    return h;
  }

  // Non-2xx answers carry { error }; surface it as OcrClientError.
  protected async read<T>(r: Response, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<T> {
    const text = await r.text();
    let body: unknown = null;
    try {
      body = text ? JSON.parse(text) : null;
    } catch {
      throw new OcrClientError(r.status, `Unexpected response (${r.status}): ${text.slice(0, 120)}`);
    }
    if (!r.ok) {
      const message = body && typeof body === 'object' && 'error' in body && typeof body.error === 'string'
        ? body.error
        : `HTTP ${r.status}`;
      throw new OcrClientError(r.status, message);
    }
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new OcrClientError(r.status, `Malformed response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`);
    }
    return parsed.data;
  }
}

export class OcrClient extends BaseClient {
  async health(): Promise<HealthReport> {
    const r = await fetch(this.url('/api/health'), { headers: this.headers(false) });
    return this.read(r, healthSchema);
  }

  async ocr(file: UploadFile): Promise<Document> {
    const form = new FormData();
    form.append('file', new Blob([file.bytes], { type: file.mime ?? mimeFor(file.filename) }), file.filename);
    const r = await fetch(this.url('/api/ocr'), { method: 'POST', headers: this.headers(false), body: form });
    return this.read(r, documentSchema);
  }

  async ocrBatch(files: UploadFile[]): Promise<BatchResult> {
    const form = new FormData();
    for (const f of files) {
      form.append('files', new Blob([f.bytes], { type: f.mime ?? mimeFor(f.filename) }), f.filename);
    }
    const r = await fetch(this.url('/api/ocr/batch'), { method: 'POST', headers: this.headers(false), body: form });
    return this.read(r, batchSchema);
  }
}

export class JobClient extends BaseClient {
  async run(input: JobInput) {
    const r = await fetch(this.url('/run'), { method: 'POST', headers: this.headers(), body: JSON.stringify({ input }) });
    return this.read(r, jobQueuedSchema);
  }

  async runSync(input: JobInput): Promise<JobStatus> {
    const r = await fetch(this.url('/runsync'), { method: 'POST', headers: this.headers(), body: JSON.stringify({ input }) });
    return this.read(r, jobStatusSchema);
  }

  async status(id: string): Promise<JobStatus> {
    const r = await fetch(this.url(`/status/${encodeURIComponent(id)}`), { headers: this.headers(false) });
    return this.read(r, jobStatusSchema);
  }
}
