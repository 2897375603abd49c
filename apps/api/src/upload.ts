import path from "path";
import multer from "multer";
import { z } from "zod";
import { ValidationError } from "@pdf-ocr/core";
import type { BatchInput } from "@pdf-ocr/core";

export type UploadedFile = BatchInput & { originalname: string };

export function createUpload(maxUploadBytes: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxUploadBytes },
  });
}

/** Basename only, ASCII word characters, dots and dashes; everything else becomes "_". */
export function secureFilename(name: string): string {
  const base = path.basename(name.replace(/\\/g, "/")).normalize("NFKD").replace(/[^\x00-\x7F]/g, "");
  return base
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "")
    .replace(/^[._]+/, "");
}

export function fromMulter(file: Express.Multer.File): UploadedFile {
  return {
    originalname: file.originalname,
    filename: secureFilename(file.originalname),
    mime: file.mimetype,
    bytes: new Uint8Array(file.buffer.buffer, file.buffer.byteOffset, file.buffer.byteLength),
  };
}

// JSON uploads: { file: {...} } or { files: [{...}] }, contents base64 encoded.
const jsonFile = z.object({
  name: z.string().default(""),
  mime: z.string().optional(),
  data_base64: z.string().default(""),
});

const jsonSingle = z.object({ file: jsonFile });
const jsonBatch = z.object({ files: z.array(jsonFile).min(1) });

function fromJson(f: z.infer<typeof jsonFile>, maxUploadBytes: number): UploadedFile {
  const buf = Buffer.from(f.data_base64, "base64");
  if (buf.byteLength > maxUploadBytes) {
    throw new ValidationError(`File too large (max ${maxUploadBytes} bytes)`);
  }
  return {
    originalname: f.name,
    filename: secureFilename(f.name),
    mime: f.mime,
    bytes: new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength),
  };
}

export function singleFromJson(body: unknown, maxUploadBytes: number): UploadedFile | null {
  const parsed = jsonSingle.safeParse(body);
  return parsed.success ? fromJson(parsed.data.file, maxUploadBytes) : null;
}

export function batchFromJson(body: unknown, maxUploadBytes: number): UploadedFile[] | null {
  const parsed = jsonBatch.safeParse(body);
  return parsed.success ? parsed.data.files.map((f) => fromJson(f, maxUploadBytes)) : null;
}
