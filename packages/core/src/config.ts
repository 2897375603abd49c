import { z } from "zod";
import { ValidationError } from "./errors";

export type PageErrorPolicy = "fail" | "record";

export interface ServiceConfig {
  lang: string;
  dpi: number;
  maxUploadBytes: number;
  fetchTimeoutMs: number;
  maxExecutionMs: number;
  jobRetentionMs: number;
  pageErrorPolicy: PageErrorPolicy;
  preload: boolean;
  langPath?: string;
  apiPort: number;
  workerPort: number;
  logLevel: "trace" | "debug" | "info" | "warn" | "error";
  logFormat: "json" | "pretty";
}

export const DEFAULT_DPI = 300;
export const DEFAULT_LANG = "en";
export const DEFAULT_MAX_UPLOAD_BYTES = 50 * 1024 * 1024;
export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_EXECUTION_MS = 900_000;
export const DEFAULT_JOB_RETENTION_MS = 3_600_000;

const flag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((v) => v === "true" || v === "1" || v === "yes");

const envSchema = z.object({
  OCR_LANG: z.string().trim().min(1).default(DEFAULT_LANG),
  OCR_DPI: z.coerce.number().int().min(36).max(1200).default(DEFAULT_DPI),
  OCR_LANG_PATH: z.string().trim().min(1).optional(),
  OCR_PRELOAD: flag.default("false"),
  MAX_UPLOAD_BYTES: z.coerce.number().int().positive().default(DEFAULT_MAX_UPLOAD_BYTES),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
  MAX_EXECUTION_MS: z.coerce.number().int().positive().default(DEFAULT_MAX_EXECUTION_MS),
  JOB_RETENTION_MS: z.coerce.number().int().positive().default(DEFAULT_JOB_RETENTION_MS),
  PAGE_ERROR_POLICY: z.enum(["fail", "record"]).default("fail"),
  API_PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  WORKER_HTTP_PORT: z.coerce.number().int().min(0).max(65535).default(3002),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error"]).default("info"),
  LOG_FORMAT: z.enum(["json", "pretty"]).default("pretty"),
});

type Env = Record<string, string | undefined>;

// Empty strings in .env files mean "unset".
function compact(env: Env): Env {
  const out: Env = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") out[k] = v;
  }
  return out;
}

export function loadConfig(env: Env): ServiceConfig {
  const parsed = envSchema.safeParse(compact(env));
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid configuration: ${detail}`);
  }
  const e = parsed.data;
  return Object.freeze({
    lang: e.OCR_LANG,
    dpi: e.OCR_DPI,
    maxUploadBytes: e.MAX_UPLOAD_BYTES,
    fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
    maxExecutionMs: e.MAX_EXECUTION_MS,
    jobRetentionMs: e.JOB_RETENTION_MS,
    pageErrorPolicy: e.PAGE_ERROR_POLICY,
    preload: e.OCR_PRELOAD,
    langPath: e.OCR_LANG_PATH,
    apiPort: e.API_PORT,
    workerPort: e.WORKER_HTTP_PORT,
    logLevel: e.LOG_LEVEL,
    logFormat: e.LOG_FORMAT,
  });
}
