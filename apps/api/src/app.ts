import express from "express";
import type { NextFunction, Request, Response } from "express";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import multer from "multer";
import { v4 as uuidv4 } from "uuid";
import {
  ValidationError,
  asOcrError,
  checkHealth,
  getLogger,
  isAllowedFile,
  processBatch,
  processDocument,
} from "@pdf-ocr/core";
import type { Logger, PipelineDeps, ServiceConfig } from "@pdf-ocr/core";
import { batchFromJson, createUpload, fromMulter, singleFromJson } from "./upload";
import type { UploadedFile } from "./upload";

export type ApiConfig = Pick<ServiceConfig, "dpi" | "lang" | "maxUploadBytes" | "pageErrorPolicy">;

export interface ApiDeps extends PipelineDeps {
  logger?: Logger;
  accessLog?: boolean;
}

type Handler = (req: Request, res: Response) => Promise<unknown>;

function route(fn: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };
}

function requestLogger(res: Response, base: Logger): Logger {
  return base.child({ request_id: String(res.locals.requestId ?? "") });
}

// body-parser errors carry an HTTP status and a `type`, e.g. "entity.too.large".
function isBodyParserError(err: unknown): err is Error & { status: number; type: string } {
  if (!(err instanceof Error) || !("status" in err) || !("type" in err)) return false;
  return typeof err.status === "number" && typeof err.type === "string";
}

export function createApp(config: ApiConfig, deps: ApiDeps) {
  const logger = deps.logger ?? getLogger("api");
  const upload = createUpload(config.maxUploadBytes);
  const options = { dpi: config.dpi, lang: config.lang, pageErrorPolicy: config.pageErrorPolicy };

  const app = express();
  // base64 JSON uploads are about 4/3 of the raw size
  app.use(express.json({ limit: Math.ceil(config.maxUploadBytes * 1.4) }));
  app.use(cors());
  app.use(helmet());
  if (deps.accessLog !== false) {
    // Only failed requests; health probes would drown everything else.
    app.use(morgan("dev", { skip: (_req, res) => res.statusCode < 400 }));
  }
  app.use((req: Request, res: Response, next: NextFunction) => {
    const incoming = req.headers["x-request-id"];
    const id = typeof incoming === "string" && incoming ? incoming : uuidv4();
    res.locals.requestId = id;
    res.setHeader("x-request-id", id);
    next();
  });

  // POST /api/ocr  multipart "file" | { file: { name, mime, data_base64 } }
  app.post(
    "/api/ocr",
    upload.single("file"),
    route(async (req, res) => {
      const log = requestLogger(res, logger);
      let file: UploadedFile | null = req.file ? fromMulter(req.file) : null;
      if (!file && req.is("application/json")) file = singleFromJson(req.body, config.maxUploadBytes);
      if (!file) throw new ValidationError("No file part");
      if (!file.originalname) throw new ValidationError("No selected file");
      if (!isAllowedFile(file.originalname)) {
        throw new ValidationError("Only PDF and image files (JPG, PNG) are allowed");
      }
      if (!file.bytes.byteLength) throw new ValidationError("Empty file");

      log.info("ocr.request", { filename: file.filename, bytes: file.bytes.byteLength });
      const doc = await processDocument(file.bytes, file.filename, { ...options, mime: file.mime }, { ...deps, logger: log });
      res.json(doc);
    })
  );

  // POST /api/ocr/batch  multipart "files" (repeated) | { files: [...] }
  app.post(
    "/api/ocr/batch",
    upload.array("files"),
    route(async (req, res) => {
      const log = requestLogger(res, logger);
      let files: UploadedFile[] | null = Array.isArray(req.files) && req.files.length ? req.files.map(fromMulter) : null;
      if (!files && req.is("application/json")) files = batchFromJson(req.body, config.maxUploadBytes);
      if (!files) throw new ValidationError("No files part");

      log.info("ocr.batch.request", { files: files.length });
      const result = await processBatch(files, options, { ...deps, logger: log });
      res.json(result);
    })
  );

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json(checkHealth(deps.engine));
  });

  app.get("/health", (_req: Request, res: Response) => res.json({ ok: true }));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "not_found" });
  });

  // Every failure leaves as { error }, never a stack trace.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const log = requestLogger(res, logger);
    let e = asOcrError(err);
    if (err instanceof multer.MulterError) {
      e = new ValidationError(
        err.code === "LIMIT_FILE_SIZE" ? `File too large (max ${config.maxUploadBytes} bytes)` : `${err.message}: ${err.field ?? ""}`.replace(/: $/, "")
      );
    } else if (isBodyParserError(err) && err.status < 500) {
      e = new ValidationError(err.type === "entity.too.large" ? `File too large (max ${config.maxUploadBytes} bytes)` : err.message);
    }
    if (e.statusCode >= 500) {
      log.error("http.error", { code: e.code, error: e.message });
    } else {
      log.warn("http.rejected", { code: e.code, error: e.message });
    }
    res.status(e.statusCode).json(e.toJSON());
  });

  return app;
}
