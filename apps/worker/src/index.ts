import dotenv from "dotenv";
import fs from "fs";
import { fileURLToPath } from "url";
import {
  PdfRasterEngine,
  configureLogging,
  errorMessage,
  getLogger,
  loadConfig,
  sharedTextEngine,
  tesseractFactory,
} from "@pdf-ocr/core";
import { createWorkerApp } from "./runtime";

// Load env from repo root first, then allow app-local overrides
const rootEnv = fileURLToPath(new URL("../../../.env", import.meta.url));
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const config = loadConfig(process.env);
configureLogging({ level: config.logLevel, format: config.logFormat });
const logger = getLogger("worker");

// Built on the first job, unless OCR_PRELOAD asks for it at startup.
const engine = sharedTextEngine({
  lang: config.lang,
  factory: tesseractFactory({ langPath: config.langPath }),
  logger: getLogger("engine"),
});

const { app } = createWorkerApp(config, {
  raster: new PdfRasterEngine(),
  engine,
  fetchTimeoutMs: config.fetchTimeoutMs,
  maxBytes: config.maxUploadBytes,
  logger,
});

if (config.preload) {
  void engine.warmup().catch((e: unknown) => logger.error("engine.preload.error", { error: errorMessage(e) }));
}

const server = app.listen(config.workerPort, () => {
  logger.info("worker.listen", { port: config.workerPort, max_execution_ms: config.maxExecutionMs });
});

function shutdown(signal: string) {
  logger.info("worker.shutdown", { signal });
  server.close(() => {
    void engine
      .dispose()
      .catch((e: unknown) => logger.error("engine.dispose.error", { error: errorMessage(e) }))
      .finally(() => process.exit(0));
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
