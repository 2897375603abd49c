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
import { createApp } from "./app";

// Load env from repo root first, then allow app-local overrides
const rootEnv = fileURLToPath(new URL("../../../.env", import.meta.url));
if (fs.existsSync(rootEnv)) dotenv.config({ path: rootEnv });
dotenv.config();

const config = loadConfig(process.env);
configureLogging({ level: config.logLevel, format: config.logFormat });
const logger = getLogger("api");

const engine = sharedTextEngine({
  lang: config.lang,
  factory: tesseractFactory({ langPath: config.langPath }),
  logger: getLogger("engine"),
});

const app = createApp(config, { raster: new PdfRasterEngine(), engine, logger });

if (config.preload) {
  // Health reports ERROR if this fails; requests retry construction.
  void engine.warmup().catch((e: unknown) => logger.error("engine.preload.error", { error: errorMessage(e) }));
}

const server = app.listen(config.apiPort, () => {
  logger.info("api.listen", { port: config.apiPort, lang: config.lang, dpi: config.dpi });
});

function shutdown(signal: string) {
  logger.info("api.shutdown", { signal });
  server.close(() => {
    void engine
      .dispose()
      .catch((e: unknown) => logger.error("engine.dispose.error", { error: errorMessage(e) }))
      .finally(() => process.exit(0));
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
