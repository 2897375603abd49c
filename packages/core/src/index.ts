export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./engine";
export * from "./pipeline";
export * from "./batch";
export * from "./job";
export * from "./health";
export * from "./ingest/index";
export { toTesseractLang, sameLanguage } from "./lang";
export { getLogger, configureLogging, isLevel } from "./logger";
export type { Logger, Level, LogFormat, LogOptions } from "./logger";
