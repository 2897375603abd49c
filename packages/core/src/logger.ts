export type Level = "trace" | "debug" | "info" | "warn" | "error";
export type LogFormat = "json" | "pretty";

interface BaseCtx {
  service?: string;
  request_id?: string;
  job_id?: string;
  filename?: string;
}

export interface LogOptions {
  level?: Level;
  format?: LogFormat;
  sink?: (line: string) => void;
}

export interface Logger {
  child(ctx: BaseCtx): Logger;
  trace(msg: string, ctx?: Record<string, unknown>): void;
  debug(msg: string, ctx?: Record<string, unknown>): void;
  info(msg: string, ctx?: Record<string, unknown>): void;
  warn(msg: string, ctx?: Record<string, unknown>): void;
  error(msg: string, ctx?: Record<string, unknown>): void;
}

const LEVELS: Level[] = ["trace", "debug", "info", "warn", "error"];

function levelIndex(l: Level): number { return LEVELS.indexOf(l); }

function nowISO() { return new Date().toISOString(); }

export function isLevel(v: unknown): v is Level {
  return typeof v === "string" && (LEVELS as string[]).includes(v);
}

// Process defaults, set once by the app bootstrap. Explicit options still win.
let defaults: LogOptions = {};

export function configureLogging(opts: LogOptions): void {
  defaults = { ...defaults, ...opts };
}

export function getLogger(service?: string, opts: LogOptions = {}): Logger {
  const lvl: Level = opts.level ?? defaults.level ?? "info";
  const fmt: LogFormat = opts.format ?? defaults.format ?? "pretty";
  // eslint-disable-next-line no-console
  const sink = opts.sink ?? defaults.sink ?? ((line: string) => console.log(line));

  function emit(base: BaseCtx, level: Level, msg: string, extra?: Record<string, unknown>) {
    if (levelIndex(level) < levelIndex(lvl)) return;
    const entry: Record<string, unknown> = { ts: nowISO(), level, msg, ...base, ...(extra || {}) };
    if (fmt === "json") {
      sink(JSON.stringify(entry));
      return;
    }
    const { ts, level: _level, msg: _msg, service: svc, ...ctx } = entry;
    const head = `[${String(ts)}] ${level.toUpperCase()}${svc ? ` ${String(svc)}` : ""}`;
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : "";
    sink(`${head} - ${msg}${ctxStr}`);
  }

  function create(base: BaseCtx): Logger {
    return {
      child(ctx: BaseCtx) { return create({ ...base, ...ctx }); },
      trace(msg, ctx) { emit(base, "trace", msg, ctx); },
      debug(msg, ctx) { emit(base, "debug", msg, ctx); },
      info(msg, ctx) { emit(base, "info", msg, ctx); },
      warn(msg, ctx) { emit(base, "warn", msg, ctx); },
      error(msg, ctx) { emit(base, "error", msg, ctx); },
    };
  }

  return create({ service });
}
