import { EngineError, OcrError, errorMessage } from "./errors";
import type { TextEngine, TextEngineFactory } from "./ingest/types";
import { getLogger } from "./logger";
import type { Logger } from "./logger";
import type { EngineState } from "./types";

export interface TextEngineHandleOptions {
  lang: string;
  factory: TextEngineFactory;
  logger?: Logger;
}

/**
 * Process-wide owner of the text engine.
 *
 * The engine is built on first use and reused afterwards. Concurrent first
 * callers share one construction; a failed construction leaves the handle in
 * `error` and the next use tries again. Recognition calls are serialized:
 * at most one is in flight per handle.
 */
export class TextEngineHandle {
  readonly lang: string;
  private readonly factory: TextEngineFactory;
  private readonly log: Logger;
  private engine: TextEngine | null = null;
  private pending: Promise<TextEngine> | null = null;
  private current: EngineState = "uninitialized";
  private failure: string | null = null;
  private tail: Promise<unknown> = Promise.resolve();

  constructor(opts: TextEngineHandleOptions) {
    this.lang = opts.lang;
    this.factory = opts.factory;
    this.log = opts.logger ?? getLogger("core").child({});
  }

  state(): EngineState {
    return this.current;
  }

  lastError(): string | null {
    return this.failure;
  }

  get(): Promise<TextEngine> {
    if (this.engine) return Promise.resolve(this.engine);
    if (!this.pending) {
      this.pending = this.construct().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  private async construct(): Promise<TextEngine> {
    const started = Date.now();
    this.log.info("engine.init.start", { lang: this.lang });
    try {
      const engine = await this.factory(this.lang);
      this.engine = engine;
      this.current = "ready";
      this.failure = null;
      this.log.info("engine.init.done", { lang: this.lang, ms: Date.now() - started });
      return engine;
    } catch (e) {
      this.current = "error";
      this.failure = errorMessage(e);
      this.log.error("engine.init.error", { lang: this.lang, error: this.failure });
      throw e instanceof OcrError ? e : new EngineError(`OCR engine not initialized: ${this.failure}`, { cause: e });
    }
  }

  async warmup(): Promise<void> {
    await this.get();
  }

  /** Recognize one page image. Calls queue behind each other. */
  async recognize(image: Uint8Array): Promise<string> {
    const engine = await this.get();
    return this.exclusive(async () => {
      try {
        return await engine.recognize(image);
      } catch (e) {
        throw e instanceof OcrError ? e : new EngineError(`OCR failed: ${errorMessage(e)}`, { cause: e });
      }
    });
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn, fn);
    // The queue only tracks completion; `run` still rejects for its caller.
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  async dispose(): Promise<void> {
    const engine = this.engine ?? (this.pending ? await this.pending.catch(() => null) : null);
    this.engine = null;
    this.current = "uninitialized";
    this.failure = null;
    if (engine) {
      await this.exclusive(() => engine.terminate());
      this.log.info("engine.disposed", { lang: this.lang });
    }
  }
}

let shared: TextEngineHandle | null = null;

/** The single handle of this process. The first caller's options win. */
export function sharedTextEngine(opts: TextEngineHandleOptions): TextEngineHandle {
  if (!shared) shared = new TextEngineHandle(opts);
  return shared;
}

export function resetSharedTextEngine(): void {
  shared = null;
}
