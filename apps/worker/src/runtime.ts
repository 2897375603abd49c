import express from "express";
import type { NextFunction, Request, Response } from "express";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";
import { asOcrError, checkHealth, errorMessage, getLogger, handleJob } from "@pdf-ocr/core";
import type { Document, JobDeps, Logger, ServiceConfig } from "@pdf-ocr/core";

export type WorkerConfig = Pick<ServiceConfig, "dpi" | "lang" | "pageErrorPolicy" | "maxExecutionMs" | "jobRetentionMs">;

export type JobStatus = "queued" | "processing" | "done" | "failed";

export type JobRecord = {
  id: string;
  status: JobStatus;
  output?: Document;
  error?: string;
  created_at: string;
  finished_at?: string;
};

export interface WorkerDeps extends JobDeps {
  logger?: Logger;
  accessLog?: boolean;
}

export const EXECUTION_TIMEOUT = "job exceeded max execution time";

class ExecutionTimeout extends Error {}

function withDeadline<T>(work: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExecutionTimeout(EXECUTION_TIMEOUT)), ms);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Local stand-in for the hosting job runtime: keeps job records in memory,
 * runs the job wrapper once per job, and enforces the execution budget.
 * A job whose wrapper returned {error} still ends "done"; "failed" is kept
 * for jobs the runtime itself had to stop. Finished records are dropped
 * `jobRetentionMs` after they finish.
 */
export function createJobRuntime(config: WorkerConfig, deps: WorkerDeps) {
  const logger = deps.logger ?? getLogger("worker");
  const jobs = new Map<string, JobRecord>();
  const options = { dpi: config.dpi, lang: config.lang, pageErrorPolicy: config.pageErrorPolicy };

  async function execute(job: JobRecord, input: unknown): Promise<JobRecord> {
    const log = logger.child({ job_id: job.id });
    job.status = "processing";
    log.info("job.start");
    try {
      const result = await withDeadline(handleJob(input, options, { ...deps, logger: log }), config.maxExecutionMs);
      job.status = "done";
      if ("output" in result) job.output = result.output;
      else job.error = result.error;
      log.info("job.done", { pages: job.output?.total_pages, error: job.error });
    } catch (e) {
      // handleJob never rejects; only the deadline lands here
      job.status = "failed";
      job.error = e instanceof ExecutionTimeout ? EXECUTION_TIMEOUT : errorMessage(e);
      log.error("job.failed", { error: job.error });
    }
    job.finished_at = new Date().toISOString();
    setTimeout(() => jobs.delete(job.id), config.jobRetentionMs).unref();
    return job;
  }

  function submit(input: unknown): { job: JobRecord; done: Promise<JobRecord> } {
    const job: JobRecord = { id: uuidv4(), status: "queued", created_at: new Date().toISOString() };
    jobs.set(job.id, job);
    // Start on a later tick so callers see the record while it is still queued.
    const done = Promise.resolve().then(() => execute(job, input));
    return { job, done };
  }

  return { jobs, submit, get: (id: string) => jobs.get(id) };
}

export function createWorkerApp(config: WorkerConfig, deps: WorkerDeps) {
  const logger = deps.logger ?? getLogger("worker");
  const runtime = createJobRuntime(config, { ...deps, logger });

  const app = express();
  app.use(express.json({ limit: "1mb" }));
  if (deps.accessLog !== false) {
    // Reduce log noise from tight status polling
    app.use(morgan("dev", { skip: (req, res) => (req.url ?? "").startsWith("/status") || res.statusCode < 400 }));
  }

  // POST /runsync { input } -> waits for the job
  app.post("/runsync", (req: Request, res: Response, next: NextFunction) => {
    const body: unknown = req.body;
    const input = body && typeof body === "object" && "input" in body ? body.input : undefined;
    const { job, done } = runtime.submit(input);
    void done.then((finished) => res.json(finished), next);
    logger.debug("job.submitted", { job_id: job.id, mode: "sync" });
  });

  // POST /run { input } -> { id, status } right away
  app.post("/run", (req: Request, res: Response) => {
    const body: unknown = req.body;
    const input = body && typeof body === "object" && "input" in body ? body.input : undefined;
    const { job, done } = runtime.submit(input);
    res.json({ id: job.id, status: "queued" });
    void done.catch((e: unknown) => logger.error("job.unhandled", { job_id: job.id, error: errorMessage(e) }));
  });

  app.get("/status/:id", (req: Request, res: Response) => {
    const job = runtime.get(req.params.id);
    if (!job) return res.status(404).json({ error: "not_found" });
    res.json(job);
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ ok: true, worker: true, ...checkHealth(deps.engine) });
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "not_found" });
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const e = asOcrError(err);
    const status = err instanceof SyntaxError ? 400 : e.statusCode;
    logger.error("http.error", { code: e.code, error: e.message });
    res.status(status).json(e.toJSON());
  });

  return { app, runtime };
}
