/**
 * Error taxonomy for the OCR pipeline.
 *
 * Every failure that can reach a caller is one of these. HTTP adapters use
 * `statusCode`; batch and job paths only need `message`.
 *
 *   throw new ValidationError("No file part")
 *   throw new DecodeError("Input is not a PDF")
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "DECODE_ERROR"
  | "ENGINE_ERROR"
  | "FETCH_ERROR"
  | "INTERNAL_ERROR";

export interface SerializedError {
  error: string;
}

export class OcrError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return { error: this.message };
  }
}

/** Missing, oversized or malformed input. Surfaces before any engine work. */
export class ValidationError extends OcrError {
  constructor(message = "Invalid input") {
    super("VALIDATION_ERROR", message, 400);
  }
}

/** Bytes are not a renderable PDF, or the renderer could not start. */
export class DecodeError extends OcrError {
  constructor(message = "Could not decode document", options?: { cause?: unknown }) {
    super("DECODE_ERROR", message, 500, options);
  }
}

/** Text engine unavailable or failed during recognition. */
export class EngineError extends OcrError {
  constructor(message = "OCR engine failure", options?: { cause?: unknown }) {
    super("ENGINE_ERROR", message, 500, options);
  }
}

/** URL unreachable, timed out or answered non-2xx. Job path only. */
export class FetchError extends OcrError {
  constructor(message: string, public readonly status?: number, options?: { cause?: unknown }) {
    super("FETCH_ERROR", message, 502, options);
  }
}

export class InternalError extends OcrError {
  constructor(message = "Unexpected error", options?: { cause?: unknown }) {
    super("INTERNAL_ERROR", message, 500, options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err) ?? String(err);
  } catch {
    return String(err);
  }
}

export function asOcrError(err: unknown): OcrError {
  if (err instanceof OcrError) return err;
  return new InternalError(errorMessage(err), { cause: err });
}
