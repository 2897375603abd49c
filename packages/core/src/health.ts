import type { TextEngineHandle } from "./engine";
import type { HealthReport } from "./types";

// Reads handle state only; never builds the engine.
export function checkHealth(handle: TextEngineHandle): HealthReport {
  const engine = handle.state();
  return { status: "OK", ocr_status: engine === "error" ? "ERROR" : "OK", engine };
}
