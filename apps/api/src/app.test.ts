import { describe, it, expect, afterEach } from "vitest";
import { once } from "events";
import type { Server } from "http";
import { TextEngineHandle } from "@pdf-ocr/core";
import { FakeRasterEngine, bytesOf, fakeFactory, fakePdf, memoryLogger } from "@pdf-ocr/core/testing";
import { createApp } from "./app";
import type { ApiConfig } from "./app";

const config: ApiConfig = { dpi: 300, lang: "en", maxUploadBytes: 1024, pageErrorPolicy: "fail" };

let server: Server | null = null;

async function start(f = fakeFactory(), overrides: Partial<ApiConfig> = {}) {
  const engine = new TextEngineHandle({ lang: "en", factory: f.factory, logger: memoryLogger() });
  const app = createApp({ ...config, ...overrides }, {
    raster: new FakeRasterEngine(),
    engine,
    logger: memoryLogger(),
    accessLog: false,
  });
  server = app.listen(0);
  await once(server, "listening");
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("no port");
  return { base: `http://127.0.0.1:${addr.port}`, f, engine };
}

function form(field: string, files: Array<[string, Uint8Array]>): FormData {
  const fd = new FormData();
  for (const [name, bytes] of files) fd.append(field, new Blob([bytes], { type: "application/pdf" }), name);
  return fd;
}

afterEach(async () => {
  if (server) {
    server.close();
    await once(server, "close");
    server = null;
  }
});

describe("GET /api/health", () => {
  it("reports OK without starting the engine", async () => {
    const { base, f } = await start();
    const res = await fetch(`${base}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "OK", ocr_status: "OK", engine: "uninitialized" });
    expect(f.constructions).toBe(0);
  });

  it("reports ERROR after the engine failed to start", async () => {
    const { base } = await start(fakeFactory({ failTimes: 1 }));
    const ocr = await fetch(`${base}/api/ocr`, { method: "POST", body: form("file", [["a.pdf", fakePdf(["x"])]]) });
    expect(ocr.status).toBe(500);
    expect(await ocr.json()).toEqual({ error: "OCR engine not initialized: model files missing" });
    const res = await fetch(`${base}/api/health`);
    expect(await res.json()).toEqual({ status: "OK", ocr_status: "ERROR", engine: "error" });
  });
});

describe("POST /api/ocr", () => {
  it("returns pages for an uploaded PDF", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/api/ocr`, {
      method: "POST",
      body: form("file", [["scan.pdf", fakePdf(["HELLO WORLD", "second page"])]]),
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      filename: "scan.pdf",
      total_pages: 2,
      pages: [
        { page_number: 1, raw_text: "HELLO WORLD" },
        { page_number: 2, raw_text: "second page" },
      ],
    });
  });

  it("cleans the uploaded filename", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/api/ocr`, { method: "POST", body: form("file", [["my report.pdf", fakePdf(["x"])]]) });
    expect(await res.json()).toMatchObject({ filename: "my_report.pdf" });
  });

  it("accepts a base64 JSON upload", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/api/ocr`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ file: { name: "doc.pdf", data_base64: Buffer.from(fakePdf(["json page"])).toString("base64") } }),
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ filename: "doc.pdf", total_pages: 1, pages: [{ page_number: 1, raw_text: "json page" }] });
  });

  it("rejects a request without a file", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/api/ocr`, { method: "POST", body: new FormData() });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No file part" });
  });

  it("rejects unsupported file types", async () => {
    const { base, f } = await start();
    const res = await fetch(`${base}/api/ocr`, { method: "POST", body: form("file", [["notes.txt", bytesOf("hi")]]) });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "Only PDF and image files (JPG, PNG) are allowed" });
    expect(f.constructions).toBe(0);
  });

  it("rejects files over the upload limit", async () => {
    const { base } = await start(fakeFactory(), { maxUploadBytes: 64 });
    const res = await fetch(`${base}/api/ocr`, {
      method: "POST",
      body: form("file", [["big.pdf", fakePdf(["x".repeat(200)])]]),
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "File too large (max 64 bytes)" });
  });

  it("answers 500 with a message for an undecodable PDF", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/api/ocr`, { method: "POST", body: form("file", [["broken.pdf", bytesOf("not a pdf")]]) });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "Input not recognized as PDF (missing %PDF header)" });
  });

  it("echoes the request id", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/health`, { headers: { "x-request-id": "req-42" } });
    expect(res.headers.get("x-request-id")).toBe("req-42");
    expect(await res.json()).toEqual({ ok: true });
  });
});

describe("POST /api/ocr/batch", () => {
  it("keeps going past a corrupted file", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/api/ocr/batch`, {
      method: "POST",
      body: form("files", [
        ["one.pdf", fakePdf(["1a", "1b"])],
        ["two.pdf", bytesOf("corrupted bytes")],
        ["three.pdf", fakePdf(["3a", "3b", "3c"])],
      ]),
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      results: [
        { filename: "one.pdf", total_pages: 2 },
        { filename: "two.pdf", error: "Input not recognized as PDF (missing %PDF header)" },
        { filename: "three.pdf", total_pages: 3 },
      ],
    });
  });

  it("rejects a batch without files", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/api/ocr/batch`, { method: "POST", body: new FormData() });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "No files part" });
  });

  it("marks invalid entries inline", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/api/ocr/batch`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ files: [{ name: "readme.md", data_base64: Buffer.from("# hi").toString("base64") }] }),
    });
    expect(await res.json()).toEqual({ results: [{ filename: "readme.md", error: "Invalid file" }] });
  });
});

describe("unknown routes", () => {
  it("answers 404 in the error shape", async () => {
    const { base } = await start();
    const res = await fetch(`${base}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "not_found" });
  });
});
