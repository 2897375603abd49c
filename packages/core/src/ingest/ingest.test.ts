import { describe, it, expect } from "vitest";
import fs from "fs";
import path from "path";
import { dpiToScale, extensionOf, guessAdapter, isAllowedFile, isImage, isPDF, normalizeRecognizedText, resolveAdapter } from "./index";
import { PdfRasterEngine } from "./pdf";
import { TesseractTextEngine, bundledLangPath } from "./image";
import { DecodeError, EngineError } from "../errors";

const enc = (s: string) => new TextEncoder().encode(s);

// Blank pages whose widths (in points) tell them apart once rendered.
function blankPdf(widths: number[]): Uint8Array {
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    `<< /Type /Pages /Kids [${widths.map((_, i) => `${i + 3} 0 R`).join(" ")}] /Count ${widths.length} >>`,
    ...widths.map((w) => `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 ${w} 50] >>`),
  ];
  let out = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(out.length);
    out += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });
  const xref = out.length;
  out += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const off of offsets) out += `${String(off).padStart(10, "0")} 00000 n \n`;
  out += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xref}\n%%EOF\n`;
  return enc(out);
}

// PNG IHDR: width is the big-endian u32 at byte 16.
const pngWidth = (img: Uint8Array) => Buffer.from(img).readUInt32BE(16);

describe("file kinds", () => {
  it("guesses by extension and mime", () => {
    expect(guessAdapter({ filename: "Scan.PDF" })).toBe("pdf");
    expect(guessAdapter({ filename: "upload", mime: "application/pdf" })).toBe("pdf");
    expect(guessAdapter({ filename: "photo.jpeg" })).toBe("image");
    expect(guessAdapter({ filename: "notes.txt" })).toBe("unsupported");
  });

  it("lets the extension win over the mime type", () => {
    expect(guessAdapter({ filename: "receipt.jpg", mime: "application/pdf" })).toBe("image");
    expect(guessAdapter({ filename: "scan.pdf", mime: "image/png" })).toBe("pdf");
    expect(guessAdapter({ filename: "notes.txt", mime: "application/pdf" })).toBe("unsupported");
    expect(resolveAdapter(new Uint8Array([0xff, 0xd8, 0xff]), { filename: "receipt.jpg", mime: "application/pdf" })).toBe("image");
  });

  it("sniffs content only for extensionless names", () => {
    expect(resolveAdapter(enc("%PDF-1.4\n"), { filename: "upload" })).toBe("pdf");
    expect(resolveAdapter(new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d]), { filename: "blob" })).toBe("image");
    expect(resolveAdapter(enc("%PDF-1.4\n"), { filename: "notes.txt" })).toBe("unsupported");
  });

  it("checks allowed extensions", () => {
    expect(extensionOf("a.b.PNG")).toBe("png");
    expect(isAllowedFile("report.pdf")).toBe(true);
    expect(isAllowedFile("report.docx")).toBe(false);
    expect(isAllowedFile(undefined)).toBe(false);
  });

  it("detects headers", () => {
    expect(isPDF(enc("\n\n%PDF-1.7"))).toBe(true);
    expect(isPDF(enc("PK\x03\x04"))).toBe(false);
    expect(isImage(new Uint8Array([0xff, 0xd8, 0xff, 0xe0]))).toBe(true);
    expect(isImage(enc("GIF89a"))).toBe(false);
  });
});

describe("PdfRasterEngine", () => {
  it("converts dpi to render scale", () => {
    expect(dpiToScale(72)).toBe(1);
    expect(dpiToScale(300)).toBeCloseTo(4.1667, 3);
  });

  it("renders every page in document order", async () => {
    const images: Uint8Array[] = [];
    for await (const img of new PdfRasterEngine().rasterize(blankPdf([100, 200, 300]), { dpi: 72 })) images.push(img);
    expect(images).toHaveLength(3);
    expect(images.every((img) => isImage(img))).toBe(true);
    expect(images.map(pngWidth)).toEqual([100, 200, 300]);
  });

  it("scales pages by dpi", async () => {
    const images: Uint8Array[] = [];
    for await (const img of new PdfRasterEngine().rasterize(blankPdf([72]), { dpi: 144 })) images.push(img);
    expect(images.map(pngWidth)).toEqual([144]);
  });

  it("reports a corrupt body behind a PDF header as a decode error", async () => {
    const pages = new PdfRasterEngine().rasterize(enc("%PDF-1.4\ngarbage"), { dpi: 72 });
    const it = pages[Symbol.asyncIterator]();
    await expect(it.next()).rejects.toBeInstanceOf(DecodeError);
  });

  it("rejects non-PDF bytes before rendering", async () => {
    const pages = new PdfRasterEngine().rasterize(enc("hello"), { dpi: 300 });
    const it = pages[Symbol.asyncIterator]();
    await expect(it.next()).rejects.toBeInstanceOf(DecodeError);
  });
});

describe("normalizeRecognizedText", () => {
  it("keeps one line per detected row", () => {
    expect(normalizeRecognizedText("HELLO WORLD  \r\n\r\n  second line\n\n")).toBe("HELLO WORLD\n  second line");
  });
});

describe("bundled language data", () => {
  it("points at the installed traineddata package", () => {
    const dir = bundledLangPath("eng");
    expect(dir).toBeDefined();
    expect(dir?.endsWith(path.join("@tesseract.js-data", "eng", "4.0.0_best_int"))).toBe(true);
    expect(fs.existsSync(path.join(dir ?? "", "eng.traineddata.gz"))).toBe(true);
  });

  it("has no directory for languages that are not installed", () => {
    expect(bundledLangPath("zzz")).toBeUndefined();
    // eng and ind live in separate packages
    expect(bundledLangPath("eng+ind")).toBeUndefined();
  });

  it("refuses to start without local language data", async () => {
    const err = await TesseractTextEngine.create("zzz").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(EngineError);
    expect(err).toMatchObject({
      message: "No language data for zzz: install @tesseract.js-data/<code> or set OCR_LANG_PATH to a traineddata directory",
    });
  });
});
