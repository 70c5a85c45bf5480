import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterAll, beforeAll, describe, it, expect, vi } from "vitest";
import { SourceUnavailableError } from "@/lib/errors";
import { FileSourceProvider } from "./file";
import type { OcrProvider } from "./types";

/**
 * Single blank page, no content stream. xref offsets are computed so the
 * parser does not need to rebuild the table.
 */
function blankPdf(): string {
  const objects = [
    "<< /Type /Catalog /Pages 2 0 R >>",
    "<< /Type /Pages /Kids [3 0 R] /Count 1 >>",
    "<< /Type /Page /Parent 2 0 R /MediaBox [0 0 200 200] >>",
  ];

  let pdf = "%PDF-1.4\n";
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    offsets.push(pdf.length);
    pdf += `${i + 1} 0 obj\n${body}\nendobj\n`;
  });

  const xrefOffset = pdf.length;
  pdf += `xref\n0 ${objects.length + 1}\n0000000000 65535 f \n`;
  for (const offset of offsets) {
    pdf += `${String(offset).padStart(10, "0")} 00000 n \n`;
  }
  pdf += `trailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${xrefOffset}\n%%EOF\n`;
  return pdf;
}

describe("FileSourceProvider", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ragport-file-"));
    await fs.writeFile(path.join(dir, "notes.txt"), "Line one\nLine two", "utf-8");
    await fs.writeFile(path.join(dir, "broken.pdf"), "this is not a pdf", "utf-8");
    await fs.writeFile(path.join(dir, "broken.docx"), "this is not a zip", "utf-8");
    await fs.writeFile(path.join(dir, "scan.pdf"), blankPdf(), "latin1");
  });

  afterAll(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("reads text files as UTF-8", async () => {
    const provider = new FileSourceProvider();
    await expect(provider.readFile(path.join(dir, "notes.txt"))).resolves.toBe("Line one\nLine two");
  });

  it("throws SourceUnavailableError for a missing file", async () => {
    const provider = new FileSourceProvider();
    const missing = path.join(dir, "missing.txt");

    const error = await provider.readFile(missing).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SourceUnavailableError);
    expect(error).toMatchObject({ location: missing, message: `File not found: ${missing}` });
  });

  it("returns an inline error for an unreadable PDF", async () => {
    const provider = new FileSourceProvider();
    const content = await provider.readFile(path.join(dir, "broken.pdf"));
    expect(content).toMatch(/^Error reading PDF: /);
  });

  it("returns an inline error for an unreadable Word document", async () => {
    const provider = new FileSourceProvider();
    const content = await provider.readFile(path.join(dir, "broken.docx"));
    expect(content).toMatch(/^Error reading Word document: /);
  });

  it("leaves a text-less PDF empty without OCR", async () => {
    const provider = new FileSourceProvider();
    await expect(provider.readFile(path.join(dir, "scan.pdf"))).resolves.toBe("");
  });

  it("hands a text-less PDF to OCR", async () => {
    const ocr: OcrProvider = { recognize: vi.fn(async () => "Recognized invoice text") };
    const provider = new FileSourceProvider({ ocr });
    const file = path.join(dir, "scan.pdf");

    await expect(provider.readFile(file)).resolves.toBe("Recognized invoice text");
    expect(ocr.recognize).toHaveBeenCalledWith(file, undefined);
  });

  it("keeps the extracted text when OCR fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const ocr: OcrProvider = {
      recognize: async () => {
        throw new Error("ocr engine missing");
      },
    };
    const provider = new FileSourceProvider({ ocr });

    await expect(provider.readFile(path.join(dir, "scan.pdf"))).resolves.toBe("");
    expect(warn).toHaveBeenCalledTimes(1);
    warn.mockRestore();
  });

  it("reads the path stored on a file source", async () => {
    const provider = new FileSourceProvider();
    const content = await provider.getContent({
      id: "f1",
      kind: "file",
      name: "Notes",
      value: path.join(dir, "notes.txt"),
      enabled: true,
      metadata: {},
    });

    expect(content).toBe("Line one\nLine two");
  });
});
