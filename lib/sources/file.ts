/**
 * File Source Provider
 *
 * Reads local files by extension: PDF through pdfjs-dist, Word through
 * mammoth, everything else as UTF-8 text. Parser failures come back as an
 * inline "Error reading …" string so the rest of the knowledge base still
 * loads; a missing file throws.
 */

import fs from "fs/promises";
import path from "path";
import mammoth from "mammoth";
import { SourceUnavailableError, getErrorMessage } from "@/lib/errors";
import type { Source } from "@/lib/rag/types";
import type { OcrProvider, SourceProvider } from "./types";

/** Below this many characters a PDF is treated as scanned */
const MIN_PDF_TEXT_LENGTH = 50;

// Legacy build: the modern one needs newer Node.js than 20
const PDFJS_MODULE = "pdfjs-dist/legacy/build/pdf.mjs";
const PDFJS_WORKER = "pdfjs-dist/legacy/build/pdf.worker.mjs";

type PdfJs = typeof import("pdfjs-dist");

async function loadPdfJs(): Promise<PdfJs> {
  const pdfjs: PdfJs = await import(PDFJS_MODULE);
  pdfjs.GlobalWorkerOptions.workerSrc = PDFJS_WORKER;
  return pdfjs;
}

export interface FileSourceProviderOptions {
  ocr?: OcrProvider;
}

export class FileSourceProvider implements SourceProvider {
  readonly kind = "file" as const;
  private readonly ocr?: OcrProvider;

  constructor(options: FileSourceProviderOptions = {}) {
    this.ocr = options.ocr;
  }

  async getContent(source: Source, signal?: AbortSignal): Promise<string> {
    return this.readFile(source.value, signal);
  }

  async readFile(filePath: string, signal?: AbortSignal): Promise<string> {
    try {
      await fs.access(filePath);
    } catch (error) {
      throw new SourceUnavailableError(filePath, `File not found: ${filePath}`, { cause: error });
    }

    const extension = path.extname(filePath).toLowerCase();

    switch (extension) {
      case ".pdf":
        return this.readPdf(filePath, signal);
      case ".docx":
      case ".doc":
        return readWordDocument(filePath);
      default:
        return fs.readFile(filePath, { encoding: "utf-8", signal });
    }
  }

  private async readPdf(filePath: string, signal?: AbortSignal): Promise<string> {
    let text: string;
    try {
      text = await extractPdfText(filePath);
    } catch (error) {
      return `Error reading PDF: ${getErrorMessage(error)}`;
    }

    if (text.trim().length >= MIN_PDF_TEXT_LENGTH || !this.ocr) {
      return text;
    }

    try {
      const recognized = await this.ocr.recognize(filePath, signal);
      return recognized.trim().length > 0 ? recognized : text;
    } catch (error) {
      console.warn(`[sources] OCR failed for ${filePath}: ${getErrorMessage(error)}`);
      return text;
    }
  }
}

async function extractPdfText(filePath: string): Promise<string> {
  const pdfjs = await loadPdfJs();
  const data = new Uint8Array(await fs.readFile(filePath));
  const doc = await pdfjs.getDocument({ data }).promise;

  try {
    const pages: string[] = [];
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const page = await doc.getPage(pageNumber);
      const content = await page.getTextContent();
      const line = content.items
        .map((item) => ("str" in item ? item.str : ""))
        .join(" ");
      pages.push(line);
    }
    return pages.join("\n\n");
  } finally {
    await doc.destroy();
  }
}

async function readWordDocument(filePath: string): Promise<string> {
  try {
    const result = await mammoth.extractRawText({ path: filePath });
    return result.value;
  } catch (error) {
    return `Error reading Word document: ${getErrorMessage(error)}`;
  }
}
