/**
 * Document Ingestion
 *
 * Resolves a source through its provider, chunks the text and builds the
 * in-memory Document.
 */

import path from "path";
import { SourceTypeUnsupportedError } from "@/lib/errors";
import type { SourceProviderRegistry } from "@/lib/sources/registry";
import { chunkText, type ChunkOptions } from "./chunker";
import type { Document, DocumentType, Source } from "./types";

const TEXT_EXTENSIONS = new Set([".txt", ".md", ".csv", ".json", ".xml", ".html"]);

export function detectDocumentType(source: Source): DocumentType {
  switch (source.kind) {
    case "web":
      return "web";
    case "text":
      return "text";
    case "file":
      break;
    default:
      return "unknown";
  }

  const extension = path.extname(source.value).toLowerCase();
  if (extension === ".pdf") return "pdf";
  if (extension === ".docx" || extension === ".doc") return "word";
  if (TEXT_EXTENSIONS.has(extension)) return "text";
  return "unknown";
}

function describeOrigin(source: Source): string {
  return source.kind === "text" ? "text" : source.value;
}

/**
 * Ingest one source into a Document. Throws SourceTypeUnsupportedError when
 * no provider handles the kind; provider errors propagate unchanged.
 */
export async function ingestSource(
  source: Source,
  registry: SourceProviderRegistry,
  options: ChunkOptions & { signal?: AbortSignal } = {}
): Promise<Document> {
  const provider = registry.get(source.kind);
  if (!provider) {
    throw new SourceTypeUnsupportedError(source.kind);
  }

  const content = await provider.getContent(source, options.signal);

  return {
    id: source.id,
    name: source.name,
    origin: describeOrigin(source),
    type: detectDocumentType(source),
    content,
    chunks: chunkText(content, { chunkSize: options.chunkSize }),
    loadedAt: new Date(),
  };
}
