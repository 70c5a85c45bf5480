/**
 * Source Provider Types
 */

import type { Source, SourceKind } from "@/lib/rag/types";

/**
 * Turns a source descriptor into plain text. Throws SourceUnavailableError
 * when the underlying file or URL cannot be read.
 */
export interface SourceProvider {
  readonly kind: SourceKind;
  getContent(source: Source, signal?: AbortSignal): Promise<string>;
}

/**
 * Optional text recognition for scanned PDFs. Runs on the host, outside
 * the portable core.
 */
export interface OcrProvider {
  recognize(filePath: string, signal?: AbortSignal): Promise<string>;
}
