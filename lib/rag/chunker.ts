/**
 * Text Chunker
 *
 * Splits documents into paragraph-aligned chunks for keyword retrieval.
 */

import type { Chunk } from "./types";

export interface ChunkOptions {
  /** Flush threshold in characters (default: 1500) */
  chunkSize?: number;
}

export const DEFAULT_CHUNK_SIZE = 1500;

const PARAGRAPH_SEPARATOR = /\r\n\r\n|\n\n|\r\n|\n/;

/**
 * Split text into chunks on paragraph boundaries.
 *
 * Paragraphs are trimmed and accumulated (each followed by "\n") until the
 * next one would push the buffer past `chunkSize`; a paragraph longer than
 * the threshold becomes its own chunk. No overlap is applied.
 *
 * Offsets advance by buffer length, so after the first flush they track the
 * rebuilt buffer rather than positions in the original text. Display only.
 */
export function chunkText(text: string, options: ChunkOptions = {}): Chunk[] {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;

  if (!text || text.trim().length === 0) {
    return [];
  }

  const chunks: Chunk[] = [];
  let buffer = "";
  let cursor = 0;

  const flush = () => {
    const content = buffer.trim();
    chunks.push({
      index: chunks.length,
      content,
      tokenCount: estimateTokens(content),
      startChar: cursor,
      endChar: cursor + buffer.length,
    });
    cursor += buffer.length;
    buffer = "";
  };

  for (const piece of text.split(PARAGRAPH_SEPARATOR)) {
    const paragraph = piece.trim();
    if (paragraph.length === 0) continue;

    if (buffer.length + paragraph.length > chunkSize && buffer.length > 0) {
      flush();
    }

    buffer += paragraph + "\n";
  }

  if (buffer.trim().length > 0) {
    flush();
  }

  return chunks;
}

/**
 * Estimate token count (rough approximation: ~4 chars per token for English)
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}
