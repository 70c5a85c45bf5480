/**
 * Keyword Search
 *
 * Ranks chunks by how many query tokens they share. Small corpora skip
 * ranking entirely and are returned whole.
 */

import type { Chunk, Document } from "./types";
import { DEFAULT_EXPANSION_RULES, expandKeywords, type KeywordExpansionRule } from "./keywords";

/** Corpora at or below this many characters are returned in full */
export const SMALL_CORPUS_THRESHOLD = 8000;

export const DEFAULT_MAX_CHUNKS = 5;

/** Chunks per document, and documents, used when nothing matches */
const FALLBACK_CHUNKS_PER_DOCUMENT = 3;
const FALLBACK_DOCUMENTS = 2;

const TOKEN_SEPARATOR = /[\s.,?!]+/;

const DATE_TOKENS = new Set([
  "q1", "q2", "q3", "q4",
  "jan", "feb", "mar", "apr", "may", "jun", "jul", "aug", "sep", "oct", "nov", "dec",
  "2024", "2025", "2026",
]);

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)$/;

export interface SearchOptions {
  /** Maximum chunks returned by ranked retrieval (default: 5) */
  maxChunks?: number;
  /** Full-context cutoff in characters (default: 8000) */
  smallCorpusThreshold?: number;
  /** Replaces the default keyword expansion rules */
  expansionRules?: readonly KeywordExpansionRule[];
}

export interface ScoredChunk {
  document: Document;
  chunk: Chunk;
  score: number;
}

export type SearchResult =
  | { kind: "empty" }
  | { kind: "full"; documents: Document[] }
  | { kind: "ranked"; chunks: ScoredChunk[] }
  | { kind: "fallback"; chunks: Array<{ document: Document; chunk: Chunk }> };

/**
 * Lower-case and split on whitespace and `. , ? !`
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(TOKEN_SEPARATOR)
    .filter((token) => token.length > 0);
}

/**
 * Numbers (commas ignored) and quarter, month or year abbreviations
 */
export function isNumberOrDate(token: string): boolean {
  if (NUMERIC.test(token.replace(/,/g, ""))) {
    return true;
  }
  return DATE_TOKENS.has(token.toLowerCase());
}

/**
 * Query tokens longer than two characters, plus short numeric/date tokens,
 * plus whatever the expansion rules add.
 */
export function extractQueryTokens(
  query: string,
  rules: readonly KeywordExpansionRule[] = DEFAULT_EXPANSION_RULES
): Set<string> {
  const tokens = new Set(
    tokenize(query).filter((token) => token.length > 2 || isNumberOrDate(token))
  );
  return expandKeywords(tokens, query, rules);
}

/**
 * Score every chunk by the size of its token-set intersection with the query.
 * Only chunks scoring above zero are returned, highest first; ties keep
 * document and chunk order.
 */
export function scoreChunks(documents: readonly Document[], queryTokens: ReadonlySet<string>): ScoredChunk[] {
  const scored: ScoredChunk[] = [];

  for (const document of documents) {
    for (const chunk of document.chunks) {
      const chunkTokens = new Set(tokenize(chunk.content));
      let score = 0;
      for (const token of queryTokens) {
        if (chunkTokens.has(token)) score++;
      }
      if (score > 0) {
        scored.push({ document, chunk, score });
      }
    }
  }

  return scored.sort((a, b) => b.score - a.score);
}

export function totalCharacters(documents: readonly Document[]): number {
  return documents.reduce((sum, document) => sum + document.content.length, 0);
}

/**
 * Retrieve context for a query across a set of documents.
 */
export function searchDocuments(
  documents: readonly Document[],
  query: string,
  options: SearchOptions = {}
): SearchResult {
  if (documents.length === 0) {
    return { kind: "empty" };
  }

  const threshold = options.smallCorpusThreshold ?? SMALL_CORPUS_THRESHOLD;
  if (totalCharacters(documents) <= threshold) {
    return { kind: "full", documents: [...documents] };
  }

  const maxChunks = options.maxChunks ?? DEFAULT_MAX_CHUNKS;
  const queryTokens = extractQueryTokens(query, options.expansionRules);
  const ranked = scoreChunks(documents, queryTokens).slice(0, maxChunks);

  if (ranked.length > 0) {
    return { kind: "ranked", chunks: ranked };
  }

  // Nothing matched: hand the model the opening of the first documents
  const chunks = documents.slice(0, FALLBACK_DOCUMENTS).flatMap((document) =>
    document.chunks
      .slice(0, FALLBACK_CHUNKS_PER_DOCUMENT)
      .map((chunk) => ({ document, chunk }))
  );

  return { kind: "fallback", chunks };
}

/**
 * Render a search result as the context block placed in the prompt.
 * An empty result renders as an empty string.
 */
export function formatSearchResult(result: SearchResult): string {
  switch (result.kind) {
    case "empty":
      return "";

    case "full": {
      let out = "--- FULL CONTEXT ---\n";
      for (const document of result.documents) {
        out += `[Source: ${document.name}]:\n${document.content}\n\n`;
      }
      return out + "--- END CONTEXT ---\n";
    }

    case "ranked": {
      let out = "--- CONTEXT ---\n";
      for (const { document, chunk } of result.chunks) {
        out += `[Source: ${document.name}]:\n${chunk.content}\n\n`;
      }
      return out + "--- END CONTEXT ---\n";
    }

    case "fallback": {
      let out = "--- CONTEXT ---\n";
      for (const { document, chunk } of result.chunks) {
        out += `[From ${document.name} - Part ${chunk.index + 1}]:\n${chunk.content}\n\n`;
      }
      return out + "--- END CONTEXT ---\n";
    }
  }
}
