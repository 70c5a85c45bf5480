/**
 * RAG Module
 */

export type { Chunk, Document, DocumentType, KnowledgeBase, KnowledgeBaseState, Source, SourceKind } from "./types";

export { chunkText, estimateTokens, DEFAULT_CHUNK_SIZE, type ChunkOptions } from "./chunker";

export { expandKeywords, DEFAULT_EXPANSION_RULES, type KeywordExpansionRule } from "./keywords";

export {
  tokenize,
  isNumberOrDate,
  extractQueryTokens,
  scoreChunks,
  searchDocuments,
  formatSearchResult,
  SMALL_CORPUS_THRESHOLD,
  DEFAULT_MAX_CHUNKS,
  type ScoredChunk,
  type SearchOptions,
  type SearchResult,
} from "./search";

export {
  assembleContext,
  buildPromptMessages,
  MAX_SESSION_DOCUMENT_CHARS,
  DEFAULT_SYSTEM_PROMPT,
  type AssembleContextInput,
} from "./context";

export { detectDocumentType, ingestSource } from "./ingest";

export { RagEngine, type IngestFailure, type IngestReport, type RagEngineOptions } from "./engine";
