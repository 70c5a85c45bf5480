/**
 * RAG Types
 *
 * Shared shapes for sources, ingested documents and their chunks.
 */

export type SourceKind = "file" | "web" | "text" | "database" | "github" | "other";

export type DocumentType = "text" | "word" | "pdf" | "web" | "unknown";

/**
 * Where a document's content comes from. Sources are configuration;
 * documents are what ingesting them produces.
 */
export interface Source {
  id: string;
  kind: SourceKind;
  /** Display name */
  name: string;
  /** Path, URL or literal text depending on kind */
  value: string;
  enabled: boolean;
  metadata: Record<string, string>;
}

export interface Chunk {
  /** 0-based index of the chunk in the document */
  index: number;
  content: string;
  /** Approximate token count (chars / 4, rounded up) */
  tokenCount: number;
  /** Start character position (buffer-length bookkeeping, see chunker) */
  startChar: number;
  endChar: number;
}

export interface Document {
  /** Id of the source the document was built from */
  id: string;
  name: string;
  /** Path or URL, or "text" for literal sources */
  origin: string;
  type: DocumentType;
  content: string;
  chunks: Chunk[];
  loadedAt: Date;
}

export interface KnowledgeBase {
  id: string;
  name: string;
  description: string;
  port: number;
  systemPrompt: string;
  sources: Source[];
}

export type KnowledgeBaseState = "stopped" | "starting" | "running" | "stopping";
