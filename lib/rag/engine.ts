/**
 * RAG Engine
 *
 * One per knowledge base. Holds ingested documents in memory and answers
 * context queries against them. Nothing here is persisted; a restart
 * re-ingests from the source list.
 */

import { logErrorObject } from "@/lib/error-logger";
import { getErrorMessage } from "@/lib/errors";
import type { SourceProviderRegistry } from "@/lib/sources/registry";
import type { ChunkOptions } from "./chunker";
import { ingestSource } from "./ingest";
import {
  DEFAULT_MAX_CHUNKS,
  formatSearchResult,
  searchDocuments,
  totalCharacters,
  type SearchOptions,
} from "./search";
import type { Document, Source } from "./types";

export interface RagEngineOptions {
  registry: SourceProviderRegistry;
  chunkOptions?: ChunkOptions;
  search?: Omit<SearchOptions, "maxChunks">;
  /** Tag used in log lines, typically the knowledge base id */
  label?: string;
}

export interface IngestFailure {
  source: Source;
  error: unknown;
}

export interface IngestReport {
  ingested: Document[];
  failed: IngestFailure[];
}

export class RagEngine {
  private docs: Document[] = [];
  private readonly registry: SourceProviderRegistry;
  private readonly chunkOptions: ChunkOptions;
  private readonly searchOptions: Omit<SearchOptions, "maxChunks">;
  private readonly label: string;

  constructor(options: RagEngineOptions) {
    this.registry = options.registry;
    this.chunkOptions = options.chunkOptions ?? {};
    this.searchOptions = options.search ?? {};
    this.label = options.label ?? "rag";
  }

  get documents(): readonly Document[] {
    return [...this.docs];
  }

  get totalCharacters(): number {
    return totalCharacters(this.docs);
  }

  /**
   * Ingest a source and append its document. Re-adding the same source
   * yields a second document.
   */
  async addSource(source: Source, signal?: AbortSignal): Promise<Document> {
    try {
      const document = await ingestSource(source, this.registry, { ...this.chunkOptions, signal });
      this.docs = [...this.docs, document];
      console.log(
        `[rag:${this.label}] Loaded "${document.name}" (${document.content.length} chars, ${document.chunks.length} chunks)`
      );
      return document;
    } catch (error) {
      console.error(`[rag:${this.label}] Failed to ingest "${source.name}": ${getErrorMessage(error)}`);
      void logErrorObject(error, {
        error_type: "ingestion_error",
        source_id: source.id,
        metadata: { engine: this.label, kind: source.kind },
      });
      throw error;
    }
  }

  /**
   * Ingest every enabled source, continuing past individual failures
   */
  async ingestSources(sources: readonly Source[], signal?: AbortSignal): Promise<IngestReport> {
    const report: IngestReport = { ingested: [], failed: [] };

    for (const source of sources) {
      if (!source.enabled) continue;
      try {
        report.ingested.push(await this.addSource(source, signal));
      } catch (error) {
        report.failed.push({ source, error });
      }
    }

    return report;
  }

  /**
   * Remove every document built from the given source id
   */
  removeSource(sourceId: string): boolean {
    const before = this.docs.length;
    this.docs = this.docs.filter((doc) => doc.id !== sourceId);
    return this.docs.length !== before;
  }

  /** Same as removeSource: documents carry their source's id */
  removeDocument(documentId: string): boolean {
    return this.removeSource(documentId);
  }

  clear(): void {
    this.docs = [];
  }

  getContext(query: string, maxChunks: number = DEFAULT_MAX_CHUNKS): string {
    const result = searchDocuments(this.docs, query, { ...this.searchOptions, maxChunks });
    return formatSearchResult(result);
  }
}
