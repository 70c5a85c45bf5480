/**
 * Configuration store: which knowledge bases exist and which sources belong
 * to them. Engines rebuild their documents from this on every start.
 */

import type { KnowledgeBase, Source } from "@/lib/rag/types";

export interface KnowledgeBaseStore {
  list(): Promise<KnowledgeBase[]>;
  /** Insert or update the knowledge base record (sources are saved separately) */
  save(knowledgeBase: KnowledgeBase): Promise<void>;
  /** Delete the knowledge base and, by cascade, its sources */
  delete(id: string): Promise<void>;
  saveSource(knowledgeBaseId: string, source: Source): Promise<void>;
  deleteSource(knowledgeBaseId: string, sourceId: string): Promise<void>;
}
