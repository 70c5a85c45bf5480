import type { KnowledgeBase, Source } from "@/lib/rag/types";
import type { KnowledgeBaseStore } from "./types";

function cloneSource(source: Source): Source {
  return { ...source, metadata: { ...source.metadata } };
}

function cloneKnowledgeBase(knowledgeBase: KnowledgeBase): KnowledgeBase {
  return { ...knowledgeBase, sources: knowledgeBase.sources.map(cloneSource) };
}

/**
 * Process-local store. Used by tests and when no Supabase project is set up.
 */
export class InMemoryKnowledgeBaseStore implements KnowledgeBaseStore {
  private readonly records = new Map<string, KnowledgeBase>();

  constructor(initial: KnowledgeBase[] = []) {
    for (const knowledgeBase of initial) {
      this.records.set(knowledgeBase.id, cloneKnowledgeBase(knowledgeBase));
    }
  }

  async list(): Promise<KnowledgeBase[]> {
    return Array.from(this.records.values(), cloneKnowledgeBase);
  }

  async save(knowledgeBase: KnowledgeBase): Promise<void> {
    const existing = this.records.get(knowledgeBase.id);
    this.records.set(knowledgeBase.id, {
      ...cloneKnowledgeBase(knowledgeBase),
      sources: existing ? existing.sources : knowledgeBase.sources.map(cloneSource),
    });
  }

  async delete(id: string): Promise<void> {
    this.records.delete(id);
  }

  async saveSource(knowledgeBaseId: string, source: Source): Promise<void> {
    const record = this.records.get(knowledgeBaseId);
    if (!record) {
      throw new Error(`Cannot save source for unknown knowledge base ${knowledgeBaseId}`);
    }
    const index = record.sources.findIndex((existing) => existing.id === source.id);
    if (index === -1) {
      record.sources.push(cloneSource(source));
    } else {
      record.sources[index] = cloneSource(source);
    }
  }

  async deleteSource(knowledgeBaseId: string, sourceId: string): Promise<void> {
    const record = this.records.get(knowledgeBaseId);
    if (!record) return;
    record.sources = record.sources.filter((source) => source.id !== sourceId);
  }
}
