/**
 * Supabase-backed configuration store
 *
 * Tables (see supabase/migrations/001_knowledge_bases.sql):
 * - knowledge_bases
 * - knowledge_base_sources (on delete cascade from knowledge_bases)
 */

import type { SupabaseClient } from "@supabase/supabase-js";
import type { KnowledgeBase, Source } from "@/lib/rag/types";
import { getPoolingConfig } from "@/lib/supabase/config";
import { getServiceSupabase } from "@/lib/supabase/server";
import { withSupabaseRetry, type RetryConfig } from "@/lib/supabase/retry";
import type { KnowledgeBaseInsert, KnowledgeBaseRow, SourceInsert, SourceRow } from "@/lib/supabase/types";
import type { KnowledgeBaseStore } from "./types";

export function rowToSource(row: SourceRow): Source {
  return {
    id: row.id,
    kind: row.kind,
    name: row.name,
    value: row.value,
    enabled: row.enabled,
    metadata: row.metadata ?? {},
  };
}

export function rowToKnowledgeBase(row: KnowledgeBaseRow, sources: SourceRow[]): KnowledgeBase {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    port: row.port,
    systemPrompt: row.system_prompt,
    sources: sources.map(rowToSource),
  };
}

export class SupabaseKnowledgeBaseStore implements KnowledgeBaseStore {
  private readonly client: SupabaseClient;
  private readonly retry: RetryConfig;

  constructor(client: SupabaseClient = getServiceSupabase(), retry: RetryConfig = {}) {
    this.client = client;
    this.retry = { maxRetries: getPoolingConfig().maxRetries, ...retry };
  }

  async list(): Promise<KnowledgeBase[]> {
    const knowledgeBases: KnowledgeBaseRow[] | null = await withSupabaseRetry(() =>
      this.client.from("knowledge_bases").select("*").order("created_at", { ascending: true }),
      this.retry
    );
    const sources: SourceRow[] | null = await withSupabaseRetry(() =>
      this.client.from("knowledge_base_sources").select("*").order("created_at", { ascending: true }),
      this.retry
    );

    const byParent = new Map<string, SourceRow[]>();
    for (const source of sources ?? []) {
      const siblings = byParent.get(source.knowledge_base_id) ?? [];
      siblings.push(source);
      byParent.set(source.knowledge_base_id, siblings);
    }

    return (knowledgeBases ?? []).map((row) => rowToKnowledgeBase(row, byParent.get(row.id) ?? []));
  }

  async save(knowledgeBase: KnowledgeBase): Promise<void> {
    const row: KnowledgeBaseInsert = {
      id: knowledgeBase.id,
      name: knowledgeBase.name,
      description: knowledgeBase.description,
      port: knowledgeBase.port,
      system_prompt: knowledgeBase.systemPrompt,
    };
    await withSupabaseRetry(() => this.client.from("knowledge_bases").upsert(row), this.retry);
  }

  async delete(id: string): Promise<void> {
    await withSupabaseRetry(() => this.client.from("knowledge_bases").delete().eq("id", id), this.retry);
  }

  async saveSource(knowledgeBaseId: string, source: Source): Promise<void> {
    const row: SourceInsert = {
      id: source.id,
      knowledge_base_id: knowledgeBaseId,
      kind: source.kind,
      name: source.name,
      value: source.value,
      enabled: source.enabled,
      metadata: source.metadata,
    };
    await withSupabaseRetry(() => this.client.from("knowledge_base_sources").upsert(row), this.retry);
  }

  async deleteSource(knowledgeBaseId: string, sourceId: string): Promise<void> {
    await withSupabaseRetry(() =>
      this.client
        .from("knowledge_base_sources")
        .delete()
        .eq("knowledge_base_id", knowledgeBaseId)
        .eq("id", sourceId),
      this.retry
    );
  }
}
