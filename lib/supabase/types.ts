/**
 * Database types for Supabase tables.
 *
 * Tables:
 * - knowledge_bases: id, name, description, port, system_prompt, created_at
 * - knowledge_base_sources: id, knowledge_base_id, kind, name, value, enabled, metadata (jsonb), created_at
 */

import type { SourceKind } from "@/lib/rag/types";

/** Row type for knowledge_bases table */
export interface KnowledgeBaseRow {
  id: string;
  name: string;
  description: string;
  port: number;
  system_prompt: string;
  created_at: string;
}

/** Row type for knowledge_base_sources table */
export interface SourceRow {
  id: string;
  knowledge_base_id: string;
  kind: SourceKind;
  name: string;
  value: string;
  enabled: boolean;
  metadata: Record<string, string> | null;
  created_at: string;
}

/** Insert types */
export interface KnowledgeBaseInsert {
  id: string;
  name: string;
  description: string;
  port: number;
  system_prompt: string;
}

export interface SourceInsert {
  id: string;
  knowledge_base_id: string;
  kind: SourceKind;
  name: string;
  value: string;
  enabled: boolean;
  metadata?: Record<string, string> | null;
}
