import { isSupabaseConfigured } from "@/lib/supabase/server";
import { InMemoryKnowledgeBaseStore } from "./memory";
import { SupabaseKnowledgeBaseStore } from "./supabase";
import type { KnowledgeBaseStore } from "./types";

export type { KnowledgeBaseStore } from "./types";
export { InMemoryKnowledgeBaseStore } from "./memory";
export { SupabaseKnowledgeBaseStore } from "./supabase";

/**
 * Supabase when SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are set,
 * otherwise an in-memory store that forgets everything on exit.
 */
export function createKnowledgeBaseStore(): KnowledgeBaseStore {
  if (isSupabaseConfigured()) {
    return new SupabaseKnowledgeBaseStore();
  }
  console.warn("[store] Supabase not configured, knowledge bases are kept in memory only");
  return new InMemoryKnowledgeBaseStore();
}
