import { createClient } from "@supabase/supabase-js";
import { describe, it, expect } from "vitest";
import type { KnowledgeBaseRow, SourceRow } from "@/lib/supabase/types";
import { SupabaseKnowledgeBaseStore, rowToKnowledgeBase, rowToSource } from "./supabase";

const kbRow: KnowledgeBaseRow = {
  id: "kb-1",
  name: "Docs",
  description: "",
  port: 5001,
  system_prompt: "Be helpful.",
  created_at: "2026-01-01T00:00:00Z",
};

const sourceRow: SourceRow = {
  id: "src-1",
  knowledge_base_id: "kb-1",
  kind: "web",
  name: "Home",
  value: "https://docs.test",
  enabled: true,
  metadata: null,
  created_at: "2026-01-01T00:00:01Z",
};

interface RecordedRequest {
  method: string;
  path: string;
  search: string;
  body: unknown;
}

/** PostgREST stand-in: answers GETs from fixed tables and records writes */
function createFakeClient(tables: Record<string, unknown[]>) {
  const requests: RecordedRequest[] = [];
  const fakeFetch: typeof fetch = async (input, init) => {
    const url = new URL(input instanceof Request ? input.url : input.toString());
    const method = init?.method ?? "GET";
    requests.push({
      method,
      path: url.pathname,
      search: url.search,
      body: typeof init?.body === "string" ? JSON.parse(init.body) : undefined,
    });

    if (method === "GET") {
      const table = url.pathname.replace("/rest/v1/", "");
      return Response.json(tables[table] ?? []);
    }
    return new Response(null, { status: 204 });
  };

  const client = createClient("http://supabase.test", "test-key", {
    auth: { persistSession: false, autoRefreshToken: false },
    global: { fetch: fakeFetch },
  });
  return { client, requests };
}

describe("row mapping", () => {
  it("maps rows onto domain objects", () => {
    expect(rowToSource(sourceRow)).toEqual({
      id: "src-1",
      kind: "web",
      name: "Home",
      value: "https://docs.test",
      enabled: true,
      metadata: {},
    });
    expect(rowToKnowledgeBase(kbRow, [sourceRow])).toMatchObject({
      id: "kb-1",
      systemPrompt: "Be helpful.",
      sources: [{ id: "src-1" }],
    });
  });
});

describe("SupabaseKnowledgeBaseStore", () => {
  it("lists knowledge bases with their sources", async () => {
    const other: KnowledgeBaseRow = { ...kbRow, id: "kb-2", name: "Empty" };
    const { client, requests } = createFakeClient({
      knowledge_bases: [kbRow, other],
      knowledge_base_sources: [sourceRow],
    });

    const list = await new SupabaseKnowledgeBaseStore(client).list();

    expect(list.map((kb) => [kb.id, kb.sources.length])).toEqual([
      ["kb-1", 1],
      ["kb-2", 0],
    ]);
    expect(requests.map((r) => r.path)).toEqual(["/rest/v1/knowledge_bases", "/rest/v1/knowledge_base_sources"]);
    expect(requests[0].search).toContain("order=created_at.asc");
  });

  it("upserts records with snake_case columns", async () => {
    const { client, requests } = createFakeClient({});
    const store = new SupabaseKnowledgeBaseStore(client);

    await store.save({ id: "kb-1", name: "Docs", description: "", port: 5002, systemPrompt: "Hi", sources: [] });
    await store.saveSource("kb-1", {
      id: "src-1",
      kind: "text",
      name: "Note",
      value: "hello",
      enabled: false,
      metadata: {},
    });

    expect(requests[0]).toMatchObject({
      method: "POST",
      path: "/rest/v1/knowledge_bases",
      body: { id: "kb-1", name: "Docs", description: "", port: 5002, system_prompt: "Hi" },
    });
    expect(requests[1]).toMatchObject({
      method: "POST",
      path: "/rest/v1/knowledge_base_sources",
      body: { id: "src-1", knowledge_base_id: "kb-1", kind: "text", enabled: false },
    });
  });

  it("deletes by id", async () => {
    const { client, requests } = createFakeClient({});
    const store = new SupabaseKnowledgeBaseStore(client);

    await store.delete("kb-1");
    await store.deleteSource("kb-1", "src-1");

    expect(requests.map((r) => [r.method, r.path, r.search])).toEqual([
      ["DELETE", "/rest/v1/knowledge_bases", "?id=eq.kb-1"],
      ["DELETE", "/rest/v1/knowledge_base_sources", "?knowledge_base_id=eq.kb-1&id=eq.src-1"],
    ]);
  });
});
