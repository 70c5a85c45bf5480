import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { RaasConfig } from "@/lib/config";
import type { PromptMessage } from "@/lib/chat/types";
import {
  KnowledgeBaseNotFoundError,
  ListenerBindError,
  MalformedRequestError,
  SourceUnavailableError,
} from "@/lib/errors";
import type { InferenceEngine } from "@/lib/inference/types";
import { SourceProviderRegistry } from "@/lib/sources/registry";
import { TextSourceProvider } from "@/lib/sources/text";
import { FileSourceProvider } from "@/lib/sources/file";
import { InMemoryKnowledgeBaseStore } from "@/lib/store/memory";
import { KnowledgeBaseManager } from "./manager";

class EchoInference implements InferenceEngine {
  readonly model = "echo";

  isReady(): boolean {
    return true;
  }

  async *stream(messages: readonly PromptMessage[]): AsyncIterable<string> {
    yield `echo: ${messages[messages.length - 1]?.content ?? ""}`;
  }
}

describe("KnowledgeBaseManager", () => {
  let dir: string;
  let store: InMemoryKnowledgeBaseStore;
  let manager: KnowledgeBaseManager;
  let config: RaasConfig;

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "ragport-raas-"));
    config = {
      host: "127.0.0.1",
      storageDir: path.join(dir, "raas"),
      modelName: "test-model",
      stopGraceMs: 100,
    };
    let next = 0;
    store = new InMemoryKnowledgeBaseStore();
    manager = new KnowledgeBaseManager({
      store,
      inference: new EchoInference(),
      registry: new SourceProviderRegistry([new TextSourceProvider(), new FileSourceProvider()]),
      config,
      generateId: () => `id-${++next}`,
    });
    await manager.initialize();
  });

  afterEach(async () => {
    await manager.stopAll();
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe("configuration", () => {
    it("creates knowledge bases with defaults and a managed directory", async () => {
      const kb = await manager.create();

      expect(kb).toEqual({
        id: "id-1",
        name: "New RAG Service",
        description: "",
        port: 5001,
        systemPrompt: "You are a helpful AI assistant.",
        sources: [],
      });
      expect(manager.getState("id-1")).toBe("stopped");
      await expect(store.list()).resolves.toEqual([kb]);
      await expect(fs.stat(manager.storagePath("id-1"))).resolves.toBeTruthy();
    });

    it("rejects invalid ports", async () => {
      await expect(manager.create({ port: 70000 })).rejects.toThrow(MalformedRequestError);
      await expect(manager.create({ port: 1.5 })).rejects.toThrow("Invalid port: 1.5");
    });

    it("loads saved knowledge bases on initialize", async () => {
      const saved = new InMemoryKnowledgeBaseStore([
        { id: "kb-a", name: "Saved", description: "", port: 0, systemPrompt: "p", sources: [] },
      ]);
      const other = new KnowledgeBaseManager({
        store: saved,
        inference: new EchoInference(),
        registry: new SourceProviderRegistry(),
        config,
      });

      await other.initialize();

      expect(other.list().map((kb) => kb.name)).toEqual(["Saved"]);
      expect(other.getState("kb-a")).toBe("stopped");
    });

    it("updates fields it is given and keeps the rest", async () => {
      await manager.create({ name: "Docs" });
      const updated = await manager.update("id-1", { systemPrompt: "Be terse." });

      expect(updated).toMatchObject({ name: "Docs", systemPrompt: "Be terse.", port: 5001 });
      expect(manager.get("id-1")?.systemPrompt).toBe("Be terse.");
    });

    it("throws for unknown ids", async () => {
      expect(manager.get("nope")).toBeUndefined();
      await expect(manager.start("nope")).rejects.toBeInstanceOf(KnowledgeBaseNotFoundError);
      await expect(manager.addTextSource("nope", "n", "t")).rejects.toThrow("Knowledge base not found: nope");
    });
  });

  describe("sources", () => {
    it("copies files into the managed directory and deletes the copy on removal", async () => {
      await manager.create();
      const original = path.join(dir, "notes.txt");
      await fs.writeFile(original, "Managed copy", "utf-8");

      const source = await manager.addFileSource("id-1", original);

      const copy = path.join(config.storageDir, "id-1", "id-2.txt");
      expect(source).toEqual({
        id: "id-2",
        kind: "file",
        name: "notes.txt",
        value: copy,
        enabled: true,
        metadata: { originalPath: original },
      });
      await expect(fs.readFile(copy, "utf-8")).resolves.toBe("Managed copy");

      await expect(manager.removeSource("id-1", "id-2")).resolves.toBe(true);
      await expect(fs.access(copy)).rejects.toThrow();
      await expect(fs.readFile(original, "utf-8")).resolves.toBe("Managed copy");
      expect(manager.get("id-1")?.sources).toEqual([]);
      await expect(store.list()).resolves.toMatchObject([{ sources: [] }]);
      await expect(manager.removeSource("id-1", "id-2")).resolves.toBe(false);
    });

    it("refuses missing files", async () => {
      await manager.create();
      await expect(manager.addFileSource("id-1", path.join(dir, "missing.pdf"))).rejects.toBeInstanceOf(
        SourceUnavailableError
      );
    });

    it("accepts only http and https URLs", async () => {
      await manager.create();

      await expect(manager.addWebSource("id-1", "not a url")).rejects.toThrow("Invalid URL: not a url");
      await expect(manager.addWebSource("id-1", "ftp://files.test/a")).rejects.toThrow(
        "Unsupported URL protocol: ftp:"
      );
      await expect(manager.addWebSource("id-1", "https://docs.test/page")).resolves.toMatchObject({
        kind: "web",
        name: "https://docs.test/page",
      });
    });

    it("persists the enabled flag", async () => {
      await manager.create();
      await manager.addTextSource("id-1", "Note", "text");

      await expect(manager.setSourceEnabled("id-1", "id-2", false)).resolves.toMatchObject({ enabled: false });
      await expect(manager.setSourceEnabled("id-1", "nope", false)).resolves.toBeUndefined();
      const [saved] = await store.list();
      expect(saved.sources[0].enabled).toBe(false);
    });
  });

  describe("lifecycle", () => {
    it("starts once and returns the same server on repeat calls", async () => {
      await manager.create({ name: "Docs", port: 0 });
      await manager.addTextSource("id-1", "Sky", "The sky is blue.");

      const [first, second] = await Promise.all([manager.start("id-1"), manager.start("id-1")]);
      const third = await manager.start("id-1");

      expect(second).toBe(first);
      expect(third).toBe(first);
      expect(manager.isRunning("id-1")).toBe(true);
      expect(manager.getServer("id-1")).toBe(first);
      expect(first.port).toBeGreaterThan(0);
      expect(first.engine.documents.map((d) => d.name)).toEqual(["Sky"]);

      const health = await fetch(`http://127.0.0.1:${first.port}/health`);
      await expect(health.json()).resolves.toEqual({ status: "ok", service: "Docs" });
      expect(manager.getRequestCount("id-1")).toBe(1);
    });

    it("answers chat requests over HTTP", async () => {
      await manager.create({ port: 0 });
      const server = await manager.start("id-1");

      const response = await fetch(`http://127.0.0.1:${server.port}/chat`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ messages: [{ role: "user", content: "ping" }] }),
      });

      await expect(response.json()).resolves.toEqual({
        model: "test-model",
        content: "echo: ping",
        token_count: 2,
      });
    });

    it("reads edits to the knowledge base live while running", async () => {
      await manager.create({ name: "Before", port: 0 });
      const server = await manager.start("id-1");

      await manager.update("id-1", { name: "After" });

      const health = await fetch(`http://127.0.0.1:${server.port}/health`);
      await expect(health.json()).resolves.toEqual({ status: "ok", service: "After" });
    });

    it("skips disabled sources and loads the rest on start", async () => {
      vi.spyOn(console, "error").mockImplementation(() => {});
      vi.spyOn(console, "warn").mockImplementation(() => {});
      await manager.create({ port: 0 });
      await manager.addTextSource("id-1", "On", "enabled text");
      await manager.addTextSource("id-1", "Off", "disabled text");
      await manager.setSourceEnabled("id-1", "id-3", false);
      await manager.addWebSource("id-1", "https://docs.test/page");

      const server = await manager.start("id-1");

      // No web provider registered: that source fails, the others still load
      expect(server.engine.documents.map((d) => d.name)).toEqual(["On"]);
    });

    it("stays stopped when the port is taken", async () => {
      const error = vi.spyOn(console, "error").mockImplementation(() => {});
      await manager.create({ port: 0 });
      const running = await manager.start("id-1");
      await manager.create({ port: running.port });

      await expect(manager.start("id-2")).rejects.toBeInstanceOf(ListenerBindError);

      expect(manager.getState("id-2")).toBe("stopped");
      expect(manager.getServer("id-2")).toBeUndefined();
      expect(error).toHaveBeenCalled();
    });

    it("stops and can start again", async () => {
      await manager.create({ port: 0 });
      const first = await manager.start("id-1");

      await manager.stop("id-1");

      expect(manager.getState("id-1")).toBe("stopped");
      expect(manager.getServer("id-1")).toBeUndefined();
      expect(first.isRunning).toBe(false);
      await expect(fetch(`http://127.0.0.1:${first.port}/health`)).rejects.toThrow();

      const second = await manager.start("id-1");
      expect(second).not.toBe(first);
      expect(manager.isRunning("id-1")).toBe(true);
    });

    it("starts one listener when two starts wait on the same stop", async () => {
      await manager.create({ port: 0 });
      const first = await manager.start("id-1");

      const stopping = manager.stop("id-1");
      const [a, b] = await Promise.all([manager.start("id-1"), manager.start("id-1")]);
      await stopping;

      expect(b).toBe(a);
      expect(a).not.toBe(first);
      expect(manager.getServer("id-1")).toBe(a);
      expect(manager.isRunning("id-1")).toBe(true);

      await manager.stopAll();
      expect(a.isRunning).toBe(false);
    });

    it("delete stops the listener and removes the managed directory", async () => {
      await manager.create({ port: 0 });
      await manager.start("id-1");
      const storage = manager.storagePath("id-1");

      await manager.delete("id-1");

      expect(manager.list()).toEqual([]);
      expect(manager.isRunning("id-1")).toBe(false);
      await expect(fs.access(storage)).rejects.toThrow();
      await expect(store.list()).resolves.toEqual([]);
    });
  });
});
