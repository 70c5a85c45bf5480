/**
 * Knowledge Base Manager
 *
 * Owns every configured knowledge base and its runtime state. Each id moves
 * stopped -> starting -> running -> stopping -> stopped; at most one
 * listener runs per id. Starting builds a fresh engine and re-ingests every
 * enabled source. Source edits apply on the next start.
 */

import { randomUUID } from "crypto";
import fs from "fs/promises";
import path from "path";
import type { RaasConfig } from "@/lib/config";
import { logErrorObject } from "@/lib/error-logger";
import {
  KnowledgeBaseNotFoundError,
  MalformedRequestError,
  SourceUnavailableError,
  getErrorMessage,
} from "@/lib/errors";
import type { InferenceEngine } from "@/lib/inference/types";
import { RagEngine } from "@/lib/rag/engine";
import type { KnowledgeBase, KnowledgeBaseState, Source } from "@/lib/rag/types";
import { KnowledgeBaseServer } from "@/lib/server/knowledge-base-server";
import type { SourceProviderRegistry } from "@/lib/sources/registry";
import type { KnowledgeBaseStore } from "@/lib/store/types";

export const KNOWLEDGE_BASE_DEFAULTS = {
  name: "New RAG Service",
  description: "",
  port: 5001,
  systemPrompt: "You are a helpful AI assistant.",
} as const;

export type KnowledgeBaseInput = Partial<Pick<KnowledgeBase, "name" | "description" | "port" | "systemPrompt">>;

export interface KnowledgeBaseManagerOptions {
  store: KnowledgeBaseStore;
  inference: InferenceEngine;
  registry: SourceProviderRegistry;
  config: RaasConfig;
  generateId?: () => string;
}

interface Runtime {
  state: KnowledgeBaseState;
  server?: KnowledgeBaseServer;
  starting?: Promise<KnowledgeBaseServer>;
  stopping?: Promise<void>;
}

function validatePort(port: number): void {
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new MalformedRequestError(`Invalid port: ${port}`);
  }
}

export class KnowledgeBaseManager {
  private readonly store: KnowledgeBaseStore;
  private readonly inference: InferenceEngine;
  private readonly registry: SourceProviderRegistry;
  private readonly config: RaasConfig;
  private readonly generateId: () => string;
  private readonly knowledgeBases = new Map<string, KnowledgeBase>();
  private readonly runtimes = new Map<string, Runtime>();

  constructor(options: KnowledgeBaseManagerOptions) {
    this.store = options.store;
    this.inference = options.inference;
    this.registry = options.registry;
    this.config = options.config;
    this.generateId = options.generateId ?? randomUUID;
  }

  /**
   * Load configurations from the store. Everything starts out stopped.
   */
  async initialize(): Promise<void> {
    await fs.mkdir(this.config.storageDir, { recursive: true });
    const stored = await this.store.list();

    this.knowledgeBases.clear();
    for (const knowledgeBase of stored) {
      this.knowledgeBases.set(knowledgeBase.id, knowledgeBase);
      if (!this.runtimes.has(knowledgeBase.id)) {
        this.runtimes.set(knowledgeBase.id, { state: "stopped" });
      }
    }
    console.log(`[raas] Loaded ${stored.length} knowledge base(s)`);
  }

  list(): KnowledgeBase[] {
    return Array.from(this.knowledgeBases.values());
  }

  get(id: string): KnowledgeBase | undefined {
    return this.knowledgeBases.get(id);
  }

  private require(id: string): KnowledgeBase {
    const knowledgeBase = this.knowledgeBases.get(id);
    if (!knowledgeBase) {
      throw new KnowledgeBaseNotFoundError(id);
    }
    return knowledgeBase;
  }

  /** Managed directory holding copies of a knowledge base's file sources */
  storagePath(id: string): string {
    return path.join(this.config.storageDir, id);
  }

  async create(input: KnowledgeBaseInput = {}): Promise<KnowledgeBase> {
    const knowledgeBase: KnowledgeBase = {
      id: this.generateId(),
      name: input.name ?? KNOWLEDGE_BASE_DEFAULTS.name,
      description: input.description ?? KNOWLEDGE_BASE_DEFAULTS.description,
      port: input.port ?? KNOWLEDGE_BASE_DEFAULTS.port,
      systemPrompt: input.systemPrompt ?? KNOWLEDGE_BASE_DEFAULTS.systemPrompt,
      sources: [],
    };
    validatePort(knowledgeBase.port);

    await this.store.save(knowledgeBase);
    await fs.mkdir(this.storagePath(knowledgeBase.id), { recursive: true });

    this.knowledgeBases.set(knowledgeBase.id, knowledgeBase);
    this.runtimes.set(knowledgeBase.id, { state: "stopped" });
    return knowledgeBase;
  }

  async update(id: string, patch: KnowledgeBaseInput): Promise<KnowledgeBase> {
    const current = this.require(id);
    const updated: KnowledgeBase = {
      ...current,
      name: patch.name ?? current.name,
      description: patch.description ?? current.description,
      port: patch.port ?? current.port,
      systemPrompt: patch.systemPrompt ?? current.systemPrompt,
    };
    validatePort(updated.port);

    await this.store.save(updated);
    this.knowledgeBases.set(id, updated);
    return updated;
  }

  /**
   * Stop, delete the record and its sources, and remove the managed directory
   */
  async delete(id: string): Promise<void> {
    this.require(id);
    await this.stop(id);
    await this.store.delete(id);
    await fs.rm(this.storagePath(id), { recursive: true, force: true });
    this.knowledgeBases.delete(id);
    this.runtimes.delete(id);
  }

  private async appendSource(id: string, source: Source): Promise<Source> {
    const knowledgeBase = this.require(id);
    await this.store.saveSource(id, source);
    this.knowledgeBases.set(id, { ...knowledgeBase, sources: [...knowledgeBase.sources, source] });
    return source;
  }

  /**
   * Copy a file into the managed directory as `<sourceId><ext>` and register it
   */
  async addFileSource(id: string, filePath: string, name?: string): Promise<Source> {
    this.require(id);

    try {
      await fs.access(filePath);
    } catch (error) {
      throw new SourceUnavailableError(filePath, `File not found: ${filePath}`, { cause: error });
    }

    const sourceId = this.generateId();
    const directory = this.storagePath(id);
    const destination = path.join(directory, `${sourceId}${path.extname(filePath)}`);
    await fs.mkdir(directory, { recursive: true });
    await fs.copyFile(filePath, destination);

    return this.appendSource(id, {
      id: sourceId,
      kind: "file",
      name: name ?? path.basename(filePath),
      value: destination,
      enabled: true,
      metadata: { originalPath: path.resolve(filePath) },
    });
  }

  async addWebSource(id: string, url: string, name?: string): Promise<Source> {
    this.require(id);

    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      throw new MalformedRequestError(`Invalid URL: ${url}`);
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      throw new MalformedRequestError(`Unsupported URL protocol: ${parsed.protocol}`);
    }

    return this.appendSource(id, {
      id: this.generateId(),
      kind: "web",
      name: name ?? url,
      value: url,
      enabled: true,
      metadata: {},
    });
  }

  async addTextSource(id: string, name: string, text: string): Promise<Source> {
    return this.appendSource(id, {
      id: this.generateId(),
      kind: "text",
      name,
      value: text,
      enabled: true,
      metadata: {},
    });
  }

  /**
   * Remove a source; a managed file copy is deleted with it
   */
  async removeSource(id: string, sourceId: string): Promise<boolean> {
    const knowledgeBase = this.require(id);
    const source = knowledgeBase.sources.find((candidate) => candidate.id === sourceId);
    if (!source) return false;

    await this.store.deleteSource(id, sourceId);

    const managedDirectory = this.storagePath(id) + path.sep;
    if (source.kind === "file" && path.resolve(source.value).startsWith(managedDirectory)) {
      await fs.rm(source.value, { force: true });
    }

    this.knowledgeBases.set(id, {
      ...knowledgeBase,
      sources: knowledgeBase.sources.filter((candidate) => candidate.id !== sourceId),
    });
    return true;
  }

  async setSourceEnabled(id: string, sourceId: string, enabled: boolean): Promise<Source | undefined> {
    const knowledgeBase = this.require(id);
    const source = knowledgeBase.sources.find((candidate) => candidate.id === sourceId);
    if (!source) return undefined;

    const updated: Source = { ...source, enabled };
    await this.store.saveSource(id, updated);
    this.knowledgeBases.set(id, {
      ...knowledgeBase,
      sources: knowledgeBase.sources.map((candidate) => (candidate.id === sourceId ? updated : candidate)),
    });
    return updated;
  }

  getState(id: string): KnowledgeBaseState {
    return this.runtimes.get(id)?.state ?? "stopped";
  }

  isRunning(id: string): boolean {
    return this.getState(id) === "running";
  }

  getServer(id: string): KnowledgeBaseServer | undefined {
    const runtime = this.runtimes.get(id);
    return runtime?.state === "running" ? runtime.server : undefined;
  }

  getRequestCount(id: string): number {
    return this.runtimes.get(id)?.server?.requestCount ?? 0;
  }

  /**
   * Start serving a knowledge base. A running knowledge base is returned as
   * is; a concurrent start shares the one in flight. Failure leaves it
   * stopped and rethrows.
   */
  async start(id: string): Promise<KnowledgeBaseServer> {
    this.require(id);
    const runtime = this.runtimes.get(id) ?? { state: "stopped" };
    this.runtimes.set(id, runtime);

    // Re-check after every wait: another caller may have started it meanwhile
    for (;;) {
      if (runtime.state === "running" && runtime.server) {
        return runtime.server;
      }
      if (runtime.starting) {
        return runtime.starting;
      }
      if (!runtime.stopping) break;
      await runtime.stopping;
    }

    runtime.state = "starting";
    runtime.starting = this.launch(id);

    try {
      runtime.server = await runtime.starting;
      runtime.state = "running";
      return runtime.server;
    } catch (error) {
      runtime.state = "stopped";
      runtime.server = undefined;
      console.error(`[raas] Failed to start ${id}: ${getErrorMessage(error)}`);
      void logErrorObject(error, { knowledge_base_id: id });
      throw error;
    } finally {
      runtime.starting = undefined;
    }
  }

  private async launch(id: string): Promise<KnowledgeBaseServer> {
    const knowledgeBase = this.require(id);
    const engine = new RagEngine({ registry: this.registry, label: id });

    const report = await engine.ingestSources(knowledgeBase.sources);
    if (report.failed.length > 0) {
      console.warn(
        `[raas] "${knowledgeBase.name}": ${report.failed.length} source(s) failed to load: ` +
          report.failed.map(({ source }) => source.name).join(", ")
      );
    }

    const server = new KnowledgeBaseServer({
      knowledgeBase: () => this.knowledgeBases.get(id) ?? knowledgeBase,
      engine,
      inference: this.inference,
      modelName: this.config.modelName,
      host: this.config.host,
    });
    await server.start();
    return server;
  }

  /**
   * Stop serving. In-flight requests get the configured grace period before
   * their connections are closed.
   */
  async stop(id: string): Promise<void> {
    const runtime = this.runtimes.get(id);
    if (!runtime) return;

    if (runtime.stopping) {
      return runtime.stopping;
    }

    if (runtime.starting) {
      try {
        await runtime.starting;
      } catch {
        // The failed start already left it stopped
        return;
      }
    }

    const server = runtime.server;
    if (runtime.state !== "running" || !server) return;

    runtime.state = "stopping";
    runtime.stopping = server.stop(this.config.stopGraceMs);

    try {
      await runtime.stopping;
    } finally {
      runtime.state = "stopped";
      runtime.server = undefined;
      runtime.stopping = undefined;
    }
  }

  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.runtimes.keys(), (id) => this.stop(id)));
  }
}
