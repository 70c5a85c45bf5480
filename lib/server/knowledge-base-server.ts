/**
 * One running knowledge base: its engine, its listener and its request
 * counter.
 */

import type { InferenceEngine } from "@/lib/inference/types";
import type { RagEngine } from "@/lib/rag/engine";
import type { KnowledgeBase } from "@/lib/rag/types";
import { listen, type FetchHandler, type HttpListener } from "./http";
import { createKnowledgeBaseHandler } from "./routes";

export interface KnowledgeBaseServerOptions {
  /** Read on every request so prompt and name edits show up live */
  knowledgeBase: () => KnowledgeBase;
  engine: RagEngine;
  inference: InferenceEngine;
  modelName: string;
  host: string;
}

export class KnowledgeBaseServer {
  readonly engine: RagEngine;
  readonly handler: FetchHandler;
  private readonly options: KnowledgeBaseServerOptions;
  private listener: HttpListener | null = null;
  private requests = 0;
  private boundPort: number;

  constructor(options: KnowledgeBaseServerOptions) {
    this.options = options;
    this.engine = options.engine;
    this.boundPort = options.knowledgeBase().port;
    this.handler = createKnowledgeBaseHandler(
      {
        knowledgeBase: options.knowledgeBase,
        engine: options.engine,
        inference: options.inference,
        modelName: options.modelName,
        port: () => this.port,
        requestCount: () => this.requests,
      },
      () => {
        this.requests++;
      }
    );
  }

  get knowledgeBase(): KnowledgeBase {
    return this.options.knowledgeBase();
  }

  get requestCount(): number {
    return this.requests;
  }

  get isRunning(): boolean {
    return this.listener !== null;
  }

  /** Bound port once running (differs from the configured one only for port 0) */
  get port(): number {
    return this.listener?.port ?? this.boundPort;
  }

  get inFlight(): number {
    return this.listener?.inFlight ?? 0;
  }

  async start(): Promise<void> {
    if (this.listener) return;
    const { port } = this.options.knowledgeBase();
    this.listener = await listen(this.handler, { port, host: this.options.host });
    this.boundPort = this.listener.port;
    console.log(`[raas] "${this.knowledgeBase.name}" listening on http://${this.options.host}:${this.listener.port}`);
  }

  async stop(graceMs?: number): Promise<void> {
    const listener = this.listener;
    if (!listener) return;
    this.listener = null;
    await listener.close(graceMs);
    console.log(`[raas] "${this.knowledgeBase.name}" stopped`);
  }
}
