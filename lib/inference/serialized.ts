/**
 * Serialized inference
 *
 * Wraps an engine so that one generation runs at a time. Knowledge bases
 * share a single model context; concurrent requests queue here in arrival
 * order instead of interleaving.
 */

import type { PromptMessage } from "@/lib/chat/types";
import type { GenerateOptions, InferenceEngine } from "./types";

export class SerializedInferenceEngine implements InferenceEngine {
  private tail: Promise<void> = Promise.resolve();

  constructor(private readonly inner: InferenceEngine) {}

  get model(): string {
    return this.inner.model;
  }

  isReady(): boolean {
    return this.inner.isReady();
  }

  private acquire(): Promise<() => void> {
    let release: () => void = () => {};
    const next = new Promise<void>((resolve) => {
      release = resolve;
    });
    const ready = this.tail.then(() => release);
    this.tail = this.tail.then(() => next);
    return ready;
  }

  async *stream(messages: readonly PromptMessage[], options: GenerateOptions = {}): AsyncIterable<string> {
    const release = await this.acquire();
    try {
      // A caller that gave up while queued never starts generating
      if (options.signal?.aborted) return;
      yield* this.inner.stream(messages, options);
    } finally {
      release();
    }
  }
}
