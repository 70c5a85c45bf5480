/**
 * Inference Engine
 *
 * The text-completion capability the chat surfaces talk to. Tokens are
 * yielded in generation order; aborting the signal stops production and
 * the consumer keeps whatever it already received.
 */

import type { PromptMessage } from "@/lib/chat/types";

export interface GenerateOptions {
  signal?: AbortSignal;
}

export interface InferenceEngine {
  /** Model name reported to API callers */
  readonly model: string;
  isReady(): boolean;
  stream(messages: readonly PromptMessage[], options?: GenerateOptions): AsyncIterable<string>;
}
