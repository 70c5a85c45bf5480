/**
 * Chat message types shared by the HTTP surface, the inference engines and
 * the in-app chat store.
 */

export type ChatRole = "system" | "user" | "assistant";

/** Message format sent to the inference engine */
export interface PromptMessage {
  role: ChatRole;
  content: string;
}

/** A message in a conversation */
export interface ChatMessage extends PromptMessage {
  id: string;
  timestamp: Date;
  /** True while tokens are still arriving */
  isStreaming?: boolean;
}

/** Request body accepted by POST /chat and POST /chat/stream */
export interface ChatRequestBody {
  messages: Array<{ role: string; content: string }>;
}

/** Response body of POST /chat */
export interface ChatResponseBody {
  model: string;
  content: string;
  token_count: number;
}

/**
 * Frames sent over /chat/stream:
 * - 0+ token frames `{ content }`
 * - optional `{ error }` when generation fails mid-stream
 * - terminated by the literal `data: [DONE]`
 */
export type StreamFrame = { content: string } | { error: string };

export const STREAM_DONE = "[DONE]";
