import { STREAM_DONE, type ChatRequestBody, type ChatResponseBody, type PromptMessage, type StreamFrame } from "@/lib/chat/types";

/**
 * Client for a running knowledge base's chat endpoints.
 */

function endpoint(baseUrl: string, path: string): string {
  return baseUrl.replace(/\/+$/, "") + path;
}

function parseFrame(json: string): StreamFrame | null {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (e) {
    // Malformed frames shouldn't crash the stream
    console.warn("[client] Failed to parse SSE frame:", json, e);
    return null;
  }
  if (typeof value !== "object" || value === null) return null;

  const content: unknown = Reflect.get(value, "content");
  if (typeof content === "string") return { content };
  const error: unknown = Reflect.get(value, "error");
  if (typeof error === "string") return { error };
  return null;
}

/**
 * POST /chat/stream and feed each token to `onToken`. Resolves with the full
 * text once `data: [DONE]` arrives (or the body ends). An `{ error }` frame
 * rejects after the stream finishes.
 *
 * Handles:
 * - Chunk boundaries (frames split across reads)
 * - Multiple frames in a single chunk
 * - Multi-line data fields (joined with newlines)
 */
export async function streamChat(
  baseUrl: string,
  messages: PromptMessage[],
  onToken: (token: string) => void,
  signal?: AbortSignal
): Promise<string> {
  const response = await fetch(endpoint(baseUrl, "/chat/stream"), {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ messages } satisfies ChatRequestBody),
    signal,
  });

  if (!response.ok) {
    const error = await response.text();
    throw new Error(`Chat stream failed (${response.status}): ${error}`);
  }

  const reader = response.body?.getReader();
  if (!reader) {
    throw new Error("No response body");
  }

  const decoder = new TextDecoder();
  let buffer = "";
  let content = "";
  let done = false;
  let streamError: string | null = null;

  function processEventBlock(block: string): void {
    if (done) return;

    const dataLines: string[] = [];
    for (const line of block.split("\n")) {
      if (!line || line.startsWith(":")) continue;
      if (line.startsWith("data:")) {
        dataLines.push(line.startsWith("data: ") ? line.slice(6) : line.slice(5));
      }
    }
    if (dataLines.length === 0) return;

    const data = dataLines.join("\n");
    if (data === STREAM_DONE) {
      done = true;
      return;
    }

    const frame = parseFrame(data);
    if (!frame) return;
    if ("error" in frame) {
      streamError = frame.error;
      return;
    }
    content += frame.content;
    onToken(frame.content);
  }

  try {
    while (!done) {
      const { done: finished, value } = await reader.read();
      if (finished) break;

      buffer += decoder.decode(value, { stream: true });
      const blocks = buffer.split("\n\n");
      buffer = blocks.pop() || "";

      for (const block of blocks) {
        if (block.trim()) processEventBlock(block);
      }
    }

    buffer += decoder.decode();
    for (const block of buffer.split("\n\n")) {
      if (block.trim()) processEventBlock(block);
    }
  } finally {
    if (done) {
      await reader.cancel();
    }
    reader.releaseLock();
  }

  if (streamError !== null) {
    throw new Error(`Chat stream failed: ${streamError}`);
  }

  return content;
}

/**
 * POST /chat and return the parsed body
 */
export async function chat(
  baseUrl: string,
  messages: PromptMessage[],
  signal?: AbortSignal
): Promise<ChatResponseBody> {
  const response = await fetch(endpoint(baseUrl, "/chat"), {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify({ messages } satisfies ChatRequestBody),
    signal,
  });

  if (!response.ok) {
    const error = await response.text();
    throw new Error(`Chat failed (${response.status}): ${error}`);
  }

  const body: unknown = await response.json();
  if (typeof body !== "object" || body === null) {
    throw new Error("Chat response is not a JSON object");
  }

  const model: unknown = Reflect.get(body, "model");
  const content: unknown = Reflect.get(body, "content");
  const tokenCount: unknown = Reflect.get(body, "token_count");
  if (typeof model !== "string" || typeof content !== "string" || typeof tokenCount !== "number") {
    throw new Error("Chat response is missing model, content or token_count");
  }

  return { model, content, token_count: tokenCount };
}
