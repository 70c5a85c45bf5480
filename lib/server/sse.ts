/**
 * Server-Sent Events helper for Web-standard handlers.
 *
 * The producer writes `data:` frames; the terminal `data: [DONE]` frame is
 * always sent, after an `{ error }` frame if the producer threw. Cancelling
 * the body (client disconnect) aborts the producer's signal.
 */

import { getErrorMessage, isAbortError } from "@/lib/errors";
import { STREAM_DONE } from "@/lib/chat/types";

export type SSEWriter = (data: string) => void;

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream; charset=utf-8",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
} as const;

export function sseResponse(
  produce: (write: SSEWriter, signal: AbortSignal) => Promise<void>,
  options: { signal?: AbortSignal; headers?: Record<string, string> } = {}
): Response {
  const encoder = new TextEncoder();
  const abortController = new AbortController();
  let closed = false;

  options.signal?.addEventListener("abort", () => abortController.abort(), { once: true });

  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      const enqueue = (frame: string) => {
        if (closed) return;
        controller.enqueue(encoder.encode(frame));
      };
      const write: SSEWriter = (data) => enqueue(`data: ${data}\n\n`);

      const run = async () => {
        try {
          await produce(write, abortController.signal);
        } catch (error) {
          if (!isAbortError(error) && !abortController.signal.aborted) {
            console.error("[sse] Stream producer failed:", getErrorMessage(error));
            write(JSON.stringify({ error: getErrorMessage(error) }));
          }
        } finally {
          write(STREAM_DONE);
          if (!closed) {
            closed = true;
            controller.close();
          }
        }
      };

      void run();
    },
    cancel() {
      closed = true;
      abortController.abort();
    },
  });

  return new Response(stream, {
    headers: { ...SSE_HEADERS, ...options.headers },
  });
}
