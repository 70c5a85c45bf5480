import { isAbortError } from "@/lib/errors";
import type { PromptMessage } from "@/lib/chat/types";
import type { GenerateOptions, InferenceEngine } from "./types";

export const GENERATION_STOPPED_MARKER = "\n[Generation stopped]";

export interface GenerateTextResult {
  content: string;
  stopped: boolean;
}

/**
 * Collect a full response. Cancellation keeps the partial text and appends
 * the stop marker; any other failure propagates.
 */
export async function generateText(
  engine: InferenceEngine,
  messages: readonly PromptMessage[],
  options: GenerateOptions & { onToken?: (token: string) => void } = {}
): Promise<GenerateTextResult> {
  let content = "";

  try {
    for await (const token of engine.stream(messages, { signal: options.signal })) {
      if (options.signal?.aborted) break;
      content += token;
      options.onToken?.(token);
    }
  } catch (error) {
    if (!isAbortError(error) && !options.signal?.aborted) {
      throw error;
    }
    return { content: content + GENERATION_STOPPED_MARKER, stopped: true };
  }

  if (options.signal?.aborted) {
    return { content: content + GENERATION_STOPPED_MARKER, stopped: true };
  }

  return { content, stopped: false };
}
