/**
 * Context Assembly
 *
 * Combines the attached document, knowledge-base retrieval and web results
 * into the block injected into the system prompt, and folds that block into
 * the outgoing message list.
 */

import type { PromptMessage } from "@/lib/chat/types";
import type { WebSearchResult } from "@/lib/web/search";

/** Attached documents are cut to this many characters before inclusion */
export const MAX_SESSION_DOCUMENT_CHARS = 50_000;

export const DEFAULT_SYSTEM_PROMPT = "You are a helpful assistant. Be concise and direct.";

export interface AssembleContextInput {
  sessionDocument?: { name: string; content: string };
  knowledgeBaseContext?: string;
  webResults?: WebSearchResult[];
  /** Outer cap on the combined block, usually derived from the context window */
  maxChars?: number;
}

function formatWebResults(results: WebSearchResult[]): string {
  return results
    .map((result, i) => `${i + 1}. ${result.title} (${result.url})\n${result.snippet}`)
    .join("\n\n");
}

/**
 * Sections appear in a fixed order: attached document, knowledge base,
 * web results. Empty inputs are skipped.
 */
export function assembleContext(input: AssembleContextInput): string {
  const sections: string[] = [];

  const document = input.sessionDocument;
  if (document && document.content.trim().length > 0) {
    const content = document.content.slice(0, MAX_SESSION_DOCUMENT_CHARS);
    sections.push(`[Attached Document: ${document.name}]\n${content}`);
  }

  const knowledgeBase = input.knowledgeBaseContext?.trim();
  if (knowledgeBase) {
    sections.push(`[Knowledge Base]\n${knowledgeBase}`);
  }

  if (input.webResults && input.webResults.length > 0) {
    sections.push(`[Web Search Results]\n${formatWebResults(input.webResults)}`);
  }

  const context = sections.join("\n\n");

  if (input.maxChars !== undefined && context.length > input.maxChars) {
    return context.slice(0, Math.max(0, input.maxChars));
  }

  return context;
}

/**
 * Append the context to the first system message, or prepend a system
 * message built from `fallbackSystemPrompt` when there is none.
 */
export function buildPromptMessages(
  messages: readonly PromptMessage[],
  context: string,
  fallbackSystemPrompt: string = DEFAULT_SYSTEM_PROMPT
): PromptMessage[] {
  const suffix = context ? `\n\nContext:\n${context}` : "";
  const systemIndex = messages.findIndex((message) => message.role === "system");

  if (systemIndex === -1) {
    return [{ role: "system", content: fallbackSystemPrompt + suffix }, ...messages];
  }

  return messages.map((message, i) =>
    i === systemIndex ? { role: "system", content: message.content + suffix } : message
  );
}
