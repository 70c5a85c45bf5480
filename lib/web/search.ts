/**
 * Web Search
 *
 * Optional web results for the in-app chat. Tavily backs the default
 * provider; without an API key, or on any failure, search returns no
 * results rather than failing the chat turn.
 */

import { getErrorMessage } from "@/lib/errors";

const TAVILY_URL = "https://api.tavily.com/search";

/** Snippets are cut to this many characters */
export const MAX_SNIPPET_CHARS = 1500;

export interface WebSearchResult {
  title: string;
  url: string;
  snippet: string;
}

export interface WebSearchProvider {
  search(query: string, maxResults?: number, signal?: AbortSignal): Promise<WebSearchResult[]>;
}

/**
 * Normalize whitespace and defuse prompt-format markers so page text cannot
 * pose as a conversation turn.
 */
export function sanitizeSnippet(text: string): string {
  let clean = text
    .replace(/\r\n?/g, "\n")
    .replace(/[ \t]+/g, " ")
    .replace(/\n{3,}/g, "\n\n")
    .trim()
    .replaceAll("###", "")
    .replaceAll("User:", "User -")
    .replaceAll("Assistant:", "Assistant -")
    .replaceAll("Human:", "Human -");

  if (clean.length > MAX_SNIPPET_CHARS) {
    clean = clean.slice(0, MAX_SNIPPET_CHARS) + "...";
  }

  return clean;
}

function readString(record: object, key: string): string {
  const value: unknown = Reflect.get(record, key);
  return typeof value === "string" ? value : "";
}

export function parseTavilyResults(json: unknown): WebSearchResult[] {
  if (typeof json !== "object" || json === null) return [];
  const results: unknown = Reflect.get(json, "results");
  if (!Array.isArray(results)) return [];

  const parsed: WebSearchResult[] = [];
  for (const item of results) {
    if (typeof item !== "object" || item === null) continue;
    const url = readString(item, "url");
    if (!url) continue;
    parsed.push({
      url,
      title: readString(item, "title") || url,
      snippet: sanitizeSnippet(readString(item, "content")),
    });
  }
  return parsed;
}

export interface TavilyWebSearchOptions {
  apiKey?: string;
  fetch?: typeof fetch;
}

export class TavilyWebSearch implements WebSearchProvider {
  private readonly apiKey?: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: TavilyWebSearchOptions = {}) {
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async search(query: string, maxResults = 5, signal?: AbortSignal): Promise<WebSearchResult[]> {
    if (!this.apiKey) return [];

    try {
      const response = await this.fetchImpl(TAVILY_URL, {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({
          api_key: this.apiKey,
          query,
          max_results: Math.max(1, Math.min(maxResults, 10)),
          include_images: false,
          include_answer: false,
          search_depth: "basic",
        }),
        signal,
      });

      if (!response.ok) {
        console.warn(`[web-search] Tavily returned HTTP ${response.status}`);
        return [];
      }

      return parseTavilyResults(await response.json()).slice(0, maxResults);
    } catch (error) {
      console.warn(`[web-search] Search failed: ${getErrorMessage(error)}`);
      return [];
    }
  }
}
