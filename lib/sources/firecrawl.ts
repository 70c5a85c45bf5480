/**
 * Firecrawl Web Source Provider
 *
 * Scrapes pages through Firecrawl and returns clean markdown. Used in place
 * of the plain fetch provider when WEB_SCRAPER=firecrawl.
 */

import Firecrawl from "@mendable/firecrawl-js";
import { SourceUnavailableError, getErrorMessage } from "@/lib/errors";
import type { Source } from "@/lib/rag/types";
import type { SourceProvider } from "./types";

// Hard limit to prevent runaway prompt sizes
const MAX_MARKDOWN_CHARS_PER_PAGE = 50_000;

/** The slice of the Firecrawl client this provider uses */
export interface FirecrawlScraper {
  scrape(url: string, options: { formats: "markdown"[] }): Promise<{ markdown?: string }>;
}

/**
 * Normalize markdown content:
 * - Remove null bytes
 * - Collapse excessive whitespace (3+ newlines -> 2)
 * - Truncate to max chars
 */
export function normalizeMarkdown(markdown: string | null | undefined): string {
  if (!markdown) return "";

  let normalized = markdown
    .replace(/\0/g, "")
    .replace(/\n{3,}/g, "\n\n")
    .replace(/ {2,}/g, " ")
    .trim();

  if (normalized.length > MAX_MARKDOWN_CHARS_PER_PAGE) {
    normalized = normalized.slice(0, MAX_MARKDOWN_CHARS_PER_PAGE);
    // Try to end at a word boundary
    const lastSpace = normalized.lastIndexOf(" ");
    if (lastSpace > MAX_MARKDOWN_CHARS_PER_PAGE * 0.9) {
      normalized = normalized.slice(0, lastSpace);
    }
    normalized += "\n\n[Content truncated]";
  }

  return normalized;
}

export class FirecrawlSourceProvider implements SourceProvider {
  readonly kind = "web" as const;
  private readonly client: FirecrawlScraper;

  constructor(options: { apiKey: string } | { client: FirecrawlScraper }) {
    this.client = "client" in options ? options.client : new Firecrawl({ apiKey: options.apiKey });
  }

  async getContent(source: Source): Promise<string> {
    try {
      const page = await this.client.scrape(source.value, { formats: ["markdown"] });
      return normalizeMarkdown(page.markdown);
    } catch (error) {
      throw new SourceUnavailableError(
        source.value,
        `Firecrawl failed to scrape ${source.value}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }
}
