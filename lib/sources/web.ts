/**
 * Web Source Provider
 *
 * Fetches a page as static HTML (no script execution) and reduces it to
 * plain text.
 */

import { convert } from "html-to-text";
import { SourceUnavailableError, getErrorMessage } from "@/lib/errors";
import type { Source } from "@/lib/rag/types";
import type { SourceProvider } from "./types";

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

const HEADINGS = ["h1", "h2", "h3", "h4", "h5", "h6"].map((selector) => ({
  selector,
  options: { uppercase: false },
}));

/**
 * Strip scripts, styles and tags, decode entities, collapse whitespace
 */
export function htmlToPlainText(html: string): string {
  const withoutScripts = html
    .replace(/<script\b[^>]*>[\s\S]*?<\/script>/gi, "")
    .replace(/<style\b[^>]*>[\s\S]*?<\/style>/gi, "");

  const text = convert(withoutScripts, {
    wordwrap: false,
    selectors: [
      { selector: "a", options: { ignoreHref: true } },
      { selector: "img", format: "skip" },
      ...HEADINGS,
    ],
  });

  return text.replace(/\s+/g, " ").trim();
}

export class WebSourceProvider implements SourceProvider {
  readonly kind = "web" as const;

  async getContent(source: Source, signal?: AbortSignal): Promise<string> {
    const url = source.value;
    let response: Response;

    try {
      response = await fetch(url, {
        headers: { "User-Agent": USER_AGENT },
        signal,
      });
    } catch (error) {
      throw new SourceUnavailableError(url, `Failed to fetch ${url}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      throw new SourceUnavailableError(url, `Failed to fetch ${url}: HTTP ${response.status}`);
    }

    return htmlToPlainText(await response.text());
  }
}
