/**
 * Source Providers
 */

import type { WebConfig } from "@/lib/config";
import { FileSourceProvider } from "./file";
import { FirecrawlSourceProvider } from "./firecrawl";
import { SourceProviderRegistry } from "./registry";
import { TextSourceProvider } from "./text";
import type { OcrProvider } from "./types";
import { WebSourceProvider } from "./web";

export { SourceProviderRegistry } from "./registry";
export { FileSourceProvider } from "./file";
export { WebSourceProvider, htmlToPlainText } from "./web";
export { FirecrawlSourceProvider, normalizeMarkdown, type FirecrawlScraper } from "./firecrawl";
export { TextSourceProvider } from "./text";
export type { SourceProvider, OcrProvider } from "./types";

/**
 * Registry with the file, web and text providers. The web provider is
 * Firecrawl when configured, plain fetch otherwise.
 */
export function createDefaultRegistry(web?: WebConfig, ocr?: OcrProvider): SourceProviderRegistry {
  const webProvider =
    web?.scraper === "firecrawl" && web.firecrawlApiKey
      ? new FirecrawlSourceProvider({ apiKey: web.firecrawlApiKey })
      : new WebSourceProvider();

  return new SourceProviderRegistry([
    new FileSourceProvider({ ocr }),
    webProvider,
    new TextSourceProvider(),
  ]);
}
