import type { Source } from "@/lib/rag/types";
import type { SourceProvider } from "./types";

/**
 * Literal text sources: the value is the content
 */
export class TextSourceProvider implements SourceProvider {
  readonly kind = "text" as const;

  async getContent(source: Source): Promise<string> {
    return source.value;
  }
}
