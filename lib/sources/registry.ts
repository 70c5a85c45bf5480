/**
 * Source Provider Registry
 *
 * Maps a source kind to the provider that reads it. Adding a kind means
 * registering another provider.
 */

import type { SourceKind } from "@/lib/rag/types";
import type { SourceProvider } from "./types";

export class SourceProviderRegistry {
  private readonly providers = new Map<SourceKind, SourceProvider>();

  constructor(providers: SourceProvider[] = []) {
    for (const provider of providers) {
      this.register(provider);
    }
  }

  register(provider: SourceProvider): void {
    if (this.providers.has(provider.kind)) {
      console.warn(`[sources] Provider for "${provider.kind}" is already registered, overwriting`);
    }
    this.providers.set(provider.kind, provider);
  }

  get(kind: SourceKind): SourceProvider | undefined {
    return this.providers.get(kind);
  }

  has(kind: SourceKind): boolean {
    return this.providers.has(kind);
  }

  kinds(): SourceKind[] {
    return Array.from(this.providers.keys());
  }
}
