import { describe, it, expect, vi } from "vitest";
import { FileSourceProvider } from "./file";
import { FirecrawlSourceProvider } from "./firecrawl";
import { createDefaultRegistry } from "./index";
import { SourceProviderRegistry } from "./registry";
import { TextSourceProvider } from "./text";
import { WebSourceProvider } from "./web";

describe("SourceProviderRegistry", () => {
  it("looks providers up by kind", () => {
    const registry = new SourceProviderRegistry([new TextSourceProvider(), new FileSourceProvider()]);

    expect(registry.kinds()).toEqual(["text", "file"]);
    expect(registry.has("web")).toBe(false);
    expect(registry.get("text")).toBeInstanceOf(TextSourceProvider);
    expect(registry.get("web")).toBeUndefined();
  });

  it("warns when a kind is registered twice and keeps the newest", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const registry = new SourceProviderRegistry([new TextSourceProvider()]);
    const replacement = new TextSourceProvider();

    registry.register(replacement);

    expect(registry.get("text")).toBe(replacement);
    expect(warn).toHaveBeenCalledWith('[sources] Provider for "text" is already registered, overwriting');
    warn.mockRestore();
  });
});

describe("createDefaultRegistry", () => {
  it("registers file, web and text providers", () => {
    const registry = createDefaultRegistry();

    expect(registry.kinds()).toEqual(["file", "web", "text"]);
    expect(registry.get("web")).toBeInstanceOf(WebSourceProvider);
  });

  it("uses Firecrawl for web sources when configured", () => {
    const registry = createDefaultRegistry({ scraper: "firecrawl", firecrawlApiKey: "test-key" });
    expect(registry.get("web")).toBeInstanceOf(FirecrawlSourceProvider);
  });

  it("falls back to plain fetch when Firecrawl has no key", () => {
    const registry = createDefaultRegistry({ scraper: "firecrawl" });
    expect(registry.get("web")).toBeInstanceOf(WebSourceProvider);
  });
});

describe("TextSourceProvider", () => {
  it("returns the literal value", async () => {
    const provider = new TextSourceProvider();
    const content = await provider.getContent({
      id: "t1",
      kind: "text",
      name: "Note",
      value: "Remember the milk.",
      enabled: true,
      metadata: {},
    });

    expect(content).toBe("Remember the milk.");
  });
});
