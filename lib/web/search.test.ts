import { describe, it, expect, vi } from "vitest";
import { MAX_SNIPPET_CHARS, TavilyWebSearch, parseTavilyResults, sanitizeSnippet } from "./search";

describe("sanitizeSnippet", () => {
  it("normalizes whitespace", () => {
    expect(sanitizeSnippet("  a\r\nb\t\t c\n\n\n\nd  ")).toBe("a\nb c\n\nd");
  });

  it("defuses conversation markers", () => {
    expect(sanitizeSnippet("Heading### User: hi Assistant: hello Human: hey")).toBe(
      "Heading User - hi Assistant - hello Human - hey"
    );
  });

  it("caps long snippets", () => {
    const snippet = sanitizeSnippet("x".repeat(MAX_SNIPPET_CHARS + 1));
    expect(snippet).toBe("x".repeat(MAX_SNIPPET_CHARS) + "...");
  });
});

describe("parseTavilyResults", () => {
  it("maps results and skips entries without a URL", () => {
    const parsed = parseTavilyResults({
      results: [
        { title: "Rates", url: "https://rates.test", content: "Rates rose." },
        { url: "https://untitled.test", content: "No title here" },
        { title: "Broken" },
        "garbage",
      ],
    });

    expect(parsed).toEqual([
      { title: "Rates", url: "https://rates.test", snippet: "Rates rose." },
      { title: "https://untitled.test", url: "https://untitled.test", snippet: "No title here" },
    ]);
  });

  it("returns nothing for unexpected shapes", () => {
    expect(parseTavilyResults(null)).toEqual([]);
    expect(parseTavilyResults({ results: "nope" })).toEqual([]);
  });
});

describe("TavilyWebSearch", () => {
  it("returns no results without an API key", async () => {
    const fetchImpl = vi.fn<typeof fetch>();
    const search = new TavilyWebSearch({ fetch: fetchImpl });

    await expect(search.search("anything")).resolves.toEqual([]);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it("posts the query and parses results", async () => {
    let sentBody: unknown;
    const fetchImpl: typeof fetch = async (_input, init) => {
      sentBody = typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
      return Response.json({
        results: [
          { title: "One", url: "https://one.test", content: "first" },
          { title: "Two", url: "https://two.test", content: "second" },
        ],
      });
    };

    const search = new TavilyWebSearch({ apiKey: "test-key", fetch: fetchImpl });
    const results = await search.search("interest rates", 1);

    expect(results).toEqual([{ title: "One", url: "https://one.test", snippet: "first" }]);
    expect(sentBody).toMatchObject({ api_key: "test-key", query: "interest rates", max_results: 1 });
  });

  it("returns no results on HTTP errors and thrown failures", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const failing = new TavilyWebSearch({
      apiKey: "test-key",
      fetch: async () => new Response("limit", { status: 429 }),
    });
    const throwing = new TavilyWebSearch({
      apiKey: "test-key",
      fetch: async () => {
        throw new Error("offline");
      },
    });

    await expect(failing.search("q")).resolves.toEqual([]);
    await expect(throwing.search("q")).resolves.toEqual([]);
    expect(warn).toHaveBeenCalledWith("[web-search] Tavily returned HTTP 429");
    expect(warn).toHaveBeenCalledWith("[web-search] Search failed: offline");
    warn.mockRestore();
  });
});
