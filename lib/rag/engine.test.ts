import { describe, it, expect, vi, beforeEach } from "vitest";
import { SourceTypeUnsupportedError } from "@/lib/errors";
import { SourceProviderRegistry } from "@/lib/sources/registry";
import { TextSourceProvider } from "@/lib/sources/text";
import { RagEngine } from "./engine";
import type { Source } from "./types";

function textSource(id: string, name: string, value: string, enabled = true): Source {
  return { id, kind: "text", name, value, enabled, metadata: {} };
}

describe("RagEngine", () => {
  let engine: RagEngine;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    engine = new RagEngine({
      registry: new SourceProviderRegistry([new TextSourceProvider()]),
      label: "test",
    });
  });

  it("returns nothing before any source is loaded", () => {
    expect(engine.getContext("anything")).toBe("");
  });

  it("answers from the full corpus when it is small", async () => {
    await engine.addSource(textSource("s1", "Facts", "The sky is blue. The ocean is also blue."));

    expect(engine.getContext("What color is the sky?")).toBe(
      "--- FULL CONTEXT ---\n[Source: Facts]:\nThe sky is blue. The ocean is also blue.\n\n--- END CONTEXT ---\n"
    );
  });

  it("keeps duplicates when the same source is added twice", async () => {
    const source = textSource("s1", "Facts", "Water is wet.");
    await engine.addSource(source);
    await engine.addSource(source);

    expect(engine.documents).toHaveLength(2);
    expect(engine.totalCharacters).toBe(26);
  });

  it("removes every document built from a source", async () => {
    const source = textSource("s1", "Facts", "Water is wet.");
    await engine.addSource(source);
    await engine.addSource(source);
    await engine.addSource(textSource("s2", "Other", "Fire is hot."));

    expect(engine.removeSource("s1")).toBe(true);
    expect(engine.documents.map((d) => d.id)).toEqual(["s2"]);
    expect(engine.removeSource("s1")).toBe(false);
    expect(engine.removeDocument("s2")).toBe(true);

    expect(engine.documents).toEqual([]);

    await engine.addSource(source);
    engine.clear();
    expect(engine.documents).toEqual([]);
  });

  it("continues past failing sources and skips disabled ones", async () => {
    const broken: Source = { id: "s2", kind: "github", name: "Repo", value: "org/repo", enabled: true, metadata: {} };

    const report = await engine.ingestSources([
      textSource("s1", "Facts", "Water is wet."),
      broken,
      textSource("s3", "Off", "Ignored.", false),
    ]);

    expect(report.ingested.map((d) => d.id)).toEqual(["s1"]);
    expect(report.failed).toHaveLength(1);
    expect(report.failed[0].source).toBe(broken);
    expect(report.failed[0].error).toBeInstanceOf(SourceTypeUnsupportedError);
    expect(engine.documents.map((d) => d.id)).toEqual(["s1"]);
  });

  it("exposes a copy of its documents", async () => {
    await engine.addSource(textSource("s1", "Facts", "Water is wet."));
    const snapshot = engine.documents;
    engine.clear();

    expect(snapshot).toHaveLength(1);
  });
  describe("with a corpus above the full-context limit", () => {
    const filler = (phrase: string, count: number) => Array.from({ length: count }, () => phrase.repeat(4).trim());

    beforeEach(() => {
      engine = new RagEngine({
        registry: new SourceProviderRegistry([new TextSourceProvider()]),
        chunkOptions: { chunkSize: 100 },
        label: "test",
      });
    });

    it("ranks the chunk answering a quarterly tax question first", async () => {
      const lorem = filler("lorem ipsum dolor sit amet ", 80);
      const garden = filler("garden roses bloom near the old stone wall ", 80);
      await engine.addSource(
        textSource("a", "A", [...lorem.slice(0, 40), "Q1 tax deducted was 5000.", ...lorem.slice(40)].join("\n\n"))
      );
      await engine.addSource(
        textSource("b", "B", [...garden.slice(0, 10), "Property tax is filed yearly.", ...garden.slice(10)].join("\n\n"))
      );
      expect(engine.documents.every((d) => d.content.length > 8000)).toBe(true);

      expect(engine.getContext("Q1 tax")).toBe(
        "--- CONTEXT ---\n" +
          "[Source: A]:\nQ1 tax deducted was 5000.\n\n" +
          "[Source: B]:\nProperty tax is filed yearly.\n\n" +
          "--- END CONTEXT ---\n"
      );
    });

    it("never ranks a chunk below one whose query terms it contains", async () => {
      const lorem = filler("lorem ipsum dolor sit amet ", 80);
      await engine.addSource(
        textSource(
          "a",
          "A",
          [...lorem.slice(0, 20), "Tax deducted.", ...lorem.slice(20, 60), "Q1 tax deducted.", ...lorem.slice(60)].join(
            "\n\n"
          )
        )
      );

      expect(engine.getContext("Q1 tax", 1)).toBe(
        "--- CONTEXT ---\n[Source: A]:\nQ1 tax deducted.\n\n--- END CONTEXT ---\n"
      );
      expect(engine.getContext("Q1 tax")).toBe(
        "--- CONTEXT ---\n" +
          "[Source: A]:\nQ1 tax deducted.\n\n" +
          "[Source: A]:\nTax deducted.\n\n" +
          "--- END CONTEXT ---\n"
      );
    });
  });
});
