import { describe, expect, it } from "vitest";
import { chunkText, joinChunks } from "../server/services/retrieval/chunker";
import { ValidationError } from "../server/services/retrieval/errors";
import { extractKeywords, isStopWord, termFrequencies, tokenize } from "../server/services/retrieval/keywords";
import { normalizeDocumentText, normalizeQuery } from "../server/services/retrieval/text-normalize";

const essay = [
  "Solar panels convert sunlight into electricity. Output depends on latitude and cloud cover.",
  "Wind turbines work best on open plains and offshore. Storage smooths the gaps between gusts!",
  "Grid operators balance supply and demand every second. Batteries, pumped hydro and demand response all help.",
  "Heat pumps move warmth instead of making it? That is why they beat resistive heaters on efficiency.",
].join("\n\n");

describe("chunkText", () => {
  it("keeps a short document in one chunk", () => {
    const chunks = chunkText("Alpha beta.\n\nGamma delta.", { chunkSize: 100, chunkOverlap: 10 });
    expect(chunks).toEqual([{ text: "Alpha beta.\n\nGamma delta.", start: 0, end: 25, overlap: 0 }]);
  });

  it("returns nothing for blank text", () => {
    expect(chunkText(" \n\t ", { chunkSize: 50, chunkOverlap: 5 })).toEqual([]);
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => chunkText("text", { chunkSize: 10, chunkOverlap: 10 })).toThrow(ValidationError);
    expect(() => chunkText("text", { chunkSize: 0, chunkOverlap: 0 })).toThrow(ValidationError);
  });

  it("cuts unpunctuated text at whitespace and overlaps on word starts", () => {
    const text = "one two three four five six seven eight nine ten";
    const chunks = chunkText(text, { chunkSize: 20, chunkOverlap: 5 });
    expect(chunks.map((chunk) => chunk.text)).toEqual(["one two three ", "four five six ", "six seven eight ", "nine ten"]);
    expect(chunks.map((chunk) => chunk.overlap)).toEqual([0, 0, 4, 0]);
  });

  it("reconstructs the source from its chunks for several sizes", () => {
    for (const [chunkSize, chunkOverlap] of [
      [60, 0],
      [80, 20],
      [120, 40],
      [1000, 200],
    ]) {
      const chunks = chunkText(essay, { chunkSize, chunkOverlap });
      expect(joinChunks(chunks)).toBe(essay);
      chunks.forEach((chunk, index) => {
        expect(chunk.text).toBe(essay.slice(chunk.start, chunk.end));
        expect(chunk.overlap).toBeLessThanOrEqual(chunkOverlap);
        if (index > 0) expect(chunk.start + chunk.overlap).toBe(chunks[index - 1].end);
      });
    }
  });

  it("packs three long paragraphs into three chunks with full overlap", () => {
    const text = [
      `${"tidal ".repeat(132)}tidal.`,
      `${"waves ".repeat(132)}waves.`,
      `${"swell ".repeat(132)}swelling`,
    ].join("\n\n");
    expect(text).toHaveLength(2400);

    const chunks = chunkText(text, { chunkSize: 1000, chunkOverlap: 200 });
    expect(chunks.map(({ start, end, overlap }) => ({ start, end, overlap }))).toEqual([
      { start: 0, end: 800, overlap: 0 },
      { start: 600, end: 1600, overlap: 200 },
      { start: 1400, end: 2400, overlap: 200 },
    ]);
    expect(chunks[1].text.startsWith("tidal tidal")).toBe(true);
    expect(chunks[2].text.startsWith("waves waves")).toBe(true);
    expect(joinChunks(chunks)).toBe(text);
  });

  it("prefers paragraph breaks over mid-paragraph cuts", () => {
    const chunks = chunkText(essay, { chunkSize: 130, chunkOverlap: 0 });
    expect(chunks[0].text.startsWith("Solar panels")).toBe(true);
    expect(chunks[0].text.endsWith("cloud cover.\n\n")).toBe(true);
  });
});

describe("keywords", () => {
  it("tokenizes with case folding, stop-word and numeric filtering", () => {
    expect(tokenize("The Quick-brown fox, 2024 and 42x!")).toEqual(["quick", "brown", "fox", "42x"]);
  });

  it("orders by frequency then alphabetically", () => {
    expect(extractKeywords("wind solar wind grid solar wind", 10)).toEqual(["wind", "solar", "grid"]);
    expect(extractKeywords("wind solar wind grid solar wind", 2)).toEqual(["wind", "solar"]);
    expect(extractKeywords("anything", 0)).toEqual([]);
  });

  it("is stable under case and punctuation changes", () => {
    expect(extractKeywords("Climate, POLICY; climate!", 5)).toEqual(extractKeywords("climate policy climate", 5));
  });

  it("drops stop-words from query terms", () => {
    expect(isStopWord("change")).toBe(true);
    expect(extractKeywords("climate change", 32)).toEqual(["climate"]);
  });

  it("counts only the requested terms that occur", () => {
    const counts = termFrequencies("Battery storage and battery prices", ["battery", "grid"]);
    expect([...counts.entries()]).toEqual([["battery", 2]]);
  });
});

describe("text normalization", () => {
  it("collapses whitespace and blank-line runs", () => {
    expect(normalizeDocumentText("  First\tline  \r\n\r\n\r\n  second   line \n", "text")).toBe("First line\n\nsecond line");
  });

  it("strips markdown decoration", () => {
    expect(normalizeDocumentText("# Title\n\nSome **bold** and `code` with [a link](http://example.test).", "markdown")).toBe(
      "Title\n\nSome bold and code with a link.",
    );
  });

  it("normalizes queries for fingerprints", () => {
    expect(normalizeQuery("  Solar\t\tPANELS \n")).toBe("solar panels");
  });
});
