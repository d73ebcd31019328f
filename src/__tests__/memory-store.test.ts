import { describe, expect, it } from "vitest";
import {
  InMemoryDocumentCatalog,
  InMemoryVectorIndex,
  cosineSimilarity,
  matchesFilters,
} from "../memory-store";
import { makeChunk, makeDocument } from "./helpers";

describe("matchesFilters", () => {
  const doc = makeDocument({
    id: "d1",
    type: "pdf",
    tags: ["a", "b"],
    createdAt: new Date("2024-03-01T00:00:00Z"),
  });

  it("accepts everything without filters", () => {
    expect(matchesFilters(doc, undefined)).toBe(true);
    expect(matchesFilters(doc, {})).toBe(true);
  });

  it("checks id and type membership", () => {
    expect(matchesFilters(doc, { documentIds: ["d2"] })).toBe(false);
    expect(matchesFilters(doc, { documentTypes: ["pdf", "docx"] })).toBe(true);
  });

  it("treats date bounds as inclusive", () => {
    expect(matchesFilters(doc, { dateRange: { from: new Date("2024-03-01T00:00:00Z") } })).toBe(true);
    expect(matchesFilters(doc, { dateRange: { to: new Date("2024-03-01T00:00:00Z") } })).toBe(true);
    expect(matchesFilters(doc, { dateRange: { to: new Date("2024-02-28T00:00:00Z") } })).toBe(false);
  });

  it("matches any listed tag", () => {
    expect(matchesFilters(doc, { tags: ["z", "b"] })).toBe(true);
    expect(matchesFilters(doc, { tags: ["z"] })).toBe(false);
    expect(matchesFilters(doc, { tags: [] })).toBe(true);
  });
});

describe("cosineSimilarity", () => {
  it("handles orthogonal, parallel and degenerate vectors", () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 1], [2, 2])).toBeCloseTo(1, 10);
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });
});

describe("InMemoryDocumentCatalog", () => {
  const catalog = new InMemoryDocumentCatalog([
    makeDocument({
      id: "d1",
      keywords: ["Vector", "index"],
      category: "tech-docs",
      createdAt: new Date("2024-01-01T00:00:00Z"),
    }),
    makeDocument({ id: "d3", tags: ["index"], createdAt: new Date("2024-03-01T00:00:00Z") }),
    makeDocument({
      id: "d2",
      keywords: ["vector"],
      category: "research",
      createdAt: new Date("2024-02-01T00:00:00Z"),
    }),
  ]);

  it("lists eligible documents newest first", async () => {
    const docs = await catalog.listEligible();
    expect(docs.map((d) => d.id)).toEqual(["d3", "d2", "d1"]);
  });

  it("ranks keyword matches by count, then id", async () => {
    expect(await catalog.byKeywords(["vector", "index"])).toEqual(["d1", "d2", "d3"]);
    expect(await catalog.byKeywords(["vector", "index"], 2)).toEqual(["d1", "d2"]);
    expect(await catalog.byKeywords(["missing"])).toEqual([]);
  });

  it("finds documents by category", async () => {
    expect(await catalog.byCategory(["research", "legal"])).toEqual(["d2"]);
  });

  it("returns metadata for known documents only", async () => {
    expect(await catalog.getMeta("d2")).toEqual({
      id: "d2",
      filename: "d2.md",
      author: undefined,
      title: undefined,
      category: "research",
      type: "markdown",
      createdAt: new Date("2024-02-01T00:00:00Z"),
    });
    expect(await catalog.getMeta("missing")).toBeUndefined();
  });
});

describe("InMemoryVectorIndex", () => {
  function createIndex(): InMemoryVectorIndex {
    return new InMemoryVectorIndex([
      makeChunk("c2", "d1", "second", [0, 1], 1),
      makeChunk("c1", "d1", "first", [1, 0], 0),
      makeChunk("c3", "d2", "other", [1, 1], 0),
    ]);
  }

  it("returns the nearest chunks first", async () => {
    const matches = await createIndex().query([1, 0], 2);

    expect(matches.map((m) => m.chunkId)).toEqual(["c1", "c3"]);
    expect(matches[0]?.distance).toBeCloseTo(0, 10);
  });

  it("restricts the search to the given documents", async () => {
    const index = createIndex();

    expect((await index.query([1, 0], 5, ["d2"])).map((m) => m.chunkId)).toEqual(["c3"]);
    expect(await index.query([1, 0], 5, [])).toEqual([]);
  });

  it("lists a document's chunks in order without embeddings", async () => {
    expect(await createIndex().listChunks("d1", 5)).toEqual([
      { chunkId: "c1", documentId: "d1", text: "first", chunkIndex: 0, metadata: {} },
      { chunkId: "c2", documentId: "d1", text: "second", chunkIndex: 1, metadata: {} },
    ]);
  });

  it("deletes every chunk of a document", async () => {
    const index = createIndex();

    expect(await index.delete("d1")).toBe(2);
    expect(index.size).toBe(1);
  });
});
