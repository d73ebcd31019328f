import { beforeEach, describe, expect, it, vi } from "vitest";
import type { QueryResult, QueryResultRow } from "pg";
import { PostgresService, buildFilterClause } from "../storage";
import { PgVectorIndex, toVectorLiteral } from "../vector-index";
import { silenceLogs } from "./helpers";

function rows(items: QueryResultRow[], rowCount: number = items.length): QueryResult {
  return { command: "SELECT", rowCount, oid: 0, fields: [], rows: items };
}

function createService(): PostgresService {
  return new PostgresService({
    connectionString: "postgres://test@localhost/test",
    host: "localhost",
    port: 5432,
    database: "test",
    user: "test",
    password: "test-secret",
  });
}

describe("buildFilterClause", () => {
  it("is empty without filters", () => {
    expect(buildFilterClause()).toEqual({ where: "", params: [] });
    expect(buildFilterClause({ tags: [] })).toEqual({ where: "", params: [] });
  });

  it("numbers parameters in filter order", () => {
    const from = new Date("2024-01-01T00:00:00Z");
    const to = new Date("2024-12-31T00:00:00Z");

    expect(
      buildFilterClause({
        documentIds: ["d1"],
        documentTypes: ["pdf"],
        dateRange: { from, to },
        tags: ["x"],
      })
    ).toEqual({
      where:
        "WHERE id = ANY($1) AND document_type = ANY($2) AND created_at >= $3 " +
        "AND created_at <= $4 AND tags && $5::text[]",
      params: [["d1"], ["pdf"], from, to, ["x"]],
    });
  });

  it("skips absent bounds", () => {
    const to = new Date("2024-12-31T00:00:00Z");
    expect(buildFilterClause({ dateRange: { to }, tags: ["x"] })).toEqual({
      where: "WHERE created_at <= $1 AND tags && $2::text[]",
      params: [to, ["x"]],
    });
  });
});

describe("PostgresService", () => {
  beforeEach(() => {
    silenceLogs();
  });

  it("maps catalog rows", async () => {
    const service = createService();
    const createdAt = new Date("2024-01-01T00:00:00Z");
    const query = vi.spyOn(service, "query").mockResolvedValue(
      rows([
        {
          id: "d1",
          file_name: "guide.pdf",
          title: null,
          author: null,
          document_type: "pdf",
          category: null,
          tags: null,
          content: "text",
          is_indexed: true,
          created_at: createdAt,
        },
      ])
    );

    const docs = await service.listEligible({ documentTypes: ["pdf"] });

    expect(docs).toEqual([
      {
        id: "d1",
        filename: "guide.pdf",
        isIndexed: true,
        type: "pdf",
        tags: [],
        category: undefined,
        createdAt,
        content: "text",
      },
    ]);
    expect(query.mock.calls[0]?.[0]).toContain("WHERE document_type = ANY($1)");
    expect(query.mock.calls[0]?.[1]).toEqual([["pdf"]]);
  });

  it("looks up keywords with a result limit", async () => {
    const service = createService();
    const query = vi
      .spyOn(service, "query")
      .mockResolvedValue(rows([{ id: "d2" }, { id: "d1" }]));

    expect(await service.byKeywords(["vector"], 3)).toEqual(["d2", "d1"]);
    expect(query.mock.calls[0]?.[1]).toEqual([["vector"], 3]);
  });

  it("skips the database for empty lookups", async () => {
    const service = createService();
    const query = vi.spyOn(service, "query");

    expect(await service.byKeywords([])).toEqual([]);
    expect(await service.byCategory([])).toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });
});

describe("PgVectorIndex", () => {
  beforeEach(() => {
    silenceLogs();
  });

  it("formats vectors as pgvector literals", () => {
    expect(toVectorLiteral([0.5, -1, 2])).toBe("[0.5,-1,2]");
  });

  it("queries by cosine distance within the given documents", async () => {
    const service = createService();
    const query = vi.spyOn(service, "query").mockResolvedValue(
      rows([
        {
          id: "c1",
          document_id: "d1",
          chunk_index: 0,
          content: "chunk text",
          metadata: { page: 2 },
          distance: "0.25",
        },
        {
          id: "c2",
          document_id: "d2",
          chunk_index: 3,
          content: "other text",
          metadata: "not an object",
          distance: 0.5,
        },
      ])
    );

    const matches = await new PgVectorIndex(service).query([0.5, 0.25], 4, ["d1", "d2"]);

    expect(matches).toEqual([
      {
        chunkId: "c1",
        documentId: "d1",
        text: "chunk text",
        chunkIndex: 0,
        metadata: { page: 2 },
        distance: 0.25,
      },
      {
        chunkId: "c2",
        documentId: "d2",
        text: "other text",
        chunkIndex: 3,
        metadata: {},
        distance: 0.5,
      },
    ]);
    expect(query.mock.calls[0]?.[0]).toContain("WHERE document_id = ANY($2)");
    expect(query.mock.calls[0]?.[0]).toContain("LIMIT $3");
    expect(query.mock.calls[0]?.[1]).toEqual(["[0.5,0.25]", ["d1", "d2"], 4]);
  });

  it("matches nothing for an empty document list", async () => {
    const service = createService();
    const query = vi.spyOn(service, "query");

    expect(await new PgVectorIndex(service).query([1, 0], 4, [])).toEqual([]);
    expect(query).not.toHaveBeenCalled();
  });

  it("does not query once aborted", async () => {
    const service = createService();
    const query = vi.spyOn(service, "query");
    const controller = new AbortController();
    controller.abort();

    await expect(
      new PgVectorIndex(service).query([1, 0], 4, undefined, controller.signal)
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(query).not.toHaveBeenCalled();
  });

  it("reports deleted chunk counts", async () => {
    const service = createService();
    vi.spyOn(service, "query").mockResolvedValue(rows([], 3));

    expect(await new PgVectorIndex(service).delete("d1")).toBe(3);
  });
});
