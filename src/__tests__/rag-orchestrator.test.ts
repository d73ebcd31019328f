import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  GENERATION_FAILED_MESSAGE,
  RagOrchestrator,
  blendScore,
  keywordOverlap,
  recencyScore,
  resolveChatRequest,
} from "../rag-orchestrator";
import { HybridSearchEngine } from "../hybrid-search";
import { QueryAnalyzer, defaultAnalysis } from "../query-analyzer";
import { ConversationStore } from "../conversation/conversation-store";
import { ANALYSIS_SYSTEM_PROMPT, ContextBuilder } from "../context-builder";
import { InMemoryDocumentCatalog, InMemoryVectorIndex } from "../memory-store";
import type { StreamEvent } from "../lib/conversation-types";
import {
  FakeEmbedder,
  FakeLLM,
  makeChunk,
  makeDocument,
  silenceLogs,
  vectorAtSimilarity,
} from "./helpers";

const NOW = Date.UTC(2024, 6, 1);
const DAY = 24 * 60 * 60 * 1000;
const QUESTION = "What is retrieval?";

interface Fixture {
  orchestrator: RagOrchestrator;
  store: ConversationStore;
  catalog: InMemoryDocumentCatalog;
  search: HybridSearchEngine;
  embedder: FakeEmbedder;
  llm: FakeLLM;
}

interface FixtureOptions {
  analyzer?: QueryAnalyzer;
  indexTimeoutMs?: number;
}

function createFixture(llm: FakeLLM = new FakeLLM(), options: FixtureOptions = {}): Fixture {
  const catalog = new InMemoryDocumentCatalog([
    makeDocument({
      id: "d1",
      filename: "rag.md",
      title: "RAG notes",
      author: "Test Author",
      category: "research",
      keywords: ["retrieval"],
      createdAt: new Date(NOW),
    }),
  ]);
  const vectorIndex = new InMemoryVectorIndex([
    makeChunk("c1", "d1", "Retrieval grounds generated answers in documents.", vectorAtSimilarity(0.9), 0),
    makeChunk("c2", "d1", "Unrelated appendix text.", [0, 1], 1),
  ]);
  const embedder = new FakeEmbedder();
  const clock = () => NOW;
  const store = new ConversationStore({ clock });
  const search = new HybridSearchEngine({ catalog, vectorIndex, embedder, clock });

  const orchestrator = new RagOrchestrator(
    {
      search,
      analyzer: options.analyzer ?? new QueryAnalyzer(),
      store,
      contextBuilder: new ContextBuilder("You answer from documents."),
      llm,
      catalog,
      keywordIndex: catalog,
      vectorIndex,
    },
    { clock, indexTimeoutMs: options.indexTimeoutMs }
  );
  return { orchestrator, store, catalog, search, embedder, llm };
}

async function collect(stream: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of stream) {
    events.push(event);
  }
  return events;
}

describe("scoring helpers", () => {
  it("resolves chat defaults", () => {
    expect(resolveChatRequest({ message: "hi" })).toEqual({
      message: "hi",
      conversationId: undefined,
      enableRetrieval: true,
      maxRetrievedChunks: 5,
      similarityThreshold: 0.6,
      contextStrategy: "ranked",
      promptType: "default",
      maxContextLength: 4000,
      includeChatHistory: true,
      maxHistoryMessages: 10,
      temperature: 0.7,
      maxTokens: 1000,
    });
  });

  it("measures the share of keywords present in the text", () => {
    expect(keywordOverlap("Vector search", ["vector", "cache"])).toBe(0.5);
    expect(keywordOverlap("Vector search", [])).toBe(0);
  });

  it("decays recency linearly over a year", () => {
    expect(recencyScore(undefined, NOW)).toBe(0);
    expect(recencyScore(new Date(NOW - 73 * DAY), NOW)).toBeCloseTo(0.8, 10);
    expect(recencyScore(new Date(NOW - 400 * DAY), NOW)).toBe(0);
  });

  it("blends similarity, overlap, category and recency", () => {
    const analysis = {
      ...defaultAnalysis("vector"),
      keywords: ["vector"],
      suggestedCategories: ["research"],
    };
    const chunk = {
      id: "c1",
      documentId: "d1",
      text: "vector index",
      score: 0,
      searchType: "keyword" as const,
      metadata: { category: "research", createdAt: new Date(NOW).toISOString() },
    };

    // 0.5 × 0.4 + 1 × 0.3 + 1 × 0.2 + 1 × 0.1
    expect(blendScore({ chunk }, analysis, NOW)).toBeCloseTo(0.8, 10);
    // 0.9 × 0.4 + 1 × 0.3 + 0.5 × 0.2 + 0 × 0.1
    expect(
      blendScore({ chunk: { ...chunk, metadata: {} }, similarity: 0.9 }, analysis, NOW)
    ).toBeCloseTo(0.76, 10);
  });
});

describe("RagOrchestrator.chat", () => {
  beforeEach(() => {
    silenceLogs();
  });

  it("answers from merged retrieval and persists the turn", async () => {
    const { orchestrator, llm } = createFixture();

    const response = await orchestrator.chat({ message: QUESTION, conversationId: "c-1" });

    expect(response.success).toBe(true);
    expect(response.message).toBe("Retrieval-augmented generation grounds answers in documents.");
    expect(llm.generateCalls).toHaveLength(1);
    expect(response.finishReason).toBe("stop");
    expect(response.modelUsed).toBe("fake-model");

    const chunks = response.retrievalContext?.chunks ?? [];
    expect(chunks.map((c) => c.id)).toEqual(["c1", "c2"]);
    // vector hit: 0.9 × 0.4 + 1 × 0.3 + 0.5 × 0.2 + 1 × 0.1
    expect(chunks[0]?.score).toBeCloseTo(0.86, 6);
    // keyword-index hit: 0.5 × 0.4 + 0 + 0.5 × 0.2 + 1 × 0.1
    expect(chunks[1]?.score).toBeCloseTo(0.4, 6);
    expect(response.retrievalContext?.totalFound).toBe(2);

    expect(response.sources).toHaveLength(1);
    expect(response.sources[0]).toMatchObject({
      documentId: "d1",
      filename: "rag.md",
      chunkId: "c1",
      title: "RAG notes",
      author: "Test Author",
      category: "research",
      documentType: "markdown",
      createdAt: new Date(NOW),
    });

    const prompt = llm.generateCalls[0]?.[1]?.content ?? "";
    expect(prompt).toContain("[Document 1] Source: rag.md\nRelevance: 0.860\n");
    expect(prompt).toContain(`User question: ${QUESTION}`);

    const messages = orchestrator.getConversation("c-1")?.messages ?? [];
    expect(messages.map((m) => [m.role, m.content])).toEqual([
      ["user", QUESTION],
      ["assistant", "Retrieval-augmented generation grounds answers in documents."],
    ]);
    expect(messages[1]?.metadata).toEqual({ model: "fake-model", finishReason: "stop" });
    expect(orchestrator.getMetrics()).toEqual({
      totalRequests: 1,
      successfulRequests: 1,
      failedRequests: 0,
      averageResponseTimeMs: 0,
    });
  });

  it("sends earlier turns as history", async () => {
    const { orchestrator, llm } = createFixture();

    await orchestrator.chat({ message: QUESTION, conversationId: "c-1" });
    await orchestrator.chat({ message: "Tell me more", conversationId: "c-1" });

    expect(llm.generateCalls[1]?.[1]?.content).toContain(
      `Conversation history:\nuser: ${QUESTION}\nassistant: Retrieval-augmented generation grounds answers in documents.`
    );
  });

  it("sends the system prompt for the requested prompt type", async () => {
    const { orchestrator, llm } = createFixture();

    await orchestrator.chat({ message: QUESTION });
    await orchestrator.chat({ message: QUESTION, promptType: "analysis" });

    expect(llm.generateCalls.map((messages) => messages[0]?.content)).toEqual([
      "You answer from documents.",
      ANALYSIS_SYSTEM_PROMPT,
    ]);
  });

  it("skips retrieval when disabled", async () => {
    const { orchestrator, embedder } = createFixture();

    const response = await orchestrator.chat({ message: QUESTION, enableRetrieval: false });

    expect(response.success).toBe(true);
    expect(response.retrievalContext).toBeUndefined();
    expect(response.sources).toEqual([]);
    expect(embedder.calls).toBe(0);
  });

  it("reports a generation failure without persisting the turn", async () => {
    const { orchestrator } = createFixture(
      new FakeLLM({ generateError: new Error("model offline") })
    );

    const response = await orchestrator.chat({ message: QUESTION, conversationId: "c-1" });

    expect(response).toMatchObject({
      success: false,
      message: GENERATION_FAILED_MESSAGE,
      errorMessage: "model offline",
      sources: [],
    });
    expect(orchestrator.getConversation("c-1")?.messages).toEqual([]);
    expect(orchestrator.getMetrics()).toMatchObject({ totalRequests: 1, failedRequests: 1 });
  });

  it("keeps the vector results when the keyword index fails", async () => {
    const { orchestrator, catalog } = createFixture();
    vi.spyOn(catalog, "byKeywords").mockRejectedValue(new Error("index down"));

    const response = await orchestrator.chat({ message: QUESTION });

    const chunks = response.retrievalContext?.chunks ?? [];
    expect(response.success).toBe(true);
    expect(chunks.map((c) => c.id)).toEqual(["c1"]);
    // Blended, so the multi-strategy path produced it: 0.9 × 0.4 + 0.3 + 0.1 + 0.1
    expect(chunks[0]?.score).toBeCloseTo(0.86, 6);
    expect(response.retrievalContext?.totalFound).toBe(1);
    expect(response.retrievalContext?.queryAnalysis?.keywords).toEqual(["retrieval"]);
  });

  it("gives up on a keyword index that does not answer in time", async () => {
    const { orchestrator, catalog } = createFixture(new FakeLLM(), { indexTimeoutMs: 20 });
    vi.spyOn(catalog, "byKeywords").mockReturnValue(new Promise<string[]>(() => undefined));

    const response = await orchestrator.chat({ message: QUESTION });

    expect(response.success).toBe(true);
    expect(response.retrievalContext?.chunks.map((c) => c.id)).toEqual(["c1"]);
  });

  it("builds sources from chunk metadata when the catalog does not answer in time", async () => {
    const { orchestrator, catalog } = createFixture(new FakeLLM(), { indexTimeoutMs: 20 });
    vi.spyOn(catalog, "getMeta").mockReturnValue(
      new Promise<undefined>(() => undefined)
    );

    const response = await orchestrator.chat({ message: QUESTION });

    expect(response.success).toBe(true);
    expect(response.retrievalContext?.chunks.map((c) => c.id)).toEqual(["c1"]);
    expect(response.sources.map((s) => [s.documentId, s.chunkId, s.title])).toEqual([
      ["d1", "c1", undefined],
    ]);
  });

  it("falls back to a conservative search when the multi-strategy pass throws", async () => {
    const { orchestrator, search } = createFixture();
    const spy = vi.spyOn(search, "search").mockRejectedValueOnce(new Error("engine down"));

    const response = await orchestrator.chat({ message: QUESTION });

    const chunks = response.retrievalContext?.chunks ?? [];
    expect(spy).toHaveBeenCalledTimes(2);
    expect(spy.mock.calls[1]?.[0]).toEqual({
      query: QUESTION,
      nResults: 5,
      similarityThreshold: 0.7,
    });
    expect(chunks.map((c) => c.id)).toEqual(["c1"]);
    expect(chunks[0]?.score).toBeCloseTo(0.9, 6);
    expect(response.retrievalContext?.queryAnalysis?.keywords).toEqual(["retrieval"]);
  });

  it("answers without documents when every retrieval path fails", async () => {
    const { orchestrator, catalog } = createFixture();
    vi.spyOn(catalog, "byKeywords").mockRejectedValue(new Error("index down"));
    vi.spyOn(catalog, "listEligible").mockRejectedValue(new Error("catalog down"));

    const response = await orchestrator.chat({ message: QUESTION });

    expect(response.success).toBe(true);
    expect(response.retrievalContext?.chunks).toEqual([]);
    expect(response.sources).toEqual([]);
  });

  it("answers from the lexical analysis when the analyser model does not answer in time", async () => {
    const analyzer = new QueryAnalyzer({ llm: new FakeLLM({ hang: true }), timeoutMs: 20 });
    const { orchestrator, llm } = createFixture(new FakeLLM(), { analyzer });

    const response = await orchestrator.chat({ message: QUESTION });

    expect(response.success).toBe(true);
    expect(llm.generateCalls).toHaveLength(1);
    expect(response.retrievalContext?.queryAnalysis).toEqual(analyzer.analyzeBasic(QUESTION));
  });

  it("rethrows when the caller aborts", async () => {
    const { orchestrator } = createFixture();
    const controller = new AbortController();
    controller.abort();

    await expect(
      orchestrator.chat({ message: QUESTION }, { signal: controller.signal })
    ).rejects.toMatchObject({ name: "AbortError" });
    expect(orchestrator.getMetrics().totalRequests).toBe(0);
  });
});

describe("RagOrchestrator runtime config", () => {
  beforeEach(() => {
    silenceLogs();
  });

  it("reports the defaults", () => {
    const { orchestrator } = createFixture();

    expect(orchestrator.getConfig()).toEqual({
      defaultSimilarityThreshold: 0.6,
      fallbackResults: 5,
      fallbackThreshold: 0.7,
      generationTimeoutMs: 60000,
      indexTimeoutMs: 10000,
    });
  });

  it("applies updates to later turns and keeps fields left out", async () => {
    const { orchestrator, search } = createFixture();
    const spy = vi.spyOn(search, "search").mockRejectedValueOnce(new Error("engine down"));

    const config = orchestrator.updateConfig({
      defaultSimilarityThreshold: 0.5,
      fallbackResults: 2,
      fallbackThreshold: 0.4,
    });
    await orchestrator.chat({ message: QUESTION });

    expect(config).toEqual({
      defaultSimilarityThreshold: 0.5,
      fallbackResults: 2,
      fallbackThreshold: 0.4,
      generationTimeoutMs: 60000,
      indexTimeoutMs: 10000,
    });
    expect(spy.mock.calls[0]?.[0]).toMatchObject({ similarityThreshold: 0.5 });
    expect(spy.mock.calls[1]?.[0]).toEqual({
      query: QUESTION,
      nResults: 2,
      similarityThreshold: 0.4,
    });
  });
});

describe("RagOrchestrator.streamChat", () => {
  beforeEach(() => {
    silenceLogs();
  });

  it("yields deltas then one done event", async () => {
    const { orchestrator } = createFixture();

    const events = await collect(orchestrator.streamChat({ message: QUESTION, conversationId: "s-1" }));

    expect(events.map((e) => e.type)).toEqual(["delta", "delta", "done"]);
    expect(events.slice(0, 2)).toEqual([
      { type: "delta", conversationId: "s-1", text: "Hello" },
      { type: "delta", conversationId: "s-1", text: " world" },
    ]);
    const done = events[2];
    expect(done?.type === "done" ? done.finishReason : undefined).toBe("stop");
    expect(done?.type === "done" ? done.sources.map((s) => s.documentId) : []).toEqual(["d1"]);
    expect(done?.type === "done" ? done.tokensUsed : undefined).toEqual({
      promptTokens: 10,
      completionTokens: 2,
      totalTokens: 12,
    });

    const messages = orchestrator.getConversation("s-1")?.messages ?? [];
    expect(messages.map((m) => m.content)).toEqual([QUESTION, "Hello world"]);
    expect(orchestrator.getMetrics().successfulRequests).toBe(1);
  });

  it("streams past an analyser model that does not answer in time", async () => {
    const analyzer = new QueryAnalyzer({ llm: new FakeLLM({ hang: true }), timeoutMs: 20 });
    const { orchestrator } = createFixture(new FakeLLM(), { analyzer });

    const events = await collect(orchestrator.streamChat({ message: QUESTION, conversationId: "s-1" }));

    expect(events.map((e) => e.type)).toEqual(["delta", "delta", "done"]);
  });

  it("stops pulling from the provider when the consumer stops", async () => {
    const llm = new FakeLLM();
    const { orchestrator } = createFixture(llm);

    const events: StreamEvent[] = [];
    for await (const event of orchestrator.streamChat({ message: QUESTION, conversationId: "s-1" })) {
      events.push(event);
      break;
    }

    expect(events).toEqual([{ type: "delta", conversationId: "s-1", text: "Hello" }]);
    expect(llm.pulls).toBe(1);
    expect(llm.streamClosed).toBe(true);
    expect(orchestrator.getConversation("s-1")?.messages).toEqual([]);
    expect(orchestrator.getMetrics().totalRequests).toBe(0);
  });

  it("ends with one error event when the provider fails mid-stream", async () => {
    const { orchestrator } = createFixture(new FakeLLM({ streamErrorAt: 1 }));

    const events = await collect(orchestrator.streamChat({ message: QUESTION, conversationId: "s-1" }));

    expect(events).toEqual([
      { type: "delta", conversationId: "s-1", text: "Hello" },
      { type: "error", conversationId: "s-1", errorMessage: GENERATION_FAILED_MESSAGE },
    ]);
    expect(orchestrator.getConversation("s-1")?.messages).toEqual([]);
    expect(orchestrator.getMetrics()).toMatchObject({ totalRequests: 1, failedRequests: 1 });
  });

  it("ends quietly when the caller aborts", async () => {
    const llm = new FakeLLM();
    const { orchestrator } = createFixture(llm);
    const controller = new AbortController();

    const events: StreamEvent[] = [];
    for await (const event of orchestrator.streamChat(
      { message: QUESTION, conversationId: "s-1" },
      { signal: controller.signal }
    )) {
      events.push(event);
      controller.abort();
    }

    expect(events.map((e) => e.type)).toEqual(["delta"]);
    expect(llm.streamClosed).toBe(true);
    expect(orchestrator.getConversation("s-1")?.messages).toEqual([]);
    expect(orchestrator.getMetrics().totalRequests).toBe(0);
  });
});
