/**
 * RAG Orchestrator - one conversational turn, complete or streamed
 *
 * Turn pipeline:
 * 1. Resolve / create the conversation
 * 2. Retrieval (optional): query analysis, then three strategies merged by
 *    chunk id - vector hybrid search, keyword index lookup, category lookup -
 *    re-scored by a blend of similarity, keyword overlap, category match
 *    and recency. A failed or timed-out lookup contributes nothing; a fault
 *    in the merge itself falls back to one conservative search.
 * 3. Recent history
 * 4. Context window
 * 5. Generation (with a deadline)
 * 6. History persistence (only for a finished answer)
 * 7. Per-document sources, enriched from the catalog
 * 8. Metrics
 */

import type {
  DocumentCatalog,
  DocumentSource,
  KeywordCategoryIndex,
  QueryAnalysis,
  RetrievalContext,
  RetrievedChunk,
  StoredChunk,
  VectorIndex,
} from "./lib/types";
import type {
  ChatRequest,
  ChatResponse,
  ConversationSession,
  ConversationSummary,
  RAGMetrics,
  ResolvedChatRequest,
  StreamEvent,
} from "./lib/conversation-types";
import type { GenerationChunk, GenerationProvider, LLMMessage } from "./llm/types";
import { HybridSearchEngine } from "./hybrid-search";
import type { SearchCallOptions } from "./hybrid-search";
import { QueryAnalyzer } from "./query-analyzer";
import { ConversationStore } from "./conversation/conversation-store";
import { ContextBuilder } from "./context-builder";
import { attempt } from "./lib/result";
import { InternalError, errorMessage, isAbortError } from "./lib/errors";
import { throwIfAborted, withTimeout } from "./utils/timeout";
import { createLogger, preview } from "./utils/logger";

const log = createLogger("RAG");

const DAY_MS = 24 * 60 * 60 * 1000;
const KEYWORD_LOOKUP_DOCUMENTS = 5;
const CHUNKS_PER_LOOKUP_DOCUMENT = 2;
const UNSCORED_SIMILARITY = 0.5;

export const GENERATION_FAILED_MESSAGE =
  "Sorry, I could not generate an answer right now. Please try again later.";
export const TURN_FAILED_MESSAGE =
  "Sorry, something went wrong while processing your request.";

export interface RagOrchestratorDeps {
  search: HybridSearchEngine;
  analyzer: QueryAnalyzer;
  store: ConversationStore;
  contextBuilder: ContextBuilder;
  llm: GenerationProvider;
  catalog: DocumentCatalog;
  keywordIndex: KeywordCategoryIndex;
  vectorIndex: VectorIndex;
}

export interface RagOrchestratorOptions {
  defaultSimilarityThreshold?: number; // Default: 0.6
  fallbackResults?: number; // Default: 5
  fallbackThreshold?: number; // Default: 0.7
  generationTimeoutMs?: number; // Default: 60000
  indexTimeoutMs?: number; // Default: 10000
  clock?: () => number;
}

/** The options that may be changed while the service runs. */
export type RagRuntimeConfig = Required<Omit<RagOrchestratorOptions, "clock">>;

export interface Candidate {
  chunk: RetrievedChunk;
  similarity?: number; // Only chunks found by the vector strategy carry one
}

interface PreparedTurn {
  messages: LLMMessage[];
  retrieval?: RetrievalContext;
}

export function resolveChatRequest(
  request: ChatRequest,
  defaultSimilarityThreshold: number = 0.6
): ResolvedChatRequest {
  return {
    message: request.message,
    conversationId: request.conversationId,
    enableRetrieval: request.enableRetrieval ?? true,
    maxRetrievedChunks: request.maxRetrievedChunks ?? 5,
    similarityThreshold: request.similarityThreshold ?? defaultSimilarityThreshold,
    contextStrategy: request.contextStrategy ?? "ranked",
    promptType: request.promptType ?? "default",
    maxContextLength: request.maxContextLength ?? 4000,
    includeChatHistory: request.includeChatHistory ?? true,
    maxHistoryMessages: request.maxHistoryMessages ?? 10,
    temperature: request.temperature ?? 0.7,
    maxTokens: request.maxTokens ?? 1000,
  };
}

function metadataString(chunk: RetrievedChunk, key: string): string | undefined {
  const value = chunk.metadata[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function metadataDate(chunk: RetrievedChunk, key: string): Date | undefined {
  const value = chunk.metadata[key];
  if (value instanceof Date) return value;
  if (typeof value === "string") {
    const parsed = Date.parse(value);
    return Number.isNaN(parsed) ? undefined : new Date(parsed);
  }
  return undefined;
}

/** Share of analysed keywords that occur in the chunk text, capped at 1. */
export function keywordOverlap(text: string, keywords: string[]): number {
  if (keywords.length === 0) return 0;
  const lower = text.toLowerCase();
  const matches = keywords.filter((k) => lower.includes(k.toLowerCase())).length;
  return Math.min(matches / keywords.length, 1);
}

/** 1 for a document created now, falling linearly to 0 at one year. */
export function recencyScore(createdAt: Date | undefined, now: number): number {
  if (!createdAt) return 0;
  const ageDays = Math.floor((now - createdAt.getTime()) / DAY_MS);
  return Math.max(0, 1 - ageDays / 365);
}

/**
 * similarity × 0.4 + keywordOverlap × 0.3 + categoryMatch × 0.2 + recency × 0.1
 */
export function blendScore(
  candidate: Candidate,
  analysis: QueryAnalysis,
  now: number
): number {
  const { chunk } = candidate;
  const similarity = candidate.similarity ?? UNSCORED_SIMILARITY;
  const overlap = keywordOverlap(chunk.text, analysis.keywords);
  const category = metadataString(chunk, "category");
  const categoryMatch =
    category !== undefined && analysis.suggestedCategories.includes(category) ? 1 : 0.5;
  const recency = recencyScore(metadataDate(chunk, "createdAt"), now);

  return similarity * 0.4 + overlap * 0.3 + categoryMatch * 0.2 + recency * 0.1;
}

export class RagOrchestrator {
  private search: HybridSearchEngine;
  private analyzer: QueryAnalyzer;
  private store: ConversationStore;
  private contextBuilder: ContextBuilder;
  private llm: GenerationProvider;
  private catalog: DocumentCatalog;
  private keywordIndex: KeywordCategoryIndex;
  private vectorIndex: VectorIndex;
  private defaultSimilarityThreshold: number;
  private fallbackResults: number;
  private fallbackThreshold: number;
  private generationTimeoutMs: number;
  private indexTimeoutMs: number;
  private clock: () => number;

  constructor(deps: RagOrchestratorDeps, options: RagOrchestratorOptions = {}) {
    this.search = deps.search;
    this.analyzer = deps.analyzer;
    this.store = deps.store;
    this.contextBuilder = deps.contextBuilder;
    this.llm = deps.llm;
    this.catalog = deps.catalog;
    this.keywordIndex = deps.keywordIndex;
    this.vectorIndex = deps.vectorIndex;
    this.defaultSimilarityThreshold = options.defaultSimilarityThreshold ?? 0.6;
    this.fallbackResults = options.fallbackResults ?? 5;
    this.fallbackThreshold = options.fallbackThreshold ?? 0.7;
    this.generationTimeoutMs = options.generationTimeoutMs ?? 60000;
    this.indexTimeoutMs = options.indexTimeoutMs ?? 10000;
    this.clock = options.clock ?? Date.now;
  }

  // ==========================================================================
  // Complete mode
  // ==========================================================================

  async chat(request: ChatRequest, options: SearchCallOptions = {}): Promise<ChatResponse> {
    const start = this.clock();
    const params = resolveChatRequest(request, this.defaultSimilarityThreshold);
    const conversationId = this.store.createOrGet(params.conversationId);
    const signal = options.signal;

    log.info(`Chat turn ${conversationId}: "${preview(params.message)}"`);

    let turn: PreparedTurn;
    try {
      turn = await this.prepareTurn(params, conversationId, signal);
    } catch (error) {
      if (isAbortError(error)) throw error;
      return this.failedResponse(conversationId, start, TURN_FAILED_MESSAGE, error, "prepare");
    }

    const generation = await attempt(() =>
      withTimeout(
        (s) =>
          this.llm.generate(turn.messages, {
            temperature: params.temperature,
            maxTokens: params.maxTokens,
            signal: s,
          }),
        this.generationTimeoutMs,
        "generation",
        signal
      )
    );
    if (!generation.ok) {
      if (signal?.aborted) throw generation.error;
      return this.failedResponse(
        conversationId,
        start,
        GENERATION_FAILED_MESSAGE,
        generation.error,
        "generation",
        turn.retrieval
      );
    }

    const result = generation.value;
    this.store.addMessage(conversationId, "user", params.message);
    this.store.addMessage(conversationId, "assistant", result.text, {
      model: result.model,
      finishReason: result.finishReason,
    });

    const sources = await this.collectSources(turn.retrieval);
    const responseTimeMs = this.clock() - start;
    this.store.recordOutcome(responseTimeMs, true);

    log.info(
      `Chat turn ${conversationId} done in ${responseTimeMs}ms (${sources.length} sources, ${result.finishReason})`
    );

    return {
      success: true,
      message: result.text,
      conversationId,
      responseTimeMs,
      retrievalContext: turn.retrieval,
      sources,
      tokensUsed: result.usage,
      finishReason: result.finishReason,
      modelUsed: result.model,
      timestamp: new Date(this.clock()),
    };
  }

  // ==========================================================================
  // Streaming mode
  // ==========================================================================

  /**
   * Yields one delta per provider increment, then exactly one `done` or
   * `error` event. Stopping iteration (or aborting `options.signal`) stops
   * pulling from the provider and persists nothing.
   */
  async *streamChat(
    request: ChatRequest,
    options: SearchCallOptions = {}
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const start = this.clock();
    const params = resolveChatRequest(request, this.defaultSimilarityThreshold);
    const conversationId = this.store.createOrGet(params.conversationId);

    const controller = new AbortController();
    const onAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener("abort", onAbort, { once: true });
    }

    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;

    try {
      log.info(`Stream turn ${conversationId}: "${preview(params.message)}"`);

      let turn: PreparedTurn;
      try {
        turn = await this.prepareTurn(params, conversationId, controller.signal);
      } catch (error) {
        if (controller.signal.aborted) return;
        this.logFailure(conversationId, error, "prepare");
        this.store.recordOutcome(this.clock() - start, false);
        yield { type: "error", conversationId, errorMessage: TURN_FAILED_MESSAGE };
        return;
      }

      timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, this.generationTimeoutMs);

      let text = "";
      let completion: Extract<GenerationChunk, { type: "complete" }> | undefined;
      try {
        const stream = this.llm.generateStream(turn.messages, {
          temperature: params.temperature,
          maxTokens: params.maxTokens,
          signal: controller.signal,
        });
        for await (const chunk of stream) {
          if (controller.signal.aborted) break;
          if (chunk.type === "delta") {
            text += chunk.text;
            yield { type: "delta", conversationId, text: chunk.text };
          } else {
            completion = chunk;
          }
        }
      } catch (error) {
        if (controller.signal.aborted && !timedOut) return;
        this.logFailure(conversationId, error, "generation");
        this.store.recordOutcome(this.clock() - start, false);
        yield { type: "error", conversationId, errorMessage: GENERATION_FAILED_MESSAGE };
        return;
      }

      if (timedOut) {
        log.error(
          `Stream turn ${conversationId} failed (stage: generation): timed out after ${this.generationTimeoutMs}ms`
        );
        this.store.recordOutcome(this.clock() - start, false);
        yield { type: "error", conversationId, errorMessage: GENERATION_FAILED_MESSAGE };
        return;
      }
      if (controller.signal.aborted) return;

      this.store.addMessage(conversationId, "user", params.message);
      this.store.addMessage(conversationId, "assistant", text, {
        model: completion?.model ?? this.llm.model,
        finishReason: completion?.finishReason ?? "unknown",
      });

      const sources = await this.collectSources(turn.retrieval);
      const responseTimeMs = this.clock() - start;
      this.store.recordOutcome(responseTimeMs, true);

      yield {
        type: "done",
        conversationId,
        finishReason: completion?.finishReason ?? "unknown",
        tokensUsed: completion?.usage,
        sources,
        retrievalContext: turn.retrieval,
        responseTimeMs,
      };
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener("abort", onAbort);
      // Releases anything still bound to the turn when the consumer stops early
      controller.abort();
    }
  }

  // ==========================================================================
  // Conversation proxies
  // ==========================================================================

  getConversation(conversationId: string): ConversationSession | undefined {
    return this.store.getConversation(conversationId);
  }

  clearConversation(conversationId: string): boolean {
    return this.store.clear(conversationId);
  }

  listConversations(limit?: number): ConversationSummary[] {
    return this.store.listConversations(limit);
  }

  getMetrics(): RAGMetrics {
    return this.store.getMetrics();
  }

  // ==========================================================================
  // Runtime configuration
  // ==========================================================================

  getConfig(): RagRuntimeConfig {
    return {
      defaultSimilarityThreshold: this.defaultSimilarityThreshold,
      fallbackResults: this.fallbackResults,
      fallbackThreshold: this.fallbackThreshold,
      generationTimeoutMs: this.generationTimeoutMs,
      indexTimeoutMs: this.indexTimeoutMs,
    };
  }

  /** Fields left out keep their current value. */
  updateConfig(update: Partial<RagRuntimeConfig>): RagRuntimeConfig {
    this.defaultSimilarityThreshold =
      update.defaultSimilarityThreshold ?? this.defaultSimilarityThreshold;
    this.fallbackResults = update.fallbackResults ?? this.fallbackResults;
    this.fallbackThreshold = update.fallbackThreshold ?? this.fallbackThreshold;
    this.generationTimeoutMs = update.generationTimeoutMs ?? this.generationTimeoutMs;
    this.indexTimeoutMs = update.indexTimeoutMs ?? this.indexTimeoutMs;

    const config = this.getConfig();
    log.info(`Runtime config updated: ${JSON.stringify(config)}`);
    return config;
  }

  resetMetrics(): void {
    this.store.resetMetrics();
  }

  // ==========================================================================
  // Turn preparation (steps 2-4)
  // ==========================================================================

  private async prepareTurn(
    params: ResolvedChatRequest,
    conversationId: string,
    signal?: AbortSignal
  ): Promise<PreparedTurn> {
    const retrieval = params.enableRetrieval
      ? await this.retrieve(params, signal)
      : undefined;
    throwIfAborted(signal);

    const history = params.includeChatHistory
      ? this.store.getRecent(conversationId, params.maxHistoryMessages)
      : [];

    try {
      const window = this.contextBuilder.build({
        query: params.message,
        retrieval,
        history,
        strategy: params.contextStrategy,
        promptType: params.promptType,
        maxContextLength: params.maxContextLength,
        maxHistoryMessages: params.maxHistoryMessages,
      });
      return { messages: this.contextBuilder.toMessages(window), retrieval };
    } catch (error) {
      throw new InternalError(`Context build failed: ${errorMessage(error)}`, "context", error);
    }
  }

  private async retrieve(
    params: ResolvedChatRequest,
    signal?: AbortSignal
  ): Promise<RetrievalContext | undefined> {
    const analysis = await this.analyzer.analyze(params.message, { signal });
    throwIfAborted(signal);

    const multi = await attempt(() => this.multiStrategyRetrieve(params, analysis, signal));
    if (multi.ok) return multi.value;
    if (isAbortError(multi.error) || signal?.aborted) throw multi.error;

    log.warn(
      `Multi-strategy retrieval failed (query: "${preview(params.message)}", stage: retrieval), using fallback search: ${multi.error.message}`
    );
    const fallback = await this.search.search(
      {
        query: params.message,
        nResults: this.fallbackResults,
        similarityThreshold: this.fallbackThreshold,
      },
      { signal }
    );
    if (!fallback.success) {
      log.warn(`Fallback search failed: ${fallback.error}`);
      return undefined;
    }
    return { ...fallback.context, queryAnalysis: analysis };
  }

  private async multiStrategyRetrieve(
    params: ResolvedChatRequest,
    analysis: QueryAnalysis,
    signal?: AbortSignal
  ): Promise<RetrievalContext> {
    const start = this.clock();
    const candidates: Candidate[] = [];

    // Vector hybrid search with the analyser's suggested depth
    const vector = await this.search.search(
      {
        query: params.message,
        nResults: analysis.suggestedRetrievalCount,
        similarityThreshold: params.similarityThreshold,
      },
      { signal }
    );
    if (vector.success) {
      for (const chunk of vector.context.chunks) {
        candidates.push({ chunk, similarity: chunk.score });
      }
    } else {
      log.warn(`Vector strategy returned no results: ${vector.error}`);
    }
    throwIfAborted(signal);

    if (analysis.keywords.length > 0) {
      const chunks = await this.lookup(
        "keyword-index",
        () => this.keywordIndex.byKeywords(analysis.keywords, KEYWORD_LOOKUP_DOCUMENTS),
        signal
      );
      for (const chunk of chunks) {
        candidates.push({ chunk });
      }
    }

    if (analysis.suggestedCategories.length > 0) {
      const chunks = await this.lookup(
        "category-index",
        () => this.keywordIndex.byCategory(analysis.suggestedCategories),
        signal
      );
      for (const chunk of chunks) {
        candidates.push({ chunk });
      }
    }

    // First occurrence wins: vector results keep their similarity
    const merged = new Map<string, Candidate>();
    for (const candidate of candidates) {
      if (!merged.has(candidate.chunk.id)) merged.set(candidate.chunk.id, candidate);
    }

    const now = this.clock();
    const limit = Math.min(analysis.suggestedRetrievalCount, params.maxRetrievedChunks);
    const chunks = [...merged.values()]
      .map(
        (candidate): RetrievedChunk => ({
          ...candidate.chunk,
          score: blendScore(candidate, analysis, now),
        })
      )
      .sort((a, b) => b.score - a.score)
      .slice(0, limit);

    log.debug(
      `Multi-strategy retrieval: ${candidates.length} candidates, ${merged.size} unique, kept ${chunks.length}`
    );

    return {
      query: params.message,
      chunks,
      totalFound: merged.size,
      elapsedTime: this.clock() - start,
      contextLength: chunks.reduce((sum, c) => sum + c.text.length, 0),
      sources: chunks.map((chunk) => ({
        documentId: chunk.documentId,
        filename: metadataString(chunk, "filename") ?? "unknown",
        chunkId: chunk.id,
        relevanceScore: chunk.score,
        contentPreview: chunk.text.slice(0, 100),
      })),
      queryAnalysis: analysis,
    };
  }

  /**
   * One index-lookup strategy under the index deadline. A failure or timeout
   * leaves that strategy empty; only the caller's abort propagates.
   */
  private async lookup(
    label: string,
    findDocuments: () => Promise<string[]>,
    signal?: AbortSignal
  ): Promise<RetrievedChunk[]> {
    const result = await attempt(() =>
      withTimeout(
        async () => this.chunksForDocuments(await findDocuments()),
        this.indexTimeoutMs,
        label,
        signal
      )
    );
    throwIfAborted(signal);
    if (!result.ok) {
      log.warn(`Lookup strategy ${label} skipped (stage: retrieval): ${result.error.message}`);
      return [];
    }
    return result.value;
  }

  /** Up to two stored chunks per document, tagged with catalog metadata. */
  private async chunksForDocuments(documentIds: string[]): Promise<RetrievedChunk[]> {
    const perDocument = await Promise.all(
      documentIds.map(async (documentId) => {
        const [stored, meta] = await Promise.all([
          this.vectorIndex.listChunks(documentId, CHUNKS_PER_LOOKUP_DOCUMENT),
          this.catalog.getMeta(documentId),
        ]);
        return stored.map(
          (chunk: StoredChunk): RetrievedChunk => ({
            id: chunk.chunkId,
            documentId: chunk.documentId,
            text: chunk.text,
            score: UNSCORED_SIMILARITY,
            searchType: "keyword",
            metadata: {
              ...chunk.metadata,
              filename: meta?.filename ?? chunk.metadata.filename,
              category: meta?.category ?? chunk.metadata.category,
              createdAt: meta?.createdAt?.toISOString() ?? chunk.metadata.createdAt,
            },
          })
        );
      })
    );
    return perDocument.flat();
  }

  // ==========================================================================
  // Sources (step 7)
  // ==========================================================================

  private async collectSources(retrieval?: RetrievalContext): Promise<DocumentSource[]> {
    if (!retrieval || retrieval.chunks.length === 0) return [];

    const best = new Map<string, RetrievedChunk>();
    for (const chunk of retrieval.chunks) {
      const current = best.get(chunk.documentId);
      if (!current || chunk.score > current.score) best.set(chunk.documentId, chunk);
    }

    const sources = await Promise.all(
      [...best.values()].map(async (chunk): Promise<DocumentSource> => {
        const source: DocumentSource = {
          documentId: chunk.documentId,
          filename: metadataString(chunk, "filename") ?? "unknown",
          chunkId: chunk.id,
          relevanceScore: chunk.score,
          contentPreview: chunk.text.slice(0, 100),
          category: metadataString(chunk, "category"),
          createdAt: metadataDate(chunk, "createdAt"),
        };

        const meta = await attempt(() =>
          withTimeout(
            () => this.catalog.getMeta(chunk.documentId),
            this.indexTimeoutMs,
            "catalog"
          )
        );
        if (!meta.ok) {
          log.warn(`Metadata lookup failed for ${chunk.documentId}: ${meta.error.message}`);
          return source;
        }
        if (!meta.value) return source;

        return {
          ...source,
          filename: meta.value.filename,
          title: meta.value.title,
          author: meta.value.author,
          category: meta.value.category ?? source.category,
          documentType: meta.value.type,
          createdAt: meta.value.createdAt ?? source.createdAt,
        };
      })
    );

    return sources.sort((a, b) => b.relevanceScore - a.relevanceScore);
  }

  // ==========================================================================
  // Failures
  // ==========================================================================

  private logFailure(conversationId: string, error: unknown, stage: string): void {
    log.error(`Turn ${conversationId} failed (stage: ${stage}): ${errorMessage(error)}`);
  }

  private failedResponse(
    conversationId: string,
    start: number,
    message: string,
    error: unknown,
    stage: string,
    retrieval?: RetrievalContext
  ): ChatResponse {
    this.logFailure(conversationId, error, stage);
    const responseTimeMs = this.clock() - start;
    this.store.recordOutcome(responseTimeMs, false);

    return {
      success: false,
      message,
      conversationId,
      responseTimeMs,
      retrievalContext: retrieval,
      sources: [],
      errorMessage: errorMessage(error),
      timestamp: new Date(this.clock()),
    };
  }
}
