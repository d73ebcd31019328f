/**
 * Hybrid Search Engine - Semantic + Keyword Retrieval
 *
 * Combines vector similarity and lexical keyword scoring over the indexed
 * document corpus.
 *
 * Pipeline:
 * 1. Cache lookup (normalized query + parameters)
 * 2. Candidate documents: catalog filters ∩ indexed documents
 * 3. Semantic pass: one query embedding, 2×n nearest chunks, similarity = 1 - distance
 * 4. Keyword pass: stopword-filtered terms, per-document score, up to 3 snippets
 * 5. Fusion: chunks found by both passes get semantic×w_s + keyword×w_k
 * 6. Threshold filter, dedup, rank, truncate to n
 * 7. Highlighting, catalog metadata, cache store
 *
 * Semantic and keyword passes run concurrently. An embedding or index
 * failure empties the semantic pass instead of failing the search.
 */

import * as crypto from "crypto";
import PQueue from "p-queue";
import type {
  BatchSearchResult,
  CatalogDocument,
  DocumentCatalog,
  DocumentSource,
  RetrievalContext,
  RetrievedChunk,
  SearchFilters,
  SearchOutcome,
  SearchRequest,
  SearchStatistics,
  SearchStrategy,
  ThresholdPolicy,
  VectorIndex,
} from "./lib/types";
import type { EmbeddingProvider } from "./llm/types";
import { SearchCache, buildCacheKey } from "./search-cache";
import { SearchStatsTracker } from "./search-stats";
import {
  TermFrequencyScorer,
  findSnippets,
  highlight,
  tokenizeQuery,
} from "./keyword-scorer";
import type { KeywordScorer } from "./keyword-scorer";
import { attempt } from "./lib/result";
import { ValidationError, errorMessage, isAbortError } from "./lib/errors";
import { throwIfAborted, withTimeout } from "./utils/timeout";
import { createLogger, preview } from "./utils/logger";

const log = createLogger("HybridSearch");

export const MAX_BATCH_QUERIES = 50;
const MAX_SNIPPETS_PER_DOCUMENT = 3;
const WEIGHT_TOLERANCE = 0.01;

export interface HybridSearchConfig {
  catalog: DocumentCatalog;
  vectorIndex: VectorIndex;
  embedder: EmbeddingProvider;
  cache?: SearchCache;
  scorer?: KeywordScorer;
  thresholdPolicy?: ThresholdPolicy; // Default: global
  embeddingTimeoutMs?: number; // Default: 10000
  indexTimeoutMs?: number; // Default: 10000
  batchConcurrency?: number; // Default: 5
  clock?: () => number;
}

export interface SearchCallOptions {
  signal?: AbortSignal;
}

type ResolvedRequest = Required<Omit<SearchRequest, "filters" | "mode">> & {
  filters?: SearchFilters;
  semanticEnabled: boolean;
  keywordEnabled: boolean;
};

export function resolveRequest(request: SearchRequest): ResolvedRequest {
  const mode = request.mode ?? "hybrid";
  return {
    query: request.query,
    nResults: request.nResults ?? 10,
    similarityThreshold: request.similarityThreshold ?? 0.7,
    filters: request.filters,
    keywordWeight: request.keywordWeight ?? 0.3,
    semanticWeight: request.semanticWeight ?? 0.7,
    deduplicate: request.deduplicate ?? true,
    highlight: request.highlight ?? true,
    includeMetadata: request.includeMetadata ?? true,
    useCache: request.useCache ?? true,
    semanticEnabled: mode === "semantic" || mode === "hybrid",
    keywordEnabled: mode === "keyword" || mode === "hybrid",
  };
}

/**
 * Rejects a request before any retrieval work starts.
 */
export function validateRequest(request: ResolvedRequest): void {
  if (!request.query.trim()) {
    throw new ValidationError("Query must not be empty", "query");
  }
  if (!Number.isInteger(request.nResults) || request.nResults < 1 || request.nResults > 100) {
    throw new ValidationError("nResults must be an integer between 1 and 100", "nResults");
  }
  if (request.similarityThreshold < 0 || request.similarityThreshold > 1) {
    throw new ValidationError(
      "similarityThreshold must be between 0 and 1",
      "similarityThreshold"
    );
  }
  for (const field of ["keywordWeight", "semanticWeight"] as const) {
    const weight = request[field];
    if (weight < 0 || weight > 1) {
      throw new ValidationError(`${field} must be between 0 and 1`, field);
    }
  }
  if (request.semanticEnabled && request.keywordEnabled) {
    const sum = request.keywordWeight + request.semanticWeight;
    if (Math.abs(sum - 1) > WEIGHT_TOLERANCE) {
      throw new ValidationError(
        `keywordWeight + semanticWeight must equal 1.0 (got ${sum.toFixed(3)})`,
        "keywordWeight"
      );
    }
  }
}

function identityKey(chunk: RetrievedChunk): string {
  const prefixHash = crypto
    .createHash("md5")
    .update(chunk.text.slice(0, 100))
    .digest("hex");
  return `${chunk.documentId}:${prefixHash}`;
}

/**
 * Groups by (documentId, text prefix). A group holding results from both
 * passes becomes one hybrid result; otherwise its first entry keeps its own score.
 */
export function fuseResults(
  semantic: RetrievedChunk[],
  keyword: RetrievedChunk[],
  semanticWeight: number,
  keywordWeight: number
): RetrievedChunk[] {
  const groups = new Map<string, RetrievedChunk[]>();
  for (const chunk of [...semantic, ...keyword]) {
    const key = identityKey(chunk);
    const group = groups.get(key);
    if (group) {
      group.push(chunk);
    } else {
      groups.set(key, [chunk]);
    }
  }

  const fused: RetrievedChunk[] = [];
  for (const group of groups.values()) {
    const semanticHit = group.find((c) => c.searchType === "semantic");
    const keywordHit = group.find((c) => c.searchType === "keyword");

    if (semanticHit && keywordHit) {
      const semanticScore = semanticHit.semanticScore ?? semanticHit.score;
      const keywordScore = keywordHit.keywordScore ?? keywordHit.score;
      fused.push({
        ...semanticHit,
        score: semanticScore * semanticWeight + keywordScore * keywordWeight,
        searchType: "hybrid",
        semanticScore,
        keywordScore,
        matchedKeywords: keywordHit.matchedKeywords,
      });
    } else {
      const [first] = group;
      if (first) fused.push(first);
    }
  }
  return fused;
}

/** Keeps the first result for each distinct 100-character text prefix. */
export function deduplicate(chunks: RetrievedChunk[]): RetrievedChunk[] {
  const seen = new Set<string>();
  const result: RetrievedChunk[] = [];
  for (const chunk of chunks) {
    const key = chunk.text.slice(0, 100).trim();
    if (!seen.has(key)) {
      seen.add(key);
      result.push(chunk);
    }
  }
  return result;
}

/** Descending score; ties go to the higher semantic score, then the lower chunk id. */
export function rankResults(chunks: RetrievedChunk[]): RetrievedChunk[] {
  return [...chunks].sort(
    (a, b) =>
      b.score - a.score ||
      (b.semanticScore ?? 0) - (a.semanticScore ?? 0) ||
      (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)
  );
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

export class HybridSearchEngine {
  private catalog: DocumentCatalog;
  private vectorIndex: VectorIndex;
  private embedder: EmbeddingProvider;
  private cache: SearchCache;
  private scorer: KeywordScorer;
  private thresholdPolicy: ThresholdPolicy;
  private embeddingTimeoutMs: number;
  private indexTimeoutMs: number;
  private batchConcurrency: number;
  private clock: () => number;
  private stats: SearchStatsTracker;

  constructor(config: HybridSearchConfig) {
    this.catalog = config.catalog;
    this.vectorIndex = config.vectorIndex;
    this.embedder = config.embedder;
    this.clock = config.clock ?? Date.now;
    this.cache = config.cache ?? new SearchCache({ clock: this.clock });
    this.scorer = config.scorer ?? new TermFrequencyScorer();
    this.thresholdPolicy = config.thresholdPolicy ?? "global";
    this.embeddingTimeoutMs = config.embeddingTimeoutMs ?? 10000;
    this.indexTimeoutMs = config.indexTimeoutMs ?? 10000;
    this.batchConcurrency = config.batchConcurrency ?? 5;
    this.stats = new SearchStatsTracker(this.clock);
  }

  /**
   * Run one hybrid search.
   *
   * Throws ValidationError for bad parameters and rethrows aborts; every
   * other failure is returned as `{ success: false }`.
   */
  async search(
    request: SearchRequest,
    options: SearchCallOptions = {}
  ): Promise<SearchOutcome> {
    const startTime = this.clock();
    const params = resolveRequest(request);
    validateRequest(params);

    const strategy: SearchStrategy = {
      semanticEnabled: params.semanticEnabled,
      keywordEnabled: params.keywordEnabled,
      similarityThreshold: params.similarityThreshold,
      candidateDocuments: 0,
    };

    const cacheKey = buildCacheKey(params);
    if (params.useCache) {
      const cached = this.cache.get(cacheKey);
      if (cached) {
        const elapsedTime = this.clock() - startTime;
        this.stats.record(params.query, elapsedTime, true);
        log.debug(`Cache hit: "${preview(params.query)}"`);
        return {
          success: true,
          context: { ...cached.context, elapsedTime },
          strategy: cached.strategy,
          fromCache: true,
        };
      }
    }

    try {
      const { signal } = options;
      throwIfAborted(signal);

      const eligible = await withTimeout(
        () => this.catalog.listEligible(params.filters),
        this.indexTimeoutMs,
        "catalog",
        signal
      );
      const candidates = eligible.filter((doc) => doc.isIndexed);
      strategy.candidateDocuments = candidates.length;
      throwIfAborted(signal);

      const [semanticResults, keywordResults] = await Promise.all([
        params.semanticEnabled
          ? this.semanticPass(params.query, params.nResults, candidates, signal)
          : Promise.resolve([]),
        params.keywordEnabled
          ? Promise.resolve(this.keywordPass(params.query, params.nResults, candidates))
          : Promise.resolve([]),
      ]);
      throwIfAborted(signal);

      let results = fuseResults(
        semanticResults,
        keywordResults,
        params.semanticWeight,
        params.keywordWeight
      );

      const bothEnabled = params.semanticEnabled && params.keywordEnabled;
      if (this.thresholdPolicy === "global" || bothEnabled) {
        results = results.filter((r) => r.score >= params.similarityThreshold);
      }
      if (params.deduplicate) {
        results = deduplicate(results);
      }
      results = rankResults(results).slice(0, params.nResults);

      if (params.highlight) {
        results = this.addHighlighting(results, params.query);
      }

      const documentsById = new Map(candidates.map((doc) => [doc.id, doc]));
      if (params.includeMetadata) {
        results = results.map((chunk) => this.attachMetadata(chunk, documentsById));
      }

      const elapsedTime = this.clock() - startTime;
      const context: RetrievalContext = {
        query: params.query,
        chunks: results,
        totalFound: results.length,
        elapsedTime,
        contextLength: results.reduce((sum, r) => sum + r.text.length, 0),
        sources: this.buildSources(results, documentsById),
      };

      if (params.useCache) {
        this.cache.set(cacheKey, { context, strategy });
      }
      this.stats.record(params.query, elapsedTime, false);

      log.info(
        `Search completed: "${preview(params.query)}" → ${results.length} results ` +
          `(semantic ${semanticResults.length}, keyword ${keywordResults.length}, ${elapsedTime}ms)`
      );

      return { success: true, context, strategy, fromCache: false };
    } catch (error) {
      if (isAbortError(error) || options.signal?.aborted) {
        throw error;
      }
      const elapsedTime = this.clock() - startTime;
      log.error(
        `Search failed (stage: retrieval, query: "${preview(params.query)}"): ${errorMessage(error)}`
      );
      return {
        success: false,
        query: params.query,
        error: errorMessage(error),
        elapsedTime,
      };
    }
  }

  /**
   * Run several searches with bounded concurrency. A failing query becomes
   * a failure entry in its slot; the batch itself never fails.
   */
  async batchSearch(
    queries: string[],
    config: Omit<SearchRequest, "query"> = {},
    maxConcurrent: number = this.batchConcurrency
  ): Promise<BatchSearchResult> {
    if (queries.length === 0) {
      throw new ValidationError("At least one query is required", "queries");
    }
    if (queries.length > MAX_BATCH_QUERIES) {
      throw new ValidationError(
        `A batch may contain at most ${MAX_BATCH_QUERIES} queries`,
        "queries"
      );
    }

    const startTime = this.clock();
    const queue = new PQueue({ concurrency: Math.max(1, maxConcurrent) });

    const results = await Promise.all(
      queries.map((query) =>
        queue.add(async (): Promise<SearchOutcome> => {
          try {
            return await this.search({ ...config, query });
          } catch (error) {
            return {
              success: false,
              query,
              error: errorMessage(error),
              elapsedTime: 0,
            };
          }
        })
      )
    );

    const successfulQueries = results.filter((r) => r.success).length;
    return {
      results,
      totalQueries: queries.length,
      successfulQueries,
      failedQueries: queries.length - successfulQueries,
      totalTime: this.clock() - startTime,
    };
  }

  getStatistics(): SearchStatistics {
    return {
      totalSearches: this.stats.totalSearches,
      popularQueries: this.stats.popularQueries(10),
      searchTrends: this.stats.trends(),
      cacheSize: this.cache.size,
      cacheHitRate: this.cache.hitRate,
      averageSearchTime: this.stats.averageSearchTime,
    };
  }

  clearCache(): void {
    this.cache.clear();
    log.info("Search cache cleared");
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private async semanticPass(
    query: string,
    nResults: number,
    candidates: CatalogDocument[],
    signal?: AbortSignal
  ): Promise<RetrievedChunk[]> {
    if (candidates.length === 0) return [];

    const embedding = await attempt(() =>
      withTimeout(
        (s) => this.embedder.embed(query, s),
        this.embeddingTimeoutMs,
        "embedding",
        signal
      )
    );
    if (!embedding.ok) {
      if (signal?.aborted) throw embedding.error;
      log.warn(
        `Embedding failed, semantic pass skipped (query: "${preview(query)}"): ${embedding.error.message}`
      );
      return [];
    }

    const candidateIds = candidates.map((doc) => doc.id);
    const matches = await attempt(() =>
      withTimeout(
        (s) => this.vectorIndex.query(embedding.value, nResults * 2, candidateIds, s),
        this.indexTimeoutMs,
        "vector-index",
        signal
      )
    );
    if (!matches.ok) {
      if (signal?.aborted) throw matches.error;
      log.warn(
        `Vector index query failed, semantic pass skipped (query: "${preview(query)}"): ${matches.error.message}`
      );
      return [];
    }

    return matches.value.map((match): RetrievedChunk => {
      const similarity = clamp01(1 - match.distance);
      return {
        id: match.chunkId,
        documentId: match.documentId,
        text: match.text,
        score: similarity,
        searchType: "semantic",
        semanticScore: similarity,
        metadata: { ...match.metadata, chunkIndex: match.chunkIndex },
      };
    });
  }

  private keywordPass(
    query: string,
    nResults: number,
    candidates: CatalogDocument[]
  ): RetrievedChunk[] {
    const keywords = tokenizeQuery(query);
    if (keywords.length === 0) return [];

    const results: RetrievedChunk[] = [];
    for (const doc of candidates) {
      if (!doc.content) continue;

      const score = this.scorer.score(doc.content, keywords);
      if (score <= 0) continue;

      const snippets = findSnippets(doc.content, keywords).slice(0, MAX_SNIPPETS_PER_DOCUMENT);
      for (const snippet of snippets) {
        results.push({
          id: `${doc.id}:${snippet.start}-${snippet.end}`,
          documentId: doc.id,
          text: snippet.text,
          score,
          searchType: "keyword",
          keywordScore: score,
          snippetStart: snippet.start,
          snippetEnd: snippet.end,
          matchedKeywords: snippet.matchedKeywords,
          metadata: {},
        });
      }
    }

    return results.sort((a, b) => b.score - a.score).slice(0, nResults);
  }

  private addHighlighting(results: RetrievedChunk[], query: string): RetrievedChunk[] {
    const keywords = tokenizeQuery(query);
    if (keywords.length === 0) return results;

    return results.map((chunk) => {
      const textLower = chunk.text.toLowerCase();
      return {
        ...chunk,
        highlightedText: highlight(chunk.text, keywords),
        matchedKeywords:
          chunk.matchedKeywords ?? keywords.filter((k) => textLower.includes(k)),
      };
    });
  }

  private attachMetadata(
    chunk: RetrievedChunk,
    documentsById: Map<string, CatalogDocument>
  ): RetrievedChunk {
    const doc = documentsById.get(chunk.documentId);
    if (!doc) return chunk;
    return {
      ...chunk,
      metadata: {
        ...chunk.metadata,
        filename: doc.filename,
        documentType: doc.type,
        tags: doc.tags,
        category: doc.category,
        createdAt: doc.createdAt.toISOString(),
      },
    };
  }

  private buildSources(
    chunks: RetrievedChunk[],
    documentsById: Map<string, CatalogDocument>
  ): DocumentSource[] {
    return chunks.map((chunk) => ({
      documentId: chunk.documentId,
      filename: documentsById.get(chunk.documentId)?.filename ?? "unknown",
      chunkId: chunk.id,
      relevanceScore: chunk.score,
      contentPreview: chunk.text.slice(0, 100),
    }));
  }
}
