/**
 * Composition root
 *
 * Builds every service once from AppConfig. Request handlers receive the
 * resulting AppServices; nothing else holds service instances.
 */

import type { AppConfig } from "./lib/config";
import type { DocumentCatalog, KeywordCategoryIndex, VectorIndex } from "./lib/types";
import { ProviderManager, createEmbeddingProvider, createProviderManager } from "./llm";
import type { EmbeddingProvider } from "./llm";
import { PostgresService } from "./storage";
import { PgVectorIndex } from "./vector-index";
import { InMemoryDocumentCatalog, InMemoryVectorIndex } from "./memory-store";
import { SearchCache } from "./search-cache";
import { HybridSearchEngine } from "./hybrid-search";
import { QueryAnalyzer } from "./query-analyzer";
import { ConversationStore } from "./conversation/conversation-store";
import { MaintenanceTask } from "./conversation/maintenance";
import { ContextBuilder } from "./context-builder";
import { RagOrchestrator } from "./rag-orchestrator";

export interface StorageServices {
  backend: "postgres" | "memory";
  catalog: DocumentCatalog;
  keywordIndex: KeywordCategoryIndex;
  vectorIndex: VectorIndex;
  postgres?: PostgresService;
}

export interface AppServices {
  config: AppConfig;
  storage: StorageServices;
  llm: ProviderManager;
  embedder: EmbeddingProvider;
  search: HybridSearchEngine;
  analyzer: QueryAnalyzer;
  conversations: ConversationStore;
  maintenance: MaintenanceTask;
  rag: RagOrchestrator;
}

export interface ServiceOverrides {
  storage?: StorageServices;
  llm?: ProviderManager;
  embedder?: EmbeddingProvider;
  clock?: () => number;
}

export function createStorage(config: AppConfig): StorageServices {
  if (config.storage.backend === "memory") {
    const catalog = new InMemoryDocumentCatalog();
    return {
      backend: "memory",
      catalog,
      keywordIndex: catalog,
      vectorIndex: new InMemoryVectorIndex(),
    };
  }

  const postgres = new PostgresService({
    connectionString: config.storage.connectionString,
    host: config.storage.host,
    port: config.storage.port,
    database: config.storage.database,
    user: config.storage.user,
    password: config.storage.password,
    embeddingDimensions: config.embedding.dimensions,
  });
  return {
    backend: "postgres",
    catalog: postgres,
    keywordIndex: postgres,
    vectorIndex: new PgVectorIndex(postgres),
    postgres,
  };
}

/**
 * Wire the services. Overrides replace the backends built from config
 * (tests pass in-memory storage and fake providers).
 */
export function createServices(
  config: AppConfig,
  overrides: ServiceOverrides = {}
): AppServices {
  const clock = overrides.clock ?? Date.now;
  const storage = overrides.storage ?? createStorage(config);

  const llm =
    overrides.llm ??
    createProviderManager(
      {
        provider: config.llm.provider,
        model: config.llm.model,
        apiKey: config.llm.openaiApiKey,
        baseUrl: config.llm.ollamaBaseUrl,
      },
      config.llm.fallbackProviders
    );

  const embedder =
    overrides.embedder ??
    createEmbeddingProvider({
      provider: config.embedding.provider,
      model: config.embedding.model,
      dimensions: config.embedding.provider === "openai" ? config.embedding.dimensions : undefined,
      apiKey: config.llm.openaiApiKey,
      baseUrl: config.llm.ollamaBaseUrl,
    });

  const search = new HybridSearchEngine({
    catalog: storage.catalog,
    vectorIndex: storage.vectorIndex,
    embedder,
    cache: new SearchCache({
      ttlSeconds: config.search.cacheTtlSeconds,
      maxEntries: config.search.cacheMaxEntries,
      clock,
    }),
    thresholdPolicy: config.search.thresholdPolicy,
    embeddingTimeoutMs: config.embedding.timeoutMs,
    indexTimeoutMs: config.storage.indexTimeoutMs,
    batchConcurrency: config.search.batchConcurrency,
    clock,
  });

  const analyzer = new QueryAnalyzer({
    llm,
    useLLM: config.rag.useLLMQueryAnalysis,
    timeoutMs: config.rag.queryAnalysisTimeoutMs,
  });

  const conversations = new ConversationStore({
    maxMessages: config.conversations.maxMessages,
    maxSessions: config.conversations.maxSessions,
    expireHours: config.conversations.expireHours,
    clock,
  });

  const maintenance = new MaintenanceTask(conversations, {
    intervalMs: config.conversations.maintenanceIntervalMs,
  });

  const rag = new RagOrchestrator(
    {
      search,
      analyzer,
      store: conversations,
      contextBuilder: new ContextBuilder(config.rag.systemPrompt),
      llm,
      catalog: storage.catalog,
      keywordIndex: storage.keywordIndex,
      vectorIndex: storage.vectorIndex,
    },
    {
      defaultSimilarityThreshold: config.rag.intelligentThreshold,
      fallbackResults: config.rag.fallbackResults,
      fallbackThreshold: config.rag.fallbackThreshold,
      generationTimeoutMs: config.llm.generationTimeoutMs,
      indexTimeoutMs: config.storage.indexTimeoutMs,
      clock,
    }
  );

  return {
    config,
    storage,
    llm,
    embedder,
    search,
    analyzer,
    conversations,
    maintenance,
    rag,
  };
}

export { loadConfig } from "./lib/config";
export type { AppConfig } from "./lib/config";
export * from "./lib/types";
export * from "./lib/conversation-types";
export * from "./lib/errors";
export { HybridSearchEngine } from "./hybrid-search";
export { QueryAnalyzer } from "./query-analyzer";
export { ConversationStore } from "./conversation/conversation-store";
export { MaintenanceTask } from "./conversation/maintenance";
export { ContextBuilder } from "./context-builder";
export { RagOrchestrator } from "./rag-orchestrator";
export { SearchCache } from "./search-cache";
export { InMemoryDocumentCatalog, InMemoryVectorIndex } from "./memory-store";
export { PostgresService } from "./storage";
export { PgVectorIndex } from "./vector-index";
