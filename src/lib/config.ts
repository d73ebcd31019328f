/**
 * Application configuration
 *
 * Reads the environment (after dotenv) and validates it with zod. Every
 * service is built from the returned AppConfig in createServices().
 */

import dotenv from "dotenv";
import { z } from "zod";
import { ValidationError } from "./errors";
import { MODEL_DEFAULTS } from "../llm";
import type { ThresholdPolicy } from "./types";

const DEFAULT_SYSTEM_PROMPT = `You are a knowledgeable assistant that answers questions using the provided documents.

Guidelines:
- Base your answer on the retrieved context whenever it is relevant
- Say clearly when the documents do not contain the answer
- Mention which document a fact came from when it helps the reader
- Keep answers concise and well structured`;

const bool = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1");

const providerName = z.enum(["openai", "ollama"]);

const fallbackList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
  .pipe(z.array(providerName));

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(5442),

  LLM_PROVIDER: providerName.default("openai"),
  LLM_MODEL: z.string().min(1).optional(),
  LLM_FALLBACK_PROVIDERS: fallbackList.default(""),
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_BASE_URL: z.string().url().default("http://localhost:11434"),
  GENERATION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),

  EMBEDDING_PROVIDER: providerName.optional(),
  EMBEDDING_MODEL: z.string().min(1).optional(),
  EMBEDDING_DIMENSIONS: z.coerce.number().int().positive().default(1536),
  EMBEDDING_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  STORAGE_BACKEND: z.enum(["postgres", "memory"]).optional(),
  DATABASE_URL: z.string().optional(),
  POSTGRES_HOST: z.string().default("localhost"),
  POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
  POSTGRES_DB: z.string().default("docent"),
  POSTGRES_USER: z.string().default("postgres"),
  POSTGRES_PASSWORD: z.string().default(""),
  INDEX_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),

  SEARCH_CACHE_TTL_SECONDS: z.coerce.number().positive().default(300),
  SEARCH_CACHE_MAX_ENTRIES: z.coerce.number().int().positive().default(100),
  SEARCH_BATCH_CONCURRENCY: z.coerce.number().int().min(1).max(20).default(5),
  SEARCH_THRESHOLD_POLICY: z.enum(["global", "hybrid-only"]).default("global"),

  RAG_SYSTEM_PROMPT: z.string().min(1).default(DEFAULT_SYSTEM_PROMPT),
  QUERY_ANALYSIS_USE_LLM: bool.default("true"),
  QUERY_ANALYSIS_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
  RAG_FALLBACK_RESULTS: z.coerce.number().int().min(1).max(100).default(5),
  RAG_FALLBACK_THRESHOLD: z.coerce.number().min(0).max(1).default(0.7),
  RAG_INTELLIGENT_THRESHOLD: z.coerce.number().min(0).max(1).default(0.6),

  CONVERSATION_MAX_MESSAGES: z.coerce.number().int().positive().default(100),
  CONVERSATION_MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
  CONVERSATION_EXPIRE_HOURS: z.coerce.number().positive().default(24),
  MAINTENANCE_INTERVAL_MS: z.coerce.number().int().positive().default(600000),
});

export interface AppConfig {
  server: { port: number };
  llm: {
    provider: "openai" | "ollama";
    model: string;
    fallbackProviders: Array<"openai" | "ollama">;
    openaiApiKey?: string;
    ollamaBaseUrl: string;
    generationTimeoutMs: number;
  };
  embedding: {
    provider: "openai" | "ollama";
    model: string;
    dimensions: number;
    timeoutMs: number;
  };
  storage: {
    backend: "postgres" | "memory";
    connectionString?: string;
    host: string;
    port: number;
    database: string;
    user: string;
    password: string;
    indexTimeoutMs: number;
  };
  search: {
    cacheTtlSeconds: number;
    cacheMaxEntries: number;
    batchConcurrency: number;
    thresholdPolicy: ThresholdPolicy;
  };
  rag: {
    systemPrompt: string;
    useLLMQueryAnalysis: boolean;
    queryAnalysisTimeoutMs: number;
    fallbackResults: number;
    fallbackThreshold: number;
    intelligentThreshold: number;
  };
  conversations: {
    maxMessages: number;
    maxSessions: number;
    expireHours: number;
    maintenanceIntervalMs: number;
  };
}

/**
 * Load and validate configuration.
 * Pass an explicit env object in tests; dotenv is only read for process.env.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): AppConfig {
  if (env === process.env) {
    dotenv.config();
  }

  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join(".") : "environment";
    throw new ValidationError(
      `Invalid configuration for ${field}: ${issue?.message ?? "unknown error"}`,
      field
    );
  }
  const e = parsed.data;

  const embeddingProvider = e.EMBEDDING_PROVIDER ?? e.LLM_PROVIDER;

  return {
    server: { port: e.PORT },
    llm: {
      provider: e.LLM_PROVIDER,
      model: e.LLM_MODEL ?? MODEL_DEFAULTS[e.LLM_PROVIDER].generation,
      fallbackProviders: e.LLM_FALLBACK_PROVIDERS,
      openaiApiKey: e.OPENAI_API_KEY,
      ollamaBaseUrl: e.OLLAMA_BASE_URL,
      generationTimeoutMs: e.GENERATION_TIMEOUT_MS,
    },
    embedding: {
      provider: embeddingProvider,
      model: e.EMBEDDING_MODEL ?? MODEL_DEFAULTS[embeddingProvider].embedding,
      dimensions: e.EMBEDDING_DIMENSIONS,
      timeoutMs: e.EMBEDDING_TIMEOUT_MS,
    },
    storage: {
      backend: e.STORAGE_BACKEND ?? (e.DATABASE_URL ? "postgres" : "memory"),
      connectionString: e.DATABASE_URL,
      host: e.POSTGRES_HOST,
      port: e.POSTGRES_PORT,
      database: e.POSTGRES_DB,
      user: e.POSTGRES_USER,
      password: e.POSTGRES_PASSWORD,
      indexTimeoutMs: e.INDEX_TIMEOUT_MS,
    },
    search: {
      cacheTtlSeconds: e.SEARCH_CACHE_TTL_SECONDS,
      cacheMaxEntries: e.SEARCH_CACHE_MAX_ENTRIES,
      batchConcurrency: e.SEARCH_BATCH_CONCURRENCY,
      thresholdPolicy: e.SEARCH_THRESHOLD_POLICY,
    },
    rag: {
      systemPrompt: e.RAG_SYSTEM_PROMPT,
      useLLMQueryAnalysis: e.QUERY_ANALYSIS_USE_LLM,
      queryAnalysisTimeoutMs: e.QUERY_ANALYSIS_TIMEOUT_MS,
      fallbackResults: e.RAG_FALLBACK_RESULTS,
      fallbackThreshold: e.RAG_FALLBACK_THRESHOLD,
      intelligentThreshold: e.RAG_INTELLIGENT_THRESHOLD,
    },
    conversations: {
      maxMessages: e.CONVERSATION_MAX_MESSAGES,
      maxSessions: e.CONVERSATION_MAX_SESSIONS,
      expireHours: e.CONVERSATION_EXPIRE_HOURS,
      maintenanceIntervalMs: e.MAINTENANCE_INTERVAL_MS,
    },
  };
}
