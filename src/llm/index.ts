/**
 * LLM Abstraction Layer - Main Export
 *
 * Provides a unified interface for generation and embedding backends
 * Default provider: OpenAI (gpt-4o-mini for generation, text-embedding-3-small for embeddings)
 */

export * from "./types";
export * from "./openai-provider";
export * from "./ollama-provider";
export * from "./provider-manager";

import type {
  EmbeddingConfig,
  EmbeddingProvider,
  GenerationProvider,
  LLMConfig,
  ProviderName,
} from "./types";
import { OpenAIEmbeddingProvider, OpenAIProvider } from "./openai-provider";
import { OllamaEmbeddingProvider, OllamaProvider } from "./ollama-provider";
import { ProviderManager } from "./provider-manager";

export const MODEL_DEFAULTS = {
  openai: {
    generation: "gpt-4o-mini",
    embedding: "text-embedding-3-small",
  },
  ollama: {
    generation: "qwen2.5:7b-instruct-q4_K_M",
    embedding: "nomic-embed-text",
  },
} as const;

/**
 * Create a generation provider
 *
 * const provider = createLLMProvider({ provider: "ollama", model: "qwen2.5:7b-instruct-q4_K_M" });
 */
export function createLLMProvider(config: LLMConfig): GenerationProvider {
  switch (config.provider) {
    case "openai":
      return new OpenAIProvider({ model: config.model, apiKey: config.apiKey });
    case "ollama":
      return new OllamaProvider({ model: config.model, baseUrl: config.baseUrl });
  }
}

export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  switch (config.provider) {
    case "openai":
      return new OpenAIEmbeddingProvider({
        model: config.model,
        dimensions: config.dimensions,
        apiKey: config.apiKey,
      });
    case "ollama":
      return new OllamaEmbeddingProvider({
        model: config.model,
        baseUrl: config.baseUrl,
      });
  }
}

/**
 * Primary provider first, then each fallback with its default model.
 */
export function createProviderManager(
  primary: LLMConfig,
  fallbacks: ProviderName[] = []
): ProviderManager {
  const providers = [createLLMProvider(primary)];
  for (const name of fallbacks) {
    if (name === primary.provider) continue;
    providers.push(
      createLLMProvider({
        provider: name,
        model: MODEL_DEFAULTS[name].generation,
        apiKey: primary.apiKey,
        baseUrl: primary.baseUrl,
      })
    );
  }
  return new ProviderManager(providers);
}
