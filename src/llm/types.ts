/**
 * LLM Abstraction Layer - Types
 *
 * Provides a unified interface for generation and embedding backends
 * (OpenAI, Ollama). Supports complete and streamed generation.
 */

export interface LLMMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type FinishReason =
  | "stop"
  | "length"
  | "content_filter"
  | "error"
  | "unknown";

export interface GenerationOptions {
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface GenerationResult {
  text: string;
  usage?: TokenUsage;
  finishReason: FinishReason;
  model: string;
}

/**
 * Streamed increments. Exactly one "complete" chunk ends a successful stream;
 * a failed stream throws instead.
 */
export type GenerationChunk =
  | { type: "delta"; text: string }
  | {
      type: "complete";
      finishReason: FinishReason;
      usage?: TokenUsage;
      model: string;
    };

export type ProviderName = "openai" | "ollama";

export interface LLMConfig {
  provider: ProviderName;
  model: string;
  apiKey?: string; // For OpenAI
  baseUrl?: string; // For Ollama
}

export interface EmbeddingConfig {
  provider: ProviderName;
  model: string;
  dimensions?: number;
  apiKey?: string;
  baseUrl?: string;
}

/**
 * Base interface for generation backends
 */
export interface GenerationProvider {
  readonly name: string;
  readonly model: string;

  /**
   * Generate a complete reply
   */
  generate(
    messages: LLMMessage[],
    options?: GenerationOptions
  ): Promise<GenerationResult>;

  /**
   * Generate a reply as a sequence of text increments
   */
  generateStream(
    messages: LLMMessage[],
    options?: GenerationOptions
  ): AsyncIterable<GenerationChunk>;

  healthCheck(): Promise<boolean>;
}

export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;

  /** Throws ProviderUnavailableError when the backend fails. */
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}
