/**
 * OpenAI LLM Provider
 *
 * Wraps the OpenAI SDK to provide a unified interface for chat completions
 * (complete and streamed) and embeddings.
 * Includes retry logic with exponential backoff for reliability
 */

import OpenAI from "openai";
import type {
  EmbeddingProvider,
  FinishReason,
  GenerationChunk,
  GenerationOptions,
  GenerationProvider,
  GenerationResult,
  LLMMessage,
  TokenUsage,
} from "./types";
import { withRetry } from "../utils/retry";
import type { RetryOptions } from "../utils/retry";
import { errorMessage, ProviderUnavailableError } from "../lib/errors";

const RETRY: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
};

function toOpenAIMessage(message: LLMMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    default:
      return { role: "user", content: message.content };
  }
}

function toUsage(usage: OpenAI.CompletionUsage | null | undefined): TokenUsage | undefined {
  if (!usage) return undefined;
  return {
    promptTokens: usage.prompt_tokens,
    completionTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens,
  };
}

export function mapFinishReason(finishReason: string | null | undefined): FinishReason {
  switch (finishReason) {
    case "stop":
      return "stop";
    case "length":
      return "length";
    case "content_filter":
      return "content_filter";
    default:
      return "unknown";
  }
}

export class OpenAIProvider implements GenerationProvider {
  readonly name = "openai";
  readonly model: string;
  private openai: OpenAI;

  constructor(config: { model: string; apiKey?: string; client?: OpenAI }) {
    this.model = config.model;
    this.openai = config.client ?? new OpenAI({ apiKey: config.apiKey });
  }

  async generate(
    messages: LLMMessage[],
    options: GenerationOptions = {}
  ): Promise<GenerationResult> {
    try {
      // 3 attempts: 1s, 2s, 4s delays
      const response = await withRetry(
        () =>
          this.openai.chat.completions.create(
            {
              model: this.model,
              max_tokens: options.maxTokens ?? 1000,
              temperature: options.temperature ?? 0.7,
              messages: messages.map(toOpenAIMessage),
            },
            { signal: options.signal }
          ),
        { ...RETRY, signal: options.signal }
      );

      const choice = response.choices[0];
      return {
        text: choice?.message?.content ?? "",
        usage: toUsage(response.usage),
        finishReason: mapFinishReason(choice?.finish_reason),
        model: response.model || this.model,
      };
    } catch (error) {
      throw this.failure(error, options.signal);
    }
  }

  async *generateStream(
    messages: LLMMessage[],
    options: GenerationOptions = {}
  ): AsyncGenerator<GenerationChunk> {
    const stream = await this.openStream(messages, options);

    let finishReason: FinishReason = "unknown";
    let usage: TokenUsage | undefined;
    let model = this.model;

    try {
      // Leaving this loop early (consumer return) aborts the HTTP stream
      for await (const chunk of stream) {
        const choice = chunk.choices[0];
        const text = choice?.delta?.content;
        if (text) {
          yield { type: "delta", text };
        }
        if (choice?.finish_reason) {
          finishReason = mapFinishReason(choice.finish_reason);
        }
        if (chunk.usage) {
          usage = toUsage(chunk.usage);
        }
        if (chunk.model) {
          model = chunk.model;
        }
      }
    } catch (error) {
      throw this.failure(error, options.signal);
    }

    yield { type: "complete", finishReason, usage, model };
  }

  private async openStream(messages: LLMMessage[], options: GenerationOptions) {
    try {
      return await withRetry(
        () =>
          this.openai.chat.completions.create(
            {
              model: this.model,
              max_tokens: options.maxTokens ?? 1000,
              temperature: options.temperature ?? 0.7,
              messages: messages.map(toOpenAIMessage),
              stream: true,
              stream_options: { include_usage: true },
            },
            { signal: options.signal }
          ),
        { ...RETRY, signal: options.signal }
      );
    } catch (error) {
      throw this.failure(error, options.signal);
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.openai.models.retrieve(this.model);
      return true;
    } catch {
      return false;
    }
  }

  private failure(error: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted || error instanceof ProviderUnavailableError) {
      return error;
    }
    return new ProviderUnavailableError(
      `OpenAI generation failed: ${errorMessage(error)}`,
      this.name,
      error,
      "generation"
    );
  }
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = "openai";
  readonly model: string;
  private dimensions?: number;
  private openai: OpenAI;

  constructor(config: {
    model: string;
    dimensions?: number;
    apiKey?: string;
    client?: OpenAI;
  }) {
    this.model = config.model;
    this.dimensions = config.dimensions;
    this.openai = config.client ?? new OpenAI({ apiKey: config.apiKey });
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      const response = await withRetry(
        () =>
          this.openai.embeddings.create(
            {
              model: this.model,
              input: text,
              ...(this.dimensions ? { dimensions: this.dimensions } : {}),
            },
            { signal }
          ),
        { ...RETRY, signal }
      );

      const embedding = response.data[0]?.embedding;
      if (!embedding) {
        throw new Error("Embedding response contained no vectors");
      }
      return embedding;
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new ProviderUnavailableError(
        `OpenAI embedding failed: ${errorMessage(error)}`,
        this.name,
        error,
        "embedding"
      );
    }
  }
}
