/**
 * Ollama LLM Provider
 *
 * Connects to local Ollama instance via HTTP API
 * Streams chat replies as newline-delimited JSON
 * Includes retry logic with exponential backoff for reliability
 */

import { z } from "zod";
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

const DEFAULT_BASE_URL = "http://localhost:11434";

const RETRY: RetryOptions = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
};

interface OllamaRequest {
  model: string;
  messages: Array<{ role: string; content: string }>;
  stream: boolean;
  options?: {
    temperature?: number;
    num_predict?: number;
  };
}

const ollamaChatSchema = z.object({
  model: z.string().optional(),
  message: z
    .object({
      role: z.string(),
      content: z.string(),
    })
    .optional(),
  done: z.boolean(),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

type OllamaChatResponse = z.infer<typeof ollamaChatSchema>;

const ollamaEmbeddingSchema = z.object({
  embedding: z.array(z.number()),
});

export class OllamaHttpError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message);
    this.name = "OllamaHttpError";
  }
}

async function postJson(
  url: string,
  body: unknown,
  signal?: AbortSignal
): Promise<Response> {
  const response = await fetch(url, {
    method: "POST",
    headers: {
      "Content-Type": "application/json",
    },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw new OllamaHttpError(
      `Ollama request failed: ${response.status} ${response.statusText}`,
      response.status
    );
  }
  return response;
}

function toUsage(data: OllamaChatResponse): TokenUsage | undefined {
  if (data.prompt_eval_count === undefined && data.eval_count === undefined) {
    return undefined;
  }
  const promptTokens = data.prompt_eval_count ?? 0;
  const completionTokens = data.eval_count ?? 0;
  return {
    promptTokens,
    completionTokens,
    totalTokens: promptTokens + completionTokens,
  };
}

function toFinishReason(data: OllamaChatResponse): FinishReason {
  if (!data.done) return "length";
  if (data.done_reason === "length") return "length";
  return "stop";
}

export class OllamaProvider implements GenerationProvider {
  readonly name = "ollama";
  readonly model: string;
  private baseUrl: string;

  constructor(config: { model: string; baseUrl?: string }) {
    this.model = config.model;
    this.baseUrl = config.baseUrl || DEFAULT_BASE_URL;
  }

  private buildRequest(
    messages: LLMMessage[],
    options: GenerationOptions,
    stream: boolean
  ): OllamaRequest {
    // Ollama expects a single leading system message
    const systemContent = messages
      .filter((m) => m.role === "system")
      .map((m) => m.content)
      .join("\n\n");

    const ollamaMessages: OllamaRequest["messages"] = [];
    if (systemContent) {
      ollamaMessages.push({ role: "system", content: systemContent });
    }
    ollamaMessages.push(
      ...messages
        .filter((m) => m.role !== "system")
        .map((m) => ({ role: m.role, content: m.content }))
    );

    return {
      model: this.model,
      messages: ollamaMessages,
      stream,
      options: {
        temperature: options.temperature ?? 0.7,
        num_predict: options.maxTokens ?? 1000,
      },
    };
  }

  async generate(
    messages: LLMMessage[],
    options: GenerationOptions = {}
  ): Promise<GenerationResult> {
    const requestBody = this.buildRequest(messages, options, false);

    try {
      // 3 attempts: 1s, 2s, 4s delays
      const data = await withRetry(
        async () => {
          const response = await postJson(
            `${this.baseUrl}/api/chat`,
            requestBody,
            options.signal
          );
          return ollamaChatSchema.parse(await response.json());
        },
        { ...RETRY, signal: options.signal }
      );

      return {
        text: data.message?.content ?? "",
        usage: toUsage(data),
        finishReason: toFinishReason(data),
        model: data.model ?? this.model,
      };
    } catch (error) {
      throw this.failure(error, options.signal);
    }
  }

  async *generateStream(
    messages: LLMMessage[],
    options: GenerationOptions = {}
  ): AsyncGenerator<GenerationChunk> {
    const requestBody = this.buildRequest(messages, options, true);

    let response: Response;
    try {
      response = await withRetry(
        () => postJson(`${this.baseUrl}/api/chat`, requestBody, options.signal),
        { ...RETRY, signal: options.signal }
      );
    } catch (error) {
      throw this.failure(error, options.signal);
    }

    if (!response.body) {
      throw this.failure(new Error("Ollama returned an empty stream"), options.signal);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    let buffer = "";
    let last: OllamaChatResponse | undefined;

    try {
      while (true) {
        const { done, value } = await reader.read();
        if (done) break;

        buffer += decoder.decode(value, { stream: true });
        const lines = buffer.split("\n");
        buffer = lines.pop() ?? "";

        for (const line of lines) {
          if (!line.trim()) continue;
          const data = ollamaChatSchema.parse(JSON.parse(line));
          last = data;
          if (data.message?.content) {
            yield { type: "delta", text: data.message.content };
          }
        }
      }

      if (buffer.trim()) {
        last = ollamaChatSchema.parse(JSON.parse(buffer));
        if (last.message?.content) {
          yield { type: "delta", text: last.message.content };
        }
      }
    } catch (error) {
      throw this.failure(error, options.signal);
    } finally {
      // Runs on early consumer return as well, closing the HTTP body
      await reader.cancel().catch(() => undefined);
    }

    yield {
      type: "complete",
      finishReason: last ? toFinishReason(last) : "unknown",
      usage: last ? toUsage(last) : undefined,
      model: last?.model ?? this.model,
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/tags`);
      return response.ok;
    } catch {
      return false;
    }
  }

  private failure(error: unknown, signal?: AbortSignal): unknown {
    if (signal?.aborted || error instanceof ProviderUnavailableError) {
      return error;
    }
    return new ProviderUnavailableError(
      `Ollama generation failed: ${errorMessage(error)}`,
      this.name,
      error,
      "generation"
    );
  }
}

export class OllamaEmbeddingProvider implements EmbeddingProvider {
  readonly name = "ollama";
  readonly model: string;
  private baseUrl: string;

  constructor(config: { model: string; baseUrl?: string }) {
    this.model = config.model;
    this.baseUrl = config.baseUrl || DEFAULT_BASE_URL;
  }

  async embed(text: string, signal?: AbortSignal): Promise<number[]> {
    try {
      const data = await withRetry(
        async () => {
          const response = await postJson(
            `${this.baseUrl}/api/embeddings`,
            { model: this.model, prompt: text },
            signal
          );
          return ollamaEmbeddingSchema.parse(await response.json());
        },
        { ...RETRY, signal }
      );
      return data.embedding;
    } catch (error) {
      if (signal?.aborted) throw error;
      throw new ProviderUnavailableError(
        `Ollama embedding failed: ${errorMessage(error)}`,
        this.name,
        error,
        "embedding"
      );
    }
  }
}
