/**
 * In-process fakes shared by the test suite
 */

import { vi } from "vitest";
import type {
  EmbeddingProvider,
  GenerationChunk,
  GenerationOptions,
  GenerationProvider,
  GenerationResult,
  LLMMessage,
} from "../llm/types";
import type { IndexedDocument } from "../memory-store";
import type { ChunkRecord } from "../lib/types";

export function silenceLogs(): void {
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.spyOn(console, "error").mockImplementation(() => undefined);
}

/** Returns `vectorFor(text)` and counts calls. */
export class FakeEmbedder implements EmbeddingProvider {
  readonly name = "fake-embedder";
  readonly model = "fake-embedding";
  calls = 0;

  constructor(private vectorFor: (text: string) => number[] = () => [1, 0]) {}

  async embed(text: string): Promise<number[]> {
    this.calls++;
    return this.vectorFor(text);
  }
}

export interface FakeLLMOptions {
  name?: string;
  reply?: string;
  deltas?: string[];
  generateError?: Error;
  /** Throw instead of yielding the delta at this index. */
  streamErrorAt?: number;
  healthy?: boolean;
  /** generate() never settles until its signal aborts. */
  hang?: boolean;
}

export class FakeLLM implements GenerationProvider {
  readonly name: string;
  readonly model = "fake-model";
  generateCalls: LLMMessage[][] = [];
  streamCalls = 0;
  /** Chunks handed to the consumer so far. */
  pulls = 0;
  streamClosed = false;

  private reply: string;
  private deltas: string[];
  private generateError?: Error;
  private streamErrorAt?: number;
  private healthy: boolean;
  private hang: boolean;

  constructor(options: FakeLLMOptions = {}) {
    this.name = options.name ?? "fake";
    this.reply = options.reply ?? "Retrieval-augmented generation grounds answers in documents.";
    this.deltas = options.deltas ?? ["Hello", " world"];
    this.generateError = options.generateError;
    this.streamErrorAt = options.streamErrorAt;
    this.healthy = options.healthy ?? true;
    this.hang = options.hang ?? false;
  }

  async generate(
    messages: LLMMessage[],
    options?: GenerationOptions
  ): Promise<GenerationResult> {
    this.generateCalls.push(messages);
    if (this.generateError) throw this.generateError;
    if (this.hang) {
      const signal = options?.signal;
      return new Promise<GenerationResult>((_, reject) => {
        signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
      });
    }
    return {
      text: this.reply,
      usage: { promptTokens: 10, completionTokens: 5, totalTokens: 15 },
      finishReason: "stop",
      model: this.model,
    };
  }

  async *generateStream(
    _messages: LLMMessage[],
    _options?: GenerationOptions
  ): AsyncGenerator<GenerationChunk> {
    this.streamCalls++;
    try {
      for (let i = 0; i < this.deltas.length; i++) {
        if (this.streamErrorAt === i) {
          throw new Error("stream interrupted");
        }
        this.pulls++;
        yield { type: "delta", text: this.deltas[i] ?? "" };
      }
      this.pulls++;
      yield {
        type: "complete",
        finishReason: "stop",
        usage: { promptTokens: 10, completionTokens: this.deltas.length, totalTokens: 10 + this.deltas.length },
        model: this.model,
      };
    } finally {
      this.streamClosed = true;
    }
  }

  async healthCheck(): Promise<boolean> {
    return this.healthy;
  }
}

export function makeDocument(overrides: Partial<IndexedDocument> & { id: string }): IndexedDocument {
  return {
    filename: `${overrides.id}.md`,
    isIndexed: true,
    type: "markdown",
    tags: [],
    createdAt: new Date("2024-01-01T00:00:00Z"),
    ...overrides,
  };
}

export function makeChunk(
  chunkId: string,
  documentId: string,
  text: string,
  embedding: number[],
  chunkIndex: number = 0
): ChunkRecord {
  return { chunkId, documentId, text, chunkIndex, embedding, metadata: {} };
}

/** Unit vector at `similarity` cosine from [1, 0]. */
export function vectorAtSimilarity(similarity: number): number[] {
  return [similarity, Math.sqrt(1 - similarity * similarity)];
}
