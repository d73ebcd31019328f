/**
 * Context Builder - assembles the context window for one generation call
 *
 * System prompt + retrieved chunks (ordered by strategy) + recent history +
 * the user question. When the estimated size (words × 1.3) exceeds the
 * budget, only the retrieved block is shortened.
 */

import type { RetrievalContext, RetrievedChunk } from "./lib/types";
import type {
  ChatMessage,
  ContextStrategy,
  ContextWindow,
  PromptType,
} from "./lib/conversation-types";
import type { LLMMessage } from "./llm/types";
import { createLogger } from "./utils/logger";

const log = createLogger("ContextBuilder");

const TOKENS_PER_WORD = 1.3;

const ANSWER_INSTRUCTIONS = `Answer the user question using the information above.
- Prefer the retrieved documents over general knowledge
- If the documents do not contain the answer, say so clearly
- Cite sources as [Document N]`;

export const ANALYSIS_SYSTEM_PROMPT = `You are a document analyst who examines content in depth.
Focus on:
1. The key facts and points
2. How each document is structured and argued
3. Important concepts and how they relate
4. Insights that go beyond restating the text
Base your analysis on the documents provided.`;

export const SUMMARY_SYSTEM_PROMPT = `You are a summarisation specialist who extracts the core of documents.
Your summary should:
1. Lead with the main points and conclusions
2. Keep the information complete
3. Use clear, concise language
4. Order information by importance
Summarise the documents provided.`;

export type SystemPrompts = Record<PromptType, string>;

export interface ContextBuildInput {
  query: string;
  retrieval?: RetrievalContext;
  history?: ChatMessage[];
  strategy?: ContextStrategy; // Default: ranked
  promptType?: PromptType; // Default: default
  maxContextLength?: number; // Default: 4000
  maxHistoryMessages?: number; // Default: 10
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

export function estimateTokens(text: string): number {
  return Math.ceil(countWords(text) * TOKENS_PER_WORD);
}

/** Cuts after the `maxWords`-th word and marks the cut with "…". */
export function truncateWords(text: string, maxWords: number): string {
  if (maxWords <= 0) return "";
  const words = text.matchAll(/\S+/g);
  let count = 0;
  for (const match of words) {
    count++;
    if (count === maxWords) {
      const end = (match.index ?? 0) + match[0].length;
      return end < text.trimEnd().length ? `${text.slice(0, end)}…` : text;
    }
  }
  return text;
}

function chunkFilename(chunk: RetrievedChunk): string {
  const filename = chunk.metadata.filename;
  return typeof filename === "string" ? filename : "unknown";
}

function chunkTime(chunk: RetrievedChunk): number {
  const createdAt = chunk.metadata.createdAt;
  if (createdAt instanceof Date) return createdAt.getTime();
  if (typeof createdAt === "string") {
    const parsed = Date.parse(createdAt);
    return Number.isNaN(parsed) ? 0 : parsed;
  }
  return 0;
}

export function orderChunks(
  chunks: RetrievedChunk[],
  strategy: ContextStrategy
): RetrievedChunk[] {
  switch (strategy) {
    case "ranked":
      return [...chunks].sort((a, b) => b.score - a.score);
    case "hierarchical":
      return [...chunks].sort((a, b) => chunkTime(b) - chunkTime(a));
    case "summarized":
      return [...chunks].sort(
        (a, b) =>
          chunkFilename(a).localeCompare(chunkFilename(b)) || b.score - a.score
      );
    default:
      return [...chunks];
  }
}

export function formatChunks(chunks: RetrievedChunk[]): string {
  return chunks
    .map(
      (chunk, i) =>
        `[Document ${i + 1}] Source: ${chunkFilename(chunk)}\n` +
        `Relevance: ${chunk.score.toFixed(3)}\n` +
        chunk.text
    )
    .join("\n\n");
}

export function formatHistory(messages: ChatMessage[]): string {
  return messages.map((m) => `${m.role}: ${m.content}`).join("\n");
}

/** The user turn sent to the model: documents, history, then the question. */
export function composeUserPrompt(window: ContextWindow): string {
  const sections: string[] = [];
  if (window.retrievedContext) {
    sections.push(`Relevant documents:\n${window.retrievedContext}`);
  }
  if (window.conversationHistory.length > 0) {
    sections.push(`Conversation history:\n${formatHistory(window.conversationHistory)}`);
  }
  sections.push(`User question: ${window.userQuery}`);
  sections.push(ANSWER_INSTRUCTIONS);
  return sections.join("\n\n");
}

function estimateWindow(window: ContextWindow): number {
  return estimateTokens(window.systemPrompt) + estimateTokens(composeUserPrompt(window));
}

export class ContextBuilder {
  private prompts: SystemPrompts;

  /** `systemPrompt` is the default prompt; the other types may be overridden. */
  constructor(systemPrompt: string, overrides: Partial<Omit<SystemPrompts, "default">> = {}) {
    this.prompts = {
      default: systemPrompt,
      analysis: overrides.analysis ?? ANALYSIS_SYSTEM_PROMPT,
      summary: overrides.summary ?? SUMMARY_SYSTEM_PROMPT,
    };
  }

  systemPromptFor(type: PromptType = "default"): string {
    return this.prompts[type];
  }

  build(input: ContextBuildInput): ContextWindow {
    const strategy = input.strategy ?? "ranked";
    const maxContextLength = input.maxContextLength ?? 4000;
    const maxHistory = input.maxHistoryMessages ?? 10;

    const chunks = orderChunks(input.retrieval?.chunks ?? [], strategy);
    const history = maxHistory > 0 ? (input.history ?? []).slice(-maxHistory) : [];

    const window: ContextWindow = {
      systemPrompt: this.systemPromptFor(input.promptType),
      conversationHistory: history,
      retrievedContext: formatChunks(chunks),
      userQuery: input.query,
      estimatedTokens: 0,
      sources: input.retrieval?.sources ?? [],
    };
    window.estimatedTokens = estimateWindow(window);

    if (window.estimatedTokens > maxContextLength && window.retrievedContext) {
      const ratio = maxContextLength / window.estimatedTokens;
      const keepWords = Math.floor(countWords(window.retrievedContext) * ratio);
      const before = window.estimatedTokens;

      window.retrievedContext = truncateWords(window.retrievedContext, keepWords);
      window.estimatedTokens = estimateWindow(window);

      log.debug(
        `Retrieved context truncated: ~${before} → ~${window.estimatedTokens} tokens (budget ${maxContextLength})`
      );
    }

    return window;
  }

  toMessages(window: ContextWindow): LLMMessage[] {
    return [
      { role: "system", content: window.systemPrompt },
      { role: "user", content: composeUserPrompt(window) },
    ];
  }
}
