/**
 * Type definitions for the conversation and answer-generation layer
 *
 * Sessions, chat requests/responses, stream events and the context window
 * handed to the generation step.
 */

import type { TokenUsage, FinishReason } from "../llm/types";
import type { DocumentSource, RetrievalContext } from "./types";

// ============================================================================
// Conversation State Management
// ============================================================================

export type MessageRole = "user" | "assistant" | "system";

export interface ChatMessage {
  role: MessageRole;
  content: string;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

export interface ConversationSession {
  id: string;
  messages: ChatMessage[]; // Oldest first, capped
  createdAt: Date;
  updatedAt: Date;
}

export interface ConversationSummary {
  conversationId: string;
  totalMessages: number;
  userMessages: number;
  assistantMessages: number;
  createdAt: Date;
  updatedAt: Date;
  durationMinutes: number;
}

export interface ConversationStatistics {
  totalConversations: number;
  totalMessages: number;
  averageMessagesPerConversation: number;
  activeConversations24h: number;
}

export interface RAGMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  averageResponseTimeMs: number;
}

// ============================================================================
// Context Window
// ============================================================================

export type ContextStrategy = "simple" | "ranked" | "hierarchical" | "summarized";

/** Selects the system prompt: plain answers, deep analysis or summaries. */
export type PromptType = "default" | "analysis" | "summary";

export interface ContextWindow {
  systemPrompt: string;
  conversationHistory: ChatMessage[];
  retrievedContext: string;
  userQuery: string;
  estimatedTokens: number;
  sources: DocumentSource[];
}

// ============================================================================
// Chat Request / Response
// ============================================================================

export interface ChatRequest {
  message: string;
  conversationId?: string;
  enableRetrieval?: boolean; // Default: true
  maxRetrievedChunks?: number; // Default: 5
  similarityThreshold?: number; // Default: 0.6
  contextStrategy?: ContextStrategy; // Default: ranked
  promptType?: PromptType; // Default: default
  maxContextLength?: number; // Default: 4000
  includeChatHistory?: boolean; // Default: true
  maxHistoryMessages?: number; // Default: 10
  temperature?: number; // Default: 0.7
  maxTokens?: number; // Default: 1000
}

export type ResolvedChatRequest = Required<Omit<ChatRequest, "conversationId">> & {
  conversationId?: string;
};

export interface ChatResponse {
  success: boolean;
  message: string;
  conversationId: string;
  responseTimeMs: number;
  retrievalContext?: RetrievalContext;
  sources: DocumentSource[];
  tokensUsed?: TokenUsage;
  finishReason?: FinishReason;
  modelUsed?: string;
  errorMessage?: string;
  timestamp: Date;
}

export type StreamEvent =
  | { type: "delta"; conversationId: string; text: string }
  | {
      type: "done";
      conversationId: string;
      finishReason: FinishReason;
      tokensUsed?: TokenUsage;
      sources: DocumentSource[];
      retrievalContext?: RetrievalContext;
      responseTimeMs: number;
    }
  | { type: "error"; conversationId: string; errorMessage: string };
