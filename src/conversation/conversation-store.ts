/**
 * Conversation Store
 *
 * Owns every chat session: message history (FIFO-capped), idle expiry,
 * capacity eviction and the aggregate request metrics.
 *
 * All operations are synchronous, so each one runs to completion before
 * any other request on the event loop can observe the session.
 */

import * as crypto from "crypto";
import type {
  ChatMessage,
  ConversationSession,
  ConversationStatistics,
  ConversationSummary,
  MessageRole,
  RAGMetrics,
} from "../lib/conversation-types";
import { createLogger } from "../utils/logger";

const log = createLogger("ConversationStore");

const HOUR_MS = 60 * 60 * 1000;

export interface ConversationStoreOptions {
  maxMessages?: number; // Default: 100
  maxSessions?: number; // Default: 1000
  expireHours?: number; // Default: 24
  clock?: () => number;
  generateId?: () => string;
}

function emptyMetrics(): RAGMetrics {
  return {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    averageResponseTimeMs: 0,
  };
}

function snapshot(session: ConversationSession): ConversationSession {
  return {
    id: session.id,
    messages: session.messages.map((m) => ({ ...m })),
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
  };
}

export class ConversationStore {
  private sessions = new Map<string, ConversationSession>();
  private metrics: RAGMetrics = emptyMetrics();
  readonly maxMessages: number;
  readonly maxSessions: number;
  readonly expireHours: number;
  private clock: () => number;
  private generateId: () => string;

  constructor(options: ConversationStoreOptions = {}) {
    this.maxMessages = options.maxMessages ?? 100;
    this.maxSessions = options.maxSessions ?? 1000;
    this.expireHours = options.expireHours ?? 24;
    this.clock = options.clock ?? Date.now;
    this.generateId = options.generateId ?? (() => crypto.randomUUID());
  }

  /**
   * Returns the id of an existing session, or creates one (with a fresh
   * id when none is given).
   */
  createOrGet(conversationId?: string): string {
    const id = conversationId || this.generateId();
    if (!this.sessions.has(id)) {
      const now = new Date(this.clock());
      this.sessions.set(id, { id, messages: [], createdAt: now, updatedAt: now });
      log.debug(`Created conversation ${id}`);
    }
    return id;
  }

  addMessage(
    conversationId: string,
    role: MessageRole,
    content: string,
    metadata?: Record<string, unknown>
  ): ChatMessage {
    this.createOrGet(conversationId);
    const session = this.sessions.get(conversationId);
    const now = new Date(this.clock());
    const message: ChatMessage = { role, content, timestamp: now, metadata };
    if (!session) return message;

    const messages = [...session.messages, message];
    session.messages =
      messages.length > this.maxMessages ? messages.slice(-this.maxMessages) : messages;
    session.updatedAt = now;
    return message;
  }

  getRecent(conversationId: string, limit: number = 10): ChatMessage[] {
    const session = this.sessions.get(conversationId);
    if (!session || limit <= 0) return [];
    return session.messages.slice(-limit).map((m) => ({ ...m }));
  }

  getConversation(conversationId: string): ConversationSession | undefined {
    const session = this.sessions.get(conversationId);
    return session ? snapshot(session) : undefined;
  }

  has(conversationId: string): boolean {
    return this.sessions.has(conversationId);
  }

  clear(conversationId: string): boolean {
    const existed = this.sessions.delete(conversationId);
    if (existed) {
      log.info(`Cleared conversation ${conversationId}`);
    }
    return existed;
  }

  getSummary(conversationId: string): ConversationSummary | undefined {
    const session = this.sessions.get(conversationId);
    if (!session) return undefined;

    return {
      conversationId: session.id,
      totalMessages: session.messages.length,
      userMessages: session.messages.filter((m) => m.role === "user").length,
      assistantMessages: session.messages.filter((m) => m.role === "assistant").length,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
      durationMinutes:
        (session.updatedAt.getTime() - session.createdAt.getTime()) / 60000,
    };
  }

  /** Most recently updated first. */
  listConversations(limit: number = 50): ConversationSummary[] {
    return [...this.sessions.values()]
      .sort((a, b) => b.updatedAt.getTime() - a.updatedAt.getTime())
      .slice(0, limit)
      .map((session) => this.getSummary(session.id))
      .filter((summary): summary is ConversationSummary => summary !== undefined);
  }

  /**
   * Removes sessions idle for strictly longer than `idleHours`.
   */
  sweepExpired(idleHours: number = this.expireHours): number {
    if (idleHours <= 0) return 0;

    const cutoff = this.clock() - idleHours * HOUR_MS;
    const expired = [...this.sessions.values()]
      .filter((session) => session.updatedAt.getTime() < cutoff)
      .map((session) => session.id);

    for (const id of expired) {
      this.sessions.delete(id);
    }
    if (expired.length > 0) {
      log.info(`Removed ${expired.length} expired conversations`);
    }
    return expired.length;
  }

  /**
   * Evicts the least recently updated sessions until at most `maxSessions` remain.
   */
  sweepExcess(maxSessions: number = this.maxSessions): number {
    const excess = this.sessions.size - maxSessions;
    if (excess <= 0) return 0;

    const oldest = [...this.sessions.values()]
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, excess)
      .map((session) => session.id);

    for (const id of oldest) {
      this.sessions.delete(id);
    }
    log.info(`Evicted ${oldest.length} conversations over the ${maxSessions} limit`);
    return oldest.length;
  }

  recordOutcome(latencyMs: number, success: boolean): void {
    const m = this.metrics;
    m.totalRequests++;
    if (success) {
      m.successfulRequests++;
    } else {
      m.failedRequests++;
    }
    m.averageResponseTimeMs =
      (m.averageResponseTimeMs * (m.totalRequests - 1) + latencyMs) / m.totalRequests;
  }

  getMetrics(): RAGMetrics {
    return { ...this.metrics };
  }

  resetMetrics(): void {
    this.metrics = emptyMetrics();
  }

  getStatistics(): ConversationStatistics {
    const sessions = [...this.sessions.values()];
    const totalMessages = sessions.reduce((sum, s) => sum + s.messages.length, 0);
    const activeCutoff = this.clock() - 24 * HOUR_MS;

    return {
      totalConversations: sessions.length,
      totalMessages,
      averageMessagesPerConversation:
        sessions.length === 0 ? 0 : totalMessages / sessions.length,
      activeConversations24h: sessions.filter(
        (s) => s.updatedAt.getTime() > activeCutoff
      ).length,
    };
  }

  get size(): number {
    return this.sessions.size;
  }
}
