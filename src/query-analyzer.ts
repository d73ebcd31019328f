/**
 * Query Analyzer - intent, keywords and retrieval hints for a user query
 *
 * A deterministic pass (lexicon patterns, stopword-filtered keywords,
 * complexity heuristics) always runs. When a generation provider is
 * configured, a model-produced analysis is merged on top of it; a failed
 * or unparseable reply leaves the deterministic result untouched.
 */

import { z } from "zod";
import lexiconData from "./data/query-lexicon.json";
import { QUERY_INTENTS } from "./lib/types";
import type { QueryAnalysis, QueryIntent } from "./lib/types";
import type { GenerationProvider } from "./llm/types";
import { tokenizeQuery } from "./keyword-scorer";
import { parseJsonFromLLM } from "./utils/json-parser";
import { withTimeout } from "./utils/timeout";
import { attempt, err, ok } from "./lib/result";
import type { Result } from "./lib/result";
import { createLogger, preview } from "./utils/logger";

const log = createLogger("QueryAnalyzer");

const MAX_KEYWORDS = 10;
const MAX_ENTITIES = 10;
const MAX_CATEGORIES = 5;

export interface QueryLexicon {
  intentPatterns: Record<QueryIntent, string[]>;
  complexWords: string[];
  logicalConnectives: string[];
  entityPatterns: Record<string, string[]>;
  categoryKeywords: Record<string, string[]>;
}

const DEFAULT_LEXICON: QueryLexicon = lexiconData;

const ANALYSIS_PROMPT = `You are an expert query analyst. Analyse the user query below and reply with JSON only.

User query: {query}

Reply in this JSON format:
{
  "intent": "question | search | summary | comparison | analysis | recommendation",
  "keywords": ["keyword1", "keyword2"],
  "entities": ["entity1", "entity2"],
  "query_type": "factual | analytical | creative | procedural",
  "complexity_score": 0.5,
  "requires_context": true,
  "suggested_retrieval_count": 5,
  "suggested_categories": ["category1"]
}

complexity_score is between 0 and 1 (1 = most complex).
suggested_retrieval_count is an integer between 1 and 10.`;

/** Each field is validated on its own; a bad field is dropped, not the reply. */
const enhancementSchema = z.object({
  intent: z.enum(QUERY_INTENTS).optional().catch(undefined),
  keywords: z.array(z.string()).optional().catch(undefined),
  entities: z.array(z.string()).optional().catch(undefined),
  query_type: z.string().min(1).optional().catch(undefined),
  complexity_score: z.number().min(0).max(1).optional().catch(undefined),
  requires_context: z.boolean().optional().catch(undefined),
  suggested_retrieval_count: z.number().optional().catch(undefined),
  suggested_categories: z.array(z.string()).optional().catch(undefined),
});

export type QueryEnhancement = z.infer<typeof enhancementSchema>;

export interface QueryAnalyzerOptions {
  llm?: GenerationProvider;
  useLLM?: boolean; // Default: true when llm is given
  lexicon?: QueryLexicon;
  timeoutMs?: number; // Default: 15000
}

const QUERY_TYPES: Record<QueryIntent, string> = {
  question: "factual",
  search: "factual",
  summary: "analytical",
  comparison: "analytical",
  analysis: "analytical",
  recommendation: "procedural",
};

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function union(base: string[], extra: string[], limit: number): string[] {
  return [...new Set([...base, ...extra])].slice(0, limit);
}

/** Thresholds: >0.8 → 8, >0.6 → 6, >0.4 → 4, else 3. */
export function retrievalCountFor(complexity: number): number {
  if (complexity > 0.8) return 8;
  if (complexity > 0.6) return 6;
  if (complexity > 0.4) return 4;
  return 3;
}

export function defaultAnalysis(query: string): QueryAnalysis {
  return {
    originalQuery: query,
    intent: "question",
    keywords: [],
    entities: [],
    queryType: "factual",
    complexityScore: 0.5,
    requiresContext: true,
    suggestedRetrievalCount: 3,
    suggestedCategories: [],
  };
}

export class QueryAnalyzer {
  private llm?: GenerationProvider;
  private useLLM: boolean;
  private lexicon: QueryLexicon;
  private timeoutMs: number;
  private intentRules: Array<{ intent: QueryIntent; patterns: RegExp[] }>;
  private entityRules: RegExp[];

  constructor(options: QueryAnalyzerOptions = {}) {
    this.llm = options.llm;
    this.useLLM = options.useLLM ?? options.llm !== undefined;
    this.lexicon = options.lexicon ?? DEFAULT_LEXICON;
    this.timeoutMs = options.timeoutMs ?? 15000;

    // QUERY_INTENTS is the match priority
    this.intentRules = QUERY_INTENTS.map((intent) => ({
      intent,
      patterns: this.lexicon.intentPatterns[intent].map((p) => new RegExp(p, "i")),
    }));
    this.entityRules = Object.values(this.lexicon.entityPatterns)
      .flat()
      .map((p) => new RegExp(p, "g"));
  }

  async analyze(
    query: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<QueryAnalysis> {
    if (!query.trim()) {
      return defaultAnalysis(query);
    }

    const basic = this.analyzeBasic(query);
    if (!this.useLLM || !this.llm) {
      return basic;
    }

    const enhancement = await this.enhance(query, options.signal);
    if (!enhancement.ok) {
      log.warn(
        `LLM analysis skipped (query: "${preview(query)}"): ${enhancement.error.message}`
      );
      return basic;
    }

    const merged = this.mergeAnalysis(basic, enhancement.value);
    log.debug(
      `Query analysed: "${preview(query)}" → intent ${merged.intent}, complexity ${merged.complexityScore.toFixed(2)}`
    );
    return merged;
  }

  analyzeBasic(query: string): QueryAnalysis {
    if (!query.trim()) {
      return defaultAnalysis(query);
    }

    const intent = this.detectIntent(query);
    const keywords = tokenizeQuery(query).slice(0, MAX_KEYWORDS);
    const complexityScore = this.assessComplexity(query);

    return {
      originalQuery: query,
      intent,
      keywords,
      entities: this.extractEntities(query),
      queryType: QUERY_TYPES[intent],
      complexityScore,
      requiresContext: true,
      suggestedRetrievalCount: retrievalCountFor(complexityScore),
      suggestedCategories: this.suggestCategories(query, keywords),
    };
  }

  detectIntent(query: string): QueryIntent {
    const rule = this.intentRules.find((r) => r.patterns.some((p) => p.test(query)));
    return rule ? rule.intent : "question";
  }

  extractEntities(query: string): string[] {
    const entities = new Set<string>();
    for (const pattern of this.entityRules) {
      for (const match of query.matchAll(pattern)) {
        entities.add(match[0]);
      }
    }
    return [...entities].slice(0, MAX_ENTITIES);
  }

  /**
   * min(len/100, 0.3) + min(0.1 × "?" count, 0.2) + 0.1 per complex word
   * + 0.15 per logical connective, clamped to 1.
   */
  assessComplexity(query: string): number {
    const lower = ` ${query.toLowerCase()} `;
    let complexity = Math.min(query.length / 100, 0.3);

    const questionMarks = (query.match(/[?？]/g) ?? []).length;
    complexity += Math.min(questionMarks * 0.1, 0.2);

    for (const word of this.lexicon.complexWords) {
      if (lower.includes(word)) complexity += 0.1;
    }
    for (const connective of this.lexicon.logicalConnectives) {
      if (lower.includes(connective)) complexity += 0.15;
    }

    return Math.min(complexity, 1);
  }

  /**
   * +2 per category keyword found in the query, +1 per analysed keyword that
   * contains or is contained in a category keyword. Top 3 with score > 0.
   */
  suggestCategories(query: string, keywords: string[]): string[] {
    const queryLower = query.toLowerCase();
    const keywordsLower = keywords.map((k) => k.toLowerCase());
    const scored: Array<{ category: string; score: number }> = [];

    for (const [category, categoryKeywords] of Object.entries(this.lexicon.categoryKeywords)) {
      let score = 0;
      for (const keyword of categoryKeywords) {
        if (queryLower.includes(keyword)) score += 2;
        for (const userKeyword of keywordsLower) {
          if (keyword.includes(userKeyword) || userKeyword.includes(keyword)) score += 1;
        }
      }
      if (score > 0) scored.push({ category, score });
    }

    return scored
      .sort((a, b) => b.score - a.score)
      .slice(0, 3)
      .map((s) => s.category);
  }

  mergeAnalysis(basic: QueryAnalysis, enhancement: QueryEnhancement): QueryAnalysis {
    const merged: QueryAnalysis = { ...basic };

    if (enhancement.intent) {
      merged.intent = enhancement.intent;
    }
    if (enhancement.query_type) {
      merged.queryType = enhancement.query_type;
    }
    if (enhancement.keywords && enhancement.keywords.length > 0) {
      merged.keywords = union(basic.keywords, enhancement.keywords, MAX_KEYWORDS);
    }
    if (enhancement.entities && enhancement.entities.length > 0) {
      merged.entities = union(basic.entities, enhancement.entities, MAX_ENTITIES);
    }
    if (enhancement.complexity_score !== undefined) {
      merged.complexityScore = (basic.complexityScore + enhancement.complexity_score) / 2;
    }
    if (enhancement.requires_context !== undefined) {
      merged.requiresContext = enhancement.requires_context;
    }
    if (enhancement.suggested_retrieval_count !== undefined) {
      const suggested = clamp(Math.round(enhancement.suggested_retrieval_count), 1, 10);
      merged.suggestedRetrievalCount = Math.max(basic.suggestedRetrievalCount, suggested);
    }
    if (enhancement.suggested_categories && enhancement.suggested_categories.length > 0) {
      merged.suggestedCategories = union(
        basic.suggestedCategories,
        enhancement.suggested_categories,
        MAX_CATEGORIES
      );
    }

    return merged;
  }

  private async enhance(
    query: string,
    signal?: AbortSignal
  ): Promise<Result<QueryEnhancement>> {
    const llm = this.llm;
    if (!llm) return err(new Error("No generation provider configured"));

    const prompt = ANALYSIS_PROMPT.replace("{query}", query);
    const reply = await attempt(() =>
      withTimeout(
        (s) =>
          llm.generate([{ role: "user", content: prompt }], {
            temperature: 0.1,
            maxTokens: 500,
            signal: s,
          }),
        this.timeoutMs,
        "query-analysis",
        signal
      )
    );
    if (!reply.ok) return reply;

    const json = parseJsonFromLLM(reply.value.text);
    if (!json.ok) return json;

    const parsed = enhancementSchema.safeParse(json.value);
    if (!parsed.success) {
      return err(new Error("Analysis reply is not a JSON object"));
    }
    return ok(parsed.data);
  }
}
