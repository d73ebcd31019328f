/**
 * Search Cache - TTL-bounded cache of recent retrieval results
 *
 * Keys are md5 hashes of the normalized query plus every parameter that
 * changes the result. Entries expire after `ttlSeconds` regardless of how
 * often they are read; beyond `maxEntries` the oldest insertion is evicted.
 * Values are copied in and out, so callers may reorder what they get back.
 */

import * as crypto from "crypto";
import type { RetrievalContext, SearchFilters, SearchStrategy } from "./lib/types";

export type Clock = () => number;

export interface SearchCacheOptions {
  ttlSeconds?: number; // Default: 300
  maxEntries?: number; // Default: 100
  clock?: Clock;
}

export interface CacheKeyParts {
  query: string;
  nResults: number;
  similarityThreshold: number;
  filters?: SearchFilters;
  semanticEnabled: boolean;
  keywordEnabled: boolean;
  keywordWeight: number;
  semanticWeight: number;
  deduplicate: boolean;
  highlight: boolean;
  includeMetadata: boolean;
}

export interface CachedSearch {
  context: RetrievalContext;
  strategy: SearchStrategy;
}

interface CacheEntry {
  value: CachedSearch;
  insertedAt: number;
}

function copySearch(search: CachedSearch): CachedSearch {
  return {
    context: {
      ...search.context,
      chunks: search.context.chunks.map((chunk) => ({ ...chunk })),
      sources: search.context.sources.map((source) => ({ ...source })),
    },
    strategy: { ...search.strategy },
  };
}

function normalizeFilters(filters: SearchFilters | undefined): unknown {
  if (!filters) return null;
  return {
    documentIds: filters.documentIds ? [...filters.documentIds].sort() : null,
    documentTypes: filters.documentTypes ? [...filters.documentTypes].sort() : null,
    tags: filters.tags ? [...filters.tags].sort() : null,
    from: filters.dateRange?.from?.toISOString() ?? null,
    to: filters.dateRange?.to?.toISOString() ?? null,
  };
}

export function buildCacheKey(parts: CacheKeyParts): string {
  const normalized = JSON.stringify([
    parts.query.trim().toLowerCase().replace(/\s+/g, " "),
    parts.nResults,
    parts.similarityThreshold,
    normalizeFilters(parts.filters),
    parts.semanticEnabled,
    parts.keywordEnabled,
    parts.keywordWeight,
    parts.semanticWeight,
    parts.deduplicate,
    parts.highlight,
    parts.includeMetadata,
  ]);
  return crypto.createHash("md5").update(normalized).digest("hex");
}

export class SearchCache {
  private entries = new Map<string, CacheEntry>();
  private ttlMs: number;
  private maxEntries: number;
  private clock: Clock;
  private hits = 0;
  private misses = 0;

  constructor(options: SearchCacheOptions = {}) {
    this.ttlMs = (options.ttlSeconds ?? 300) * 1000;
    this.maxEntries = options.maxEntries ?? 100;
    this.clock = options.clock ?? Date.now;
  }

  get(key: string): CachedSearch | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.clock() - entry.insertedAt >= this.ttlMs) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    this.hits++;
    return copySearch(entry.value);
  }

  set(key: string, value: CachedSearch): void {
    // Re-inserting moves the key to the end of the insertion order
    this.entries.delete(key);
    this.entries.set(key, { value: copySearch(value), insertedAt: this.clock() });

    if (this.entries.size > this.maxEntries) {
      this.purgeExpired();
    }
    for (const oldest of this.entries.keys()) {
      if (this.entries.size <= this.maxEntries) break;
      this.entries.delete(oldest);
    }
  }

  purgeExpired(): number {
    const now = this.clock();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (now - entry.insertedAt >= this.ttlMs) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  get hitRate(): number {
    const total = this.hits + this.misses;
    return total === 0 ? 0 : this.hits / total;
  }
}
