/**
 * Search history and timing, reported by GET /api/retrieval/statistics.
 */

export interface SearchRecord {
  query: string;
  timestamp: number;
  elapsedMs: number;
  fromCache: boolean;
}

const HISTORY_LIMIT = 1000;
const HISTORY_KEEP = 500;

export class SearchStatsTracker {
  private history: SearchRecord[] = [];
  private totalTimeMs = 0;
  private timedSearches = 0;

  constructor(private clock: () => number = Date.now) {}

  record(query: string, elapsedMs: number, fromCache: boolean): void {
    this.history.push({ query, timestamp: this.clock(), elapsedMs, fromCache });
    if (this.history.length > HISTORY_LIMIT) {
      this.history = this.history.slice(-HISTORY_KEEP);
    }
    this.totalTimeMs += elapsedMs;
    this.timedSearches++;
  }

  get totalSearches(): number {
    return this.history.length;
  }

  get averageSearchTime(): number {
    return this.timedSearches === 0 ? 0 : this.totalTimeMs / this.timedSearches;
  }

  /** Most frequent queries, ties broken by first appearance. */
  popularQueries(limit: number = 10): Array<{ query: string; count: number }> {
    const counts = new Map<string, number>();
    for (const record of this.history) {
      counts.set(record.query, (counts.get(record.query) ?? 0) + 1);
    }
    return [...counts.entries()]
      .map(([query, count]) => ({ query, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, limit);
  }

  /** Searches per UTC day, keyed YYYY-MM-DD. */
  trends(): Record<string, number> {
    const trends: Record<string, number> = {};
    for (const record of this.history) {
      const day = new Date(record.timestamp).toISOString().slice(0, 10);
      trends[day] = (trends[day] ?? 0) + 1;
    }
    return trends;
  }

  reset(): void {
    this.history = [];
    this.totalTimeMs = 0;
    this.timedSearches = 0;
  }
}
