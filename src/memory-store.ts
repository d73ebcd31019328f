/**
 * In-memory storage adapters
 *
 * Back STORAGE_BACKEND=memory and the test suite. Same contracts as the
 * Postgres adapters in storage.ts and vector-index.ts.
 */

import type {
  CatalogDocument,
  ChunkRecord,
  DocumentCatalog,
  DocumentMeta,
  KeywordCategoryIndex,
  SearchFilters,
  StoredChunk,
  VectorIndex,
  VectorMatch,
} from "./lib/types";

export interface IndexedDocument extends CatalogDocument {
  keywords?: string[];
  author?: string;
  title?: string;
}

/**
 * Shared filter semantics: id and type set membership, inclusive date
 * range (either bound optional), and ANY-tag matching.
 */
export function matchesFilters(
  doc: CatalogDocument,
  filters: SearchFilters | undefined
): boolean {
  if (!filters) return true;

  if (filters.documentIds && !filters.documentIds.includes(doc.id)) {
    return false;
  }
  if (filters.documentTypes && !filters.documentTypes.includes(doc.type)) {
    return false;
  }
  const range = filters.dateRange;
  if (range?.from && doc.createdAt.getTime() < range.from.getTime()) {
    return false;
  }
  if (range?.to && doc.createdAt.getTime() > range.to.getTime()) {
    return false;
  }
  if (filters.tags && filters.tags.length > 0) {
    if (!filters.tags.some((tag) => doc.tags.includes(tag))) {
      return false;
    }
  }
  return true;
}

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export class InMemoryDocumentCatalog implements DocumentCatalog, KeywordCategoryIndex {
  private documents = new Map<string, IndexedDocument>();

  constructor(documents: IndexedDocument[] = []) {
    for (const doc of documents) {
      this.addDocument(doc);
    }
  }

  addDocument(doc: IndexedDocument): void {
    this.documents.set(doc.id, doc);
  }

  get size(): number {
    return this.documents.size;
  }

  async listEligible(filters?: SearchFilters): Promise<CatalogDocument[]> {
    return [...this.documents.values()]
      .filter((doc) => matchesFilters(doc, filters))
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  async getMeta(id: string): Promise<DocumentMeta | undefined> {
    const doc = this.documents.get(id);
    if (!doc) return undefined;
    return {
      id: doc.id,
      filename: doc.filename,
      author: doc.author,
      title: doc.title,
      category: doc.category,
      type: doc.type,
      createdAt: doc.createdAt,
    };
  }

  async byKeywords(keywords: string[], maxResults: number = 10): Promise<string[]> {
    const wanted = keywords.map((k) => k.toLowerCase());
    const scored: Array<{ id: string; matches: number }> = [];

    for (const doc of this.documents.values()) {
      const docKeywords = [...(doc.keywords ?? []), ...doc.tags].map((k) =>
        k.toLowerCase()
      );
      const matches = wanted.filter((k) => docKeywords.includes(k)).length;
      if (matches > 0) {
        scored.push({ id: doc.id, matches });
      }
    }

    return scored
      .sort((a, b) => b.matches - a.matches || a.id.localeCompare(b.id))
      .slice(0, maxResults)
      .map((s) => s.id);
  }

  async byCategory(categories: string[]): Promise<string[]> {
    return [...this.documents.values()]
      .filter((doc) => doc.category !== undefined && categories.includes(doc.category))
      .map((doc) => doc.id);
  }
}

export class InMemoryVectorIndex implements VectorIndex {
  private chunks = new Map<string, ChunkRecord>();

  constructor(chunks: ChunkRecord[] = []) {
    for (const chunk of chunks) {
      this.chunks.set(chunk.chunkId, chunk);
    }
  }

  async query(
    vector: number[],
    k: number,
    documentIds?: string[]
  ): Promise<VectorMatch[]> {
    const allowed = documentIds ? new Set(documentIds) : undefined;
    const matches: VectorMatch[] = [];

    for (const chunk of this.chunks.values()) {
      if (allowed && !allowed.has(chunk.documentId)) continue;
      matches.push({
        chunkId: chunk.chunkId,
        documentId: chunk.documentId,
        text: chunk.text,
        chunkIndex: chunk.chunkIndex,
        metadata: chunk.metadata,
        distance: 1 - cosineSimilarity(vector, chunk.embedding),
      });
    }

    return matches
      .sort((a, b) => a.distance - b.distance || a.chunkId.localeCompare(b.chunkId))
      .slice(0, k);
  }

  async upsert(chunks: ChunkRecord[]): Promise<void> {
    for (const chunk of chunks) {
      this.chunks.set(chunk.chunkId, chunk);
    }
  }

  async delete(documentId: string): Promise<number> {
    let removed = 0;
    for (const [id, chunk] of this.chunks) {
      if (chunk.documentId === documentId) {
        this.chunks.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async listChunks(documentId: string, limit: number): Promise<StoredChunk[]> {
    return [...this.chunks.values()]
      .filter((chunk) => chunk.documentId === documentId)
      .sort((a, b) => a.chunkIndex - b.chunkIndex)
      .slice(0, limit)
      .map(({ embedding: _embedding, ...stored }) => stored);
  }

  get size(): number {
    return this.chunks.size;
  }
}
