// ============================================================================
// Document Catalog Types
// ============================================================================

export interface CatalogDocument {
  id: string;
  filename: string;
  isIndexed: boolean; // Only indexed documents are semantically searchable
  type: string; // pdf, docx, markdown, text ...
  tags: string[];
  category?: string;
  createdAt: Date;
  content?: string; // Extracted text, read by the keyword pass
}

export interface DocumentMeta {
  id: string;
  filename: string;
  author?: string;
  title?: string;
  category?: string;
  type?: string;
  createdAt?: Date;
}

export interface DateRange {
  from?: Date;
  to?: Date;
}

export interface SearchFilters {
  documentIds?: string[];
  documentTypes?: string[];
  dateRange?: DateRange;
  tags?: string[];
}

// ============================================================================
// Query Analysis
// ============================================================================

export const QUERY_INTENTS = [
  "question",
  "search",
  "summary",
  "comparison",
  "analysis",
  "recommendation",
] as const;

export type QueryIntent = (typeof QUERY_INTENTS)[number];

export interface QueryAnalysis {
  originalQuery: string;
  intent: QueryIntent;
  keywords: string[];
  entities: string[];
  queryType: string; // factual, analytical, procedural, creative
  complexityScore: number; // 0-1
  requiresContext: boolean;
  suggestedRetrievalCount: number; // 1-10
  suggestedCategories: string[];
}

// ============================================================================
// Retrieval Types
// ============================================================================

export type SearchType = "semantic" | "keyword" | "hybrid";

export type SearchMode = SearchType;

/** global: threshold applies in every mode; hybrid-only: only when both passes run. */
export type ThresholdPolicy = "global" | "hybrid-only";

export interface RetrievedChunk {
  id: string;
  documentId: string;
  text: string;
  score: number; // Final score, 0-1
  searchType: SearchType;
  semanticScore?: number;
  keywordScore?: number;
  snippetStart?: number;
  snippetEnd?: number;
  matchedKeywords?: string[];
  highlightedText?: string;
  metadata: Record<string, unknown>;
}

export interface DocumentSource {
  documentId: string;
  filename: string;
  chunkId: string;
  relevanceScore: number;
  contentPreview: string; // First 100 characters
  // Catalog enrichment
  title?: string;
  author?: string;
  category?: string;
  documentType?: string;
  createdAt?: Date;
}

export interface RetrievalContext {
  query: string;
  chunks: RetrievedChunk[]; // Descending score
  totalFound: number;
  elapsedTime: number; // ms
  contextLength: number; // Sum of chunk text lengths
  sources: DocumentSource[];
  queryAnalysis?: QueryAnalysis;
}

// ============================================================================
// Hybrid Search Request / Result
// ============================================================================

export interface SearchRequest {
  query: string;
  nResults?: number; // Default: 10
  similarityThreshold?: number; // Default: 0.7
  filters?: SearchFilters;
  mode?: SearchMode; // Default: hybrid
  keywordWeight?: number; // Default: 0.3
  semanticWeight?: number; // Default: 0.7
  deduplicate?: boolean; // Default: true
  highlight?: boolean; // Default: true
  includeMetadata?: boolean; // Default: true
  useCache?: boolean; // Default: true
}

export interface SearchStrategy {
  semanticEnabled: boolean;
  keywordEnabled: boolean;
  similarityThreshold: number;
  candidateDocuments: number;
}

export interface SearchSuccess {
  success: true;
  context: RetrievalContext;
  strategy: SearchStrategy;
  fromCache: boolean;
}

export interface SearchFailure {
  success: false;
  query: string;
  error: string;
  elapsedTime: number;
}

export type SearchOutcome = SearchSuccess | SearchFailure;

export interface BatchSearchResult {
  results: SearchOutcome[];
  totalQueries: number;
  successfulQueries: number;
  failedQueries: number;
  totalTime: number; // ms
}

export interface SearchStatistics {
  totalSearches: number;
  popularQueries: Array<{ query: string; count: number }>;
  searchTrends: Record<string, number>;
  cacheSize: number;
  cacheHitRate: number;
  averageSearchTime: number;
}

// ============================================================================
// Storage Interfaces
// ============================================================================

export interface StoredChunk {
  chunkId: string;
  documentId: string;
  text: string;
  chunkIndex: number;
  metadata: Record<string, unknown>;
}

export interface VectorMatch extends StoredChunk {
  distance: number; // Cosine distance, similarity = 1 - distance
}

export interface ChunkRecord extends StoredChunk {
  embedding: number[];
}

export interface VectorIndex {
  /**
   * Nearest neighbours, closest first. `documentIds` restricts the search;
   * an empty list matches nothing, undefined matches everything.
   */
  query(
    vector: number[],
    k: number,
    documentIds?: string[],
    signal?: AbortSignal
  ): Promise<VectorMatch[]>;
  upsert(chunks: ChunkRecord[]): Promise<void>;
  delete(documentId: string): Promise<number>;
  /** Stored chunks of one document in chunk order. */
  listChunks(documentId: string, limit: number): Promise<StoredChunk[]>;
}

export interface DocumentCatalog {
  listEligible(filters?: SearchFilters): Promise<CatalogDocument[]>;
  getMeta(id: string): Promise<DocumentMeta | undefined>;
}

export interface KeywordCategoryIndex {
  /** Document ids ranked by number of matched keywords. */
  byKeywords(keywords: string[], maxResults?: number): Promise<string[]>;
  byCategory(categories: string[]): Promise<string[]>;
}
