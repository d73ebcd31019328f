/**
 * PostgreSQL Storage Service - Document Catalog
 *
 * Owns the connection and the two knowledge tables:
 * - knowledge_documents: one row per ingested document (metadata + text)
 * - knowledge_embeddings: one row per chunk (pgvector embedding), see vector-index.ts
 *
 * Implements DocumentCatalog (filtered listing, metadata lookup) and
 * KeywordCategoryIndex (keyword/tag and category lookup) with
 * parameterised SQL.
 */

import { Client } from "pg";
import type { QueryResult, QueryResultRow } from "pg";
import type {
  CatalogDocument,
  DocumentCatalog,
  DocumentMeta,
  KeywordCategoryIndex,
  SearchFilters,
} from "./lib/types";
import { errorMessage } from "./lib/errors";
import { createLogger } from "./utils/logger";

const log = createLogger("Postgres");

export interface PostgresConfig {
  connectionString?: string;
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  ssl?: boolean | { rejectUnauthorized: boolean };
  schema?: string; // Defaults to 'public'
  embeddingDimensions?: number; // Default: 1536
}

interface DocumentRow {
  id: string;
  file_name: string;
  title: string | null;
  author: string | null;
  document_type: string;
  category: string | null;
  tags: string[] | null;
  content: string | null;
  is_indexed: boolean;
  created_at: Date;
}

interface IdRow {
  id: string;
}

function toCatalogDocument(row: DocumentRow): CatalogDocument {
  return {
    id: row.id,
    filename: row.file_name,
    isIndexed: row.is_indexed,
    type: row.document_type,
    tags: row.tags ?? [],
    category: row.category ?? undefined,
    createdAt: row.created_at,
    content: row.content ?? undefined,
  };
}

/**
 * WHERE clause for the shared filter semantics: id/type membership,
 * inclusive date range, ANY-tag overlap.
 */
export function buildFilterClause(filters?: SearchFilters): {
  where: string;
  params: unknown[];
} {
  const conditions: string[] = [];
  const params: unknown[] = [];

  if (filters?.documentIds) {
    params.push(filters.documentIds);
    conditions.push(`id = ANY($${params.length})`);
  }
  if (filters?.documentTypes) {
    params.push(filters.documentTypes);
    conditions.push(`document_type = ANY($${params.length})`);
  }
  if (filters?.dateRange?.from) {
    params.push(filters.dateRange.from);
    conditions.push(`created_at >= $${params.length}`);
  }
  if (filters?.dateRange?.to) {
    params.push(filters.dateRange.to);
    conditions.push(`created_at <= $${params.length}`);
  }
  if (filters?.tags && filters.tags.length > 0) {
    params.push(filters.tags);
    conditions.push(`tags && $${params.length}::text[]`);
  }

  return {
    where: conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "",
    params,
  };
}

export class PostgresService implements DocumentCatalog, KeywordCategoryIndex {
  public readonly config: PostgresConfig;
  private client: Client;
  private schema: string;
  private dimensions: number;

  constructor(config: PostgresConfig) {
    this.config = config;
    this.schema = config.schema || "public";
    this.dimensions = config.embeddingDimensions ?? 1536;
    this.client = config.connectionString
      ? new Client({ connectionString: config.connectionString, ssl: config.ssl })
      : new Client({
          host: config.host,
          port: config.port,
          database: config.database,
          user: config.user,
          password: config.password,
          ssl: config.ssl,
        });
  }

  /**
   * Create tables
   * Note: For production, use migrations instead of this method
   */
  private async createTables(): Promise<void> {
    await this.client.query(`
      CREATE TABLE IF NOT EXISTS knowledge_documents (
        id VARCHAR(255) PRIMARY KEY,
        file_name VARCHAR(255) NOT NULL,
        title TEXT,
        author VARCHAR(255),
        document_type VARCHAR(50) NOT NULL,
        category VARCHAR(100),
        tags TEXT[] DEFAULT '{}',
        keywords TEXT[] DEFAULT '{}',
        content TEXT,
        is_indexed BOOLEAN DEFAULT FALSE,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );
    `);

    await this.client.query(`
      CREATE TABLE IF NOT EXISTS knowledge_embeddings (
        id VARCHAR(255) PRIMARY KEY,
        document_id VARCHAR(255) REFERENCES knowledge_documents(id) ON DELETE CASCADE,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        embedding vector(${this.dimensions}) NOT NULL,
        metadata JSONB,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      );
    `);

    await this.client.query(`
      CREATE INDEX IF NOT EXISTS idx_knowledge_embeddings_document
        ON knowledge_embeddings (document_id, chunk_index);
      CREATE INDEX IF NOT EXISTS idx_knowledge_documents_category
        ON knowledge_documents (category);
    `);
  }

  /**
   * Connect, select the schema, enable pgvector and create tables
   */
  async initialize(): Promise<void> {
    log.info(
      `Connecting to PostgreSQL at ${this.config.host}:${this.config.port}/${this.config.database} (schema: ${this.schema})`
    );

    await this.client.connect();

    if (this.schema !== "public") {
      await this.client.query(`CREATE SCHEMA IF NOT EXISTS ${this.schema};`);
    }
    await this.client.query(`SET search_path TO ${this.schema}, public;`);
    await this.client.query(`CREATE EXTENSION IF NOT EXISTS vector;`);
    await this.createTables();

    log.info("PostgreSQL initialized");
  }

  // ============================================================================
  // Documents
  // ============================================================================

  async listEligible(filters?: SearchFilters): Promise<CatalogDocument[]> {
    const { where, params } = buildFilterClause(filters);
    const result = await this.query<DocumentRow>(
      `SELECT id, file_name, title, author, document_type, category, tags, content,
              is_indexed, created_at
       FROM knowledge_documents
       ${where}
       ORDER BY created_at DESC`,
      params
    );
    return result.rows.map(toCatalogDocument);
  }

  async getMeta(id: string): Promise<DocumentMeta | undefined> {
    const result = await this.query<DocumentRow>(
      `SELECT id, file_name, title, author, document_type, category, tags, NULL AS content,
              is_indexed, created_at
       FROM knowledge_documents
       WHERE id = $1`,
      [id]
    );
    const row = result.rows[0];
    if (!row) return undefined;

    return {
      id: row.id,
      filename: row.file_name,
      title: row.title ?? undefined,
      author: row.author ?? undefined,
      category: row.category ?? undefined,
      type: row.document_type,
      createdAt: row.created_at,
    };
  }

  // ============================================================================
  // Keyword / Category Lookup
  // ============================================================================

  /**
   * Documents whose keywords or tags contain any of `keywords`
   * (case-insensitive), most matches first.
   */
  async byKeywords(keywords: string[], maxResults: number = 10): Promise<string[]> {
    if (keywords.length === 0) return [];

    const result = await this.query<IdRow>(
      `SELECT id FROM (
         SELECT d.id,
                (SELECT COUNT(*)
                 FROM unnest($1::text[]) AS wanted
                 WHERE lower(wanted) IN (
                   SELECT lower(k)
                   FROM unnest(COALESCE(d.keywords, '{}') || COALESCE(d.tags, '{}')) AS k
                 )) AS matches
         FROM knowledge_documents d
       ) scored
       WHERE matches > 0
       ORDER BY matches DESC, id ASC
       LIMIT $2`,
      [keywords, maxResults]
    );
    return result.rows.map((row) => row.id);
  }

  async byCategory(categories: string[]): Promise<string[]> {
    if (categories.length === 0) return [];

    const result = await this.query<IdRow>(
      `SELECT id FROM knowledge_documents
       WHERE category = ANY($1)
       ORDER BY created_at DESC`,
      [categories]
    );
    return result.rows.map((row) => row.id);
  }

  // ============================================================================
  // Connection
  // ============================================================================

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.query("SELECT 1");
      return true;
    } catch (error) {
      log.warn(`Health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client.end();
    log.info("PostgreSQL connection closed");
  }

  async query<R extends QueryResultRow = QueryResultRow>(
    sql: string,
    params?: unknown[]
  ): Promise<QueryResult<R>> {
    return this.client.query<R>(sql, params);
  }
}
