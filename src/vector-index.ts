/**
 * pgvector chunk index over knowledge_embeddings
 *
 * Cosine distance (`<=>`) nearest-neighbour search, optionally restricted to
 * a set of documents. Embeddings travel as pgvector text literals.
 */

import { z } from "zod";
import { PostgresService } from "./storage";
import type { ChunkRecord, StoredChunk, VectorIndex, VectorMatch } from "./lib/types";
import { throwIfAborted } from "./utils/timeout";
import { createLogger } from "./utils/logger";

const log = createLogger("VectorIndex");

interface ChunkRow {
  id: string;
  document_id: string;
  chunk_index: number;
  content: string;
  metadata: unknown;
}

interface MatchRow extends ChunkRow {
  distance: string | number;
}

interface CountRow {
  count: string;
}

const metadataSchema = z.record(z.unknown()).catch({});

export function toVectorLiteral(vector: number[]): string {
  return `[${vector.join(",")}]`;
}

function toStoredChunk(row: ChunkRow): StoredChunk {
  return {
    chunkId: row.id,
    documentId: row.document_id,
    text: row.content,
    chunkIndex: row.chunk_index,
    metadata: metadataSchema.parse(row.metadata ?? {}),
  };
}

export class PgVectorIndex implements VectorIndex {
  constructor(private storage: PostgresService) {}

  async query(
    vector: number[],
    k: number,
    documentIds?: string[],
    signal?: AbortSignal
  ): Promise<VectorMatch[]> {
    if (documentIds && documentIds.length === 0) return [];
    throwIfAborted(signal);

    const params: unknown[] = [toVectorLiteral(vector)];
    let sql = `
      SELECT id, document_id, chunk_index, content, metadata,
             embedding <=> $1::vector AS distance
      FROM knowledge_embeddings
    `;
    if (documentIds) {
      params.push(documentIds);
      sql += ` WHERE document_id = ANY($${params.length})`;
    }
    params.push(k);
    sql += ` ORDER BY distance ASC, id ASC LIMIT $${params.length}`;

    const result = await this.storage.query<MatchRow>(sql, params);
    throwIfAborted(signal);

    return result.rows.map((row) => ({
      ...toStoredChunk(row),
      distance: Number(row.distance),
    }));
  }

  async upsert(chunks: ChunkRecord[]): Promise<void> {
    const sql = `
      INSERT INTO knowledge_embeddings
        (id, document_id, chunk_index, content, embedding, metadata, created_at)
      VALUES ($1, $2, $3, $4, $5::vector, $6, CURRENT_TIMESTAMP)
      ON CONFLICT (id) DO UPDATE SET
        chunk_index = EXCLUDED.chunk_index,
        content = EXCLUDED.content,
        embedding = EXCLUDED.embedding,
        metadata = EXCLUDED.metadata;
    `;

    for (const chunk of chunks) {
      await this.storage.query(sql, [
        chunk.chunkId,
        chunk.documentId,
        chunk.chunkIndex,
        chunk.text,
        toVectorLiteral(chunk.embedding),
        JSON.stringify(chunk.metadata),
      ]);
    }

    log.debug(`Stored ${chunks.length} chunk embeddings`);
  }

  async delete(documentId: string): Promise<number> {
    const result = await this.storage.query(
      `DELETE FROM knowledge_embeddings WHERE document_id = $1`,
      [documentId]
    );
    return result.rowCount ?? 0;
  }

  async listChunks(documentId: string, limit: number): Promise<StoredChunk[]> {
    const result = await this.storage.query<ChunkRow>(
      `SELECT id, document_id, chunk_index, content, metadata
       FROM knowledge_embeddings
       WHERE document_id = $1
       ORDER BY chunk_index ASC
       LIMIT $2`,
      [documentId, limit]
    );
    return result.rows.map(toStoredChunk);
  }

  async count(): Promise<number> {
    const result = await this.storage.query<CountRow>(
      `SELECT COUNT(*) AS count FROM knowledge_embeddings`
    );
    return parseInt(result.rows[0]?.count ?? "0", 10);
  }
}
