import { z } from "zod";
import { EmbeddingInitError } from "../../domain/errors.js";
import { Chunk, ChunkMetadata, ScoredChunk } from "../../domain/types.js";
import { VectorStore, VectorStoreStorageInfo } from "../../domain/vectorStore.js";
import { EmbeddingProvider } from "../ai/types.js";
import { SqlPool } from "../db/postgres.js";
import { createLogger } from "../../utils/logger.js";
import { contentHash, uniqueByContent } from "../../utils/text.js";
import { l2Normalize } from "../../utils/vector.js";
import { chunkMetadataSchema } from "./corpusFiles.js";
import { rankByKeywords } from "./keywordSearch.js";

const log = createLogger("pgvector-store");

const chunkRowSchema = z.object({
  position: z.coerce.number(),
  content: z.string(),
  metadata: z.unknown(),
});

const scoredRowSchema = chunkRowSchema.extend({
  score: z.coerce.number(),
});

// MAX() of no rows is NULL, which coerces to 0.
const headRowSchema = z.object({ max: z.coerce.number() });

const countRowSchema = z.object({ count: z.coerce.number() });

const hashRowSchema = z.object({ content_hash: z.string() });

const pendingRowSchema = z.object({ position: z.coerce.number(), content: z.string() });

type PgChunkRow = z.infer<typeof chunkRowSchema>;

export interface PgVectorStoreOptions {
  collectionName: string;
  vectorDimension: number;
  keywordStopwords?: readonly string[];
}

/**
 * Same contract as the file store over a `corpus_chunks` table. Each add is one transaction
 * holding the collection's advisory lock, so positions stay unique across concurrent adds.
 * Rows stored without an embedding are reachable through keyword search only.
 */
export class PgVectorStore implements VectorStore {
  private initialized: Promise<void> | null = null;

  private readonly stopwords: ReadonlySet<string>;

  constructor(
    private readonly pool: SqlPool,
    private readonly provider: EmbeddingProvider | null,
    private readonly options: PgVectorStoreOptions,
  ) {
    this.stopwords = new Set(options.keywordStopwords ?? []);
  }

  initialize(): Promise<void> {
    if (!this.initialized) {
      this.initialized = this.createSchema().catch((error: unknown) => {
        this.initialized = null;
        throw error;
      });
    }
    return this.initialized;
  }

  async addDocuments(chunks: Chunk[]): Promise<boolean> {
    if (chunks.length === 0) {
      return true;
    }
    await this.initialize();

    const fresh = await this.withoutStored(uniqueByContent(chunks));
    if (fresh.length === 0) {
      log.debug({ skipped: chunks.length }, "chunks already stored");
      return true;
    }

    let embeddings: Float32Array[] | null = null;
    if (this.provider) {
      try {
        embeddings = (await this.provider.embedDocuments(fresh.map((chunk) => chunk.content))).map(
          (vector) => l2Normalize(vector),
        );
      } catch (error) {
        if (!(error instanceof EmbeddingInitError && !this.provider.isReady())) {
          log.error({ err: error, chunks: fresh.length }, "embedding failed; batch not added");
          return false;
        }
        log.warn({ err: error }, "embedding backend unavailable; storing chunks without vectors");
      }
    }
    if (embeddings && embeddings.length > 0) {
      if (!this.matchesColumn(embeddings[0].length)) {
        return false;
      }
      await this.backfillUnembedded();
    }

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(`SELECT pg_advisory_xact_lock(hashtext($1))`, [this.options.collectionName]);
      const head = await client.query(
        `SELECT MAX(position) AS max FROM corpus_chunks WHERE collection = $1`,
        [this.options.collectionName],
      );
      const base = head.rows.length > 0 ? headRowSchema.parse(head.rows[0]).max : 0;

      for (let index = 0; index < fresh.length; index += 1) {
        const vector = embeddings?.[index] ?? null;
        await client.query(
          `
            INSERT INTO corpus_chunks (collection, position, content, metadata, embedding, content_hash)
            VALUES ($1, $2, $3, $4::jsonb, $5::vector, $6)
            ON CONFLICT (collection, content_hash) DO NOTHING
          `,
          [
            this.options.collectionName,
            base + index + 1,
            fresh[index].content,
            JSON.stringify(fresh[index].metadata),
            vector ? toVectorLiteral(vector) : null,
            contentHash(fresh[index].content),
          ],
        );
      }

      await client.query("COMMIT");
      log.info({ added: fresh.length, collection: this.options.collectionName }, "documents added");
      return true;
    } catch (error) {
      log.error({ err: error }, "pgvector insert failed; rolling back");
      try {
        await client.query("ROLLBACK");
      } catch (rollbackError) {
        log.error({ err: rollbackError }, "rollback failed");
      }
      return false;
    } finally {
      client.release();
    }
  }

  async similaritySearch(query: string, topK: number): Promise<ScoredChunk[]> {
    await this.initialize();
    const limit = Math.max(0, Math.floor(topK));
    if (limit === 0) {
      return [];
    }

    let queryVector: Float32Array | null = null;
    if (this.provider) {
      try {
        queryVector = l2Normalize(await this.provider.embedQuery(query));
      } catch (error) {
        log.warn({ err: error }, "query embedding failed; using keyword search");
      }
    }

    if (queryVector && this.matchesColumn(queryVector.length)) {
      await this.backfillUnembedded();
      try {
        const result = await this.pool.query(
          `
            SELECT position, content, metadata, (1 - (embedding <=> $2::vector)) AS score
            FROM corpus_chunks
            WHERE collection = $1 AND embedding IS NOT NULL
            ORDER BY embedding <=> $2::vector, position ASC
            LIMIT $3
          `,
          [this.options.collectionName, toVectorLiteral(queryVector), limit],
        );
        if (result.rows.length > 0) {
          return result.rows.map((raw) => {
            const row = scoredRowSchema.parse(raw);
            return { chunk: toChunk(row), score: row.score };
          });
        }
      } catch (error) {
        log.warn({ err: error }, "pgvector search failed; using keyword search");
      }
    }

    return rankByKeywords(await this.listDocuments(), query, limit, this.stopwords);
  }

  async deleteCollection(): Promise<boolean> {
    try {
      await this.initialize();
      await this.pool.query(`DELETE FROM corpus_chunks WHERE collection = $1`, [
        this.options.collectionName,
      ]);
      return true;
    } catch (error) {
      log.error({ err: error }, "collection not deleted");
      return false;
    }
  }

  async warmup(): Promise<void> {
    await this.initialize();
    const count = await this.countRows();
    log.debug({ rows: count }, "corpus warmed up");
  }

  async listDocuments(): Promise<Chunk[]> {
    await this.initialize();
    const result = await this.pool.query(
      `SELECT position, content, metadata FROM corpus_chunks WHERE collection = $1 ORDER BY position ASC`,
      [this.options.collectionName],
    );
    return result.rows.map((raw) => toChunk(chunkRowSchema.parse(raw)));
  }

  async getStorageInfo(): Promise<VectorStoreStorageInfo> {
    await this.initialize();
    const count = await this.countRows();
    return {
      backend: "pgvector",
      collection: this.options.collectionName,
      document_count: count,
      dimension: this.options.vectorDimension,
      mode: this.provider ? "semantic" : "keyword_only",
      location: "postgres:corpus_chunks",
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async createSchema(): Promise<void> {
    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS corpus_chunks (
        collection TEXT NOT NULL,
        position INTEGER NOT NULL,
        content TEXT NOT NULL,
        metadata JSONB NOT NULL,
        embedding VECTOR(${this.options.vectorDimension}),
        content_hash TEXT NOT NULL,
        PRIMARY KEY (collection, position)
      )
    `);
    await this.pool.query(`
      CREATE UNIQUE INDEX IF NOT EXISTS idx_corpus_chunks_content
      ON corpus_chunks (collection, content_hash)
    `);
    // hnsw builds incrementally, so it can be created on an empty table.
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_corpus_chunks_embedding
      ON corpus_chunks USING hnsw (embedding vector_cosine_ops)
    `);
  }

  private async withoutStored(chunks: Chunk[]): Promise<Chunk[]> {
    const hashes = chunks.map((chunk) => contentHash(chunk.content));
    const result = await this.pool.query(
      `SELECT content_hash FROM corpus_chunks WHERE collection = $1 AND content_hash = ANY($2::text[])`,
      [this.options.collectionName, hashes],
    );
    const stored = new Set(result.rows.map((raw) => hashRowSchema.parse(raw).content_hash));
    return chunks.filter((_chunk, index) => !stored.has(hashes[index]));
  }

  /** Embeds rows stored while the provider was down. Failures leave them keyword-only. */
  private async backfillUnembedded(): Promise<void> {
    if (!this.provider) {
      return;
    }
    try {
      const result = await this.pool.query(
        `SELECT position, content FROM corpus_chunks WHERE collection = $1 AND embedding IS NULL ORDER BY position ASC`,
        [this.options.collectionName],
      );
      const pending = result.rows.map((raw) => pendingRowSchema.parse(raw));
      if (pending.length === 0) {
        return;
      }

      const vectors = await this.provider.embedDocuments(pending.map((row) => row.content));
      for (let index = 0; index < pending.length; index += 1) {
        await this.pool.query(
          `UPDATE corpus_chunks SET embedding = $3::vector WHERE collection = $1 AND position = $2`,
          [this.options.collectionName, pending[index].position, toVectorLiteral(l2Normalize(vectors[index]))],
        );
      }
      log.info({ rows: pending.length }, "keyword-only rows embedded");
    } catch (error) {
      log.warn({ err: error }, "backfill failed; rows stay keyword-only");
    }
  }

  private matchesColumn(width: number): boolean {
    if (width === this.options.vectorDimension) {
      return true;
    }
    log.error(
      { embedding: width, column: this.options.vectorDimension },
      `Embedding width ${width} does not match VECTOR_DIMENSION ${this.options.vectorDimension}; set VECTOR_DIMENSION to the model's width.`,
    );
    return false;
  }

  private async countRows(): Promise<number> {
    const result = await this.pool.query(
      `SELECT COUNT(*)::text AS count FROM corpus_chunks WHERE collection = $1`,
      [this.options.collectionName],
    );
    return result.rows.length > 0 ? countRowSchema.parse(result.rows[0]).count : 0;
  }
}

function toChunk(row: PgChunkRow): Chunk {
  const metadata: ChunkMetadata = chunkMetadataSchema.parse(
    typeof row.metadata === "string" ? JSON.parse(row.metadata) : row.metadata,
  );
  return { content: row.content, metadata };
}

function toVectorLiteral(values: ArrayLike<number>): string {
  return `[${Array.from(values).join(",")}]`;
}
