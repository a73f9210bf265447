import path from "node:path";
import {
  EmbeddingCallError,
  EmbeddingInitError,
  VectorStoreUnavailableError,
  describeError,
} from "../../domain/errors.js";
import { Chunk, ScoredChunk } from "../../domain/types.js";
import { VectorStore, VectorStoreStorageInfo } from "../../domain/vectorStore.js";
import { EmbeddingProvider } from "../ai/types.js";
import { ReadWriteLock } from "../../utils/lock.js";
import { createLogger } from "../../utils/logger.js";
import { contentHash, uniqueByContent } from "../../utils/text.js";
import { dot, l2Normalize } from "../../utils/vector.js";
import {
  CorpusPaths,
  corpusPaths,
  readCorpus,
  removeCorpus,
  statCorpus,
  writeCorpus,
} from "./corpusFiles.js";
import { rankByKeywords } from "./keywordSearch.js";

const log = createLogger("vector-store");

const CACHE_PRUNE_THRESHOLD = 100;
const MAX_CACHE_ENTRIES = 1000;

export interface FileVectorStoreOptions {
  dataDir: string;
  collectionName: string;
  /** 0 disables the search cache. */
  searchCacheTtlSeconds?: number;
  /** Ignored by the keyword fallback unless a query has nothing else. */
  keywordStopwords?: readonly string[];
  now?: () => number;
}

interface CachedSearch {
  expiresAt: number;
  results: ScoredChunk[];
}

/**
 * Corpus kept in memory as aligned arrays (`documents[i]` belongs to `rows[i]`) and
 * rewritten to two files under `dataDir` after every successful mutation.
 */
export class FileVectorStore implements VectorStore {
  private documents: Chunk[] = [];

  private rows: Float32Array[] = [];

  private dimension = 0;

  private readonly hashes = new Set<string>();

  /** Rows stored while the provider was down; embedded once it answers again. */
  private readonly unembedded = new Set<number>();

  private loading: Promise<void> | null = null;

  private readonly lock = new ReadWriteLock();

  private readonly cache = new Map<string, CachedSearch>();

  private readonly paths: CorpusPaths;

  private readonly cacheTtlMs: number;

  private readonly now: () => number;

  private readonly stopwords: ReadonlySet<string>;

  constructor(
    private readonly provider: EmbeddingProvider | null,
    private readonly options: FileVectorStoreOptions,
  ) {
    this.paths = corpusPaths(options.dataDir, options.collectionName);
    this.cacheTtlMs = Math.max(0, options.searchCacheTtlSeconds ?? 3600) * 1000;
    this.now = options.now ?? Date.now;
    this.stopwords = new Set(options.keywordStopwords ?? []);
  }

  /** Loads the persisted corpus once. A corrupt pair rejects here and on every later call. */
  initialize(): Promise<void> {
    if (!this.loading) {
      this.loading = this.lock.withWrite(() => this.load());
    }
    return this.loading;
  }

  /**
   * Chunks whose content is already stored are skipped. Embedding runs before the write
   * lock is taken; the batch is then appended and persisted as one unit.
   */
  async addDocuments(chunks: Chunk[]): Promise<boolean> {
    if (chunks.length === 0) {
      return true;
    }
    await this.initialize();

    const fresh = uniqueByContent(chunks).filter((chunk) => !this.hashes.has(contentHash(chunk.content)));
    if (fresh.length === 0) {
      log.debug({ skipped: chunks.length }, "chunks already stored");
      return true;
    }

    let vectors: Float32Array[] | null;
    try {
      vectors = await this.embedChunks(fresh);
    } catch (error) {
      log.error({ err: error, chunks: fresh.length }, "embedding failed; batch not added");
      return false;
    }

    return this.lock.withWrite(() => this.append(fresh, vectors));
  }

  async similaritySearch(query: string, topK: number): Promise<ScoredChunk[]> {
    await this.initialize();
    const limit = Math.max(0, Math.floor(topK));
    if (limit === 0) {
      return [];
    }

    const cacheKey = `${limit}\u0000${query}`;
    const cached = this.cache.get(cacheKey);
    if (cached && cached.expiresAt > this.now()) {
      return cloneResults(cached.results);
    }

    const queryVector = await this.embedQuery(query);
    if (queryVector !== null && this.unembedded.size > 0) {
      await this.lock.withWrite(async () => {
        if (await this.backfillUnembedded()) {
          await this.persist();
        }
      });
    }

    const results = await this.lock.withRead(async () => {
      if (this.documents.length === 0) {
        return [];
      }
      if (queryVector === null || this.dimension === 0) {
        return this.keywordSearch(query, limit);
      }
      try {
        return this.vectorSearch(queryVector, limit);
      } catch (error) {
        log.warn({ err: error }, "vector search failed; using keyword search");
        return this.keywordSearch(query, limit);
      }
    });

    // A keyword answer given while the provider is down is not kept past this call.
    const degraded = queryVector === null && this.provider !== null;
    if (this.cacheTtlMs > 0 && !degraded) {
      this.remember(cacheKey, results);
    }
    return cloneResults(results);
  }

  /** Files first, memory second: a failed removal leaves the corpus as it was. */
  async deleteCollection(): Promise<boolean> {
    return this.lock.withWrite(async () => {
      try {
        await removeCorpus(this.paths);
      } catch (error) {
        log.error(
          { err: new VectorStoreUnavailableError("Could not remove collection files.", { cause: error }) },
          "collection not deleted",
        );
        return false;
      }

      const cleared = this.documents.length;
      this.documents = [];
      this.rows = [];
      this.dimension = 0;
      this.hashes.clear();
      this.unembedded.clear();
      this.cache.clear();
      this.loading = Promise.resolve();
      log.info({ collection: this.options.collectionName, cleared }, "collection deleted");
      return true;
    });
  }

  async warmup(): Promise<void> {
    await this.initialize();
    await this.lock.withRead(async () => {
      let checksum = 0;
      for (const row of this.rows) {
        checksum += dot(row, row);
      }
      log.debug({ rows: this.rows.length, checksum }, "corpus warmed up");
    });
  }

  async listDocuments(): Promise<Chunk[]> {
    await this.initialize();
    return this.lock.withRead(async () => [...this.documents]);
  }

  async getStorageInfo(): Promise<VectorStoreStorageInfo> {
    await this.initialize();
    const stats = await statCorpus(this.paths);
    return this.lock.withRead(async () => ({
      backend: "file" as const,
      collection: this.options.collectionName,
      document_count: this.documents.length,
      dimension: this.dimension,
      mode: this.mode(),
      location: path.dirname(this.paths.vectors),
      vectors_path: this.paths.vectors,
      documents_path: this.paths.documents,
      persisted: stats.exists,
      size_bytes: stats.sizeBytes,
      cache_entries: this.cache.size,
    }));
  }

  async close(): Promise<void> {
    // Waits for any in-flight mutation to finish its write.
    await this.lock.withWrite(async () => {
      this.cache.clear();
    });
  }

  /** Aligned view for invariant checks: rows are copies. */
  async snapshot(): Promise<{ documents: Chunk[]; rows: Float32Array[]; dimension: number }> {
    await this.initialize();
    return this.lock.withRead(async () => ({
      documents: [...this.documents],
      rows: this.rows.map((row) => Float32Array.from(row)),
      dimension: this.dimension,
    }));
  }

  private async append(chunks: Chunk[], vectors: Float32Array[] | null): Promise<boolean> {
    // Another add may have stored the same content while this batch was embedding.
    const keep: number[] = [];
    chunks.forEach((chunk, index) => {
      if (!this.hashes.has(contentHash(chunk.content))) {
        keep.push(index);
      }
    });
    if (keep.length === 0) {
      return true;
    }

    let newRows: Float32Array[];
    if (vectors === null) {
      newRows = keep.map(() => new Float32Array(this.dimension));
    } else {
      const width = vectors[0].length;
      if (this.dimension !== 0 && width !== this.dimension) {
        log.error(
          { expected: this.dimension, received: width },
          "embedding dimension does not match the stored corpus; batch not added",
        );
        return false;
      }
      if (this.dimension === 0) {
        this.widenRows(width);
      }
      newRows = [];
      for (const index of keep) {
        newRows.push(vectors[index]);
      }
    }

    const first = this.documents.length;
    for (const index of keep) {
      this.documents.push(chunks[index]);
      this.hashes.add(contentHash(chunks[index].content));
    }
    this.rows.push(...newRows);
    if (vectors === null) {
      newRows.forEach((_row, offset) => this.unembedded.add(first + offset));
    } else {
      await this.backfillUnembedded();
    }
    this.cache.clear();

    await this.persist();
    log.info(
      { added: keep.length, total: this.documents.length, mode: this.mode() },
      "documents added",
    );
    return true;
  }

  /** Embeds rows stored without a vector. Callers hold the write lock. */
  private async backfillUnembedded(): Promise<boolean> {
    if (!this.provider || this.unembedded.size === 0) {
      return false;
    }

    const indices = [...this.unembedded].sort((a, b) => a - b);
    let vectors: Float32Array[] | null;
    try {
      vectors = await this.embedChunks(indices.map((index) => this.documents[index]));
    } catch (error) {
      log.warn({ err: error, rows: indices.length }, "backfill failed; rows stay keyword-only");
      return false;
    }
    if (vectors === null) {
      return false;
    }

    const width = vectors[0].length;
    if (this.dimension !== 0 && width !== this.dimension) {
      log.warn({ expected: this.dimension, received: width }, "backfill dimension mismatch; rows stay keyword-only");
      return false;
    }
    if (this.dimension === 0) {
      this.widenRows(width);
    }
    for (let position = 0; position < indices.length; position += 1) {
      this.rows[indices[position]] = vectors[position];
    }
    this.unembedded.clear();
    this.cache.clear();
    log.info({ rows: indices.length }, "keyword-only rows embedded");
    return true;
  }

  /** Rows stored while keyword-only have no width yet. */
  private widenRows(width: number): void {
    this.rows = this.rows.map(() => new Float32Array(width));
    this.dimension = width;
  }

  private async load(): Promise<void> {
    const snapshot = await readCorpus(this.paths, this.options.collectionName);
    if (!snapshot) {
      log.info({ collection: this.options.collectionName }, "no persisted corpus; starting empty");
      return;
    }

    this.documents = snapshot.documents;
    this.rows = snapshot.rows.map((row) => l2Normalize(row));
    this.dimension = snapshot.dimension;
    this.documents.forEach((chunk) => this.hashes.add(contentHash(chunk.content)));
    // Zero rows are either unembedded or embed to zero; both are retried once.
    this.rows.forEach((row, index) => {
      if (row.every((value) => value === 0)) {
        this.unembedded.add(index);
      }
    });
    log.info(
      {
        collection: this.options.collectionName,
        documents: this.documents.length,
        dimension: this.dimension,
      },
      "corpus loaded",
    );
  }

  /** Null means keyword-only: there is no provider, or it never initialized. */
  private async embedChunks(chunks: Chunk[]): Promise<Float32Array[] | null> {
    if (!this.provider) {
      return null;
    }

    let raw: number[][];
    try {
      raw = await this.provider.embedDocuments(chunks.map((chunk) => chunk.content));
    } catch (error) {
      if (error instanceof EmbeddingInitError && !this.provider.isReady()) {
        log.warn({ err: error }, "embedding backend unavailable; storing chunks for keyword search only");
        return null;
      }
      throw error;
    }

    if (raw.length !== chunks.length) {
      throw new EmbeddingCallError(
        `Expected ${chunks.length} embedding(s), received ${raw.length}.`,
      );
    }
    const vectors = raw.map((vector) => l2Normalize(vector));
    const width = vectors[0].length;
    if (width === 0 || vectors.some((vector) => vector.length !== width)) {
      throw new EmbeddingCallError("Embedding batch has empty or uneven vectors.");
    }
    return vectors;
  }

  private async embedQuery(query: string): Promise<Float32Array | null> {
    if (!this.provider) {
      return null;
    }
    try {
      return l2Normalize(await this.provider.embedQuery(query));
    } catch (error) {
      log.warn({ err: error }, "query embedding failed; using keyword search");
      return null;
    }
  }

  private vectorSearch(queryVector: Float32Array, limit: number): ScoredChunk[] {
    if (queryVector.length !== this.dimension) {
      throw new Error(
        `Query dimension ${queryVector.length} does not match corpus dimension ${this.dimension}.`,
      );
    }

    const scored = this.rows.map((row, index) => ({ index, score: dot(row, queryVector) }));
    scored.sort((a, b) => b.score - a.score || a.index - b.index);
    return scored.slice(0, limit).map(({ index, score }) => ({
      chunk: this.documents[index],
      score,
    }));
  }

  private keywordSearch(query: string, limit: number): ScoredChunk[] {
    return rankByKeywords(this.documents, query, limit, this.stopwords);
  }

  private remember(key: string, results: ScoredChunk[]): void {
    const now = this.now();
    if (this.cache.size >= CACHE_PRUNE_THRESHOLD) {
      for (const [cachedKey, entry] of this.cache) {
        if (entry.expiresAt <= now) {
          this.cache.delete(cachedKey);
        }
      }
    }
    // Oldest first: a Map iterates in insertion order.
    for (const oldest of this.cache.keys()) {
      if (this.cache.size < MAX_CACHE_ENTRIES) {
        break;
      }
      this.cache.delete(oldest);
    }
    this.cache.set(key, { expiresAt: now + this.cacheTtlMs, results });
  }

  private async persist(): Promise<void> {
    try {
      await writeCorpus(this.paths, this.options.collectionName, {
        dimension: this.dimension,
        rows: this.rows,
        documents: this.documents,
      });
    } catch (error) {
      const unavailable = new VectorStoreUnavailableError(
        `Corpus kept in memory only: ${describeError(error)}`,
        { cause: error },
      );
      log.warn({ err: unavailable }, "corpus not persisted");
    }
  }

  private mode(): "semantic" | "keyword_only" {
    return this.dimension > 0 ? "semantic" : "keyword_only";
  }
}

function cloneResults(results: ScoredChunk[]): ScoredChunk[] {
  return results.map((result) => ({ chunk: result.chunk, score: result.score }));
}
