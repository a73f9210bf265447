import { promises as fs } from "node:fs";
import path from "node:path";
import { ChunkingConfig } from "../config/env.js";
import {
  UnsupportedFormatError,
  VectorStoreUnavailableError,
  describeError,
} from "../domain/errors.js";
import {
  Chunk,
  DocumentMetadata,
  QueryResult,
  ScoredChunk,
  SourceSummary,
} from "../domain/types.js";
import { VectorStore, VectorStoreStorageInfo } from "../domain/vectorStore.js";
import {
  extractText,
  isSupportedDocumentExtension,
} from "../infra/parsers/documentLoader.js";
import { chunkText } from "../pipelines/chunking.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { createLogger } from "../utils/logger.js";
import { RetrievalEngine } from "./retrievalEngine.js";

const log = createLogger("knowledge");

export interface FailedIndexing {
  path: string;
  reason: string;
}

export interface IndexDocumentsResult {
  indexed_count: number;
  chunk_count: number;
  skipped: FailedIndexing[];
  failed: FailedIndexing[];
}

export interface RawDocumentInput {
  source: string;
  content: string;
}

export interface ResetIndexResult {
  cleared: boolean;
  cleared_chunks: number;
}

export interface KnowledgeServiceOptions {
  chunking: ChunkingConfig;
  ingestConcurrency: number;
  recoveryKeywords?: readonly string[];
  embeddingEnabled?: boolean;
}

type FileOutcome =
  | { status: "indexed"; chunks: number }
  | { status: "skipped"; reason: string }
  | { status: "failed"; reason: string };

export class KnowledgeService {
  constructor(
    private readonly store: VectorStore,
    private readonly engine: RetrievalEngine,
    private readonly options: KnowledgeServiceOptions,
  ) {}

  get embeddingEnabled(): boolean {
    return this.options.embeddingEnabled ?? false;
  }

  /** Extracts and chunks one file without touching the store. */
  async processDocument(filePath: string): Promise<Chunk[]> {
    const absolutePath = path.resolve(filePath);
    const text = await extractText(absolutePath, {
      recoveryKeywords: this.options.recoveryKeywords,
    });
    return chunkText(text, describeSource(absolutePath), this.options.chunking);
  }

  /**
   * Smallest files first, a bounded number at a time. A file that fails is reported and
   * the rest of the batch carries on.
   */
  async indexDocuments(paths: string[]): Promise<IndexDocumentsResult> {
    const ordered = await orderBySize(paths.map((rawPath) => path.resolve(rawPath)));
    const outcomes = await mapWithConcurrency(ordered, this.options.ingestConcurrency, (filePath) =>
      this.indexFile(filePath),
    );
    return summarize(ordered, outcomes);
  }

  async indexRawDocuments(documents: RawDocumentInput[]): Promise<IndexDocumentsResult> {
    const labels: string[] = [];
    const outcomes: FileOutcome[] = [];

    for (let index = 0; index < documents.length; index += 1) {
      const item = documents[index];
      const source = normalizeSourceName(item.source, index);
      labels.push(source);

      const base: DocumentMetadata = {
        source,
        file_path: `upload://${source}`,
        file_type: path.extname(source).slice(1).toLowerCase() || "txt",
      };
      outcomes.push(await this.addChunks(chunkText(item.content, base, this.options.chunking)));
    }

    return summarize(labels, outcomes);
  }

  /** Indexes files under `dir` whose path is not in the corpus yet. */
  async refreshIndex(dir: string): Promise<IndexDocumentsResult> {
    const [files, documents] = await Promise.all([
      listKnowledgeFiles(dir),
      this.store.listDocuments(),
    ]);
    const known = new Set(documents.map((chunk) => chunk.metadata.file_path));
    const pending = files.filter((filePath) => !known.has(filePath));

    log.info({ dir, found: files.length, pending: pending.length }, "refreshing index");
    return this.indexDocuments(pending);
  }

  /** Clears the collection, then ingests every supported file under `dir`. */
  async reloadKnowledgeBase(dir: string): Promise<IndexDocumentsResult> {
    const files = await listKnowledgeFiles(dir);
    const cleared = await this.store.deleteCollection();
    if (!cleared) {
      throw new VectorStoreUnavailableError("Collection could not be cleared; reload aborted.");
    }
    log.info({ dir, files: files.length }, "reloading knowledge base");
    return this.indexDocuments(files);
  }

  async listSources(): Promise<SourceSummary[]> {
    const documents = await this.store.listDocuments();
    const byPath = new Map<string, SourceSummary>();

    for (const chunk of documents) {
      const key = chunk.metadata.file_path;
      const existing = byPath.get(key);
      if (existing) {
        existing.chunk_count += 1;
        continue;
      }
      byPath.set(key, {
        source: chunk.metadata.source,
        file_path: key,
        file_type: chunk.metadata.file_type,
        chunk_count: 1,
      });
    }

    return [...byPath.values()];
  }

  async resetIndex(): Promise<ResetIndexResult> {
    const before = (await this.store.listDocuments()).length;
    const cleared = await this.store.deleteCollection();
    return { cleared, cleared_chunks: cleared ? before : 0 };
  }

  async getStorageInfo(): Promise<VectorStoreStorageInfo> {
    return this.store.getStorageInfo();
  }

  async query(userQuery: string, topK?: number): Promise<QueryResult> {
    return this.engine.query(userQuery, topK);
  }

  /** Raw store ranking for one query, without strategies or boosts. */
  async searchChunks(query: string, topK: number): Promise<ScoredChunk[]> {
    return this.store.similaritySearch(query.trim(), topK);
  }

  shouldUseRetrieval(query: string): boolean {
    return this.engine.shouldUseRetrieval(query);
  }

  private async indexFile(filePath: string): Promise<FileOutcome> {
    let chunks: Chunk[];
    try {
      chunks = await this.processDocument(filePath);
    } catch (error) {
      if (error instanceof UnsupportedFormatError) {
        log.warn({ path: filePath, extension: error.extension }, "unsupported file skipped");
        return { status: "skipped", reason: error.message };
      }
      log.warn({ err: error, path: filePath }, "document extraction failed");
      return { status: "failed", reason: describeError(error) };
    }
    return this.addChunks(chunks);
  }

  private async addChunks(chunks: Chunk[]): Promise<FileOutcome> {
    if (chunks.length === 0) {
      return { status: "failed", reason: "Empty content." };
    }
    const added = await this.store.addDocuments(chunks);
    if (!added) {
      return { status: "failed", reason: "Embedding failed; no chunks were stored." };
    }
    log.info({ source: chunks[0].metadata.source, chunks: chunks.length }, "document indexed");
    return { status: "indexed", chunks: chunks.length };
  }
}

export function describeSource(absolutePath: string): DocumentMetadata {
  return {
    source: path.basename(absolutePath),
    file_path: absolutePath,
    file_type: path.extname(absolutePath).slice(1).toLowerCase(),
  };
}

/** Supported files under `dir`, recursively, as sorted absolute paths. */
export async function listKnowledgeFiles(dir: string): Promise<string[]> {
  const root = path.resolve(dir);
  const files: string[] = [];

  const walk = async (current: string) => {
    const entries = await fs.readdir(current, { withFileTypes: true });
    for (const entry of entries) {
      const fullPath = path.join(current, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && isSupportedDocumentExtension(entry.name)) {
        files.push(fullPath);
      }
    }
  };

  await walk(root);
  return files.sort();
}

async function orderBySize(paths: string[]): Promise<string[]> {
  const sized = await Promise.all(
    paths.map(async (filePath, index) => {
      try {
        const stat = await fs.stat(filePath);
        return { filePath, index, size: stat.size };
      } catch {
        // Unreadable files sort last; extraction reports the error.
        return { filePath, index, size: Number.POSITIVE_INFINITY };
      }
    }),
  );
  sized.sort((a, b) => a.size - b.size || a.index - b.index);
  return sized.map((item) => item.filePath);
}

function summarize(labels: string[], outcomes: FileOutcome[]): IndexDocumentsResult {
  const result: IndexDocumentsResult = {
    indexed_count: 0,
    chunk_count: 0,
    skipped: [],
    failed: [],
  };

  outcomes.forEach((outcome, index) => {
    if (outcome.status === "indexed") {
      result.indexed_count += 1;
      result.chunk_count += outcome.chunks;
    } else if (outcome.status === "skipped") {
      result.skipped.push({ path: labels[index], reason: outcome.reason });
    } else {
      result.failed.push({ path: labels[index], reason: outcome.reason });
    }
  });

  return result;
}

function normalizeSourceName(source: string, index: number): string {
  const base = path.basename(source.trim());
  return base || `document-${index + 1}.txt`;
}
