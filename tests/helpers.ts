import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { ChunkingConfig } from "../src/config/env.js";
import { RetrievalProfile, emptyRetrievalProfile } from "../src/config/retrievalProfile.js";
import { Chunk, ChunkMetadata, SectionType } from "../src/domain/types.js";
import { EmbeddingBackend } from "../src/infra/ai/types.js";
import { SqlPool, SqlPoolClient, SqlResult } from "../src/infra/db/postgres.js";
import { tokenizeAll } from "../src/utils/text.js";

export const TEST_CHUNKING: ChunkingConfig = {
  chunkSize: 1000,
  chunkOverlap: 200,
  ensureCompleteSentences: true,
  maxCharsPerDoc: 1_000_000,
};

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

/** Counts of each vocabulary word in `text`; other words are ignored. */
export function embedWithVocabulary(text: string, vocabulary: readonly string[]): number[] {
  const tokens = tokenizeAll(text);
  return vocabulary.map((word) => tokens.filter((token) => token === word).length);
}

export class VocabularyBackend implements EmbeddingBackend {
  readonly name = "vocabulary";

  readonly calls: string[][] = [];

  constructor(private readonly vocabulary: readonly string[]) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => embedWithVocabulary(text, this.vocabulary));
  }
}

export class FailingBackend implements EmbeddingBackend {
  readonly name = "failing";

  calls = 0;

  constructor(private readonly message = "backend offline") {}

  async embedTexts(): Promise<number[][]> {
    this.calls += 1;
    throw new Error(this.message);
  }
}

type ChunkOverrides = Partial<
  Pick<
    ChunkMetadata,
    "source" | "file_path" | "file_type" | "doc_hash" | "chunk_index" | "total_chunks" | "priority"
  >
> & { section_type?: SectionType };

export function makeChunk(content: string, overrides: ChunkOverrides = {}): Chunk {
  return {
    content,
    metadata: {
      source: "doc.txt",
      file_path: "/kb/doc.txt",
      file_type: "txt",
      doc_hash: "hash",
      char_count: content.length,
      word_count: content.split(/\s+/).length,
      chunk_index: 1,
      total_chunks: 1,
      section_type: "text",
      priority: "normal",
      ...overrides,
    },
  };
}

export function makeProfile(overrides: Partial<RetrievalProfile> = {}): RetrievalProfile {
  return { ...emptyRetrievalProfile(), ...overrides };
}

interface FakeRow {
  collection: string;
  position: number;
  content: string;
  metadata: unknown;
  embedding: number[] | null;
  contentHash: string;
}

interface FakeTransaction {
  inserted: FakeRow[];
  releaseLock: (() => void) | null;
}

/**
 * Just enough of Postgres for the pgvector store: one `corpus_chunks` table keyed by
 * `(collection, position)` and unique on `(collection, content_hash)`, per-connection
 * transactions, advisory locks, cosine distance ordering and counts.
 */
export class FakeSqlPool implements SqlPool {
  rows: FakeRow[] = [];

  readonly statements: string[] = [];

  ended = false;

  failInsertAt: number | null = null;

  failRollback = false;

  private inserts = 0;

  private readonly locks = new Map<string, Promise<void>>();

  async query(text: string, values: unknown[] = []): Promise<SqlResult> {
    return this.run(text, values, null);
  }

  async connect(): Promise<SqlPoolClient> {
    const transaction: FakeTransaction = { inserted: [], releaseLock: null };
    return {
      query: (text, values) => this.run(text, values ?? [], transaction),
      release: () => undefined,
    };
  }

  async end(): Promise<void> {
    this.ended = true;
  }

  private async run(
    text: string,
    values: unknown[],
    transaction: FakeTransaction | null,
  ): Promise<SqlResult> {
    const sql = text.replace(/\s+/g, " ").trim();
    this.statements.push(sql);

    if (sql.startsWith("CREATE") || sql === "BEGIN") {
      return { rows: [] };
    }
    if (sql === "COMMIT" || sql === "ROLLBACK") {
      if (sql === "ROLLBACK" && this.failRollback) {
        throw new Error("connection lost");
      }
      if (transaction) {
        if (sql === "ROLLBACK") {
          this.rows = this.rows.filter((row) => !transaction.inserted.includes(row));
        }
        transaction.inserted = [];
        transaction.releaseLock?.();
        transaction.releaseLock = null;
      }
      return { rows: [] };
    }

    const collection = String(values[0]);
    const inCollection = this.rows.filter((row) => row.collection === collection);

    if (sql.startsWith("SELECT pg_advisory_xact_lock")) {
      if (transaction) {
        transaction.releaseLock = await this.acquire(collection);
      }
      return { rows: [] };
    }
    if (sql.startsWith("SELECT content_hash FROM")) {
      const wanted = Array.isArray(values[1]) ? values[1].map(String) : [];
      return {
        rows: inCollection
          .filter((row) => wanted.includes(row.contentHash))
          .map((row) => ({ content_hash: row.contentHash })),
      };
    }
    if (sql.startsWith("SELECT MAX(position)")) {
      const positions = inCollection.map((row) => row.position);
      return { rows: [{ max: positions.length > 0 ? Math.max(...positions) : null }] };
    }
    if (sql.startsWith("INSERT")) {
      this.inserts += 1;
      if (this.failInsertAt !== null && this.inserts === this.failInsertAt) {
        throw new Error("insert failed");
      }
      const position = Number(values[1]);
      const contentHash = String(values[5]);
      if (inCollection.some((row) => row.contentHash === contentHash)) {
        return { rows: [] };
      }
      if (inCollection.some((row) => row.position === position)) {
        throw new Error(`duplicate key value violates unique constraint: (${collection}, ${position})`);
      }
      const literal = values[4];
      const row: FakeRow = {
        collection,
        position,
        content: String(values[2]),
        metadata: JSON.parse(String(values[3])),
        embedding: typeof literal === "string" ? parseVectorLiteral(literal) : null,
        contentHash,
      };
      this.rows.push(row);
      transaction?.inserted.push(row);
      return { rows: [] };
    }
    if (sql.startsWith("SELECT position, content FROM")) {
      return {
        rows: inCollection
          .filter((row) => row.embedding === null)
          .sort((a, b) => a.position - b.position)
          .map((row) => ({ position: row.position, content: row.content })),
      };
    }
    if (sql.startsWith("UPDATE")) {
      const target = inCollection.find((row) => row.position === Number(values[1]));
      if (target) {
        target.embedding = parseVectorLiteral(String(values[2]));
      }
      return { rows: [] };
    }
    if (sql.startsWith("SELECT position, content, metadata, (1 -")) {
      const query = parseVectorLiteral(String(values[1]));
      const limit = Number(values[2]);
      const scored = inCollection
        .filter((row) => row.embedding !== null)
        .map((row) => ({ row, score: cosine(row.embedding ?? [], query) }))
        .sort((a, b) => b.score - a.score || a.row.position - b.row.position)
        .slice(0, limit);
      return {
        rows: scored.map(({ row, score }) => ({
          position: row.position,
          content: row.content,
          metadata: row.metadata,
          score,
        })),
      };
    }
    if (sql.startsWith("SELECT position, content, metadata FROM")) {
      return {
        rows: [...inCollection]
          .sort((a, b) => a.position - b.position)
          .map((row) => ({ position: row.position, content: row.content, metadata: row.metadata })),
      };
    }
    if (sql.startsWith("DELETE")) {
      this.rows = this.rows.filter((row) => row.collection !== collection);
      return { rows: [] };
    }
    if (sql.startsWith("SELECT COUNT(*)")) {
      return { rows: [{ count: String(inCollection.length) }] };
    }
    throw new Error(`Unexpected SQL: ${sql}`);
  }

  /** Resolves once the key is free; the returned function frees it. */
  private async acquire(key: string): Promise<() => void> {
    const previous = this.locks.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.locks.set(key, previous.then(() => current));
    await previous;
    return release;
  }
}

function parseVectorLiteral(literal: string): number[] {
  return literal
    .replace(/^\[|\]$/g, "")
    .split(",")
    .filter(Boolean)
    .map(Number);
}

function cosine(a: number[], b: number[]): number {
  let dotProduct = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < Math.min(a.length, b.length); i += 1) {
    dotProduct += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  return normA === 0 || normB === 0 ? 0 : dotProduct / Math.sqrt(normA * normB);
}
