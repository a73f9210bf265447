import { Chunk, ScoredChunk } from "./types.js";

export interface VectorStoreStorageInfo {
  backend: "file" | "pgvector";
  collection: string;
  document_count: number;
  dimension: number;
  mode: "semantic" | "keyword_only";
  location: string;
  [key: string]: string | number | boolean;
}

export interface VectorStore {
  initialize(): Promise<void>;
  /** Appends chunks in order. Resolves false when the batch could not be embedded. */
  addDocuments(chunks: Chunk[]): Promise<boolean>;
  similaritySearch(query: string, topK: number): Promise<ScoredChunk[]>;
  deleteCollection(): Promise<boolean>;
  warmup(): Promise<void>;
  listDocuments(): Promise<Chunk[]>;
  getStorageInfo(): Promise<VectorStoreStorageInfo>;
  close(): Promise<void>;
}
