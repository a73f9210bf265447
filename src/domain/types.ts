export type MetadataValue = string | number | boolean | null;

export type SectionType = "text" | "table" | "list" | "list_part" | "header";

export type Priority = "low" | "normal" | "high";

export interface ChunkMetadata {
  source: string;
  file_path: string;
  file_type: string;
  doc_hash: string;
  char_count: number;
  word_count: number;
  chunk_index: number;
  total_chunks: number;
  section_type: SectionType;
  priority: Priority;
  [key: string]: MetadataValue;
}

/** Metadata known before chunking: where the document came from. */
export interface DocumentMetadata {
  source: string;
  file_path: string;
  file_type: string;
  [key: string]: MetadataValue;
}

export interface Chunk {
  content: string;
  metadata: ChunkMetadata;
}

export interface ScoredChunk {
  chunk: Chunk;
  score: number;
}

export interface RetrievedChunk {
  content: string;
  metadata: ChunkMetadata;
  relevance_score: number;
}

export type ConfidenceLevel = "high" | "medium" | "low" | "very_low" | "none";

export interface SourceAttribution {
  title: string;
  path: string;
  type: string;
  relevance: number;
}

export interface QueryResult {
  context_text: string;
  ranked_sources: SourceAttribution[];
  confidence_level: ConfidenceLevel;
  chunks: RetrievedChunk[];
}

export interface SourceSummary {
  source: string;
  file_path: string;
  file_type: string;
  chunk_count: number;
}
