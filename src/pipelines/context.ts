import { ConfidenceLevel, RetrievedChunk, SourceAttribution } from "../domain/types.js";
import { scoreTier } from "./ranking.js";

export const NO_CONTEXT_MESSAGE = "No relevant information found.";

const MAX_CONTEXT_CHUNKS = 12;

const TIER_BUDGETS = {
  confident: { high: 10, medium: 3, low: 1 },
  default: { high: 8, medium: 4, low: 2 },
} as const;

/**
 * Walks the ranking in order, taking chunks while their tier has budget left.
 * Chunks below the low tier never reach the context.
 */
export function selectContextChunks(
  ranked: readonly RetrievedChunk[],
  confidence: ConfidenceLevel,
): RetrievedChunk[] {
  const budget = confidence === "high" ? TIER_BUDGETS.confident : TIER_BUDGETS.default;
  const used = { high: 0, medium: 0, low: 0 };
  const selected: RetrievedChunk[] = [];

  for (const chunk of ranked) {
    if (selected.length >= MAX_CONTEXT_CHUNKS) {
      break;
    }
    const tier = scoreTier(chunk.relevance_score);
    if (tier === "none" || used[tier] >= budget[tier]) {
      continue;
    }
    used[tier] += 1;
    selected.push(chunk);
  }

  return selected;
}

export function formatContext(chunks: readonly RetrievedChunk[]): string {
  if (chunks.length === 0) {
    return NO_CONTEXT_MESSAGE;
  }
  return chunks
    .map(
      (chunk) =>
        `[Document: ${chunk.metadata.source || "Unknown"}, Section: ${chunk.metadata.chunk_index}]\n${chunk.content}`,
    )
    .join("\n\n");
}

export function extractSources(chunks: readonly RetrievedChunk[]): SourceAttribution[] {
  const seen = new Set<string>();
  const sources: SourceAttribution[] = [];

  for (const chunk of chunks) {
    const source = chunk.metadata.source;
    if (!source || seen.has(source)) {
      continue;
    }
    seen.add(source);
    sources.push({
      title: source,
      path: chunk.metadata.file_path,
      type: chunk.metadata.file_type,
      relevance: Math.round(chunk.relevance_score * 100) / 100,
    });
  }

  return sources;
}
