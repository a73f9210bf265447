import { Chunk, ScoredChunk } from "../../domain/types.js";
import { KeywordMatcher, extractQueryTerms, tokenize } from "../../utils/text.js";

const NO_STOPWORDS: ReadonlySet<string> = new Set();

/**
 * Scores each chunk by the fraction of query terms it contains. Stop words and one-letter
 * tokens are not terms unless the query has nothing else. Chunks matching no term are left
 * out; equal scores keep corpus order.
 */
export function rankByKeywords(
  chunks: readonly Chunk[],
  query: string,
  limit: number,
  stopwords: ReadonlySet<string> = NO_STOPWORDS,
): ScoredChunk[] {
  const significant = extractQueryTerms(query, stopwords);
  const terms = significant.length > 0 ? significant : tokenize(query);
  if (terms.length === 0 || limit <= 0) {
    return [];
  }

  const scored: Array<{ index: number; score: number }> = [];
  chunks.forEach((chunk, index) => {
    const matched = new KeywordMatcher(chunk.content).countMatches(terms);
    if (matched > 0) {
      scored.push({ index, score: matched / terms.length });
    }
  });
  scored.sort((a, b) => b.score - a.score || a.index - b.index);

  return scored.slice(0, limit).map(({ index, score }) => ({ chunk: chunks[index], score }));
}
