import { RetrievalProfile } from "../config/retrievalProfile.js";
import { QueryProcessingError, describeError } from "../domain/errors.js";
import { QueryResult, RetrievedChunk, ScoredChunk } from "../domain/types.js";
import { VectorStore } from "../domain/vectorStore.js";
import {
  NO_CONTEXT_MESSAGE,
  extractSources,
  formatContext,
  selectContextChunks,
} from "../pipelines/context.js";
import {
  assessConfidence,
  dedupeByContent,
  extractEntities,
  hasInterrogativeCue,
  rankCandidates,
} from "../pipelines/ranking.js";
import { createLogger } from "../utils/logger.js";
import { KeywordMatcher, extractQueryTerms } from "../utils/text.js";

const log = createLogger("retrieval");

const SEMANTIC_POOL_FACTOR = 3;
const AUXILIARY_POOL_FACTOR = 2;
const MAX_KEYWORD_TERMS = 5;
const ENTITY_BASE_SCORE = 0.8;
const ENTITY_MATCH_BONUS = 0.2;
const KEYWORD_BASE_SCORE = 0.6;
const MAX_TOP_K = 50;
const LONG_QUERY_WORDS = 8;

export type StrategyName = "semantic" | "entity" | "keyword";

interface Strategy {
  name: StrategyName;
  run: () => Promise<RetrievedChunk[]>;
}

export interface RetrievalEngineOptions {
  defaultTopK?: number;
}

/**
 * Stateless per query: runs the retrieval strategies side by side, merges and boosts their
 * candidates, and renders the attributed context. Never throws; failures yield an empty result.
 */
export class RetrievalEngine {
  private readonly defaultTopK: number;

  private readonly stopwords: ReadonlySet<string>;

  private readonly knowledgePatterns: RegExp[];

  constructor(
    private readonly store: VectorStore,
    private readonly profile: RetrievalProfile,
    options: RetrievalEngineOptions = {},
  ) {
    this.defaultTopK = options.defaultTopK ?? 5;
    this.stopwords = new Set(profile.stopwords.map((word) => word.toLowerCase()));
    this.knowledgePatterns = profile.knowledgePatterns.map((pattern) => new RegExp(pattern, "i"));
  }

  async query(userQuery: string, topK?: number): Promise<QueryResult> {
    const query = userQuery.trim();
    const k = clampTopK(topK ?? this.defaultTopK);
    if (!query) {
      return emptyResult();
    }

    try {
      const candidates = await this.retrieveCandidates(query, k);
      const ranked = rankCandidates(dedupeByContent(candidates), query, this.profile);
      const top = ranked.slice(0, k);
      const confidence = assessConfidence(top.map((chunk) => chunk.relevance_score));
      const contextChunks = selectContextChunks(ranked, confidence);

      log.debug(
        { candidates: candidates.length, unique: ranked.length, confidence, context: contextChunks.length },
        "query ranked",
      );

      return {
        context_text: formatContext(contextChunks),
        ranked_sources: extractSources(contextChunks),
        confidence_level: confidence,
        chunks: top,
      };
    } catch (error) {
      const failure = new QueryProcessingError(`Query failed: ${describeError(error)}`, {
        cause: error,
      });
      log.error({ err: failure }, "retrieval pipeline failed; returning empty result");
      return emptyResult();
    }
  }

  /** Whether a message looks like it needs the knowledge base at all. */
  shouldUseRetrieval(query: string): boolean {
    const trimmed = query.trim();
    if (!trimmed) {
      return false;
    }
    if (trimmed.split(/\s+/).length > LONG_QUERY_WORDS) {
      return true;
    }
    if (this.knowledgePatterns.some((pattern) => pattern.test(trimmed))) {
      return true;
    }
    const lower = trimmed.toLowerCase();
    return this.profile.questionIndicators.some((indicator) =>
      lower.includes(indicator.toLowerCase()),
    );
  }

  private async retrieveCandidates(query: string, k: number): Promise<RetrievedChunk[]> {
    const strategies = this.planStrategies(query, k);
    const settled = await Promise.allSettled(strategies.map((strategy) => strategy.run()));

    const candidates: RetrievedChunk[] = [];
    let failures = 0;
    settled.forEach((outcome, index) => {
      if (outcome.status === "fulfilled") {
        candidates.push(...outcome.value);
        return;
      }
      failures += 1;
      log.warn(
        { err: outcome.reason, strategy: strategies[index].name },
        "retrieval strategy failed",
      );
    });

    if (failures < strategies.length) {
      return candidates;
    }

    log.warn({ strategies: strategies.length }, "all strategies failed; trying plain similarity search");
    const fallback = await this.store.similaritySearch(query, k);
    return toRetrieved(fallback, (index, total) => decay(1, index, total));
  }

  private planStrategies(query: string, k: number): Strategy[] {
    const strategies: Strategy[] = [
      {
        name: "semantic",
        run: async () =>
          toRetrieved(
            await this.store.similaritySearch(query, k * SEMANTIC_POOL_FACTOR),
            (index, total) => decay(1, index, total),
          ),
      },
    ];

    const entities = hasInterrogativeCue(query, this.profile)
      ? extractEntities(query, this.profile)
      : [];
    if (entities.length > 0) {
      strategies.push({
        name: "entity",
        run: async () => {
          const hits = await this.store.similaritySearch(
            `${query} ${entities.join(" ")}`,
            k * AUXILIARY_POOL_FACTOR,
          );
          return toRetrieved(hits, (index, total, chunk) => {
            const bonus = new KeywordMatcher(chunk.content).hasAny(entities)
              ? ENTITY_MATCH_BONUS
              : 0;
            return decay(ENTITY_BASE_SCORE, index, total) + bonus;
          });
        },
      });
    }

    const terms = extractQueryTerms(query, this.stopwords, MAX_KEYWORD_TERMS);
    if (terms.length > 0) {
      strategies.push({
        name: "keyword",
        run: async () =>
          toRetrieved(
            await this.store.similaritySearch(terms.join(" "), k * AUXILIARY_POOL_FACTOR),
            (index, total) => decay(KEYWORD_BASE_SCORE, index, total),
          ),
      });
    }

    return strategies;
  }
}

export function emptyResult(): QueryResult {
  return {
    context_text: NO_CONTEXT_MESSAGE,
    ranked_sources: [],
    confidence_level: "none",
    chunks: [],
  };
}

/** `base` at rank 0, decaying linearly with rank over a pool of `total`. */
function decay(base: number, index: number, total: number): number {
  return base * (1 - index / Math.max(total, 1));
}

function toRetrieved(
  hits: ScoredChunk[],
  score: (index: number, total: number, chunk: ScoredChunk["chunk"]) => number,
): RetrievedChunk[] {
  return hits.map((hit, index) => ({
    content: hit.chunk.content,
    metadata: { ...hit.chunk.metadata },
    relevance_score: score(index, hits.length, hit.chunk),
  }));
}

function clampTopK(value: number): number {
  if (!Number.isFinite(value)) {
    return 5;
  }
  return Math.min(MAX_TOP_K, Math.max(1, Math.floor(value)));
}
