import { IntentName, RetrievalProfile } from "../config/retrievalProfile.js";
import { ConfidenceLevel, RetrievedChunk } from "../domain/types.js";
import { KeywordMatcher, contentHash, extractQueryTerms } from "../utils/text.js";

export const BOOSTS = {
  structuredSection: 0.15,
  sharedTerms: 0.2,
  name: 0.25,
  contact: 0.3,
  policy: 0.2,
  benefit: 0.2,
  process: 0.4,
} as const;

const SHARED_TERMS_THRESHOLD = 2;
const PROCESS_INDICATOR_THRESHOLD = 4;
const STRUCTURED_SECTIONS = new Set(["table", "list", "list_part"]);
const INTENT_NAMES: readonly IntentName[] = ["name", "contact", "policy", "benefit", "process"];

export type ScoreTier = "high" | "medium" | "low" | "none";

export function scoreTier(score: number): ScoreTier {
  if (score >= 0.8) {
    return "high";
  }
  if (score >= 0.6) {
    return "medium";
  }
  if (score >= 0.4) {
    return "low";
  }
  return "none";
}

export function assessConfidence(scores: readonly number[]): ConfidenceLevel {
  if (scores.length === 0) {
    return "none";
  }
  const max = Math.max(...scores);
  const avg = scores.reduce((total, score) => total + score, 0) / scores.length;

  if (max >= 0.8 && avg >= 0.6) {
    return "high";
  }
  if (max >= 0.6 && avg >= 0.4) {
    return "medium";
  }
  if (max >= 0.4) {
    return "low";
  }
  return "very_low";
}

export function hasInterrogativeCue(query: string, profile: RetrievalProfile): boolean {
  return new KeywordMatcher(query).hasAny(profile.interrogativeCues);
}

export function extractEntities(query: string, profile: RetrievalProfile): string[] {
  const matcher = new KeywordMatcher(query);
  return profile.entityKeywords.filter((entity) => matcher.has(entity));
}

export function detectIntents(query: string, profile: RetrievalProfile): Set<IntentName> {
  const matcher = new KeywordMatcher(query);
  const intents = new Set<IntentName>();
  for (const name of INTENT_NAMES) {
    if (matcher.hasAny(profile.intents[name].queryKeywords)) {
      intents.add(name);
    }
  }
  return intents;
}

/** One entry per distinct content, keeping the higher score; the first one wins a tie. */
export function dedupeByContent(candidates: readonly RetrievedChunk[]): RetrievedChunk[] {
  const byHash = new Map<string, RetrievedChunk>();
  for (const candidate of candidates) {
    const key = contentHash(candidate.content);
    const existing = byHash.get(key);
    if (!existing || candidate.relevance_score > existing.relevance_score) {
      byHash.set(key, candidate);
    }
  }
  return [...byHash.values()];
}

export function computeBoost(
  candidate: RetrievedChunk,
  queryTerms: readonly string[],
  intents: ReadonlySet<IntentName>,
  profile: RetrievalProfile,
): number {
  const matcher = new KeywordMatcher(candidate.content);
  let boost = 0;

  if (STRUCTURED_SECTIONS.has(candidate.metadata.section_type)) {
    boost += BOOSTS.structuredSection;
  }
  if (matcher.countMatches(queryTerms) >= SHARED_TERMS_THRESHOLD) {
    boost += BOOSTS.sharedTerms;
  }
  if (intents.has("name") && matcher.hasAny(profile.intents.name.contentSignals)) {
    boost += BOOSTS.name;
  }
  if (intents.has("contact") && matcher.hasAny(profile.intents.contact.contentSignals)) {
    boost += BOOSTS.contact;
  }
  if (intents.has("policy") && matcher.hasAny(profile.intents.policy.contentSignals)) {
    boost += BOOSTS.policy;
  }
  if (intents.has("benefit") && matcher.hasAny(profile.intents.benefit.contentSignals)) {
    boost += BOOSTS.benefit;
  }
  if (
    intents.has("process") &&
    matcher.countMatches(profile.processIndicators) >= PROCESS_INDICATOR_THRESHOLD
  ) {
    boost += BOOSTS.process;
  }

  return boost;
}

/** Adds intent boosts and sorts by final score; equal scores keep their incoming order. */
export function rankCandidates(
  candidates: readonly RetrievedChunk[],
  query: string,
  profile: RetrievalProfile,
): RetrievedChunk[] {
  const queryTerms = extractQueryTerms(query, new Set(profile.stopwords));
  const intents = detectIntents(query, profile);

  return candidates
    .map((candidate, order) => ({
      order,
      chunk: {
        ...candidate,
        relevance_score:
          candidate.relevance_score + computeBoost(candidate, queryTerms, intents, profile),
      },
    }))
    .sort((a, b) => b.chunk.relevance_score - a.chunk.relevance_score || a.order - b.order)
    .map(({ chunk }) => chunk);
}
