import { describe, expect, it } from "vitest";
import { RetrievedChunk } from "../src/domain/types.js";
import {
  NO_CONTEXT_MESSAGE,
  extractSources,
  formatContext,
  selectContextChunks,
} from "../src/pipelines/context.js";
import {
  assessConfidence,
  computeBoost,
  dedupeByContent,
  detectIntents,
  extractEntities,
  hasInterrogativeCue,
  rankCandidates,
  scoreTier,
} from "../src/pipelines/ranking.js";
import { makeChunk, makeProfile } from "./helpers.js";

function retrieved(
  content: string,
  score: number,
  overrides: Parameters<typeof makeChunk>[1] = {},
): RetrievedChunk {
  return { content, metadata: makeChunk(content, overrides).metadata, relevance_score: score };
}

const CONTACT_PROFILE = makeProfile({
  interrogativeCues: ["who", "what", "?"],
  entityKeywords: ["hr", "payroll", "human resources"],
  intents: {
    ...makeProfile().intents,
    contact: { queryKeywords: ["email"], contentSignals: ["@"] },
    process: { queryKeywords: ["how"], contentSignals: [] },
  },
  processIndicators: ["submit", "approve", "form", "manager", "days"],
});

describe("confidence", () => {
  it("grades score sets by maximum and average", () => {
    expect(assessConfidence([0.9, 0.85, 0.8])).toBe("high");
    expect(assessConfidence([0.7, 0.5])).toBe("medium");
    expect(assessConfidence([0.5, 0.1])).toBe("low");
    expect(assessConfidence([0.3, 0.2])).toBe("very_low");
    expect(assessConfidence([])).toBe("none");
  });

  it("buckets single scores into tiers", () => {
    expect([0.8, 0.79, 0.6, 0.4, 0.39].map(scoreTier)).toEqual(["high", "medium", "medium", "low", "none"]);
  });
});

describe("query analysis", () => {
  it("finds cues, entities and intents", () => {
    const query = "Who is the HR email contact?";
    expect(hasInterrogativeCue(query, CONTACT_PROFILE)).toBe(true);
    expect(extractEntities(query, CONTACT_PROFILE)).toEqual(["hr"]);
    expect([...detectIntents(query, CONTACT_PROFILE)]).toEqual(["contact"]);
    expect(hasInterrogativeCue("leave balance", CONTACT_PROFILE)).toBe(false);
  });
});

describe("ranking", () => {
  it("keeps the higher-scored copy of duplicate content", () => {
    const unique = dedupeByContent([
      retrieved("alpha", 0.5),
      retrieved("beta", 0.6),
      retrieved("alpha", 0.9),
      retrieved("beta", 0.6, { source: "other.txt" }),
    ]);

    expect(unique.map((chunk) => [chunk.content, chunk.relevance_score, chunk.metadata.source])).toEqual([
      ["alpha", 0.9, "doc.txt"],
      ["beta", 0.6, "doc.txt"],
    ]);
  });

  it("boosts structured sections above plain text with a similar score", () => {
    const ranked = rankCandidates(
      [
        retrieved("Vacation days are listed below.", 0.55),
        retrieved("| Vacation | 20 days |", 0.5, { section_type: "table" }),
      ],
      "vacation rules",
      makeProfile(),
    );

    expect(ranked.map((chunk) => chunk.metadata.section_type)).toEqual(["table", "text"]);
    expect(ranked[0].relevance_score).toBeCloseTo(0.65, 10);
    expect(ranked[1].relevance_score).toBeCloseTo(0.55, 10);
  });

  it("adds the shared-terms boost when two query terms appear", () => {
    const boost = computeBoost(
      retrieved("Parental leave policy overview", 0.5),
      ["parental", "leave"],
      new Set(),
      makeProfile(),
    );
    expect(boost).toBeCloseTo(0.2, 10);
  });

  it("adds the contact boost when the query asks for contact details", () => {
    const candidate = retrieved("Reach HR at hr@example.test", 0.5);
    const intents = detectIntents("what is the hr email", CONTACT_PROFILE);
    expect(computeBoost(candidate, ["what", "is", "the", "hr", "email"], intents, CONTACT_PROFILE)).toBeCloseTo(
      0.3,
      10,
    );
  });

  it("adds the process boost only with enough process indicators", () => {
    const intents = detectIntents("how do I request leave", CONTACT_PROFILE);
    const terms = ["how", "do", "request", "leave"];

    const procedural = retrieved("Submit the form, your manager will approve within days", 0.5);
    expect(computeBoost(procedural, terms, intents, CONTACT_PROFILE)).toBeCloseTo(0.4, 10);

    const vague = retrieved("Submit the form", 0.5);
    expect(computeBoost(vague, terms, intents, CONTACT_PROFILE)).toBe(0);
  });

  it("keeps incoming order for equal final scores", () => {
    const ranked = rankCandidates(
      [retrieved("first", 0.5), retrieved("second", 0.5), retrieved("third", 0.7)],
      "unrelated",
      makeProfile(),
    );
    expect(ranked.map((chunk) => chunk.content)).toEqual(["third", "first", "second"]);
  });
});

describe("context assembly", () => {
  const ranked = [0.95, 0.9, 0.7, 0.65, 0.6, 0.61, 0.5, 0.45, 0.3].map((score) =>
    retrieved(`chunk ${score}`, score),
  );

  it("uses tight budgets for confident results", () => {
    expect(selectContextChunks(ranked, "high").map((chunk) => chunk.relevance_score)).toEqual([
      0.95, 0.9, 0.7, 0.65, 0.6, 0.5,
    ]);
  });

  it("admits more medium and low chunks otherwise", () => {
    expect(selectContextChunks(ranked, "medium").map((chunk) => chunk.relevance_score)).toEqual([
      0.95, 0.9, 0.7, 0.65, 0.6, 0.61, 0.5, 0.45,
    ]);
  });

  it("never exceeds twelve context chunks", () => {
    const many = [
      ...Array.from({ length: 11 }, (_, index) => retrieved(`high ${index}`, 0.9)),
      ...Array.from({ length: 3 }, (_, index) => retrieved(`medium ${index}`, 0.7)),
    ];
    const selected = selectContextChunks(many, "high");
    expect(selected).toHaveLength(12);
    expect(selected.filter((chunk) => chunk.relevance_score === 0.7)).toHaveLength(2);
  });

  it("labels each block with its document and section", () => {
    const text = formatContext([
      retrieved("Annual leave is 20 days.", 0.9, { source: "leave.md", chunk_index: 2 }),
      retrieved("Payroll runs monthly.", 0.8, { source: "pay.md", chunk_index: 1 }),
    ]);
    expect(text).toBe(
      "[Document: leave.md, Section: 2]\nAnnual leave is 20 days.\n\n[Document: pay.md, Section: 1]\nPayroll runs monthly.",
    );
    expect(formatContext([])).toBe(NO_CONTEXT_MESSAGE);
  });

  it("lists each source once with rounded relevance", () => {
    const sources = extractSources([
      retrieved("a", 0.8765, { source: "leave.md", file_path: "/kb/leave.md", file_type: "md" }),
      retrieved("b", 0.5, { source: "leave.md", file_path: "/kb/leave.md", file_type: "md" }),
      retrieved("c", 0.4321, { source: "pay.pdf", file_path: "/kb/pay.pdf", file_type: "pdf" }),
    ]);
    expect(sources).toEqual([
      { title: "leave.md", path: "/kb/leave.md", type: "md", relevance: 0.88 },
      { title: "pay.pdf", path: "/kb/pay.pdf", type: "pdf", relevance: 0.43 },
    ]);
  });
});
