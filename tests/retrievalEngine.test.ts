import { describe, expect, it } from "vitest";
import { loadRetrievalProfile } from "../src/config/retrievalProfile.js";
import { Chunk, ScoredChunk } from "../src/domain/types.js";
import { VectorStore, VectorStoreStorageInfo } from "../src/domain/vectorStore.js";
import { RetrievalEngine, emptyResult } from "../src/services/retrievalEngine.js";
import { makeChunk, makeProfile } from "./helpers.js";

type SearchHandler = (query: string, topK: number, call: number) => Promise<ScoredChunk[]>;

class ScriptedStore implements VectorStore {
  readonly calls: Array<[string, number]> = [];

  constructor(private readonly handler: SearchHandler) {}

  async initialize(): Promise<void> {}

  async addDocuments(): Promise<boolean> {
    return true;
  }

  async similaritySearch(query: string, topK: number): Promise<ScoredChunk[]> {
    this.calls.push([query, topK]);
    return this.handler(query, topK, this.calls.length);
  }

  async deleteCollection(): Promise<boolean> {
    return true;
  }

  async warmup(): Promise<void> {}

  async listDocuments(): Promise<Chunk[]> {
    return [];
  }

  async getStorageInfo(): Promise<VectorStoreStorageInfo> {
    return {
      backend: "file",
      collection: "scripted",
      document_count: 0,
      dimension: 0,
      mode: "keyword_only",
      location: "memory",
    };
  }

  async close(): Promise<void> {}
}

const ANNUAL = makeChunk("Annual leave", { chunk_index: 1, source: "leave.md", file_path: "/kb/leave.md", file_type: "md" });
const SICK = makeChunk("Sick note rules", { chunk_index: 2, source: "sick.md", file_path: "/kb/sick.md", file_type: "md" });

const hits = (...chunks: Chunk[]): ScoredChunk[] => chunks.map((chunk) => ({ chunk, score: 0.5 }));

describe("RetrievalEngine", () => {
  it("plans semantic, entity and keyword searches with their pool sizes", async () => {
    const store = new ScriptedStore(async () => []);
    const engine = new RetrievalEngine(
      store,
      makeProfile({ stopwords: ["who"], interrogativeCues: ["who"], entityKeywords: ["payroll"] }),
    );

    await engine.query("Who handles payroll email?", 2);

    expect(store.calls).toEqual([
      ["Who handles payroll email?", 6],
      ["Who handles payroll email? payroll", 4],
      ["handles payroll email", 4],
    ]);
  });

  it("merges strategies, keeps the best score per chunk and renders context", async () => {
    const store = new ScriptedStore(async () => hits(ANNUAL, SICK));
    const engine = new RetrievalEngine(store, makeProfile());

    const result = await engine.query("leave days");

    expect(store.calls).toEqual([
      ["leave days", 15],
      ["leave days", 10],
    ]);
    expect(result.chunks.map((chunk) => [chunk.content, chunk.relevance_score])).toEqual([
      ["Annual leave", 1],
      ["Sick note rules", 0.5],
    ]);
    expect(result.confidence_level).toBe("high");
    expect(result.context_text).toBe(
      "[Document: leave.md, Section: 1]\nAnnual leave\n\n[Document: sick.md, Section: 2]\nSick note rules",
    );
    expect(result.ranked_sources).toEqual([
      { title: "leave.md", path: "/kb/leave.md", type: "md", relevance: 1 },
      { title: "sick.md", path: "/kb/sick.md", type: "md", relevance: 0.5 },
    ]);
  });

  it("scores entity hits above the plain decay when they mention the entity", async () => {
    const payroll = makeChunk("Payroll questions go to Dana");
    const store = new ScriptedStore(async (query) =>
      query === "who handles payroll payroll" ? hits(payroll, ANNUAL) : [],
    );
    const engine = new RetrievalEngine(
      store,
      makeProfile({ stopwords: ["who", "handles"], interrogativeCues: ["who"], entityKeywords: ["payroll"] }),
    );

    const result = await engine.query("who handles payroll", 1);

    expect(store.calls).toEqual([
      ["who handles payroll", 3],
      ["who handles payroll payroll", 2],
      ["payroll", 2],
    ]);
    expect(result.chunks.map((chunk) => [chunk.content, chunk.relevance_score])).toEqual([
      ["Payroll questions go to Dana", 1],
    ]);
    expect(result.confidence_level).toBe("high");
  });

  it("tolerates a failing strategy", async () => {
    const store = new ScriptedStore(async (query) => {
      if (query === "the leave days") {
        throw new Error("semantic search down");
      }
      return hits(ANNUAL);
    });
    const engine = new RetrievalEngine(store, makeProfile({ stopwords: ["the"] }));

    const result = await engine.query("the leave days", 3);

    expect(store.calls).toEqual([
      ["the leave days", 9],
      ["leave days", 6],
    ]);
    expect(result.chunks.map((chunk) => [chunk.content, chunk.relevance_score])).toEqual([
      ["Annual leave", 0.6],
    ]);
    expect(result.confidence_level).toBe("medium");
  });

  it("falls back to one plain search when every strategy fails", async () => {
    const store = new ScriptedStore(async (_query, _topK, call) => {
      if (call === 1) {
        throw new Error("pool exhausted");
      }
      return hits(SICK);
    });
    const engine = new RetrievalEngine(store, makeProfile({ stopwords: ["is", "it"] }));

    const result = await engine.query("is it", 4);

    expect(store.calls).toEqual([
      ["is it", 12],
      ["is it", 4],
    ]);
    expect(result.chunks.map((chunk) => chunk.relevance_score)).toEqual([1]);
  });

  it("returns the empty result when the store is unavailable", async () => {
    const store = new ScriptedStore(async () => {
      throw new Error("connection refused");
    });
    const engine = new RetrievalEngine(store, makeProfile());

    await expect(engine.query("leave days")).resolves.toEqual({
      context_text: "No relevant information found.",
      ranked_sources: [],
      confidence_level: "none",
      chunks: [],
    });
  });

  it("skips the store for blank queries and clamps top-k", async () => {
    const store = new ScriptedStore(async () => []);
    const engine = new RetrievalEngine(store, makeProfile({ stopwords: ["x"] }));

    await expect(engine.query("   ")).resolves.toEqual(emptyResult());
    expect(store.calls).toEqual([]);

    await engine.query("x", 0);
    await engine.query("x", 500);
    expect(store.calls).toEqual([
      ["x", 3],
      ["x", 150],
    ]);
  });

  it("decides whether a message needs retrieval", () => {
    const engine = new RetrievalEngine(
      new ScriptedStore(async () => []),
      makeProfile({ knowledgePatterns: ["\\bpolicy\\b"], questionIndicators: ["?", "how"] }),
    );

    expect(engine.shouldUseRetrieval("hello there")).toBe(false);
    expect(engine.shouldUseRetrieval("")).toBe(false);
    expect(engine.shouldUseRetrieval("Policy")).toBe(true);
    expect(engine.shouldUseRetrieval("How are you")).toBe(true);
    expect(engine.shouldUseRetrieval("one two three four five six seven eight nine")).toBe(true);
  });

  it("recognizes knowledge questions with the bundled profile", async () => {
    const profile = await loadRetrievalProfile("config/retrieval-profile.json");
    const engine = new RetrievalEngine(new ScriptedStore(async () => []), profile);

    expect(engine.shouldUseRetrieval("PTO policy")).toBe(true);
    expect(engine.shouldUseRetrieval("thanks")).toBe(false);
  });
});
