import { describe, expect, it } from "vitest";
import { mapWithConcurrency } from "../src/utils/concurrency.js";
import { ReadWriteLock } from "../src/utils/lock.js";
import {
  KeywordMatcher,
  countWords,
  extractQueryTerms,
  normalizeText,
  tokenize,
} from "../src/utils/text.js";
import { dot, l2Normalize, vectorNorm } from "../src/utils/vector.js";

describe("text utils", () => {
  it("normalizes line endings and tabs", () => {
    expect(normalizeText("  a\r\nb\rc\td  ")).toBe("a\nb\nc d");
  });

  it("tokenizes unicode words once each", () => {
    expect(tokenize("Café café Straße 42!")).toEqual(["café", "straße", "42"]);
    expect(countWords("  one two\nthree ")).toBe(3);
  });

  it("drops stop words and one-letter tokens from query terms", () => {
    const stopwords = new Set(["the", "is"]);
    expect(extractQueryTerms("What is the leave policy? A policy", stopwords)).toEqual([
      "what",
      "leave",
      "policy",
    ]);
    expect(extractQueryTerms("alpha beta gamma", new Set(), 2)).toEqual(["alpha", "beta"]);
  });

  it("matches single words as tokens and phrases as substrings", () => {
    const matcher = new KeywordMatcher("Contact HR at hr@example.com; person in charge: Ada.");
    expect(matcher.has("hr")).toBe(true);
    expect(matcher.has("act")).toBe(false);
    expect(matcher.has("in charge")).toBe(true);
    expect(matcher.has("@")).toBe(true);
    expect(matcher.countMatches(["contact", "ada", "salary"])).toBe(2);
  });
});

describe("vector utils", () => {
  it("normalizes to unit length and leaves zero vectors at zero", () => {
    const unit = l2Normalize([3, 4]);
    expect(Array.from(unit)).toEqual([0.6000000238418579, 0.800000011920929]);
    expect(vectorNorm(unit)).toBeCloseTo(1, 6);
    expect(Array.from(l2Normalize([0, 0, 0]))).toEqual([0, 0, 0]);
    expect(dot([1, 2, 3], [4, 5, 6])).toBe(32);
  });
});

describe("mapWithConcurrency", () => {
  it("keeps input order and caps tasks in flight", async () => {
    let active = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 10, 20, 5], 2, async (delay, index) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, delay));
      active -= 1;
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
    expect(peak).toBe(2);
  });
});

describe("ReadWriteLock", () => {
  it("shares reads and serializes a queued writer after them", async () => {
    const lock = new ReadWriteLock();
    const events: string[] = [];
    let releaseFirst: () => void = () => undefined;
    const firstGate = new Promise<void>((resolve) => {
      releaseFirst = resolve;
    });

    const first = lock.withRead(async () => {
      events.push("read-1 start");
      await firstGate;
      events.push("read-1 end");
    });
    const second = lock.withRead(async () => {
      events.push("read-2");
    });
    const writer = lock.withWrite(async () => {
      events.push("write");
    });
    const late = lock.withRead(async () => {
      events.push("read-3");
    });

    await second;
    releaseFirst();
    await Promise.all([first, writer, late]);

    expect(events).toEqual(["read-1 start", "read-2", "read-1 end", "write", "read-3"]);
  });
});
