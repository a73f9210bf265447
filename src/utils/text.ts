import { createHash } from "node:crypto";

const WORD_REGEX = /[\p{L}\p{N}]+/gu;
const SINGLE_WORD_REGEX = /^[\p{L}\p{N}]+$/u;

export function normalizeText(text: string): string {
  return text.replace(/\r\n?/g, "\n").replace(/\t/g, " ").trim();
}

export function tokenize(text: string): string[] {
  return [...new Set(tokenizeAll(text))];
}

export function tokenizeAll(text: string): string[] {
  return text.toLowerCase().match(WORD_REGEX) ?? [];
}

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export function contentHash(text: string): string {
  return createHash("sha256").update(text, "utf-8").digest("hex");
}

/** First item per distinct `content`, in input order. */
export function uniqueByContent<T extends { content: string }>(items: readonly T[]): T[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const hash = contentHash(item.content);
    if (seen.has(hash)) {
      return false;
    }
    seen.add(hash);
    return true;
  });
}

/**
 * Query terms in first-seen order, with stop words and one-letter tokens removed.
 */
export function extractQueryTerms(
  query: string,
  stopwords: ReadonlySet<string>,
  limit = Number.POSITIVE_INFINITY,
): string[] {
  const terms: string[] = [];
  for (const token of tokenize(query)) {
    if (terms.length >= limit) {
      break;
    }
    if (token.length < 2 || stopwords.has(token)) {
      continue;
    }
    terms.push(token);
  }
  return terms;
}

/**
 * A text view that answers keyword membership questions. Single words match whole
 * tokens; phrases and symbols (e.g. "in charge", "@") match as substrings.
 */
export class KeywordMatcher {
  private readonly lower: string;

  private readonly tokens: Set<string>;

  constructor(text: string) {
    this.lower = text.toLowerCase();
    this.tokens = new Set(tokenizeAll(text));
  }

  has(keyword: string): boolean {
    const needle = keyword.toLowerCase().trim();
    if (!needle) {
      return false;
    }
    if (SINGLE_WORD_REGEX.test(needle)) {
      return this.tokens.has(needle);
    }
    return this.lower.includes(needle);
  }

  hasAny(keywords: readonly string[]): boolean {
    return keywords.some((keyword) => this.has(keyword));
  }

  countMatches(keywords: readonly string[]): number {
    let count = 0;
    for (const keyword of keywords) {
      if (this.has(keyword)) {
        count += 1;
      }
    }
    return count;
  }

  get tokenSet(): ReadonlySet<string> {
    return this.tokens;
  }
}
