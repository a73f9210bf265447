import { ChunkingConfig } from "../config/env.js";
import {
  Chunk,
  ChunkMetadata,
  DocumentMetadata,
  Priority,
  SectionType,
} from "../domain/types.js";
import { contentHash, countWords, normalizeText } from "../utils/text.js";

export type SegmentType = "text" | "table" | "list" | "header";

export interface StructureSegment {
  type: SegmentType;
  lines: string[];
}

interface SectionPiece {
  content: string;
  sectionType: SectionType;
}

const LIST_MARKER_REGEX = /^(?:[-*+•●▪◦]|\d{1,3}[.)]|[A-Za-z][.)]|\((?:\d{1,3}|[A-Za-z]|[ivxlcdm]+)\))\s+/i;
const SENTENCE_END_REGEX = /[.!?]+/g;
const LIST_OVERLAP_LINES = 2;
const SENTENCE_LOOKAHEAD = 100;
const MIN_WINDOW_RATIO = 0.7;
const LIST_SINGLE_CHUNK_RATIO = 1.5;

export function classifyLine(line: string): SegmentType | "blank" {
  const trimmed = line.trim();
  if (!trimmed) {
    return "blank";
  }
  if (isTableLine(trimmed)) {
    return "table";
  }
  if (isHeaderLine(trimmed)) {
    return "header";
  }
  if (LIST_MARKER_REGEX.test(trimmed)) {
    return "list";
  }
  return "text";
}

export function segmentStructure(text: string): StructureSegment[] {
  const segments: StructureSegment[] = [];
  let current: StructureSegment | null = null;

  for (const line of normalizeText(text).split("\n")) {
    const kind = classifyLine(line);

    if (kind === "blank") {
      current?.lines.push("");
      continue;
    }

    // Each header line stands alone.
    if (!current || current.type !== kind || kind === "header") {
      current = { type: kind, lines: [] };
      segments.push(current);
    }
    current.lines.push(line.trimEnd());
  }

  return segments;
}

export function chunkText(
  text: string,
  base: DocumentMetadata,
  config: ChunkingConfig,
  now: () => Date = () => new Date(),
): Chunk[] {
  const normalized = normalizeText(text);
  if (!normalized) {
    return [];
  }

  const bounded =
    normalized.length > config.maxCharsPerDoc
      ? normalized.slice(0, config.maxCharsPerDoc)
      : normalized;

  const pieces: SectionPiece[] = [];
  for (const segment of segmentStructure(bounded)) {
    pieces.push(...chunkSegment(segment, config));
  }

  const total = pieces.length;
  const docHash = contentHash(normalized);
  const processedAt = now().toISOString();

  return pieces.map((piece, index) => {
    const metadata: ChunkMetadata = {
      ...base,
      doc_hash: docHash,
      char_count: normalized.length,
      word_count: countWords(normalized),
      processed_at: processedAt,
      chunk_index: index + 1,
      total_chunks: total,
      section_type: piece.sectionType,
      priority: priorityFor(piece.sectionType),
    };
    return { content: piece.content, metadata };
  });
}

function chunkSegment(segment: StructureSegment, config: ChunkingConfig): SectionPiece[] {
  const body = segment.lines.join("\n").trim();
  if (!body) {
    return [];
  }

  switch (segment.type) {
    case "table":
    case "header":
      return [{ content: body, sectionType: segment.type }];
    case "list":
      if (body.length <= config.chunkSize * LIST_SINGLE_CHUNK_RATIO) {
        return [{ content: body, sectionType: "list" }];
      }
      return splitListLines(segment.lines, config.chunkSize).map((content) => ({
        content,
        sectionType: "list_part",
      }));
    case "text":
      return splitBySlidingWindow(body, config).map((content) => ({
        content,
        sectionType: "text",
      }));
  }
}

export function splitListLines(lines: string[], chunkSize: number): string[] {
  const parts: string[] = [];
  let current: string[] = [];
  let fresh = 0;

  const joinedLength = (items: string[]) =>
    items.reduce((total, item, index) => total + item.length + (index > 0 ? 1 : 0), 0);

  for (const line of lines) {
    if (!line.trim()) {
      continue;
    }
    const projected = joinedLength(current) + (current.length > 0 ? 1 : 0) + line.length;
    if (fresh > 0 && projected > chunkSize) {
      parts.push(current.join("\n"));
      current = current.slice(-LIST_OVERLAP_LINES);
      fresh = 0;
    }
    current.push(line);
    fresh += 1;
  }

  if (fresh > 0) {
    parts.push(current.join("\n"));
  }
  return parts;
}

export function splitBySlidingWindow(text: string, config: ChunkingConfig): string[] {
  const size = Math.max(1, config.chunkSize);
  const overlap = Math.min(Math.max(config.chunkOverlap, 0), size - 1);

  if (text.length <= size) {
    return [text];
  }

  const chunks: string[] = [];
  let start = 0;

  while (start < text.length) {
    let end = Math.min(start + size, text.length);

    if (config.ensureCompleteSentences && end < text.length && !isSentenceBoundary(text, end)) {
      const forward = findForwardBoundary(text, end);
      if (forward !== -1) {
        end = forward;
      } else {
        const backward = findLastBoundary(text, start, end);
        if (backward !== -1 && backward - start >= size * MIN_WINDOW_RATIO) {
          end = backward;
        }
      }
    }

    const piece = text.slice(start, end).trim();
    if (piece) {
      chunks.push(piece);
    }

    if (end >= text.length) {
      break;
    }
    start = Math.max(end - overlap, start + 1);
  }

  return chunks;
}

function isSentenceBoundary(text: string, position: number): boolean {
  return /[.!?]/.test(text.charAt(position - 1)) && isBreakAt(text, position);
}

function isBreakAt(text: string, position: number): boolean {
  return position >= text.length || /\s/.test(text.charAt(position));
}

function findForwardBoundary(text: string, from: number): number {
  const limit = Math.min(text.length, from + SENTENCE_LOOKAHEAD);
  const regex = new RegExp(SENTENCE_END_REGEX.source, "g");
  regex.lastIndex = from;

  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    const after = match.index + match[0].length;
    if (after > limit) {
      return -1;
    }
    if (isBreakAt(text, after)) {
      return after;
    }
  }
  return -1;
}

function findLastBoundary(text: string, start: number, end: number): number {
  const regex = new RegExp(SENTENCE_END_REGEX.source, "g");
  regex.lastIndex = start;

  let last = -1;
  let match: RegExpExecArray | null;
  while ((match = regex.exec(text)) !== null) {
    const after = match.index + match[0].length;
    if (after > end) {
      break;
    }
    if (isBreakAt(text, after)) {
      last = after;
    }
  }
  return last;
}

function isTableLine(line: string): boolean {
  const pipes = line.split("|").length - 1;
  if (pipes >= 2) {
    return true;
  }
  if (pipes === 0) {
    return false;
  }
  return line.split("|").filter((cell) => cell.trim().length > 0).length >= 2;
}

function isHeaderLine(line: string): boolean {
  return (
    (line.length >= 6 && line.startsWith("===") && line.endsWith("===")) ||
    (line.length >= 6 && line.startsWith("---") && line.endsWith("---"))
  );
}

function priorityFor(sectionType: SectionType): Priority {
  if (sectionType === "table") {
    return "high";
  }
  if (sectionType === "header") {
    return "low";
  }
  return "normal";
}
