import { KeywordMatcher } from "../../utils/text.js";

/** A text run as pdf.js reports it: baseline origin in page units plus advance width. */
export interface PositionedText {
  text: string;
  x: number;
  y: number;
  width: number;
  /** Set for runs drawn at an angle; the line layout skips them. */
  rotated?: boolean;
}

interface LayoutLine {
  y: number;
  cells: string[];
}

const LINE_TOLERANCE = 2;
const CELL_GAP = 12;
const MIN_TABLE_ROWS = 2;

export function composePdfText(
  pages: PositionedText[][],
  recoveryKeywords: readonly string[],
): string {
  return pages
    .map((items, index) => {
      const body = layoutPage(items, recoveryKeywords);
      return body ? `=== PAGE ${index + 1} ===\n${body}` : `=== PAGE ${index + 1} ===`;
    })
    .join("\n\n");
}

/**
 * Tables first become pipe-delimited rows, remaining lines keep their cell spacing,
 * and keyword-bearing lines seen only in the raw stream are appended at the end.
 */
export function layoutPage(
  items: PositionedText[],
  recoveryKeywords: readonly string[],
): string {
  const lines = groupIntoLines(items);
  const blocks: string[] = [];

  let index = 0;
  while (index < lines.length) {
    let runEnd = index;
    while (runEnd < lines.length && lines[runEnd].cells.length >= 2) {
      runEnd += 1;
    }

    if (runEnd - index >= MIN_TABLE_ROWS) {
      blocks.push(
        lines
          .slice(index, runEnd)
          .map((line) => `| ${line.cells.join(" | ")} |`)
          .join("\n"),
      );
      index = runEnd;
      continue;
    }

    const end = Math.max(runEnd, index + 1);
    for (const line of lines.slice(index, end)) {
      blocks.push(line.cells.join("  "));
    }
    index = end;
  }

  const structured = blocks.join("\n");
  const recovered = recoverMissedLines(items, structured, recoveryKeywords);
  return recovered.length > 0 ? `${structured}\n${recovered.join("\n")}` : structured;
}

export function groupIntoLines(items: PositionedText[]): LayoutLine[] {
  const visible = items.filter((item) => !item.rotated && item.text.trim().length > 0);
  const sorted = [...visible].sort((a, b) => b.y - a.y || a.x - b.x);

  const rows: PositionedText[][] = [];
  for (const item of sorted) {
    const row = rows[rows.length - 1];
    if (row && Math.abs(row[0].y - item.y) <= LINE_TOLERANCE) {
      row.push(item);
    } else {
      rows.push([item]);
    }
  }

  return rows.map((row) => ({
    y: row[0].y,
    cells: splitCells(row.sort((a, b) => a.x - b.x)),
  }));
}

function splitCells(row: PositionedText[]): string[] {
  const cells: string[] = [];
  let current = "";
  let previousEnd: number | null = null;

  for (const item of row) {
    const gap = previousEnd === null ? 0 : item.x - previousEnd;
    if (previousEnd !== null && gap > CELL_GAP) {
      cells.push(current.trim());
      current = "";
    } else if (previousEnd !== null && gap > 1 && !current.endsWith(" ")) {
      current += " ";
    }
    current += item.text;
    previousEnd = item.x + item.width;
  }

  if (current.trim()) {
    cells.push(current.trim());
  }
  return cells.filter((cell) => cell.length > 0);
}

function recoverMissedLines(
  items: PositionedText[],
  structured: string,
  recoveryKeywords: readonly string[],
): string[] {
  if (recoveryKeywords.length === 0) {
    return [];
  }

  const haystack = squash(structured);
  const recovered: string[] = [];
  for (const line of naiveLines(items)) {
    const key = squash(line);
    if (!key || haystack.includes(key)) {
      continue;
    }
    if (new KeywordMatcher(line).hasAny(recoveryKeywords)) {
      recovered.push(line);
    }
  }
  return recovered;
}

/** Stream-order text, breaking a line whenever the baseline moves. */
function naiveLines(items: PositionedText[]): string[] {
  const lines: string[] = [];
  let current: string[] = [];
  let currentY: number | null = null;

  for (const item of items) {
    if (currentY !== null && Math.abs(item.y - currentY) > LINE_TOLERANCE) {
      lines.push(current.join(" "));
      current = [];
    }
    current.push(item.text);
    currentY = item.y;
  }
  if (current.length > 0) {
    lines.push(current.join(" "));
  }

  return lines.map((line) => line.replace(/\s+/g, " ").trim()).filter(Boolean);
}

function squash(text: string): string {
  return text.toLowerCase().replace(/[\s|]+/g, "");
}
