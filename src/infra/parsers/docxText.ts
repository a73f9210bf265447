import JSZip from "jszip";
import { XMLParser } from "fast-xml-parser";

const MAIN_PART = "word/document.xml";
const AUXILIARY_PART_REGEX = /^word\/[^/]+\.xml$/;

const xmlParser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: false,
});

/**
 * Paragraph text from the main body (table rows rendered as `| a | b |`), followed by
 * stray runs from headers, footers and other word/*.xml parts.
 */
export async function extractDocxText(data: Buffer): Promise<string> {
  const zip = await JSZip.loadAsync(data);
  const main = zip.file(MAIN_PART);
  if (!main) {
    throw new Error(`Missing ${MAIN_PART} in office container.`);
  }

  const lines: string[] = [];
  collectBlocks(parseXml(await main.async("string")), lines);

  const auxiliaryNames = Object.keys(zip.files)
    .filter((name) => name !== MAIN_PART && AUXILIARY_PART_REGEX.test(name))
    .sort();

  for (const name of auxiliaryNames) {
    const part = zip.file(name);
    if (!part) {
      continue;
    }
    const stray: string[] = [];
    collectBlocks(parseXml(await part.async("string")), stray);
    const text = stray.filter((line) => line.length > 0);
    if (text.length > 0) {
      lines.push("", ...text);
    }
  }

  return collapseBlankLines(lines.join("\n"));
}

export function collapseBlankLines(text: string): string {
  return text
    .split("\n")
    .map((line) => line.trimEnd())
    .join("\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

function parseXml(xml: string): unknown[] {
  const parsed: unknown = xmlParser.parse(xml);
  return Array.isArray(parsed) ? parsed : [];
}

function collectBlocks(nodes: unknown[], out: string[]): void {
  for (const [tag, children] of entries(nodes)) {
    if (tag === "w:p") {
      out.push(collectRunText(children).trim());
    } else if (tag === "w:tr") {
      const cells = entries(children)
        .filter(([childTag]) => childTag === "w:tc")
        .map(([, cellChildren]) => {
          const paragraphs: string[] = [];
          collectBlocks(cellChildren, paragraphs);
          return paragraphs.filter(Boolean).join(" ");
        });
      out.push(`| ${cells.join(" | ")} |`);
    } else {
      collectBlocks(children, out);
    }
  }
}

function collectRunText(nodes: unknown[]): string {
  let text = "";
  for (const [tag, children] of entries(nodes)) {
    if (tag === "w:t") {
      text += textContent(children);
    } else if (tag === "w:tab") {
      text += " ";
    } else if (tag === "w:br" || tag === "w:cr") {
      text += "\n";
    } else {
      text += collectRunText(children);
    }
  }
  return text;
}

function textContent(nodes: unknown[]): string {
  let text = "";
  for (const node of nodes) {
    if (isRecord(node) && "#text" in node) {
      text += String(node["#text"]);
    }
  }
  return text;
}

/** Element entries of an order-preserved node list; text and attribute keys are skipped. */
function entries(nodes: unknown[]): Array<[string, unknown[]]> {
  const result: Array<[string, unknown[]]> = [];
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    for (const [key, value] of Object.entries(node)) {
      if (key === ":@" || key === "#text") {
        continue;
      }
      result.push([key, Array.isArray(value) ? value : []]);
    }
  }
  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
