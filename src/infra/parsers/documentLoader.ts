import { promises as fs } from "node:fs";
import path from "node:path";
import {
  ExtractionError,
  RetrievalError,
  UnsupportedFormatError,
  describeError,
  isFileMissing,
} from "../../domain/errors.js";
import { normalizeText } from "../../utils/text.js";
import { extractDocxText } from "./docxText.js";
import { PositionedText, composePdfText } from "./pdfLayout.js";

const dynamicImport = new Function(
  "modulePath",
  "return import(modulePath)",
) as (modulePath: string) => Promise<unknown>;

export interface ExtractOptions {
  /** Lines carrying one of these words are recovered from a PDF's raw text stream. */
  recoveryKeywords?: readonly string[];
}

type TextExtractor = (data: Buffer, options: ExtractOptions) => Promise<string>;

interface PdfParseOptions {
  pagerender: (pageData: unknown) => Promise<string>;
}

type PdfParseFn = (dataBuffer: Buffer, options?: PdfParseOptions) => Promise<unknown>;

const EXTRACTORS: Record<string, TextExtractor> = {
  ".txt": async (data) => decodeText(data),
  ".md": async (data) => decodeText(data),
  ".csv": async (data) => decodeText(data),
  ".pdf": (data, options) => extractPdfText(data, options.recoveryKeywords ?? []),
  ".docx": (data) => extractDocxText(data),
};

export function isSupportedDocumentExtension(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() in EXTRACTORS;
}

export function getSupportedDocumentExtensions(): string[] {
  return Object.keys(EXTRACTORS);
}

export async function extractText(
  filePath: string,
  options: ExtractOptions = {},
): Promise<string> {
  const extractor = resolveExtractor(filePath);

  let data: Buffer;
  try {
    data = await fs.readFile(filePath);
  } catch (error) {
    const reason = isFileMissing(error) ? "File not found" : describeError(error);
    throw new ExtractionError(filePath, `${reason}: ${filePath}`, { cause: error });
  }

  return runExtractor(extractor, filePath, data, options);
}

export async function extractTextFromBuffer(
  sourceName: string,
  data: Buffer,
  options: ExtractOptions = {},
): Promise<string> {
  return runExtractor(resolveExtractor(sourceName), sourceName, data, options);
}

/** UTF-8 first; bytes that are not valid UTF-8 are read as latin1. */
export function decodeText(data: Buffer): string {
  let text: string;
  try {
    text = new TextDecoder("utf-8", { fatal: true }).decode(data);
  } catch {
    text = data.toString("latin1");
  }
  return normalizeText(text.replace(/^\uFEFF/, ""));
}

function resolveExtractor(filePath: string): TextExtractor {
  const ext = path.extname(filePath).toLowerCase();
  const extractor = EXTRACTORS[ext];
  if (!extractor) {
    throw new UnsupportedFormatError(filePath, ext, getSupportedDocumentExtensions());
  }
  return extractor;
}

async function runExtractor(
  extractor: TextExtractor,
  filePath: string,
  data: Buffer,
  options: ExtractOptions,
): Promise<string> {
  try {
    return await extractor(data, options);
  } catch (error) {
    if (error instanceof RetrievalError) {
      throw error;
    }
    throw new ExtractionError(
      filePath,
      `Failed to extract text from ${path.basename(filePath)}: ${describeError(error)}`,
      { cause: error },
    );
  }
}

async function extractPdfText(
  buffer: Buffer,
  recoveryKeywords: readonly string[],
): Promise<string> {
  const parse = await loadPdfParse();
  const pages: PositionedText[][] = [];

  await parse(buffer, {
    pagerender: async (pageData) => {
      const items = await readPageItems(pageData);
      pages.push(items);
      return items.map((item) => item.text).join(" ");
    },
  });

  return normalizeText(composePdfText(pages, recoveryKeywords));
}

async function loadPdfParse(): Promise<PdfParseFn> {
  // The package root runs a self-test against a bundled fixture when imported.
  const mod = await dynamicImport("pdf-parse/lib/pdf-parse.js");
  const fn = resolvePdfParse(mod);
  if (!fn) {
    throw new Error("PDF parsing is unavailable. Install `pdf-parse` (`npm install pdf-parse`).");
  }
  return fn;
}

function resolvePdfParse(mod: unknown): PdfParseFn | null {
  if (typeof mod === "function") {
    return mod as PdfParseFn;
  }
  if (!mod || typeof mod !== "object") {
    return null;
  }
  const candidate = "default" in mod ? mod.default : undefined;
  if (typeof candidate === "function") {
    return candidate as PdfParseFn;
  }
  return null;
}

async function readPageItems(pageData: unknown): Promise<PositionedText[]> {
  if (!pageData || typeof pageData !== "object") {
    return [];
  }
  const getTextContent = "getTextContent" in pageData ? pageData.getTextContent : undefined;
  if (typeof getTextContent !== "function") {
    return [];
  }

  const content: unknown = await getTextContent.call(pageData, {
    normalizeWhitespace: false,
    disableCombineTextItems: false,
  });
  const items =
    content && typeof content === "object" && "items" in content ? content.items : undefined;
  if (!Array.isArray(items)) {
    return [];
  }

  const positioned: PositionedText[] = [];
  for (const item of items) {
    const parsed = toPositionedText(item);
    if (parsed) {
      positioned.push(parsed);
    }
  }
  return positioned;
}

export function toPositionedText(item: unknown): PositionedText | null {
  if (!item || typeof item !== "object") {
    return null;
  }
  const str = "str" in item ? item.str : undefined;
  const transform = "transform" in item ? item.transform : undefined;
  const width = "width" in item ? item.width : undefined;
  if (typeof str !== "string" || !Array.isArray(transform) || transform.length < 6) {
    return null;
  }

  const [a, b, c, , x, y] = transform.map((value) => Number(value));
  if (!Number.isFinite(x) || !Number.isFinite(y)) {
    return null;
  }

  return {
    text: str,
    x,
    y,
    width: typeof width === "number" && Number.isFinite(width) ? width : str.length * Math.abs(a || 1),
    rotated: Math.abs(b) > 1e-3 || Math.abs(c) > 1e-3,
  };
}
