import { promises as fs } from "node:fs";
import path from "node:path";
import JSZip from "jszip";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ExtractionError, UnsupportedFormatError } from "../src/domain/errors.js";
import { collapseBlankLines, extractDocxText } from "../src/infra/parsers/docxText.js";
import {
  decodeText,
  extractText,
  extractTextFromBuffer,
  getSupportedDocumentExtensions,
  isSupportedDocumentExtension,
  toPositionedText,
} from "../src/infra/parsers/documentLoader.js";
import { makeTempDir } from "./helpers.js";

function run(text: string): string {
  return `<w:r><w:t>${text}</w:t></w:r>`;
}

function paragraph(...runs: string[]): string {
  return `<w:p>${runs.join("")}</w:p>`;
}

function row(...cells: string[]): string {
  return `<w:tr>${cells.map((cell) => `<w:tc>${paragraph(run(cell))}</w:tc>`).join("")}</w:tr>`;
}

async function buildDocx(parts: Record<string, string>): Promise<Buffer> {
  const zip = new JSZip();
  for (const [name, xml] of Object.entries(parts)) {
    zip.file(name, xml);
  }
  return zip.generateAsync({ type: "nodebuffer" });
}

describe("documentLoader", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await makeTempDir("loader");
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it("lists the supported extensions", () => {
    expect(getSupportedDocumentExtensions()).toEqual([".txt", ".md", ".csv", ".pdf", ".docx"]);
    expect(isSupportedDocumentExtension("Manual.PDF")).toBe(true);
    expect(isSupportedDocumentExtension("sheet.xlsx")).toBe(false);
  });

  it("loads text files with normalized line endings", async () => {
    const file = path.join(tempDir, "notes.txt");
    await fs.writeFile(file, "\uFEFFline 1\r\nline 2\r\n", "utf-8");

    await expect(extractText(file)).resolves.toBe("line 1\nline 2");
  });

  it("falls back to latin1 for bytes that are not UTF-8", () => {
    expect(decodeText(Buffer.from([0x63, 0x61, 0x66, 0xe9]))).toBe("café");
  });

  it("rejects unsupported extensions with the allowed list", async () => {
    const failure = extractText(path.join(tempDir, "sheet.xlsx"));
    await expect(failure).rejects.toBeInstanceOf(UnsupportedFormatError);
    await expect(failure).rejects.toThrow(
      "Unsupported extension: .xlsx. Allowed: .txt, .md, .csv, .pdf, .docx",
    );
  });

  it("reports a missing file as an extraction error", async () => {
    const missing = path.join(tempDir, "missing.md");
    await expect(extractText(missing)).rejects.toThrow(`File not found: ${missing}`);
    await expect(extractText(missing)).rejects.toBeInstanceOf(ExtractionError);
  });

  it("wraps a corrupt office container in an extraction error", async () => {
    const failure = extractTextFromBuffer("broken.docx", Buffer.from("not a zip archive"));
    await expect(failure).rejects.toBeInstanceOf(ExtractionError);
    await expect(failure).rejects.toThrow(/^Failed to extract text from broken\.docx: /);
  });

  it("reads docx body paragraphs, tables and header parts", async () => {
    const data = await buildDocx({
      "word/document.xml": `<w:document><w:body>${paragraph(run("Leave policy"))}<w:tbl>${row(
        "Type",
        "Days",
      )}${row("Annual", "20")}</w:tbl>${paragraph(run("Apply"), "<w:r><w:tab/></w:r>", run("early"))}</w:body></w:document>`,
      "word/header1.xml": `<w:hdr>${paragraph(run("Company Confidential"))}</w:hdr>`,
      "word/styles.xml": "<w:styles></w:styles>",
    });

    await expect(extractDocxText(data)).resolves.toBe(
      "Leave policy\n| Type | Days |\n| Annual | 20 |\nApply early\n\nCompany Confidential",
    );
  });

  it("fails when the main document part is missing", async () => {
    const data = await buildDocx({ "word/header1.xml": "<w:hdr></w:hdr>" });
    await expect(extractDocxText(data)).rejects.toThrow("Missing word/document.xml in office container.");
  });

  it("collapses runs of blank lines", () => {
    expect(collapseBlankLines("a  \n\n\n\nb\n")).toBe("a\n\nb");
  });

  it("reads pdf.js text items into positioned runs", () => {
    expect(toPositionedText({ str: "Hello", transform: [1, 0, 0, 1, 72, 700], width: 25 })).toEqual({
      text: "Hello",
      x: 72,
      y: 700,
      width: 25,
      rotated: false,
    });
    expect(toPositionedText({ str: "Side", transform: [0, 1, -1, 0, 10, 20] })?.rotated).toBe(true);
    expect(toPositionedText({ transform: [1, 0, 0, 1, 0, 0] })).toBeNull();
  });
});
