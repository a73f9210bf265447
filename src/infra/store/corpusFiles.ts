import { createHash } from "node:crypto";
import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { CorpusIntegrityError, isFileMissing } from "../../domain/errors.js";
import { Chunk } from "../../domain/types.js";

export const CORPUS_FORMAT_VERSION = 1;

const MAGIC = "VSTR";
const HEADER_BYTES = 16;
const FLOAT_BYTES = 4;

const metadataValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const chunkMetadataSchema = z
  .object({
    source: z.string(),
    file_path: z.string(),
    file_type: z.string(),
    doc_hash: z.string(),
    char_count: z.number(),
    word_count: z.number(),
    chunk_index: z.number().int().positive(),
    total_chunks: z.number().int().positive(),
    section_type: z.enum(["text", "table", "list", "list_part", "header"]),
    priority: z.enum(["low", "normal", "high"]),
  })
  .catchall(metadataValueSchema);

export const chunkSchema = z.object({
  content: z.string(),
  metadata: chunkMetadataSchema,
});

const documentsFileSchema = z.object({
  format_version: z.number().int(),
  collection: z.string(),
  saved_at: z.string(),
  count: z.number().int().nonnegative(),
  dimension: z.number().int().nonnegative(),
  vectors_sha256: z.string(),
  documents: z.array(chunkSchema),
});

export type DocumentsFile = z.infer<typeof documentsFileSchema>;

export interface CorpusSnapshot {
  dimension: number;
  rows: Float32Array[];
  documents: Chunk[];
}

export interface CorpusPaths {
  vectors: string;
  documents: string;
}

export function corpusPaths(dataDir: string, collection: string): CorpusPaths {
  const base = path.resolve(dataDir);
  return {
    vectors: path.join(base, `${collection}.vectors.bin`),
    documents: path.join(base, `${collection}.documents.json`),
  };
}

/** Header: magic, format version, row count, dimension (uint32 LE), then float32 LE rows. */
export function encodeVectors(rows: Float32Array[], dimension: number): Buffer {
  const buffer = Buffer.alloc(HEADER_BYTES + rows.length * dimension * FLOAT_BYTES);
  buffer.write(MAGIC, 0, "ascii");
  buffer.writeUInt32LE(CORPUS_FORMAT_VERSION, 4);
  buffer.writeUInt32LE(rows.length, 8);
  buffer.writeUInt32LE(dimension, 12);

  let offset = HEADER_BYTES;
  for (const row of rows) {
    if (row.length !== dimension) {
      throw new Error(`Row width ${row.length} does not match dimension ${dimension}.`);
    }
    for (let i = 0; i < dimension; i += 1) {
      buffer.writeFloatLE(row[i], offset);
      offset += FLOAT_BYTES;
    }
  }
  return buffer;
}

export function decodeVectors(
  buffer: Buffer,
  filePath: string,
): { dimension: number; rows: Float32Array[] } {
  if (buffer.length < HEADER_BYTES || buffer.toString("ascii", 0, 4) !== MAGIC) {
    throw new CorpusIntegrityError(`Not a vector matrix file: ${filePath}`);
  }
  const version = buffer.readUInt32LE(4);
  if (version !== CORPUS_FORMAT_VERSION) {
    throw new CorpusIntegrityError(
      `Unsupported vector file version ${version} in ${filePath}. Expected ${CORPUS_FORMAT_VERSION}.`,
    );
  }

  const rowCount = buffer.readUInt32LE(8);
  const dimension = buffer.readUInt32LE(12);
  const expectedBytes = HEADER_BYTES + rowCount * dimension * FLOAT_BYTES;
  if (buffer.length !== expectedBytes) {
    throw new CorpusIntegrityError(
      `Vector file ${filePath} holds ${buffer.length} bytes; header declares ${rowCount}x${dimension} (${expectedBytes} bytes).`,
    );
  }

  const rows: Float32Array[] = [];
  let offset = HEADER_BYTES;
  for (let r = 0; r < rowCount; r += 1) {
    const row = new Float32Array(dimension);
    for (let i = 0; i < dimension; i += 1) {
      row[i] = buffer.readFloatLE(offset);
      offset += FLOAT_BYTES;
    }
    rows.push(row);
  }
  return { dimension, rows };
}

/**
 * Both files go to temp paths first and are then renamed into place. The document file
 * carries the vector file's checksum, so a crash between the two renames is caught on load.
 */
export async function writeCorpus(
  paths: CorpusPaths,
  collection: string,
  snapshot: CorpusSnapshot,
): Promise<void> {
  const vectorBytes = encodeVectors(snapshot.rows, snapshot.dimension);
  const documentsFile: DocumentsFile = {
    format_version: CORPUS_FORMAT_VERSION,
    collection,
    saved_at: new Date().toISOString(),
    count: snapshot.documents.length,
    dimension: snapshot.dimension,
    vectors_sha256: sha256(vectorBytes),
    documents: snapshot.documents,
  };
  const serialized = JSON.stringify(documentsFile);

  await fs.mkdir(path.dirname(paths.vectors), { recursive: true });
  const vectorsTemp = `${paths.vectors}.tmp`;
  const documentsTemp = `${paths.documents}.tmp`;
  await fs.writeFile(vectorsTemp, vectorBytes);
  await fs.writeFile(documentsTemp, serialized, "utf-8");

  await replaceFileSafely(vectorsTemp, paths.vectors, vectorBytes);
  await replaceFileSafely(documentsTemp, paths.documents, serialized);
}

/** Null when the collection was never persisted. */
export async function readCorpus(
  paths: CorpusPaths,
  collection: string,
): Promise<CorpusSnapshot | null> {
  const [vectorBytes, documentsRaw] = await Promise.all([
    readOptional(paths.vectors),
    readOptional(paths.documents),
  ]);

  if (!vectorBytes && !documentsRaw) {
    return null;
  }
  if (!vectorBytes || !documentsRaw) {
    const missing = vectorBytes ? paths.documents : paths.vectors;
    throw new CorpusIntegrityError(
      `Collection "${collection}" is incomplete: ${missing} is missing.`,
    );
  }

  const documentsFile = parseDocumentsFile(documentsRaw.toString("utf-8"), paths.documents);
  if (documentsFile.format_version !== CORPUS_FORMAT_VERSION) {
    throw new CorpusIntegrityError(
      `Unsupported document file version ${documentsFile.format_version}. Expected ${CORPUS_FORMAT_VERSION}.`,
    );
  }
  if (documentsFile.vectors_sha256 !== sha256(vectorBytes)) {
    throw new CorpusIntegrityError(
      `Vector file checksum does not match ${paths.documents}; the pair was not written together.`,
    );
  }

  const { dimension, rows } = decodeVectors(vectorBytes, paths.vectors);
  if (
    rows.length !== documentsFile.documents.length ||
    documentsFile.count !== documentsFile.documents.length
  ) {
    throw new CorpusIntegrityError(
      `Corpus misaligned: ${rows.length} vector row(s), ${documentsFile.documents.length} document(s), declared count ${documentsFile.count}.`,
    );
  }
  if (dimension !== documentsFile.dimension) {
    throw new CorpusIntegrityError(
      `Dimension mismatch: vector file has ${dimension}, document file declares ${documentsFile.dimension}.`,
    );
  }

  return { dimension, rows, documents: documentsFile.documents };
}

export async function removeCorpus(paths: CorpusPaths): Promise<void> {
  await Promise.all(
    [paths.vectors, paths.documents, `${paths.vectors}.tmp`, `${paths.documents}.tmp`].map(
      (filePath) => fs.rm(filePath, { force: true }),
    ),
  );
}

export async function statCorpus(paths: CorpusPaths): Promise<{ exists: boolean; sizeBytes: number }> {
  let exists = false;
  let sizeBytes = 0;
  for (const filePath of [paths.vectors, paths.documents]) {
    try {
      const stat = await fs.stat(filePath);
      exists = true;
      sizeBytes += stat.size;
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }
  }
  return { exists, sizeBytes };
}

function parseDocumentsFile(raw: string, filePath: string): DocumentsFile {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new CorpusIntegrityError(`Document file ${filePath} is not valid JSON.`, { cause: error });
  }

  const parsed = documentsFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new CorpusIntegrityError(
      `Document file ${filePath} has an invalid shape: ${parsed.error.issues[0]?.message ?? "unknown issue"}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}

async function readOptional(filePath: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (isFileMissing(error)) {
      return null;
    }
    throw error;
  }
}

function sha256(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string | Buffer,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Last fallback for Windows file-lock edge cases.
  await fs.writeFile(targetPath, content);
  await fs.rm(tempPath, { force: true });
}

function isReplaceableRenameError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) {
    return false;
  }
  const code = error.code;
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}
