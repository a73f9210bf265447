export type RetrievalErrorCode =
  | "EXTRACTION_FAILED"
  | "UNSUPPORTED_FORMAT"
  | "EMBEDDING_INIT_FAILED"
  | "EMBEDDING_CALL_FAILED"
  | "VECTOR_STORE_UNAVAILABLE"
  | "CORPUS_INTEGRITY"
  | "QUERY_PROCESSING_ERROR";

export class RetrievalError extends Error {
  constructor(
    readonly code: RetrievalErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Unreadable or corrupt file. Scoped to one file; a batch keeps going. */
export class ExtractionError extends RetrievalError {
  constructor(
    readonly filePath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("EXTRACTION_FAILED", message, options);
  }
}

export class UnsupportedFormatError extends RetrievalError {
  constructor(
    readonly filePath: string,
    readonly extension: string,
    allowed: string[],
  ) {
    super(
      "UNSUPPORTED_FORMAT",
      `Unsupported extension: ${extension || "(none)"}. Allowed: ${allowed.join(", ")}`,
    );
  }
}

export class EmbeddingInitError extends RetrievalError {
  constructor(
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super(
      "EMBEDDING_INIT_FAILED",
      `Embedding backend unavailable after ${attempts} attempt(s): ${describeError(options?.cause)}`,
      options,
    );
  }
}

export class EmbeddingCallError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_CALL_FAILED", message, options);
  }
}

export class VectorStoreUnavailableError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("VECTOR_STORE_UNAVAILABLE", message, options);
  }
}

/** Persisted embedding matrix and document list disagree. */
export class CorpusIntegrityError extends VectorStoreUnavailableError {
  override readonly code = "CORPUS_INTEGRITY" as const;
}

export class QueryProcessingError extends RetrievalError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("QUERY_PROCESSING_ERROR", message, options);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return "unknown error";
}

export function isFileMissing(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }
  return "code" in error && error.code === "ENOENT";
}
