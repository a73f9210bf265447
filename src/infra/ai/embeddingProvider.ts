import {
  EmbeddingCallError,
  EmbeddingInitError,
  describeError,
} from "../../domain/errors.js";
import { createLogger } from "../../utils/logger.js";
import { EmbeddingBackend, EmbeddingProvider } from "./types.js";

const log = createLogger("embedding");

const DIMENSION_SENTINEL_TEXT = "dimension sentinel";

export type EmbeddingBackendFactory = () => EmbeddingBackend | Promise<EmbeddingBackend>;

export interface LazyEmbeddingProviderOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  batchSize?: number;
  /** How long a failed initialization is answered from memory before the next try. */
  retryCooldownMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

interface InitFailure {
  error: EmbeddingInitError;
  retryAt: number;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Connects to the backend on first use. Initialization makes up to `maxAttempts` tries
 * with exponential backoff and measures the vector dimension once. A failed initialization
 * is rethrown without touching the backend until `retryCooldownMs` has passed.
 */
export class LazyEmbeddingProvider implements EmbeddingProvider {
  private backend: EmbeddingBackend | null = null;

  private pending: Promise<EmbeddingBackend> | null = null;

  private measuredDimension: number | null = null;

  private failure: InitFailure | null = null;

  private readonly maxAttempts: number;

  private readonly baseDelayMs: number;

  private readonly batchSize: number;

  private readonly retryCooldownMs: number;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly now: () => number;

  constructor(
    private readonly factory: EmbeddingBackendFactory,
    options: LazyEmbeddingProviderOptions = {},
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 3);
    this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 1000);
    this.batchSize = Math.max(1, options.batchSize ?? 16);
    this.retryCooldownMs = Math.max(0, options.retryCooldownMs ?? 30_000);
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
  }

  get dimension(): number | null {
    return this.measuredDimension;
  }

  isReady(): boolean {
    return this.backend !== null;
  }

  async embedQuery(text: string): Promise<number[]> {
    const backend = await this.ensureReady();
    const [vector] = await this.callBackend(backend, [text]);
    return vector;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const backend = await this.ensureReady();

    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      vectors.push(...(await this.callBackend(backend, batch)));
    }
    return vectors;
  }

  private ensureReady(): Promise<EmbeddingBackend> {
    if (this.backend) {
      return Promise.resolve(this.backend);
    }
    if (this.failure && this.now() < this.failure.retryAt) {
      return Promise.reject(this.failure.error);
    }
    if (!this.pending) {
      this.pending = this.connect().then(
        (backend) => {
          this.backend = backend;
          this.failure = null;
          this.pending = null;
          return backend;
        },
        (error: unknown) => {
          if (error instanceof EmbeddingInitError) {
            this.failure = { error, retryAt: this.now() + this.retryCooldownMs };
          }
          this.pending = null;
          throw error;
        },
      );
    }
    return this.pending;
  }

  private async connect(): Promise<EmbeddingBackend> {
    let lastError: unknown = null;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        const backend = await this.factory();
        const [sentinel] = await backend.embedTexts([DIMENSION_SENTINEL_TEXT]);
        if (!sentinel || sentinel.length === 0) {
          throw new Error("Dimension sentinel returned an empty vector.");
        }
        this.measuredDimension = sentinel.length;
        log.info({ backend: backend.name, dimension: sentinel.length, attempt }, "embedding backend ready");
        return backend;
      } catch (error) {
        lastError = error;
        log.warn(
          { err: error, attempt, maxAttempts: this.maxAttempts },
          "embedding backend initialization failed",
        );
        if (attempt < this.maxAttempts) {
          await this.sleep(this.baseDelayMs * 2 ** (attempt - 1));
        }
      }
    }

    throw new EmbeddingInitError(this.maxAttempts, { cause: lastError });
  }

  private async callBackend(backend: EmbeddingBackend, texts: string[]): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await backend.embedTexts(texts);
    } catch (error) {
      throw new EmbeddingCallError(
        `Embedding call failed for ${texts.length} text(s): ${describeError(error)}`,
        { cause: error },
      );
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingCallError(
        `Embedding backend returned ${vectors.length} vector(s) for ${texts.length} text(s).`,
      );
    }
    for (const vector of vectors) {
      if (this.measuredDimension !== null && vector.length !== this.measuredDimension) {
        throw new EmbeddingCallError(
          `Embedding dimension changed from ${this.measuredDimension} to ${vector.length}.`,
        );
      }
    }
    return vectors;
  }
}
