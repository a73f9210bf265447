/** A remote model that turns texts into vectors, one per input, in input order. */
export interface EmbeddingBackend {
  readonly name: string;
  embedTexts(texts: string[]): Promise<number[][]>;
}

export interface EmbeddingProvider {
  embedQuery(text: string): Promise<number[]>;
  embedDocuments(texts: string[]): Promise<number[][]>;
  /** True once the backend answered the dimension sentinel. */
  isReady(): boolean;
  readonly dimension: number | null;
}
