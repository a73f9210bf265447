import { z } from "zod";
import { mapWithConcurrency } from "../../utils/concurrency.js";
import { EmbeddingBackend } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  embeddingModel: string;
  fetchImpl?: typeof fetch;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaEmbeddingBackend implements EmbeddingBackend {
  readonly name = "ollama";

  constructor(private readonly options: OllamaClientOptions) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    return mapWithConcurrency(texts, EMBEDDING_CONCURRENCY, (text) => this.embedOne(text));
  }

  private async embedOne(text: string): Promise<number[]> {
    const fetchImpl = this.options.fetchImpl ?? fetch;
    const response = await fetchImpl(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: text,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingsResponseSchema.parse(await response.json());
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }
}
