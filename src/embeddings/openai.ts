import OpenAI from "openai";
import type { EmbeddingProvider } from "./base.js";

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private client: OpenAI;

  constructor(apiKey: string, model: string = DEFAULT_EMBEDDING_MODEL, baseUrl?: string) {
    this.client = new OpenAI({ apiKey, baseURL: baseUrl });
    this.model = model;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }
    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
    });
    if (response.data.length !== texts.length) {
      throw new Error(
        `Malformed embedding response: expected ${texts.length} vectors, got ${response.data.length}`
      );
    }
    // The API tags each vector with the position of its input.
    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
