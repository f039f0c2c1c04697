import OpenAI from "openai";
import type { EmbeddingModel } from "@/lib/embedding/types";

export type OpenAIEmbeddingModelOptions = {
  apiKey: string;
  model: string;
  dimension: number;
  client?: OpenAI;
};

const NON_TRANSIENT_STATUSES = new Set([400, 401, 403, 404, 422]);

export class OpenAIEmbeddingModel implements EmbeddingModel {
  readonly id: string;
  readonly dimension: number;
  private readonly model: string;
  private readonly client: OpenAI;

  constructor(options: OpenAIEmbeddingModelOptions) {
    this.model = options.model;
    this.dimension = options.dimension;
    this.id = `openai:${options.model}:${options.dimension}`;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const response = await this.client.embeddings.create({
      model: this.model,
      input: texts,
      // Only the text-embedding-3 family accepts a reduced output dimension.
      ...(this.model.startsWith("text-embedding-3") ? { dimensions: this.dimension } : {}),
    });

    return [...response.data].sort((left, right) => left.index - right.index).map((row) => row.embedding);
  }

  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.embedDocuments([text]);

    if (!vector) {
      throw new Error("Embedding response contained no vector");
    }

    return vector;
  }

  isTransientError(error: unknown): boolean {
    if (error instanceof OpenAI.APIError) {
      return error.status === undefined || !NON_TRANSIENT_STATUSES.has(error.status);
    }

    return true;
  }
}
