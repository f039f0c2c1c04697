import type { EmbeddingModel } from "@/lib/embedding/types";
import { DEFAULT_ENGLISH_STOPWORDS, normalizeToken, tokenizeWords } from "@/lib/pipeline/tokens";

export type HashingEmbeddingModelOptions = {
  dimension?: number;
  stopwords?: string[];
};

/**
 * Offline embedding model: signed feature hashing of word tokens. Queries and
 * documents share one transform, so cosine similarity measures term overlap.
 */
export class HashingEmbeddingModel implements EmbeddingModel {
  readonly id: string;
  readonly dimension: number;
  private readonly stopwords: Set<string>;

  constructor(options: HashingEmbeddingModelOptions = {}) {
    this.dimension = options.dimension ?? 256;

    if (!Number.isInteger(this.dimension) || this.dimension <= 0) {
      throw new Error(`Invalid hashing dimension: ${this.dimension}`);
    }

    this.id = `hashing-v1-${this.dimension}`;
    this.stopwords = new Set((options.stopwords ?? DEFAULT_ENGLISH_STOPWORDS).map(normalizeToken));
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);

    for (const word of tokenizeWords(text)) {
      const token = normalizeToken(word);

      if (!token || this.stopwords.has(token)) {
        continue;
      }

      const hash = fnv1a(token);
      const sign = (hash >>> 16) & 1 ? -1 : 1;
      vector[hash % this.dimension] += sign;
    }

    return vector;
  }
}

function fnv1a(value: string): number {
  let hash = 0x811c9dc5;

  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }

  return hash >>> 0;
}
