import pLimit from "p-limit";
import { EmbeddingFailureError } from "@/lib/errors";
import type { EmbeddingModel } from "@/lib/embedding/types";
import { isFiniteVector, l2Normalize } from "@/lib/embedding/vector";
import { retryWithBackoff } from "@/lib/utils/retry";

export type EmbedderOptions = {
  batchSize?: number;
  concurrency?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  logger?: (message: string) => void;
};

/**
 * Batches texts through an EmbeddingModel under a concurrency cap, retries
 * transient model failures and returns unit-length vectors. Output for a call
 * is built in a fresh array, so a failed call leaves no partial vectors behind.
 */
export class Embedder {
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;
  private readonly logger: (message: string) => void;

  constructor(
    readonly model: EmbeddingModel,
    options: EmbedderOptions = {},
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? 32);
    this.concurrency = Math.max(1, options.concurrency ?? 2);
    this.maxRetries = Math.max(0, options.maxRetries ?? 4);
    this.retryBaseMs = Math.max(0, options.retryBaseMs ?? 250);
    this.logger = options.logger ?? (() => undefined);
  }

  get modelId(): string {
    return this.model.id;
  }

  get dimension(): number {
    return this.model.dimension;
  }

  async embedTexts(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const limit = pLimit(this.concurrency);
    const results = new Array<number[]>(texts.length);
    const batches: Array<{ offset: number; items: string[] }> = [];

    for (let offset = 0; offset < texts.length; offset += this.batchSize) {
      batches.push({ offset, items: texts.slice(offset, offset + this.batchSize) });
    }

    await Promise.all(
      batches.map((batch) =>
        limit(async () => {
          const vectors = await this.callModel(
            () => this.model.embedDocuments(batch.items),
            `batch offset=${batch.offset} size=${batch.items.length}`,
            signal,
          );

          if (vectors.length !== batch.items.length) {
            throw new EmbeddingFailureError(
              `Embedding model returned ${vectors.length} vectors for ${batch.items.length} texts`,
            );
          }

          vectors.forEach((vector, index) => {
            results[batch.offset + index] = this.finalize(vector);
          });
        }),
      ),
    );

    return results;
  }

  async embedQuery(text: string, signal?: AbortSignal): Promise<number[]> {
    const vector = await this.callModel(() => this.model.embedQuery(text), "query", signal);
    return this.finalize(vector);
  }

  private async callModel<T>(operation: () => Promise<T>, label: string, signal?: AbortSignal): Promise<T> {
    try {
      return await retryWithBackoff(operation, {
        maxRetries: this.maxRetries,
        baseDelayMs: this.retryBaseMs,
        signal,
        shouldRetry: (error) => this.model.isTransientError?.(error) ?? true,
        onRetry: (error, attempt, delayMs) => {
          const message = error instanceof Error ? error.message : "unknown error";
          this.logger(`[retry] embedding ${label} attempt=${attempt} delay=${delayMs}ms ${message}`);
        },
      });
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }

      const message = error instanceof Error ? error.message : "unknown error";
      throw new EmbeddingFailureError(`Embedding ${label} failed with ${this.model.id}: ${message}`, {
        cause: error,
      });
    }
  }

  private finalize(vector: number[]): number[] {
    if (vector.length !== this.model.dimension) {
      throw new EmbeddingFailureError(
        `Unexpected embedding size; expected ${this.model.dimension}, got ${vector.length}`,
      );
    }

    if (!isFiniteVector(vector)) {
      throw new EmbeddingFailureError("Embedding contains non-finite values");
    }

    return l2Normalize(vector);
  }
}
