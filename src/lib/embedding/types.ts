export interface EmbeddingModel {
  /** Identifier persisted with the index; a change forces a full rebuild. */
  readonly id: string;
  readonly dimension: number;
  embedDocuments(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
  isTransientError?(error: unknown): boolean;
}
