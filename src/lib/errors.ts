export type FailureKind =
  | "MissingTranscript"
  | "EmbeddingFailure"
  | "EntityExtractionFailure"
  | "IndexCorruption"
  | "IndexModelMismatch"
  | "NoRelevantContent"
  | "SourceFailure";

export class MissingTranscriptError extends Error {
  readonly kind = "MissingTranscript";

  constructor(
    readonly videoId: string,
    message = `No captions available for video ${videoId}`,
  ) {
    super(message);
    this.name = "MissingTranscriptError";
  }
}

export class EmbeddingFailureError extends Error {
  readonly kind = "EmbeddingFailure";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EmbeddingFailureError";
  }
}

export class EntityExtractionError extends Error {
  readonly kind = "EntityExtractionFailure";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "EntityExtractionError";
  }
}

export class IndexCorruptionError extends Error {
  readonly kind = "IndexCorruption";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IndexCorruptionError";
  }
}

export class IndexModelMismatchError extends Error {
  readonly kind = "IndexModelMismatch";

  constructor(
    readonly stored: { modelId: string; dimension: number },
    readonly expected: { modelId: string; dimension: number },
  ) {
    super(
      `Index was built with ${stored.modelId} (${stored.dimension}d) but ${expected.modelId} (${expected.dimension}d) is configured; run a full rebuild`,
    );
    this.name = "IndexModelMismatchError";
  }
}

export class NoRelevantContentError extends Error {
  readonly kind = "NoRelevantContent";

  constructor(
    readonly question: string,
    message = "No indexed content is relevant enough to answer this question",
  ) {
    super(message);
    this.name = "NoRelevantContentError";
  }
}

export function describeFailure(error: unknown): { kind: FailureKind; reason: string } {
  if (
    error instanceof MissingTranscriptError ||
    error instanceof EmbeddingFailureError ||
    error instanceof EntityExtractionError ||
    error instanceof IndexCorruptionError ||
    error instanceof IndexModelMismatchError ||
    error instanceof NoRelevantContentError
  ) {
    return { kind: error.kind, reason: error.message };
  }

  return {
    kind: "SourceFailure",
    reason: error instanceof Error ? error.message : "Unknown ingest error",
  };
}
