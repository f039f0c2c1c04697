import { createHash } from "node:crypto";
import pLimit from "p-limit";
import type { Embedder } from "@/lib/embedding/embedder";
import { MissingTranscriptError, describeFailure, type FailureKind } from "@/lib/errors";
import type { IndexStore } from "@/lib/index-store/types";
import { buildSemanticUnits, resolveChunkingOptions, type ChunkingOptions } from "@/lib/pipeline/chunker";
import type { EntityExtractor } from "@/lib/pipeline/entities";
import { normalizeCaptions } from "@/lib/pipeline/transcript/normalize-transcript";
import type { TranscriptGap } from "@/lib/pipeline/types";
import type { VideoSource } from "@/lib/pipeline/video-source";
import type { IndexEntry } from "@/types/retrieval";

export type IngestRunOptions = {
  videoIds: string[];
  source: VideoSource;
  store: IndexStore;
  embedder: Embedder;
  entityExtractor: EntityExtractor;
  chunking?: ChunkingOptions;
  concurrency?: number;
  /** Re-embed even when the chunked content matches what is indexed. */
  force?: boolean;
  logger?: (message: string) => void;
};

export type IngestFailure = {
  videoId: string;
  kind: FailureKind;
  reason: string;
};

export type IngestRunResult = {
  processedVideoIds: string[];
  unchangedVideoIds: string[];
  missingTranscript: IngestFailure[];
  failed: IngestFailure[];
  gaps: Array<TranscriptGap & { videoId: string }>;
  pendingEntityUnitIds: string[];
};

type VideoOutcome = {
  status: "processed" | "unchanged";
  unitCount: number;
  gaps: TranscriptGap[];
  pendingEntityUnitIds: string[];
};

export async function runIngestionPipeline(options: IngestRunOptions): Promise<IngestRunResult> {
  const logger = options.logger ?? (() => undefined);
  const limit = pLimit(Math.max(1, options.concurrency ?? 2));
  const videoIds = Array.from(new Set(options.videoIds.map((value) => value.trim()).filter(Boolean)));
  const order = new Map(videoIds.map((videoId, index) => [videoId, index]));

  const result: IngestRunResult = {
    processedVideoIds: [],
    unchangedVideoIds: [],
    missingTranscript: [],
    failed: [],
    gaps: [],
    pendingEntityUnitIds: [],
  };

  await Promise.all(
    videoIds.map((videoId) =>
      limit(async () => {
        logger(`[start] ${videoId}`);

        try {
          const outcome = await ingestVideo(videoId, options, logger);

          if (outcome.status === "unchanged") {
            result.unchangedVideoIds.push(videoId);
            logger(`[skip] ${videoId} unchanged units=${outcome.unitCount}`);
            return;
          }

          result.processedVideoIds.push(videoId);
          result.gaps.push(...outcome.gaps.map((gap) => ({ videoId, ...gap })));
          result.pendingEntityUnitIds.push(...outcome.pendingEntityUnitIds);
          logger(`[done] ${videoId} units=${outcome.unitCount} gaps=${outcome.gaps.length}`);
        } catch (error) {
          if (error instanceof MissingTranscriptError) {
            await recordMissingTranscript(videoId, error, options.store, result, logger);
            return;
          }

          const failure = describeFailure(error);
          result.failed.push({ videoId, ...failure });
          logger(`[error] ${videoId} ${failure.kind} ${failure.reason}`);
        }
      }),
    ),
  );

  const byInputOrder = (left: string, right: string) => (order.get(left) ?? 0) - (order.get(right) ?? 0);
  result.processedVideoIds.sort(byInputOrder);
  result.unchangedVideoIds.sort(byInputOrder);
  result.missingTranscript.sort((left, right) => byInputOrder(left.videoId, right.videoId));
  result.failed.sort((left, right) => byInputOrder(left.videoId, right.videoId));
  result.gaps.sort((left, right) => byInputOrder(left.videoId, right.videoId) || left.startTime - right.startTime);

  return result;
}

async function ingestVideo(
  videoId: string,
  options: IngestRunOptions,
  logger: (message: string) => void,
): Promise<VideoOutcome> {
  const video = await options.source.getVideo(videoId);
  const segments = normalizeCaptions(video.videoId, video.captions);
  const chunking = resolveChunkingOptions(options.chunking);
  const { units, gaps } = buildSemanticUnits(video.videoId, segments, chunking);

  for (const gap of gaps) {
    logger(`[warn] ${videoId} caption gap ${gap.startTime.toFixed(1)}s-${gap.endTime.toFixed(1)}s`);
  }

  const contentHash = createHash("sha256")
    .update(JSON.stringify({ chunking, publishedAt: video.publishedAt, units }))
    .digest("hex");
  const current = options.store.getVideoState(videoId);

  if (!options.force && current && current.contentHash === contentHash && current.pendingEntityCount === 0) {
    return { status: "unchanged", unitCount: current.unitCount, gaps, pendingEntityUnitIds: [] };
  }

  const vectors = await options.embedder.embedTexts(units.map((unit) => unit.text));
  const pendingEntityUnitIds: string[] = [];

  const entries: IndexEntry[] = await Promise.all(
    units.map(async (unit, index) => {
      let entities: string[] = [];
      let entitiesPending = false;

      try {
        entities = await options.entityExtractor.extract(unit.text);
      } catch (error) {
        entitiesPending = true;
        pendingEntityUnitIds.push(unit.unitId);
        const message = error instanceof Error ? error.message : "unknown error";
        logger(`[warn] ${unit.unitId} EntityExtractionFailure ${message}`);
      }

      return {
        ...unit,
        publishedAt: video.publishedAt,
        entities,
        entitiesPending,
        vector: vectors[index],
      };
    }),
  );

  await options.store.replaceVideo({
    videoId,
    publishedAt: video.publishedAt,
    contentHash,
    entries,
  });

  return { status: "processed", unitCount: entries.length, gaps, pendingEntityUnitIds: pendingEntityUnitIds.sort() };
}

async function recordMissingTranscript(
  videoId: string,
  error: MissingTranscriptError,
  store: IndexStore,
  result: IngestRunResult,
  logger: (message: string) => void,
): Promise<void> {
  try {
    const removed = await store.deleteVideo(videoId);
    result.missingTranscript.push({ videoId, kind: error.kind, reason: error.message });
    logger(`[missing] ${videoId} ${error.message} removed=${removed}`);
  } catch (cleanupError) {
    const failure = describeFailure(cleanupError);
    result.failed.push({ videoId, ...failure });
    logger(`[error] ${videoId} ${failure.kind} ${failure.reason}`);
  }
}
