import { describe, expect, it, vi } from "vitest";
import { Embedder } from "@/lib/embedding/embedder";
import type { EmbeddingModel } from "@/lib/embedding/types";
import { EntityExtractionError } from "@/lib/errors";
import { FileIndexStore } from "@/lib/index-store/file-index-store";
import { VocabularyEntityExtractor, type EntityExtractor } from "@/lib/pipeline/entities";
import { reprocessPendingEntities } from "@/lib/pipeline/ingest/reprocess-entities";
import { runIngestionPipeline, type IngestRunOptions } from "@/lib/pipeline/ingest/run-ingestion";
import type { Video } from "@/types/retrieval";
import { KeywordEmbeddingModel, MemoryVideoSource, makeEntry, makeTempDir } from "@/tests/helpers";

const VOCABULARY = ["faiss", "vector", "library", "search", "use", "sentence", "transformers", "embeddings", "tools"];

const extractor = new VocabularyEntityExtractor({
  entities: [
    { canonical: "faiss", aliases: [] },
    { canonical: "sentence transformers", aliases: [] },
  ],
});

const offlineExtractor: EntityExtractor = {
  mode: "vocabulary",
  extract: async () => {
    throw new EntityExtractionError("extractor offline");
  },
  canonicalize: (values) => values,
};

function toolsVideo(): Video {
  return {
    videoId: "v1",
    title: "Tools",
    publishedAt: "2024-05-01T00:00:00.000Z",
    durationSec: 20,
    captions: [
      { startTime: 0, endTime: 5, text: "intro to tools" },
      { startTime: 5, endTime: 12, text: "we use FAISS for search" },
      { startTime: 12, endTime: 20, text: "and sentence transformers for embeddings" },
    ],
  };
}

function silentVideo(): Video {
  return { videoId: "v2", title: "Silent", publishedAt: "2024-05-02T00:00:00.000Z", durationSec: 30, captions: [] };
}

async function setup(videos: Video[] = [toolsVideo(), silentVideo()]) {
  const embedder = new Embedder(new KeywordEmbeddingModel(VOCABULARY));
  const store = await FileIndexStore.open({
    directory: await makeTempDir("ingest"),
    modelId: embedder.modelId,
    dimension: embedder.dimension,
  });
  const source = new MemoryVideoSource(videos);
  const base: Omit<IngestRunOptions, "videoIds"> = {
    source,
    store,
    embedder,
    entityExtractor: extractor,
    chunking: { minSize: 5, maxSize: 15, sizeUnit: "seconds" },
  };

  return { embedder, store, source, base };
}

describe("runIngestionPipeline", () => {
  it("indexes a video and reports a missing transcript for another", async () => {
    const { store, base } = await setup();
    const logger = vi.fn();

    const result = await runIngestionPipeline({ ...base, videoIds: ["v1", "v2"], logger });

    expect(result.processedVideoIds).toEqual(["v1"]);
    expect(result.missingTranscript).toEqual([
      { videoId: "v2", kind: "MissingTranscript", reason: "No captions available for video v2" },
    ]);
    expect(result.failed).toEqual([]);
    expect(result.gaps).toEqual([]);
    expect(await store.lookupByFilter({ videoIds: ["v2"] })).toEqual([]);
    expect(await store.lookupByFilter({ videoIds: ["v1"] })).toEqual(["v1:0", "v1:1"]);
    expect((await store.getUnit("v1:0"))?.entities).toEqual(["faiss"]);
    expect((await store.getUnit("v1:1"))?.entities).toEqual(["sentence transformers"]);
    expect(logger).toHaveBeenCalledWith("[done] v1 units=2 gaps=0");
    expect(logger).toHaveBeenCalledWith("[missing] v2 No captions available for video v2 removed=0");
  });

  it("removes previously indexed units when a transcript disappears", async () => {
    const { store, embedder, base } = await setup();
    await store.replaceVideo({
      videoId: "v2",
      publishedAt: "2024-05-02T00:00:00.000Z",
      contentHash: "old",
      entries: [makeEntry("v2", 0, new Array<number>(embedder.dimension).fill(0))],
    });

    const result = await runIngestionPipeline({ ...base, videoIds: ["v2"] });

    expect(result.missingTranscript.map((failure) => failure.videoId)).toEqual(["v2"]);
    expect(store.getVideoState("v2")).toBeNull();
  });

  it("skips unchanged videos on re-ingest unless forced", async () => {
    const { store, base } = await setup();
    await runIngestionPipeline({ ...base, videoIds: ["v1"] });
    const before = store.getVideoState("v1");

    const again = await runIngestionPipeline({ ...base, videoIds: ["v1"] });
    const forced = await runIngestionPipeline({ ...base, videoIds: ["v1"], force: true });

    expect(again.unchangedVideoIds).toEqual(["v1"]);
    expect(again.processedVideoIds).toEqual([]);
    expect(forced.processedVideoIds).toEqual(["v1"]);
    expect(store.getVideoState("v1")).toEqual(before);
  });

  it("re-chunks a video whose stored units were edited outside ingestion", async () => {
    const { store, base } = await setup();
    await runIngestionPipeline({ ...base, videoIds: ["v1"] });
    const stored = await store.getUnit("v1:0");
    if (!stored) {
      throw new Error("expected v1:0 to be indexed");
    }

    await store.upsert([{ ...stored, text: "tampered" }]);
    const again = await runIngestionPipeline({ ...base, videoIds: ["v1"] });

    expect(again.processedVideoIds).toEqual(["v1"]);
    expect(again.unchangedVideoIds).toEqual([]);
    expect((await store.getUnit("v1:0"))?.text).toBe("intro to tools we use FAISS for search");
  });

  it("leaves the previous units in place when embedding fails", async () => {
    const { store, source, embedder, base } = await setup();
    await runIngestionPipeline({ ...base, videoIds: ["v1"] });

    const changed = toolsVideo();
    changed.captions[0] = { startTime: 0, endTime: 5, text: "a brand new intro" };
    source.videos.set("v1", changed);

    const failingModel: EmbeddingModel = {
      id: embedder.modelId,
      dimension: embedder.dimension,
      embedDocuments: async () => {
        throw new Error("quota exceeded");
      },
      embedQuery: async () => {
        throw new Error("quota exceeded");
      },
      isTransientError: () => false,
    };

    const result = await runIngestionPipeline({
      ...base,
      videoIds: ["v1"],
      embedder: new Embedder(failingModel),
    });

    expect(result.failed).toEqual([
      {
        videoId: "v1",
        kind: "EmbeddingFailure",
        reason: "Embedding batch offset=0 size=2 failed with keyword-test-9: quota exceeded",
      },
    ]);
    expect((await store.getUnit("v1:0"))?.text).toBe("intro to tools we use FAISS for search");
  });

  it("reports a source failure without stopping other videos", async () => {
    const { base } = await setup([toolsVideo()]);

    const result = await runIngestionPipeline({ ...base, videoIds: ["missing", "v1"], concurrency: 2 });

    expect(result.processedVideoIds).toEqual(["v1"]);
    expect(result.failed).toEqual([
      { videoId: "missing", kind: "SourceFailure", reason: "Video record not found: missing" },
    ]);
  });

  it("stores units with pending entities when extraction fails, and repairs them later", async () => {
    const { store, base } = await setup();
    const logger = vi.fn();

    const result = await runIngestionPipeline({
      ...base,
      videoIds: ["v1"],
      entityExtractor: offlineExtractor,
      logger,
    });

    expect(result.processedVideoIds).toEqual(["v1"]);
    expect(result.pendingEntityUnitIds).toEqual(["v1:0", "v1:1"]);
    expect(await store.getUnit("v1:0")).toMatchObject({ entities: [], entitiesPending: true });
    expect(logger).toHaveBeenCalledWith("[warn] v1:0 EntityExtractionFailure extractor offline");

    const repaired = await reprocessPendingEntities(store, extractor);

    expect(repaired).toEqual({ repairedUnitIds: ["v1:0", "v1:1"], stillPendingUnitIds: [] });
    expect(store.listPendingEntityUnits()).toEqual([]);
    expect(await store.getUnit("v1:0")).toMatchObject({ entities: ["faiss"], entitiesPending: false });
  });

  it("re-ingests a video whose entities are still pending", async () => {
    const { base } = await setup();
    await runIngestionPipeline({ ...base, videoIds: ["v1"], entityExtractor: offlineExtractor });

    const again = await runIngestionPipeline({ ...base, videoIds: ["v1"] });

    expect(again.processedVideoIds).toEqual(["v1"]);
    expect(again.pendingEntityUnitIds).toEqual([]);
  });
});
