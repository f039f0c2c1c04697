import { createHash } from "node:crypto";
import { mkdir, readFile, rename, rm, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { dotProduct } from "@/lib/embedding/vector";
import { IndexCorruptionError, IndexModelMismatchError } from "@/lib/errors";
import { compileFilter, hasActiveFilters } from "@/lib/index-store/filters";
import type {
  IndexStats,
  IndexStore,
  StoreHealth,
  VideoCommit,
  VideoIndexState,
} from "@/lib/index-store/types";
import type { IndexEntry, SearchFilters, SearchHit, SearchResponse } from "@/types/retrieval";

export const INDEX_FORMAT_VERSION = 1;
const MANIFEST_FILE = "manifest.json";
const SEGMENT_DIR = "videos";

const manifestVideoSchema = z.object({
  file: z.string().min(1),
  checksum: z.string().min(1),
  unitCount: z.number().int().nonnegative(),
  publishedAt: z.string(),
  contentHash: z.string(),
});

const manifestSchema = z.object({
  formatVersion: z.literal(INDEX_FORMAT_VERSION),
  modelId: z.string().min(1),
  dimension: z.number().int().positive(),
  updatedAt: z.string(),
  videos: z.record(manifestVideoSchema),
});

const entrySchema = z.object({
  unitId: z.string().min(1),
  videoId: z.string().min(1),
  sequenceIndex: z.number().int().nonnegative(),
  startTime: z.number(),
  endTime: z.number(),
  text: z.string(),
  tokenCount: z.number().int().nonnegative(),
  captionSpans: z.array(
    z.object({
      startTime: z.number(),
      endTime: z.number(),
      charStart: z.number().int().nonnegative(),
      charEnd: z.number().int().nonnegative(),
    }),
  ),
  publishedAt: z.string(),
  entities: z.array(z.string()),
  entitiesPending: z.boolean(),
  vector: z.array(z.number()),
});

const segmentSchema = z.object({
  videoId: z.string().min(1),
  publishedAt: z.string(),
  contentHash: z.string(),
  entries: z.array(entrySchema),
});

type Manifest = z.infer<typeof manifestSchema>;

type VideoSegment = {
  videoId: string;
  publishedAt: string;
  contentHash: string;
  file: string;
  checksum: string;
  entries: readonly IndexEntry[];
};

type Snapshot = {
  videos: ReadonlyMap<string, VideoSegment>;
  units: ReadonlyMap<string, IndexEntry>;
  entries: readonly IndexEntry[];
};

export type FileIndexStoreOptions = {
  directory: string;
  modelId: string;
  dimension: number;
  /** Filtered universes up to this share of the index are scored directly. */
  prefilterRatio?: number;
  /** Initial candidate multiplier for post-filtered searches. */
  oversampleFactor?: number;
  logger?: (message: string) => void;
};

const EMPTY_SNAPSHOT: Snapshot = { videos: new Map(), units: new Map(), entries: [] };

/**
 * On-disk layout: `manifest.json` names the embedding model, the vector
 * dimension and one checksummed segment file per video under `videos/`.
 * A commit writes the new segment, then swaps the manifest by rename, then
 * removes the superseded segment; adding a video never rewrites the others.
 */
export class FileIndexStore implements IndexStore {
  readonly modelId: string;
  readonly dimension: number;

  private snapshot: Snapshot = EMPTY_SNAPSHOT;
  private state: StoreHealth = { status: "ready" };
  private knownVideoIds: string[] = [];
  private writeChain: Promise<void> = Promise.resolve();
  private tempCounter = 0;
  private readonly prefilterRatio: number;
  private readonly oversampleFactor: number;
  private readonly logger: (message: string) => void;

  private constructor(private readonly options: FileIndexStoreOptions) {
    this.modelId = options.modelId;
    this.dimension = options.dimension;
    this.prefilterRatio = options.prefilterRatio ?? 0.1;
    this.oversampleFactor = Math.max(1, options.oversampleFactor ?? 4);
    this.logger = options.logger ?? (() => undefined);
  }

  static async open(options: FileIndexStoreOptions): Promise<FileIndexStore> {
    const store = new FileIndexStore(options);
    await store.load();
    return store;
  }

  health(): StoreHealth {
    return this.state;
  }

  async upsert(entries: IndexEntry[]): Promise<void> {
    this.assertReady();
    const byVideo = groupByVideo(entries);

    await this.enqueue(async () => {
      for (const [videoId, incoming] of byVideo) {
        const current = this.snapshot.videos.get(videoId);
        const merged = new Map<string, IndexEntry>();

        for (const entry of current?.entries ?? []) {
          merged.set(entry.unitId, entry);
        }

        const contentChanged = incoming.some((entry) => changesContent(merged.get(entry.unitId), entry));

        for (const entry of incoming) {
          merged.set(entry.unitId, entry);
        }

        // Entity-only repairs keep the hash; anything else no longer matches the chunker's output.
        await this.commitVideo({
          videoId,
          publishedAt: incoming[incoming.length - 1].publishedAt,
          contentHash: current && !contentChanged ? current.contentHash : "",
          entries: Array.from(merged.values()),
        });
      }
    });
  }

  async delete(unitIds: string[]): Promise<number> {
    this.assertReady();
    const targets = new Set(unitIds);

    return this.enqueue(async () => {
      let removed = 0;
      const affectedVideos = new Set<string>();

      for (const unitId of targets) {
        const entry = this.snapshot.units.get(unitId);
        if (entry) {
          affectedVideos.add(entry.videoId);
        }
      }

      for (const videoId of affectedVideos) {
        const current = this.snapshot.videos.get(videoId);
        if (!current) {
          continue;
        }

        const remaining = current.entries.filter((entry) => !targets.has(entry.unitId));
        removed += current.entries.length - remaining.length;

        if (remaining.length === 0) {
          await this.removeVideoSegment(videoId);
          continue;
        }

        // Content no longer matches what the chunker produced, so clear the hash.
        await this.commitVideo({
          videoId,
          publishedAt: current.publishedAt,
          contentHash: "",
          entries: remaining,
        });
      }

      return removed;
    });
  }

  async search(vector: number[], topK: number, filters?: SearchFilters): Promise<SearchResponse> {
    this.assertReady();

    if (vector.length !== this.dimension) {
      throw new Error(`Query vector has ${vector.length} dimensions; index expects ${this.dimension}`);
    }

    const limit = Math.max(0, Math.floor(topK));
    const entries = this.snapshot.entries;

    if (!hasActiveFilters(filters)) {
      return {
        hits: rankEntries(entries, vector).slice(0, limit).map(toHit),
        partial: entries.length < limit,
        strategy: "exhaustive",
        universeSize: entries.length,
      };
    }

    const matches = compileFilter(filters);
    const universe = entries.filter(matches);
    const partial = universe.length < limit;

    if (universe.length <= entries.length * this.prefilterRatio) {
      return {
        hits: rankEntries(universe, vector).slice(0, limit).map(toHit),
        partial,
        strategy: "prefilter",
        universeSize: universe.length,
      };
    }

    const ranked = rankEntries(entries, vector);
    let window = limit * this.oversampleFactor;
    let hits: ScoredEntry[] = [];

    // Widen the candidate window until the filter yields topK or the index is exhausted.
    for (;;) {
      hits = ranked.slice(0, window).filter((row) => matches(row.entry));

      if (hits.length >= limit || window >= ranked.length) {
        break;
      }

      window = Math.max(window * 2, 1);
    }

    return {
      hits: hits.slice(0, limit).map(toHit),
      partial,
      strategy: "postfilter",
      universeSize: universe.length,
    };
  }

  async lookupByFilter(filters: SearchFilters): Promise<string[]> {
    this.assertReady();
    const matches = compileFilter(filters);
    return this.snapshot.entries.filter(matches).map((entry) => entry.unitId);
  }

  async replaceVideo(commit: VideoCommit): Promise<void> {
    this.assertReady();

    await this.enqueue(async () => {
      if (commit.entries.length === 0) {
        await this.removeVideoSegment(commit.videoId);
        return;
      }

      await this.commitVideo(commit);
    });
  }

  async deleteVideo(videoId: string): Promise<number> {
    this.assertReady();

    return this.enqueue(async () => {
      const current = this.snapshot.videos.get(videoId);
      if (!current) {
        return 0;
      }

      await this.removeVideoSegment(videoId);
      return current.entries.length;
    });
  }

  async getUnit(unitId: string): Promise<IndexEntry | null> {
    this.assertReady();
    return this.snapshot.units.get(unitId) ?? null;
  }

  async getNeighbors(unitId: string, radius = 1): Promise<IndexEntry[]> {
    this.assertReady();
    const snapshot = this.snapshot;
    const entry = snapshot.units.get(unitId);

    if (!entry) {
      return [];
    }

    const segment = snapshot.videos.get(entry.videoId);

    return (segment?.entries ?? []).filter(
      (candidate) =>
        candidate.unitId !== entry.unitId &&
        Math.abs(candidate.sequenceIndex - entry.sequenceIndex) <= radius,
    );
  }

  getVideoState(videoId: string): VideoIndexState | null {
    const segment = this.snapshot.videos.get(videoId);
    return segment ? toVideoState(segment) : null;
  }

  listVideoIds(): string[] {
    if (this.state.status !== "ready") {
      return [...this.knownVideoIds];
    }

    return Array.from(this.snapshot.videos.keys()).sort();
  }

  listPendingEntityUnits(): IndexEntry[] {
    return this.snapshot.entries.filter((entry) => entry.entitiesPending);
  }

  stats(): IndexStats {
    const videos = Array.from(this.snapshot.videos.values()).map(toVideoState);

    return {
      modelId: this.modelId,
      dimension: this.dimension,
      videoCount: videos.length,
      unitCount: this.snapshot.entries.length,
      videos,
    };
  }

  async rebuild(): Promise<void> {
    await this.enqueue(async () => {
      await rm(join(this.options.directory, SEGMENT_DIR), { recursive: true, force: true });
      await mkdir(join(this.options.directory, SEGMENT_DIR), { recursive: true });
      this.snapshot = EMPTY_SNAPSHOT;
      await this.writeManifest(EMPTY_SNAPSHOT);
      this.state = { status: "ready" };
      this.logger(`[index] rebuilt empty index for ${this.modelId} (${this.dimension}d)`);
    });
  }

  private assertReady(): void {
    const state = this.state;

    if (state.status === "corrupt") {
      throw new IndexCorruptionError(`Index store failed its integrity check: ${state.reason}`);
    }

    if (state.status === "model-mismatch") {
      throw new IndexModelMismatchError(state.stored, { modelId: this.modelId, dimension: this.dimension });
    }
  }

  private enqueue<T>(operation: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(operation);
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async load(): Promise<void> {
    const directory = this.options.directory;
    await mkdir(join(directory, SEGMENT_DIR), { recursive: true });

    let raw: string;
    try {
      raw = await readFile(join(directory, MANIFEST_FILE), "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        await this.writeManifest(EMPTY_SNAPSHOT);
        return;
      }

      throw error;
    }

    let manifest: Manifest;
    try {
      manifest = manifestSchema.parse(JSON.parse(raw));
    } catch (error) {
      this.markCorrupt(`manifest is unreadable (${error instanceof Error ? error.message : "invalid"})`);
      return;
    }

    this.knownVideoIds = Object.keys(manifest.videos).sort();

    if (manifest.modelId !== this.modelId || manifest.dimension !== this.dimension) {
      this.state = {
        status: "model-mismatch",
        stored: { modelId: manifest.modelId, dimension: manifest.dimension },
      };
      this.logger(`[index] model changed from ${manifest.modelId} to ${this.modelId}; rebuild required`);
      return;
    }

    const videos = new Map<string, VideoSegment>();

    for (const [videoId, meta] of Object.entries(manifest.videos)) {
      const problem = await this.loadSegment(videoId, meta, videos);

      if (problem) {
        this.markCorrupt(problem);
        return;
      }
    }

    this.snapshot = buildSnapshot(videos);
  }

  private async loadSegment(
    videoId: string,
    meta: z.infer<typeof manifestVideoSchema>,
    videos: Map<string, VideoSegment>,
  ): Promise<string | null> {
    let body: string;
    try {
      body = await readFile(join(this.options.directory, meta.file), "utf8");
    } catch (error) {
      if (isNotFound(error)) {
        return `segment ${meta.file} for video ${videoId} is missing`;
      }

      throw error;
    }

    if (sha256(body) !== meta.checksum) {
      return `segment ${meta.file} for video ${videoId} fails its checksum`;
    }

    const parsed = segmentSchema.safeParse(safeJsonParse(body));
    if (!parsed.success) {
      return `segment ${meta.file} for video ${videoId} is malformed`;
    }

    const segment = parsed.data;
    if (segment.videoId !== videoId || segment.entries.length !== meta.unitCount) {
      return `segment ${meta.file} does not match the manifest record for ${videoId}`;
    }

    if (segment.entries.some((entry) => entry.vector.length !== this.dimension || entry.videoId !== videoId)) {
      return `segment ${meta.file} holds entries of the wrong dimension or video`;
    }

    videos.set(videoId, {
      videoId,
      publishedAt: segment.publishedAt,
      contentHash: segment.contentHash,
      file: meta.file,
      checksum: meta.checksum,
      entries: sortBySequence(segment.entries),
    });

    return null;
  }

  private markCorrupt(reason: string): void {
    this.state = { status: "corrupt", reason };
    this.snapshot = EMPTY_SNAPSHOT;
    this.logger(`[index] integrity check failed: ${reason}`);
  }

  private async commitVideo(commit: VideoCommit): Promise<void> {
    for (const entry of commit.entries) {
      if (entry.videoId !== commit.videoId) {
        throw new Error(`Entry ${entry.unitId} belongs to ${entry.videoId}, not ${commit.videoId}`);
      }

      if (entry.vector.length !== this.dimension) {
        throw new Error(`Entry ${entry.unitId} has ${entry.vector.length} dimensions; index expects ${this.dimension}`);
      }
    }

    const entries = sortBySequence(commit.entries.map(cloneEntry));
    const body = JSON.stringify({
      videoId: commit.videoId,
      publishedAt: commit.publishedAt,
      contentHash: commit.contentHash,
      entries,
    });
    const checksum = sha256(body);
    const file = `${SEGMENT_DIR}/${encodeURIComponent(commit.videoId)}.${checksum.slice(0, 12)}.json`;
    const previous = this.snapshot.videos.get(commit.videoId);

    await this.writeAtomic(join(this.options.directory, file), body);

    const videos = new Map(this.snapshot.videos);
    videos.set(commit.videoId, {
      videoId: commit.videoId,
      publishedAt: commit.publishedAt,
      contentHash: commit.contentHash,
      file,
      checksum,
      entries,
    });

    const next = buildSnapshot(videos);
    await this.writeManifest(next);
    this.snapshot = next;

    if (previous && previous.file !== file) {
      await removeIfPresent(join(this.options.directory, previous.file));
    }
  }

  private async removeVideoSegment(videoId: string): Promise<void> {
    const previous = this.snapshot.videos.get(videoId);
    if (!previous) {
      return;
    }

    const videos = new Map(this.snapshot.videos);
    videos.delete(videoId);

    const next = buildSnapshot(videos);
    await this.writeManifest(next);
    this.snapshot = next;
    await removeIfPresent(join(this.options.directory, previous.file));
  }

  private async writeManifest(snapshot: Snapshot): Promise<void> {
    const videos: Manifest["videos"] = {};

    for (const segment of snapshot.videos.values()) {
      videos[segment.videoId] = {
        file: segment.file,
        checksum: segment.checksum,
        unitCount: segment.entries.length,
        publishedAt: segment.publishedAt,
        contentHash: segment.contentHash,
      };
    }

    const manifest: Manifest = {
      formatVersion: INDEX_FORMAT_VERSION,
      modelId: this.modelId,
      dimension: this.dimension,
      updatedAt: new Date().toISOString(),
      videos,
    };

    await this.writeAtomic(join(this.options.directory, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
  }

  private async writeAtomic(path: string, body: string): Promise<void> {
    this.tempCounter += 1;
    const tempPath = `${path}.${process.pid}.${this.tempCounter}.tmp`;
    await writeFile(tempPath, body, "utf8");
    await rename(tempPath, path);
  }
}

type ScoredEntry = {
  entry: IndexEntry;
  score: number;
};

function rankEntries(entries: readonly IndexEntry[], vector: number[]): ScoredEntry[] {
  const scored = entries.map((entry) => ({ entry, score: dotProduct(entry.vector, vector) }));

  return scored.sort((left, right) => {
    if (right.score !== left.score) {
      return right.score - left.score;
    }

    const publishedDelta = Date.parse(right.entry.publishedAt) - Date.parse(left.entry.publishedAt);
    if (Number.isFinite(publishedDelta) && publishedDelta !== 0) {
      return publishedDelta;
    }

    if (left.entry.sequenceIndex !== right.entry.sequenceIndex) {
      return left.entry.sequenceIndex - right.entry.sequenceIndex;
    }

    return left.entry.unitId.localeCompare(right.entry.unitId);
  });
}

function toHit(row: ScoredEntry): SearchHit {
  return {
    unitId: row.entry.unitId,
    videoId: row.entry.videoId,
    score: row.score,
  };
}

function buildSnapshot(videos: Map<string, VideoSegment>): Snapshot {
  const units = new Map<string, IndexEntry>();
  const entries: IndexEntry[] = [];

  for (const videoId of Array.from(videos.keys()).sort()) {
    const segment = videos.get(videoId);
    if (!segment) {
      continue;
    }

    for (const entry of segment.entries) {
      units.set(entry.unitId, entry);
      entries.push(entry);
    }
  }

  return { videos, units, entries };
}

function toVideoState(segment: VideoSegment): VideoIndexState {
  return {
    videoId: segment.videoId,
    publishedAt: segment.publishedAt,
    contentHash: segment.contentHash,
    unitCount: segment.entries.length,
    pendingEntityCount: segment.entries.filter((entry) => entry.entitiesPending).length,
  };
}

function groupByVideo(entries: IndexEntry[]): Map<string, IndexEntry[]> {
  const grouped = new Map<string, IndexEntry[]>();

  for (const entry of entries) {
    const current = grouped.get(entry.videoId);
    if (current) {
      current.push(entry);
    } else {
      grouped.set(entry.videoId, [entry]);
    }
  }

  return grouped;
}

function sortBySequence(entries: IndexEntry[]): IndexEntry[] {
  return [...entries].sort((left, right) => left.sequenceIndex - right.sequenceIndex);
}

function changesContent(previous: IndexEntry | undefined, next: IndexEntry): boolean {
  return (
    !previous ||
    previous.text !== next.text ||
    previous.startTime !== next.startTime ||
    previous.endTime !== next.endTime ||
    previous.sequenceIndex !== next.sequenceIndex ||
    previous.publishedAt !== next.publishedAt
  );
}

function cloneEntry(entry: IndexEntry): IndexEntry {
  return {
    ...entry,
    entities: [...entry.entities],
    captionSpans: entry.captionSpans.map((span) => ({ ...span })),
    vector: [...entry.vector],
  };
}

function sha256(body: string): string {
  return createHash("sha256").update(body).digest("hex");
}

function safeJsonParse(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}

async function removeIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (error) {
    if (!isNotFound(error)) {
      throw error;
    }
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
