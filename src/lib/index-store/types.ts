import type { IndexEntry, SearchFilters, SearchResponse } from "@/types/retrieval";

export type VideoCommit = {
  videoId: string;
  publishedAt: string;
  contentHash: string;
  entries: IndexEntry[];
};

export type VideoIndexState = {
  videoId: string;
  publishedAt: string;
  contentHash: string;
  unitCount: number;
  pendingEntityCount: number;
};

export type StoreHealth =
  | { status: "ready" }
  | { status: "corrupt"; reason: string }
  | { status: "model-mismatch"; stored: { modelId: string; dimension: number } };

export type IndexStats = {
  modelId: string;
  dimension: number;
  videoCount: number;
  unitCount: number;
  videos: VideoIndexState[];
};

/**
 * Vector + metadata store for index entries. Every read returns whole entries:
 * a reader sees either the previous or the new version of a unit, never a mix.
 */
export interface IndexStore {
  readonly modelId: string;
  readonly dimension: number;
  health(): StoreHealth;
  upsert(entries: IndexEntry[]): Promise<void>;
  delete(unitIds: string[]): Promise<number>;
  search(vector: number[], topK: number, filters?: SearchFilters): Promise<SearchResponse>;
  lookupByFilter(filters: SearchFilters): Promise<string[]>;
  /** Replaces every unit of one video in a single visible step. */
  replaceVideo(commit: VideoCommit): Promise<void>;
  deleteVideo(videoId: string): Promise<number>;
  getUnit(unitId: string): Promise<IndexEntry | null>;
  getNeighbors(unitId: string, radius?: number): Promise<IndexEntry[]>;
  getVideoState(videoId: string): VideoIndexState | null;
  listVideoIds(): string[];
  listPendingEntityUnits(): IndexEntry[];
  stats(): IndexStats;
  /** Drops all entries and re-stamps the store with the configured model. */
  rebuild(): Promise<void>;
}
