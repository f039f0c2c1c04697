import type { TimeSpan, UnitDraft } from "@/types/retrieval";

export type RawTranscriptSegment = {
  offset: number;
  duration: number;
  text: string;
};

export type CanonicalTranscriptSegment = TimeSpan & {
  videoId: string;
  seq: number;
  duration: number;
  text: string;
};

export type ChunkSizeUnit = "tokens" | "seconds";

export type TranscriptGap = TimeSpan & {
  afterSequenceIndex: number;
};

export type ChunkingResult = {
  units: UnitDraft[];
  gaps: TranscriptGap[];
};

export type RefreshMode = "auto" | "manual";

export type RefreshState = {
  mode: RefreshMode;
  intervalDays: number;
  lastRefreshAt: string | null;
  updatedAt: string;
};
