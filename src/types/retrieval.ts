export type TimeSpan = {
  startTime: number;
  endTime: number;
};

export type CaptionSegment = TimeSpan & {
  text: string;
};

export type Video = {
  videoId: string;
  title: string;
  publishedAt: string;
  durationSec: number;
  captions: CaptionSegment[];
  lastSeenAt?: string;
};

/**
 * Character range of one source caption inside a unit's text, kept so that a
 * citation can point at the caption that carried the match.
 */
export type CaptionSpan = TimeSpan & {
  charStart: number;
  charEnd: number;
};

export type UnitDraft = TimeSpan & {
  unitId: string;
  videoId: string;
  sequenceIndex: number;
  text: string;
  tokenCount: number;
  captionSpans: CaptionSpan[];
};

export type IndexEntry = UnitDraft & {
  publishedAt: string;
  entities: string[];
  entitiesPending: boolean;
  vector: number[];
};

export type UnitRecord = Omit<IndexEntry, "vector">;

export type SearchFilters = {
  entities?: string[];
  videoIds?: string[];
  publishedAfter?: string;
  publishedBefore?: string;
};

export type SearchHit = {
  unitId: string;
  videoId: string;
  score: number;
};

export type SearchStrategy = "exhaustive" | "prefilter" | "postfilter";

export type SearchResponse = {
  hits: SearchHit[];
  partial: boolean;
  strategy: SearchStrategy;
  universeSize: number;
};

export type RetrievalReason = "match" | "neighbor";

export type ResultItem = {
  unit: UnitRecord;
  score: number;
  reason: RetrievalReason;
  anchor: TimeSpan;
};

export type FilterSource = "caller" | "question" | "none";

export type ResultSet = {
  question: string;
  filters: SearchFilters;
  filterSource: FilterSource;
  items: ResultItem[];
  partial: boolean;
};

export type Citation = TimeSpan & {
  videoId: string;
};

export type ContextItem = {
  unitId: string;
  videoId: string;
  sequenceIndex: number;
  text: string;
  tokenCount: number;
  score: number;
  reason: RetrievalReason;
  citation: Citation;
  span: TimeSpan;
};

export type ContextPayload = {
  question: string;
  items: ContextItem[];
  totalTokens: number;
  maxContextTokens: number;
  truncated: boolean;
  droppedCount: number;
};
