import type { Embedder } from "@/lib/embedding/embedder";
import { dotProduct } from "@/lib/embedding/vector";
import { NoRelevantContentError } from "@/lib/errors";
import { compileFilter, hasActiveFilters } from "@/lib/index-store/filters";
import type { IndexStore } from "@/lib/index-store/types";
import type { EntityExtractor } from "@/lib/pipeline/entities";
import { findAnchorSpan, tokenizeQuery } from "@/lib/search/anchor";
import type {
  FilterSource,
  IndexEntry,
  ResultItem,
  ResultSet,
  SearchFilters,
  UnitRecord,
} from "@/types/retrieval";

export type QueryPlannerOptions = {
  topK?: number;
  oversampleFactor?: number;
  minScore?: number;
  expandNeighbors?: boolean;
  signal?: AbortSignal;
};

export type QueryPlannerDeps = {
  embedder: Embedder;
  store: IndexStore;
  entityExtractor: EntityExtractor;
  logger?: (message: string) => void;
};

const DEFAULT_TOP_K = 8;
const DEFAULT_OVERSAMPLE_FACTOR = 3;
const DEFAULT_MIN_SCORE = 0.25;

export class QueryPlanner {
  private readonly logger: (message: string) => void;

  constructor(private readonly deps: QueryPlannerDeps) {
    this.logger = deps.logger ?? (() => undefined);
  }

  async plan(question: string, filters?: SearchFilters, options: QueryPlannerOptions = {}): Promise<ResultSet> {
    const trimmed = question.trim();

    if (!trimmed) {
      throw new NoRelevantContentError(question, "Question is empty");
    }

    const topK = Math.max(1, Math.floor(options.topK ?? DEFAULT_TOP_K));
    const oversample = Math.max(1, options.oversampleFactor ?? DEFAULT_OVERSAMPLE_FACTOR);
    const minScore = options.minScore ?? DEFAULT_MIN_SCORE;
    const signal = options.signal;

    const queryVector = await this.deps.embedder.embedQuery(trimmed, signal);
    signal?.throwIfAborted();

    const { filters: effectiveFilters, source } = await this.resolveFilters(trimmed, filters);
    const queryTerms = tokenizeQuery(trimmed);

    let response = await this.deps.store.search(queryVector, topK * oversample, effectiveFilters);
    let appliedFilters = effectiveFilters;
    let appliedSource = source;
    signal?.throwIfAborted();

    let survivors = response.hits.filter((hit) => hit.score >= minScore).slice(0, topK);

    // Entities inferred from the question only narrow the search; they never empty it.
    if (survivors.length === 0 && source === "question") {
      this.logger(`[query] no matches within inferred entities; retrying without filters`);
      response = await this.deps.store.search(queryVector, topK * oversample);
      appliedFilters = {};
      appliedSource = "none";
      signal?.throwIfAborted();
      survivors = response.hits.filter((hit) => hit.score >= minScore).slice(0, topK);
    }

    if (survivors.length === 0) {
      throw new NoRelevantContentError(trimmed);
    }

    const items: ResultItem[] = [];
    const matchedIds = new Set<string>();

    for (const hit of survivors) {
      const entry = await this.deps.store.getUnit(hit.unitId);
      if (!entry) {
        continue;
      }

      matchedIds.add(entry.unitId);
      items.push(this.toResultItem(entry, hit.score, "match", queryTerms));
    }

    if (options.expandNeighbors ?? true) {
      const neighbors = new Map<string, ResultItem>();
      // Neighbors are context, but they still have to satisfy the filters in force.
      const withinFilters: (entry: UnitRecord) => boolean = hasActiveFilters(appliedFilters)
        ? compileFilter(appliedFilters)
        : () => true;

      for (const match of [...items]) {
        signal?.throwIfAborted();
        const adjacent = await this.deps.store.getNeighbors(match.unit.unitId, 1);

        for (const entry of adjacent) {
          if (matchedIds.has(entry.unitId) || !withinFilters(entry)) {
            continue;
          }

          const score = dotProduct(entry.vector, queryVector);
          const existing = neighbors.get(entry.unitId);

          if (!existing || existing.score < score) {
            neighbors.set(entry.unitId, this.toResultItem(entry, score, "neighbor", queryTerms));
          }
        }
      }

      items.push(...neighbors.values());
    }

    return {
      question: trimmed,
      filters: appliedFilters,
      filterSource: appliedSource,
      items,
      partial: response.universeSize < topK,
    };
  }

  private async resolveFilters(
    question: string,
    filters?: SearchFilters,
  ): Promise<{ filters: SearchFilters; source: FilterSource }> {
    if (hasActiveFilters(filters)) {
      const entities = filters.entities?.length
        ? this.deps.entityExtractor.canonicalize(filters.entities)
        : filters.entities;

      return { filters: { ...filters, entities }, source: "caller" };
    }

    try {
      const entities = await this.deps.entityExtractor.extract(question);

      if (entities.length > 0) {
        return { filters: { entities }, source: "question" };
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown error";
      this.logger(`[warn] question entity extraction failed: ${message}`);
    }

    return { filters: {}, source: "none" };
  }

  private toResultItem(
    entry: IndexEntry,
    score: number,
    reason: ResultItem["reason"],
    queryTerms: string[],
  ): ResultItem {
    const unit = toUnitRecord(entry);

    return {
      unit,
      score,
      reason,
      anchor: reason === "match" ? findAnchorSpan(unit, queryTerms) : { startTime: unit.startTime, endTime: unit.endTime },
    };
  }
}

function toUnitRecord(entry: IndexEntry): UnitRecord {
  const { vector: _vector, ...record } = entry;
  return record;
}
