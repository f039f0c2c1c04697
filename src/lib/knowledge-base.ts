import {
  INSUFFICIENT_INFORMATION_ANSWER,
  OpenAIAnswerGenerator,
  type AnswerGenerator,
} from "@/lib/answer/answer-generator";
import type { AppConfig } from "@/lib/config/load-env";
import { Embedder } from "@/lib/embedding/embedder";
import { HashingEmbeddingModel } from "@/lib/embedding/hashing-model";
import { OpenAIEmbeddingModel } from "@/lib/embedding/openai-model";
import type { EmbeddingModel } from "@/lib/embedding/types";
import { NoRelevantContentError } from "@/lib/errors";
import { FileIndexStore } from "@/lib/index-store/file-index-store";
import type { IndexStats, IndexStore } from "@/lib/index-store/types";
import type { ChunkingOptions } from "@/lib/pipeline/chunker";
import {
  VocabularyEntityExtractor,
  loadEntityVocabulary,
  type EntityExtractor,
} from "@/lib/pipeline/entities";
import {
  reprocessPendingEntities,
  type ReprocessEntitiesResult,
} from "@/lib/pipeline/ingest/reprocess-entities";
import {
  markRefreshed,
  nextRefreshAt,
  readRefreshState,
  setRefreshInterval,
  setRefreshMode,
  shouldRefresh,
  toggleRefreshMode,
  writeRefreshState,
} from "@/lib/pipeline/ingest/refresh-state";
import { runIngestionPipeline, type IngestRunResult } from "@/lib/pipeline/ingest/run-ingestion";
import { YoutubeTranscriptProvider } from "@/lib/pipeline/transcript/fetch-transcript";
import type { RefreshMode, RefreshState } from "@/lib/pipeline/types";
import { FileVideoSource, type VideoSource } from "@/lib/pipeline/video-source";
import { assembleContext } from "@/lib/search/context-assembler";
import { QueryPlanner } from "@/lib/search/query-planner";
import type { ContextPayload, ResultSet, SearchFilters } from "@/types/retrieval";

export type KnowledgeBaseDeps = {
  store: IndexStore;
  embedder: Embedder;
  entityExtractor: EntityExtractor;
  source: VideoSource;
  answerGenerator?: AnswerGenerator;
  chunking?: ChunkingOptions;
  ingestConcurrency?: number;
  refreshStatePath: string;
  refreshState: RefreshState;
  queryDefaults?: Partial<QueryDefaults>;
  logger?: (message: string) => void;
};

export type QueryDefaults = {
  topK: number;
  minScore: number;
  maxContextTokens: number;
  expandNeighbors: boolean;
};

export type QueryOptions = Partial<QueryDefaults> & {
  signal?: AbortSignal;
};

export type QueryOutcome = {
  resultSet: ResultSet;
  context: ContextPayload;
};

export type AnswerOutcome =
  | { status: "answered"; answer: string; context: ContextPayload }
  | { status: "insufficient-information"; answer: string; reason: string };

export type RefreshStatus = {
  state: RefreshState;
  nextRefreshAt: string | null;
  due: boolean;
};

export type RefreshRunOutcome =
  | { ran: false; status: RefreshStatus }
  | { ran: true; status: RefreshStatus; result: IngestRunResult };

const DEFAULT_QUERY: QueryDefaults = {
  topK: 8,
  minScore: 0.25,
  maxContextTokens: 3000,
  expandNeighbors: true,
};

export class KnowledgeBase {
  private readonly planner: QueryPlanner;
  private readonly logger: (message: string) => void;
  private readonly queryDefaults: QueryDefaults;
  private refreshState: RefreshState;

  constructor(private readonly deps: KnowledgeBaseDeps) {
    this.logger = deps.logger ?? (() => undefined);
    this.queryDefaults = { ...DEFAULT_QUERY, ...deps.queryDefaults };
    this.refreshState = deps.refreshState;
    this.planner = new QueryPlanner({
      embedder: deps.embedder,
      store: deps.store,
      entityExtractor: deps.entityExtractor,
      logger: this.logger,
    });
  }

  get store(): IndexStore {
    return this.deps.store;
  }

  async ingest(videoIds: string[], options: { force?: boolean } = {}): Promise<IngestRunResult> {
    return runIngestionPipeline({
      videoIds,
      source: this.deps.source,
      store: this.deps.store,
      embedder: this.deps.embedder,
      entityExtractor: this.deps.entityExtractor,
      chunking: this.deps.chunking,
      concurrency: this.deps.ingestConcurrency,
      force: options.force,
      logger: this.logger,
    });
  }

  /** Videos known to the index or listed by the source. */
  async listVideoIds(): Promise<string[]> {
    const known = this.deps.store.listVideoIds();
    const listed = await this.deps.source.listVideoIds();
    return Array.from(new Set([...known, ...listed])).sort();
  }

  /**
   * Full rebuild under the configured embedding model: every video known to
   * the index or the source is chunked and embedded again. A usable store is
   * replaced video by video, so a video that fails keeps its prior units; the
   * store is only emptied first when its vectors cannot be served anyway.
   */
  async reindexAll(): Promise<IngestRunResult> {
    const videoIds = await this.listVideoIds();
    const health = this.deps.store.health();

    this.logger(`[index] rebuilding ${videoIds.length} videos with ${this.deps.embedder.modelId}`);

    if (health.status !== "ready") {
      this.logger(`[index] store is ${health.status}; starting from an empty index`);
      await this.deps.store.rebuild();
    }

    return this.ingest(videoIds, { force: true });
  }

  async query(question: string, filters?: SearchFilters, options: QueryOptions = {}): Promise<QueryOutcome> {
    const settings = { ...this.queryDefaults, ...definedOnly(options) };

    const resultSet = await this.planner.plan(question, filters, {
      topK: settings.topK,
      minScore: settings.minScore,
      expandNeighbors: settings.expandNeighbors,
      signal: options.signal,
    });
    options.signal?.throwIfAborted();

    const context = assembleContext(resultSet, { maxContextTokens: settings.maxContextTokens });
    this.logger(
      `[query] items=${context.items.length} tokens=${context.totalTokens} dropped=${context.droppedCount} partial=${resultSet.partial}`,
    );

    return { resultSet, context };
  }

  async answer(question: string, filters?: SearchFilters, options: QueryOptions = {}): Promise<AnswerOutcome> {
    const generator = this.deps.answerGenerator;
    if (!generator) {
      throw new Error("Answer generation is not configured. Set OPENAI_API_KEY.");
    }

    let outcome: QueryOutcome;

    try {
      outcome = await this.query(question, filters, options);
    } catch (error) {
      if (error instanceof NoRelevantContentError) {
        return { status: "insufficient-information", answer: INSUFFICIENT_INFORMATION_ANSWER, reason: error.message };
      }

      throw error;
    }

    const answer = await generator.generate({ question, context: outcome.context, signal: options.signal });
    return { status: "answered", answer, context: outcome.context };
  }

  async removeVideo(videoId: string): Promise<number> {
    const removed = await this.deps.store.deleteVideo(videoId);
    this.logger(`[index] removed ${videoId} units=${removed}`);
    return removed;
  }

  async reprocessEntities(): Promise<ReprocessEntitiesResult> {
    return reprocessPendingEntities(this.deps.store, this.deps.entityExtractor, this.logger);
  }

  stats(): IndexStats {
    return this.deps.store.stats();
  }

  refreshStatus(now = new Date()): RefreshStatus {
    const next = nextRefreshAt(this.refreshState);

    return {
      state: this.refreshState,
      nextRefreshAt: next ? next.toISOString() : null,
      due: shouldRefresh(this.refreshState, now),
    };
  }

  async setRefreshMode(mode: RefreshMode, intervalDays?: number): Promise<RefreshStatus> {
    let next = setRefreshMode(this.refreshState, mode);
    if (intervalDays !== undefined) {
      next = setRefreshInterval(next, intervalDays);
    }

    await this.saveRefreshState(next);
    return this.refreshStatus();
  }

  async toggleRefreshMode(): Promise<RefreshStatus> {
    await this.saveRefreshState(toggleRefreshMode(this.refreshState));
    return this.refreshStatus();
  }

  /** Re-ingests every listed video when auto refresh is due, or when forced. */
  async runRefresh(options: { force?: boolean; now?: Date } = {}): Promise<RefreshRunOutcome> {
    const now = options.now ?? new Date();

    if (!options.force && !shouldRefresh(this.refreshState, now)) {
      this.logger(`[skip] refresh not due (mode=${this.refreshState.mode})`);
      return { ran: false, status: this.refreshStatus(now) };
    }

    const videoIds = await this.deps.source.listVideoIds();
    const result = await this.ingest(videoIds);
    await this.saveRefreshState(markRefreshed(this.refreshState, now));

    return { ran: true, status: this.refreshStatus(now), result };
  }

  private async saveRefreshState(state: RefreshState): Promise<void> {
    this.refreshState = await writeRefreshState(state, this.deps.refreshStatePath);
  }
}

export type KnowledgeBaseOverrides = Partial<
  Pick<KnowledgeBaseDeps, "store" | "entityExtractor" | "source" | "answerGenerator" | "chunking" | "logger">
> & {
  embeddingModel?: EmbeddingModel;
};

export async function createKnowledgeBase(
  config: AppConfig,
  overrides: KnowledgeBaseOverrides = {},
): Promise<KnowledgeBase> {
  const logger = overrides.logger;
  const model = overrides.embeddingModel ?? createEmbeddingModel(config);
  const embedder = new Embedder(model, {
    batchSize: config.embedBatchSize,
    concurrency: config.embedConcurrency,
    maxRetries: config.embedMaxRetries,
    retryBaseMs: config.embedRetryBaseMs,
    logger,
  });

  const store =
    overrides.store ??
    (await FileIndexStore.open({
      directory: config.indexDir,
      modelId: embedder.modelId,
      dimension: embedder.dimension,
      logger,
    }));

  const entityExtractor =
    overrides.entityExtractor ??
    new VocabularyEntityExtractor(await loadEntityVocabulary(config.entityVocabularyPath), config.entityMode);

  const source =
    overrides.source ??
    new FileVideoSource(config.videosDir, { transcriptProvider: new YoutubeTranscriptProvider(), logger });

  const answerGenerator =
    overrides.answerGenerator ??
    (config.openaiApiKey
      ? new OpenAIAnswerGenerator({ apiKey: config.openaiApiKey, model: config.openaiChatModel })
      : undefined);

  return new KnowledgeBase({
    store,
    embedder,
    entityExtractor,
    source,
    answerGenerator,
    chunking: overrides.chunking ?? {
      minSize: config.chunkMinTokens,
      maxSize: config.chunkMaxTokens,
      sizeUnit: "tokens",
      gapToleranceSec: config.chunkGapToleranceSec,
    },
    ingestConcurrency: config.ingestConcurrency,
    refreshStatePath: config.refreshStatePath,
    refreshState: await readRefreshState(config.refreshStatePath),
    queryDefaults: {
      topK: config.queryTopK,
      minScore: config.queryMinScore,
      maxContextTokens: config.queryMaxContextTokens,
    },
    logger,
  });
}

function createEmbeddingModel(config: AppConfig): EmbeddingModel {
  if (config.embeddingProvider === "openai") {
    if (!config.openaiApiKey) {
      throw new Error("Missing required environment variable: OPENAI_API_KEY");
    }

    return new OpenAIEmbeddingModel({
      apiKey: config.openaiApiKey,
      model: config.openaiEmbedModel,
      dimension: config.openaiEmbedDimensions,
    });
  }

  return new HashingEmbeddingModel({ dimension: config.hashingDimensions });
}

function definedOnly(options: QueryOptions): Partial<QueryDefaults> {
  const result: Partial<QueryDefaults> = {};

  for (const key of ["topK", "minScore", "maxContextTokens"] as const) {
    const value = options[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }

  if (options.expandNeighbors !== undefined) {
    result.expandNeighbors = options.expandNeighbors;
  }

  return result;
}
