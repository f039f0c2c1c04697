#!/usr/bin/env node

import { readFile, writeFile } from "node:fs/promises";
import { Command } from "commander";
import { loadAppConfig } from "@/lib/config/load-env";
import { describeFailure, MissingTranscriptError } from "@/lib/errors";
import { createKnowledgeBase, type KnowledgeBase, type RefreshStatus } from "@/lib/knowledge-base";
import type { IngestRunResult } from "@/lib/pipeline/ingest/run-ingestion";
import { YoutubeTranscriptProvider } from "@/lib/pipeline/transcript/fetch-transcript";
import { buildTimestampUrl, formatCitation } from "@/lib/search/citation";
import type { ContextPayload, SearchFilters } from "@/types/retrieval";

const program = new Command();

program
  .name("channel-recall")
  .description("Channel transcript knowledge base CLI")
  .version("0.1.0");

type FilterFlags = {
  entity?: string[];
  videoId?: string[];
  after?: string;
  before?: string;
};

type QueryFlags = FilterFlags & {
  topK?: number;
  maxTokens?: number;
  minScore?: number;
  neighbors: boolean;
  json: boolean;
};

const transcript = program.command("transcript").description("Transcript operations");

transcript
  .command("fetch")
  .requiredOption("--video-id <videoId>", "YouTube video id")
  .option("--lang <lang>", "Caption language")
  .option("--out <path>", "Output file path (JSON)")
  .action(async (options: { videoId: string; lang?: string; out?: string }) => {
    try {
      const captions = await new YoutubeTranscriptProvider({ lang: options.lang }).fetchCaptions(options.videoId);
      const payload = JSON.stringify(captions, null, 2);

      if (options.out) {
        await writeFile(options.out, payload, "utf8");
        console.log(`Saved ${captions.length} caption rows to ${options.out}`);
        return;
      }

      console.log(payload);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown transcript error";

      if (error instanceof MissingTranscriptError) {
        console.error(`Transcript unavailable: ${message}`);
      } else {
        console.error(`Transcript fetch failed: ${message}`);
      }

      process.exitCode = 1;
    }
  });

const ingest = program.command("ingest").description("Ingestion operations");

ingest
  .command("run")
  .option("--video-id <videoId...>", "Video IDs to ingest")
  .option("--video-ids-file <path>", "Path to newline-delimited video IDs")
  .option("--all", "Ingest every video record in the videos directory", false)
  .option("--force", "Re-embed videos whose content is unchanged", false)
  .action(async (options: { videoId?: string[]; videoIdsFile?: string; all: boolean; force: boolean }) => {
    try {
      const kb = await openKnowledgeBase();
      const fromFlag = options.videoId ?? [];
      const fromFile = options.videoIdsFile ? await readLinesFromFile(options.videoIdsFile) : [];
      const fromSource = options.all ? await kb.listVideoIds() : [];
      const videoIds = Array.from(
        new Set([...fromFlag, ...fromFile, ...fromSource].map((value) => value.trim()).filter(Boolean)),
      );

      if (videoIds.length === 0) {
        console.error("No video IDs provided. Use --video-id, --video-ids-file or --all.");
        process.exitCode = 1;
        return;
      }

      reportIngestion(await kb.ingest(videoIds, { force: options.force }));
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown ingestion error";
      console.error(`Ingestion failed: ${message}`);
      process.exitCode = 1;
    }
  });

const index = program.command("index").description("Index maintenance");

index
  .command("verify")
  .description("Check manifest, checksums and embedding model")
  .action(async () => {
    try {
      const kb = await openKnowledgeBase();
      const health = kb.store.health();

      if (health.status === "ready") {
        console.log(`Index ready. model=${kb.store.modelId} dimension=${kb.store.dimension}`);
        return;
      }

      if (health.status === "corrupt") {
        console.error(`Index corrupt: ${health.reason}`);
      } else {
        console.error(
          `Index built with ${health.stored.modelId} (${health.stored.dimension}d), configured ${kb.store.modelId} (${kb.store.dimension}d)`,
        );
      }

      console.error("Run `index rebuild` to rebuild it.");
      process.exitCode = 1;
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown index error";
      console.error(`Index verify failed: ${message}`);
      process.exitCode = 1;
    }
  });

index
  .command("rebuild")
  .description("Drop the index and re-ingest every known video with the configured model")
  .action(async () => {
    try {
      const kb = await openKnowledgeBase();
      reportIngestion(await kb.reindexAll());
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown rebuild error";
      console.error(`Index rebuild failed: ${message}`);
      process.exitCode = 1;
    }
  });

index
  .command("stats")
  .option("--json", "Print raw JSON", false)
  .action(async (options: { json: boolean }) => {
    try {
      const kb = await openKnowledgeBase();
      const stats = kb.stats();

      if (options.json) {
        console.log(JSON.stringify(stats, null, 2));
        return;
      }

      console.log(`model=${stats.modelId} dimension=${stats.dimension}`);
      console.log(`videos=${stats.videoCount} units=${stats.unitCount}`);

      for (const video of stats.videos) {
        const pending = video.pendingEntityCount > 0 ? ` pendingEntities=${video.pendingEntityCount}` : "";
        console.log(`- ${video.videoId} units=${video.unitCount} publishedAt=${video.publishedAt}${pending}`);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown stats error";
      console.error(`Index stats failed: ${message}`);
      process.exitCode = 1;
    }
  });

index
  .command("delete")
  .requiredOption("--video-id <videoId>", "Video whose units are removed")
  .action(async (options: { videoId: string }) => {
    try {
      const kb = await openKnowledgeBase();
      const removed = await kb.removeVideo(options.videoId);
      console.log(`Removed ${removed} units for ${options.videoId}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown delete error";
      console.error(`Index delete failed: ${message}`);
      process.exitCode = 1;
    }
  });

withQueryOptions(program.command("query").argument("<question>", "Natural-language question")).action(
  async (question: string, options: QueryFlags) => {
    try {
      const kb = await openKnowledgeBase();
      const { resultSet, context } = await kb.query(question, toFilters(options), {
        topK: options.topK,
        minScore: options.minScore,
        maxContextTokens: options.maxTokens,
        expandNeighbors: options.neighbors,
      });

      if (options.json) {
        console.log(JSON.stringify({ filters: resultSet.filters, partial: resultSet.partial, context }, null, 2));
        return;
      }

      if (resultSet.filterSource === "question") {
        console.log(`Filtered by entities in question: ${(resultSet.filters.entities ?? []).join(", ")}`);
      }

      if (resultSet.partial) {
        console.log("Note: fewer units matched the filters than requested.");
      }

      printContext(context);
    } catch (error) {
      const { kind, reason } = describeFailure(error);
      console.error(`Query failed (${kind}): ${reason}`);
      process.exitCode = 1;
    }
  },
);

withQueryOptions(program.command("ask").argument("<question>", "Natural-language question")).action(
  async (question: string, options: QueryFlags) => {
    try {
      const kb = await openKnowledgeBase();
      const outcome = await kb.answer(question, toFilters(options), {
        topK: options.topK,
        minScore: options.minScore,
        maxContextTokens: options.maxTokens,
        expandNeighbors: options.neighbors,
      });

      if (options.json) {
        console.log(JSON.stringify(outcome, null, 2));
        return;
      }

      console.log(outcome.answer);

      if (outcome.status === "answered") {
        console.log("");
        outcome.context.items.forEach((item, position) => {
          console.log(`[${position + 1}] ${buildTimestampUrl(item.citation)}`);
        });
      }
    } catch (error) {
      const { kind, reason } = describeFailure(error);
      console.error(`Answer failed (${kind}): ${reason}`);
      process.exitCode = 1;
    }
  },
);

const refresh = program.command("refresh").description("Scheduled re-ingestion settings");

refresh.command("status").action(async () => {
  try {
    const kb = await openKnowledgeBase();
    printRefreshStatus(kb.refreshStatus());
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown refresh error";
    console.error(`Refresh status failed: ${message}`);
    process.exitCode = 1;
  }
});

refresh
  .command("mode")
  .argument("<mode>", "auto or manual")
  .option("--interval-days <days>", "Days between automatic refreshes", parseInteger)
  .action(async (mode: string, options: { intervalDays?: number }) => {
    try {
      if (mode !== "auto" && mode !== "manual") {
        throw new Error(`Invalid refresh mode: ${mode}`);
      }

      const kb = await openKnowledgeBase();
      printRefreshStatus(await kb.setRefreshMode(mode, options.intervalDays));
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown refresh error";
      console.error(`Refresh mode failed: ${message}`);
      process.exitCode = 1;
    }
  });

refresh.command("toggle").action(async () => {
  try {
    const kb = await openKnowledgeBase();
    printRefreshStatus(await kb.toggleRefreshMode());
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown refresh error";
    console.error(`Refresh toggle failed: ${message}`);
    process.exitCode = 1;
  }
});

refresh
  .command("run")
  .option("--force", "Run even when no refresh is due", false)
  .action(async (options: { force: boolean }) => {
    try {
      const kb = await openKnowledgeBase();
      const outcome = await kb.runRefresh({ force: options.force });

      if (!outcome.ran) {
        console.log(`Refresh not due. next=${outcome.status.nextRefreshAt ?? "manual"}`);
        return;
      }

      reportIngestion(outcome.result);
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown refresh error";
      console.error(`Refresh failed: ${message}`);
      process.exitCode = 1;
    }
  });

const entities = program.command("entities").description("Entity maintenance");

entities
  .command("reprocess")
  .description("Retry entity extraction for units flagged as pending")
  .action(async () => {
    try {
      const kb = await openKnowledgeBase();
      const result = await kb.reprocessEntities();
      console.log(`Repaired ${result.repairedUnitIds.length} units, ${result.stillPendingUnitIds.length} still pending`);

      if (result.stillPendingUnitIds.length > 0) {
        process.exitCode = 1;
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown entity error";
      console.error(`Entity reprocessing failed: ${message}`);
      process.exitCode = 1;
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : "Unknown CLI error";
  console.error(message);
  process.exitCode = 1;
});

async function openKnowledgeBase(): Promise<KnowledgeBase> {
  return createKnowledgeBase(loadAppConfig(), {
    logger: (line) => (line.startsWith("[error]") ? console.error(line) : console.log(line)),
  });
}

function withQueryOptions(command: Command): Command {
  return command
    .option("--entity <entity...>", "Only units mentioning any of these entities")
    .option("--video-id <videoId...>", "Only units from these videos")
    .option("--after <date>", "Only videos published on or after this ISO date")
    .option("--before <date>", "Only videos published on or before this ISO date")
    .option("--top-k <count>", "Matched units to keep", parseInteger)
    .option("--min-score <score>", "Minimum cosine similarity", parseFloatSafe)
    .option("--max-tokens <count>", "Context token budget", parseInteger)
    .option("--no-neighbors", "Skip adjacent-unit expansion")
    .option("--json", "Print raw JSON", false);
}

function toFilters(options: FilterFlags): SearchFilters | undefined {
  const filters: SearchFilters = {};

  if (options.entity?.length) {
    filters.entities = options.entity;
  }
  if (options.videoId?.length) {
    filters.videoIds = options.videoId;
  }
  if (options.after) {
    filters.publishedAfter = options.after;
  }
  if (options.before) {
    filters.publishedBefore = options.before;
  }

  return Object.keys(filters).length > 0 ? filters : undefined;
}

function printContext(context: ContextPayload): void {
  context.items.forEach((item, position) => {
    console.log(`[${position + 1}] ${formatCitation(item.citation)} score=${item.score.toFixed(3)} ${item.reason}`);
    console.log(`    ${buildTimestampUrl(item.citation)}`);
    console.log(`    ${item.text}`);
  });

  console.log(
    `tokens=${context.totalTokens}/${context.maxContextTokens} truncated=${context.truncated} dropped=${context.droppedCount}`,
  );
}

function printRefreshStatus(status: RefreshStatus): void {
  console.log(`mode=${status.state.mode} intervalDays=${status.state.intervalDays}`);
  console.log(`lastRefreshAt=${status.state.lastRefreshAt ?? "never"}`);
  console.log(`nextRefreshAt=${status.nextRefreshAt ?? "manual"} due=${status.due}`);
}

function reportIngestion(result: IngestRunResult): void {
  console.log(
    `Ingestion complete. processed=${result.processedVideoIds.length} unchanged=${result.unchangedVideoIds.length} missingTranscript=${result.missingTranscript.length} failed=${result.failed.length}`,
  );

  for (const missing of result.missingTranscript) {
    console.log(`- ${missing.videoId}: ${missing.reason}`);
  }

  if (result.pendingEntityUnitIds.length > 0) {
    console.log(`Entity extraction pending for ${result.pendingEntityUnitIds.length} units.`);
  }

  if (result.failed.length > 0) {
    for (const failed of result.failed) {
      console.error(`- ${failed.videoId}: ${failed.kind} ${failed.reason}`);
    }

    process.exitCode = 1;
  }
}

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10);

  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`Invalid integer value: ${value}`);
  }

  return parsed;
}

function parseFloatSafe(value: string): number {
  const parsed = Number.parseFloat(value);

  if (!Number.isFinite(parsed)) {
    throw new Error(`Invalid number value: ${value}`);
  }

  return parsed;
}

async function readLinesFromFile(path: string): Promise<string[]> {
  const content = await readFile(path, "utf8");

  return content
    .split(/\r?\n/g)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}
