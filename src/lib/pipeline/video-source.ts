import { readFile, readdir } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { MissingTranscriptError } from "@/lib/errors";
import type { TranscriptProvider } from "@/lib/pipeline/transcript/fetch-transcript";
import type { CaptionSegment, Video } from "@/types/retrieval";

export interface VideoSource {
  getVideo(videoId: string): Promise<Video>;
  listVideoIds(): Promise<string[]>;
}

const captionSchema = z.object({
  start: z.number().nonnegative(),
  end: z.number().nonnegative(),
  text: z.string(),
});

const videoRecordSchema = z.object({
  videoId: z.string().min(1),
  title: z.string().default(""),
  publishedAt: z.string().refine((value) => !Number.isNaN(Date.parse(value)), "must be an ISO date"),
  durationSec: z.number().nonnegative().default(0),
  captions: z.array(captionSchema).optional(),
  transcriptUnavailable: z.boolean().optional(),
  lastSeenAt: z.string().optional(),
});

export type FileVideoSourceOptions = {
  transcriptProvider?: TranscriptProvider;
  logger?: (message: string) => void;
};

/**
 * Reads crawled video records from `<directory>/<videoId>.json`. Records with
 * no captions go to the transcript provider; with no provider, or when the
 * provider has nothing either, the video is reported as missing a transcript.
 */
export class FileVideoSource implements VideoSource {
  private readonly logger: (message: string) => void;

  constructor(
    private readonly directory: string,
    private readonly options: FileVideoSourceOptions = {},
  ) {
    this.logger = options.logger ?? (() => undefined);
  }

  async getVideo(videoId: string): Promise<Video> {
    const path = join(this.directory, `${encodeURIComponent(videoId)}.json`);
    let raw: string;

    try {
      raw = await readFile(path, "utf8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        throw new Error(`Video record not found: ${path}`);
      }

      throw error;
    }

    const parsed = videoRecordSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      throw new Error(`Invalid video record ${path}: ${issues}`);
    }

    const record = parsed.data;
    if (record.videoId !== videoId) {
      throw new Error(`Video record ${path} describes ${record.videoId}, expected ${videoId}`);
    }

    const captions = await this.resolveCaptions(record.videoId, record.captions, record.transcriptUnavailable);

    return {
      videoId: record.videoId,
      title: record.title,
      publishedAt: record.publishedAt,
      durationSec: record.durationSec,
      captions,
      lastSeenAt: record.lastSeenAt,
    };
  }

  async listVideoIds(): Promise<string[]> {
    let names: string[];

    try {
      names = await readdir(this.directory);
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return [];
      }

      throw error;
    }

    return names
      .filter((name) => name.endsWith(".json"))
      .map((name) => decodeURIComponent(name.slice(0, -".json".length)))
      .sort();
  }

  private async resolveCaptions(
    videoId: string,
    stored: Array<{ start: number; end: number; text: string }> | undefined,
    transcriptUnavailable: boolean | undefined,
  ): Promise<CaptionSegment[]> {
    if (stored && stored.length > 0) {
      return stored.map((row) => ({ startTime: row.start, endTime: row.end, text: row.text }));
    }

    const provider = this.options.transcriptProvider;
    if (!provider || transcriptUnavailable) {
      throw new MissingTranscriptError(videoId);
    }

    this.logger(`[transcript] ${videoId} has no stored captions; asking transcript provider`);
    const fetched = await provider.fetchCaptions(videoId);

    if (fetched.length === 0) {
      throw new MissingTranscriptError(videoId, `Transcript provider returned no captions for ${videoId}`);
    }

    return fetched;
  }
}
