import { mkdtemp } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { EmbeddingModel } from "@/lib/embedding/types";
import { l2Normalize } from "@/lib/embedding/vector";
import { normalizeToken, tokenizeWords } from "@/lib/pipeline/tokens";
import type { VideoSource } from "@/lib/pipeline/video-source";
import type { IndexEntry, Video } from "@/types/retrieval";

/** One axis per vocabulary word; words outside the vocabulary are ignored. */
export class KeywordEmbeddingModel implements EmbeddingModel {
  readonly id: string;
  readonly dimension: number;

  constructor(private readonly vocabulary: string[]) {
    this.dimension = vocabulary.length;
    this.id = `keyword-test-${vocabulary.length}`;
  }

  async embedDocuments(texts: string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }

  async embedQuery(text: string): Promise<number[]> {
    return this.vectorize(text);
  }

  private vectorize(text: string): number[] {
    const vector = new Array<number>(this.dimension).fill(0);

    for (const word of tokenizeWords(text)) {
      const axis = this.vocabulary.indexOf(normalizeToken(word));
      if (axis >= 0) {
        vector[axis] += 1;
      }
    }

    return vector;
  }
}

export class MemoryVideoSource implements VideoSource {
  readonly videos = new Map<string, Video>();

  constructor(videos: Video[] = []) {
    for (const video of videos) {
      this.videos.set(video.videoId, video);
    }
  }

  async getVideo(videoId: string): Promise<Video> {
    const video = this.videos.get(videoId);
    if (!video) {
      throw new Error(`Video record not found: ${videoId}`);
    }

    return video;
  }

  async listVideoIds(): Promise<string[]> {
    return Array.from(this.videos.keys()).sort();
  }
}

export async function makeTempDir(prefix: string): Promise<string> {
  return mkdtemp(join(tmpdir(), `channel-recall-${prefix}-`));
}

/** Unit-length vector pointing along one axis. */
export function axis(dimension: number, index: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  vector[index] = 1;
  return vector;
}

export function mix(dimension: number, weights: Record<number, number>): number[] {
  const vector = new Array<number>(dimension).fill(0);

  for (const [index, weight] of Object.entries(weights)) {
    vector[Number(index)] = weight;
  }

  return l2Normalize(vector);
}

export function makeEntry(
  videoId: string,
  sequenceIndex: number,
  vector: number[],
  overrides: Partial<IndexEntry> = {},
): IndexEntry {
  const startTime = sequenceIndex * 10;
  const text = overrides.text ?? `${videoId} unit ${sequenceIndex}`;

  return {
    unitId: `${videoId}:${sequenceIndex}`,
    videoId,
    sequenceIndex,
    startTime,
    endTime: startTime + 10,
    text,
    tokenCount: tokenizeWords(text).length,
    captionSpans: [{ startTime, endTime: startTime + 10, charStart: 0, charEnd: text.length }],
    publishedAt: "2024-01-01T00:00:00.000Z",
    entities: [],
    entitiesPending: false,
    vector,
    ...overrides,
  };
}
