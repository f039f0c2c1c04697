import {
  YoutubeTranscript,
  YoutubeTranscriptDisabledError,
  YoutubeTranscriptNotAvailableError,
  YoutubeTranscriptVideoUnavailableError,
} from "youtube-transcript";
import { MissingTranscriptError } from "@/lib/errors";
import { toCaptionSegments } from "@/lib/pipeline/transcript/normalize-transcript";
import type { CaptionSegment } from "@/types/retrieval";

export interface TranscriptProvider {
  fetchCaptions(videoId: string): Promise<CaptionSegment[]>;
}

export type YoutubeTranscriptProviderOptions = {
  lang?: string;
};

/**
 * Caption fallback for videos whose stored record carries no captions. Any
 * "transcript not available" answer from the platform becomes a
 * MissingTranscriptError; other failures propagate unchanged.
 */
export class YoutubeTranscriptProvider implements TranscriptProvider {
  constructor(private readonly options: YoutubeTranscriptProviderOptions = {}) {}

  async fetchCaptions(videoId: string): Promise<CaptionSegment[]> {
    try {
      const rows = await YoutubeTranscript.fetchTranscript(
        videoId,
        this.options.lang ? { lang: this.options.lang } : undefined,
      );

      return toCaptionSegments(rows);
    } catch (error) {
      throw toMissingTranscriptError(videoId, error);
    }
  }
}

function toMissingTranscriptError(videoId: string, error: unknown): unknown {
  if (
    error instanceof YoutubeTranscriptDisabledError ||
    error instanceof YoutubeTranscriptNotAvailableError ||
    error instanceof YoutubeTranscriptVideoUnavailableError
  ) {
    return new MissingTranscriptError(videoId, error.message);
  }

  return error;
}
