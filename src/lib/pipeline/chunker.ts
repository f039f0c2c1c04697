import { MissingTranscriptError } from "@/lib/errors";
import { countTokens } from "@/lib/pipeline/tokens";
import type {
  CanonicalTranscriptSegment,
  ChunkSizeUnit,
  ChunkingResult,
  TranscriptGap,
} from "@/lib/pipeline/types";
import type { CaptionSpan, UnitDraft } from "@/types/retrieval";

export type ChunkingOptions = {
  minSize?: number;
  maxSize?: number;
  sizeUnit?: ChunkSizeUnit;
  gapToleranceSec?: number;
  backtrackSegments?: number;
};

export type ResolvedChunkingOptions = Required<ChunkingOptions>;

export const DEFAULT_CHUNKING_OPTIONS: ResolvedChunkingOptions = {
  minSize: 400,
  maxSize: 800,
  sizeUnit: "tokens",
  gapToleranceSec: 10,
  backtrackSegments: 4,
};

const SENTENCE_END_PATTERN = /[.!?…]["'”’)\]]*$/u;

export function resolveChunkingOptions(options: ChunkingOptions = {}): ResolvedChunkingOptions {
  const resolved: ResolvedChunkingOptions = {
    minSize: options.minSize ?? DEFAULT_CHUNKING_OPTIONS.minSize,
    maxSize: options.maxSize ?? DEFAULT_CHUNKING_OPTIONS.maxSize,
    sizeUnit: options.sizeUnit ?? DEFAULT_CHUNKING_OPTIONS.sizeUnit,
    gapToleranceSec: options.gapToleranceSec ?? DEFAULT_CHUNKING_OPTIONS.gapToleranceSec,
    backtrackSegments: options.backtrackSegments ?? DEFAULT_CHUNKING_OPTIONS.backtrackSegments,
  };

  if (resolved.minSize < 0 || resolved.maxSize <= 0 || resolved.minSize > resolved.maxSize) {
    throw new Error("Invalid chunking min/max settings");
  }

  if (resolved.gapToleranceSec < 0 || resolved.backtrackSegments < 0) {
    throw new Error("Invalid chunking gap/backtrack settings");
  }

  return resolved;
}

export function buildUnitId(videoId: string, sequenceIndex: number): string {
  return `${videoId}:${sequenceIndex}`;
}

/**
 * Groups consecutive captions into retrievable units.
 *
 * A unit closes when the next caption would push it past `maxSize` (cutting at
 * the latest sentence end within `backtrackSegments` when the head still meets
 * `minSize`), when the next caption starts more than `gapToleranceSec` after
 * the previous one ends, or when the transcript ends. A unit that would close
 * on size while still under `minSize` keeps absorbing captions instead.
 */
export function buildSemanticUnits(
  videoId: string,
  segments: CanonicalTranscriptSegment[],
  options: ChunkingOptions = {},
): ChunkingResult {
  if (segments.length === 0) {
    throw new MissingTranscriptError(videoId);
  }

  const settings = resolveChunkingOptions(options);
  const measure = (segment: CanonicalTranscriptSegment) =>
    settings.sizeUnit === "tokens" ? countTokens(segment.text) : segment.endTime - segment.startTime;

  const ordered = [...segments].sort((left, right) => left.startTime - right.startTime || left.seq - right.seq);
  const groups: CanonicalTranscriptSegment[][] = [];
  const gapAfterGroup = new Map<number, { startTime: number; endTime: number }>();

  let buffer: CanonicalTranscriptSegment[] = [];

  for (const segment of ordered) {
    const size = measure(segment);

    if (buffer.length > 0) {
      const last = buffer[buffer.length - 1];

      if (segment.startTime - last.endTime > settings.gapToleranceSec) {
        groups.push(buffer);
        gapAfterGroup.set(groups.length - 1, { startTime: last.endTime, endTime: segment.startTime });
        buffer = [];
      } else {
        const bufferSize = sumSizes(buffer, measure);

        if (bufferSize + size > settings.maxSize && bufferSize >= settings.minSize) {
          const cut = findSentenceCut(buffer, size, settings, measure);
          groups.push(buffer.slice(0, cut));
          buffer = buffer.slice(cut);
        }
      }
    }

    buffer.push(segment);
  }

  if (buffer.length > 0) {
    groups.push(buffer);
  }

  const units = groups.map((group, index) => toUnitDraft(videoId, index, group));
  const gaps: TranscriptGap[] = [];

  for (const [groupIndex, gap] of gapAfterGroup) {
    gaps.push({ afterSequenceIndex: groupIndex, ...gap });
  }

  return { units, gaps };
}

function findSentenceCut(
  buffer: CanonicalTranscriptSegment[],
  incomingSize: number,
  settings: ResolvedChunkingOptions,
  measure: (segment: CanonicalTranscriptSegment) => number,
): number {
  const lowest = Math.max(1, buffer.length - settings.backtrackSegments);

  for (let cut = buffer.length; cut >= lowest; cut -= 1) {
    if (!SENTENCE_END_PATTERN.test(buffer[cut - 1].text)) {
      continue;
    }

    const headSize = sumSizes(buffer.slice(0, cut), measure);
    const tailSize = sumSizes(buffer.slice(cut), measure);

    if (headSize >= settings.minSize && tailSize + incomingSize <= settings.maxSize) {
      return cut;
    }
  }

  return buffer.length;
}

function toUnitDraft(videoId: string, sequenceIndex: number, group: CanonicalTranscriptSegment[]): UnitDraft {
  const captionSpans: CaptionSpan[] = [];
  let text = "";

  for (const segment of group) {
    if (text.length > 0) {
      text += " ";
    }

    const charStart = text.length;
    text += segment.text;
    captionSpans.push({
      startTime: segment.startTime,
      endTime: segment.endTime,
      charStart,
      charEnd: text.length,
    });
  }

  return {
    unitId: buildUnitId(videoId, sequenceIndex),
    videoId,
    sequenceIndex,
    startTime: Math.min(...group.map((segment) => segment.startTime)),
    endTime: Math.max(...group.map((segment) => segment.endTime)),
    text,
    tokenCount: countTokens(text),
    captionSpans,
  };
}

function sumSizes(
  segments: CanonicalTranscriptSegment[],
  measure: (segment: CanonicalTranscriptSegment) => number,
): number {
  return segments.reduce((sum, segment) => sum + measure(segment), 0);
}
