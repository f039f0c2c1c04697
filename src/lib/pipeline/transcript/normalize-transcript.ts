import type { CanonicalTranscriptSegment, RawTranscriptSegment } from "@/lib/pipeline/types";
import type { CaptionSegment } from "@/types/retrieval";

export function toCaptionSegments(rawSegments: RawTranscriptSegment[]): CaptionSegment[] {
  return rawSegments.map((row) => {
    const startTime = sanitizeNumber(row.offset);

    return {
      startTime,
      endTime: startTime + sanitizeNumber(row.duration),
      text: typeof row.text === "string" ? row.text : "",
    };
  });
}

/**
 * Orders captions, drops empty or zero-length rows and trims each caption's
 * start to the previous caption's end so spans never overlap.
 */
export function normalizeCaptions(videoId: string, captions: CaptionSegment[]): CanonicalTranscriptSegment[] {
  const ordered = captions
    .map((row, index) => ({
      index,
      startTime: sanitizeNumber(row.startTime),
      endTime: sanitizeNumber(row.endTime),
      text: typeof row.text === "string" ? row.text.replace(/\s+/g, " ").trim() : "",
    }))
    .sort((left, right) => left.startTime - right.startTime || left.index - right.index);

  const normalized: CanonicalTranscriptSegment[] = [];
  let previousEnd = 0;

  for (const row of ordered) {
    if (!row.text) {
      continue;
    }

    const startTime = Math.max(row.startTime, previousEnd);
    const endTime = row.endTime;

    if (endTime <= startTime) {
      continue;
    }

    normalized.push({
      videoId,
      seq: normalized.length,
      startTime,
      endTime,
      duration: endTime - startTime,
      text: row.text,
    });

    previousEnd = endTime;
  }

  return normalized;
}

function sanitizeNumber(value: unknown): number {
  if (typeof value !== "number" || Number.isNaN(value) || !Number.isFinite(value)) {
    return 0;
  }

  if (value < 0) {
    return 0;
  }

  return value;
}
