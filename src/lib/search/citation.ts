import type { Citation, ContextPayload } from "@/types/retrieval";

export function formatTimestamp(seconds: number): string {
  const safe = Number.isFinite(seconds) && seconds > 0 ? Math.floor(seconds) : 0;
  const hours = Math.floor(safe / 3600);
  const minutes = Math.floor((safe % 3600) / 60);
  const remainder = safe % 60;
  const paddedSeconds = String(remainder).padStart(2, "0");

  if (hours > 0) {
    return `${hours}:${String(minutes).padStart(2, "0")}:${paddedSeconds}`;
  }

  return `${minutes}:${paddedSeconds}`;
}

export function buildTimestampUrl(citation: Citation): string {
  const params = new URLSearchParams({ v: citation.videoId, t: `${Math.floor(Math.max(citation.startTime, 0))}s` });
  return `https://www.youtube.com/watch?${params.toString()}`;
}

export function formatCitation(citation: Citation): string {
  return `${citation.videoId} ${formatTimestamp(citation.startTime)}-${formatTimestamp(citation.endTime)}`;
}

/** Numbered context blocks handed to the answer generator. */
export function renderContextBlocks(payload: ContextPayload): string {
  return payload.items
    .map((item, index) => `[${index + 1}] (${formatCitation(item.citation)}) ${item.text}`)
    .join("\n\n");
}
