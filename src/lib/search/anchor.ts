import { extractTerms, normalizeToken, tokenizeWords } from "@/lib/pipeline/tokens";
import type { TimeSpan, UnitRecord } from "@/types/retrieval";

export function tokenizeQuery(query: string): string[] {
  return extractTerms(query);
}

/**
 * Picks the caption inside a unit that carries the most query-term hits; the
 * earliest caption wins ties. Falls back to the whole unit span when no
 * caption shares a term with the query.
 */
export function findAnchorSpan(unit: UnitRecord, queryTerms: string[]): TimeSpan {
  const fallback = { startTime: unit.startTime, endTime: unit.endTime };

  if (queryTerms.length === 0 || unit.captionSpans.length === 0) {
    return fallback;
  }

  const termSet = new Set(queryTerms);
  let best: { span: TimeSpan; hits: number } | null = null;

  for (const span of unit.captionSpans) {
    const captionText = unit.text.slice(span.charStart, span.charEnd);
    const hits = tokenizeWords(captionText).filter((word) => termSet.has(normalizeToken(word))).length;

    if (hits > 0 && (best === null || hits > best.hits)) {
      best = { span: { startTime: span.startTime, endTime: span.endTime }, hits };
    }
  }

  return best?.span ?? fallback;
}
