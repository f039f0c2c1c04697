import type { ContextItem, ContextPayload, ResultItem, ResultSet, RetrievalReason } from "@/types/retrieval";

export type AssembleContextOptions = {
  maxContextTokens: number;
};

const REASON_RANK: Record<RetrievalReason, number> = {
  match: 0,
  neighbor: 1,
};

/**
 * Orders matches ahead of neighbors and by score, keeps one copy per unit and
 * fills the token budget greedily. Units that do not fit are counted as
 * dropped; smaller units further down may still be included.
 */
export function assembleContext(resultSet: ResultSet, options: AssembleContextOptions): ContextPayload {
  const budget = Math.max(0, Math.floor(options.maxContextTokens));
  const ranked = dedupeByUnit(resultSet.items).sort(compareResultItems);

  const items: ContextItem[] = [];
  let totalTokens = 0;
  let droppedCount = 0;

  for (const item of ranked) {
    if (totalTokens + item.unit.tokenCount > budget) {
      droppedCount += 1;
      continue;
    }

    totalTokens += item.unit.tokenCount;
    items.push(toContextItem(item));
  }

  return {
    question: resultSet.question,
    items,
    totalTokens,
    maxContextTokens: budget,
    truncated: droppedCount > 0,
    droppedCount,
  };
}

function dedupeByUnit(items: ResultItem[]): ResultItem[] {
  const byUnit = new Map<string, ResultItem>();

  for (const item of items) {
    const existing = byUnit.get(item.unit.unitId);

    if (!existing || compareResultItems(item, existing) < 0) {
      byUnit.set(item.unit.unitId, item);
    }
  }

  return Array.from(byUnit.values());
}

function compareResultItems(left: ResultItem, right: ResultItem): number {
  const reasonDelta = REASON_RANK[left.reason] - REASON_RANK[right.reason];
  if (reasonDelta !== 0) {
    return reasonDelta;
  }

  if (right.score !== left.score) {
    return right.score - left.score;
  }

  if (left.unit.videoId !== right.unit.videoId) {
    return left.unit.videoId.localeCompare(right.unit.videoId);
  }

  return left.unit.sequenceIndex - right.unit.sequenceIndex;
}

function toContextItem(item: ResultItem): ContextItem {
  return {
    unitId: item.unit.unitId,
    videoId: item.unit.videoId,
    sequenceIndex: item.unit.sequenceIndex,
    text: item.unit.text,
    tokenCount: item.unit.tokenCount,
    score: item.score,
    reason: item.reason,
    citation: {
      videoId: item.unit.videoId,
      startTime: item.anchor.startTime,
      endTime: item.anchor.endTime,
    },
    span: {
      startTime: item.unit.startTime,
      endTime: item.unit.endTime,
    },
  };
}
