import type { SearchFilters, UnitRecord } from "@/types/retrieval";

export function hasActiveFilters(filters?: SearchFilters): filters is SearchFilters {
  if (!filters) {
    return false;
  }

  return (
    (filters.entities?.length ?? 0) > 0 ||
    (filters.videoIds?.length ?? 0) > 0 ||
    Boolean(filters.publishedAfter) ||
    Boolean(filters.publishedBefore)
  );
}

export function compileFilter(filters: SearchFilters): (entry: UnitRecord) => boolean {
  const entities = filters.entities?.length ? new Set(filters.entities.map((value) => value.toLowerCase())) : null;
  const videoIds = filters.videoIds?.length ? new Set(filters.videoIds) : null;
  const after = parseBound(filters.publishedAfter, "publishedAfter");
  const before = parseBound(filters.publishedBefore, "publishedBefore");

  return (entry) => {
    if (videoIds && !videoIds.has(entry.videoId)) {
      return false;
    }

    if (entities && !entry.entities.some((entity) => entities.has(entity))) {
      return false;
    }

    if (after !== null || before !== null) {
      const published = Date.parse(entry.publishedAt);

      if (Number.isNaN(published)) {
        return false;
      }

      if (after !== null && published < after) {
        return false;
      }

      if (before !== null && published > before) {
        return false;
      }
    }

    return true;
  };
}

function parseBound(value: string | undefined, label: string): number | null {
  if (!value) {
    return null;
  }

  const parsed = Date.parse(value);

  if (Number.isNaN(parsed)) {
    throw new Error(`Invalid ${label} date: ${value}`);
  }

  return parsed;
}
