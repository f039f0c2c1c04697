import type { IndexStore } from "@/lib/index-store/types";
import type { EntityExtractor } from "@/lib/pipeline/entities";
import type { IndexEntry } from "@/types/retrieval";

export type ReprocessEntitiesResult = {
  repairedUnitIds: string[];
  stillPendingUnitIds: string[];
};

/**
 * Re-runs entity extraction for units ingested with a failed extraction and
 * writes each repaired unit back as a full replacement entry.
 */
export async function reprocessPendingEntities(
  store: IndexStore,
  extractor: EntityExtractor,
  logger: (message: string) => void = () => undefined,
): Promise<ReprocessEntitiesResult> {
  const repaired: IndexEntry[] = [];
  const stillPendingUnitIds: string[] = [];

  for (const entry of store.listPendingEntityUnits()) {
    try {
      const entities = await extractor.extract(entry.text);
      repaired.push({ ...entry, entities, entitiesPending: false });
    } catch (error) {
      stillPendingUnitIds.push(entry.unitId);
      const message = error instanceof Error ? error.message : "unknown error";
      logger(`[warn] ${entry.unitId} EntityExtractionFailure ${message}`);
    }
  }

  if (repaired.length > 0) {
    await store.upsert(repaired);
  }

  logger(`[entities] repaired=${repaired.length} pending=${stillPendingUnitIds.length}`);

  return {
    repairedUnitIds: repaired.map((entry) => entry.unitId),
    stillPendingUnitIds,
  };
}
