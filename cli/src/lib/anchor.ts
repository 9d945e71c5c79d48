import { describeError } from "./errors.js";
import { logger } from "./logger.js";
import { DEFAULT_LATENCY, SearchQueryBuilder, TIEBREAKER_FIELD, TIMESTAMP_FIELD } from "./query-builder.js";
import type { SnapshotManager } from "./snapshot.js";
import type { ExtractionPlan, PaginationCursor, SearchBackend, SortClause } from "./types.js";

export function probeSortOrder(withTiebreaker: boolean): SortClause[] {
  const order: SortClause[] = [{ [TIMESTAMP_FIELD]: { order: "desc" } }];
  if (withTiebreaker) {
    order.push({ [TIEBREAKER_FIELD]: { order: "desc" } });
  }
  return order;
}

/**
 * Finds where forward pagination should start for "N lines around/up to T".
 *
 * One reverse-sorted probe walks back `probeSize` documents from the anchor
 * (or from the live edge when there is no anchor). The last hit of that probe
 * is the document just before the window, and its sort key becomes the
 * `search_after` of the first forward page. A short probe means the window
 * reaches back to the first matching document, so there is no cursor.
 */
export async function resolveStartCursor(
  backend: SearchBackend,
  index: string,
  plan: ExtractionPlan,
  snapshot: SnapshotManager,
  signal?: AbortSignal,
): Promise<PaginationCursor | undefined> {
  const anchor = plan.anchor;
  if (!anchor || anchor.probeSize <= 0) return undefined;

  const ranged = new SearchQueryBuilder()
    .withSortOrder(probeSortOrder(snapshot.isOpen))
    .withSize(anchor.probeSize)
    .withSourceFields([])
    .withQueryMatch(plan.matchClause)
    .withTimeRange(undefined, anchor.referenceTime, DEFAULT_LATENCY);

  if (!ranged.ok) {
    logger.debug(`Anchor probe skipped: ${ranged.error.message}`);
    return undefined;
  }

  try {
    const response = await backend.search(index, snapshot.attach(ranged.value.build()), signal);
    logger.debug("Anchor probe finished", { hits: response.hits.length });
    // fewer documents than the window exist before the anchor: start from the first one
    if (response.hits.length < anchor.probeSize) return undefined;
    return response.hits.at(-1)?.sort;
  } catch (error: unknown) {
    if (signal?.aborted) throw error;
    logger.debug(`Anchor probe failed: ${describeError(error)}`);
    return undefined;
  }
}
