import { setTimeout as sleep } from "node:timers/promises";
import { describeError, isTransientError } from "./errors.js";
import { logger } from "./logger.js";
import { DEFAULT_BATCH_SIZE, DEFAULT_LATENCY, SearchQueryBuilder, unwrap } from "./query-builder.js";
import type { SnapshotManager } from "./snapshot.js";
import type {
  DocumentBudget,
  ExtractionPlan,
  PaginationCursor,
  SearchBackend,
  SearchHit,
} from "./types.js";

export const POLL_INTERVAL_MS = 1000;
export const MAX_CONSECUTIVE_FAILURES = 5;
export const MAX_RETRY_DELAY_MS = 30_000;

export interface PaginationState {
  readonly cursor?: PaginationCursor;
  readonly remaining: DocumentBudget;
  readonly batches: number;
  readonly consecutiveFailures: number;
}

export function initialState(budget: DocumentBudget, cursor?: PaginationCursor): PaginationState {
  return { cursor, remaining: budget, batches: 0, consecutiveFailures: 0 };
}

export function nextBatchSize(state: PaginationState, batchCap: number = DEFAULT_BATCH_SIZE): number {
  return state.remaining === "unbounded" ? batchCap : Math.min(state.remaining, batchCap);
}

/** Moves the cursor to the last hit and charges the hits against the budget. */
export function advance(state: PaginationState, hits: readonly SearchHit[]): PaginationState {
  const last = hits.at(-1);
  return {
    cursor: last?.sort ?? state.cursor,
    remaining: state.remaining === "unbounded" ? "unbounded" : Math.max(0, state.remaining - hits.length),
    batches: state.batches + 1,
    consecutiveFailures: 0,
  };
}

export function isExhausted(state: PaginationState): boolean {
  return state.remaining === 0;
}

export function retryDelayMs(failures: number, baseMs: number = POLL_INTERVAL_MS): number {
  return Math.min(baseMs * 2 ** Math.max(0, failures - 1), MAX_RETRY_DELAY_MS);
}

export interface PaginatorOptions {
  backend: SearchBackend;
  index: string;
  plan: ExtractionPlan;
  snapshot: SnapshotManager;
  emit: (hits: readonly SearchHit[]) => void;
  startCursor?: PaginationCursor;
  batchSize?: number;
  pollIntervalMs?: number;
  maxConsecutiveFailures?: number;
  signal?: AbortSignal;
  /** Injectable for tests; resolves early when the signal aborts. */
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

async function defaultWait(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error: unknown) {
    if (!signal?.aborted) throw error;
  }
}

/**
 * Everything of the forward request that stays fixed for the whole run. The
 * time range is resolved here once; only size and cursor change per page.
 */
function buildForwardBase(plan: ExtractionPlan): SearchQueryBuilder {
  const base = new SearchQueryBuilder()
    .withSortOrder(plan.sortOrder)
    .withSourceFields(plan.selectFields)
    .withQueryMatch(plan.matchClause);
  return unwrap(base.withTimeRange(plan.timeWindow.from, plan.timeWindow.to, DEFAULT_LATENCY));
}

/**
 * The extraction loop. Bounded plans stop once the budget is spent or a page
 * comes back empty; polling plans run until the signal aborts.
 */
export async function paginate(options: PaginatorOptions): Promise<PaginationState> {
  const { backend, index, plan, snapshot, emit, signal } = options;
  const batchCap = options.batchSize ?? DEFAULT_BATCH_SIZE;
  const pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_MS;
  const maxFailures = options.maxConsecutiveFailures ?? MAX_CONSECUTIVE_FAILURES;
  const wait = options.wait ?? defaultWait;

  const forward = buildForwardBase(plan);
  let state = initialState(plan.totalDocumentBudget, options.startCursor);

  while (!signal?.aborted && !isExhausted(state)) {
    const body = forward.withSize(nextBatchSize(state, batchCap)).withSearchAfter(state.cursor).build();

    let hits: SearchHit[];
    try {
      // a failed refresh leaves the snapshot closed; reopen before searching
      if (plan.pollBetweenBatches && plan.needsSnapshot && !snapshot.isOpen) {
        await snapshot.refresh();
      }
      ({ hits } = await backend.search(index, snapshot.attach(body), signal));
    } catch (error: unknown) {
      if (signal?.aborted) break;
      if (!plan.pollBetweenBatches || !isTransientError(error)) throw error;

      const failures = state.consecutiveFailures + 1;
      if (failures >= maxFailures) throw error;
      state = { ...state, consecutiveFailures: failures };

      const delay = retryDelayMs(failures, pollIntervalMs);
      logger.warn(`Search failed (${describeError(error)}), retrying in ${delay}ms`);
      await wait(delay, signal);
      continue;
    }

    if (hits.length === 0 && !plan.pollBetweenBatches) {
      break;
    }

    emit(hits);
    state = advance(state, hits);
    logger.debug("Batch done", { batch: state.batches, hits: hits.length });

    if (!plan.pollBetweenBatches) continue;

    if (plan.needsSnapshot) {
      try {
        await snapshot.refresh();
      } catch (error: unknown) {
        if (!isTransientError(error)) throw error;
        logger.warn(`Failed to refresh point in time: ${describeError(error)}`);
      }
    }
    await wait(pollIntervalMs, signal);
  }

  return state;
}
