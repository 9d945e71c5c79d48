import { parseDateTime, toRfc3339 } from "./dates.js";
import { DateParseError } from "./errors.js";
import type {
  PaginationCursor,
  Result,
  SearchQuery,
  SearchRequestBody,
  SortClause,
} from "./types.js";

export const TIMESTAMP_FIELD = "@timestamp";
export const TIEBREAKER_FIELD = "_shard_doc";
export const DEFAULT_BATCH_SIZE = 1000;
export const DEFAULT_LATENCY = "1m";

export const ASC_BY_TIME: readonly SortClause[] = [{ [TIMESTAMP_FIELD]: { order: "asc" } }];
export const ASC_BY_TIME_WITH_TIEBREAKER: readonly SortClause[] = [
  { [TIMESTAMP_FIELD]: { order: "asc" } },
  { [TIEBREAKER_FIELD]: { order: "asc" } },
];

interface BuilderState {
  sortOrder: readonly SortClause[];
  size: number;
  sourceFields?: readonly string[];
  searchAfter?: PaginationCursor;
  queryRange?: SearchQuery;
  queryMatch?: SearchQuery;
}

/**
 * Immutable builder for `_search` bodies. Every `with*` call returns a new
 * builder, so a partially configured builder can be shared between batches.
 */
export class SearchQueryBuilder {
  private readonly state: BuilderState;

  constructor(state: BuilderState = { sortOrder: ASC_BY_TIME, size: DEFAULT_BATCH_SIZE }) {
    this.state = state;
  }

  private with(patch: Partial<BuilderState>): SearchQueryBuilder {
    return new SearchQueryBuilder({ ...this.state, ...patch });
  }

  withSortOrder(sortOrder: readonly SortClause[]): SearchQueryBuilder {
    return this.with({ sortOrder });
  }

  withSize(size: number): SearchQueryBuilder {
    if (!Number.isInteger(size) || size <= 0) {
      throw new RangeError(`Search size must be a positive integer, got ${size}`);
    }
    return this.with({ size });
  }

  /** `[]` fetches no document body, `undefined` fetches all of it. */
  withSourceFields(sourceFields: readonly string[] | undefined): SearchQueryBuilder {
    return this.with({ sourceFields });
  }

  withSearchAfter(searchAfter: PaginationCursor | undefined): SearchQueryBuilder {
    return this.with({ searchAfter });
  }

  withQueryMatch(queryMatch: SearchQuery | undefined): SearchQueryBuilder {
    return this.with({ queryMatch });
  }

  /**
   * Half-open `[from, to)` range on the timestamp field. Without `to`, the
   * upper bound trails the server clock by `latency` so documents still being
   * indexed are not read.
   */
  withTimeRange(
    from: string | undefined,
    to: string | undefined,
    latency: string = DEFAULT_LATENCY,
  ): Result<SearchQueryBuilder, DateParseError> {
    const bounds: Record<string, string> = {};

    if (from !== undefined) {
      const parsed = parseDateTime(from);
      if (!parsed) {
        return { ok: false, error: new DateParseError(`Invalid from date: ${from}`) };
      }
      bounds.gte = toRfc3339(parsed);
    }

    if (to !== undefined) {
      const parsed = parseDateTime(to);
      if (!parsed) {
        return { ok: false, error: new DateParseError(`Invalid to date: ${to}`) };
      }
      bounds.lt = toRfc3339(parsed);
    } else {
      bounds.lt = `now-${latency}`;
    }

    return { ok: true, value: this.with({ queryRange: { range: { [TIMESTAMP_FIELD]: bounds } } }) };
  }

  build(): SearchRequestBody {
    const { sortOrder, size, sourceFields, searchAfter, queryRange, queryMatch } = this.state;
    const body: SearchRequestBody = {
      sort: sortOrder.map((clause) => ({ ...clause })),
      size,
    };

    if (sourceFields !== undefined) {
      body._source = sourceFields.length === 0 ? false : [...sourceFields];
    }

    if (searchAfter !== undefined) {
      body.search_after = [...searchAfter];
    }

    if (queryRange && queryMatch) {
      body.query = { bool: { must: [queryRange, queryMatch] } };
    } else if (queryRange) {
      body.query = queryRange;
    } else if (queryMatch) {
      body.query = queryMatch;
    }

    return body;
  }
}

/** Unwraps a builder step, throwing its error. */
export function unwrap<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw result.error;
  return result.value;
}
