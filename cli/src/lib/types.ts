export type SortDirection = "asc" | "desc";

export type SortClause = Record<string, { order: SortDirection }>;

export type SearchQuery = Record<string, unknown>;

/** Sort-key tuple of a hit; used as `search_after` for the next page. */
export type PaginationCursor = unknown[];

export interface SearchRequestBody {
  sort: SortClause[];
  size: number;
  _source?: boolean | string[];
  search_after?: PaginationCursor;
  query?: SearchQuery;
  pit?: { id: string; keep_alive: string };
}

export interface SearchHit {
  _index?: string;
  _id?: string;
  _source?: unknown;
  sort?: PaginationCursor;
}

export interface SearchResponse {
  hits: SearchHit[];
}

export interface IndexInfo {
  index: string;
  health?: string;
  status?: string;
  "docs.count"?: string;
}

export interface ConnectionConfig {
  url: string;
  username?: string;
  password?: string;
}

/**
 * Operations the extraction engine needs from the search service. The real
 * implementation lives in api-client.ts; tests substitute an in-memory one.
 */
export interface SearchBackend {
  search(index: string, body: SearchRequestBody, signal?: AbortSignal): Promise<SearchResponse>;
  openPointInTime(index: string, keepAlive: string): Promise<string>;
  closePointInTime(id: string): Promise<void>;
}

export type ExtractionMode = "around" | "to" | "from" | "from+to" | "follow" | "none";

export type DocumentBudget = number | "unbounded";

export interface WhereFilter {
  field: string;
  value: string;
}

export interface AnchorSpec {
  referenceTime?: string;
  probeSize: number;
}

export interface ExtractionPlan {
  readonly mode: ExtractionMode;
  readonly needsSnapshot: boolean;
  readonly totalDocumentBudget: DocumentBudget;
  readonly matchClause?: SearchQuery;
  readonly anchor?: AnchorSpec;
  readonly sortOrder: readonly SortClause[];
  readonly pollBetweenBatches: boolean;
  readonly selectFields?: readonly string[];
  readonly timeWindow: { readonly from?: string; readonly to?: string };
}

export type Result<T, E = Error> = { ok: true; value: T } | { ok: false; error: E };
