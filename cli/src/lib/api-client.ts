import { ConfigError, NetworkError, ParseError, SearchServiceError } from "./errors.js";
import type {
  ConnectionConfig,
  IndexInfo,
  SearchBackend,
  SearchHit,
  SearchRequestBody,
  SearchResponse,
} from "./types.js";

export const PIT_KEEP_ALIVE = "1m";

function baseUrl(conn: ConnectionConfig): string {
  return conn.url.replace(/\/+$/, "");
}

function authHeaders(conn: ConnectionConfig): Record<string, string> {
  if (!conn.username || conn.password === undefined) return {};
  const encoded = Buffer.from(`${conn.username}:${conn.password}`).toString("base64");
  return { authorization: `Basic ${encoded}` };
}

async function send(url: string, init: RequestInit): Promise<Response> {
  try {
    return await fetch(url, init);
  } catch (error: unknown) {
    if (error instanceof Error && error.name === "AbortError") throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw new NetworkError(`Request to ${url} failed: ${message}`);
  }
}

async function readJson(res: Response, what: string): Promise<unknown> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new ParseError(`Failed to parse ${what} response: ${text.slice(0, 200)}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseSearchResponse(payload: unknown): SearchResponse {
  const hits = isRecord(payload) && isRecord(payload.hits) ? payload.hits.hits : undefined;
  if (!Array.isArray(hits)) {
    throw new ParseError("Search response has no hits.hits array");
  }

  return {
    hits: hits.map((hit: unknown): SearchHit => {
      if (!isRecord(hit)) {
        throw new ParseError("Search response contains a malformed hit");
      }
      return {
        _index: typeof hit._index === "string" ? hit._index : undefined,
        _id: typeof hit._id === "string" ? hit._id : undefined,
        _source: hit._source,
        sort: Array.isArray(hit.sort) ? hit.sort : undefined,
      };
    }),
  };
}

/**
 * Runs a search. With a point in time in the body the index is implied by the
 * PIT and the request goes to `/_search`.
 */
export async function search(
  conn: ConnectionConfig,
  index: string,
  body: SearchRequestBody,
  signal?: AbortSignal,
): Promise<SearchResponse> {
  const url = body.pit
    ? `${baseUrl(conn)}/_search`
    : `${baseUrl(conn)}/${encodeURIComponent(index)}/_search`;

  const res = await send(url, {
    method: "POST",
    headers: { "content-type": "application/json", ...authHeaders(conn) },
    body: JSON.stringify(body),
    signal,
  });
  if (!res.ok) throw new SearchServiceError(res.status, `Search failed: ${res.status} ${await res.text()}`);
  return parseSearchResponse(await readJson(res, "search"));
}

export async function openPointInTime(
  conn: ConnectionConfig,
  index: string,
  keepAlive: string = PIT_KEEP_ALIVE,
): Promise<string> {
  const url = `${baseUrl(conn)}/${encodeURIComponent(index)}/_pit?keep_alive=${encodeURIComponent(keepAlive)}`;
  const res = await send(url, { method: "POST", headers: authHeaders(conn) });
  if (!res.ok) {
    throw new SearchServiceError(res.status, `Failed to open point in time: ${res.status} ${await res.text()}`);
  }

  const payload = await readJson(res, "point in time");
  if (!isRecord(payload) || typeof payload.id !== "string" || !payload.id) {
    throw new ParseError("Invalid point in time response: missing id");
  }
  return payload.id;
}

export async function closePointInTime(conn: ConnectionConfig, id: string): Promise<void> {
  const res = await send(`${baseUrl(conn)}/_pit`, {
    method: "DELETE",
    headers: { "content-type": "application/json", ...authHeaders(conn) },
    body: JSON.stringify({ id }),
  });
  if (!res.ok) {
    throw new SearchServiceError(res.status, `Failed to close point in time: ${res.status} ${await res.text()}`);
  }
}

export async function listIndices(conn: ConnectionConfig): Promise<IndexInfo[]> {
  const res = await send(`${baseUrl(conn)}/_cat/indices?format=json`, {
    method: "GET",
    headers: authHeaders(conn),
  });
  if (!res.ok) {
    throw new SearchServiceError(res.status, `Failed to list indices: ${res.status} ${await res.text()}`);
  }

  const payload = await readJson(res, "index list");
  if (!Array.isArray(payload)) {
    throw new ParseError("Failed to parse indices: expected an array");
  }
  return payload.filter(
    (entry: unknown): entry is IndexInfo => isRecord(entry) && typeof entry.index === "string",
  );
}

export type ConnectionCheck = "ok" | "unauthorized";

/**
 * Probes `/_cat`, which every Elasticsearch-compatible server answers with a
 * plain-text list of `/_cat/...` endpoints.
 */
export async function checkConnection(conn: ConnectionConfig): Promise<ConnectionCheck> {
  const res = await send(`${baseUrl(conn)}/_cat`, { method: "GET", headers: authHeaders(conn) });
  if (res.status === 401 || res.status === 403) return "unauthorized";
  if (!res.ok) {
    throw new SearchServiceError(res.status, `Connection check failed: ${res.status} ${await res.text()}`);
  }

  const text = await res.text();
  if (!text.includes("/_cat/")) {
    throw new ConfigError("The server doesn't appear to be an Elasticsearch instance");
  }
  return "ok";
}

export function createSearchBackend(conn: ConnectionConfig): SearchBackend {
  return {
    search: (index, body, signal) => search(conn, index, body, signal),
    openPointInTime: (index, keepAlive) => openPointInTime(conn, index, keepAlive),
    closePointInTime: (id) => closePointInTime(conn, id),
  };
}
