import type { SearchBackend, SearchHit, SearchRequestBody, SearchResponse } from "./types.js";

export type FakeResponder = (body: SearchRequestBody, call: number) => SearchHit[] | Error;

/**
 * In-process stand-in for the search service. Records every request and
 * answers searches from a scripted responder.
 */
export class FakeSearchBackend implements SearchBackend {
  readonly searches: Array<{ index: string; body: SearchRequestBody }> = [];
  readonly opened: string[] = [];
  readonly closed: string[] = [];
  closeError?: Error;
  private pitCounter = 0;

  constructor(private readonly respond: FakeResponder = () => []) {}

  async search(index: string, body: SearchRequestBody): Promise<SearchResponse> {
    const call = this.searches.length;
    this.searches.push({ index, body });
    const result = this.respond(body, call);
    if (result instanceof Error) throw result;
    return { hits: result };
  }

  async openPointInTime(_index: string, _keepAlive: string): Promise<string> {
    this.pitCounter += 1;
    const id = `pit-${this.pitCounter}`;
    this.opened.push(id);
    return id;
  }

  async closePointInTime(id: string): Promise<void> {
    this.closed.push(id);
    if (this.closeError) throw this.closeError;
  }
}

/** `count` hits numbered from `start`, each sorted by `[n, n]`. */
export function makeHits(start: number, count: number): SearchHit[] {
  return Array.from({ length: count }, (_, i) => ({
    _id: `doc-${start + i}`,
    _source: { n: start + i },
    sort: [start + i, start + i],
  }));
}
