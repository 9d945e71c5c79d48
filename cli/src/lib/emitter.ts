import type { SearchHit } from "./types.js";

export function formatHit(hit: SearchHit): string {
  return JSON.stringify(hit._source ?? null);
}

export interface LineSink {
  write(chunk: string): unknown;
}

/** Writes each hit's document body as one line, in the order received. */
export class Emitter {
  private count = 0;

  constructor(private readonly out: LineSink = process.stdout) {}

  get emitted(): number {
    return this.count;
  }

  emit(hits: readonly SearchHit[]): void {
    if (hits.length === 0) return;
    this.out.write(hits.map((hit) => `${formatHit(hit)}\n`).join(""));
    this.count += hits.length;
  }
}
