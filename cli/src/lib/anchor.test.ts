import { describe, it, expect } from "vitest";
import { resolveStartCursor, probeSortOrder } from "./anchor.js";
import { SearchServiceError } from "./errors.js";
import { FakeSearchBackend } from "./fake-backend.js";
import { resolveExtractionPlan } from "./params.js";
import { SnapshotManager } from "./snapshot.js";

describe("probeSortOrder", () => {
  it("should reverse time and tiebreaker", () => {
    expect(probeSortOrder(true)).toEqual([{ "@timestamp": { order: "desc" } }, { _shard_doc: { order: "desc" } }]);
    expect(probeSortOrder(false)).toEqual([{ "@timestamp": { order: "desc" } }]);
  });
});

describe("resolveStartCursor", () => {
  it("should not probe without an anchor", async () => {
    const backend = new FakeSearchBackend();
    const plan = resolveExtractionPlan({ from: "2024-01-01" });

    const cursor = await resolveStartCursor(backend, "logs", plan, new SnapshotManager(backend));

    expect(cursor).toBeUndefined();
    expect(backend.searches).toHaveLength(0);
  });

  it("should probe back half the window from the around time", async () => {
    const backend = new FakeSearchBackend(() => [
      { sort: [600, 6] },
      { sort: [500, 5] },
      { sort: [400, 4] },
      { sort: [300, 3] },
      { sort: [200, 2] },
      { sort: [100, 1] },
    ]);
    const snapshot = new SnapshotManager(backend);
    await snapshot.open("logs");
    const plan = resolveExtractionPlan({ around: "2024-01-01T12:00:00Z", lines: 10, where: "level:error" });

    const cursor = await resolveStartCursor(backend, "logs", plan, snapshot);

    expect(cursor).toEqual([100, 1]);
    expect(backend.searches).toHaveLength(1);
    expect(backend.searches[0].body).toEqual({
      sort: [{ "@timestamp": { order: "desc" } }, { _shard_doc: { order: "desc" } }],
      size: 6,
      _source: false,
      query: {
        bool: {
          must: [{ range: { "@timestamp": { lt: "2024-01-01T12:00:00.000Z" } } }, { match: { level: "error" } }],
        },
      },
      pit: { id: "pit-1", keep_alive: "1m" },
    });
  });

  it("should probe from the live edge when there is no reference time", async () => {
    const backend = new FakeSearchBackend(() => [{ sort: [70] }, { sort: [60] }, { sort: [50] }, { sort: [40] }]);
    const plan = resolveExtractionPlan({ lines: 3 });

    const cursor = await resolveStartCursor(backend, "logs", plan, new SnapshotManager(backend));

    expect(cursor).toEqual([40]);
    expect(backend.searches[0].body).toEqual({
      sort: [{ "@timestamp": { order: "desc" } }],
      size: 4,
      _source: false,
      query: { range: { "@timestamp": { lt: "now-1m" } } },
    });
  });

  it("should start from the first document when fewer exist than the window", async () => {
    const backend = new FakeSearchBackend(() => [{ sort: [30] }, { sort: [20] }, { sort: [10] }]);
    const plan = resolveExtractionPlan({ lines: 10 });

    expect(await resolveStartCursor(backend, "logs", plan, new SnapshotManager(backend))).toBeUndefined();
    expect(backend.searches[0].body.size).toBe(11);
  });

  it("should return nothing when the probe finds no hits", async () => {
    const backend = new FakeSearchBackend(() => []);
    const plan = resolveExtractionPlan({ to: "2024-01-01" });

    expect(await resolveStartCursor(backend, "logs", plan, new SnapshotManager(backend))).toBeUndefined();
  });

  it("should return nothing when the probe fails", async () => {
    const backend = new FakeSearchBackend(() => new SearchServiceError(500, "Search failed: 500"));
    const plan = resolveExtractionPlan({ to: "2024-01-01" });

    expect(await resolveStartCursor(backend, "logs", plan, new SnapshotManager(backend))).toBeUndefined();
    expect(backend.searches).toHaveLength(1);
  });

  it("should return nothing when the anchor date does not parse", async () => {
    const backend = new FakeSearchBackend(() => [{ sort: [1] }]);
    const plan = resolveExtractionPlan({ around: "xyzzy" });

    expect(await resolveStartCursor(backend, "logs", plan, new SnapshotManager(backend))).toBeUndefined();
    expect(backend.searches).toHaveLength(0);
  });
});
