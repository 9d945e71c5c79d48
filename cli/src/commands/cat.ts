import type { Command } from "commander";
import { resolveStartCursor } from "../lib/anchor.js";
import { createSearchBackend } from "../lib/api-client.js";
import { loadConnection } from "../lib/config.js";
import { Emitter } from "../lib/emitter.js";
import type { LineSink } from "../lib/emitter.js";
import { ValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { paginate } from "../lib/paginator.js";
import type { PaginationState } from "../lib/paginator.js";
import { DEFAULT_NUMBER_OF_LINES, parseLineCount, pinPlanDates, resolveExtractionPlan } from "../lib/params.js";
import { SnapshotManager, withSnapshot } from "../lib/snapshot.js";
import type { ConnectionConfig, SearchBackend } from "../lib/types.js";

interface CatOptions {
  around?: string;
  from?: string;
  to?: string;
  lines?: string;
  follow?: boolean;
  select?: string;
  where?: string;
}

interface CatCommandDeps {
  backend?: SearchBackend;
  loadConnection?: () => Promise<ConnectionConfig>;
  out?: LineSink;
  signal?: AbortSignal;
  batchSize?: number;
  pollIntervalMs?: number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (name: NodeJS.Signals) => {
    logger.debug(`Received ${name}, stopping`);
    process.exitCode = 130;
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

export async function cmdCat(index: string, options: CatOptions, deps: CatCommandDeps = {}): Promise<void> {
  if (!index || !index.trim()) {
    throw new ValidationError("An index name or pattern is required");
  }

  const resolved = resolveExtractionPlan({
    around: options.around,
    from: options.from,
    to: options.to,
    lines: options.lines === undefined ? DEFAULT_NUMBER_OF_LINES : parseLineCount(options.lines),
    follow: options.follow === true,
    select: options.select,
    where: options.where,
  });
  // dates must parse before the first request; they are fixed from here on
  const plan = pinPlanDates(resolved);

  const backend = deps.backend ?? createSearchBackend(await (deps.loadConnection ?? loadConnection)());
  const interrupt = deps.signal ? { signal: deps.signal, dispose: () => {} } : interruptSignal();
  const { signal } = interrupt;

  const emitter = new Emitter(deps.out);
  const snapshot = new SnapshotManager(backend);
  logger.debug("Extraction plan", { index, mode: plan.mode, snapshot: plan.needsSnapshot });

  let state: PaginationState | undefined;
  try {
    state = await withSnapshot(snapshot, index, plan.needsSnapshot, async (snap) => {
      const startCursor = await resolveStartCursor(backend, index, plan, snap, signal);
      return paginate({
        backend,
        index,
        plan,
        snapshot: snap,
        emit: (hits) => emitter.emit(hits),
        startCursor,
        signal,
        batchSize: deps.batchSize,
        pollIntervalMs: deps.pollIntervalMs,
        wait: deps.wait,
      });
    });
  } catch (error: unknown) {
    if (!signal.aborted) throw error;
  } finally {
    interrupt.dispose();
  }

  logger.debug("Extraction finished", { emitted: emitter.emitted, batches: state?.batches ?? 0 });
}

export function registerCatCommand(program: Command): void {
  program
    .command("cat")
    .description("Print documents of an index in time order, or follow new ones")
    .argument("<index>", "Index name, pattern or alias to read")
    .option("-a, --around <datetime>", "Show entries around a point in time")
    .option("-n, --lines <number>", "Number of lines to display", String(DEFAULT_NUMBER_OF_LINES))
    .option("-F, --from <datetime>", "Start of the time range (inclusive)")
    .option("-T, --to <datetime>", "End of the time range (exclusive)")
    .option("-s, --select <fields>", "Only print these fields (field1,field2,..)")
    .option("-w, --where <filters>", "Only match documents with these values (field1:value1,field2:value2,..)")
    .option("-f, --follow", "Follow new entries in real time", false)
    .action((index: string, options: CatOptions) => cmdCat(index, options));
}
