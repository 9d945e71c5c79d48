import type { Command } from "commander";
import { listIndices } from "../lib/api-client.js";
import { loadConnection } from "../lib/config.js";
import { logger } from "../lib/logger.js";
import type { ConnectionConfig } from "../lib/types.js";

interface LsOptions {
  details?: boolean;
}

interface LsCommandDeps {
  loadConnection?: () => Promise<ConnectionConfig>;
}

export async function cmdLs(options: LsOptions = {}, deps: LsCommandDeps = {}): Promise<void> {
  const conn = await (deps.loadConnection ?? loadConnection)();
  const indices = await listIndices(conn);

  const sorted = [...indices].sort((a, b) => a.index.localeCompare(b.index));
  for (const entry of sorted) {
    if (options.details) {
      logger.info(`${entry.index}\t${entry.health ?? "-"}\t${entry.status ?? "-"}\t${entry["docs.count"] ?? "-"}`);
    } else {
      logger.info(entry.index);
    }
  }
}

export function registerLsCommand(program: Command): void {
  program
    .command("ls")
    .description("List the indices of the configured server")
    .option("-l, --details", "Also print health, status and document count", false)
    .action((options: LsOptions) => cmdLs(options));
}
