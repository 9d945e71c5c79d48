#!/usr/bin/env node
import { Command } from "commander";
import { registerCatCommand } from "./commands/cat.js";
import { registerLoginCommand } from "./commands/login.js";
import { registerLogoutCommand } from "./commands/logout.js";
import { registerLsCommand } from "./commands/ls.js";
import { describeError, exitCodeFor } from "./lib/errors.js";
import { logger } from "./lib/logger.js";

interface GlobalOptions {
  quiet?: boolean;
  jsonLogs?: boolean;
  verbose?: boolean;
}

function buildProgram(): Command {
  const program = new Command();

  program
    .name("estail")
    .description("Read and follow time-ordered documents from an Elasticsearch-compatible server")
    .version("0.1.0")
    .option("-q, --quiet", "Suppress informational output", false)
    .option("--json-logs", "Emit diagnostics as JSON lines", false)
    .option("-v, --verbose", "Print debug diagnostics to stderr", false)
    .hook("preAction", (thisCommand) => {
      const opts = thisCommand.opts<GlobalOptions>();
      logger.setOptions({ quiet: opts.quiet, json: opts.jsonLogs, verbose: opts.verbose });
    });

  registerLsCommand(program);
  registerCatCommand(program);
  registerLoginCommand(program);
  registerLogoutCommand(program);

  return program;
}

async function main(): Promise<void> {
  await buildProgram().parseAsync(process.argv);
}

main().catch((e: unknown) => {
  logger.error(describeError(e));
  process.exit(exitCodeFor(e));
});
