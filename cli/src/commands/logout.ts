import type { Command } from "commander";
import { getConfigPath, readStoredConfig, saveConfig } from "../lib/config.js";
import { logger } from "../lib/logger.js";

export async function cmdLogout(configFile: string = getConfigPath()): Promise<void> {
  const stored = await readStoredConfig(configFile);
  if (!stored?.url || stored.password === undefined) {
    logger.info("No active session found");
    return;
  }

  await saveConfig({ url: stored.url, username: stored.username }, configFile);
  logger.info("Successfully logged out (password removed)");
}

export function registerLogoutCommand(program: Command): void {
  program
    .command("logout")
    .description("Remove the stored password")
    .action(() => cmdLogout());
}
