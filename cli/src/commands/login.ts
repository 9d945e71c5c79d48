import type { Command } from "commander";
import { checkConnection } from "../lib/api-client.js";
import { envValue, getConfigPath, readStoredConfig, saveConfig } from "../lib/config.js";
import { AuthError, ValidationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { ConnectionConfig } from "../lib/types.js";

interface LoginOptions {
  url?: string;
  username?: string;
  password?: string;
}

/**
 * Checks the server and stores the connection. Credentials are only sent when
 * given (or previously stored); an anonymous server is saved without them.
 */
export async function cmdLogin(options: LoginOptions, configFile: string = getConfigPath()): Promise<void> {
  const existing = await readStoredConfig(configFile);
  const url = (options.url ?? existing?.url ?? "").trim();
  if (!url) {
    throw new ValidationError("No server URL given and none stored; pass --url");
  }

  const username = options.username ?? envValue("ESTAIL_USERNAME") ?? existing?.username;
  const password = options.password ?? envValue("ESTAIL_PASSWORD");

  const candidate: ConnectionConfig = username && password !== undefined ? { url, username, password } : { url };
  const result = await checkConnection(candidate);

  if (result === "unauthorized") {
    if (candidate.username) {
      throw new AuthError("Authentication failed with provided credentials.");
    }
    throw new AuthError("The server requires authentication; pass --username and --password.");
  }

  await saveConfig(candidate, configFile);
  logger.info("Successfully connected to Elasticsearch!");
  if (candidate.password !== undefined) {
    logger.info(`Credentials are stored in ${configFile}`);
    logger.info("Remove them after use with the 'logout' command");
  }
}

export function registerLoginCommand(program: Command): void {
  program
    .command("login")
    .description("Check a server and store its connection settings")
    .option("--url <url>", "Server URL, e.g. https://localhost:9200")
    .option("-u, --username <name>", "Basic auth username")
    .option("-p, --password <password>", "Basic auth password (or set ESTAIL_PASSWORD)")
    .action((options: LoginOptions) => cmdLogin(options));
}
