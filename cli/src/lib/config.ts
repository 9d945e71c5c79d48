import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors.js";
import type { ConnectionConfig } from "./types.js";

export const CONFIG_DIR_NAME = ".estail";
export const CONFIG_FILE_NAME = "config.json";

export function getConfigPath(): string {
  const override = process.env.ESTAIL_CONFIG;
  if (override && override.trim()) return override.trim();
  return path.join(os.homedir(), CONFIG_DIR_NAME, CONFIG_FILE_NAME);
}

function asNonEmpty(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value : undefined;
}

/** Reads an environment variable, treating an empty value as unset. */
export function envValue(name: string): string | undefined {
  return asNonEmpty(process.env[name]);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseStoredConfig(raw: string, file: string): Partial<ConnectionConfig> {
  let payload: unknown;
  try {
    payload = JSON.parse(raw);
  } catch {
    throw new ConfigError(`Config file ${file} is not valid JSON`);
  }
  if (!isRecord(payload)) {
    throw new ConfigError(`Config file ${file} must contain a JSON object`);
  }

  return {
    url: asNonEmpty(payload.url),
    username: asNonEmpty(payload.username),
    password: typeof payload.password === "string" ? payload.password : undefined,
  };
}

/** Reads the stored config, or returns null when no file exists yet. */
export async function readStoredConfig(file: string = getConfigPath()): Promise<Partial<ConnectionConfig> | null> {
  let raw: string;
  try {
    raw = await fs.readFile(file, "utf-8");
  } catch (error: unknown) {
    if (error && typeof error === "object" && "code" in error && error.code === "ENOENT") {
      return null;
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read ${file}: ${message}`);
  }
  return parseStoredConfig(raw, file);
}

/**
 * Resolves the connection for commands that talk to the server. Environment
 * variables win over the stored file.
 */
export async function loadConnection(file: string = getConfigPath()): Promise<ConnectionConfig> {
  const stored = (await readStoredConfig(file)) ?? {};
  const url = envValue("ESTAIL_URL") ?? stored.url;
  if (!url) {
    throw new ConfigError("No configuration found. Please login first.");
  }

  return {
    url,
    username: envValue("ESTAIL_USERNAME") ?? stored.username,
    password: envValue("ESTAIL_PASSWORD") ?? stored.password,
  };
}

/** Persists the config readable by the owner only. */
export async function saveConfig(config: ConnectionConfig, file: string = getConfigPath()): Promise<void> {
  const dir = path.dirname(file);
  await fs.mkdir(dir, { recursive: true, mode: 0o700 });

  const stored: Record<string, string> = { url: config.url };
  if (config.username) stored.username = config.username;
  if (config.password !== undefined) stored.password = config.password;

  await fs.writeFile(file, `${JSON.stringify(stored, null, 2)}\n`, { mode: 0o600 });
  await fs.chmod(file, 0o600);
}
