import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { cmdLogin } from "./login.js";
import { readStoredConfig, saveConfig } from "../lib/config.js";
import { AuthError, ValidationError } from "../lib/errors.js";

describe("login command", () => {
  let originalFetch: typeof globalThis.fetch;
  let dir: string;
  let file: string;
  let printed: unknown[];
  let authorizations: Array<string | null>;

  function serverAnswers(status: number, text: string): void {
    globalThis.fetch = async (url: string | URL | Request, init?: RequestInit) => {
      expect(String(url)).toBe("http://localhost:9200/_cat");
      authorizations.push(new Headers(init?.headers).get("authorization"));
      return new Response(text, { status });
    };
  }

  beforeEach(async () => {
    originalFetch = globalThis.fetch;
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "estail-login-"));
    file = path.join(dir, "config.json");
    printed = [];
    authorizations = [];
    vi.stubEnv("ESTAIL_USERNAME", "");
    vi.stubEnv("ESTAIL_PASSWORD", "");
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      printed.push(line);
    });
  });

  afterEach(async () => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("should store an anonymous connection", async () => {
    serverAnswers(200, "=^.^=\n/_cat/indices\n");

    await cmdLogin({ url: "http://localhost:9200" }, file);

    expect(await readStoredConfig(file)).toEqual({
      url: "http://localhost:9200",
      username: undefined,
      password: undefined,
    });
    expect(authorizations).toEqual([null]);
    expect(printed).toEqual(["Successfully connected to Elasticsearch!"]);
  });

  it("should store credentials and say where", async () => {
    serverAnswers(200, "/_cat/indices\n");

    await cmdLogin({ url: "http://localhost:9200", username: "elastic", password: "test-secret" }, file);

    expect(authorizations).toEqual(["Basic ZWxhc3RpYzp0ZXN0LXNlY3JldA=="]);
    expect(await readStoredConfig(file)).toEqual({
      url: "http://localhost:9200",
      username: "elastic",
      password: "test-secret",
    });
    expect(printed).toEqual([
      "Successfully connected to Elasticsearch!",
      `Credentials are stored in ${file}`,
      "Remove them after use with the 'logout' command",
    ]);
  });

  it("should take the password from the environment", async () => {
    serverAnswers(200, "/_cat/indices\n");
    vi.stubEnv("ESTAIL_PASSWORD", "test-secret");

    await cmdLogin({ url: "http://localhost:9200", username: "elastic" }, file);

    expect(authorizations).toEqual(["Basic ZWxhc3RpYzp0ZXN0LXNlY3JldA=="]);
  });

  it("should reuse the stored url", async () => {
    await saveConfig({ url: "http://localhost:9200" }, file);
    serverAnswers(200, "/_cat/indices\n");

    await cmdLogin({}, file);

    expect(printed).toEqual(["Successfully connected to Elasticsearch!"]);
  });

  it("should require a url", async () => {
    await expect(cmdLogin({}, file)).rejects.toThrow(ValidationError);
  });

  it("should reject bad credentials without saving", async () => {
    serverAnswers(401, "unauthorized");

    await expect(
      cmdLogin({ url: "http://localhost:9200", username: "elastic", password: "wrong-secret" }, file),
    ).rejects.toThrow("Authentication failed with provided credentials.");
    expect(await readStoredConfig(file)).toBeNull();
  });

  it("should ask for credentials when the server requires them", async () => {
    serverAnswers(403, "forbidden");

    const error = await cmdLogin({ url: "http://localhost:9200" }, file).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toHaveProperty(
      "message",
      "The server requires authentication; pass --username and --password.",
    );
  });
});
