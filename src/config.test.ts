import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, test, vi } from "vitest";
import { ConfigError, loadConfig, loadDotEnv, requireToken, requireUsername } from "./config.ts";
import { DEFAULT_CLIENT_VERSION, MOXFIELD_API } from "./moxfield.ts";

describe("loadConfig", () => {
  test("applies defaults when nothing is set", () => {
    expect(loadConfig({})).toEqual({
      token: undefined,
      username: undefined,
      apiBase: MOXFIELD_API,
      clientVersion: DEFAULT_CLIENT_VERSION,
      decksDir: "decks",
      timeoutMs: 15_000,
      port: 3000,
    });
  });

  test("reads every variable", () => {
    const config = loadConfig({
      MOXFIELD_BEARER_TOKEN: "test-token",
      MOXFIELD_USERNAME: "test-owner",
      MOXFIELD_API_BASE: "http://localhost:8080",
      MOXFIELD_VERSION: "2026.01.01.1",
      DECKS_DIR: "my-decks",
      MOXFIELD_TIMEOUT_MS: "5000",
      PORT: "4000",
    });
    expect(config).toEqual({
      token: "test-token",
      username: "test-owner",
      apiBase: "http://localhost:8080",
      clientVersion: "2026.01.01.1",
      decksDir: "my-decks",
      timeoutMs: 5000,
      port: 4000,
    });
  });

  test("treats blank values as unset", () => {
    const config = loadConfig({ MOXFIELD_BEARER_TOKEN: "  ", PORT: "" });
    expect(config.token).toBeUndefined();
    expect(config.port).toBe(3000);
  });

  test("command-line overrides win over the environment", () => {
    const config = loadConfig({ DECKS_DIR: "env-decks", PORT: "4000" }, { decksDir: "cli-decks", port: "5000" });
    expect(config.decksDir).toBe("cli-decks");
    expect(config.port).toBe(5000);
  });

  test("lists every invalid value", () => {
    const load = () => loadConfig({ MOXFIELD_TIMEOUT_MS: "soon", PORT: "99999" });
    expect(load).toThrow(ConfigError);
    expect(load).toThrow(/^Invalid configuration:\n {2}MOXFIELD_TIMEOUT_MS: .+\n {2}PORT: .+$/);
  });
});

describe("requireToken / requireUsername", () => {
  test("return the value when set", () => {
    const config = loadConfig({ MOXFIELD_BEARER_TOKEN: "test-token", MOXFIELD_USERNAME: "test-owner" });
    expect(requireToken(config)).toBe("test-token");
    expect(requireUsername(config)).toBe("test-owner");
  });

  test("explain how to get a token when it is missing", () => {
    const config = loadConfig({});
    expect(() => requireToken(config)).toThrow("MOXFIELD_BEARER_TOKEN is not set.\nTo get a fresh token:");
    expect(() => requireUsername(config)).toThrow(ConfigError);
  });
});

describe("loadDotEnv", () => {
  let dir: string | undefined;

  afterEach(async () => {
    vi.unstubAllEnvs();
    delete process.env["DECK_SYNC_TEST_A"];
    if (dir) await rm(dir, { recursive: true, force: true });
  });

  test("loads .env without overriding variables already set", async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "deck-sync-env-"));
    await writeFile(path.join(dir, ".env"), "DECK_SYNC_TEST_A=from-file\nDECK_SYNC_TEST_B=from-file\n");
    vi.stubEnv("DECK_SYNC_TEST_B", "from-env");

    loadDotEnv(dir);

    expect(process.env["DECK_SYNC_TEST_A"]).toBe("from-file");
    expect(process.env["DECK_SYNC_TEST_B"]).toBe("from-env");
  });
});
