import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { DEFAULT_CLIENT_VERSION, MOXFIELD_API } from "./moxfield.ts";
import type { Config } from "./types.ts";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

// `KEY=` in a .env file means unset, not an empty value.
const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const EnvSchema = z.object({
  MOXFIELD_BEARER_TOKEN: z.preprocess(blankToUndefined, z.string().trim().optional()),
  MOXFIELD_USERNAME: z.preprocess(blankToUndefined, z.string().trim().optional()),
  MOXFIELD_API_BASE: z.preprocess(blankToUndefined, z.string().url().default(MOXFIELD_API)),
  MOXFIELD_VERSION: z.preprocess(blankToUndefined, z.string().default(DEFAULT_CLIENT_VERSION)),
  DECKS_DIR: z.preprocess(blankToUndefined, z.string().default("decks")),
  MOXFIELD_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(15_000),
  ),
  PORT: z.preprocess(blankToUndefined, z.coerce.number().int().min(0).max(65535).default(3000)),
});

/**
 * Load `.env` from `cwd` into process.env. Variables already set in the
 * environment win over the file.
 */
export function loadDotEnv(cwd: string = process.cwd()): void {
  dotenv.config({ path: path.join(cwd, ".env"), quiet: true });
}

export type ConfigOverrides = {
  decksDir?: string;
  port?: string;
};

/** Build the run configuration from environment variables and CLI overrides. */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {},
): Config {
  const result = EnvSchema.safeParse({
    ...env,
    DECKS_DIR: overrides.decksDir ?? env["DECKS_DIR"],
    PORT: overrides.port ?? env["PORT"],
  });
  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${problems.join("\n  ")}`);
  }

  const vars = result.data;
  return {
    token: vars.MOXFIELD_BEARER_TOKEN,
    username: vars.MOXFIELD_USERNAME,
    apiBase: vars.MOXFIELD_API_BASE,
    clientVersion: vars.MOXFIELD_VERSION,
    decksDir: vars.DECKS_DIR,
    timeoutMs: vars.MOXFIELD_TIMEOUT_MS,
    port: vars.PORT,
  };
}

export const TOKEN_HELP = [
  "To get a fresh token:",
  "  1. Open moxfield.com while logged in, then the browser's Network tab",
  "  2. Pick any request to api2.moxfield.com",
  '  3. Copy the Authorization header value (after "Bearer ")',
  "  4. Put it in .env as MOXFIELD_BEARER_TOKEN=...",
].join("\n");

export function requireToken(config: Config): string {
  if (!config.token) {
    throw new ConfigError(`MOXFIELD_BEARER_TOKEN is not set.\n${TOKEN_HELP}`);
  }
  return config.token;
}

export function requireUsername(config: Config): string {
  if (!config.username) {
    throw new ConfigError("MOXFIELD_USERNAME is not set; it names whose decks to list.");
  }
  return config.username;
}
