import { parseArgs } from "node:util";
import { ConfigError, TOKEN_HELP, loadConfig, loadDotEnv, requireToken, requireUsername } from "./src/config.ts";
import { AuthError, describeError } from "./src/errors.ts";
import { MoxfieldClient } from "./src/moxfield.ts";
import { pullDecks } from "./src/pull.ts";
import { exitCodeFor, formatPreview, formatReport } from "./src/report.ts";
import { createExclusive } from "./src/server.ts";
import { fileDeckSource, listDeckFiles, resolveDeckQuery } from "./src/store.ts";
import { previewAll, syncAll } from "./src/sync.ts";
import { startHttpTransport, startStdioTransport } from "./src/transport.ts";
import type { Config } from "./src/types.ts";

const USAGE = `Usage:
  deck-sync [options] <deck>...       sync the named deck files (paths or fuzzy names)
  deck-sync [options] --all           sync every deck in the decks directory
  deck-sync [options] --list-remote   list your decks on Moxfield
  deck-sync [options] --pull [name...]  write Moxfield decks that have no local file yet
  deck-sync [options] --serve         run the MCP tool server (stdio + HTTP)

Options:
  -d, --decks <dir>       decks directory (default: $DECKS_DIR or ./decks)
  -n, --dry-run           show what a sync would do without writing anything
      --recreate-missing  re-create linked decks that were deleted on Moxfield
      --port <port>       HTTP port for --serve (default: $PORT or 3000)`;

function parseCli() {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      all: { type: "boolean", default: false },
      "dry-run": { type: "boolean", short: "n", default: false },
      "recreate-missing": { type: "boolean", default: false },
      "list-remote": { type: "boolean", default: false },
      pull: { type: "boolean", default: false },
      serve: { type: "boolean", default: false },
      decks: { type: "string", short: "d" },
      port: { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
    strict: true,
    allowPositionals: true,
  });
  return { values, positionals };
}

function createClient(config: Config): MoxfieldClient {
  return new MoxfieldClient({
    token: requireToken(config),
    apiBase: config.apiBase,
    clientVersion: config.clientVersion,
    timeoutMs: config.timeoutMs,
  });
}

async function resolveDeckFiles(config: Config, all: boolean, queries: string[]): Promise<string[]> {
  if (all) {
    return listDeckFiles(config.decksDir);
  }
  const files: string[] = [];
  for (const query of queries) {
    const filePath = await resolveDeckQuery(config.decksDir, query);
    if (!filePath) {
      throw new ConfigError(`No deck found matching "${query}" in ${config.decksDir}`);
    }
    files.push(filePath);
  }
  return files;
}

async function main(): Promise<number> {
  loadDotEnv();
  const { values, positionals } = parseCli();

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadConfig(process.env, { decksDir: values.decks, port: values.port });

  if (values.serve) {
    const context = {
      remote: createClient(config),
      owner: requireUsername(config),
      decksDir: config.decksDir,
      exclusive: createExclusive(),
    };
    startHttpTransport(context, config.port);
    await startStdioTransport(context);
    return 0;
  }

  if (values["list-remote"]) {
    const owner = requireUsername(config);
    const decks = await createClient(config).listOwnedDecks(owner);
    console.log(`Moxfield decks for ${owner}:\n`);
    for (const deck of decks) {
      console.log(`  ${deck.name.padEnd(30)}  id=${deck.remoteId}  fmt=${deck.format}`);
    }
    console.log(`\n${decks.length} deck(s) total`);
    return 0;
  }

  if (values.pull) {
    const owner = requireUsername(config);
    const result = await pullDecks(createClient(config), owner, config.decksDir, positionals);
    for (const deck of result.pulled) {
      console.log(`  pulled   ${deck.name} (${deck.remoteId}) -> ${deck.path}`);
    }
    for (const name of result.skipped) {
      console.log(`  skipped  ${name} (already linked locally)`);
    }
    for (const { name, error } of result.failed) {
      console.log(`  failed   ${name}: ${error}`);
    }
    console.log(`\nPulled ${result.pulled.length}, skipped ${result.skipped.length}, failed ${result.failed.length}`);
    return result.failed.length === 0 ? 0 : 1;
  }

  if (!values.all && positionals.length === 0) {
    console.error(USAGE);
    return 1;
  }

  const files = await resolveDeckFiles(config, values.all, positionals);
  if (files.length === 0) {
    console.error(`No deck files found in ${config.decksDir}`);
    return 1;
  }

  const client = createClient(config);
  const options = { recreateMissing: values["recreate-missing"] };

  if (values["dry-run"]) {
    const previews = await previewAll(client, files.map(fileDeckSource), options);
    console.log(formatPreview(previews));
    console.log("(dry run: nothing was changed)");
    return previews.some((preview) => preview.error) ? 1 : 0;
  }

  const report = await syncAll(client, requireUsername(config), files.map(fileDeckSource), options);
  console.log(formatReport(report));
  if (report.abortReason instanceof AuthError) {
    console.error(TOKEN_HELP);
  }
  return exitCodeFor(report);
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else if (err instanceof AuthError) {
      console.error(`[deck-sync] ${err.message}\n${TOKEN_HELP}`);
    } else {
      console.error("[deck-sync] Fatal error:", describeError(err));
    }
    process.exitCode = 1;
  });
