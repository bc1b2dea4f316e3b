import { existsSync } from "node:fs";
import { mkdir, readdir, readFile, rename, writeFile } from "node:fs/promises";
import path from "node:path";
import { deckTitle } from "./deck.ts";
import { rankCandidates, typoTolerance } from "./fuzzy.ts";
import type { DeckSource } from "./types.ts";

const DECK_EXTENSION = ".md";

/** Sorted paths of the deck files in `dir`. A missing directory has no decks. */
export async function listDeckFiles(dir: string): Promise<string[]> {
  if (!existsSync(dir)) return [];
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith(DECK_EXTENSION))
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

export async function readDeckFile(filePath: string): Promise<string> {
  return readFile(filePath, "utf8");
}

/**
 * Replace a deck file's contents. Writes to a sibling temp file first and
 * renames it over the original, so a failed write leaves the old file intact.
 */
export async function writeDeckFile(filePath: string, document: string): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.tmp`,
  );
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(tempPath, document, "utf8");
  await rename(tempPath, filePath);
}

/** Short label used in logs and reports: the file name without its directory. */
export function deckLabel(filePath: string): string {
  return path.basename(filePath);
}

function deckStem(filePath: string): string {
  return path.basename(filePath, DECK_EXTENSION);
}

/**
 * Resolve a CLI or tool argument to a deck file.
 *
 * An existing path is used as-is. Otherwise the query is fuzzy matched
 * against file names and deck titles in `dir`; returns null when nothing is
 * close enough.
 */
export async function resolveDeckQuery(dir: string, query: string): Promise<string | null> {
  if (existsSync(query)) return query;

  const files = await listDeckFiles(dir);
  const candidates = await Promise.all(
    files.map(async (filePath) => ({
      filePath,
      names: [deckStem(filePath), deckTitle(await readDeckFile(filePath)) ?? ""].filter(
        (name) => name.length > 0,
      ),
    })),
  );

  const [best] = rankCandidates(query, candidates, (candidate) => candidate.names, 1);
  if (!best) return null;
  if (!best.contains && best.distance > typoTolerance(query)) return null;
  return best.value.filePath;
}

/** Convert a deck name to a file name slug. */
export function slugify(name: string): string {
  return name
    .toLowerCase()
    .trim()
    .replace(/['’‘]/g, "")
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

/** A path for a new deck file named after `name`, suffixed -2, -3, ... to avoid clobbering. */
export function uniqueDeckPath(dir: string, name: string): string {
  const slug = slugify(name) || "deck";
  let candidate = path.join(dir, `${slug}${DECK_EXTENSION}`);
  for (let i = 2; existsSync(candidate); i++) {
    candidate = path.join(dir, `${slug}-${i}${DECK_EXTENSION}`);
  }
  return candidate;
}

/** Expose a deck file to the sync orchestrator. */
export function fileDeckSource(filePath: string): DeckSource {
  return {
    label: deckLabel(filePath),
    load: () => readDeckFile(filePath),
    save: (document) => writeDeckFile(filePath, document),
  };
}
