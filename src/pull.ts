import { linkedRemoteId, renderDeck } from "./deck.ts";
import { AuthError, describeError } from "./errors.ts";
import type { DeckRemote } from "./moxfield.ts";
import { listDeckFiles, readDeckFile, uniqueDeckPath, writeDeckFile } from "./store.ts";

export type PullResult = {
  pulled: { name: string; remoteId: string; path: string }[];
  /** Remote decks already linked to a local file. */
  skipped: string[];
  failed: { name: string; error: string }[];
};

/**
 * Download owned Moxfield decks that no local file links to yet and write
 * each one as a new deck file. Only reads from Moxfield.
 *
 * `names` filters by case-insensitive substring of the deck name.
 */
export async function pullDecks(
  remote: DeckRemote,
  owner: string,
  dir: string,
  names: string[] = [],
  today: string = new Date().toISOString().slice(0, 10),
): Promise<PullResult> {
  const owned = await remote.listOwnedDecks(owner);

  const linked = new Set<string>();
  for (const filePath of await listDeckFiles(dir)) {
    const id = linkedRemoteId(await readDeckFile(filePath));
    if (id) linked.add(id);
  }

  const filters = names.map((name) => name.toLowerCase());
  const result: PullResult = { pulled: [], skipped: [], failed: [] };

  for (const deck of owned) {
    if (filters.length > 0 && !filters.some((f) => deck.name.toLowerCase().includes(f))) {
      continue;
    }
    if (linked.has(deck.remoteId)) {
      result.skipped.push(deck.name);
      continue;
    }

    try {
      const snapshot = await remote.fetchDeck(deck.remoteId);
      const filePath = uniqueDeckPath(dir, deck.name);
      await writeDeckFile(filePath, renderDeck(snapshot, today));
      result.pulled.push({ name: deck.name, remoteId: deck.remoteId, path: filePath });
    } catch (err) {
      if (err instanceof AuthError) throw err;
      result.failed.push({ name: deck.name, error: describeError(err) });
    }
  }

  return result;
}
