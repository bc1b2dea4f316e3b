import { NotFoundError, type DeckSyncError } from "./errors.ts";
import type { DeckRemote } from "./moxfield.ts";
import type {
  Board,
  CardLine,
  DeckSource,
  RemoteDeckRef,
  RemoteDeckSnapshot,
  RemoteDeckSummary,
  Visibility,
} from "./types.ts";

export const DECK_CARDS = [
  "1 Hakbal of the Surging Soul",
  "1 Sol Ring",
  "10 Island",
  "5 Forest",
];

/**
 * Build a deck document. `extraRows` go right after the Date row, so the
 * decklist fence is always on line 14 + extraRows.length.
 */
export function deckDoc(cards: string[] = DECK_CARDS, extraRows: string[] = []): string {
  return [
    "# Hakbal Merfolk",
    "",
    "| | |",
    "|---|---|",
    "| **Commander** | Hakbal of the Surging Soul |",
    "| **Date** | 2026-02-14 |",
    ...extraRows,
    "",
    "## Strategy",
    "",
    "Go wide with merfolk and explore.",
    "",
    "## Decklist",
    "",
    "```",
    ...cards,
    "```",
    "",
  ].join("\n");
}

type Call =
  | { method: "listOwnedDecks"; owner: string }
  | { method: "fetchDeck"; remoteId: string }
  | { method: "createDeck"; name: string; format: string; visibility: Visibility }
  | { method: "importCards"; remoteId: string; cards: CardLine[] };

type Method = Call["method"];

/** In-memory Moxfield: creates decks, appends imports, never deletes. */
export class FakeRemote implements DeckRemote {
  readonly decks = new Map<string, RemoteDeckSnapshot>();
  readonly calls: Call[] = [];
  /** Names Moxfield's importer turns into other names, as it does for front faces of double-faced cards. */
  readonly importRenames = new Map<string, string>();
  private readonly ids: string[];
  private readonly failures = new Map<Method, DeckSyncError[]>();
  private counter = 0;

  /** `ids` are handed out to created decks in order. */
  constructor(ids: string[] = []) {
    this.ids = [...ids];
  }

  /** Make the next call(s) to `method` throw `error`. */
  failNext(method: Method, error: DeckSyncError): this {
    this.failures.set(method, [...(this.failures.get(method) ?? []), error]);
    return this;
  }

  /** Put a deck on the fake server. Cards use the "N Name" form; `commander` names go on the commander board. */
  seed(remoteId: string, name: string, cards: string[], commander: string[] = []): RemoteDeckSnapshot {
    const snapshot: RemoteDeckSnapshot = {
      remoteId,
      internalId: `int-${remoteId}`,
      name,
      version: 1,
      boards: { main: [], commander: [] },
    };
    for (const line of cards) {
      const m = /^(\d+) (.+)$/.exec(line);
      if (!m) throw new Error(`bad seed line ${line}`);
      const cardName = m[2] ?? "";
      const board: Board = commander.includes(cardName) ? "commander" : "main";
      snapshot.boards[board].push({
        uniqueCardId: `${remoteId}-${snapshot.boards[board].length}`,
        name: cardName,
        quantity: Number(m[1]),
      });
    }
    this.decks.set(remoteId, snapshot);
    return snapshot;
  }

  /** Calls that change something on the server. */
  get writes(): Call[] {
    return this.calls.filter((call) => call.method === "createDeck" || call.method === "importCards");
  }

  private maybeFail(method: Method): void {
    const queued = this.failures.get(method);
    const error = queued?.shift();
    if (error) throw error;
  }

  async listOwnedDecks(owner: string): Promise<RemoteDeckSummary[]> {
    this.calls.push({ method: "listOwnedDecks", owner });
    this.maybeFail("listOwnedDecks");
    return [...this.decks.values()].map((deck) => ({
      remoteId: deck.remoteId,
      internalId: deck.internalId,
      name: deck.name,
      format: "commander",
      visibility: "public",
    }));
  }

  async fetchDeck(remoteId: string): Promise<RemoteDeckSnapshot> {
    this.calls.push({ method: "fetchDeck", remoteId });
    this.maybeFail("fetchDeck");
    const deck = this.decks.get(remoteId);
    if (!deck) throw new NotFoundError(remoteId);
    return structuredClone(deck);
  }

  async createDeck(name: string, format: string, visibility: Visibility): Promise<RemoteDeckRef> {
    this.calls.push({ method: "createDeck", name, format, visibility });
    this.maybeFail("createDeck");
    const remoteId = this.ids.shift() ?? `new-${++this.counter}`;
    this.seed(remoteId, name, []);
    return { remoteId, internalId: `int-${remoteId}` };
  }

  async importCards(ref: RemoteDeckRef, cards: CardLine[]): Promise<RemoteDeckSnapshot> {
    this.calls.push({ method: "importCards", remoteId: ref.remoteId, cards });
    this.maybeFail("importCards");
    const deck = this.decks.get(ref.remoteId);
    if (!deck) throw new NotFoundError(ref.remoteId);
    for (const card of cards) {
      const board = deck.boards[card.board];
      board.push({
        uniqueCardId: `${ref.remoteId}-${board.length}`,
        name: this.importRenames.get(card.name) ?? card.name,
        quantity: card.quantity,
      });
    }
    deck.version += 1;
    return structuredClone(deck);
  }
}

/** A DeckSource backed by a string, recording every save. */
export function memorySource(label: string, document: string): DeckSource & { saved: string[]; current(): string } {
  const saved: string[] = [];
  return {
    label,
    saved,
    current: () => saved.at(-1) ?? document,
    load: async () => saved.at(-1) ?? document,
    save: async (updated: string) => {
      saved.push(updated);
    },
  };
}
