import type {
  Board,
  CardDelta,
  CardLine,
  DeckRecord,
  RemoteDeckSnapshot,
} from "./types.ts";

const BOARDS: readonly Board[] = ["commander", "main"];

type CanonicalEntry = { name: string; quantity: number };

/** One summed quantity per (board, card name). Names compare case-insensitively. */
export type CanonicalDeck = Map<Board, Map<string, CanonicalEntry>>;

/**
 * Reduce card lines to canonical form: grouped by board, then by card name,
 * with quantities summed. Two lines of the same basic land collapse into one.
 */
export function canonicalize(
  lines: Iterable<Pick<CardLine, "name" | "quantity" | "board">>,
): CanonicalDeck {
  const canonical: CanonicalDeck = new Map(BOARDS.map((board) => [board, new Map()]));
  for (const line of lines) {
    const board = canonical.get(line.board);
    if (!board) continue;
    const key = line.name.toLowerCase();
    const existing = board.get(key);
    if (existing) {
      existing.quantity += line.quantity;
    } else {
      board.set(key, { name: line.name, quantity: line.quantity });
    }
  }
  return canonical;
}

function remoteLines(snapshot: RemoteDeckSnapshot): CardLine[] {
  return BOARDS.flatMap((board) =>
    snapshot.boards[board].map(({ name, quantity }) => ({ name, quantity, board })),
  );
}

/**
 * Per-card differences between a local record and a remote snapshot, sorted
 * by board and then by name. An empty result means the decks are equivalent.
 */
export function diffDecks(local: DeckRecord, remote: RemoteDeckSnapshot): CardDelta[] {
  const left = canonicalize(local.cards);
  const right = canonicalize(remoteLines(remote));
  const changes: CardDelta[] = [];

  for (const board of BOARDS) {
    const localBoard = left.get(board) ?? new Map<string, CanonicalEntry>();
    const remoteBoard = right.get(board) ?? new Map<string, CanonicalEntry>();
    const keys = new Set([...localBoard.keys(), ...remoteBoard.keys()]);

    for (const key of keys) {
      const l = localBoard.get(key);
      const r = remoteBoard.get(key);
      const localQty = l?.quantity ?? 0;
      const remoteQty = r?.quantity ?? 0;
      if (localQty !== remoteQty) {
        changes.push({
          board,
          name: l?.name ?? r?.name ?? key,
          local: localQty,
          remote: remoteQty,
        });
      }
    }
  }

  const boardOrder = (board: Board) => BOARDS.indexOf(board);
  return changes.sort(
    (a, b) =>
      boardOrder(a.board) - boardOrder(b.board) ||
      a.name.toLowerCase().localeCompare(b.name.toLowerCase()),
  );
}

/**
 * True when both sides hold exactly the same cards on the same boards,
 * ignoring line order, capitalization and Moxfield's per-printing ids.
 */
export function equivalent(local: DeckRecord, remote: RemoteDeckSnapshot): boolean {
  return diffDecks(local, remote).length === 0;
}

/** Total number of cards in a snapshot across both boards. */
export function countRemoteCards(snapshot: RemoteDeckSnapshot): number {
  return remoteLines(snapshot).reduce((sum, line) => sum + line.quantity, 0);
}

/** Human-readable one-liner per change, e.g. "+1 Sol Ring" or "Island 10 -> 9". */
export function formatChanges(changes: CardDelta[]): string[] {
  return changes.map(({ board, name, local, remote }) => {
    const prefix = board === "commander" ? "commander: " : "";
    if (remote === 0) return `${prefix}+${local} ${name}`;
    if (local === 0) return `${prefix}-${remote} ${name}`;
    return `${prefix}${name} ${remote} -> ${local}`;
  });
}
