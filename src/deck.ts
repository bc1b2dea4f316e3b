import { MalformedDeckError } from "./errors.ts";
import type {
  Board,
  CardLine,
  DeckMetadata,
  DeckRecord,
  RemoteDeckSnapshot,
  SyncStatus,
  Visibility,
} from "./types.ts";

/** Basic lands may appear on several lines of the same board. */
export const BASIC_LAND_NAMES: ReadonlySet<string> = new Set(
  ["Plains", "Island", "Swamp", "Mountain", "Forest", "Wastes"].flatMap(
    (name) => [name.toLowerCase(), `snow-covered ${name.toLowerCase()}`],
  ),
);

const VISIBILITIES: readonly Visibility[] = ["public", "unlisted", "private"];

// Rows the sync engine owns. Everything else in a deck file is left alone.
const OWNED_KEYS = {
  remoteId: "Moxfield ID",
  displayName: "Moxfield Name",
  supersededIds: "Superseded IDs",
  syncStatus: "Sync Status",
} as const;

const SYNC_STATUSES: readonly SyncStatus[] = ["pending-import", "name-mismatch"];

const TITLE_RE = /^#\s+(.+?)\s*$/;
const META_ROW_RE = /^\|\s*\*\*(.+?)\*\*\s*\|\s*(.*?)\s*\|\s*$/;
const FENCE_RE = /^\s*```/;
const CARD_LINE_RE = /^(\d+)x?\s+(.+)$/i;

type DocumentLine = {
  text: string;
  /** Trailing carriage return, kept so CRLF files round-trip untouched. */
  cr: string;
  inFence: boolean;
};

function splitLines(document: string): DocumentLine[] {
  let inFence = false;
  return document.split("\n").map((raw) => {
    const cr = raw.endsWith("\r") ? "\r" : "";
    const text = cr ? raw.slice(0, -1) : raw;
    const isFence = FENCE_RE.test(text);
    const line = { text, cr, inFence: inFence || isFence };
    if (isFence) inFence = !inFence;
    return line;
  });
}

function isEmptyValue(value: string): boolean {
  return value === "" || value === "|" || value === "-" || value === "—";
}

/** Read `| **Key** | value |` rows outside code fences. Keys are lowercased; first occurrence wins. */
function readMetadataRows(lines: DocumentLine[]): Map<string, string> {
  const rows = new Map<string, string>();
  for (const line of lines) {
    if (line.inFence) continue;
    const m = META_ROW_RE.exec(line.text);
    if (!m) continue;
    const key = m[1]!.trim().toLowerCase();
    const value = m[2]!.trim();
    if (!rows.has(key) && !isEmptyValue(value)) {
      rows.set(key, value);
    }
  }
  return rows;
}

function readTitle(lines: DocumentLine[]): string | undefined {
  for (const line of lines) {
    if (line.inFence) continue;
    const m = TITLE_RE.exec(line.text);
    if (m) return m[1];
  }
  return undefined;
}

/** Lines of the first fenced block, paired with their 1-based line numbers. */
function readCardBlock(lines: DocumentLine[]): { text: string; lineNumber: number }[] {
  const start = lines.findIndex((line) => FENCE_RE.test(line.text));
  if (start === -1) {
    throw new MalformedDeckError("no decklist code block found");
  }
  const block: { text: string; lineNumber: number }[] = [];
  for (let i = start + 1; i < lines.length; i++) {
    const text = lines[i]!.text;
    if (FENCE_RE.test(text)) return block;
    block.push({ text: text.trim(), lineNumber: i + 1 });
  }
  throw new MalformedDeckError("decklist code block is never closed", start + 1);
}

function parseCommanders(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(" & ")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

function parseVisibility(value: string | undefined): Visibility {
  if (value === undefined) return "public";
  const normalized = value.toLowerCase();
  const match = VISIBILITIES.find((v) => v === normalized);
  if (!match) {
    throw new MalformedDeckError(`unknown visibility "${value}"`);
  }
  return match;
}

function parseSyncStatus(value: string | undefined): SyncStatus | undefined {
  const normalized = value?.toLowerCase();
  return SYNC_STATUSES.find((status) => status === normalized);
}

function parseCardLines(
  block: { text: string; lineNumber: number }[],
  commanders: string[],
): CardLine[] {
  const commanderKeys = new Set(commanders.map((name) => name.toLowerCase()));
  const seen = new Set<string>();
  const cards: CardLine[] = [];

  for (const { text, lineNumber } of block) {
    if (text.length === 0 || text.startsWith("//")) continue;

    const m = CARD_LINE_RE.exec(text);
    if (!m) {
      throw new MalformedDeckError(
        `cannot split "${text}" into a quantity and a card name`,
        lineNumber,
      );
    }

    const quantity = parseInt(m[1]!, 10);
    const name = m[2]!.trim();
    if (quantity < 1) {
      throw new MalformedDeckError(`quantity for "${name}" must be at least 1`, lineNumber);
    }

    const nameKey = name.toLowerCase();
    const board: Board = commanderKeys.has(nameKey) ? "commander" : "main";
    const seenKey = `${board}:${nameKey}`;
    if (seen.has(seenKey) && !BASIC_LAND_NAMES.has(nameKey)) {
      throw new MalformedDeckError(`"${name}" is listed more than once`, lineNumber);
    }
    seen.add(seenKey);

    cards.push({ name, quantity, board });
  }

  if (cards.length === 0) {
    throw new MalformedDeckError("decklist is empty");
  }
  return cards;
}

/**
 * Parse a Markdown deck document into a DeckRecord.
 *
 * The title comes from the first `#` heading (or `fallbackTitle`, usually the
 * file name), metadata from the `| **Key** | value |` table and cards from the
 * first fenced code block. Throws MalformedDeckError when the decklist cannot
 * be split unambiguously or when a linked deck has no name to resync under.
 */
export function parseDeck(document: string, fallbackTitle = ""): DeckRecord {
  const lines = splitLines(document);
  const rows = readMetadataRows(lines);
  const title = readTitle(lines) ?? fallbackTitle;
  const commanders = parseCommanders(rows.get("commander"));

  const remoteId = rows.get(OWNED_KEYS.remoteId.toLowerCase());
  const displayName = rows.get(OWNED_KEYS.displayName.toLowerCase()) ?? title;
  if (remoteId && !displayName) {
    throw new MalformedDeckError(
      `deck is linked to ${remoteId} but has neither a title nor a ${OWNED_KEYS.displayName}`,
    );
  }

  const supersededIds = (rows.get(OWNED_KEYS.supersededIds.toLowerCase()) ?? "")
    .split(",")
    .map((id) => id.trim())
    .filter((id) => id.length > 0);

  const metadata: DeckMetadata = {
    title,
    remoteId,
    displayName,
    visibility: parseVisibility(rows.get("visibility")),
    format: rows.get("format")?.toLowerCase() ?? "commander",
    commanders,
    supersededIds,
    syncStatus: parseSyncStatus(rows.get(OWNED_KEYS.syncStatus.toLowerCase())),
  };

  return {
    cards: parseCardLines(readCardBlock(lines), commanders),
    metadata,
  };
}

function formatRow(key: string, value: string): string {
  return `| **${key}** | ${value} |`;
}

function ownedRowValues(metadata: DeckMetadata): [string, string][] {
  const showName = metadata.remoteId !== undefined || metadata.displayName !== metadata.title;
  return [
    [OWNED_KEYS.remoteId, metadata.remoteId ?? ""],
    [OWNED_KEYS.displayName, showName ? metadata.displayName : ""],
    [OWNED_KEYS.supersededIds, metadata.supersededIds.join(", ")],
    [OWNED_KEYS.syncStatus, metadata.syncStatus ?? ""],
  ];
}

/**
 * Write the engine-owned metadata of `record` back into `document`.
 *
 * Owned rows are updated in place, removed when empty, or inserted after the
 * last metadata row. No other line of the document changes.
 */
export function serializeDeck(record: DeckRecord, document: string): string {
  const lines = splitLines(document);
  const cr = document.includes("\r\n") ? "\r" : "";
  const values = new Map(
    ownedRowValues(record.metadata).map(([key, value]) => [key.toLowerCase(), { key, value }]),
  );

  const written = new Set<string>();
  const out: DocumentLine[] = [];
  let lastRowIndex = -1;

  for (const line of lines) {
    const m = line.inFence ? null : META_ROW_RE.exec(line.text);
    const owned = m ? values.get(m[1]!.trim().toLowerCase()) : undefined;

    if (!owned) {
      out.push(line);
      if (m) lastRowIndex = out.length - 1;
      continue;
    }
    // Owned row: rewrite the first occurrence, drop repeats and empties.
    if (written.has(owned.key) || owned.value === "") continue;
    written.add(owned.key);
    out.push({ text: formatRow(owned.key, owned.value), cr: line.cr, inFence: false });
    lastRowIndex = out.length - 1;
  }

  const missing = [...values.values()]
    .filter(({ key, value }) => value !== "" && !written.has(key))
    .map(({ key, value }): DocumentLine => ({ text: formatRow(key, value), cr, inFence: false }));

  if (missing.length > 0) {
    if (lastRowIndex !== -1) {
      out.splice(lastRowIndex + 1, 0, ...missing);
    } else {
      const titleIndex = out.findIndex((line) => !line.inFence && TITLE_RE.test(line.text));
      const table: DocumentLine[] = [
        { text: "", cr, inFence: false },
        { text: "| | |", cr, inFence: false },
        { text: "|---|---|", cr, inFence: false },
        ...missing,
      ];
      if (titleIndex === -1) {
        out.splice(0, 0, ...table.slice(1), { text: "", cr, inFence: false });
      } else {
        out.splice(titleIndex + 1, 0, ...table);
      }
    }
  }

  return out.map((line) => line.text + line.cr).join("\n");
}

/**
 * Render a brand-new deck document from a remote snapshot (used by pull).
 * Cards with the same name on a board are merged into one line.
 */
export function renderDeck(snapshot: RemoteDeckSnapshot, date: string): string {
  const mergeBoard = (board: Board): string[] => {
    const totals = new Map<string, { name: string; quantity: number }>();
    for (const entry of snapshot.boards[board]) {
      const key = entry.name.toLowerCase();
      const existing = totals.get(key);
      if (existing) {
        existing.quantity += entry.quantity;
      } else {
        totals.set(key, { name: entry.name, quantity: entry.quantity });
      }
    }
    return [...totals.values()].map(({ name, quantity }) => `${quantity} ${name}`);
  };

  const commanders = [...new Set(snapshot.boards.commander.map((entry) => entry.name))];

  return [
    `# ${snapshot.name}`,
    "",
    "| | |",
    "|---|---|",
    formatRow("Commander", commanders.join(" & ")),
    formatRow("Date", date),
    formatRow(OWNED_KEYS.remoteId, snapshot.remoteId),
    formatRow(OWNED_KEYS.displayName, snapshot.name),
    "",
    "## Strategy",
    "",
    "_Imported from Moxfield. Add strategy notes here._",
    "",
    "## Decklist",
    "",
    "```",
    ...mergeBoard("commander"),
    ...mergeBoard("main"),
    "```",
    "",
  ].join("\n");
}

/** The deck's `#` title, without validating the rest of the document. */
export function deckTitle(document: string): string | undefined {
  return readTitle(splitLines(document));
}

/** The Moxfield ID a document is linked to, without validating its decklist. */
export function linkedRemoteId(document: string): string | undefined {
  return readMetadataRows(splitLines(document)).get(OWNED_KEYS.remoteId.toLowerCase());
}
