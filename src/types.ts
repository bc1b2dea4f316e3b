import type { DeckSyncError } from "./errors.ts";

export type Board = "main" | "commander";

/** Visibility values accepted by Moxfield. Only "public" decks show up in owner listings. */
export type Visibility = "public" | "unlisted" | "private";

export type CardLine = {
  name: string;
  quantity: number;
  board: Board;
};

/**
 * `pending-import`: the deck was created remotely but its card import failed.
 * `name-mismatch`: the import landed but Moxfield renamed or dropped cards.
 */
export type SyncStatus = "pending-import" | "name-mismatch";

/** Local record of how a deck file is linked to Moxfield. */
export type DeckMetadata = {
  title: string;
  remoteId?: string;
  displayName: string;
  visibility: Visibility;
  format: string;
  commanders: string[];
  /** Remote ids this file was linked to before being superseded, oldest first. */
  supersededIds: string[];
  /** Set while a sync is unfinished; stored in the Sync Status row. */
  syncStatus?: SyncStatus;
};

export type DeckRecord = {
  cards: CardLine[];
  metadata: DeckMetadata;
};

/**
 * Both ids Moxfield assigns a deck: the public one (stored locally) and the
 * internal one (needed for imports). A freshly created deck may come back
 * without its internal id; importCards looks it up.
 */
export type RemoteDeckRef = {
  remoteId: string;
  internalId?: string;
};

export type RemoteDeckSummary = RemoteDeckRef & {
  internalId: string;
  name: string;
  format: string;
  visibility?: string;
};

export type RemoteCardEntry = {
  uniqueCardId: string;
  name: string;
  quantity: number;
};

export type RemoteDeckSnapshot = RemoteDeckRef & {
  internalId: string;
  name: string;
  /** Optimistic-concurrency token; must be echoed on any versioned write. */
  version: number;
  boards: Record<Board, RemoteCardEntry[]>;
};

export type SyncState = "created" | "unchanged" | "superseded" | "failed";

export type SyncOutcome = {
  deck: string;
  state: SyncState;
  remoteId?: string;
  /** Previously linked remote deck, left in place after a supersede. */
  orphanedId?: string;
  /** The remote deck was written but the sync did not finish. */
  partial?: boolean;
  error?: DeckSyncError;
  detail?: string;
};

export type CardDelta = {
  board: Board;
  name: string;
  local: number;
  remote: number;
};

export type SyncPlan =
  | { action: "create"; reason: "unlinked" | "missing-remote" }
  | { action: "skip"; snapshot: RemoteDeckSnapshot }
  | { action: "complete-import"; snapshot: RemoteDeckSnapshot }
  | { action: "supersede"; snapshot: RemoteDeckSnapshot; changes: CardDelta[] }
  /** The last import came back renamed; wait for the file to be fixed instead of superseding again. */
  | { action: "hold"; snapshot: RemoteDeckSnapshot; changes: CardDelta[] };

export type SyncReport = {
  outcomes: SyncOutcome[];
  /** Decks never attempted because the batch was aborted. */
  skipped: string[];
  /** Set when an AuthError stopped the batch. */
  abortReason?: DeckSyncError;
};

/** Result of planning a deck without writing anything. */
export type DeckPreview = {
  deck: string;
  plan?: SyncPlan;
  record?: DeckRecord;
  error?: DeckSyncError;
};

/** Where a deck document comes from and goes back to. */
export type DeckSource = {
  label: string;
  load(): Promise<string>;
  save(document: string): Promise<void>;
};

export type Config = {
  token?: string;
  username?: string;
  apiBase: string;
  clientVersion: string;
  decksDir: string;
  timeoutMs: number;
  port: number;
};
