import { parseDeck, serializeDeck } from "./deck.ts";
import { countRemoteCards, diffDecks, formatChanges } from "./diff.ts";
import {
  AuthError,
  DeckSyncError,
  ImportMismatchError,
  MalformedDeckError,
  NotFoundError,
  ProtocolError,
  WriteBackError,
  describeError,
} from "./errors.ts";
import { DISCOVERABLE_VISIBILITY, type DeckRemote } from "./moxfield.ts";
import type {
  DeckPreview,
  DeckRecord,
  DeckSource,
  RemoteDeckSnapshot,
  SyncOutcome,
  SyncPlan,
  SyncReport,
} from "./types.ts";

export type SyncOptions = {
  /** Operator confirmed that a linked deck missing on Moxfield may be created again. */
  recreateMissing?: boolean;
};

export type DeckSyncResult = {
  outcome: SyncOutcome;
  /** The document with updated metadata; absent when nothing needs writing. */
  document?: string;
};

function log(message: string): void {
  console.error(`[deck-sync] ${message}`);
}

function toSyncError(err: unknown): DeckSyncError {
  if (err instanceof DeckSyncError) return err;
  return new ProtocolError(`Unexpected error: ${describeError(err)}`);
}

function failed(deck: string, err: unknown): SyncOutcome {
  const error = toSyncError(err);
  return { deck, state: "failed", error, detail: error.message };
}

function fallbackTitle(label: string): string {
  return label.replace(/\.md$/i, "");
}

/**
 * Decide what a sync of `record` would do. Only reads from the remote.
 *
 * Unlinked decks are created. Linked decks are fetched and compared: equal
 * decks are skipped, a deck we created whose import never landed gets that
 * import, a deck whose last import came back renamed is held until the file
 * is fixed, and any other difference supersedes the remote deck, because
 * Moxfield cannot remove or resize cards in place.
 */
export async function planDeck(
  remote: DeckRemote,
  record: DeckRecord,
  options: SyncOptions = {},
): Promise<SyncPlan> {
  const { remoteId } = record.metadata;
  if (!remoteId) {
    return { action: "create", reason: "unlinked" };
  }

  let snapshot;
  try {
    snapshot = await remote.fetchDeck(remoteId);
  } catch (err) {
    if (err instanceof NotFoundError && options.recreateMissing) {
      return { action: "create", reason: "missing-remote" };
    }
    throw err;
  }

  const changes = diffDecks(record, snapshot);
  if (changes.length === 0) {
    return { action: "skip", snapshot };
  }
  const { syncStatus } = record.metadata;
  if (syncStatus === "pending-import" && countRemoteCards(snapshot) === 0) {
    return { action: "complete-import", snapshot };
  }
  if (syncStatus === "name-mismatch") {
    return { action: "hold", snapshot, changes };
  }
  return { action: "supersede", snapshot, changes };
}

/**
 * Compare what Moxfield holds after an import with the file. Returns the
 * failure to report when Moxfield renamed or dropped cards, marking the
 * record so the next run holds instead of superseding again.
 */
function checkImport(
  record: DeckRecord,
  imported: RemoteDeckSnapshot,
): { error: ImportMismatchError; record: DeckRecord } | undefined {
  const changes = diffDecks(record, imported);
  if (changes.length === 0) return undefined;
  return {
    error: new ImportMismatchError(imported.remoteId, formatChanges(changes)),
    record: { ...record, metadata: { ...record.metadata, syncStatus: "name-mismatch" } },
  };
}

type CreateMode =
  | { kind: "new" }
  | { kind: "supersede"; previousId: string }
  | { kind: "replace-missing"; previousId: string };

/**
 * Create a deck, import every card into it and link it. Order is fixed:
 * create, then import, then the metadata update returned to the caller.
 */
async function createAndImport(
  remote: DeckRemote,
  label: string,
  record: DeckRecord,
  document: string,
  mode: CreateMode,
): Promise<DeckSyncResult> {
  const { metadata } = record;
  if (!metadata.displayName) {
    return { outcome: failed(label, new MalformedDeckError("deck has no title to create it under")) };
  }
  if (metadata.visibility !== DISCOVERABLE_VISIBILITY) {
    log(`  ${label} asks for ${metadata.visibility} visibility; creating it ${DISCOVERABLE_VISIBILITY} so it stays listable`);
  }

  let ref;
  try {
    ref = await remote.createDeck(metadata.displayName, metadata.format, DISCOVERABLE_VISIBILITY);
  } catch (err) {
    return { outcome: failed(label, err) };
  }
  log(`  created "${metadata.displayName}" as ${ref.remoteId}`);

  const previousId = mode.kind === "new" ? undefined : mode.previousId;
  const orphanedId = mode.kind === "supersede" ? mode.previousId : undefined;
  const linked: DeckRecord = {
    ...record,
    metadata: {
      ...metadata,
      remoteId: ref.remoteId,
      supersededIds: previousId ? [...metadata.supersededIds, previousId] : metadata.supersededIds,
      syncStatus: "pending-import",
    },
  };

  let imported: RemoteDeckSnapshot;
  try {
    imported = await remote.importCards(ref, record.cards);
  } catch (err) {
    // The deck exists remotely now; keep the link so a retry imports instead of creating again.
    const error = toSyncError(err);
    return {
      outcome: {
        deck: label,
        state: "failed",
        partial: true,
        remoteId: ref.remoteId,
        orphanedId,
        error,
        detail: `created ${ref.remoteId} but the card import failed: ${error.message}`,
      },
      document: serializeDeck(linked, document),
    };
  }

  const synced: DeckRecord = { ...linked, metadata: { ...linked.metadata, syncStatus: undefined } };
  const mismatch = checkImport(synced, imported);
  if (mismatch) {
    return {
      outcome: {
        deck: label,
        state: "failed",
        partial: true,
        remoteId: ref.remoteId,
        orphanedId,
        error: mismatch.error,
        detail: mismatch.error.message,
      },
      document: serializeDeck(mismatch.record, document),
    };
  }

  const outcome: SyncOutcome =
    mode.kind === "supersede"
      ? { deck: label, state: "superseded", remoteId: ref.remoteId, orphanedId }
      : {
          deck: label,
          state: "created",
          remoteId: ref.remoteId,
          detail: previousId ? `replaces missing ${previousId}` : undefined,
        };
  return { outcome, document: serializeDeck(synced, document) };
}

async function completeImport(
  remote: DeckRemote,
  label: string,
  record: DeckRecord,
  document: string,
  plan: Extract<SyncPlan, { action: "complete-import" }>,
): Promise<DeckSyncResult> {
  const { remoteId } = plan.snapshot;
  let imported: RemoteDeckSnapshot;
  try {
    imported = await remote.importCards(plan.snapshot, record.cards);
  } catch (err) {
    const error = toSyncError(err);
    return {
      outcome: {
        deck: label,
        state: "failed",
        partial: true,
        remoteId,
        error,
        detail: `${remoteId} is still empty: ${error.message}`,
      },
    };
  }
  const synced: DeckRecord = { ...record, metadata: { ...record.metadata, syncStatus: undefined } };
  const mismatch = checkImport(synced, imported);
  if (mismatch) {
    return {
      outcome: {
        deck: label,
        state: "failed",
        partial: true,
        remoteId,
        error: mismatch.error,
        detail: mismatch.error.message,
      },
      document: serializeDeck(mismatch.record, document),
    };
  }
  return {
    outcome: { deck: label, state: "created", remoteId, detail: "completed pending import" },
    document: serializeDeck(synced, document),
  };
}

/**
 * Reconcile one deck document with Moxfield.
 *
 * Never throws for remote or parse failures: they come back as a `failed`
 * outcome. A malformed document never reaches the network.
 */
export async function syncDeck(
  remote: DeckRemote,
  label: string,
  document: string,
  options: SyncOptions = {},
): Promise<DeckSyncResult> {
  let record: DeckRecord;
  try {
    record = parseDeck(document, fallbackTitle(label));
  } catch (err) {
    return { outcome: failed(label, err) };
  }

  let plan: SyncPlan;
  try {
    plan = await planDeck(remote, record, options);
  } catch (err) {
    return { outcome: failed(label, err) };
  }

  switch (plan.action) {
    case "skip": {
      const outcome: SyncOutcome = { deck: label, state: "unchanged", remoteId: plan.snapshot.remoteId };
      const { syncStatus } = record.metadata;
      if (!syncStatus) return { outcome };
      // The remote already matches: an import that timed out landed, or the file was fixed.
      const settled: DeckRecord = { ...record, metadata: { ...record.metadata, syncStatus: undefined } };
      return {
        outcome: { ...outcome, detail: `cleared ${syncStatus}` },
        document: serializeDeck(settled, document),
      };
    }
    case "hold": {
      const error = new ImportMismatchError(plan.snapshot.remoteId, formatChanges(plan.changes));
      return {
        outcome: { deck: label, state: "failed", remoteId: plan.snapshot.remoteId, error, detail: error.message },
      };
    }
    case "create":
      return createAndImport(
        remote,
        label,
        record,
        document,
        record.metadata.remoteId && plan.reason === "missing-remote"
          ? { kind: "replace-missing", previousId: record.metadata.remoteId }
          : { kind: "new" },
      );
    case "complete-import":
      return completeImport(remote, label, record, document, plan);
    case "supersede":
      log(`  ${plan.snapshot.remoteId} differs: ${formatChanges(plan.changes).join(", ")}`);
      return createAndImport(remote, label, record, document, {
        kind: "supersede",
        previousId: plan.snapshot.remoteId,
      });
  }
}

/** Load, sync and save one deck source. The save happens only after the remote writes. */
export async function syncSource(
  remote: DeckRemote,
  source: DeckSource,
  options: SyncOptions = {},
): Promise<SyncOutcome> {
  let document: string;
  try {
    document = await source.load();
  } catch (err) {
    return failed(source.label, new MalformedDeckError(`cannot read deck file: ${describeError(err)}`));
  }

  const { outcome, document: updated } = await syncDeck(remote, source.label, document, options);
  if (updated === undefined || updated === document) {
    return outcome;
  }

  try {
    await source.save(updated);
  } catch (err) {
    return {
      ...outcome,
      state: "failed",
      partial: outcome.remoteId !== undefined,
      error: new WriteBackError(`cannot write deck file: ${describeError(err)}`),
      detail: `Moxfield is linked to ${outcome.remoteId ?? "?"} but the file was not updated; ` +
        `record that Moxfield ID by hand`,
    };
  }
  return outcome;
}

/**
 * Sync decks one at a time, in order. The owner listing runs first so an
 * expired token fails before any deck is touched. An AuthError at any point
 * stops the batch: every later call would fail the same way.
 */
export async function syncAll(
  remote: DeckRemote,
  owner: string,
  decks: DeckSource[],
  options: SyncOptions = {},
): Promise<SyncReport> {
  let listed: Set<string> | undefined;
  try {
    const owned = await remote.listOwnedDecks(owner);
    listed = new Set(owned.map((deck) => deck.remoteId));
    log(`Found ${owned.length} deck(s) on Moxfield for ${owner}`);
  } catch (err) {
    if (err instanceof AuthError) {
      log(`Aborting: ${err.message}`);
      return { outcomes: [], skipped: decks.map((deck) => deck.label), abortReason: err };
    }
    log(`Could not list decks for ${owner}, continuing without discoverability checks: ${describeError(err)}`);
  }

  const outcomes: SyncOutcome[] = [];
  for (const [index, deck] of decks.entries()) {
    log(`[${deck.label}]`);
    const outcome = await syncSource(remote, deck, options);
    outcomes.push(outcome);
    log(`  ${outcome.state}${outcome.detail ? `: ${outcome.detail}` : ""}`);

    if (outcome.state === "unchanged" && outcome.remoteId && listed && !listed.has(outcome.remoteId)) {
      log(`  ${outcome.remoteId} is not in ${owner}'s deck list; it may not be public`);
    }
    if (outcome.error instanceof AuthError) {
      return {
        outcomes,
        skipped: decks.slice(index + 1).map((d) => d.label),
        abortReason: outcome.error,
      };
    }
  }

  return { outcomes, skipped: [] };
}

/** Plan one deck without writing to Moxfield or to the file. */
export async function previewSource(
  remote: DeckRemote,
  source: DeckSource,
  options: SyncOptions = {},
): Promise<DeckPreview> {
  try {
    const record = parseDeck(await source.load(), fallbackTitle(source.label));
    return { deck: source.label, record, plan: await planDeck(remote, record, options) };
  } catch (err) {
    return { deck: source.label, error: toSyncError(err) };
  }
}

/** Dry run over several decks; stops at the first AuthError like syncAll. */
export async function previewAll(
  remote: DeckRemote,
  decks: DeckSource[],
  options: SyncOptions = {},
): Promise<DeckPreview[]> {
  const previews: DeckPreview[] = [];
  for (const deck of decks) {
    const preview = await previewSource(remote, deck, options);
    previews.push(preview);
    if (preview.error instanceof AuthError) break;
  }
  return previews;
}
