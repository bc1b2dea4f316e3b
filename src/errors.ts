export type ErrorKind =
  | "auth"
  | "not-found"
  | "transient"
  | "protocol"
  | "malformed-deck"
  | "conflict"
  | "import-mismatch"
  | "write-back";

/** Base class for every failure the sync engine reports per deck. */
export class DeckSyncError extends Error {
  readonly kind: ErrorKind;
  readonly status?: number;

  constructor(kind: ErrorKind, message: string, status?: number) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
    this.status = status;
  }
}

/** Expired or invalid bearer token. Fatal for the whole batch. */
export class AuthError extends DeckSyncError {
  constructor(message: string, status?: number) {
    super("auth", message, status);
  }
}

export class NotFoundError extends DeckSyncError {
  readonly remoteId: string;

  constructor(remoteId: string) {
    super("not-found", `Moxfield deck ${remoteId} no longer exists`, 404);
    this.remoteId = remoteId;
  }
}

/**
 * Timeout, network failure, 5xx or rate limit.
 * `retryable` is false when a write may have reached the server.
 */
export class TransientError extends DeckSyncError {
  readonly retryable: boolean;

  constructor(message: string, status?: number, retryable = true) {
    super("transient", message, status);
    this.retryable = retryable;
  }
}

/** Unexpected status or a response body that does not match its schema. */
export class ProtocolError extends DeckSyncError {
  constructor(message: string, status?: number) {
    super("protocol", message, status);
  }
}

export class MalformedDeckError extends DeckSyncError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super("malformed-deck", line === undefined ? message : `line ${line}: ${message}`);
    this.line = line;
  }
}

/** Deck version mismatch. Not raised by the current supersede policy, which never writes in place. */
export class ConflictError extends DeckSyncError {
  constructor(message: string, status?: number) {
    super("conflict", message, status);
  }
}

/** Moxfield renamed or dropped cards while importing them. */
export class ImportMismatchError extends DeckSyncError {
  readonly remoteId: string;
  readonly changes: string[];

  constructor(remoteId: string, changes: string[]) {
    super("import-mismatch", `${remoteId} does not match the file after import: ${changes.join(", ")}`);
    this.remoteId = remoteId;
    this.changes = changes;
  }
}

/** The remote writes succeeded but the deck file could not be updated. */
export class WriteBackError extends DeckSyncError {
  constructor(message: string) {
    super("write-back", message);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
